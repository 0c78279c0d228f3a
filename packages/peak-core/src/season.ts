import { DateTime } from "luxon";

// Dynamic-rate programs run from December 1 through March 31 of the following year.
export function isWinterSeason(date: DateTime): boolean {
  return date.month === 12 || date.month <= 3;
}

export function describeWinterSeason(date: DateTime): string {
  const { start, end } = winterSeasonBounds(date);
  return `${start.toFormat("yyyy-MM-dd")} to ${end.toFormat("yyyy-MM-dd")}`;
}

export function winterSeasonBounds(date: DateTime): { start: DateTime; end: DateTime } {
  const zone = date.zone;
  const startYear = date.month <= 3 ? date.year - 1 : date.year;
  return {
    start: DateTime.fromObject({ year: startYear, month: 12, day: 1 }, { zone }),
    end: DateTime.fromObject({ year: startYear + 1, month: 3, day: 31 }, { zone })
  };
}
