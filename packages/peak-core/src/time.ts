import { DateTime, IANAZone } from "luxon";
import { PeakSyncError } from "./errors.js";
import type { CalendarEntry, TimeWindow } from "./types.js";

export const DEFAULT_TIME_ZONE = "America/Toronto";

export function assertTimeZone(zone: string): string {
  if (!IANAZone.isValidZone(zone)) {
    throw new PeakSyncError("INVALID_TIMEZONE", `Unknown time zone: ${zone}`);
  }
  return zone;
}

// Strings without an offset are read in `zone`; strings with one are converted to it.
export function parseInstant(value: string, zone: string): DateTime {
  const iso = DateTime.fromISO(value, { zone });
  if (iso.isValid) {
    return iso;
  }
  const simple = DateTime.fromFormat(value, "yyyy-MM-dd HH:mm", { zone });
  if (simple.isValid) {
    return simple;
  }
  throw new PeakSyncError("INVALID_EVENT", `Invalid date value: ${value}`);
}

export function isoformat(value: DateTime): string {
  const fraction = value.millisecond === 0 ? "" : value.toFormat(".SSS000");
  return `${value.toFormat("yyyy-MM-dd'T'HH:mm:ss")}${fraction}${value.toFormat("ZZ")}`;
}

export function entryRange(entry: CalendarEntry, zone: string): TimeWindow {
  if (entry.start.dateTime && entry.end.dateTime) {
    return { start: parseInstant(entry.start.dateTime, zone), end: parseInstant(entry.end.dateTime, zone) };
  }

  if (entry.start.date && entry.end.date) {
    return {
      start: parseInstant(entry.start.date, zone).startOf("day"),
      end: parseInstant(entry.end.date, zone).startOf("day")
    };
  }

  throw new PeakSyncError("INVALID_EVENT", `Calendar entry ${entry.id ?? "(no id)"} is missing supported start/end fields`);
}

export function windowContains(window: TimeWindow, instant: DateTime): boolean {
  const at = instant.toMillis();
  return window.start.toMillis() <= at && at < window.end.toMillis();
}
