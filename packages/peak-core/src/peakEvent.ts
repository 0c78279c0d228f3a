import type { DateTime } from "luxon";
import { PeakSyncError } from "./errors.js";
import { parseInstant } from "./time.js";
import type { AnchorWindow, Announcement, RateCode, TimeSlot, TimeWindow } from "./types.js";

export const DEFAULT_PREHEAT_MINUTES = 120;

export type Criticality =
  | { kind: "announced" }
  | { kind: "generated" }
  | { kind: "legacy"; offerCode: string };

export type PeakEventInit = {
  start: DateTime;
  end: DateTime;
  criticality: Criticality;
  rate: RateCode;
  preheatMinutes?: number;
  offerCode?: string;
  sector?: string;
};

function resolveCriticality(criticality: Criticality): boolean {
  switch (criticality.kind) {
    case "announced":
      return true;
    case "generated":
      return false;
    case "legacy":
      return criticality.offerCode.startsWith("TPC") || criticality.offerCode.startsWith("ENG");
  }
}

export class PeakEvent {
  readonly start: DateTime;
  readonly end: DateTime;
  readonly isCritical: boolean;
  readonly rate: RateCode;
  readonly preheatMinutes: number;
  readonly offerCode?: string;
  readonly sector?: string;

  constructor(init: PeakEventInit) {
    if (!init.start.isValid || !init.end.isValid) {
      throw new PeakSyncError("INVALID_EVENT", "Peak event start and end must be valid instants");
    }
    if (init.end.toMillis() <= init.start.toMillis()) {
      throw new PeakSyncError(
        "INVALID_EVENT",
        `Peak event must end after it starts (start=${init.start.toISO()}, end=${init.end.toISO()})`
      );
    }
    const preheatMinutes = init.preheatMinutes ?? DEFAULT_PREHEAT_MINUTES;
    if (!Number.isFinite(preheatMinutes) || preheatMinutes < 0) {
      throw new PeakSyncError("INVALID_EVENT", `Invalid preheat duration: ${preheatMinutes}`);
    }

    this.start = init.start;
    this.end = init.end;
    this.isCritical = resolveCriticality(init.criticality);
    this.rate = init.rate;
    this.preheatMinutes = preheatMinutes;
    this.offerCode = init.offerCode;
    this.sector = init.sector;
  }

  get timeSlot(): TimeSlot {
    return this.start.hour < 12 ? "AM" : "PM";
  }

  get slotKey(): string {
    return `${this.start.toFormat("yyyy-MM-dd")}|${this.timeSlot}`;
  }

  get preheatWindow(): TimeWindow {
    return { start: this.start.minus({ minutes: this.preheatMinutes }), end: this.start };
  }

  /**
   * Notification period ahead of a Winter Credits peak: morning peaks are anchored
   * from five to two hours before the start, evening peaks from four to two hours.
   */
  get anchorWindow(): AnchorWindow {
    const leadHours = this.timeSlot === "AM" ? 5 : 4;
    return {
      start: this.start.minus({ hours: leadHours }),
      end: this.start.minus({ hours: 2 }),
      isCritical: this.isCritical
    };
  }
}

export function peakEventFromAnnouncement(
  announcement: Announcement,
  options: { rate: RateCode; zone: string; preheatMinutes: number; criticality?: Criticality }
): PeakEvent {
  return new PeakEvent({
    start: parseInstant(announcement.start, options.zone),
    end: parseInstant(announcement.end, options.zone),
    criticality: options.criticality ?? { kind: "announced" },
    rate: options.rate,
    preheatMinutes: options.preheatMinutes,
    offerCode: announcement.offerCode,
    sector: announcement.sector
  });
}
