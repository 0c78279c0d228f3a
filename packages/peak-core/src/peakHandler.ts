import { Store } from "@tanstack/store";
import type { DateTime } from "luxon";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { DEFAULT_PREHEAT_MINUTES, peakEventFromAnnouncement, type PeakEvent } from "./peakEvent.js";
import { describeWinterSeason, isWinterSeason } from "./season.js";
import { generateFallbackSchedule, mergePeakSchedules, type EventSet, type SlotConflict } from "./schedule.js";
import type { PeakView } from "./state.js";
import { DEFAULT_TIME_ZONE, assertTimeZone } from "./time.js";
import { WINTER_CREDITS_RATE, type Announcement, type RateCode } from "./types.js";

export type PeakHandlerOptions = {
  rate: RateCode;
  preheatMinutes?: number;
  zone?: string;
  logger?: Logger;
};

export type LoadResult = {
  events: EventSet;
  conflicts: SlotConflict[];
  dropped: Announcement[];
};

function describeSlot(event: PeakEvent): string {
  return event.start.toFormat("yyyy-MM-dd HH:mm");
}

export class PeakHandler {
  readonly rate: RateCode;
  readonly preheatMinutes: number;
  readonly zone: string;
  private readonly logger: Logger;
  private readonly store = new Store<EventSet>([]);

  constructor(options: PeakHandlerOptions) {
    this.rate = options.rate;
    this.preheatMinutes = options.preheatMinutes ?? DEFAULT_PREHEAT_MINUTES;
    this.zone = assertTimeZone(options.zone ?? DEFAULT_TIME_ZONE);
    this.logger = options.logger ?? silentLogger;
  }

  get events(): EventSet {
    return this.store.state;
  }

  view(): PeakView {
    return { rate: this.rate, events: this.store.state };
  }

  loadAnnouncements(announcements: Announcement[], now: DateTime): LoadResult {
    const announced: PeakEvent[] = [];
    const dropped: Announcement[] = [];
    for (const announcement of announcements) {
      try {
        announced.push(
          peakEventFromAnnouncement(announcement, {
            rate: this.rate,
            zone: this.zone,
            preheatMinutes: this.preheatMinutes
          })
        );
      } catch (error) {
        dropped.push(announcement);
        this.logger.warn(`[OpenData] Dropping malformed announcement (${announcement.start} - ${announcement.end}): ${errorMessage(error)}`);
      }
    }

    const today = now.setZone(this.zone);
    if (this.rate === WINTER_CREDITS_RATE && !isWinterSeason(today)) {
      this.logger.logDebug(`[OpenData] Outside winter season (${describeWinterSeason(today)}), no ${this.rate} schedule generated`);
    }
    const generated = generateFallbackSchedule({ today, rate: this.rate, preheatMinutes: this.preheatMinutes });
    const { events, conflicts } = mergePeakSchedules(announced, generated);

    for (const conflict of conflicts) {
      this.logger.warn(
        `[OpenData] Two announcements share slot ${conflict.slotKey}; keeping ${describeSlot(conflict.kept)}, dropping ${describeSlot(conflict.dropped)}`
      );
    }

    this.store.setState(() => events);

    const critical = events.filter((event) => event.isCritical);
    const first = critical[0];
    const last = critical[critical.length - 1];
    if (first && last) {
      this.logger.logDebug(`[OpenData] ${this.rate} critical peaks: first=${describeSlot(first)}, last=${describeSlot(last)}`);
    }
    this.logger.logDebug(
      `[OpenData] ${this.rate} schedule: ${critical.length} announced (critical) + ${events.length - critical.length} generated (non-critical) = ${events.length} total`
    );

    return { events, conflicts, dropped };
  }
}
