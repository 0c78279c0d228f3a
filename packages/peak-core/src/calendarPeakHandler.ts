import { Store } from "@tanstack/store";
import type { DateTime } from "luxon";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { decodePeakMarker } from "./metadata.js";
import { DEFAULT_PREHEAT_MINUTES, PeakEvent } from "./peakEvent.js";
import { generateFallbackSchedule, mergePeakSchedules, sortByStart, type EventSet } from "./schedule.js";
import { describeWinterSeason, isWinterSeason } from "./season.js";
import type { PeakView } from "./state.js";
import { DEFAULT_TIME_ZONE, assertTimeZone, entryRange, isoformat } from "./time.js";
import { WINTER_CREDITS_RATE, type CalendarEntry, type CalendarPort, type CalendarRegistry, type RateCode } from "./types.js";

export const CALENDAR_LOOKAHEAD_DAYS = 7;

export type CalendarPeakHandlerOptions = {
  calendar: CalendarPort;
  registry: CalendarRegistry;
  calendarId: string;
  rate: RateCode;
  preheatMinutes?: number;
  zone?: string;
  logger?: Logger;
};

type MirrorState = {
  events: EventSet;
  calendarName: string | null;
  lastLoad: DateTime | null;
};

/**
 * Rebuilds the peak schedule from the entries previously written to the calendar,
 * so consumers keep a consistent view across restarts and feed outages.
 */
export class CalendarPeakHandler {
  readonly calendarId: string;
  readonly rate: RateCode;
  readonly preheatMinutes: number;
  readonly zone: string;
  private readonly calendar: CalendarPort;
  private readonly registry: CalendarRegistry;
  private readonly logger: Logger;
  private readonly store = new Store<MirrorState>({ events: [], calendarName: null, lastLoad: null });

  constructor(options: CalendarPeakHandlerOptions) {
    this.calendar = options.calendar;
    this.registry = options.registry;
    this.calendarId = options.calendarId;
    this.rate = options.rate;
    this.preheatMinutes = options.preheatMinutes ?? DEFAULT_PREHEAT_MINUTES;
    this.zone = assertTimeZone(options.zone ?? DEFAULT_TIME_ZONE);
    this.logger = options.logger ?? silentLogger;
  }

  get events(): EventSet {
    return this.store.state.events;
  }

  get calendarName(): string | null {
    return this.store.state.calendarName;
  }

  get lastLoad(): DateTime | null {
    return this.store.state.lastLoad;
  }

  view(): PeakView {
    return { rate: this.rate, events: this.store.state.events };
  }

  async loadEvents(now: DateTime): Promise<boolean> {
    const localNow = now.setZone(this.zone);
    try {
      const info = await this.registry.findCalendar(this.calendarId);
      if (!info) {
        this.logger.logDebug(`[Calendar] Calendar ${this.calendarId} not found`);
        return false;
      }

      const entries = await this.calendar.listEvents({
        calendarId: this.calendarId,
        from: isoformat(localNow),
        to: isoformat(localNow.plus({ days: CALENDAR_LOOKAHEAD_DAYS }))
      });

      const parsed: PeakEvent[] = [];
      for (const entry of entries) {
        const peak = this.parseEntry(entry);
        if (peak) {
          parsed.push(peak);
        }
      }
      this.logger.logDebug(`[Calendar] Found ${parsed.length} peak events in calendar ${this.calendarId}`);

      let events: PeakEvent[];
      if (this.rate === WINTER_CREDITS_RATE) {
        if (!isWinterSeason(localNow)) {
          this.logger.logDebug(`[Calendar] Outside winter season (${describeWinterSeason(localNow)}), no ${this.rate} schedule generated`);
        }
        const generated = generateFallbackSchedule({ today: localNow, rate: this.rate, preheatMinutes: this.preheatMinutes });
        events = mergePeakSchedules(parsed, generated).events;
        this.logger.logDebug(
          `[Calendar] ${this.rate}: ${events.length} peaks after merging ${parsed.length} calendar entries with ${generated.length} generated`
        );
      } else {
        events = sortByStart(parsed);
      }

      this.store.setState(() => ({ events, calendarName: info.name ?? this.calendarId, lastLoad: localNow }));
      return true;
    } catch (error) {
      this.logger.warn(`[Calendar] Failed to load events from calendar ${this.calendarId}: ${errorMessage(error)}`);
      return false;
    }
  }

  private parseEntry(entry: CalendarEntry): PeakEvent | null {
    const marker = decodePeakMarker(entry.description);
    if (!marker) {
      return null;
    }

    try {
      const { start, end } = entryRange(entry, this.zone);
      const isCritical = this.rate === WINTER_CREDITS_RATE ? marker.isCritical : true;
      return new PeakEvent({
        start,
        end,
        criticality: isCritical ? { kind: "announced" } : { kind: "generated" },
        rate: marker.rate ?? this.rate,
        preheatMinutes: this.preheatMinutes
      });
    } catch (error) {
      this.logger.warn(`[Calendar] Failed to parse calendar event ${marker.uid}: ${errorMessage(error)}`);
      return null;
    }
  }
}
