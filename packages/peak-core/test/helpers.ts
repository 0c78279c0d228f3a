import { DateTime } from "luxon";
import { vi } from "vitest";
import type {
  Announcement,
  AnnouncementFeed,
  CalendarConfigStore,
  CalendarEntry,
  CalendarInfo,
  CalendarPort,
  CalendarRegistry,
  Logger,
  NewCalendarEntry,
  Notifier,
  PersistentNotification
} from "../src/index.js";

export const ZONE = "America/Toronto";

export function at(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: ZONE });
}

export function announcement(start: string, end: string, offerCode = "CPC-D"): Announcement {
  return { start, end, offerCode, sector: "Résidentiel" };
}

export function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    log: vi.fn(),
    logDebug: vi.fn(),
    warn: vi.fn((...args: unknown[]) => {
      warnings.push(args.map(String).join(" "));
    }),
    error: vi.fn()
  };
}

function overlaps(entry: CalendarEntry, from: string, to: string): boolean {
  if (!entry.start.dateTime || !entry.end.dateTime) {
    return true;
  }
  return Date.parse(entry.start.dateTime) < Date.parse(to) && Date.parse(from) < Date.parse(entry.end.dateTime);
}

export class FakeCalendar implements CalendarPort, CalendarRegistry {
  entries: CalendarEntry[] = [];
  created: NewCalendarEntry[] = [];
  calendars: CalendarInfo[] = [{ id: "calendar.peaks", name: "Peaks" }];
  ready = true;
  failList = false;
  failCreateStarts = new Set<string>();
  createGate: Promise<void> | null = null;
  listCalls = 0;
  findCalls = 0;

  async listEvents(args: { calendarId: string; from: string; to: string }): Promise<CalendarEntry[]> {
    this.listCalls += 1;
    if (this.failList) {
      throw new Error("calendar unavailable");
    }
    return this.entries.filter((entry) => overlaps(entry, args.from, args.to));
  }

  async createEvent(args: { calendarId: string; entry: NewCalendarEntry }): Promise<void> {
    if (this.createGate) {
      await this.createGate;
    }
    if (this.failCreateStarts.has(args.entry.start)) {
      throw new Error(`write rejected for ${args.entry.start}`);
    }
    this.created.push(args.entry);
    this.entries.push(toCalendarEntry(args.entry, `evt-${this.created.length}`));
  }

  async serviceReady(): Promise<boolean> {
    return this.ready;
  }

  async findCalendar(calendarId: string): Promise<CalendarInfo | null> {
    this.findCalls += 1;
    return this.calendars.find((calendar) => calendar.id === calendarId) ?? null;
  }
}

export function toCalendarEntry(entry: NewCalendarEntry, id: string): CalendarEntry {
  return {
    id,
    summary: entry.summary,
    description: entry.description,
    location: entry.location,
    start: { dateTime: entry.start },
    end: { dateTime: entry.end }
  };
}

export class FakeFeed implements AnnouncementFeed {
  announcements: Announcement[] = [];
  fail = false;
  calls = 0;

  async fetchAnnouncements(): Promise<Announcement[]> {
    this.calls += 1;
    if (this.fail) {
      throw new Error("feed unavailable");
    }
    return this.announcements;
  }
}

export class RecordingNotifier implements Notifier {
  notifications: PersistentNotification[] = [];

  async notify(notification: PersistentNotification): Promise<void> {
    this.notifications.push(notification);
  }
}

export class RecordingConfigStore implements CalendarConfigStore {
  cleared: string[] = [];

  async clearCalendar(contractId: string): Promise<void> {
    this.cleared.push(contractId);
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((resolvePromise) => {
    resolve = resolvePromise;
  });
  return { promise, resolve };
}
