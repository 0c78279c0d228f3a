import type { DateTime } from "luxon";

export type RateCode = "DCPC" | "DPC" | "M-GDP" | "M-CPC" | "M-GPC" | "M-ENG" | "M-OEA";

export const WINTER_CREDITS_RATE: RateCode = "DCPC";

// Offer codes published by the open data feed, keyed to the internal rate.
export const OFFER_CODE_RATES: Record<string, RateCode> = {
  "CPC-D": "DCPC",
  "TPC-DPC": "DPC",
  "GDP-Affaires": "M-GDP",
  "CPC-G": "M-CPC",
  "TPC-GPC": "M-GPC",
  ENG01: "M-ENG",
  OEA: "M-OEA"
};

export const RATE_CODES: readonly RateCode[] = ["DCPC", "DPC", "M-GDP", "M-CPC", "M-GPC", "M-ENG", "M-OEA"];

export function isRateCode(value: string): value is RateCode {
  return RATE_CODES.some((code) => code === value);
}

export function offerCodesForRate(rate: RateCode): string[] {
  return Object.entries(OFFER_CODE_RATES)
    .filter(([, mapped]) => mapped === rate)
    .map(([offer]) => offer);
}

export type TimeSlot = "AM" | "PM";
export type DayPart = "today" | "tomorrow";

export type TimeWindow = {
  start: DateTime;
  end: DateTime;
};

export type AnchorWindow = TimeWindow & {
  isCritical: boolean;
};

export type PeakState = "off_season" | "critical_peak" | "peak" | "critical_anchor" | "anchor" | "normal";

export type Announcement = {
  start: string;
  end: string;
  offerCode: string;
  sector?: string;
};

export type CalendarEntryTime = {
  dateTime?: string;
  date?: string;
  timeZone?: string;
};

export type CalendarEntry = {
  id?: string;
  summary?: string;
  description?: string;
  location?: string;
  start: CalendarEntryTime;
  end: CalendarEntryTime;
};

export type NewCalendarEntry = {
  summary: string;
  description: string;
  location: string;
  start: string;
  end: string;
};

export type CalendarInfo = {
  id: string;
  name?: string;
};

export type AnnouncementFeed = {
  fetchAnnouncements(rate: RateCode, today: DateTime): Promise<Announcement[]>;
};

export type CalendarPort = {
  listEvents(args: { calendarId: string; from: string; to: string }): Promise<CalendarEntry[]>;
  createEvent(args: { calendarId: string; entry: NewCalendarEntry }): Promise<void>;
};

export type CalendarRegistry = {
  serviceReady(): Promise<boolean>;
  findCalendar(calendarId: string): Promise<CalendarInfo | null>;
};

export type PersistentNotification = {
  notificationId: string;
  title: string;
  message: string;
};

export type Notifier = {
  notify(notification: PersistentNotification): Promise<void>;
};

export type CalendarConfigStore = {
  clearCalendar(contractId: string): Promise<void>;
};
