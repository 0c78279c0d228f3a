import type { DateTime } from "luxon";
import type { PeakEvent } from "./peakEvent.js";
import type { EventSet } from "./schedule.js";
import { isWinterSeason } from "./season.js";
import { windowContains } from "./time.js";
import { WINTER_CREDITS_RATE, type AnchorWindow, type DayPart, type PeakState, type RateCode, type TimeSlot } from "./types.js";

export type PeakView = {
  rate: RateCode;
  events: EventSet;
};

export type PeakStateReport = {
  state: PeakState;
  currentPeak: PeakEvent | null;
  currentPeakIsCritical: boolean;
  peakInProgress: boolean;
  nextPeak: PeakEvent | null;
  nextCriticalPeak: PeakEvent | null;
  isAnyCriticalPeakComing: boolean;
  preheatInProgress: boolean;
  nextPreheatStart: DateTime | null;
  nextAnchor: AnchorWindow | null;
  todayMorningPeak: PeakEvent | null;
  todayEveningPeak: PeakEvent | null;
  tomorrowMorningPeak: PeakEvent | null;
  tomorrowEveningPeak: PeakEvent | null;
};

const DAY_PART_PROBE_HOURS: Record<TimeSlot, number> = { AM: 6, PM: 16 };

function earliest(events: PeakEvent[]): PeakEvent | null {
  let found: PeakEvent | null = null;
  for (const event of events) {
    if (!found || event.start.toMillis() < found.start.toMillis()) {
      found = event;
    }
  }
  return found;
}

export function currentPeak(view: PeakView, now: DateTime): PeakEvent | null {
  return view.events.find((event) => windowContains(event, now)) ?? null;
}

export function nextPeak(view: PeakView, now: DateTime): PeakEvent | null {
  return earliest(view.events.filter((event) => event.end.toMillis() > now.toMillis()));
}

export function nextCriticalPeak(view: PeakView, now: DateTime): PeakEvent | null {
  return earliest(view.events.filter((event) => event.isCritical && event.end.toMillis() > now.toMillis()));
}

export function peakInProgress(view: PeakView, now: DateTime): boolean {
  return currentPeak(view, now) !== null;
}

export function currentPeakIsCritical(view: PeakView, now: DateTime): boolean {
  return currentPeak(view, now)?.isCritical ?? false;
}

export function isAnyCriticalPeakComing(view: PeakView, now: DateTime): boolean {
  return nextCriticalPeak(view, now) !== null;
}

export function nextAnchor(view: PeakView, now: DateTime): AnchorWindow | null {
  return nextPeak(view, now)?.anchorWindow ?? null;
}

// Raw window arithmetic, without the Winter Credits criticality guard.
export function preheatInProgress(view: PeakView, now: DateTime): boolean {
  const upcoming = nextPeak(view, now);
  return upcoming ? windowContains(upcoming.preheatWindow, now) : false;
}

/**
 * Preheat signal exposed to automations. Winter Credits generates a placeholder peak
 * twice a day, so preheating is only reported ahead of a critical one.
 */
export function criticalPreheatInProgress(view: PeakView, now: DateTime): boolean {
  if (!preheatInProgress(view, now)) {
    return false;
  }
  if (view.rate !== WINTER_CREDITS_RATE) {
    return true;
  }
  return nextPeak(view, now)?.isCritical ?? false;
}

export function nextPreheatStart(view: PeakView, now: DateTime): DateTime | null {
  const upcoming = nextPeak(view, now);
  if (!upcoming) {
    return null;
  }
  if (view.rate === WINTER_CREDITS_RATE && !upcoming.isCritical) {
    return null;
  }
  return upcoming.preheatWindow.start;
}

export function peakForDayPart(view: PeakView, now: DateTime, day: DayPart, slot: TimeSlot): PeakEvent | null {
  const probe = now
    .startOf("day")
    .plus({ days: day === "today" ? 0 : 1 })
    .set({ hour: DAY_PART_PROBE_HOURS[slot] });
  return view.events.find((event) => windowContains(event, probe)) ?? null;
}

export function classifyPeakState(view: PeakView, now: DateTime): PeakState {
  if (!isWinterSeason(now)) {
    return "off_season";
  }

  const active = currentPeak(view, now);
  if (active) {
    return active.isCritical ? "critical_peak" : "peak";
  }

  if (view.rate === WINTER_CREDITS_RATE) {
    for (const event of view.events) {
      const anchor = event.anchorWindow;
      if (windowContains(anchor, now)) {
        return anchor.isCritical ? "critical_anchor" : "anchor";
      }
    }
  }

  return "normal";
}

export function describePeakState(view: PeakView, now: DateTime): PeakStateReport {
  const current = currentPeak(view, now);
  return {
    state: classifyPeakState(view, now),
    currentPeak: current,
    currentPeakIsCritical: current?.isCritical ?? false,
    peakInProgress: current !== null,
    nextPeak: nextPeak(view, now),
    nextCriticalPeak: nextCriticalPeak(view, now),
    isAnyCriticalPeakComing: isAnyCriticalPeakComing(view, now),
    preheatInProgress: criticalPreheatInProgress(view, now),
    nextPreheatStart: nextPreheatStart(view, now),
    nextAnchor: view.rate === WINTER_CREDITS_RATE ? nextAnchor(view, now) : null,
    todayMorningPeak: peakForDayPart(view, now, "today", "AM"),
    todayEveningPeak: peakForDayPart(view, now, "today", "PM"),
    tomorrowMorningPeak: peakForDayPart(view, now, "tomorrow", "AM"),
    tomorrowEveningPeak: peakForDayPart(view, now, "tomorrow", "PM")
  };
}
