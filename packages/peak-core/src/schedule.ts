import type { DateTime } from "luxon";
import { PeakEvent } from "./peakEvent.js";
import { isWinterSeason } from "./season.js";
import { WINTER_CREDITS_RATE, type RateCode } from "./types.js";

export type EventSet = readonly PeakEvent[];

export type SlotConflict = {
  slotKey: string;
  kept: PeakEvent;
  dropped: PeakEvent;
};

export type MergeResult = {
  events: PeakEvent[];
  conflicts: SlotConflict[];
};

const FALLBACK_SLOTS = [
  { startHour: 6, endHour: 10 },
  { startHour: 16, endHour: 20 }
] as const;

export function sortByStart(events: readonly PeakEvent[]): PeakEvent[] {
  return [...events].sort((a, b) => a.start.toMillis() - b.start.toMillis() || a.end.toMillis() - b.end.toMillis());
}

/**
 * Non-critical placeholder peaks for today and tomorrow, Winter Credits only.
 * The season is checked against `today` alone, so a schedule generated on March 31
 * still includes April 1.
 */
export function generateFallbackSchedule(args: { today: DateTime; rate: RateCode; preheatMinutes: number }): PeakEvent[] {
  const { today, rate, preheatMinutes } = args;
  if (rate !== WINTER_CREDITS_RATE || !isWinterSeason(today)) {
    return [];
  }

  const generated: PeakEvent[] = [];
  for (const dayOffset of [0, 1]) {
    const day = today.startOf("day").plus({ days: dayOffset });
    for (const slot of FALLBACK_SLOTS) {
      generated.push(
        new PeakEvent({
          start: day.set({ hour: slot.startHour }),
          end: day.set({ hour: slot.endHour }),
          criticality: { kind: "generated" },
          rate,
          preheatMinutes
        })
      );
    }
  }
  return generated;
}

function collapseAnnounced(announced: readonly PeakEvent[]): MergeResult {
  const bySlot = new Map<string, PeakEvent>();
  const conflicts: SlotConflict[] = [];

  for (const event of sortByStart(announced)) {
    const kept = bySlot.get(event.slotKey);
    if (!kept) {
      bySlot.set(event.slotKey, event);
      continue;
    }
    if (kept.start.toMillis() === event.start.toMillis() && kept.end.toMillis() === event.end.toMillis()) {
      continue;
    }
    conflicts.push({ slotKey: event.slotKey, kept, dropped: event });
  }

  return { events: [...bySlot.values()], conflicts };
}

// Announcements always displace generated peaks in the same (date, slot); never the reverse.
export function mergePeakSchedules(announced: readonly PeakEvent[], generated: readonly PeakEvent[]): MergeResult {
  const { events: authoritative, conflicts } = collapseAnnounced(announced);
  const covered = new Set(authoritative.map((event) => event.slotKey));

  const merged = [...authoritative];
  for (const event of generated) {
    if (!covered.has(event.slotKey)) {
      merged.push(event);
    }
  }

  return { events: sortByStart(merged), conflicts };
}
