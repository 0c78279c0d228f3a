import { createHash } from "node:crypto";
import { Store } from "@tanstack/store";
import type { DateTime } from "luxon";
import { extractEventUid, generateEventUid } from "./metadata.js";
import type { PeakEvent } from "./peakEvent.js";
import { sortByStart, type EventSet } from "./schedule.js";
import { isoformat } from "./time.js";
import type { CalendarEntry, TimeWindow } from "./types.js";

export type SyncAction =
  | { type: "create"; uid: string; event: PeakEvent }
  | { type: "skip_existing"; uid: string; event: PeakEvent };

export type SyncPlan = {
  actions: SyncAction[];
  candidateCount: number;
  pendingCount: number;
};

// Covers every event a pass would write, so new generated peaks change it when they are synced too.
export function syncSignature(events: EventSet, includeNonCritical = false): string {
  const pairs = sortByStart(events.filter((event) => includeNonCritical || event.isCritical)).map(
    (event) => `${isoformat(event.start)}|${isoformat(event.end)}`
  );
  return createHash("sha256").update(pairs.join("\n")).digest("hex");
}

export function selectSyncCandidates(events: EventSet, now: DateTime, includeNonCritical: boolean): PeakEvent[] {
  return events.filter((event) => (includeNonCritical || event.isCritical) && event.end.toMillis() > now.toMillis());
}

export function candidateWindow(candidates: readonly PeakEvent[]): TimeWindow | null {
  const [first, ...rest] = candidates;
  if (!first) {
    return null;
  }

  let start = first.start;
  let end = first.end;
  for (const event of rest) {
    if (event.start.toMillis() < start.toMillis()) {
      start = event.start;
    }
    if (event.end.toMillis() > end.toMillis()) {
      end = event.end;
    }
  }
  return { start, end };
}

export function uidsInCalendar(entries: CalendarEntry[]): Set<string> {
  const found = new Set<string>();
  for (const entry of entries) {
    const uid = extractEventUid(entry.description);
    if (uid) {
      found.add(uid);
    }
  }
  return found;
}

export function planCalendarSync(args: {
  candidates: readonly PeakEvent[];
  contractId: string;
  existingUids: ReadonlySet<string>;
}): SyncPlan {
  const { candidates, contractId, existingUids } = args;

  const state = new Store<{ actions: SyncAction[]; planned: Set<string> }>({
    actions: [],
    planned: new Set()
  });

  for (const event of sortByStart(candidates)) {
    const uid = generateEventUid(contractId, event.start);
    if (existingUids.has(uid) || state.state.planned.has(uid)) {
      state.setState((prev) => ({
        ...prev,
        actions: [...prev.actions, { type: "skip_existing", uid, event }]
      }));
      continue;
    }
    state.setState((prev) => ({
      actions: [...prev.actions, { type: "create", uid, event }],
      planned: new Set([...prev.planned, uid])
    }));
  }

  return {
    actions: state.state.actions,
    candidateCount: candidates.length,
    pendingCount: state.state.actions.filter((action) => action.type === "create").length
  };
}
