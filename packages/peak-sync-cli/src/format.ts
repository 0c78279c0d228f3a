import type { AnchorWindow, PeakEvent, PeakStateReport, SyncOutcome } from "@peak-sync/core";
import type { DateTime } from "luxon";

export function formatInstant(value: DateTime | null): string {
  return value ? value.toFormat("yyyy-MM-dd HH:mm") : "-";
}

function formatPeak(peak: PeakEvent | null): string {
  if (!peak) {
    return "-";
  }
  return `${formatInstant(peak.start)}-${peak.end.toFormat("HH:mm")}${peak.isCritical ? " (critical)" : ""}`;
}

function formatAnchor(anchor: AnchorWindow | null): string {
  if (!anchor) {
    return "-";
  }
  return `${formatInstant(anchor.start)}-${anchor.end.toFormat("HH:mm")}${anchor.isCritical ? " (critical)" : ""}`;
}

export function formatPeakReport(name: string, report: PeakStateReport): string[] {
  return [
    `${name}: state=${report.state}`,
    `  current: ${formatPeak(report.currentPeak)}`,
    `  next: ${formatPeak(report.nextPeak)}`,
    `  next critical: ${formatPeak(report.nextCriticalPeak)}`,
    `  preheat: ${report.preheatInProgress ? "on" : "off"} (next start ${formatInstant(report.nextPreheatStart)})`,
    `  anchor: ${formatAnchor(report.nextAnchor)}`,
    `  today: AM ${formatPeak(report.todayMorningPeak)} | PM ${formatPeak(report.todayEveningPeak)}`,
    `  tomorrow: AM ${formatPeak(report.tomorrowMorningPeak)} | PM ${formatPeak(report.tomorrowEveningPeak)}`
  ];
}

export function formatSyncOutcome(name: string, outcome: SyncOutcome): string {
  switch (outcome.status) {
    case "disabled":
      return `${name}: calendar sync disabled`;
    case "validation_pending":
      return `${name}: calendar not found (attempt ${outcome.attempts}), will retry`;
    case "disabled_now":
      return `${name}: calendar sync disabled after ${outcome.attempts} failed validations`;
    case "unchanged":
      return `${name}: critical peaks unchanged`;
    case "no_candidates":
      return `${name}: no upcoming peaks to sync`;
    case "query_failed":
      return `${name}: calendar query failed: ${outcome.message}`;
    case "synced":
      return `${name}: create=${outcome.created} failed=${outcome.failed} skip=${outcome.skipped} tracked=${outcome.tracked} dryRun=${outcome.dryRun}`;
  }
}
