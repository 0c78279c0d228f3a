import type { DateTime } from "luxon";
import type { PeakEvent } from "./peakEvent.js";
import { isoformat } from "./time.js";
import { isRateCode, type NewCalendarEntry, type RateCode } from "./types.js";

export const UID_PREFIX = "hydroqc_";
export const UID_MARKER = `ID: ${UID_PREFIX}`;
export const CRITICAL_MARKER = "Critique: Oui";

export const TITLE_CRITICAL = "🔴 Pointe critique";
export const TITLE_REGULAR = "⚪ Pointe régulière";

export type PeakMarker = {
  uid: string;
  isCritical: boolean;
  rate: RateCode | null;
};

export function generateEventUid(contractId: string, start: DateTime): string {
  return `${UID_PREFIX}${contractId}_${isoformat(start)}`;
}

export function encodePeakDescription(args: { event: PeakEvent; uid: string; createdAt: DateTime }): string {
  const { event, uid, createdAt } = args;
  return [
    "Réduisez votre consommation d'électricité pendant cette période.",
    "",
    `Début: ${event.start.toFormat("HH:mm")}`,
    `Fin: ${event.end.toFormat("HH:mm")}`,
    "",
    "--- Métadonnées ---",
    `Ajouté le: ${createdAt.toFormat("yyyy-MM-dd HH:mm:ss ZZZZ")}`,
    `Tarif: ${event.rate}`,
    `Critique: ${event.isCritical ? "Oui" : "Non"}`,
    `ID: ${uid}`
  ].join("\n");
}

export function buildCalendarEntry(args: { event: PeakEvent; contractId: string; createdAt: DateTime }): {
  uid: string;
  entry: NewCalendarEntry;
} {
  const { event, contractId, createdAt } = args;
  const uid = generateEventUid(contractId, event.start);
  return {
    uid,
    entry: {
      summary: event.isCritical ? TITLE_CRITICAL : TITLE_REGULAR,
      description: encodePeakDescription({ event, uid, createdAt }),
      location: `Hydro-Québec ${event.rate}`,
      start: isoformat(event.start),
      end: isoformat(event.end)
    }
  };
}

export function extractEventUid(description?: string): string | null {
  if (!description) {
    return null;
  }
  const index = description.indexOf(UID_MARKER);
  if (index < 0) {
    return null;
  }

  const line = description.slice(index).split("\n")[0] ?? "";
  const uid = line.slice("ID: ".length).trim();
  return uid.startsWith(UID_PREFIX) && uid.length > UID_PREFIX.length ? uid : null;
}

export function decodePeakMarker(description?: string): PeakMarker | null {
  const uid = extractEventUid(description);
  if (!uid || !description) {
    return null;
  }

  const rateMatch = /Tarif:\s*([A-Z][A-Z-]*)/.exec(description);
  const rateText = rateMatch?.[1];
  return {
    uid,
    isCritical: description.includes(CRITICAL_MARKER),
    rate: rateText && isRateCode(rateText) ? rateText : null
  };
}
