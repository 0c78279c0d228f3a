import { describe, expect, it } from "vitest";
import { PeakEvent, PeakSyncError, isoformat, parseInstant, peakEventFromAnnouncement } from "../src/index.js";
import { ZONE, announcement, at } from "./helpers.js";

function peak(start: string, end: string, critical = true): PeakEvent {
  return new PeakEvent({
    start: at(start),
    end: at(end),
    criticality: critical ? { kind: "announced" } : { kind: "generated" },
    rate: "DCPC"
  });
}

describe("PeakEvent", () => {
  it("derives the time slot from the start hour", () => {
    expect(peak("2025-12-15T06:00", "2025-12-15T10:00").timeSlot).toBe("AM");
    expect(peak("2025-12-15T11:59", "2025-12-15T13:00").timeSlot).toBe("AM");
    expect(peak("2025-12-15T12:00", "2025-12-15T14:00").timeSlot).toBe("PM");
    expect(peak("2025-12-15T16:00", "2025-12-15T20:00").slotKey).toBe("2025-12-15|PM");
  });

  it("computes the preheat window from the configured duration", () => {
    const event = new PeakEvent({
      start: at("2025-12-15T16:00"),
      end: at("2025-12-15T20:00"),
      criticality: { kind: "announced" },
      rate: "DCPC",
      preheatMinutes: 90
    });
    expect(event.preheatWindow.start.toFormat("HH:mm")).toBe("14:30");
    expect(event.preheatWindow.end.toFormat("HH:mm")).toBe("16:00");
    expect(peak("2025-12-15T16:00", "2025-12-15T20:00").preheatWindow.start.toFormat("HH:mm")).toBe("14:00");
  });

  it("anchors morning and evening peaks with different lead times", () => {
    const morning = peak("2025-12-15T06:00", "2025-12-15T10:00").anchorWindow;
    expect(morning.start.toFormat("yyyy-MM-dd HH:mm")).toBe("2025-12-15 01:00");
    expect(morning.end.toFormat("yyyy-MM-dd HH:mm")).toBe("2025-12-15 04:00");
    expect(morning.isCritical).toBe(true);

    const evening = peak("2025-12-15T16:00", "2025-12-15T20:00", false).anchorWindow;
    expect(evening.start.toFormat("HH:mm")).toBe("12:00");
    expect(evening.end.toFormat("HH:mm")).toBe("14:00");
    expect(evening.isCritical).toBe(false);
  });

  it("rejects peaks that do not end after they start", () => {
    expect(() => peak("2025-12-15T16:00", "2025-12-15T16:00")).toThrow(PeakSyncError);
    expect(() => peak("2025-12-15T16:00", "2025-12-15T15:00")).toThrow(/must end after it starts/);
  });

  it("rejects a negative preheat duration", () => {
    expect(
      () =>
        new PeakEvent({
          start: at("2025-12-15T16:00"),
          end: at("2025-12-15T20:00"),
          criticality: { kind: "announced" },
          rate: "DCPC",
          preheatMinutes: -5
        })
    ).toThrow(/Invalid preheat duration/);
  });

  it("derives legacy criticality from the offer code", () => {
    const legacy = (offerCode: string) =>
      new PeakEvent({
        start: at("2025-12-15T16:00"),
        end: at("2025-12-15T20:00"),
        criticality: { kind: "legacy", offerCode },
        rate: "DPC"
      }).isCritical;

    expect(legacy("TPC-DPC")).toBe(true);
    expect(legacy("ENG01")).toBe(true);
    expect(legacy("CPC-D")).toBe(false);
  });
});

describe("announcement parsing", () => {
  it("reads naive timestamps in the configured zone", () => {
    expect(isoformat(parseInstant("2025-12-15 16:00", ZONE))).toBe("2025-12-15T16:00:00-05:00");
    expect(isoformat(parseInstant("2025-12-15T16:00:00", ZONE))).toBe("2025-12-15T16:00:00-05:00");
  });

  it("converts offset timestamps to the configured zone", () => {
    expect(isoformat(parseInstant("2025-12-15T21:00:00Z", ZONE))).toBe("2025-12-15T16:00:00-05:00");
    expect(isoformat(parseInstant("2025-07-15T10:00:00Z", ZONE))).toBe("2025-07-15T06:00:00-04:00");
  });

  it("throws on values that are not dates", () => {
    expect(() => parseInstant("tomorrow evening", ZONE)).toThrow(/Invalid date value/);
  });

  it("builds critical events from announcements", () => {
    const event = peakEventFromAnnouncement(announcement("2025-12-15T16:00:00-05:00", "2025-12-15T20:00:00-05:00"), {
      rate: "DCPC",
      zone: ZONE,
      preheatMinutes: 120
    });
    expect(event.isCritical).toBe(true);
    expect(event.offerCode).toBe("CPC-D");
    expect(event.sector).toBe("Résidentiel");
    expect(isoformat(event.end)).toBe("2025-12-15T20:00:00-05:00");
  });
});
