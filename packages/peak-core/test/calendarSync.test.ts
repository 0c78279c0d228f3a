import { describe, expect, it, vi } from "vitest";
import {
  CalendarSyncEngine,
  MemoryUidStore,
  MemoryValidationAttemptStore,
  PeakHandler,
  generateEventUid,
  planCalendarSync,
  syncSignature,
  type CalendarConfigStore,
  type EventSet,
  type ValidationAttemptStore
} from "../src/index.js";
import { FakeCalendar, RecordingConfigStore, RecordingNotifier, announcement, at } from "./helpers.js";

const EVENING_UID = "hydroqc_c1_2025-12-15T16:00:00-05:00";
const MORNING_UID = "hydroqc_c1_2025-12-16T06:00:00-05:00";

function schedule(): EventSet {
  const handler = new PeakHandler({ rate: "DCPC" });
  handler.loadAnnouncements(
    [
      announcement("2025-12-15T16:00:00-05:00", "2025-12-15T20:00:00-05:00"),
      announcement("2025-12-16T06:00:00-05:00", "2025-12-16T09:00:00-05:00")
    ],
    at("2025-12-15T09:00")
  );
  return handler.events;
}

function setup(
  options: {
    calendar?: FakeCalendar;
    uidStore?: MemoryUidStore;
    attemptStore?: ValidationAttemptStore;
    configStore?: CalendarConfigStore;
    calendarId?: string | null;
    maxValidationAttempts?: number;
    includeNonCritical?: boolean;
    dryRun?: boolean;
  } = {}
) {
  const calendar = options.calendar ?? new FakeCalendar();
  const uidStore = options.uidStore ?? new MemoryUidStore();
  const notifier = new RecordingNotifier();
  const configStore = options.configStore ?? new RecordingConfigStore();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const engine = new CalendarSyncEngine({
    contractId: "c1",
    contractName: "Home",
    calendarId: options.calendarId === undefined ? "calendar.peaks" : options.calendarId,
    calendar,
    registry: calendar,
    uidStore,
    attemptStore: options.attemptStore,
    notifier,
    configStore,
    sleep,
    maxValidationAttempts: options.maxValidationAttempts,
    includeNonCritical: options.includeNonCritical,
    dryRun: options.dryRun
  });
  return { engine, calendar, uidStore, notifier, configStore, sleep };
}

describe("CalendarSyncEngine", () => {
  const now = at("2025-12-15T09:00");

  it("creates each upcoming critical peak once", async () => {
    const { engine, calendar, uidStore, sleep } = setup();

    const first = await engine.sync(schedule(), now);
    expect(first).toEqual({ status: "synced", created: 2, failed: 0, skipped: 0, tracked: 2, dryRun: false });
    expect(calendar.created.map((entry) => entry.start)).toEqual(["2025-12-15T16:00:00-05:00", "2025-12-16T06:00:00-05:00"]);
    expect(await uidStore.load()).toEqual([EVENING_UID, MORNING_UID]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(100);

    const second = await engine.sync(schedule(), now);
    expect(second).toEqual({ status: "unchanged" });
    expect(calendar.created).toHaveLength(2);
    expect(calendar.listCalls).toBe(1);
  });

  it("adopts entries already present in the calendar", async () => {
    const calendar = new FakeCalendar();
    await setup({ calendar }).engine.sync(schedule(), now);

    const { engine, uidStore } = setup({ calendar });
    const outcome = await engine.sync(schedule(), now);
    expect(outcome).toEqual({ status: "synced", created: 0, failed: 0, skipped: 2, tracked: 2, dryRun: false });
    expect(calendar.created).toHaveLength(2);
    expect(await uidStore.load()).toEqual([EVENING_UID, MORNING_UID]);
  });

  it("does not recreate entries it remembers writing", async () => {
    const uidStore = new MemoryUidStore([EVENING_UID, MORNING_UID]);
    const { engine, calendar } = setup({ uidStore });
    await engine.loadTrackedUids();

    const outcome = await engine.sync(schedule(), now);
    expect(outcome).toEqual({ status: "synced", created: 0, failed: 0, skipped: 2, tracked: 2, dryRun: false });
    expect(calendar.created).toEqual([]);
  });

  it("continues past a failed write and retries it on the next pass", async () => {
    const { engine, calendar, uidStore } = setup();
    calendar.failCreateStarts.add("2025-12-15T16:00:00-05:00");

    const first = await engine.sync(schedule(), now);
    expect(first).toEqual({ status: "synced", created: 1, failed: 1, skipped: 0, tracked: 1, dryRun: false });
    expect(await uidStore.load()).toEqual([MORNING_UID]);
    expect(engine.lastSignature).toBeNull();

    calendar.failCreateStarts.clear();
    const second = await engine.sync(schedule(), now);
    expect(second).toEqual({ status: "synced", created: 1, failed: 0, skipped: 1, tracked: 2, dryRun: false });
    expect(calendar.created.map((entry) => entry.start)).toEqual(["2025-12-16T06:00:00-05:00", "2025-12-15T16:00:00-05:00"]);
  });

  it("skips the pass when the calendar cannot be queried", async () => {
    const { engine, calendar } = setup();
    calendar.failList = true;

    expect(await engine.sync(schedule(), now)).toEqual({ status: "query_failed", message: "calendar unavailable" });
    expect(calendar.created).toEqual([]);

    calendar.failList = false;
    expect(await engine.sync(schedule(), now)).toMatchObject({ status: "synced", created: 2 });
  });

  it("ignores peaks that are over", async () => {
    const { engine, calendar } = setup();
    await engine.sync(schedule(), at("2025-12-15T21:00"));
    expect(calendar.created.map((entry) => entry.start)).toEqual(["2025-12-16T06:00:00-05:00"]);
  });

  it("writes generated peaks when asked to", async () => {
    const { engine, calendar } = setup({ includeNonCritical: true });
    const outcome = await engine.sync(schedule(), now);
    expect(outcome).toMatchObject({ status: "synced", created: 4 });
    expect(calendar.created.map((entry) => entry.summary)).toEqual([
      "⚪ Pointe régulière",
      "🔴 Pointe critique",
      "🔴 Pointe critique",
      "⚪ Pointe régulière"
    ]);
  });

  it("writes the generated peaks of each new day", async () => {
    const calendar = new FakeCalendar();
    const uidStore = new MemoryUidStore();
    const { engine } = setup({ calendar, uidStore, includeNonCritical: true });
    const handler = new PeakHandler({ rate: "DCPC" });
    const announced = [announcement("2025-12-16T16:00:00-05:00", "2025-12-16T20:00:00-05:00")];

    handler.loadAnnouncements(announced, now);
    expect(await engine.sync(handler.events, now)).toMatchObject({ status: "synced", created: 4 });

    const nextDay = at("2025-12-16T09:00");
    handler.loadAnnouncements(announced, nextDay);
    const outcome = await engine.sync(handler.events, nextDay);
    expect(outcome).toEqual({ status: "synced", created: 2, failed: 0, skipped: 2, tracked: 6, dryRun: false });
    expect(calendar.created.map((entry) => entry.start)).toEqual([
      "2025-12-15T06:00:00-05:00",
      "2025-12-15T16:00:00-05:00",
      "2025-12-16T06:00:00-05:00",
      "2025-12-16T16:00:00-05:00",
      "2025-12-17T06:00:00-05:00",
      "2025-12-17T16:00:00-05:00"
    ]);
  });

  it("reports no candidates when nothing critical is upcoming", async () => {
    const handler = new PeakHandler({ rate: "DCPC" });
    handler.loadAnnouncements([], now);
    const { engine, calendar } = setup();

    expect(await engine.sync(handler.events, now)).toEqual({ status: "no_candidates" });
    expect(calendar.listCalls).toBe(0);
  });

  it("plans without writing in dry-run mode", async () => {
    const { engine, calendar, uidStore } = setup({ dryRun: true });
    const outcome = await engine.sync(schedule(), now);
    expect(outcome).toEqual({ status: "synced", created: 2, failed: 0, skipped: 0, tracked: 0, dryRun: true });
    expect(calendar.created).toEqual([]);
    expect(uidStore.saves).toBe(0);
    expect(engine.lastSignature).toBeNull();
  });

  it("leaves stored uids alone in dry-run mode", async () => {
    const calendar = new FakeCalendar();
    await setup({ calendar }).engine.sync(schedule(), now);

    const { engine, uidStore } = setup({ calendar, dryRun: true });
    const outcome = await engine.sync(schedule(), now);
    expect(outcome).toEqual({ status: "synced", created: 0, failed: 0, skipped: 2, tracked: 0, dryRun: true });
    expect(uidStore.saves).toBe(0);
    expect(calendar.created).toHaveLength(2);
  });

  it("does nothing without a calendar", async () => {
    const { engine, calendar } = setup({ calendarId: null });
    expect(await engine.sync(schedule(), now)).toEqual({ status: "disabled" });
    expect(calendar.findCalls).toBe(0);
  });
});

describe("calendar validation", () => {
  const now = at("2025-12-15T09:00");

  it("disables sync after repeated validation failures", async () => {
    const calendar = new FakeCalendar();
    calendar.calendars = [];
    const uidStore = new MemoryUidStore(["hydroqc_c1_old"]);
    const { engine, notifier, configStore } = setup({ calendar, uidStore, maxValidationAttempts: 3 });

    expect(await engine.sync(schedule(), now)).toEqual({ status: "validation_pending", attempts: 1 });
    expect(await engine.sync(schedule(), now)).toEqual({ status: "validation_pending", attempts: 2 });
    expect(await engine.sync(schedule(), now)).toEqual({ status: "disabled_now", attempts: 3 });
    expect(await engine.sync(schedule(), now)).toEqual({ status: "disabled" });
    expect(await engine.sync(schedule(), now)).toEqual({ status: "disabled" });

    expect(engine.isEnabled).toBe(false);
    expect(calendar.findCalls).toBe(3);
    expect(calendar.listCalls).toBe(0);
    expect(configStore).toEqual(expect.objectContaining({ cleared: ["c1"] }));
    expect(notifier.notifications.map((notification) => notification.notificationId)).toEqual([
      "hydroqc_calendar_missing_c1"
    ]);
    expect(await uidStore.load()).toEqual([]);
  });

  it("still notifies when clearing the configuration fails", async () => {
    const calendar = new FakeCalendar();
    calendar.calendars = [];
    const configStore: CalendarConfigStore = {
      clearCalendar: async () => {
        throw new Error("read-only config");
      }
    };
    const { engine, notifier } = setup({ calendar, configStore, maxValidationAttempts: 1 });

    expect(await engine.sync(schedule(), now)).toEqual({ status: "disabled_now", attempts: 1 });
    expect(notifier.notifications).toHaveLength(1);
  });

  it("reports a disablement without applying it in dry-run mode", async () => {
    const calendar = new FakeCalendar();
    calendar.calendars = [];
    const uidStore = new MemoryUidStore(["hydroqc_c1_old"]);
    const attemptStore = new MemoryValidationAttemptStore();
    const { engine, notifier, configStore } = setup({
      calendar,
      uidStore,
      attemptStore,
      maxValidationAttempts: 1,
      dryRun: true
    });

    expect(await engine.sync(schedule(), now)).toEqual({ status: "disabled_now", attempts: 1 });
    expect(await engine.sync(schedule(), now)).toEqual({ status: "disabled" });
    expect(configStore).toEqual(expect.objectContaining({ cleared: [] }));
    expect(notifier.notifications).toEqual([]);
    expect(await uidStore.load()).toEqual(["hydroqc_c1_old"]);
    expect(attemptStore.attempts).toBe(0);
  });

  it("carries failed validations across runs", async () => {
    const calendar = new FakeCalendar();
    calendar.calendars = [];
    const attemptStore = new MemoryValidationAttemptStore();

    const first = setup({ calendar, attemptStore, maxValidationAttempts: 2 });
    expect(await first.engine.sync(schedule(), now)).toEqual({ status: "validation_pending", attempts: 1 });
    expect(attemptStore.attempts).toBe(1);

    const second = setup({ calendar, attemptStore, maxValidationAttempts: 2 });
    expect(await second.engine.sync(schedule(), now)).toEqual({ status: "disabled_now", attempts: 2 });
    expect(second.configStore).toEqual(expect.objectContaining({ cleared: ["c1"] }));
    expect(second.notifier.notifications).toHaveLength(1);
    expect(attemptStore.attempts).toBe(0);
  });

  it("forgets failed validations once the calendar is found", async () => {
    const attemptStore = new MemoryValidationAttemptStore(4);
    const { engine } = setup({ attemptStore });

    expect(await engine.sync(schedule(), now)).toMatchObject({ status: "synced", created: 2 });
    expect(attemptStore.attempts).toBe(0);
    expect(engine.validationAttempts).toBe(0);
  });

  it("counts an unready calendar service as a failed attempt", async () => {
    const { engine, calendar } = setup();
    calendar.ready = false;

    expect(await engine.sync(schedule(), now)).toEqual({ status: "validation_pending", attempts: 1 });
    expect(calendar.findCalls).toBe(0);
  });

  it("proceeds once the calendar appears", async () => {
    const calendar = new FakeCalendar();
    const { calendars } = calendar;
    calendar.calendars = [];
    const { engine } = setup({ calendar });

    expect(await engine.sync(schedule(), now)).toEqual({ status: "validation_pending", attempts: 1 });
    calendar.calendars = calendars;
    expect(await engine.sync(schedule(), now)).toMatchObject({ status: "synced", created: 2 });
    expect(calendar.findCalls).toBe(2);
  });
});

describe("sync planning", () => {
  it("signs the critical schedule regardless of order", () => {
    const events = schedule();
    expect(syncSignature([...events].reverse())).toBe(syncSignature(events));
    expect(syncSignature(events.filter((event) => event.isCritical))).toBe(syncSignature(events));
    expect(syncSignature(events.slice(0, 2))).not.toBe(syncSignature(events));
  });

  it("signs generated peaks when they are synced too", () => {
    const events = schedule();
    const critical = events.filter((event) => event.isCritical);
    expect(syncSignature(critical, true)).toBe(syncSignature(events));
    expect(syncSignature(events, true)).not.toBe(syncSignature(events));
  });

  it("plans one write per uid", () => {
    const critical = schedule().filter((event) => event.isCritical);
    const [evening] = critical;
    if (!evening) {
      throw new Error("expected an evening peak");
    }

    const plan = planCalendarSync({
      candidates: [evening, evening, ...critical.slice(1)],
      contractId: "c1",
      existingUids: new Set([generateEventUid("c1", at("2025-12-16T06:00"))])
    });
    expect(plan.actions.map((action) => [action.type, action.uid])).toEqual([
      ["create", EVENING_UID],
      ["skip_existing", EVENING_UID],
      ["skip_existing", MORNING_UID]
    ]);
    expect(plan.candidateCount).toBe(3);
    expect(plan.pendingCount).toBe(1);
  });
});
