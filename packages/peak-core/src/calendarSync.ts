import { Store } from "@tanstack/store";
import type { DateTime } from "luxon";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { buildCalendarEntry } from "./metadata.js";
import { candidateWindow, planCalendarSync, selectSyncCandidates, syncSignature, uidsInCalendar } from "./reconcile.js";
import type { EventSet } from "./schedule.js";
import { isoformat } from "./time.js";
import type { CalendarConfigStore, CalendarPort, CalendarRegistry, Notifier } from "./types.js";
import type { UidStore, ValidationAttemptStore } from "./uidStore.js";

export const DEFAULT_MAX_VALIDATION_ATTEMPTS = 10;
export const DEFAULT_WRITE_DELAY_MS = 100;

export type CalendarSyncOptions = {
  contractId: string;
  contractName: string;
  calendarId: string | null;
  calendar: CalendarPort;
  registry: CalendarRegistry;
  uidStore: UidStore;
  attemptStore?: ValidationAttemptStore;
  notifier: Notifier;
  configStore: CalendarConfigStore;
  logger?: Logger;
  maxValidationAttempts?: number;
  writeDelayMs?: number;
  includeNonCritical?: boolean;
  dryRun?: boolean;
  sleep?: (ms: number) => Promise<void>;
};

export type SyncOutcome =
  | { status: "disabled" }
  | { status: "validation_pending"; attempts: number }
  | { status: "disabled_now"; attempts: number }
  | { status: "unchanged" }
  | { status: "no_candidates" }
  | { status: "query_failed"; message: string }
  | { status: "synced"; created: number; failed: number; skipped: number; tracked: number; dryRun: boolean };

type EngineState = {
  calendarId: string | null;
  validated: boolean;
  validationAttempts: number;
  attemptsRestored: boolean;
  trackedUids: Set<string>;
  lastSignature: string | null;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolveSleep) => setTimeout(resolveSleep, ms));
}

export class CalendarSyncEngine {
  private readonly options: CalendarSyncOptions;
  private readonly logger: Logger;
  private readonly maxValidationAttempts: number;
  private readonly writeDelayMs: number;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly state: Store<EngineState>;

  constructor(options: CalendarSyncOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.maxValidationAttempts = options.maxValidationAttempts ?? DEFAULT_MAX_VALIDATION_ATTEMPTS;
    this.writeDelayMs = options.writeDelayMs ?? DEFAULT_WRITE_DELAY_MS;
    this.wait = options.sleep ?? sleep;
    this.state = new Store<EngineState>({
      calendarId: options.calendarId,
      validated: false,
      validationAttempts: 0,
      attemptsRestored: false,
      trackedUids: new Set(),
      lastSignature: null
    });
  }

  get calendarId(): string | null {
    return this.state.state.calendarId;
  }

  get isEnabled(): boolean {
    return this.state.state.calendarId !== null;
  }

  get validationAttempts(): number {
    return this.state.state.validationAttempts;
  }

  get trackedUids(): ReadonlySet<string> {
    return this.state.state.trackedUids;
  }

  get lastSignature(): string | null {
    return this.state.state.lastSignature;
  }

  async loadTrackedUids(): Promise<void> {
    if (!this.isEnabled) {
      return;
    }
    try {
      const uids = await this.options.uidStore.load();
      this.state.setState((prev) => ({ ...prev, trackedUids: new Set(uids) }));
      this.logger.log(`[Sync] Loaded ${uids.length} persisted calendar event UIDs for ${this.options.contractName}`);
    } catch (error) {
      this.logger.warn(`[Sync] Failed to load calendar UIDs from storage: ${errorMessage(error)}`);
      this.state.setState((prev) => ({ ...prev, trackedUids: new Set() }));
    }
  }

  async sync(events: EventSet, now: DateTime): Promise<SyncOutcome> {
    const calendarId = this.calendarId;
    if (!calendarId) {
      this.logger.logDebug(`[Sync] Calendar sync disabled for ${this.options.contractName}: no calendar configured`);
      return { status: "disabled" };
    }

    if (!this.state.state.validated) {
      const gate = await this.validate(calendarId);
      if (gate) {
        return gate;
      }
    }

    const includeNonCritical = this.options.includeNonCritical ?? false;
    const dryRun = this.options.dryRun ?? false;
    const signature = syncSignature(events, includeNonCritical);
    if (signature === this.state.state.lastSignature) {
      this.logger.logDebug(`[Sync] Peaks to sync unchanged for ${this.options.contractName}, skipping calendar pass`);
      return { status: "unchanged" };
    }

    const candidates = selectSyncCandidates(events, now, includeNonCritical);
    const window = candidateWindow(candidates);
    if (!window) {
      this.logger.logDebug(`[Sync] No future peaks to sync for ${this.options.contractName}`);
      this.state.setState((prev) => ({ ...prev, lastSignature: signature }));
      return { status: "no_candidates" };
    }

    let inCalendar: Set<string>;
    try {
      const entries = await this.options.calendar.listEvents({
        calendarId,
        from: isoformat(window.start),
        to: isoformat(window.end)
      });
      inCalendar = uidsInCalendar(entries);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`[Sync] Failed to query existing calendar events in ${calendarId}: ${message}`);
      return { status: "query_failed", message };
    }

    const stored = this.state.state.trackedUids;
    const existing = new Set([...stored, ...inCalendar]);
    this.logger.logDebug(
      `[Sync] Total tracked UIDs: ${existing.size} (stored: ${stored.size}, found in calendar: ${inCalendar.size})`
    );
    if (existing.size !== stored.size && !dryRun) {
      await this.persist(existing);
    }

    const plan = planCalendarSync({ candidates, contractId: this.options.contractId, existingUids: existing });
    const counters = new Store({ created: 0, failed: 0, skipped: 0 });
    const creates = plan.actions.filter((action) => action.type === "create");

    for (const action of plan.actions) {
      if (action.type === "skip_existing") {
        counters.setState((prev) => ({ ...prev, skipped: prev.skipped + 1 }));
        continue;
      }

      if (dryRun) {
        counters.setState((prev) => ({ ...prev, created: prev.created + 1 }));
        continue;
      }

      const { entry } = buildCalendarEntry({ event: action.event, contractId: this.options.contractId, createdAt: now });
      try {
        await this.options.calendar.createEvent({ calendarId, entry });
        counters.setState((prev) => ({ ...prev, created: prev.created + 1 }));
        this.logger.log(`[Sync] Created calendar event ${action.uid} for ${this.options.contractName}`);
        await this.persist(new Set([...this.state.state.trackedUids, action.uid]));
      } catch (error) {
        counters.setState((prev) => ({ ...prev, failed: prev.failed + 1 }));
        this.logger.warn(`[Sync] Failed to create event ${action.uid}, continuing with others: ${errorMessage(error)}`);
      }

      if (action !== creates[creates.length - 1]) {
        await this.wait(this.writeDelayMs);
      }
    }

    const result = counters.state;
    if (result.failed === 0 && !dryRun) {
      this.state.setState((prev) => ({ ...prev, lastSignature: signature }));
    }

    this.logger.log(
      `[Sync] Calendar sync complete for ${this.options.contractName}: created=${result.created} failed=${result.failed} skipped=${result.skipped} tracked=${this.trackedUids.size} dryRun=${dryRun}`
    );
    return { status: "synced", ...result, tracked: this.trackedUids.size, dryRun };
  }

  private async validate(calendarId: string): Promise<SyncOutcome | null> {
    const dryRun = this.options.dryRun ?? false;
    await this.restoreValidationAttempts();

    if (await this.calendarExists(calendarId)) {
      const previousAttempts = this.state.state.validationAttempts;
      this.state.setState((prev) => ({ ...prev, validated: true, validationAttempts: 0 }));
      if (previousAttempts > 0 && !dryRun) {
        await this.recordValidationAttempts(0);
      }
      this.logger.log(`[Sync] Calendar ${calendarId} validated for ${this.options.contractName}`);
      return null;
    }

    const attempts = this.state.state.validationAttempts + 1;
    this.state.setState((prev) => ({ ...prev, validationAttempts: attempts }));
    if (attempts >= this.maxValidationAttempts) {
      if (dryRun) {
        this.logger.warn(
          `[Sync] Calendar ${calendarId} failed validation after ${attempts} attempts. Dry run: leaving the configuration of ${this.options.contractName} untouched.`
        );
        this.state.setState((prev) => ({ ...prev, calendarId: null }));
      } else {
        await this.disablePermanently(calendarId, attempts);
      }
      return { status: "disabled_now", attempts };
    }
    if (!dryRun) {
      await this.recordValidationAttempts(attempts);
    }

    this.logger.warn(
      `[Sync] Calendar ${calendarId} validation failed (attempt ${attempts}/${this.maxValidationAttempts}) for ${this.options.contractName}. Will retry...`
    );
    return { status: "validation_pending", attempts };
  }

  private async restoreValidationAttempts(): Promise<void> {
    const store = this.options.attemptStore;
    if (!store || this.state.state.attemptsRestored) {
      return;
    }
    this.state.setState((prev) => ({ ...prev, attemptsRestored: true }));
    try {
      const stored = await store.load();
      this.state.setState((prev) => ({ ...prev, validationAttempts: Math.max(prev.validationAttempts, stored) }));
    } catch (error) {
      this.logger.warn(`[Sync] Failed to load calendar validation attempts: ${errorMessage(error)}`);
    }
  }

  private async recordValidationAttempts(attempts: number): Promise<void> {
    try {
      await this.options.attemptStore?.save(attempts);
    } catch (error) {
      this.logger.error(`[Sync] Failed to save calendar validation attempts: ${errorMessage(error)}`);
    }
  }

  private async calendarExists(calendarId: string): Promise<boolean> {
    try {
      if (!(await this.options.registry.serviceReady())) {
        this.logger.logDebug("[Sync] Calendar service not ready");
        return false;
      }
      const found = await this.options.registry.findCalendar(calendarId);
      if (!found) {
        this.logger.logDebug(`[Sync] Calendar ${calendarId} not found`);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.logDebug(`[Sync] Calendar lookup failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async disablePermanently(calendarId: string, attempts: number): Promise<void> {
    const { contractId, contractName } = this.options;
    this.logger.error(
      `[Sync] Calendar ${calendarId} failed validation after ${attempts} attempts. Disabling calendar sync for ${contractName}.`
    );
    this.state.setState((prev) => ({ ...prev, calendarId: null, trackedUids: new Set(), lastSignature: null }));

    const steps: Array<[string, () => Promise<void>]> = [
      ["clear calendar configuration", () => this.options.configStore.clearCalendar(contractId)],
      ["clear stored calendar UIDs", () => this.options.uidStore.clear()],
      ["reset validation attempts", () => this.options.attemptStore?.save(0) ?? Promise.resolve()],
      [
        "post notification",
        () =>
          this.options.notifier.notify({
            notificationId: `hydroqc_calendar_missing_${contractId}`,
            title: "Hydro-Québec - Calendrier introuvable",
            message:
              `Le calendrier ${calendarId} est introuvable après plusieurs tentatives. ` +
              `La synchronisation des événements de pointe a été désactivée pour ${contractName}. ` +
              "Vérifiez que le calendrier existe et reconfigurez-le dans les options."
          })
      ]
    ];
    for (const [label, step] of steps) {
      try {
        await step();
      } catch (error) {
        this.logger.error(`[Sync] Failed to ${label} for ${contractName}: ${errorMessage(error)}`);
      }
    }
  }

  private async persist(uids: Set<string>): Promise<void> {
    this.state.setState((prev) => ({ ...prev, trackedUids: uids }));
    try {
      await this.options.uidStore.save([...uids]);
      this.logger.logDebug(`[Sync] Saved ${uids.size} calendar event UIDs to storage`);
    } catch (error) {
      this.logger.error(`[Sync] Failed to save calendar UIDs to storage: ${errorMessage(error)}`);
    }
  }
}
