import { DateTime } from "luxon";
import type { CalendarPeakHandler } from "./calendarPeakHandler.js";
import type { CalendarSyncEngine, SyncOutcome } from "./calendarSync.js";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { LoadResult, PeakHandler } from "./peakHandler.js";
import type { PeakView } from "./state.js";
import type { AnnouncementFeed } from "./types.js";

export const DEFAULT_MANUAL_REFRESH_TIMEOUT_MS = 30_000;

export type ContractCoordinatorOptions = {
  contractName: string;
  feed: AnnouncementFeed;
  peakHandler: PeakHandler;
  syncEngine?: CalendarSyncEngine | null;
  calendarPeakHandler?: CalendarPeakHandler | null;
  logger?: Logger;
  clock?: () => DateTime;
};

export type SyncWait = "idle" | "completed" | "timeout";

export type RefreshResult = {
  feedLoaded: boolean;
  syncStarted: boolean;
  syncWait: SyncWait | null;
  calendarLoaded: boolean | null;
};

/**
 * Drives one contract: feed → live peak handler → calendar sync → calendar mirror.
 * At most one sync runs at a time; refreshes never wait on it unless asked to.
 */
export class ContractCoordinator {
  readonly contractName: string;
  private readonly feed: AnnouncementFeed;
  private readonly peakHandler: PeakHandler;
  private readonly syncEngine: CalendarSyncEngine | null;
  private readonly calendarPeakHandler: CalendarPeakHandler | null;
  private readonly logger: Logger;
  private readonly clock: () => DateTime;
  private syncTask: Promise<SyncOutcome | null> | null = null;
  private latestOutcome: SyncOutcome | null = null;

  constructor(options: ContractCoordinatorOptions) {
    this.contractName = options.contractName;
    this.feed = options.feed;
    this.peakHandler = options.peakHandler;
    this.syncEngine = options.syncEngine ?? null;
    this.calendarPeakHandler = options.calendarPeakHandler ?? null;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => DateTime.now().setZone(this.peakHandler.zone));
  }

  get syncInFlight(): boolean {
    return this.syncTask !== null;
  }

  get lastSyncOutcome(): SyncOutcome | null {
    return this.latestOutcome;
  }

  get calendarName(): string | null {
    return this.calendarPeakHandler?.calendarName ?? null;
  }

  async start(): Promise<void> {
    await this.syncEngine?.loadTrackedUids();
  }

  sensorView(): PeakView {
    return this.calendarPeakHandler ? this.calendarPeakHandler.view() : this.peakHandler.view();
  }

  now(): DateTime {
    return this.clock();
  }

  async refresh(): Promise<RefreshResult> {
    const now = this.clock();
    const feedLoaded = (await this.loadAnnouncements(now)) !== null;
    const syncStarted = this.startSync(now);
    const calendarLoaded = await this.loadCalendar(now);
    return { feedLoaded, syncStarted, syncWait: null, calendarLoaded };
  }

  async manualRefresh(timeoutMs = DEFAULT_MANUAL_REFRESH_TIMEOUT_MS): Promise<RefreshResult> {
    this.logger.log(`[Refresh] Manual refresh triggered for ${this.contractName}`);
    const now = this.clock();
    const feedLoaded = (await this.loadAnnouncements(now)) !== null;
    const syncStarted = this.startSync(now);

    const syncWait = await this.waitForSync(timeoutMs);
    if (syncWait === "timeout") {
      this.logger.warn(`[Refresh] Calendar sync still running after ${timeoutMs}ms, proceeding anyway`);
    }

    const calendarLoaded = await this.loadCalendar(now);
    this.logger.log(`[Refresh] Peak data refresh complete for ${this.contractName}`);
    return { feedLoaded, syncStarted, syncWait, calendarLoaded };
  }

  async waitForSync(timeoutMs: number): Promise<SyncWait> {
    const task = this.syncTask;
    if (!task) {
      return "idle";
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<"timeout">((resolveTimeout) => {
      timer = setTimeout(() => resolveTimeout("timeout"), timeoutMs);
    });
    try {
      return await Promise.race([task.then((): SyncWait => "completed"), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async shutdown(): Promise<void> {
    if (this.syncTask) {
      this.logger.logDebug(`[Sync] Waiting for in-flight calendar sync of ${this.contractName}`);
      await this.syncTask;
    }
  }

  private async loadAnnouncements(now: DateTime): Promise<LoadResult | null> {
    try {
      const announcements = await this.feed.fetchAnnouncements(this.peakHandler.rate, now.setZone(this.peakHandler.zone));
      return this.peakHandler.loadAnnouncements(announcements, now);
    } catch (error) {
      this.logger.warn(`[OpenData] Failed to fetch peak announcements for ${this.contractName}: ${errorMessage(error)}`);
      return null;
    }
  }

  private startSync(now: DateTime): boolean {
    const engine = this.syncEngine;
    if (!engine || !engine.isEnabled) {
      return false;
    }
    if (this.syncTask) {
      this.logger.logDebug(`[Sync] Calendar sync already in progress for ${this.contractName}, skipping`);
      return false;
    }

    this.syncTask = engine
      .sync(this.peakHandler.events, now)
      .then((outcome) => {
        this.latestOutcome = outcome;
        return outcome;
      })
      .catch((error: unknown) => {
        this.logger.warn(`[Sync] Calendar sync failed for ${this.contractName}: ${errorMessage(error)}`);
        return null;
      })
      .finally(() => {
        this.syncTask = null;
      });
    return true;
  }

  private async loadCalendar(now: DateTime): Promise<boolean | null> {
    if (!this.calendarPeakHandler) {
      return null;
    }
    const loaded = await this.calendarPeakHandler.loadEvents(now);
    if (loaded) {
      this.logger.logDebug(
        `[Calendar] Loaded ${this.calendarPeakHandler.events.length} events for ${this.contractName} (calendar: ${this.calendarPeakHandler.calendarName ?? "?"})`
      );
    } else {
      this.logger.logDebug(`[Calendar] Keeping previous peak data for ${this.contractName}`);
    }
    return loaded;
  }
}
