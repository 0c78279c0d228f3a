import {
  CalendarPeakHandler,
  CalendarSyncEngine,
  ContractCoordinator,
  PeakHandler,
  type Logger
} from "@peak-sync/core";
import type { DateTime } from "luxon";
import { ConfigFileCalendarStore, type Config, type ContractConfig, type Settings } from "./config.js";
import { FileUidStore, FileValidationAttemptStore } from "./fileUidStore.js";
import { GogCalendar, GogClient } from "./gogClient.js";
import { createConsoleLogger } from "./logger.js";
import { FileNotifier } from "./notifier.js";
import { OpenDataFeed, type FetchLike } from "./openDataFeed.js";

export type ContractRuntime = {
  contract: ContractConfig;
  logger: Logger;
  feed: OpenDataFeed;
  peakHandler: PeakHandler;
  syncEngine: CalendarSyncEngine | null;
  calendarPeakHandler: CalendarPeakHandler | null;
  notifier: FileNotifier;
  coordinator: ContractCoordinator;
};

export function buildContractRuntime(args: {
  config: Config;
  configPath: string;
  settings: Settings;
  contract: ContractConfig;
  verbose?: boolean;
  dryRun?: boolean;
  logger?: Logger;
  gog?: GogClient;
  fetch?: FetchLike;
  clock?: () => DateTime;
}): ContractRuntime {
  const { config, configPath, settings, contract } = args;
  const logger = args.logger ?? createConsoleLogger({ verbose: args.verbose, prefix: contract.name });

  const feed = new OpenDataFeed({
    baseUrl: settings.feedBaseUrl,
    limit: settings.feedLimit,
    zone: settings.timeZone,
    fetch: args.fetch,
    logger
  });
  const peakHandler = new PeakHandler({
    rate: contract.rate,
    preheatMinutes: contract.preheatMinutes,
    zone: settings.timeZone,
    logger
  });
  const notifier = new FileNotifier({ stateDir: settings.stateDir, logger });

  let syncEngine: CalendarSyncEngine | null = null;
  let calendarPeakHandler: CalendarPeakHandler | null = null;
  if (contract.calendar) {
    const calendar = new GogCalendar(args.gog ?? new GogClient(config), contract.calendar.account);
    syncEngine = new CalendarSyncEngine({
      contractId: contract.contractId,
      contractName: contract.name,
      calendarId: contract.calendar.calendarId,
      calendar,
      registry: calendar,
      uidStore: new FileUidStore({ stateDir: settings.stateDir, contractId: contract.contractId, logger }),
      attemptStore: new FileValidationAttemptStore({ stateDir: settings.stateDir, contractId: contract.contractId, logger }),
      notifier,
      configStore: new ConfigFileCalendarStore(configPath),
      logger,
      maxValidationAttempts: settings.maxValidationAttempts,
      writeDelayMs: settings.writeDelayMs,
      includeNonCritical: settings.includeNonCritical,
      dryRun: args.dryRun
    });
    calendarPeakHandler = new CalendarPeakHandler({
      calendar,
      registry: calendar,
      calendarId: contract.calendar.calendarId,
      rate: contract.rate,
      preheatMinutes: contract.preheatMinutes,
      zone: settings.timeZone,
      logger
    });
  }

  const coordinator = new ContractCoordinator({
    contractName: contract.name,
    feed,
    peakHandler,
    syncEngine,
    calendarPeakHandler,
    logger,
    clock: args.clock
  });

  return { contract, logger, feed, peakHandler, syncEngine, calendarPeakHandler, notifier, coordinator };
}
