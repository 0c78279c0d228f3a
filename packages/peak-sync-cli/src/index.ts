#!/usr/bin/env tsx
import { resolve } from "node:path";
import { Command } from "commander";
import { DateTime } from "luxon";
import { PeakSyncError, describePeakState, errorMessage, parseInstant } from "@peak-sync/core";
import {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  resolveSettings,
  selectContracts,
  validateConfig,
  type Config,
  type Settings
} from "./config.js";
import { formatPeakReport, formatSyncOutcome } from "./format.js";
import { buildContractRuntime, type ContractRuntime } from "./runtime.js";

type GlobalOptions = { config: string; verbose: boolean };
type SelectOptions = { contract?: string; all: boolean };

function sleep(ms: number): Promise<void> {
  return new Promise((resolveSleep) => setTimeout(resolveSleep, ms));
}

function loadValidatedConfig(path: string): Config {
  const config = loadConfig(path);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new PeakSyncError("CONFIG_INVALID", `Config invalid:\n${errors.join("\n")}`);
  }
  return config;
}

function runtimesFor(
  program: Command,
  options: SelectOptions & { dryRun?: boolean }
): { settings: Settings; runtimes: ContractRuntime[] } {
  const opts = program.opts<GlobalOptions>();
  const configPath = resolve(opts.config);
  const config = loadValidatedConfig(configPath);
  const settings = resolveSettings(config, configPath);
  const runtimes = selectContracts(config, options.contract, options.all).map((contract) =>
    buildContractRuntime({ config, configPath, settings, contract, verbose: opts.verbose, dryRun: options.dryRun })
  );
  return { settings, runtimes };
}

async function printNotifications(runtime: ContractRuntime): Promise<void> {
  const notifications = await runtime.notifier.list();
  for (const notification of notifications) {
    if (notification.notificationId.endsWith(`_${runtime.contract.contractId}`)) {
      console.log(`  notice: ${notification.title} (${notification.createdAt})`);
    }
  }
}

async function main(): Promise<void> {
  const program = new Command();
  program.name("peak-sync").description("Peak electricity event tracker and calendar sync");

  program.option("--config <path>", "path to JSON config file", DEFAULT_CONFIG_PATH);
  program.option("--verbose", "print debug logs", false);

  program.command("validate-config").action(() => {
    const opts = program.opts<GlobalOptions>();
    const config = loadConfig(opts.config);
    const errors = validateConfig(config);
    if (errors.length > 0) {
      for (const error of errors) {
        console.error(`ERROR: ${error}`);
      }
      process.exitCode = 1;
      return;
    }
    console.log("Config valid");
  });

  program
    .command("status")
    .option("--contract <name>", "contract name or id")
    .option("--all", "report every contract", false)
    .option("--source <source>", "feed|calendar", "feed")
    .option("--at <iso>", "evaluate at this instant instead of now")
    .action(async (options: SelectOptions & { source: string; at?: string }) => {
      if (options.source !== "feed" && options.source !== "calendar") {
        throw new Error(`--source must be feed|calendar, got ${options.source}`);
      }
      const { settings, runtimes } = runtimesFor(program, options);
      const at = options.at ? parseInstant(options.at, settings.timeZone) : DateTime.now().setZone(settings.timeZone);

      for (const runtime of runtimes) {
        const { contract } = runtime;
        if (options.source === "calendar") {
          if (!runtime.calendarPeakHandler) {
            console.error(`${contract.name}: no calendar configured`);
            process.exitCode = 1;
            continue;
          }
          if (!(await runtime.calendarPeakHandler.loadEvents(at))) {
            console.error(`${contract.name}: could not read calendar ${runtime.calendarPeakHandler.calendarId}`);
            process.exitCode = 1;
            continue;
          }
          for (const line of formatPeakReport(contract.name, describePeakState(runtime.calendarPeakHandler.view(), at))) {
            console.log(line);
          }
        } else {
          const announcements = await runtime.feed.fetchAnnouncements(contract.rate, at);
          runtime.peakHandler.loadAnnouncements(announcements, at);
          for (const line of formatPeakReport(contract.name, describePeakState(runtime.peakHandler.view(), at))) {
            console.log(line);
          }
        }
        await printNotifications(runtime);
      }
    });

  program
    .command("sync")
    .option("--contract <name>", "contract name or id")
    .option("--all", "sync every contract", false)
    .option("--dry-run", "plan calendar writes without making them", false)
    .action(async (options: SelectOptions & { dryRun: boolean }) => {
      const { runtimes } = runtimesFor(program, options);
      for (const runtime of runtimes) {
        const { contract, coordinator } = runtime;
        if (!runtime.syncEngine) {
          console.log(`${contract.name}: no calendar configured`);
          continue;
        }
        await coordinator.start();
        const result = await coordinator.refresh();
        await coordinator.shutdown();
        if (!result.feedLoaded) {
          console.error(`${contract.name}: announcement feed unavailable`);
        }
        const outcome = coordinator.lastSyncOutcome;
        console.log(outcome ? formatSyncOutcome(contract.name, outcome) : `${contract.name}: sync did not complete`);
      }
    });

  program
    .command("refresh")
    .option("--contract <name>", "contract name or id")
    .option("--all", "refresh every contract", false)
    .action(async (options: SelectOptions) => {
      const { settings, runtimes } = runtimesFor(program, options);
      for (const runtime of runtimes) {
        const { contract, coordinator } = runtime;
        await coordinator.start();
        const result = await coordinator.manualRefresh(settings.manualRefreshTimeoutMs);
        const outcome = coordinator.lastSyncOutcome;
        if (result.syncStarted && outcome) {
          console.log(formatSyncOutcome(contract.name, outcome));
        }
        for (const line of formatPeakReport(contract.name, describePeakState(coordinator.sensorView(), coordinator.now()))) {
          console.log(line);
        }
        await coordinator.shutdown();
      }
    });

  program
    .command("watch")
    .option("--contract <name>", "contract name or id")
    .option("--all", "watch every contract", false)
    .option("--dry-run", "plan calendar writes without making them", false)
    .option("--interval-seconds <n>", "poll interval in seconds")
    .option("--skip-initial", "do not refresh immediately", false)
    .action(async (options: SelectOptions & { dryRun: boolean; intervalSeconds?: string; skipInitial: boolean }) => {
      const { settings, runtimes } = runtimesFor(program, options);
      const intervalSeconds = Number(options.intervalSeconds ?? settings.watchIntervalSeconds);
      if (!Number.isFinite(intervalSeconds) || intervalSeconds < 5) {
        throw new Error("watch interval must be a number >= 5 seconds");
      }

      for (const runtime of runtimes) {
        await runtime.coordinator.start();
      }

      const poll = async (): Promise<void> => {
        for (const { contract, coordinator, logger } of runtimes) {
          try {
            await coordinator.refresh();
            logger.log(`state=${describePeakState(coordinator.sensorView(), coordinator.now()).state}`);
          } catch (error) {
            console.error(`${contract.name}: watch poll failed: ${errorMessage(error)}`);
          }
        }
      };

      let running = true;
      process.on("SIGINT", () => {
        running = false;
      });
      process.on("SIGTERM", () => {
        running = false;
      });
      console.log(`watch started: contracts=${runtimes.length} interval=${intervalSeconds}s dryRun=${options.dryRun}`);

      if (!options.skipInitial) {
        await poll();
      }
      while (running) {
        await sleep(intervalSeconds * 1000);
        if (running) {
          await poll();
        }
      }

      for (const runtime of runtimes) {
        await runtime.coordinator.shutdown();
      }
      console.log("watch stopped");
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exit(1);
});
