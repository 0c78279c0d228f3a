import { readFileSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { IANAZone } from "luxon";
import {
  DEFAULT_MANUAL_REFRESH_TIMEOUT_MS,
  DEFAULT_MAX_VALIDATION_ATTEMPTS,
  DEFAULT_TIME_ZONE,
  DEFAULT_WRITE_DELAY_MS,
  PeakSyncError,
  isRateCode,
  type CalendarConfigStore,
  type RateCode
} from "@peak-sync/core";

export type Config = {
  timeZone?: string;
  stateDir?: string;
  contracts: ContractConfig[];
  sync?: {
    maxValidationAttempts?: number;
    writeDelayMs?: number;
    includeNonCritical?: boolean;
    watchIntervalSeconds?: number;
    manualRefreshTimeoutSeconds?: number;
  };
  feed?: {
    baseUrl?: string;
    limit?: number;
  };
  gog?: {
    allowCustomCommands?: boolean;
    listEventsCmd?: string;
    createEventCmd?: string;
    listCalendarsCmd?: string;
  };
};

export type ContractConfig = {
  contractId: string;
  name: string;
  rate: RateCode;
  preheatMinutes?: number;
  calendar?: {
    account: string;
    calendarId: string;
  };
};

export type Settings = {
  timeZone: string;
  stateDir: string;
  maxValidationAttempts: number;
  writeDelayMs: number;
  includeNonCritical: boolean;
  watchIntervalSeconds: number;
  manualRefreshTimeoutMs: number;
  feedBaseUrl?: string;
  feedLimit?: number;
};

export const DEFAULT_CONFIG_PATH = "./peak-sync.config.json";
export const DEFAULT_STATE_DIR = ".peak-sync";
export const DEFAULT_WATCH_INTERVAL_SECONDS = 300;

export const GOG_COMMAND_KEYS = ["listEventsCmd", "createEventCmd", "listCalendarsCmd"] as const;

export function loadConfig(path: string): Config {
  const raw = readFileSync(path, "utf8");
  return JSON.parse(raw) as Config;
}

export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.timeZone !== undefined && !IANAZone.isValidZone(config.timeZone)) {
    errors.push(`timeZone is not a known IANA zone: ${config.timeZone}`);
  }

  if (!Array.isArray(config.contracts) || config.contracts.length === 0) {
    errors.push("config.contracts must be a non-empty array");
    return errors;
  }

  const ids = new Set<string>();
  const names = new Set<string>();
  for (const [index, contract] of config.contracts.entries()) {
    if (!contract.contractId) {
      errors.push(`contracts[${index}].contractId is required`);
    } else if (!/^[A-Za-z0-9_-]+$/.test(contract.contractId)) {
      errors.push(`contracts[${index}].contractId may only contain letters, digits, '_' and '-'`);
    } else if (ids.has(contract.contractId)) {
      errors.push(`contracts[${index}].contractId must be unique: ${contract.contractId}`);
    } else {
      ids.add(contract.contractId);
    }

    if (!contract.name) {
      errors.push(`contracts[${index}].name is required`);
    } else if (names.has(contract.name)) {
      errors.push(`contracts[${index}].name must be unique: ${contract.name}`);
    } else {
      names.add(contract.name);
    }

    if (!isRateCode(String(contract.rate))) {
      errors.push(`contracts[${index}].rate must be one of DCPC|DPC|M-GDP|M-CPC|M-GPC|M-ENG|M-OEA`);
    }

    if (
      contract.preheatMinutes !== undefined &&
      (!Number.isInteger(contract.preheatMinutes) || contract.preheatMinutes < 0)
    ) {
      errors.push(`contracts[${index}].preheatMinutes must be an integer >= 0`);
    }

    if (contract.calendar) {
      if (!contract.calendar.account) {
        errors.push(`contracts[${index}].calendar.account is required`);
      }
      if (!contract.calendar.calendarId) {
        errors.push(`contracts[${index}].calendar.calendarId is required`);
      }
    }
  }

  const sync = config.sync;
  if (sync?.maxValidationAttempts !== undefined && sync.maxValidationAttempts < 1) {
    errors.push("sync.maxValidationAttempts must be >= 1");
  }
  if (sync?.writeDelayMs !== undefined && sync.writeDelayMs < 0) {
    errors.push("sync.writeDelayMs must be >= 0");
  }
  if (sync?.watchIntervalSeconds !== undefined && sync.watchIntervalSeconds < 5) {
    errors.push("sync.watchIntervalSeconds must be >= 5");
  }
  if (sync?.manualRefreshTimeoutSeconds !== undefined && sync.manualRefreshTimeoutSeconds < 1) {
    errors.push("sync.manualRefreshTimeoutSeconds must be >= 1");
  }

  if (config.feed?.baseUrl !== undefined && !config.feed.baseUrl.startsWith("https://")) {
    errors.push("feed.baseUrl must start with 'https://'");
  }
  if (config.feed?.limit !== undefined && (config.feed.limit < 1 || config.feed.limit > 100)) {
    errors.push("feed.limit must be between 1 and 100");
  }

  for (const key of GOG_COMMAND_KEYS) {
    const cmd = config.gog?.[key];
    if (!cmd) {
      continue;
    }
    if (config.gog?.allowCustomCommands !== true) {
      errors.push(`gog.${key} requires gog.allowCustomCommands=true`);
    } else if (!cmd.trim().startsWith("gog ")) {
      errors.push(`gog.${key} must start with 'gog '`);
    }
  }

  return errors;
}

export function resolveSettings(config: Config, configPath: string): Settings {
  return {
    timeZone: config.timeZone ?? DEFAULT_TIME_ZONE,
    stateDir: resolve(dirname(configPath), config.stateDir ?? DEFAULT_STATE_DIR),
    maxValidationAttempts: config.sync?.maxValidationAttempts ?? DEFAULT_MAX_VALIDATION_ATTEMPTS,
    writeDelayMs: config.sync?.writeDelayMs ?? DEFAULT_WRITE_DELAY_MS,
    includeNonCritical: config.sync?.includeNonCritical ?? false,
    watchIntervalSeconds: config.sync?.watchIntervalSeconds ?? DEFAULT_WATCH_INTERVAL_SECONDS,
    manualRefreshTimeoutMs:
      config.sync?.manualRefreshTimeoutSeconds !== undefined
        ? config.sync.manualRefreshTimeoutSeconds * 1000
        : DEFAULT_MANUAL_REFRESH_TIMEOUT_MS,
    feedBaseUrl: config.feed?.baseUrl,
    feedLimit: config.feed?.limit
  };
}

export function selectContracts(config: Config, contractName: string | undefined, all: boolean): ContractConfig[] {
  if (all) {
    return config.contracts;
  }
  if (!contractName) {
    if (config.contracts.length === 1) {
      return config.contracts;
    }
    throw new Error("Select one contract with --contract <name> or use --all");
  }

  const found = config.contracts.find(
    (contract) => contract.name === contractName || contract.contractId === contractName
  );
  if (!found) {
    throw new Error(`Unknown contract: ${contractName}`);
  }
  return [found];
}

// Writes the config back without the contract's calendar once the calendar is given up on.
export class ConfigFileCalendarStore implements CalendarConfigStore {
  constructor(private readonly path: string) {}

  async clearCalendar(contractId: string): Promise<void> {
    let config: Config;
    try {
      config = JSON.parse(await readFile(this.path, "utf8")) as Config;
    } catch (error) {
      throw new PeakSyncError("CONFIG_INVALID", `Cannot read config file ${this.path}`, { cause: error });
    }

    const contracts = config.contracts.map((contract) => {
      if (contract.contractId !== contractId) {
        return contract;
      }
      const { calendar: _calendar, ...rest } = contract;
      return rest;
    });
    await writeFile(this.path, `${JSON.stringify({ ...config, contracts }, null, 2)}\n`);
  }
}
