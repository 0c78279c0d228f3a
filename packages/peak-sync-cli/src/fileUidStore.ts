import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  PeakSyncError,
  UID_STORE_VERSION,
  errorMessage,
  parseStoredUids,
  serializeUids,
  silentLogger,
  type Logger,
  type UidStore,
  type ValidationAttemptStore
} from "@peak-sync/core";

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileUidStore implements UidStore {
  readonly path: string;
  private readonly stateDir: string;
  private readonly logger: Logger;
  // Set once load() has rejected the file; it is then never overwritten.
  private unsupportedFile = false;

  constructor(options: { stateDir: string; contractId: string; logger?: Logger }) {
    this.stateDir = options.stateDir;
    this.path = join(options.stateDir, `calendar-uids.${options.contractId}.json`);
    this.logger = options.logger ?? silentLogger;
  }

  async load(): Promise<string[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn(`[Sync] Cannot read ${this.path}, starting with no stored UIDs: ${errorMessage(error)}`);
      }
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`[Sync] ${this.path} is not valid JSON, starting with no stored UIDs: ${errorMessage(error)}`);
      return [];
    }

    if (typeof data === "object" && data !== null && "version" in data && data.version !== UID_STORE_VERSION) {
      this.unsupportedFile = true;
      throw new PeakSyncError("STORE_FAILED", `Unsupported calendar UID store version in ${this.path}: ${String(data.version)}`);
    }
    try {
      return parseStoredUids(data);
    } catch (error) {
      this.logger.warn(`[Sync] ${this.path} is malformed, starting with no stored UIDs: ${errorMessage(error)}`);
      return [];
    }
  }

  async save(uids: string[]): Promise<void> {
    if (this.unsupportedFile) {
      throw new PeakSyncError("STORE_FAILED", `Refusing to overwrite ${this.path}: it holds an unsupported UID store version`);
    }
    await mkdir(this.stateDir, { recursive: true });
    const temp = `${this.path}.tmp`;
    await writeFile(temp, `${JSON.stringify(serializeUids(uids), null, 2)}\n`);
    await rename(temp, this.path);
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    this.unsupportedFile = false;
  }
}

export class FileValidationAttemptStore implements ValidationAttemptStore {
  readonly path: string;
  private readonly stateDir: string;
  private readonly logger: Logger;

  constructor(options: { stateDir: string; contractId: string; logger?: Logger }) {
    this.stateDir = options.stateDir;
    this.path = join(options.stateDir, `calendar-validation.${options.contractId}.json`);
    this.logger = options.logger ?? silentLogger;
  }

  async load(): Promise<number> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`[Sync] ${this.path} is not valid JSON, restarting the validation count: ${errorMessage(error)}`);
      return 0;
    }
    if (typeof data !== "object" || data === null || !("attempts" in data)) {
      this.logger.warn(`[Sync] ${this.path} is malformed, restarting the validation count`);
      return 0;
    }
    const { attempts } = data;
    if (typeof attempts !== "number" || !Number.isInteger(attempts) || attempts < 0) {
      this.logger.warn(`[Sync] ${this.path} is malformed, restarting the validation count`);
      return 0;
    }
    return attempts;
  }

  async save(attempts: number): Promise<void> {
    if (attempts === 0) {
      await rm(this.path, { force: true });
      return;
    }
    await mkdir(this.stateDir, { recursive: true });
    const temp = `${this.path}.tmp`;
    await writeFile(temp, `${JSON.stringify({ attempts }, null, 2)}\n`);
    await rename(temp, this.path);
  }
}
