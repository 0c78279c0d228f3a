import { PeakSyncError } from "./errors.js";

export const UID_STORE_VERSION = 1;

export type StoredUids = {
  version: number;
  uids: string[];
};

export type UidStore = {
  load(): Promise<string[]>;
  save(uids: string[]): Promise<void>;
  clear(): Promise<void>;
};

export function serializeUids(uids: Iterable<string>): StoredUids {
  return { version: UID_STORE_VERSION, uids: [...new Set(uids)].sort() };
}

export function parseStoredUids(data: unknown): string[] {
  if (typeof data !== "object" || data === null || !("version" in data) || !("uids" in data)) {
    throw new PeakSyncError("STORE_FAILED", "Stored calendar UIDs must be an object with version and uids");
  }
  if (data.version !== UID_STORE_VERSION) {
    throw new PeakSyncError("STORE_FAILED", `Unsupported calendar UID store version: ${String(data.version)}`);
  }
  const uids: unknown = data.uids;
  if (!Array.isArray(uids)) {
    throw new PeakSyncError("STORE_FAILED", "Stored calendar UIDs must be a list of strings");
  }
  const valid = uids.filter((uid): uid is string => typeof uid === "string");
  if (valid.length !== uids.length) {
    throw new PeakSyncError("STORE_FAILED", "Stored calendar UIDs must be a list of strings");
  }
  return valid;
}

export class MemoryUidStore implements UidStore {
  private record: StoredUids | null = null;
  saves = 0;

  constructor(initial: string[] = []) {
    if (initial.length > 0) {
      this.record = serializeUids(initial);
    }
  }

  async load(): Promise<string[]> {
    return this.record ? parseStoredUids(this.record) : [];
  }

  async save(uids: string[]): Promise<void> {
    this.record = serializeUids(uids);
    this.saves += 1;
  }

  async clear(): Promise<void> {
    this.record = null;
  }
}

// Consecutive failed calendar validations, kept across runs so one-shot syncs reach the limit.
export type ValidationAttemptStore = {
  load(): Promise<number>;
  save(attempts: number): Promise<void>;
};

export class MemoryValidationAttemptStore implements ValidationAttemptStore {
  attempts: number;

  constructor(initial = 0) {
    this.attempts = initial;
  }

  async load(): Promise<number> {
    return this.attempts;
  }

  async save(attempts: number): Promise<void> {
    this.attempts = attempts;
  }
}
