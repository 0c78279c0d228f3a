import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { silentLogger, type Logger, type Notifier, type PersistentNotification } from "@peak-sync/core";
import { isMissingFile } from "./fileUidStore.js";

export type StoredNotification = PersistentNotification & { createdAt: string };

function toStoredNotification(item: unknown): StoredNotification | null {
  if (
    typeof item !== "object" ||
    item === null ||
    !("notificationId" in item) ||
    !("title" in item) ||
    !("message" in item) ||
    !("createdAt" in item)
  ) {
    return null;
  }
  const { notificationId, title, message, createdAt } = item;
  if (
    typeof notificationId !== "string" ||
    typeof title !== "string" ||
    typeof message !== "string" ||
    typeof createdAt !== "string"
  ) {
    return null;
  }
  return { notificationId, title, message, createdAt };
}

/**
 * Keeps persistent notifications in `<stateDir>/notifications.json`, one per id,
 * so `status` can show them until the user acts.
 */
export class FileNotifier implements Notifier {
  readonly path: string;
  private readonly stateDir: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: { stateDir: string; logger?: Logger; clock?: () => Date }) {
    this.stateDir = options.stateDir;
    this.path = join(options.stateDir, "notifications.json");
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  async notify(notification: PersistentNotification): Promise<void> {
    this.logger.error(`${notification.title}: ${notification.message}`);
    const kept = (await this.list()).filter((stored) => stored.notificationId !== notification.notificationId);
    kept.push({ ...notification, createdAt: this.clock().toISOString() });
    await mkdir(this.stateDir, { recursive: true });
    await writeFile(this.path, `${JSON.stringify(kept, null, 2)}\n`);
  }

  async list(): Promise<StoredNotification[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const data: unknown = JSON.parse(raw);
    const items: unknown[] = Array.isArray(data) ? data : [];
    const stored: StoredNotification[] = [];
    for (const item of items) {
      const notification = toStoredNotification(item);
      if (notification) {
        stored.push(notification);
      }
    }
    return stored;
  }
}
