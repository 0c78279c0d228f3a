import { execFile } from "node:child_process";
import { promisify } from "node:util";
import {
  PeakSyncError,
  errorMessage,
  type CalendarEntry,
  type CalendarEntryTime,
  type CalendarInfo,
  type CalendarPort,
  type CalendarRegistry,
  type NewCalendarEntry
} from "@peak-sync/core";
import type { Config } from "./config.js";

const execFileAsync = promisify(execFile);

export type CommandRunner = (bin: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const runCommand: CommandRunner = (bin, args) =>
  execFileAsync(bin, args, { encoding: "utf8", maxBuffer: 10 * 1024 * 1024 });

const DEFAULTS = {
  listEventsCmd: "gog calendar events {calendarId} --account {account} --from {timeMin} --to {timeMax} --json",
  createEventCmd:
    "gog calendar create {calendarId} --account {account} --summary {summary} --from {from} --to {to} --description {description} --location {location} --send-updates none --json",
  listCalendarsCmd: "gog calendar calendars --account {account} --json"
};

type CommandName = keyof typeof DEFAULTS;

/**
 * Splits a command template into argv and fills `{placeholders}` per argument,
 * so substituted values never need shell quoting.
 */
export function renderCommand(template: string, values: Record<string, string>): { bin: string; args: string[] } {
  const parts = template.match(/(?:[^\s"]+|"[^"]*")+/g) ?? [];
  const rendered = parts
    .map((part) => part.replace(/^"|"$/g, ""))
    .map((part) => part.replaceAll(/\{([a-zA-Z0-9_]+)\}/g, (_, key: string) => values[key] ?? ""))
    .filter((part) => part.length > 0);
  const [bin, ...args] = rendered;
  if (!bin) {
    throw new Error(`Invalid command: ${template}`);
  }
  return { bin, args };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function listItems(out: unknown, keys: string[]): unknown[] {
  if (Array.isArray(out)) {
    return out;
  }
  if (isRecord(out)) {
    for (const key of keys) {
      const items = out[key];
      if (Array.isArray(items)) {
        return items;
      }
    }
  }
  return [];
}

function toEntryTime(value: unknown): CalendarEntryTime | null {
  if (!isRecord(value)) {
    return null;
  }
  return {
    dateTime: optionalString(value.dateTime),
    date: optionalString(value.date),
    timeZone: optionalString(value.timeZone)
  };
}

export function toCalendarEntry(value: unknown): CalendarEntry | null {
  if (!isRecord(value)) {
    return null;
  }
  const start = toEntryTime(value.start);
  const end = toEntryTime(value.end);
  if (!start || !end) {
    return null;
  }
  return {
    id: optionalString(value.id),
    summary: optionalString(value.summary),
    description: optionalString(value.description),
    location: optionalString(value.location),
    start,
    end
  };
}

function toCalendarInfo(value: unknown): CalendarInfo | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = optionalString(value.id);
  if (!id) {
    return null;
  }
  return { id, name: optionalString(value.summary) ?? optionalString(value.name) };
}

export class GogClient {
  constructor(
    private readonly config: Config,
    private readonly run: CommandRunner = runCommand
  ) {}

  private template(name: CommandName): string {
    const override = this.config.gog?.[name];
    if (!override) {
      return DEFAULTS[name];
    }
    if (this.config.gog?.allowCustomCommands !== true) {
      throw new Error(`gog.${name} override requires gog.allowCustomCommands=true`);
    }
    if (!override.trim().startsWith("gog ")) {
      throw new Error(`gog.${name} must start with 'gog '`);
    }
    return override;
  }

  private async runJson(name: CommandName, values: Record<string, string>): Promise<unknown> {
    const { bin, args } = renderCommand(this.template(name), values);
    let result: { stdout: string; stderr: string };
    try {
      result = await this.run(bin, args);
    } catch (error) {
      throw new PeakSyncError("CALENDAR_FAILED", `gog ${name} failed: ${errorMessage(error)}`, { cause: error });
    }

    const text = result.stdout.trim();
    if (!text) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new PeakSyncError(
        "CALENDAR_FAILED",
        `Failed to parse gog JSON output. stderr=${result.stderr.trim()} output=${text} err=${errorMessage(error)}`
      );
    }
  }

  async listEvents(args: { account: string; calendarId: string; timeMin: string; timeMax: string }): Promise<CalendarEntry[]> {
    const out = await this.runJson("listEventsCmd", args);
    const entries: CalendarEntry[] = [];
    for (const item of listItems(out, ["items", "events"])) {
      const entry = toCalendarEntry(item);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  async createEvent(args: { account: string; calendarId: string; entry: NewCalendarEntry }): Promise<void> {
    await this.runJson("createEventCmd", {
      account: args.account,
      calendarId: args.calendarId,
      summary: args.entry.summary,
      description: args.entry.description,
      location: args.entry.location,
      from: args.entry.start,
      to: args.entry.end
    });
  }

  async listCalendars(args: { account: string }): Promise<CalendarInfo[]> {
    const out = await this.runJson("listCalendarsCmd", args);
    const calendars: CalendarInfo[] = [];
    for (const item of listItems(out, ["items", "calendars"])) {
      const info = toCalendarInfo(item);
      if (info) {
        calendars.push(info);
      }
    }
    return calendars;
  }
}

// One Google account seen through the calendar ports.
export class GogCalendar implements CalendarPort, CalendarRegistry {
  constructor(
    private readonly client: GogClient,
    private readonly account: string
  ) {}

  listEvents(args: { calendarId: string; from: string; to: string }): Promise<CalendarEntry[]> {
    return this.client.listEvents({ account: this.account, calendarId: args.calendarId, timeMin: args.from, timeMax: args.to });
  }

  createEvent(args: { calendarId: string; entry: NewCalendarEntry }): Promise<void> {
    return this.client.createEvent({ account: this.account, calendarId: args.calendarId, entry: args.entry });
  }

  async serviceReady(): Promise<boolean> {
    try {
      await this.client.listCalendars({ account: this.account });
      return true;
    } catch {
      return false;
    }
  }

  async findCalendar(calendarId: string): Promise<CalendarInfo | null> {
    const calendars = await this.client.listCalendars({ account: this.account });
    return calendars.find((calendar) => calendar.id === calendarId) ?? null;
  }
}
