import {
  DEFAULT_TIME_ZONE,
  PeakSyncError,
  offerCodesForRate,
  silentLogger,
  type Announcement,
  type AnnouncementFeed,
  type Logger,
  type RateCode
} from "@peak-sync/core";
import type { DateTime } from "luxon";

export const OPEN_DATA_BASE_URL =
  "https://donnees.hydroquebec.com/api/explore/v2.1/catalog/datasets/evenements-pointe/records";
export const DEFAULT_FEED_LIMIT = 100;
export const FEED_TIMEOUT_MS = 30_000;

export type FeedResponse = {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
};

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<FeedResponse>;

export type OpenDataFeedOptions = {
  baseUrl?: string;
  limit?: number;
  zone?: string;
  fetch?: FetchLike;
  logger?: Logger;
};

export function buildFeedUrl(args: { baseUrl: string; offerCode: string; today: DateTime; zone: string; limit: number }): string {
  const url = new URL(args.baseUrl);
  url.searchParams.set("limit", String(args.limit));
  url.searchParams.set("timezone", args.zone);
  url.searchParams.set("refine", `offre:"${args.offerCode}"`);
  url.searchParams.set("where", `datedebut>='${args.today.setZone(args.zone).toISODate() ?? ""}'`);
  return url.toString();
}

function field(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

// Keeps records carrying an offer code and both bounds; the rest are reported as dropped.
export function parseFeedRecords(data: unknown): { announcements: Announcement[]; dropped: number } {
  const results = typeof data === "object" && data !== null && "results" in data ? data.results : undefined;
  if (!Array.isArray(results)) {
    throw new PeakSyncError("FEED_FAILED", "Open data response has no results list");
  }

  const announcements: Announcement[] = [];
  let dropped = 0;
  for (const item of results) {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      dropped += 1;
      continue;
    }
    const record: Record<string, unknown> = { ...item };
    const offerCode = field(record, "offre");
    const start = field(record, "datedebut");
    const end = field(record, "datefin");
    if (!offerCode || !start || !end) {
      dropped += 1;
      continue;
    }
    announcements.push({
      start,
      end,
      offerCode,
      sector: field(record, "secteurclient")
    });
  }
  return { announcements, dropped };
}

export class OpenDataFeed implements AnnouncementFeed {
  private readonly baseUrl: string;
  private readonly limit: number;
  private readonly zone: string;
  private readonly fetch: FetchLike;
  private readonly logger: Logger;

  constructor(options: OpenDataFeedOptions = {}) {
    this.baseUrl = options.baseUrl ?? OPEN_DATA_BASE_URL;
    this.limit = options.limit ?? DEFAULT_FEED_LIMIT;
    this.zone = options.zone ?? DEFAULT_TIME_ZONE;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
  }

  async fetchAnnouncements(rate: RateCode, today: DateTime): Promise<Announcement[]> {
    const [offerCode, ...others] = offerCodesForRate(rate);
    if (!offerCode) {
      this.logger.logDebug(`[OpenData] No peak events available for rate ${rate}, skipping API fetch`);
      return [];
    }
    if (others.length > 0) {
      this.logger.warn(`[OpenData] Multiple offers detected for rate ${rate}, only filtering by first: ${offerCode}`);
    }

    const url = buildFeedUrl({ baseUrl: this.baseUrl, offerCode, today, zone: this.zone, limit: this.limit });
    this.logger.logDebug(`[OpenData] Fetching peak events for rate ${rate} with refine: offre=${offerCode}`);

    const response = await this.fetch(url, { signal: AbortSignal.timeout(FEED_TIMEOUT_MS) });
    if (!response.ok) {
      throw new PeakSyncError("FEED_FAILED", `Open data request failed with HTTP ${response.status}`);
    }

    const { announcements, dropped } = parseFeedRecords(await response.json());
    if (dropped > 0) {
      this.logger.warn(`[OpenData] Dropped ${dropped} incomplete records for rate ${rate}`);
    }
    this.logger.log(`[OpenData] Fetched ${announcements.length} peak events from public API for rate ${rate}`);
    return announcements;
  }
}
