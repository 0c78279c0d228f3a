export const PeakSyncErrorCode = {
  INVALID_EVENT: "INVALID_EVENT",
  INVALID_TIMEZONE: "INVALID_TIMEZONE",
  FEED_FAILED: "FEED_FAILED",
  CALENDAR_FAILED: "CALENDAR_FAILED",
  STORE_FAILED: "STORE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID"
} as const;

export type PeakSyncErrorCode = (typeof PeakSyncErrorCode)[keyof typeof PeakSyncErrorCode];

export class PeakSyncError extends Error {
  readonly code: PeakSyncErrorCode;

  constructor(code: PeakSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PeakSyncError";
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
