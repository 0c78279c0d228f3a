export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./time.js";
export * from "./season.js";
export * from "./peakEvent.js";
export * from "./schedule.js";
export * from "./state.js";
export * from "./peakHandler.js";
export * from "./metadata.js";
export * from "./reconcile.js";
export * from "./uidStore.js";
export * from "./calendarSync.js";
export * from "./calendarPeakHandler.js";
export * from "./coordinator.js";
