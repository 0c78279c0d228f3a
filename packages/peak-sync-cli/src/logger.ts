import type { Logger } from "@peak-sync/core";

export function createConsoleLogger(options: { verbose?: boolean; prefix?: string } = {}): Logger {
  const head = options.prefix ? [`${options.prefix}:`] : [];
  return {
    log: (...args) => console.log(...head, ...args),
    logDebug: (...args) => {
      if (options.verbose) {
        console.log(...head, ...args);
      }
    },
    warn: (...args) => console.error(...head, "WARN:", ...args),
    error: (...args) => console.error(...head, "ERROR:", ...args)
  };
}
