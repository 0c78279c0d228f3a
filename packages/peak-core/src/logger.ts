export type Logger = {
  log: (...args: unknown[]) => void;
  logDebug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

const noop = (): void => undefined;

export const silentLogger: Logger = {
  log: noop,
  logDebug: noop,
  warn: noop,
  error: noop
};
