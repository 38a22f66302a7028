/** Structured fields attached to a log line. */
export type LogMeta = Record<string, unknown>;

/** Minimal logger contract accepted by the client. */
export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

const noop = () => {};

/** Logger that drops everything, the default. */
export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

const PREFIX = '[bonusly]';

/** Logger writing to the console, selected with `debug: true`. */
export const consoleLogger: Logger = {
  debug: (message, meta) => console.debug(PREFIX, message, ...(meta ? [meta] : [])),
  info: (message, meta) => console.info(PREFIX, message, ...(meta ? [meta] : [])),
  warn: (message, meta) => console.warn(PREFIX, message, ...(meta ? [meta] : [])),
  error: (message, meta) => console.error(PREFIX, message, ...(meta ? [meta] : [])),
};

/**
 * Picks the logger for a client: an explicit one wins, then `debug` selects the console.
 */
export function resolveLogger(logger?: Logger, debug?: boolean): Logger {
  if (logger) {
    return logger;
  }

  return debug ? consoleLogger : noopLogger;
}
