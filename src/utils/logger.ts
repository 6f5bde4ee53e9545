/** Structured context attached to a log line. */
export type LogContext = Record<string, unknown>;

/**
 * Logging sink used by the client and the transport. Any object with these two
 * methods fits, so an application logger can be passed straight in.
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
}

/** Logger that drops everything; the default. */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

const PREFIX = '[royale-stats-client]';

/** Logger writing to the console, selected by `debug: true`. */
export const consoleLogger: Logger = {
  debug: (message, context) => console.debug(PREFIX, message, ...(context ? [context] : [])),
  warn: (message, context) => console.warn(PREFIX, message, ...(context ? [context] : [])),
};

/**
 * Picks the logger for a client: an explicit `logger` wins, then `debug` selects the console.
 */
export function resolveLogger(opts: { logger?: Logger; debug?: boolean }): Logger {
  if (opts.logger) {
    return opts.logger;
  }

  return opts.debug ? consoleLogger : silentLogger;
}
