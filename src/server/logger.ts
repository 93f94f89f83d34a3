export const LOG_PREFIX = '[scribble]';

/**
 * Log level configuration for the editor server.
 *
 * Levels (from least to most verbose):
 * - "off": Disable all logging
 * - "error": Errors only
 * - "warn": Warnings and errors
 * - "info": Startup and saved masks
 * - "debug": Every action the session handles
 */
export const LOG_LEVELS = ['off', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a logger instance with specified log level.
 *
 * @param level - Log level (default: "info")
 * @returns Logger that prefixes all messages with [scribble]
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const withPrefix = (...args: unknown[]): unknown[] =>
    args.length > 0 && typeof args[0] === 'string'
      ? [`${LOG_PREFIX} ${args[0]}`, ...args.slice(1)]
      : [LOG_PREFIX, ...args];

  const rank = LOG_LEVELS.indexOf(level);
  const enabled = (required: LogLevel) => rank >= LOG_LEVELS.indexOf(required);

  return {
    debug: (...args: unknown[]) => {
      if (!enabled('debug')) return;
      console.debug(...withPrefix(...args));
    },
    info: (...args: unknown[]) => {
      if (!enabled('info')) return;
      console.info(...withPrefix(...args));
    },
    warn: (...args: unknown[]) => {
      if (!enabled('warn')) return;
      console.warn(...withPrefix(...args));
    },
    error: (...args: unknown[]) => {
      if (!enabled('error')) return;
      console.error(...withPrefix(...args));
    },
  };
}
