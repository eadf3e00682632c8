import type { Logger, LogLevel } from '@modelgate/core';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** Console logger with `[LEVEL]` prefixes. Messages below `minLevel` are dropped. */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.log(`[INFO] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(`[WARN] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`[ERROR] ${msg}`, ...args);
    },
  };
}
