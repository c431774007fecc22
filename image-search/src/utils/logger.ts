export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let threshold: number = LEVELS[parseLevel(process.env.LOG_LEVEL)];

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function parseLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? 'info').toLowerCase();
  return isLogLevel(value) ? value : 'info';
}

export function setLogLevel(level: LogLevel) {
  threshold = LEVELS[level];
}

/**
 * Console logger that prefixes every line with `[scope]`.
 * The level is read on each call, so setLogLevel applies to existing loggers.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (threshold <= LEVELS.debug) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (threshold <= LEVELS.info) console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (threshold <= LEVELS.warn) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (threshold <= LEVELS.error) console.error(prefix, message, ...details);
    },
  };
}
