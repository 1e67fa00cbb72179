export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Console logger with a subsystem prefix, e.g. createConsoleLogger('📡 DS1000Z').
 * warn/error go to stderr.
 */
export function createConsoleLogger(prefix: string, level: LogLevel = 'info'): Logger {
  const enabled = (l: LogLevel) => LEVEL_RANK[l] >= LEVEL_RANK[level];
  return {
    debug: (message, ...details) => { if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details); },
    info: (message, ...details) => { if (enabled('info')) console.log(`${prefix} ${message}`, ...details); },
    warn: (message, ...details) => { if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details); },
    error: (message, ...details) => { if (enabled('error')) console.error(`${prefix} ${message}`, ...details); },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
