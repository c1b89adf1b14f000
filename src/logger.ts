/**
 * Scoped console logger.
 *
 * Every level writes to stderr so that stdout stays reserved for CLI output.
 * The threshold is process-wide; `ARANET4_LOG` sets its initial value.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.ARANET4_LOG?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...args) {
      if (enabled('debug')) console.error(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.error(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}
