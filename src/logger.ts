import { env } from "./env.js";

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  // Read on every call so tests can change LOG_LEVEL at runtime
  const configured = (process.env.LOG_LEVEL || env.LOG_LEVEL).toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

/**
 * Thin level gate over console, honouring LOG_LEVEL.
 */
export const logger = {
  debug(...args: unknown[]): void {
    if (enabled('debug')) console.debug(...args);
  },
  info(...args: unknown[]): void {
    if (enabled('info')) console.log(...args);
  },
  warn(...args: unknown[]): void {
    if (enabled('warn')) console.warn(...args);
  },
  error(...args: unknown[]): void {
    if (enabled('error')) console.error(...args);
  },
};
