/**
 * Logging utility for the deck generator CLI.
 * Provides structured logging with log levels and consistent formatting.
 *
 * Usage:
 *   import { logger } from './utils/logger';
 *   logger.info(scope, 'Cards written', { count });
 *
 * Log levels (from least to most severe):
 *   debug: 0 - Detailed debugging info (per-card layout details)
 *   info:  1 - Normal operational messages
 *   warn:  2 - Warning conditions
 *   error: 3 - Error conditions
 *
 * Set LOG_LEVEL environment variable to control verbosity.
 * Default is 'info' which shows info, warn, and error.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env.LOG_LEVEL;
const LOG_LEVEL: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[LOG_LEVEL];
}

export function formatMessage(scope: string, msg: string): string {
  return `[${scope}] ${msg}`;
}

export const logger = {
  debug: (scope: string, msg: string, ...args: unknown[]) => {
    if (shouldLog('debug')) {
      console.log(formatMessage(scope, msg), ...args);
    }
  },

  info: (scope: string, msg: string, ...args: unknown[]) => {
    if (shouldLog('info')) {
      console.log(formatMessage(scope, msg), ...args);
    }
  },

  warn: (scope: string, msg: string, ...args: unknown[]) => {
    if (shouldLog('warn')) {
      console.warn(formatMessage(scope, msg), ...args);
    }
  },

  error: (scope: string, msg: string, ...args: unknown[]) => {
    if (shouldLog('error')) {
      console.error(formatMessage(scope, msg), ...args);
    }
  },
};
