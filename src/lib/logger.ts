/**
 * Console Logger
 * Context-prefixed console output filtered by LOG_LEVEL
 */

import { env } from '../config/env';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(value: string = env.LOG_LEVEL): LogLevel {
  const level = value.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export function createLogger(context: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${context}]`;

  return {
    debug: (message, ...details) => {
      if (threshold >= LEVEL_ORDER.debug) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (threshold >= LEVEL_ORDER.info) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (threshold >= LEVEL_ORDER.warn) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (threshold >= LEVEL_ORDER.error) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
