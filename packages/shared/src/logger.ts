/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the correlation ID and filename from the
 * AsyncLocalStorage context. The threshold comes from Config.logLevel via
 * setLogLevel; `silent` turns output off.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    filename: reqContext?.filename,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export function serializeError(error: unknown): { message: string; stack?: string; name: string } | string {
  return error instanceof Error
    ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      }
    : String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (!enabled('info')) return;
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (!enabled('warn')) return;
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error: serializeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (!enabled('debug')) return;
    console.debug(formatLog('DEBUG', message, context));
  },
};
