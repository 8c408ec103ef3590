/**
 * Structured Logging with Correlation IDs
 *
 * JSON lines on stdout/stderr. Every entry carries the correlation ID and
 * operation of the surrounding request context.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    operation: reqContext?.operation,
    classifierStrategy: reqContext?.classifierStrategy,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function debugEnabled(): boolean {
  const level = process.env.LOG_LEVEL;
  if (level) return level === 'debug';
  return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (debugEnabled()) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
