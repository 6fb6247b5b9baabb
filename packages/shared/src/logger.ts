/**
 * Structured Logging with Correlation IDs
 *
 * Every entry is one JSON line carrying the correlation ID and the report
 * profile from the AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';
import { config } from './config';

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
    profile: reqContext?.profile,
    documentName: reqContext?.documentName,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (config.logLevel === 'silent') return;
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (config.logLevel === 'silent') return;
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (config.logLevel === 'silent') return;
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
    if (config.logLevel === 'debug' || (config.logLevel !== 'silent' && process.env.NODE_ENV !== 'production')) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
