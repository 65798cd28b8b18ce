/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the correlation ID and file path from the
 * AsyncLocalStorage context
 */

import { getCorrelationId, getContext } from './context';
import { errorMessage } from './errors';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const fileContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    filePath: fileContext?.filePath,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
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
        typeof error === 'object' && error !== null
          ? {
              message: errorMessage(error),
              stack: 'stack' in error ? error.stack : undefined,
              name: 'name' in error ? error.name : undefined,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
