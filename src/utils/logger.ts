/**
 * Centralized logging utility using Pino
 */

import pino from 'pino';

/**
 * Root logger. Pretty-printed in development, JSON everywhere else.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: process.env.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Bindings attached to every log line emitted while a run is executing
 */
export function createRunLogger(runId: string, threadId: string, responderId: string): Logger {
  return logger.child({ module: 'run', runId, threadId, responderId });
}
