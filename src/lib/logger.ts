/**
 * Pino logger factory
 *
 * Logs go to stderr so stdout stays free for command output.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
  /** Override the destination; tests pass an in-memory stream */
  destination?: pino.DestinationStream;
}

const REDACT_PATHS = [
  'password',
  'token',
  'authorization',
  '*.password',
  '*.token',
  '*.authorization',
  'env.*PASSWORD*',
];

function resolveLevel(level?: string): string {
  if (level) return level;
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: resolveLevel(options.level),
    base: options.name ? { name: options.name } : null,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return pino(loggerOptions, options.destination ?? pino.destination(2));
}

export interface Timer {
  end(context?: Record<string, unknown>): number;
  error(error: unknown, context?: Record<string, unknown>): number;
  checkpoint(label: string, context?: Record<string, unknown>): number;
}

/**
 * Measure an operation and log its duration on completion, failure or checkpoints
 */
export function createTimer(
  logger: Logger,
  operation: string,
  initialContext: Record<string, unknown> = {},
): Timer {
  const startedAt = Date.now();
  const elapsed = (): number => Date.now() - startedAt;

  return {
    end(context = {}) {
      const durationMs = elapsed();
      logger.debug({ ...initialContext, ...context, operation, durationMs }, `${operation} completed`);
      return durationMs;
    },
    error(error, context = {}) {
      const durationMs = elapsed();
      const message = error instanceof Error ? error.message : String(error);
      logger.error(
        { ...initialContext, ...context, operation, durationMs, error: message },
        `${operation} failed`,
      );
      return durationMs;
    },
    checkpoint(label, context = {}) {
      const durationMs = elapsed();
      logger.debug({ ...initialContext, ...context, operation, label, durationMs }, 'checkpoint');
      return durationMs;
    },
  };
}
