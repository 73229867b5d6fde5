/**
 * Standardized Logger Utility
 *
 * Thin wrapper around pino. Logs always go to stderr so stdout stays free for
 * command output that users pipe into other tools.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerSettings {
  name?: string;
  level?: string;
  pretty?: boolean;
  /** Defaults to stderr */
  destination?: pino.DestinationStream;
}

const REDACTED_PATHS = [
  'token',
  'password',
  'secret',
  'authorization',
  'data',
  'stringData',
  '*.token',
  '*.password',
  '*.secret',
  '*.authorization',
  '*.data',
  '*.stringData',
];

/**
 * Create a pino logger with kube-rollout defaults
 */
export function createLogger(settings: LoggerSettings = {}): pino.Logger {
  const level =
    settings.level ??
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === 'development' ? 'debug' : 'info');
  const pretty = settings.pretty ?? process.env.NODE_ENV === 'development';

  const options: pino.LoggerOptions = {
    name: settings.name ?? 'kube-rollout',
    level,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options, settings.destination ?? pino.destination(2));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;
      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;
      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },
  };
}
