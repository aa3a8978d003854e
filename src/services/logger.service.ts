/**
 * Logger Service
 *
 * Structured logging with Pino.
 *
 * Log Levels:
 * - fatal: Application crash
 * - error: Store failures surfaced to callers
 * - warn: Degraded results, lost cache connections
 * - info: Lifecycle (connect, shutdown)
 * - debug: Cache hits, misses and invalidations
 * - trace: Very detailed tracing
 */

import pino from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

// =============================================================================
// Logger Instance
// =============================================================================

export const logger = pino({
  level: logLevel,
  transport:
    isDevelopment && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  base: {
    app: 'photofeed',
  },
});

export type ServiceLogger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

// =============================================================================
// Child Loggers for Services
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string): ServiceLogger {
  return logger.child({ service });
}
