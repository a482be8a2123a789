// =============================================================================
// Logger Utility
// =============================================================================
//
// Logs go to stderr so stdout stays free for help text. All packages create
// their loggers here instead of importing pino directly.

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger, LoggerOptions };

/**
 * Creates a named pino logger writing JSON lines to stderr.
 *
 * The level comes from `LOG_LEVEL` (default `info`); `silent` turns logging
 * off, which the test config does. Writes are synchronous so nothing is lost
 * when the process exits right after a fatal error.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@price-median/shared';
 * const logger = createLogger('csv-reader');
 * logger.info({ file, rows }, 'CSV file read');
 * ```
 */
export function createLogger(name: string, options?: Partial<LoggerOptions>): Logger {
  return pino(
    {
      name,
      level: process.env.LOG_LEVEL ?? 'info',
      ...options,
    },
    pino.destination({ fd: 2, sync: true })
  );
}
