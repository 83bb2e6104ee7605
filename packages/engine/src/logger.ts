/**
 * logger.ts: Structured logger (Pino)
 *
 * Single logger instance for the engine package.
 * JSON lines to stdout, ISO timestamps.
 *
 * Usage:
 *   import { logger } from './logger.ts';
 *   logger.info({ records: 120 }, 'Index built');
 *   logger.error({ err }, 'Something failed');
 */

import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  base: { service: 'threadseek-engine' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Error → loggable message, the way every catch block reports it */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
