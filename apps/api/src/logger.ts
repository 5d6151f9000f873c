/**
 * Structured logger.
 *
 * JSON lines through pino. Level comes from LOG_LEVEL (default `info`);
 * the test config sets it to `silent`.
 */

import { pino, type Logger } from 'pino'

export type { Logger }

export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    level,
    base: { app: 'pushrelay-api' },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}
