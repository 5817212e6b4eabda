import { pino, type Logger } from 'pino';
import type { LoggingConfig } from '../config/index.js';

export type { Logger };

/**
 * Root logger. Components derive their own via `logger.child({ component })`.
 */
export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: 'habitloop',
    level: config.level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Message of an unknown thrown value, for structured log fields. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
