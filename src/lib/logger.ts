/**
 * Structured logger
 *
 * One root pino logger; components take a child with `component` bound.
 */

import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'restaurant-advisor' },
  ...(process.env.NODE_ENV === 'development' && {
    transport: { target: 'pino-pretty', options: { colorize: true } },
  }),
});

/**
 * Apply the configured level. Children copy the level when created, so
 * call this before any service is wired.
 */
export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
