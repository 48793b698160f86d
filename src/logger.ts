import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config';

export type { Logger };

export interface LoggerConfig {
  level?: LogLevel;
  base?: Record<string, unknown>;
}

/**
 * Root logger for the service. Components take a child:
 *
 * @example
 * ```typescript
 * const log = logger.child({ component: 'BondService' });
 * log.info({ count: 20 }, 'Bond snapshot refreshed');
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return pino({
    level: config.level ?? 'info',
    base: { service: 'bond-dashboard', ...config.base },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Logger that drops everything, for tests
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
