import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's own, no wrapper.
 *
 * Data-first calls, pino style:
 *   logger.info({ count: 5 }, 'Generated passwords');
 *   logger.error({ err: error }, 'Saving output failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Child logger tagged with a component name */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
