import { isLogLevel, type LogLevel } from './types.js';

export const LOG_LEVEL_ENV = 'KEYSMITH_LOG_LEVEL';

/**
 * KEYSMITH_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent. Stdout carries generated values, so logs stay off unless asked for.
 */
export function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}
