// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, isLogLevel } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

export { resolveLogLevel, LOG_LEVEL_ENV } from './log-level.js';

// Redaction config (for testing/verification)
export { REDACTION_CONFIG } from './redaction.js';
