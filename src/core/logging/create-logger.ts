import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { resolveLogLevel } from './log-level.js';

/**
 * Root pino logger.
 *
 * - Sync output to stderr: stdout is reserved for generated values
 * - JSON lines for machine parsing
 * - Redaction of anything that could hold a secret
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(process.env),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
