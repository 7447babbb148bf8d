import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { logLevelFrom } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root pino logger: JSON lines on stderr (fd 2, synchronous) so that stdout
 * stays free for command output.
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: logLevelFrom(process.env),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 */
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
