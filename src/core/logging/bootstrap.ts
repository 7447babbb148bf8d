import pino from 'pino';
import type { Logger } from './types.js';
import { logLevelFrom } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for code that runs before the DI container exists
 * (container initialization, plugin discovery).
 *
 * Once DI is ready, inject ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: logLevelFrom(process.env),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
