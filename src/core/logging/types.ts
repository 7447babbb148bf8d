import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's own Logger, no wrapper.
 *
 * Data first, message second:
 *   logger.debug({ label: 'http', servers: 2 }, 'router admitted');
 *   logger.warn({ errors: 3 }, 'document rejected');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const LOG_LEVEL_ENV = 'SWITCHYARD_LOG_LEVEL';

/**
 * Read the log level from the environment.
 *
 * SWITCHYARD_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent. The CLI prints its own results; logs are for debugging.
 */
export function logLevelFrom(env: Record<string, string | undefined>): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}
