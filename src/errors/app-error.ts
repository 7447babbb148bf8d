/**
 * Errors that stop the process before any document is read.
 * Document problems are ConfigError values, not AppErrors.
 */

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: StartupPhase;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type StartupPhase = 'config' | 'plugin_load' | 'plugin_registry';

export type AppError = ConfigInvalidError | StartupFailedError | UnexpectedError;
