export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  StartupFailedError,
  StartupPhase,
  UnexpectedError,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
