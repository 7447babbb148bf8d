/**
 * Typed exit codes for CLI commands, following Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0
  | { kind: 'general_error' }  // 1 - the document was rejected, or a lookup failed
  | { kind: 'misuse' };        // 2 - bad arguments, unreadable file

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): { kind: 'success' } | { kind: 'failure' } | { kind: 'misuse' } {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Numeric value for raw process.exit().
 * Only for composition root paths that run before the container exists.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
