/**
 * Port for terminating the current process.
 * Only composition roots hold one.
 */
export type ProcessExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ProcessExitCode): never;
}
