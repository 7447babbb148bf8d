import type { ProcessExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process. The thrown error carries the
 * requested exit kind so tests can assert on it.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ProcessExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
