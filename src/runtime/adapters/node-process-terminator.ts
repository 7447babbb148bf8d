import type { ProcessExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ProcessExitCode): never {
    switch (code.kind) {
      case 'success':
        return process.exit(0);
      case 'failure':
        return process.exit(1);
      case 'misuse':
        return process.exit(2);
      default:
        return assertNever(code);
    }
  }
}
