/**
 * CLI Result Interpreter
 *
 * The only place a CliResult turns into process termination.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Print the result and terminate on failure through the injected terminator.
 */
export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator
): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally.
      return;

    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}

/**
 * Interpret a CLI result without DI, for failures before the container exists.
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
