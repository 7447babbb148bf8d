/**
 * CLI Result Types
 *
 * Commands return these; the composition root prints them and turns a
 * failure into an exit code.
 */

import type { ExitCode } from './exit-code.js';

/** A titled block of lines: the routers of a linker, the errors of a document. */
export interface OutputSection {
  readonly title: string;
  readonly lines: readonly string[];
}

export interface CliOutput {
  readonly message: string;
  readonly sections?: readonly OutputSection[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function section(title: string, lines: readonly string[]): OutputSection {
  return { title, lines };
}

/** The problems of a rejected document, titled with their count. */
export function errorSection(messages: readonly string[]): OutputSection {
  return section(`Found ${messages.length} error${messages.length === 1 ? '' : 's'}`, messages);
}

export function success(message: string, sections?: readonly OutputSection[]): CliResult {
  return { kind: 'success', output: { message, sections } };
}

/** A failed command; exits with general_error unless told otherwise. */
export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    sections?: readonly OutputSection[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      sections: options?.sections,
      suggestions: options?.suggestions,
    },
  };
}

/** Bad arguments or an unusable input file. */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return failure(message, { exitCode: { kind: 'misuse' }, suggestions });
}
