/**
 * CLI Output Formatter
 *
 * Renders a CliResult with chalk: a status line, one block per section,
 * then the suggestions.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput, OutputSection } from './types/cli-result.js';

function formatSection({ title, lines }: OutputSection): readonly string[] {
  return ['', chalk.bold(`${title}:`), ...lines.map((line) => chalk.white(`  • ${line}`))];
}

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const status = isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`);
  const sections = (output.sections ?? []).filter((s) => s.lines.length > 0).flatMap(formatSection);
  const suggestions = output.suggestions ?? [];

  return [
    status,
    ...sections,
    ...(suggestions.length > 0
      ? ['', chalk.gray('💡 Suggestions:'), ...suggestions.map((s) => chalk.gray(`  • ${s}`))]
      : []),
  ].join('\n');
}

export function formatResult(result: CliResult): string {
  return formatOutput(result.output, result.kind === 'failure');
}

/** Failures go to stderr, everything else to stdout. */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (result.kind === 'failure') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}
