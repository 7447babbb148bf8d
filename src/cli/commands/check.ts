/**
 * Check Command
 *
 * Compiles a linker document and prints its topology, or every problem
 * found in it. Pure function with dependency injection.
 */

import type { CliResult, OutputSection } from '../types/cli-result.js';
import { errorSection, failure, section, success } from '../types/cli-result.js';
import type { ReadConfigFileResult } from '../../application/use-cases/read-config-file.js';
import type { LinkerResult } from '../../document/linker-reader.js';
import type { LinkerDescription } from '../../linker/linker-config.js';
import { describeLinker } from '../../linker/linker-config.js';
import { formatAddress } from '../../linker/socket-address.js';
import { formatConfigError } from '../../core/errors/formatter.js';
import { readFailure } from './read-failure.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CheckCommandDeps {
  readonly readConfigFile: (filePath: string) => ReadConfigFileResult;
  readonly compile: (text: string, source: string) => LinkerResult;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeCheckCommand(filePath: string, deps: CheckCommandDeps): CliResult {
  const file = deps.readConfigFile(filePath);
  if (file.kind !== 'read') return readFailure(file);

  const linker = deps.compile(file.content, filePath);
  if (linker.isErr()) {
    const errors = linker.error;
    return failure(`Linker configuration rejected: ${filePath}`, {
      sections: [errorSection(errors.map((e) => e.message))],
      suggestions: unique(errors.map((e) => formatConfigError(e).actionable)),
    });
  }

  return success(`Linker configuration is valid: ${filePath}`, topologySections(describeLinker(linker.value)));
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/** Routers, then namers (when there are any), then the admin endpoint. */
export function topologySections(linker: LinkerDescription): readonly OutputSection[] {
  const routers = linker.routers.map((router) => {
    const servers = router.servers
      .map((s) => `${formatAddress({ ip: s.ip, port: s.port })}${s.tls ? ' (tls)' : ''}`)
      .join(', ');
    const dtab = router.baseDtab === '' ? '' : ` dtab ${router.baseDtab}`;
    return `${router.label} [${router.protocol}] ${router.dstPrefix} on ${servers}${dtab}`;
  });
  const namers = linker.namers.map((n) => `${n.kind} at ${n.prefix}`);

  return [
    section('Routers', routers),
    ...(namers.length > 0 ? [section('Namers', namers)] : []),
    section('Admin', [formatAddress(linker.admin)]),
  ];
}

function unique(values: readonly string[]): readonly string[] {
  return [...new Set(values)];
}
