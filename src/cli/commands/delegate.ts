/**
 * Delegate Command
 *
 * Compiles a linker document, then binds a path through one router's dtab
 * and the configured namers.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { errorSection, failure, misuse, section, success } from '../types/cli-result.js';
import type { ReadConfigFileResult } from '../../application/use-cases/read-config-file.js';
import type { DelegateError, DelegateRequest, Delegation } from '../../application/linker-compiler.js';
import type { LinkerResult } from '../../document/linker-reader.js';
import type { ValidatedLinker } from '../../linker/linker-config.js';
import { formatAddress } from '../../linker/socket-address.js';
import type { BoundName } from '../../naming/name-interpreter.js';
import { showTree } from '../../naming/name-tree.js';
import { assertNever } from '../../runtime/assert-never.js';
import { readFailure } from './read-failure.js';

export interface DelegateCommandDeps {
  readonly readConfigFile: (filePath: string) => ReadConfigFileResult;
  readonly compile: (text: string, source: string) => LinkerResult;
  readonly delegate: (linker: ValidatedLinker, request: DelegateRequest) => Result<Delegation, DelegateError>;
}

export interface DelegateCommandOptions {
  readonly router?: string;
  readonly dtab?: string;
}

export function executeDelegateCommand(
  filePath: string,
  path: string,
  options: DelegateCommandOptions,
  deps: DelegateCommandDeps,
): CliResult {
  const file = deps.readConfigFile(filePath);
  if (file.kind !== 'read') return readFailure(file);

  const linker = deps.compile(file.content, filePath);
  if (linker.isErr()) {
    return failure(`Linker configuration rejected: ${filePath}`, {
      sections: [errorSection(linker.error.map((e) => e.message))],
      suggestions: [`Run "switchyard check ${filePath}" for details`],
    });
  }

  const delegation = deps.delegate(linker.value, { router: options.router, path, extraDtab: options.dtab });
  if (delegation.isErr()) return delegateFailure(delegation.error);

  const { router, dtab, tree } = delegation.value;
  return success(`${delegation.value.path.show()} => ${tree === undefined ? '(no result)' : showTree(tree, showBound)}`, [
    section('Binding', [`router: ${router}`, `dtab: ${dtab.show() || '(empty)'}`]),
  ]);
}

export function showBound(bound: BoundName): string {
  const residual = bound.residual.isEmpty ? '' : ` residual ${bound.residual.show()}`;
  const addresses = bound.addresses.map(formatAddress).join(', ');
  return `${bound.id.show()}${residual} [${addresses}]`;
}

function delegateFailure(error: DelegateError): CliResult {
  switch (error._tag) {
    case 'RouterNotFound':
      return misuse(
        `No router labelled "${error.label}"`,
        error.known.length > 0 ? [`Known routers: ${error.known.join(', ')}`] : undefined,
      );
    case 'InvalidPath':
      return misuse(`Invalid path "${error.text}": ${error.cause}`, ['Paths look like /svc/name']);
    case 'InvalidDtab':
      return misuse(`Invalid dtab "${error.text}": ${error.cause}`, ['Dentries look like /svc => /fs']);
    default:
      return assertNever(error);
  }
}
