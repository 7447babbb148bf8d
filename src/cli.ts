#!/usr/bin/env node
/**
 * switchyard CLI - Composition Root
 *
 * Wires dependencies for each command and turns the CliResult into an exit
 * code. No business logic lives here; see src/cli/commands/*.ts.
 */

import 'reflect-metadata';
import { Command, CommanderError } from 'commander';
import fs from 'fs';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import path from 'path';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { LinkerCompiler } from './application/linker-compiler.js';
import { createReadConfigFileUseCase } from './application/use-cases/read-config-file.js';
import type { AppError } from './errors/app-error.js';
import { formatAppError } from './errors/formatter.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure, misuse } from './cli/types/cli-result.js';
import { executeCheckCommand, executeDelegateCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

const readConfigFile = createReadConfigFileUseCase({
  resolvePath: path.resolve,
  existsSync: fs.existsSync,
  readFileSyncUtf8: (resolvedPath: string) => fs.readFileSync(resolvedPath, 'utf-8'),
});

interface Services {
  readonly compiler: LinkerCompiler;
  readonly terminator: ProcessTerminator;
}

async function services(): Promise<Result<Services, AppError>> {
  const init = await initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (init.isErr()) return err(init.error);
  return ok({
    compiler: container.resolve<LinkerCompiler>(DI.Services.LinkerCompiler),
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
  });
}

function startupFailure(error: AppError): void {
  interpretCliResultWithoutDI(failure(formatAppError(error)));
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('switchyard')
  .description('Compile reverse-proxy linker configurations and resolve names through them')
  .version('0.1.0')
  .exitOverride();

program
  .command('check <file>')
  .description('Validate a linker configuration and print its routers, namers and admin endpoint')
  .action(async (filePath: string) => {
    const deps = await services();
    if (deps.isErr()) return startupFailure(deps.error);
    const { compiler, terminator } = deps.value;
    const result = executeCheckCommand(filePath, {
      readConfigFile,
      compile: (text, source) => compiler.compile(text, source),
    });
    interpretCliResult(result, terminator);
  });

program
  .command('delegate <file> <path>')
  .description('Bind a path through a router dtab and the configured namers')
  .option('-r, --router <label>', 'Router whose dtab is used (defaults to the first router)')
  .option('-d, --dtab <dtab>', 'Extra dentries appended to the router dtab')
  .action(async (filePath: string, name: string, options: { router?: string; dtab?: string }) => {
    const deps = await services();
    if (deps.isErr()) return startupFailure(deps.error);
    const { compiler, terminator } = deps.value;
    const result = executeDelegateCommand(filePath, name, options, {
      readConfigFile,
      compile: (text, source) => compiler.compile(text, source),
      delegate: (linker, request) => compiler.delegate(linker, request),
    });
    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((e: unknown) => {
  if (e instanceof CommanderError) {
    // commander already printed help/version or the usage error
    if (e.exitCode === 0) return;
    interpretCliResultWithoutDI(misuse(e.message, ['Run "switchyard --help" for usage']));
    return;
  }
  interpretCliResultWithoutDI(failure(e instanceof Error ? e.message : String(e)));
});
