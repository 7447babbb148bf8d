/**
 * Process configuration - parse, don't validate.
 *
 * Only what the environment controls lives here. Everything about routers
 * and namers comes from the linker document.
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../errors/app-error.js';
import type { ErrorMode } from '../document/linker-reader.js';

export interface AppConfig {
  readonly compile: {
    readonly errorMode: ErrorMode;
  };
  readonly plugins: {
    /** Module specifiers loaded on top of the built-in plugins. */
    readonly modules: readonly string[];
    /** Directory relative plugin specifiers resolve against. */
    readonly baseDir: string;
  };
}

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
}

// =============================================================================
// Schema
// =============================================================================

const EnvSchema = z.object({
  SWITCHYARD_ERROR_MODE: z.enum(['accumulate', 'first_error']).default('accumulate'),

  SWITCHYARD_PLUGINS: z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<AppConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data, options.cwd));
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, cwd: string): AppConfig {
  return {
    compile: { errorMode: env.SWITCHYARD_ERROR_MODE },
    plugins: { modules: env.SWITCHYARD_PLUGINS, baseDir: cwd },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
