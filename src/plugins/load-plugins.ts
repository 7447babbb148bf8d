/**
 * External plugin discovery.
 *
 * A plugin module is any ES module exporting some of `protocols`, `namers`
 * and `tlsClients`, each an array of plugins. Modules are named by the
 * operator (SWITCHYARD_PLUGINS); paths are taken relative to the working
 * directory, anything else is imported as a package.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { AnyProtocolPlugin } from './protocol-plugin.js';
import type { AnyNamerPlugin } from './namer-plugin.js';
import type { AnyClientTlsPlugin } from './tls-plugin.js';
import type { ParamParser } from './param-parser.js';
import type { PluginSet } from './plugin-set.js';

export type PluginLoadError = {
  readonly code: 'PLUGIN_IMPORT_FAILED' | 'PLUGIN_SHAPE_INVALID';
  readonly specifier: string;
  readonly message: string;
};

export interface LoadPluginsDeps {
  readonly importModule: (specifier: string) => Promise<unknown>;
  readonly cwd: string;
}

export function toImportSpecifier(specifier: string, cwd: string): string {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href;
  }
  return specifier;
}

/** Import every module in order; the first failure stops discovery. */
export async function loadPluginModules(
  specifiers: readonly string[],
  deps: LoadPluginsDeps,
): Promise<Result<readonly PluginSet[], PluginLoadError>> {
  const sets: PluginSet[] = [];

  for (const specifier of specifiers) {
    let mod: unknown;
    try {
      mod = await deps.importModule(toImportSpecifier(specifier, deps.cwd));
    } catch (e) {
      return err({
        code: 'PLUGIN_IMPORT_FAILED',
        specifier,
        message: `Failed to import plugin module "${specifier}": ${e instanceof Error ? e.message : String(e)}`,
      });
    }

    const set = toPluginSet(mod);
    if (set.isErr()) {
      return err({ code: 'PLUGIN_SHAPE_INVALID', specifier, message: `Plugin module "${specifier}": ${set.error}` });
    }
    sets.push(set.value);
  }

  return ok(sets);
}

// =============================================================================
// Shape checks
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isParamParser(value: unknown): value is ParamParser<unknown> {
  return isRecord(value) && value['keys'] instanceof Set && typeof value['parse'] === 'function';
}

function isProtocolPlugin(value: unknown): value is AnyProtocolPlugin {
  return (
    isRecord(value) &&
    typeof value['name'] === 'string' &&
    (value['defaultServerPort'] === undefined || typeof value['defaultServerPort'] === 'number') &&
    isParamParser(value['routerParams']) &&
    isParamParser(value['serverParams']) &&
    isParamParser(value['clientParams']) &&
    typeof value['identifier'] === 'function'
  );
}

function isNamerPlugin(value: unknown): value is AnyNamerPlugin {
  return (
    isRecord(value) &&
    typeof value['kind'] === 'string' &&
    typeof value['defaultPrefix'] === 'string' &&
    isParamParser(value['params']) &&
    typeof value['mk'] === 'function'
  );
}

function isClientTlsPlugin(value: unknown): value is AnyClientTlsPlugin {
  return (
    isRecord(value) &&
    typeof value['kind'] === 'string' &&
    isParamParser(value['params']) &&
    typeof value['mk'] === 'function'
  );
}

function pluginList<P>(
  mod: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is P,
): Result<readonly P[], string> {
  const list = mod[key];
  if (list === undefined) return ok([]);
  if (!Array.isArray(list)) return err(`"${key}" must be an array`);

  const plugins: P[] = [];
  for (const [i, entry] of list.entries()) {
    if (!guard(entry)) return err(`${key}[${i}] is not a valid plugin`);
    plugins.push(entry);
  }
  return ok(plugins);
}

export function toPluginSet(mod: unknown): Result<PluginSet, string> {
  if (!isRecord(mod)) return err('module has no exports');

  const protocols = pluginList(mod, 'protocols', isProtocolPlugin);
  if (protocols.isErr()) return err(protocols.error);
  const namers = pluginList(mod, 'namers', isNamerPlugin);
  if (namers.isErr()) return err(namers.error);
  const tlsClients = pluginList(mod, 'tlsClients', isClientTlsPlugin);
  if (tlsClients.isErr()) return err(tlsClients.error);

  if (protocols.value.length + namers.value.length + tlsClients.value.length === 0) {
    return err('module exports no protocols, namers or tlsClients');
  }

  return ok({ protocols: protocols.value, namers: namers.value, tlsClients: tlsClients.value });
}
