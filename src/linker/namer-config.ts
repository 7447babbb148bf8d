/**
 * Namer configuration: one entry of the top-level `namers` list.
 */

import { z } from 'zod';
import { err } from 'neverthrow';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { ConfigNode } from '../document/config-node.js';
import type { Namer } from '../naming/name-interpreter.js';
import { Path } from '../naming/path.js';
import type { AnyNamerPlugin } from '../plugins/namer-plugin.js';
import { checkKnownKeys, paramParser } from '../plugins/param-parser.js';
import type { PluginRegistry } from '../plugins/plugin-registry.js';
import type { Validated } from '../validation/validated.js';
import { combine, invalid, valid } from '../validation/validated.js';
import { childLocation } from '../validation/zod-issues.js';
import { readPluginKind } from './plugin-kind.js';

export interface NamerConfig {
  readonly plugin: AnyNamerPlugin;
  readonly prefix?: string | undefined;
  readonly params: unknown;
  readonly location: string;
}

export interface DefaultedNamer {
  readonly plugin: AnyNamerPlugin;
  readonly prefix: string;
  readonly params: unknown;
  readonly location: string;
}

export interface ValidatedNamer {
  readonly kind: string;
  readonly prefix: Path;
  readonly namer: Namer;
  readonly location: string;
}

const namerFields = paramParser({
  kind: z.string(),
  prefix: z.string().optional(),
});

export function readNamer(node: ConfigNode, registry: PluginRegistry<AnyNamerPlugin>): Validated<ConfigError, NamerConfig> {
  const kind = readPluginKind(node, 'kind', registry);
  if (kind.isErr()) return err(kind.error);
  const plugin = kind.value;

  const fields = node.fields();
  const known = checkKnownKeys(fields, [namerFields.keys, plugin.params.keys], node.location);
  const generic = namerFields.parse(fields, node.location);
  const params = plugin.params.parse(fields, node.location);

  return combine(known, combine(generic, params, (g, p) => ({ prefix: g.prefix, params: p })), (_, namer) => ({
    plugin,
    ...namer,
    location: node.location,
  }));
}

export function namerWithDefaults(namer: NamerConfig): DefaultedNamer {
  return { ...namer, prefix: namer.prefix ?? namer.plugin.defaultPrefix };
}

/** Parse the prefix and build the namer. A blank prefix is MissingPath; `/` mounts the namer at the root. */
export function validateNamer(namer: DefaultedNamer): Validated<ConfigError, ValidatedNamer> {
  const location = childLocation(namer.location, 'prefix');
  if (namer.prefix.trim() === '') return invalid(ConfigErr.missingPath(location));

  const prefix = Path.read(namer.prefix.trim());
  if (prefix.isErr()) return invalid(ConfigErr.invalidPath(namer.prefix, prefix.error, location));

  return valid({
    kind: namer.plugin.kind,
    prefix: prefix.value,
    namer: namer.plugin.mk(namer.params, { prefix: prefix.value }),
    location: namer.location,
  });
}
