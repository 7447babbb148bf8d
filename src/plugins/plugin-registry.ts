/**
 * Plugin Registry
 *
 * Read-only lookup from a config key (`http`, `fs`, `static`, ...) to the
 * plugin that owns it. One shape serves the protocol, namer and client TLS
 * registries. Registries are built once at startup and never change.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { PluginNotFoundError, PluginRegistryKind } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';

export interface PluginRegistry<P> {
  readonly kind: PluginRegistryKind;
  readonly resolve: (key: string, location: string) => Result<P, PluginNotFoundError>;
  readonly has: (key: string) => boolean;
  readonly knownKeys: () => readonly string[];
}

export type DuplicatePluginError = {
  readonly code: 'DUPLICATE_PLUGIN';
  readonly registry: PluginRegistryKind;
  readonly key: string;
  readonly message: string;
};

/** Build a registry; two plugins claiming the same key is an error. */
export function createPluginRegistry<P>(
  kind: PluginRegistryKind,
  plugins: readonly P[],
  keyOf: (plugin: P) => string,
): Result<PluginRegistry<P>, DuplicatePluginError> {
  const byKey = new Map<string, P>();

  for (const plugin of plugins) {
    const key = keyOf(plugin);
    if (byKey.has(key)) {
      return err({
        code: 'DUPLICATE_PLUGIN',
        registry: kind,
        key,
        message: `${kind} plugin "${key}" is registered more than once`,
      });
    }
    byKey.set(key, plugin);
  }

  const knownKeys = [...byKey.keys()];

  const registry: PluginRegistry<P> = {
    kind,
    resolve(key, location) {
      const plugin = byKey.get(key);
      if (plugin === undefined) {
        return err(ConfigErr.pluginNotFound(key, kind, knownKeys, location));
      }
      return ok(plugin);
    },
    has: (key) => byKey.has(key),
    knownKeys: () => knownKeys,
  };
  return ok(registry);
}
