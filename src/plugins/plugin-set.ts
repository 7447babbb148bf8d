/**
 * Plugin sets and the registries built from them.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { AnyProtocolPlugin } from './protocol-plugin.js';
import type { AnyNamerPlugin } from './namer-plugin.js';
import type { AnyClientTlsPlugin } from './tls-plugin.js';
import type { DuplicatePluginError, PluginRegistry } from './plugin-registry.js';
import { createPluginRegistry } from './plugin-registry.js';
import { httpProtocol } from './protocols/http.js';
import { thriftProtocol } from './protocols/thrift.js';
import { fsNamer } from './namers/fs-namer.js';
import { noValidationTls, staticTls } from './tls/basic-tls.js';
import { boundPathTls } from './tls/bound-path-tls.js';

/** What a plugin module contributes. Every list is optional in a module. */
export interface PluginSet {
  readonly protocols: readonly AnyProtocolPlugin[];
  readonly namers: readonly AnyNamerPlugin[];
  readonly tlsClients: readonly AnyClientTlsPlugin[];
}

export interface PluginRegistries {
  readonly protocols: PluginRegistry<AnyProtocolPlugin>;
  readonly namers: PluginRegistry<AnyNamerPlugin>;
  readonly tlsClients: PluginRegistry<AnyClientTlsPlugin>;
}

export const builtinPlugins: PluginSet = {
  protocols: [httpProtocol, thriftProtocol],
  namers: [fsNamer],
  tlsClients: [noValidationTls, staticTls, boundPathTls],
};

/** Merge plugin sets into registries. A key claimed twice is an error. */
export function buildRegistries(sets: readonly PluginSet[]): Result<PluginRegistries, DuplicatePluginError> {
  const protocols = createPluginRegistry('protocol', sets.flatMap((s) => s.protocols), (p) => p.name);
  if (protocols.isErr()) return err(protocols.error);

  const namers = createPluginRegistry('namer', sets.flatMap((s) => s.namers), (p) => p.kind);
  if (namers.isErr()) return err(namers.error);

  const tlsClients = createPluginRegistry('tls', sets.flatMap((s) => s.tlsClients), (p) => p.kind);
  if (tlsClients.isErr()) return err(tlsClients.error);

  return ok({ protocols: protocols.value, namers: namers.value, tlsClients: tlsClients.value });
}
