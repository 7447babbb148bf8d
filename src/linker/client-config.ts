/**
 * Client configuration: how a router talks to the destinations it resolves.
 */

import { err } from 'neverthrow';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { ConfigNode } from '../document/config-node.js';
import type { AnyProtocolPlugin } from '../plugins/protocol-plugin.js';
import type { AnyClientTlsPlugin, ClientTlsPolicy } from '../plugins/tls-plugin.js';
import type { PluginRegistry } from '../plugins/plugin-registry.js';
import { checkKnownKeys } from '../plugins/param-parser.js';
import type { Validated } from '../validation/validated.js';
import { combine, invalid, valid } from '../validation/validated.js';
import { locationName } from '../validation/zod-issues.js';
import { readPluginKind } from './plugin-kind.js';

export interface ClientTlsConfig {
  readonly plugin: AnyClientTlsPlugin;
  readonly params: unknown;
}

export interface ClientConfig {
  readonly tls?: ClientTlsConfig | undefined;
  readonly params: unknown;
  readonly location: string;
}

export interface ValidatedClientTls {
  readonly kind: string;
  readonly policy: ClientTlsPolicy;
}

export interface ValidatedClient {
  readonly tls?: ValidatedClientTls | undefined;
  readonly params: unknown;
}

const TLS_KEY = 'tls';
const CLIENT_KEYS: ReadonlySet<string> = new Set([TLS_KEY]);
const TLS_KIND_KEYS: ReadonlySet<string> = new Set(['kind']);

function readClientTls(node: ConfigNode, registry: PluginRegistry<AnyClientTlsPlugin>): Validated<ConfigError, ClientTlsConfig> {
  const kind = readPluginKind(node, 'kind', registry);
  if (kind.isErr()) return err(kind.error);
  const plugin = kind.value;

  const fields = node.fields();
  return combine(
    checkKnownKeys(fields, [TLS_KIND_KEYS, plugin.params.keys], node.location),
    plugin.params.parse(fields, node.location),
    (_, params) => ({ plugin, params }),
  );
}

export function readClient(
  node: ConfigNode,
  protocol: AnyProtocolPlugin,
  tlsRegistry: PluginRegistry<AnyClientTlsPlugin>,
): Validated<ConfigError, ClientConfig> {
  if (node.kind !== 'map') {
    return invalid(ConfigErr.invalidParameter(locationName(node.location), 'expected a mapping', node.location));
  }

  const fields = node.fields();
  const tlsNode = fields.find((f) => f.key === TLS_KEY)?.node;
  const tls: Validated<ConfigError, ClientTlsConfig | undefined> =
    tlsNode === undefined || tlsNode.isNull ? valid(undefined) : readClientTls(tlsNode, tlsRegistry);

  return combine(
    checkKnownKeys(fields, [CLIENT_KEYS, protocol.clientParams.keys], node.location),
    combine(tls, protocol.clientParams.parse(fields, node.location), (t, params) => ({ tls: t, params })),
    (_, client) => ({ ...client, location: node.location }),
  );
}

/** Builds the TLS policy; the plugin's parameters were already checked when the client was read. */
export function validateClient(client: ClientConfig): ValidatedClient {
  if (client.tls === undefined) return { params: client.params };
  return {
    tls: { kind: client.tls.plugin.kind, policy: client.tls.plugin.mk(client.tls.params) },
    params: client.params,
  };
}
