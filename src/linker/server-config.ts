/**
 * Server configuration: one listening socket of a router.
 */

import { z } from 'zod';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { ConfigNode } from '../document/config-node.js';
import type { AnyProtocolPlugin } from '../plugins/protocol-plugin.js';
import { checkKnownKeys, paramParser } from '../plugins/param-parser.js';
import type { Validated } from '../validation/validated.js';
import { combine, invalid, valid } from '../validation/validated.js';
import { childLocation, locationName } from '../validation/zod-issues.js';
import type { SocketAddress } from './socket-address.js';
import { EPHEMERAL_PORT, resolveIp } from './socket-address.js';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export interface ServerTlsConfig {
  readonly certPath: string;
  readonly keyPath: string;
}

export interface ServerConfig {
  readonly ip?: string | undefined;
  readonly port?: number | undefined;
  readonly tls?: ServerTlsConfig | undefined;
  readonly params: unknown;
  readonly location: string;
}

export interface ServerDefaults {
  /** The protocol's default port, if it has one. */
  readonly port?: number | undefined;
}

/** Where a server's port came from. */
export type PortSource = 'config' | 'protocol' | 'ephemeral';

/** A server with its fallbacks applied; nothing checked yet. */
export interface DefaultedServer {
  readonly ip?: string | undefined;
  readonly port: number;
  readonly portSource: PortSource;
  readonly tls?: ServerTlsConfig | undefined;
  readonly params: unknown;
  readonly location: string;
}

export interface ValidatedServer {
  readonly addr: SocketAddress;
  readonly tls?: ServerTlsConfig | undefined;
  readonly params: unknown;
  readonly location: string;
}

const serverFields = paramParser({
  ip: z.string().optional(),
  port: z.number().optional(),
  tls: z
    .object({
      certPath: z.string(),
      keyPath: z.string(),
    })
    .strict()
    .optional(),
});

export function readServer(node: ConfigNode, protocol: AnyProtocolPlugin): Validated<ConfigError, ServerConfig> {
  if (node.kind !== 'map') {
    return invalid(ConfigErr.invalidParameter(locationName(node.location), 'expected a mapping', node.location));
  }

  const fields = node.fields();
  const known = checkKnownKeys(fields, [serverFields.keys, protocol.serverParams.keys], node.location);
  const generic = serverFields.parse(fields, node.location);
  const params = protocol.serverParams.parse(fields, node.location);

  return combine(known, combine(generic, params, (g, p) => ({ ...g, params: p })), (_, server) => ({
    ...server,
    location: node.location,
  }));
}

export function serverWithDefaults(server: ServerConfig, defaults: ServerDefaults): DefaultedServer {
  if (server.port !== undefined) return { ...server, port: server.port, portSource: 'config' };
  if (defaults.port !== undefined) return { ...server, port: defaults.port, portSource: 'protocol' };
  return { ...server, port: EPHEMERAL_PORT, portSource: 'ephemeral' };
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

/**
 * Check the bind address of one server.
 *
 * A configured port must be in range, so an explicit 0 is rejected; only a
 * server with no port from anywhere is ephemeral. Conflicts with other
 * servers are checked separately.
 */
export function validateServer(server: DefaultedServer): Validated<ConfigError, ValidatedServer> {
  const resolved = resolveIp(server.ip);
  const ip: Validated<ConfigError, string> = resolved.isOk()
    ? valid(resolved.value)
    : invalid(ConfigErr.invalidIp(resolved.error, childLocation(server.location, 'ip')));

  const port: Validated<ConfigError, number> =
    server.portSource !== 'ephemeral' && !isValidPort(server.port)
      ? invalid(ConfigErr.invalidPort(server.port, childLocation(server.location, 'port')))
      : valid(server.port);

  return combine(ip, port, (addrIp, addrPort) => ({
    addr: { ip: addrIp, port: addrPort },
    tls: server.tls,
    params: server.params,
    location: server.location,
  }));
}
