/**
 * Admin endpoint configuration. Binds to every interface on port 9990
 * unless told otherwise.
 */

import { z } from 'zod';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { ConfigNode } from '../document/config-node.js';
import { checkKnownKeys, paramParser } from '../plugins/param-parser.js';
import type { Validated } from '../validation/validated.js';
import { combine, invalid, valid } from '../validation/validated.js';
import { childLocation, locationName } from '../validation/zod-issues.js';
import type { SocketAddress } from './socket-address.js';
import { WILDCARD_IP, resolveIp } from './socket-address.js';
import { isValidPort } from './server-config.js';

export const DEFAULT_ADMIN_PORT = 9990;

export interface AdminConfig {
  readonly ip?: string | undefined;
  readonly port?: number | undefined;
  readonly location: string;
}

export interface ValidatedAdmin {
  readonly addr: SocketAddress;
}

const adminFields = paramParser({
  ip: z.string().optional(),
  port: z.number().optional(),
});

export function readAdmin(node: ConfigNode): Validated<ConfigError, AdminConfig> {
  if (node.kind !== 'map') {
    return invalid(ConfigErr.invalidParameter(locationName(node.location), 'expected a mapping', node.location));
  }
  const fields = node.fields();
  return combine(
    checkKnownKeys(fields, [adminFields.keys], node.location),
    adminFields.parse(fields, node.location),
    (_, admin) => ({ ...admin, location: node.location }),
  );
}

export function validateAdmin(admin: AdminConfig): Validated<ConfigError, ValidatedAdmin> {
  const resolved = admin.ip === undefined ? resolveIp(WILDCARD_IP) : resolveIp(admin.ip);
  const ip: Validated<ConfigError, string> = resolved.isOk()
    ? valid(resolved.value)
    : invalid(ConfigErr.invalidIp(resolved.error, childLocation(admin.location, 'ip')));

  const portValue = admin.port ?? DEFAULT_ADMIN_PORT;
  const port: Validated<ConfigError, number> = isValidPort(portValue)
    ? valid(portValue)
    : invalid(ConfigErr.invalidPort(portValue, childLocation(admin.location, 'port')));

  return combine(ip, port, (i, p) => ({ addr: { ip: i, port: p } }));
}

export const defaultAdmin: ValidatedAdmin = { addr: { ip: WILDCARD_IP, port: DEFAULT_ADMIN_PORT } };
