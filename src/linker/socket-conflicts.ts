/**
 * Socket conflict checks.
 *
 * Two bind addresses conflict when both have a concrete port, the ports are
 * equal, and either one of them is the wildcard address or both are the
 * same address. Ephemeral ports never conflict.
 */

import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { SocketAddress } from './socket-address.js';
import { EPHEMERAL_PORT, isWildcard } from './socket-address.js';

export function conflicts(a: SocketAddress, b: SocketAddress): boolean {
  if (a.port === EPHEMERAL_PORT || b.port === EPHEMERAL_PORT) return false;
  if (a.port !== b.port) return false;
  return isWildcard(a.ip) || isWildcard(b.ip) || a.ip === b.ip;
}

export interface CandidateServer {
  readonly addr: SocketAddress;
  readonly location: string;
}

/**
 * Every conflict of a router's servers, in server order.
 *
 * Each server is checked against all servers already admitted (other
 * routers, reported as ConflictingPorts) and then against the servers
 * before it in the same router (ConflictingServers). The earlier address is
 * always reported first.
 */
export function findSocketConflicts(
  servers: readonly CandidateServer[],
  admitted: readonly SocketAddress[],
): readonly ConfigError[] {
  return servers.flatMap((server, i) => [
    ...admitted
      .filter((other) => conflicts(other, server.addr))
      .map((other) => ConfigErr.conflictingPorts(other, server.addr, server.location)),
    ...servers
      .slice(0, i)
      .filter((other) => conflicts(other.addr, server.addr))
      .map((other) => ConfigErr.conflictingServers(other.addr, server.addr, server.location)),
  ]);
}
