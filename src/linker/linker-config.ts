/**
 * The linker: every router, namer and the admin endpoint of one document,
 * validated together.
 */

import type { NameInterpreter } from '../naming/name-interpreter.js';
import { Dtab } from '../naming/dtab.js';
import type { ValidatedAdmin } from './admin-config.js';
import type { ValidatedNamer } from './namer-config.js';
import type { ValidatedRouter } from './router-config.js';
import type { SocketAddress } from './socket-address.js';

/** Linker-level values routers fall back to. */
export interface LinkerDefaults {
  readonly baseDtab: Dtab;
  readonly failFast: boolean;
  readonly namers: readonly ValidatedNamer[];
}

export const emptyLinkerDefaults: LinkerDefaults = {
  baseDtab: Dtab.empty,
  failFast: false,
  namers: [],
};

export interface ValidatedLinker {
  readonly routers: readonly ValidatedRouter[];
  readonly namers: readonly ValidatedNamer[];
  readonly admin: ValidatedAdmin;
  readonly baseDtab: Dtab;
  readonly failFast: boolean;
  /** Binds names through the configured namers. */
  readonly interpreter: NameInterpreter;
}

// =============================================================================
// Plain-data projection
// =============================================================================

export interface ServerDescription {
  readonly ip: string;
  readonly port: number;
  readonly tls: boolean;
  readonly params: unknown;
}

export interface RouterDescription {
  readonly label: string;
  readonly protocol: string;
  readonly dstPrefix: string;
  readonly baseDtab: string;
  readonly failFast: boolean;
  readonly servers: readonly ServerDescription[];
  readonly client: { readonly tls: string | null; readonly params: unknown } | null;
  readonly params: unknown;
}

export interface LinkerDescription {
  readonly routers: readonly RouterDescription[];
  readonly namers: readonly { readonly kind: string; readonly prefix: string }[];
  readonly admin: SocketAddress;
}

/** The linker as plain data, for display and comparison. */
export function describeLinker(linker: ValidatedLinker): LinkerDescription {
  return {
    routers: linker.routers.map((router) => ({
      label: router.label,
      protocol: router.protocol,
      dstPrefix: router.dstPrefix.show(),
      baseDtab: router.dtab.show(),
      failFast: router.failFast,
      servers: router.servers.map((server) => ({
        ip: server.addr.ip,
        port: server.addr.port,
        tls: server.tls !== undefined,
        params: server.params,
      })),
      client: router.client === undefined ? null : { tls: router.client.tls?.kind ?? null, params: router.client.params },
      params: router.params,
    })),
    namers: linker.namers.map((namer) => ({ kind: namer.kind, prefix: namer.prefix.show() })),
    admin: linker.admin.addr,
  };
}
