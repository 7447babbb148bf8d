/**
 * Router configuration.
 *
 * A router is read in three steps, each a pure function of the previous
 * result:
 *
 *   readRouter          node          -> RouterConfig     (shape and types)
 *   routerWithDefaults  RouterConfig  -> DefaultedRouter  (fallbacks applied)
 *   validateRouter      DefaultedRouter, admitted -> ValidatedRouter
 *
 * Fallbacks, first present wins:
 *   label      own, protocol name
 *   dstPrefix  own, /<protocol name>
 *   baseDtab   own, linker baseDtab, empty
 *   failFast   own, linker failFast, false
 */

import { z } from 'zod';
import { err } from 'neverthrow';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { ConfigNode } from '../document/config-node.js';
import { Dtab } from '../naming/dtab.js';
import { Path } from '../naming/path.js';
import { checkKnownKeys, paramParser } from '../plugins/param-parser.js';
import type { PluginRegistries } from '../plugins/plugin-set.js';
import type { AnyProtocolPlugin } from '../plugins/protocol-plugin.js';
import type { Validated } from '../validation/validated.js';
import { combine, errorsOf, fromErrors, invalid, sequence, valid } from '../validation/validated.js';
import { childLocation } from '../validation/zod-issues.js';
import type { ClientConfig, ValidatedClient } from './client-config.js';
import { readClient, validateClient } from './client-config.js';
import type { LinkerDefaults } from './linker-config.js';
import { readPluginKind } from './plugin-kind.js';
import type { DefaultedServer, ServerConfig, ValidatedServer } from './server-config.js';
import { readServer, serverWithDefaults, validateServer } from './server-config.js';
import { findSocketConflicts } from './socket-conflicts.js';

export interface RouterConfig {
  readonly protocol: AnyProtocolPlugin;
  readonly label?: string | undefined;
  readonly dstPrefix?: string | undefined;
  readonly baseDtab?: string | undefined;
  readonly failFast?: boolean | undefined;
  readonly servers: readonly ServerConfig[];
  readonly client?: ClientConfig | undefined;
  readonly params: unknown;
  readonly location: string;
}

export type DtabSource =
  | { readonly kind: 'own'; readonly text: string }
  | { readonly kind: 'inherited'; readonly dtab: Dtab };

export interface DefaultedRouter {
  readonly protocol: AnyProtocolPlugin;
  readonly label: string;
  readonly dstPrefix: string;
  readonly dtab: DtabSource;
  readonly failFast: boolean;
  readonly servers: readonly DefaultedServer[];
  readonly client?: ClientConfig | undefined;
  readonly params: unknown;
  readonly location: string;
}

export interface ValidatedRouter {
  readonly protocol: string;
  readonly label: string;
  readonly dstPrefix: Path;
  readonly dtab: Dtab;
  readonly failFast: boolean;
  readonly servers: readonly ValidatedServer[];
  readonly client?: ValidatedClient | undefined;
  readonly params: unknown;
  readonly location: string;
}

const routerFields = paramParser({
  protocol: z.string(),
  label: z.string().min(1).optional(),
  dstPrefix: z.string().optional(),
  baseDtab: z.string().optional(),
  failFast: z.boolean().optional(),
});

const SERVERS_KEY = 'servers';
const CLIENT_KEY = 'client';
const NESTED_KEYS: ReadonlySet<string> = new Set([SERVERS_KEY, CLIENT_KEY]);

/** Every key a router of this protocol accepts. */
export function routerKeys(protocol: AnyProtocolPlugin): ReadonlySet<string> {
  return new Set([...routerFields.keys, ...NESTED_KEYS, ...protocol.routerParams.keys]);
}

function readServers(
  node: ConfigNode | undefined,
  routerLocation: string,
  protocol: AnyProtocolPlugin,
): Validated<ConfigError, readonly ServerConfig[]> {
  if (node === undefined || node.isNull) {
    return invalid(ConfigErr.missingRequiredField(SERVERS_KEY, routerLocation));
  }
  if (node.kind !== 'seq') {
    return invalid(ConfigErr.invalidParameter(SERVERS_KEY, 'expected a list', node.location));
  }
  const items = node.items();
  if (items.length === 0) {
    return invalid(ConfigErr.invalidParameter(SERVERS_KEY, 'at least one server is required', node.location));
  }
  return sequence(items.map((item) => readServer(item, protocol)));
}

/**
 * Read one entry of `routers`.
 *
 * A missing or unknown protocol stops here: without the plugin there is no
 * telling which keys are valid. Everything else is checked independently and
 * reported together.
 */
export function readRouter(node: ConfigNode, registries: PluginRegistries): Validated<ConfigError, RouterConfig> {
  const resolved = readPluginKind(node, 'protocol', registries.protocols);
  if (resolved.isErr()) return err(resolved.error);
  const protocol = resolved.value;

  const fields = node.fields();
  const known = checkKnownKeys(fields, [routerKeys(protocol)], node.location);
  const generic = routerFields.parse(fields, node.location);
  const params = protocol.routerParams.parse(fields, node.location);
  const servers = readServers(fields.find((f) => f.key === SERVERS_KEY)?.node, node.location, protocol);

  const clientNode = fields.find((f) => f.key === CLIENT_KEY)?.node;
  const client: Validated<ConfigError, ClientConfig | undefined> =
    clientNode === undefined || clientNode.isNull ? valid(undefined) : readClient(clientNode, protocol, registries.tlsClients);

  const nested = combine(servers, client, (s, c) => ({ servers: s, client: c }));
  const own = combine(generic, params, (g, p) => ({
    label: g.label,
    dstPrefix: g.dstPrefix,
    baseDtab: g.baseDtab,
    failFast: g.failFast,
    params: p,
  }));

  return combine(known, combine(own, nested, (o, n) => ({ ...o, ...n })), (_, router) => ({
    protocol,
    ...router,
    location: node.location,
  }));
}

export function routerWithDefaults(router: RouterConfig, defaults: LinkerDefaults): DefaultedRouter {
  const dtab: DtabSource =
    router.baseDtab !== undefined ? { kind: 'own', text: router.baseDtab } : { kind: 'inherited', dtab: defaults.baseDtab };

  return {
    protocol: router.protocol,
    label: router.label ?? router.protocol.name,
    dstPrefix: router.dstPrefix ?? `/${router.protocol.name}`,
    dtab,
    failFast: router.failFast ?? defaults.failFast,
    servers: router.servers.map((server) => serverWithDefaults(server, { port: router.protocol.defaultServerPort })),
    client: router.client,
    params: router.params,
    location: router.location,
  };
}

function validateDtab(source: DtabSource, location: string): Validated<ConfigError, Dtab> {
  if (source.kind === 'inherited') return valid(source.dtab);
  const parsed = Dtab.read(source.text);
  return parsed.isOk() ? valid(parsed.value) : invalid(ConfigErr.invalidDtab(source.text, parsed.error, location));
}

function validateServers(
  servers: readonly DefaultedServer[],
  admitted: readonly ValidatedRouter[],
): Validated<ConfigError, readonly ValidatedServer[]> {
  const results = servers.map(validateServer);
  const accepted = results.flatMap((r) => (r.isOk() ? [r.value] : []));
  const conflicts = findSocketConflicts(
    accepted,
    admitted.flatMap((r) => r.servers.map((s) => s.addr)),
  );
  return fromErrors([...results.flatMap((r) => errorsOf(r)), ...conflicts], () => accepted);
}

/**
 * Check a defaulted router against itself and the routers admitted before
 * it. A conflict is reported on the router being checked, never on the one
 * already admitted.
 */
export function validateRouter(
  router: DefaultedRouter,
  admitted: readonly ValidatedRouter[],
): Validated<ConfigError, ValidatedRouter> {
  const label: Validated<ConfigError, string> = admitted.some((r) => r.label === router.label)
    ? invalid(ConfigErr.duplicateRouterLabel(router.label, router.location))
    : valid(router.label);

  const parsedPrefix = Path.read(router.dstPrefix);
  const dstPrefix: Validated<ConfigError, Path> = parsedPrefix.isOk()
    ? valid(parsedPrefix.value)
    : invalid(ConfigErr.invalidPath(router.dstPrefix, parsedPrefix.error, childLocation(router.location, 'dstPrefix')));

  const dtab = validateDtab(router.dtab, childLocation(router.location, 'baseDtab'));
  const servers = validateServers(router.servers, admitted);

  const naming = combine(dstPrefix, dtab, (p, d) => ({ dstPrefix: p, dtab: d }));
  const checked = combine(label, combine(naming, servers, (n, s) => ({ ...n, servers: s })), (l, rest) => ({
    label: l,
    ...rest,
  }));

  return checked.map((r) => ({
    protocol: router.protocol.name,
    ...r,
    failFast: router.failFast,
    client: router.client === undefined ? undefined : validateClient(router.client),
    params: router.params,
    location: router.location,
  }));
}
