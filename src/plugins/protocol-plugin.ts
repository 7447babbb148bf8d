import type { Path } from '../naming/path.js';
import type { ParamParser } from './param-parser.js';

/** Maps a protocol request to the destination path it is routed by. */
export type RequestIdentifier<Req> = (request: Req) => Path;

export interface IdentifierContext<RP> {
  readonly dstPrefix: Path;
  readonly params: RP;
}

/**
 * A protocol a router can speak.
 *
 * `Req` is the protocol's own request type. The parameter types are what the
 * plugin's parsers produce for the keys it adds at the router, server and
 * client level.
 */
export interface ProtocolPlugin<Req, RP, SP, CP> {
  readonly name: string;
  /** Port a server listens on when it names none; absent means ephemeral. */
  readonly defaultServerPort?: number;
  readonly routerParams: ParamParser<RP>;
  readonly serverParams: ParamParser<SP>;
  readonly clientParams: ParamParser<CP>;
  identifier(router: IdentifierContext<RP>): RequestIdentifier<Req>;
}

/** A protocol plugin with its types erased, as held by the registry. */
export type AnyProtocolPlugin = ProtocolPlugin<never, unknown, unknown, unknown>;
