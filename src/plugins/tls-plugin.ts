import type { Result } from 'neverthrow';
import type { Path } from '../naming/path.js';
import type { ParamParser } from './param-parser.js';

/** How the peer certificate of a destination is checked. */
export type PeerCheck =
  | { readonly kind: 'skip' }
  | { readonly kind: 'common_name'; readonly commonName: string };

export interface ClientTlsPolicy {
  readonly caCertPath?: string;
  /** The check to run against the peer bound to `id`. */
  peerCheck(id: Path): Result<PeerCheck, string>;
}

/** A client TLS strategy, selected by `client.tls.kind`. */
export interface ClientTlsPlugin<P> {
  readonly kind: string;
  readonly params: ParamParser<P>;
  mk(params: P): ClientTlsPolicy;
}

export type AnyClientTlsPlugin = ClientTlsPlugin<unknown>;
