import type { Namer } from '../naming/name-interpreter.js';
import type { Path } from '../naming/path.js';
import type { ParamParser } from './param-parser.js';

export interface NamerContext {
  /** The prefix the namer is mounted under, after defaulting. */
  readonly prefix: Path;
}

/** A source of bound names, configured under `namers`. */
export interface NamerPlugin<P> {
  readonly kind: string;
  /** Used when the config names no `prefix`. */
  readonly defaultPrefix: string;
  readonly params: ParamParser<P>;
  mk(params: P, context: NamerContext): Namer;
}

export type AnyNamerPlugin = NamerPlugin<unknown>;
