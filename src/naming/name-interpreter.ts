/**
 * Name resolution.
 *
 * `composeNamers` stacks the configured namers into one. `createNameInterpreter`
 * binds a path by rewriting it through a dtab and handing every path no
 * dentry matches to that namer.
 */

import type { Dtab } from './dtab.js';
import type { NameTree } from './name-tree.js';
import { NameTrees, DEFAULT_WEIGHT, simplify } from './name-tree.js';
import type { Path } from './path.js';
import { ResolutionStream } from './resolution-stream.js';
import type { SocketAddress } from '../linker/socket-address.js';
import { assertNever } from '../runtime/assert-never.js';

/** Terminal result of resolution. */
export interface BoundName {
  readonly id: Path;
  /** What is left of the looked-up path once `id` is bound. */
  readonly residual: Path;
  readonly addresses: readonly SocketAddress[];
}

export interface Namer {
  lookup(path: Path): ResolutionStream<NameTree<BoundName>>;
}

export interface PrefixedNamer {
  readonly prefix: Path;
  readonly namer: Namer;
}

export interface NameInterpreter {
  bind(dtab: Dtab, path: Path): ResolutionStream<NameTree<BoundName>>;
}

/** Rewrites allowed in one binding, across all of its branches, before it is declared failed. */
export const MAX_BIND_REWRITES = 100;

/** Resolves every path negatively. */
export const negativeNamer: Namer = {
  lookup: () => ResolutionStream.of<NameTree<BoundName>>(NameTrees.neg),
};

/**
 * Fold namers, in declaration order, over the negative namer.
 *
 * Each step wraps the accumulator: the namer intercepts paths under its own
 * prefix (with the prefix stripped) and passes every other path down. Later
 * declarations end up outermost, so when two prefixes match the namer
 * declared last wins.
 */
export function composeNamers(namers: readonly PrefixedNamer[]): Namer {
  return namers.reduce<Namer>(
    (next, { prefix, namer }) => ({
      lookup: (path) => (path.startsWith(prefix) ? namer.lookup(path.drop(prefix.size)) : next.lookup(path)),
    }),
    negativeNamer,
  );
}

interface RewriteBudget {
  remaining: number;
}

export function createNameInterpreter(namer: Namer): NameInterpreter {
  const bindPath = (dtab: Dtab, path: Path, budget: RewriteBudget): ResolutionStream<NameTree<BoundName>> => {
    if (budget.remaining <= 0) return ResolutionStream.of<NameTree<BoundName>>(NameTrees.fail);
    const rewritten = dtab.lookup(path);
    if (rewritten.kind === 'neg') return namer.lookup(path);
    budget.remaining--;
    return bindTree(dtab, rewritten, budget);
  };

  const bindTree = (dtab: Dtab, tree: NameTree<Path>, budget: RewriteBudget): ResolutionStream<NameTree<BoundName>> => {
    switch (tree.kind) {
      case 'leaf':
        return bindPath(dtab, tree.value, budget);
      case 'alt':
        return ResolutionStream.combineLatest(tree.trees.map((t) => bindTree(dtab, t, budget)))
          .map((bound) => simplify(NameTrees.alt(...bound)));
      case 'union': {
        const weights = tree.weighted.map((w) => w.weight);
        return ResolutionStream.combineLatest(tree.weighted.map((w) => bindTree(dtab, w.tree, budget)))
          .map((bound) => simplify(NameTrees.union(...bound.map((t, i) => ({
            weight: weights[i] ?? DEFAULT_WEIGHT,
            tree: t,
          })))));
      }
      case 'neg':
      case 'fail':
      case 'empty':
        return ResolutionStream.of<NameTree<BoundName>>(tree);
      default:
        return assertNever(tree);
    }
  };

  return {
    // one budget per iteration
    bind: (dtab, path) => ResolutionStream.from(() => bindPath(dtab, path, { remaining: MAX_BIND_REWRITES })),
  };
}
