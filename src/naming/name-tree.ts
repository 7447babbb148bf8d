/**
 * Name trees: the shape of a (partially) resolved name.
 *
 * - leaf: a single value
 * - alt: try each tree in order, first non-negative wins
 * - union: weighted combination of trees
 * - neg: no binding
 * - fail: binding failed, stop looking
 * - empty: bound to nothing
 */

import { assertNever } from '../runtime/assert-never.js';

export interface Weighted<T> {
  readonly weight: number;
  readonly tree: NameTree<T>;
}

export type NameTree<T> =
  | { readonly kind: 'leaf'; readonly value: T }
  | { readonly kind: 'alt'; readonly trees: readonly NameTree<T>[] }
  | { readonly kind: 'union'; readonly weighted: readonly Weighted<T>[] }
  | { readonly kind: 'neg' }
  | { readonly kind: 'fail' }
  | { readonly kind: 'empty' };

export const DEFAULT_WEIGHT = 1;

export const NameTrees = {
  leaf: <T>(value: T): NameTree<T> => ({ kind: 'leaf', value }),
  alt: <T>(...trees: NameTree<T>[]): NameTree<T> => ({ kind: 'alt', trees }),
  union: <T>(...weighted: Weighted<T>[]): NameTree<T> => ({ kind: 'union', weighted }),
  neg: { kind: 'neg' } as const,
  fail: { kind: 'fail' } as const,
  empty: { kind: 'empty' } as const,
};

export function mapTree<T, U>(tree: NameTree<T>, fn: (value: T) => U): NameTree<U> {
  switch (tree.kind) {
    case 'leaf':
      return NameTrees.leaf(fn(tree.value));
    case 'alt':
      return NameTrees.alt(...tree.trees.map((t) => mapTree(t, fn)));
    case 'union':
      return NameTrees.union(...tree.weighted.map((w) => ({ weight: w.weight, tree: mapTree(w.tree, fn) })));
    case 'neg':
    case 'fail':
    case 'empty':
      return tree;
    default:
      return assertNever(tree);
  }
}

/**
 * Normalize a tree: negative branches are dropped, an alternation stops at
 * the first failure, and single-child nodes collapse into their child.
 */
export function simplify<T>(tree: NameTree<T>): NameTree<T> {
  switch (tree.kind) {
    case 'alt': {
      const kept: NameTree<T>[] = [];
      for (const child of tree.trees.map(simplify)) {
        if (child.kind === 'neg') continue;
        kept.push(child);
        if (child.kind === 'fail') break;
      }
      return collapse(kept, (trees) => NameTrees.alt(...trees));
    }
    case 'union': {
      const kept = tree.weighted
        .map((w) => ({ weight: w.weight, tree: simplify(w.tree) }))
        .filter((w) => w.tree.kind !== 'neg');
      const [only] = kept;
      if (only === undefined) return NameTrees.neg;
      if (kept.length === 1) return only.tree;
      return NameTrees.union(...kept);
    }
    case 'leaf':
    case 'neg':
    case 'fail':
    case 'empty':
      return tree;
    default:
      return assertNever(tree);
  }
}

function collapse<T>(trees: NameTree<T>[], build: (trees: NameTree<T>[]) => NameTree<T>): NameTree<T> {
  const [only] = trees;
  if (only === undefined) return NameTrees.neg;
  if (trees.length === 1) return only;
  return build(trees);
}

export function leaves<T>(tree: NameTree<T>): readonly T[] {
  switch (tree.kind) {
    case 'leaf':
      return [tree.value];
    case 'alt':
      return tree.trees.flatMap((t) => leaves(t));
    case 'union':
      return tree.weighted.flatMap((w) => leaves(w.tree));
    case 'neg':
    case 'fail':
    case 'empty':
      return [];
    default:
      return assertNever(tree);
  }
}

export function showTree<T>(tree: NameTree<T>, showLeaf: (value: T) => string): string {
  switch (tree.kind) {
    case 'leaf':
      return showLeaf(tree.value);
    case 'alt':
      return tree.trees.map((t) => showNested(t, showLeaf)).join(' | ');
    case 'union':
      return tree.weighted
        .map((w) => `${w.weight}*${showNested(w.tree, showLeaf)}`)
        .join(' & ');
    case 'neg':
      return '~';
    case 'fail':
      return '!';
    case 'empty':
      return '$';
    default:
      return assertNever(tree);
  }
}

function showNested<T>(tree: NameTree<T>, showLeaf: (value: T) => string): string {
  const shown = showTree(tree, showLeaf);
  return tree.kind === 'alt' || tree.kind === 'union' ? `(${shown})` : shown;
}
