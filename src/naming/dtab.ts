/**
 * Delegation tables.
 *
 * A dtab is an ordered list of `prefix => tree` rewrite rules. Looking up a
 * path rewrites it through every rule whose prefix matches, later rules
 * taking precedence over earlier ones.
 *
 * Syntax:
 *   dtab     := dentry (';' dentry)* ';'?
 *   dentry   := path '=>' tree
 *   tree     := union ('|' union)*
 *   union    := weighted ('&' weighted)*
 *   weighted := (number '*')? simple
 *   simple   := path | '~' | '!' | '$' | '(' tree ')'
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Path, readPathAt } from './path.js';
import type { NameTree, Weighted } from './name-tree.js';
import { NameTrees, DEFAULT_WEIGHT, mapTree, showTree } from './name-tree.js';

export interface Dentry {
  readonly prefix: Path;
  readonly dst: NameTree<Path>;
}

export class Dtab {
  static readonly empty = new Dtab([]);

  constructor(readonly dentries: readonly Dentry[]) {}

  static read(text: string): Result<Dtab, string> {
    return new DtabParser(text).parseDtab();
  }

  get size(): number {
    return this.dentries.length;
  }

  concat(other: Dtab): Dtab {
    if (other.size === 0) return this;
    if (this.size === 0) return other;
    return new Dtab([...this.dentries, ...other.dentries]);
  }

  /**
   * Rewrite `path` through every matching dentry, latest first.
   * No match is a negative result.
   */
  lookup(path: Path): NameTree<Path> {
    const matches: NameTree<Path>[] = [];
    for (let i = this.dentries.length - 1; i >= 0; i--) {
      const dentry = this.dentries[i];
      if (dentry && path.startsWith(dentry.prefix)) {
        const rest = path.drop(dentry.prefix.size);
        matches.push(mapTree(dentry.dst, (dst) => dst.concat(rest)));
      }
    }
    const [only] = matches;
    if (only === undefined) return NameTrees.neg;
    return matches.length === 1 ? only : NameTrees.alt(...matches);
  }

  show(): string {
    return this.dentries
      .map((d) => `${d.prefix.show()}=>${showTree(d.dst, (p) => p.show())}`)
      .join(';');
  }

  toString(): string {
    return this.show();
  }
}

const NUMBER = /^\d+(\.\d+)?/;

class DtabParser {
  private i = 0;

  constructor(private readonly text: string) {}

  parseDtab(): Result<Dtab, string> {
    const dentries: Dentry[] = [];
    this.skipWhitespace();

    while (!this.atEnd()) {
      const dentry = this.parseDentry();
      if (dentry.isErr()) return err(dentry.error);
      dentries.push(dentry.value);

      this.skipWhitespace();
      if (this.atEnd()) break;
      if (!this.consume(';')) return err(this.unexpected("';'"));
      this.skipWhitespace();
    }

    return ok(new Dtab(dentries));
  }

  private parseDentry(): Result<Dentry, string> {
    const prefix = this.parsePath();
    if (prefix.isErr()) return err(prefix.error);

    this.skipWhitespace();
    if (!this.consume('=>')) return err(this.unexpected("'=>'"));

    return this.parseTree().map((dst) => ({ prefix: prefix.value, dst }));
  }

  private parseTree(): Result<NameTree<Path>, string> {
    const alternatives: NameTree<Path>[] = [];
    for (;;) {
      const union = this.parseUnion();
      if (union.isErr()) return err(union.error);
      alternatives.push(union.value);

      this.skipWhitespace();
      if (!this.consume('|')) break;
    }
    const [only] = alternatives;
    return ok(only !== undefined && alternatives.length === 1 ? only : NameTrees.alt(...alternatives));
  }

  private parseUnion(): Result<NameTree<Path>, string> {
    const weighted: Weighted<Path>[] = [];
    for (;;) {
      const next = this.parseWeighted();
      if (next.isErr()) return err(next.error);
      weighted.push(next.value);

      this.skipWhitespace();
      if (!this.consume('&')) break;
    }
    const [only] = weighted;
    if (only !== undefined && weighted.length === 1 && only.weight === DEFAULT_WEIGHT) {
      return ok(only.tree);
    }
    return ok(NameTrees.union(...weighted));
  }

  private parseWeighted(): Result<Weighted<Path>, string> {
    this.skipWhitespace();
    const match = NUMBER.exec(this.text.slice(this.i));
    let weight = DEFAULT_WEIGHT;
    if (match) {
      this.i += match[0].length;
      this.skipWhitespace();
      if (!this.consume('*')) return err(this.unexpected("'*'"));
      weight = Number(match[0]);
    }
    return this.parseSimple().map((tree) => ({ weight, tree }));
  }

  private parseSimple(): Result<NameTree<Path>, string> {
    this.skipWhitespace();
    if (this.consume('~')) return ok(NameTrees.neg);
    if (this.consume('!')) return ok(NameTrees.fail);
    if (this.consume('$')) return ok(NameTrees.empty);
    if (this.consume('(')) {
      const tree = this.parseTree();
      if (tree.isErr()) return tree;
      this.skipWhitespace();
      if (!this.consume(')')) return err(this.unexpected("')'"));
      return tree;
    }
    return this.parsePath().map((path) => NameTrees.leaf(path));
  }

  private parsePath(): Result<Path, string> {
    this.skipWhitespace();
    const res = readPathAt(this.text, this.i);
    if (res.isErr()) return err(res.error);
    this.i = res.value.end;
    return ok(res.value.path);
  }

  private consume(token: string): boolean {
    if (this.text.startsWith(token, this.i)) {
      this.i += token.length;
      return true;
    }
    return false;
  }

  private skipWhitespace(): void {
    while (this.i < this.text.length && /\s/.test(this.text.charAt(this.i))) this.i++;
  }

  private atEnd(): boolean {
    return this.i >= this.text.length;
  }

  private unexpected(expected: string): string {
    return this.atEnd()
      ? `expected ${expected}, found end of input`
      : `expected ${expected} at offset ${this.i}, found '${this.text.charAt(this.i)}'`;
  }
}
