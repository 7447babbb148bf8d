/**
 * ConfigNode - a replayable handle on one node of a parsed document.
 *
 * Wraps the `yaml` AST so the rest of the reader never touches it directly.
 * Each node knows where it sits in the document (`location`, for error
 * messages) and in the source text (`position`). Handles are cheap and can be
 * kept around and walked again later; the second pass over `routers` relies
 * on that.
 */

import type { Alias, LineCounter } from 'yaml';
import { isAlias, isMap, isScalar, isSeq } from 'yaml';
import { err } from 'neverthrow';
import type { z } from 'zod';
import type { ConfigError, SourcePosition } from '../core/errors/config-error.js';
import type { Validated } from '../validation/validated.js';
import { valid } from '../validation/validated.js';
import { childLocation, fromZodError } from '../validation/zod-issues.js';

export type ConfigNodeKind = 'map' | 'seq' | 'scalar';

export interface ConfigField {
  readonly key: string;
  readonly node: ConfigNode;
}

/** What a node needs from the document it came from. */
export interface NodeContext {
  readonly lineCounter: LineCounter;
  readonly resolveAlias: (alias: Alias) => unknown;
}

export class ConfigNode {
  private readonly raw: unknown;

  constructor(
    raw: unknown,
    readonly location: string,
    private readonly context: NodeContext,
    private readonly fallbackOffset: number = 0,
  ) {
    this.raw = isAlias(raw) ? context.resolveAlias(raw) : raw;
  }

  get kind(): ConfigNodeKind {
    if (isMap(this.raw)) return 'map';
    if (isSeq(this.raw)) return 'seq';
    return 'scalar';
  }

  get position(): SourcePosition {
    const offset = this.offset();
    const { line, col } = this.context.lineCounter.linePos(offset);
    return { line, column: col, offset };
  }

  /** Map entries in document order; empty for anything but a map. */
  fields(): readonly ConfigField[] {
    if (!isMap(this.raw)) return [];
    const offset = this.offset();
    return this.raw.items.map((pair) => {
      const key = keyText(pair.key);
      return { key, node: new ConfigNode(pair.value, childLocation(this.location, key), this.context, offset) };
    });
  }

  /** Sequence items in document order; empty for anything but a sequence. */
  items(): readonly ConfigNode[] {
    if (!isSeq(this.raw)) return [];
    const offset = this.offset();
    return this.raw.items.map(
      (item, i) => new ConfigNode(item, childLocation(this.location, i), this.context, offset),
    );
  }

  /** True for an explicit null (`key:` with nothing after it) or a missing value. */
  get isNull(): boolean {
    return this.kind === 'scalar' && this.value() === null;
  }

  /** The node as plain data (objects, arrays, scalars). */
  value(): unknown {
    return toPlain(this.raw, this.context, new Set());
  }

  /** The node as typed data, or the schema's complaints as config errors. */
  materialize<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Validated<ConfigError, T> {
    const parsed = schema.safeParse(this.value());
    return parsed.success ? valid(parsed.data) : err(fromZodError(parsed.error, this.location));
  }

  private offset(): number {
    if (isMap(this.raw) || isSeq(this.raw) || isScalar(this.raw)) {
      return this.raw.range?.[0] ?? this.fallbackOffset;
    }
    return this.fallbackOffset;
  }
}

function keyText(key: unknown): string {
  if (isScalar(key)) return String(key.value);
  return String(key);
}

function toPlain(raw: unknown, context: NodeContext, ancestors: ReadonlySet<unknown>): unknown {
  const node = isAlias(raw) ? context.resolveAlias(raw) : raw;
  // a self-referencing anchor has no finite plain form
  if (ancestors.has(node)) return null;

  if (isMap(node)) {
    const inner = new Set(ancestors).add(node);
    const out: Record<string, unknown> = {};
    for (const pair of node.items) {
      out[keyText(pair.key)] = toPlain(pair.value, context, inner);
    }
    return out;
  }
  if (isSeq(node)) {
    const inner = new Set(ancestors).add(node);
    return node.items.map((item) => toPlain(item, context, inner));
  }
  if (isScalar(node)) return node.value;
  return node ?? null;
}
