/**
 * Hierarchical names.
 *
 * A path is a sequence of non-empty segments, shown as `/a/b/c`. `/` alone is
 * the empty path. Segment characters outside `[A-Za-z0-9_:.#$%-]` are written
 * as `\xHH` escapes of their UTF-8 bytes.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

const SHOWABLE = /^[A-Za-z0-9_:.#$%-]$/;
const HEX = /^[0-9A-Fa-f]{2}$/;
const UTF8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function isShowable(ch: string): boolean {
  return SHOWABLE.test(ch);
}

export class Path {
  static readonly empty = new Path([]);

  private constructor(readonly segments: readonly string[]) {}

  /** Build a path from raw (unescaped) segments. Empty segments are dropped. */
  static of(...segments: readonly string[]): Path {
    const kept = segments.filter((s) => s.length > 0);
    return kept.length === 0 ? Path.empty : new Path(kept);
  }

  static read(text: string): Result<Path, string> {
    const res = readPathAt(text, 0);
    if (res.isErr()) return err(res.error);
    if (res.value.end !== text.length) {
      return err(`unexpected '${text.charAt(res.value.end)}' at offset ${res.value.end}`);
    }
    return ok(res.value.path);
  }

  get size(): number {
    return this.segments.length;
  }

  get isEmpty(): boolean {
    return this.segments.length === 0;
  }

  startsWith(prefix: Path): boolean {
    if (prefix.size > this.size) return false;
    return prefix.segments.every((segment, i) => this.segments[i] === segment);
  }

  take(n: number): Path {
    return Path.of(...this.segments.slice(0, n));
  }

  drop(n: number): Path {
    return Path.of(...this.segments.slice(n));
  }

  concat(other: Path): Path {
    if (other.isEmpty) return this;
    if (this.isEmpty) return other;
    return new Path([...this.segments, ...other.segments]);
  }

  equals(other: Path): boolean {
    return this.size === other.size && this.startsWith(other);
  }

  show(): string {
    return this.isEmpty ? '/' : this.segments.map((s) => `/${showSegment(s)}`).join('');
  }

  toString(): string {
    return this.show();
  }
}

function showSegment(segment: string): string {
  let out = '';
  for (const ch of segment) {
    if (isShowable(ch)) {
      out += ch;
    } else {
      for (const byte of Buffer.from(ch, 'utf8')) {
        out += `\\x${byte.toString(16).padStart(2, '0')}`;
      }
    }
  }
  return out;
}

/**
 * Read a path starting at `start`, stopping at the first character that can
 * not continue it. Used on its own and by the dtab parser.
 */
export function readPathAt(text: string, start: number): Result<{ readonly path: Path; readonly end: number }, string> {
  if (text.charAt(start) !== '/') {
    return err(start >= text.length ? 'expected a path, found end of input' : `expected '/' at offset ${start}`);
  }

  const segments: string[] = [];
  let i = start;

  while (text.charAt(i) === '/') {
    i++;
    const segmentStart = i;
    const bytes: number[] = [];
    let chars = 0;

    for (;;) {
      const ch = text.charAt(i);
      if (ch === '\\') {
        const hex = text.slice(i + 2, i + 4);
        if (text.charAt(i + 1) !== 'x' || !HEX.test(hex)) {
          return err(`invalid escape at offset ${i}`);
        }
        bytes.push(parseInt(hex, 16));
        i += 4;
        chars++;
      } else if (ch !== '' && isShowable(ch)) {
        bytes.push(...Buffer.from(ch, 'utf8'));
        i++;
        chars++;
      } else {
        break;
      }
    }

    if (chars === 0) {
      // "/" on its own is the empty path
      if (segments.length === 0 && i - 1 === start && text.charAt(i) !== '/') {
        return ok({ path: Path.empty, end: i });
      }
      return err(`empty path segment at offset ${i - 1}`);
    }
    const segment = decodeSegment(bytes, segmentStart);
    if (segment.isErr()) return err(segment.error);
    segments.push(segment.value);
  }

  return ok({ path: Path.of(...segments), end: i });
}

function decodeSegment(bytes: readonly number[], offset: number): Result<string, string> {
  try {
    return ok(UTF8.decode(Uint8Array.from(bytes)));
  } catch {
    return err(`escapes in the segment at offset ${offset} are not valid UTF-8`);
  }
}
