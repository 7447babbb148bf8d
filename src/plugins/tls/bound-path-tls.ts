/**
 * Client TLS keyed on the bound destination.
 *
 * Each entry of `names` pairs a path pattern with a common name pattern.
 * `{var}` segments of the path pattern capture the matching segment of the
 * bound id and are substituted into the common name:
 *
 *   prefix: /fs/{service}
 *   commonNamePattern: "{service}.example.test"
 *
 * Entries are tried in order; the first whose pattern prefixes the id wins.
 */

import { z } from 'zod';
import { ok, err } from 'neverthrow';
import type { Path } from '../../naming/path.js';
import { paramParser } from '../param-parser.js';
import type { ClientTlsPlugin, PeerCheck } from '../tls-plugin.js';

const CAPTURE = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;
const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

type PatternSegment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'capture'; readonly name: string };

export interface BoundPathName {
  readonly prefix: string;
  readonly commonNamePattern: string;
}

export interface BoundPathTlsParams {
  readonly caCertPath?: string | undefined;
  readonly names: readonly BoundPathName[];
}

export function parsePattern(prefix: string): readonly PatternSegment[] {
  return prefix
    .split('/')
    .filter((s) => s.length > 0)
    .map((text): PatternSegment => {
      const capture = CAPTURE.exec(text);
      return capture?.[1] !== undefined ? { kind: 'capture', name: capture[1] } : { kind: 'literal', text };
    });
}

function placeholders(pattern: string): readonly string[] {
  return [...pattern.matchAll(PLACEHOLDER)].flatMap((m) => (m[1] === undefined ? [] : [m[1]]));
}

/** Captures of `pattern` against `id`, or undefined when it does not prefix `id`. */
export function matchPattern(pattern: readonly PatternSegment[], id: Path): ReadonlyMap<string, string> | undefined {
  if (pattern.length > id.size) return undefined;
  const captures = new Map<string, string>();
  for (const [i, segment] of pattern.entries()) {
    const actual = id.segments[i];
    if (actual === undefined) return undefined;
    if (segment.kind === 'capture') {
      captures.set(segment.name, actual);
    } else if (segment.text !== actual) {
      return undefined;
    }
  }
  return captures;
}

const boundNameSchema = z
  .object({
    prefix: z.string().startsWith('/', 'prefix must start with "/"'),
    commonNamePattern: z.string().min(1),
  })
  .strict()
  .superRefine((name, ctx) => {
    const captured = new Set(
      parsePattern(name.prefix).flatMap((s) => (s.kind === 'capture' ? [s.name] : [])),
    );
    for (const variable of placeholders(name.commonNamePattern)) {
      if (!captured.has(variable)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['commonNamePattern'],
          message: `{${variable}} is not captured by prefix ${name.prefix}`,
        });
      }
    }
  });

export const boundPathTls: ClientTlsPlugin<BoundPathTlsParams> = {
  kind: 'boundPath',
  params: paramParser({
    caCertPath: z.string().optional(),
    names: z.array(boundNameSchema).min(1, 'at least one name is required'),
  }),
  mk: (params) => {
    const compiled = params.names.map((name) => ({
      pattern: parsePattern(name.prefix),
      commonNamePattern: name.commonNamePattern,
    }));

    return {
      caCertPath: params.caCertPath,
      peerCheck: (id) => {
        for (const { pattern, commonNamePattern } of compiled) {
          const captures = matchPattern(pattern, id);
          if (captures === undefined) continue;
          const commonName = commonNamePattern.replace(
            PLACEHOLDER,
            (whole, variable: string) => captures.get(variable) ?? whole,
          );
          const check: PeerCheck = { kind: 'common_name', commonName };
          return ok(check);
        }
        return err(`no TLS common name configured for ${id.show()}`);
      },
    };
  },
};
