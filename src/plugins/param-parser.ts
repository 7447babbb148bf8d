/**
 * Parameter parsers.
 *
 * A plugin owns the keys it adds to a config object and the types of their
 * values. It declares them once as a zod shape; `paramParser` turns that into
 * the set of keys the reader should accept and a parser over the matching
 * fields. Zod defaults in the shape are the plugin's defaults.
 */

import { z } from 'zod';
import { err } from 'neverthrow';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { ConfigField } from '../document/config-node.js';
import type { Validated } from '../validation/validated.js';
import { valid, fromErrors } from '../validation/validated.js';
import { fromZodError } from '../validation/zod-issues.js';

export interface ParamParser<T> {
  readonly keys: ReadonlySet<string>;
  /** Parse the fields this parser owns; fields with other keys are ignored. */
  parse(fields: readonly ConfigField[], location: string): Validated<ConfigError, T>;
}

export function paramParser<S extends z.ZodRawShape>(shape: S): ParamParser<z.output<z.ZodObject<S>>> {
  const schema = z.object(shape);
  const keys: ReadonlySet<string> = new Set(Object.keys(shape));

  return {
    keys,
    parse(fields, location) {
      const input: Record<string, unknown> = {};
      for (const field of fields) {
        if (keys.has(field.key)) input[field.key] = field.node.value();
      }
      const parsed = schema.safeParse(input);
      return parsed.success ? valid(parsed.data) : err(fromZodError(parsed.error, location));
    },
  };
}

/** For plugins that add no keys at one level. */
export const noParams = paramParser({});

/** UnknownParameter for every field whose key is in none of `accepted`. */
export function checkKnownKeys(
  fields: readonly ConfigField[],
  accepted: readonly ReadonlySet<string>[],
  location: string,
): Validated<ConfigError, void> {
  const unknown = fields
    .filter((field) => !accepted.some((keys) => keys.has(field.key)))
    .map((field) => ConfigErr.unknownParameter(field.key, location));
  return fromErrors(unknown, () => undefined);
}
