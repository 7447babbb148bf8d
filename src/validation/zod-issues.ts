import type { z } from 'zod';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import type { NonEmptyArray } from './validated.js';
import { nonEmpty } from './validated.js';

/** `routers` + 1 => `routers[1]`; `routers[1]` + `port` => `routers[1].port`. */
export function childLocation(parent: string, key: string | number): string {
  if (typeof key === 'number') return `${parent}[${key}]`;
  return parent ? `${parent}.${key}` : key;
}

/** The last field name of a location: `routers[1].servers[0].port` => `port`. */
export function locationName(location: string): string {
  const dot = location.lastIndexOf('.');
  return dot === -1 ? location : location.slice(dot + 1);
}

/**
 * Translate zod issues into config errors, rooted at `location`.
 *
 * Unrecognized keys become one UnknownParameter per key; every other issue
 * is an InvalidParameter for the offending field.
 */
export function fromZodError(error: z.ZodError, location: string): NonEmptyArray<ConfigError> {
  const errors = error.errors.flatMap((issue): ConfigError[] => {
    const at = issue.path.reduce<string>((loc, key) => childLocation(loc, key), location);

    if (issue.code === 'unrecognized_keys') {
      return issue.keys.map((key) => ConfigErr.unknownParameter(key, at));
    }

    return [ConfigErr.invalidParameter(locationName(at), issue.message, at)];
  });

  return nonEmpty(errors) ?? [ConfigErr.invalidParameter(locationName(location), error.message, location)];
}
