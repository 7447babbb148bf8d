/**
 * Error-accumulating validation.
 *
 * A `Validated<E, A>` is a neverthrow `Result` whose error side is a
 * non-empty list. Unlike `andThen`, `combine` does not stop at the first
 * failure: sibling fields are checked independently and every problem is
 * reported in one pass.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

export type NonEmptyArray<T> = readonly [T, ...T[]];

export type Validated<E, A> = Result<A, NonEmptyArray<E>>;

export function valid<A>(value: A): Validated<never, A> {
  return ok(value);
}

export function invalid<E>(first: E, ...rest: E[]): Validated<E, never> {
  const errors: NonEmptyArray<E> = [first, ...rest];
  return err(errors);
}

export function nonEmpty<E>(errors: readonly E[]): NonEmptyArray<E> | undefined {
  const [first, ...rest] = errors;
  return first === undefined ? undefined : [first, ...rest];
}

/** Valid with `value()` when `errors` is empty, invalid with all of them otherwise. */
export function fromErrors<E, A>(errors: readonly E[], value: () => A): Validated<E, A> {
  const failures = nonEmpty(errors);
  return failures ? err(failures) : ok(value());
}

export function errorsOf<E, A>(result: Validated<E, A>): readonly E[] {
  return result.isErr() ? result.error : [];
}

function append<E>(head: NonEmptyArray<E>, tail: readonly E[]): NonEmptyArray<E> {
  return [head[0], ...head.slice(1), ...tail];
}

/**
 * Combine two independent results.
 *
 * Valid only when both are; otherwise the errors of `a` come before the
 * errors of `b`.
 */
export function combine<E, A, B, C>(
  a: Validated<E, A>,
  b: Validated<E, B>,
  f: (a: A, b: B) => C,
): Validated<E, C> {
  if (a.isErr()) {
    return err(b.isErr() ? append(a.error, b.error) : a.error);
  }
  if (b.isErr()) {
    return err(b.error);
  }
  return ok(f(a.value, b.value));
}

/** Left fold over `combine`: keeps input order on success, collects every error on failure. */
export function sequence<E, A>(results: readonly Validated<E, A>[]): Validated<E, readonly A[]> {
  return results.reduce<Validated<E, readonly A[]>>(
    (acc, next) => combine(acc, next, (values, value) => [...values, value]),
    ok([]),
  );
}
