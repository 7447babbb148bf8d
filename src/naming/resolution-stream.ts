/**
 * Resolution streams.
 *
 * A lazily produced, possibly infinite sequence of successive states of a
 * binding. Every iteration re-runs the source from the start, so a stream can
 * be consumed any number of times; nothing is computed until a value is
 * pulled.
 */

export class ResolutionStream<T> implements Iterable<T> {
  private constructor(private readonly source: () => Iterator<T>) {}

  /** A stream of fixed states, in order. */
  static of<T>(...values: readonly T[]): ResolutionStream<T> {
    return new ResolutionStream(() => values[Symbol.iterator]());
  }

  /** A stream over a fresh iterable per iteration (typically a generator function). */
  static from<T>(factory: () => Iterable<T>): ResolutionStream<T> {
    return new ResolutionStream(() => factory()[Symbol.iterator]());
  }

  /**
   * Combine streams latest-value style.
   *
   * Emits once every stream has produced a value, then once per round in
   * which at least one stream advanced. Exhausted streams keep their last
   * value; the result ends when all of them have ended. An empty input emits
   * a single empty array.
   */
  static combineLatest<T>(streams: readonly ResolutionStream<T>[]): ResolutionStream<readonly T[]> {
    return ResolutionStream.from(function* () {
      const slots: { iterator: Iterator<T>; value: T; done: boolean }[] = [];
      for (const stream of streams) {
        const iterator = stream[Symbol.iterator]();
        const first = iterator.next();
        if (first.done) return;
        slots.push({ iterator, value: first.value, done: false });
      }
      yield slots.map((s) => s.value);

      for (;;) {
        let advanced = false;
        for (const slot of slots) {
          if (slot.done) continue;
          const next = slot.iterator.next();
          if (next.done) {
            slot.done = true;
          } else {
            slot.value = next.value;
            advanced = true;
          }
        }
        if (!advanced) return;
        yield slots.map((s) => s.value);
      }
    });
  }

  [Symbol.iterator](): Iterator<T> {
    return this.source();
  }

  map<U>(fn: (value: T) => U): ResolutionStream<U> {
    return ResolutionStream.from(() => mapValues(this, fn));
  }

  /** The current state: the first value of a fresh iteration. */
  sample(): T | undefined {
    const first = this[Symbol.iterator]().next();
    return first.done ? undefined : first.value;
  }

  /** Up to `n` states from a fresh iteration. */
  take(n: number): readonly T[] {
    const out: T[] = [];
    if (n <= 0) return out;
    for (const value of this) {
      out.push(value);
      if (out.length >= n) break;
    }
    return out;
  }
}

function* mapValues<T, U>(values: Iterable<T>, fn: (value: T) => U): Generator<U> {
  for (const value of values) yield fn(value);
}
