import type { Operator } from "../_types.ts";
import { createOperator, createStatefulOperator } from "../operators.ts";

/**
 * @module operations/core
 *
 * **Core Stream Operators - Like Array Methods, But Over Time**
 *
 * These operators work just like Array methods you already know:
 *
 * ```ts
 * // Array methods:
 * [1, 2, 3].map(n => n * 2).filter(n => n > 3)  // [4, 6]
 *
 * // Stream operators (same API):
 * pipe(
 *   Observable.of(1, 2, 3),
 *   map(n => n * 2),
 *   filter(n => n > 3)
 * )  // Stream: 4, 6
 * ```
 *
 * Each one delivers synchronously: whatever a value produces is emitted
 * before the call that pushed the value returns.
 *
 * If your function throws, the output errors with an `ObservableError`
 * naming the operator and carrying the value that was being processed.
 */

/**
 * Transforms each item.
 *
 * ```ts
 * pipe(Observable.of(1, 2, 3), map(n => n * 2))  // 2, 4, 6
 * ```
 *
 * @param project - Function that transforms each item
 */
export function map<T, R>(
  project: (value: T, index: number) => R
): Operator<T, R> {
  return createStatefulOperator<T, R, { index: number }>({
    name: "map",
    createState: () => ({ index: 0 }),
    transform(chunk, state, controller) {
      controller.enqueue(project(chunk, state.index++));
    },
  });
}

/**
 * Keeps items that pass your test.
 *
 * ```ts
 * pipe(Observable.of(1, 2, 3, 4), filter(n => n > 2))  // 3, 4
 * ```
 *
 * @param predicate - Test function that decides which items to keep
 */
export function filter<T, S extends T>(
  predicate: (value: T, index: number) => value is S,
): Operator<T, S>;
export function filter<T>(
  predicate: (value: T, index: number) => boolean,
): Operator<T, T>;
export function filter<T>(
  predicate: (value: T, index: number) => boolean,
): Operator<T, T> {
  return createStatefulOperator<T, T, { index: number }>({
    name: "filter",
    createState: () => ({ index: 0 }),
    transform(chunk, state, controller) {
      if (predicate(chunk, state.index++)) {
        controller.enqueue(chunk);
      }
    },
  });
}

/**
 * Maps each item and drops the ones that map to `null` or `undefined`.
 *
 * ```ts
 * pipe(Observable.of("1", "x", "3"), compactMap(s => {
 *   const n = Number(s);
 *   return Number.isNaN(n) ? null : n;
 * }))  // 1, 3
 * ```
 *
 * @param project - Function that transforms an item, or rejects it with `null`/`undefined`
 */
export function compactMap<T, R>(
  project: (value: T, index: number) => R | null | undefined,
): Operator<T, R> {
  return createStatefulOperator<T, R, { index: number }>({
    name: "compactMap",
    createState: () => ({ index: 0 }),
    transform(chunk, state, controller) {
      const result = project(chunk, state.index++);
      if (result !== null && result !== undefined) {
        controller.enqueue(result);
      }
    },
  });
}

/**
 * Takes the first N items, then completes and unsubscribes from the source.
 *
 * Like `Array.slice(0, N)`:
 *
 * ```ts
 * pipe(Observable.of(1, 2, 3), take(2))  // 1, 2
 * ```
 *
 * With a count of zero or less the output completes without subscribing
 * to the source at all.
 *
 * @param count - How many items to take
 */
export function take<T>(count: number): Operator<T, T> {
  return createStatefulOperator<T, T, { taken: number }>({
    name: "take",
    createState: () => ({ taken: 0 }),
    start(_, controller) {
      if (count <= 0) controller.terminate();
    },
    transform(chunk, state, controller) {
      controller.enqueue(chunk);
      if (++state.taken >= count) {
        controller.terminate();
      }
    },
  });
}

/**
 * Skips the first N items, then forwards the rest.
 *
 * Like `Array.slice(N)`:
 *
 * ```ts
 * pipe(Observable.of(1, 2, 3, 4), drop(2))  // 3, 4
 * ```
 *
 * @param count - How many items to skip
 */
export function drop<T>(count: number): Operator<T, T> {
  return createStatefulOperator<T, T, { dropped: number }>({
    name: "drop",
    createState: () => ({ dropped: 0 }),
    transform(chunk, state, controller) {
      if (state.dropped < count) {
        state.dropped++;
        return;
      }

      controller.enqueue(chunk);
    },
  });
}

/**
 * Runs a side effect for each item and passes it through unchanged.
 *
 * ```ts
 * pipe(source, tap(v => console.log("saw", v)))
 * ```
 *
 * @param fn - Side effect to run for each item
 */
export function tap<T>(fn: (value: T) => void): Operator<T, T> {
  return createOperator<T, T>({
    name: "tap",
    transform(chunk, controller) {
      fn(chunk);
      controller.enqueue(chunk);
    },
  });
}

/**
 * Emits a running accumulation, one result per item.
 *
 * Like `Array.reduce()`, but shows every intermediate result. The seed
 * itself is not emitted:
 *
 * ```ts
 * pipe(Observable.of(1, 2, 3), scan((sum, n) => sum + n, 0))  // 1, 3, 6
 * ```
 *
 * @param accumulator - Function that combines the running total with a new item
 * @param seed - Starting value for the accumulator
 */
export function scan<T, R>(
  accumulator: (acc: R, value: T, index: number) => R,
  seed: R,
): Operator<T, R> {
  return createStatefulOperator<T, R, { acc: R; index: number }>({
    name: "scan",
    createState: () => ({ acc: seed, index: 0 }),
    transform(chunk, state, controller) {
      state.acc = accumulator(state.acc, chunk, state.index++);
      controller.enqueue(state.acc);
    },
  });
}

/**
 * Drops items equal to the one emitted just before them.
 *
 * ```ts
 * pipe(Observable.of(1, 1, 2, 2, 1), distinctUntilChanged())  // 1, 2, 1
 * ```
 *
 * @param isEqual - Equality test, `Object.is` by default
 */
export function distinctUntilChanged<T>(
  isEqual: (previous: T, current: T) => boolean = Object.is,
): Operator<T, T> {
  return createStatefulOperator<T, T, { last: { value: T } | null }>({
    name: "distinctUntilChanged",
    createState: () => ({ last: null }),
    transform(chunk, state, controller) {
      if (state.last && isEqual(state.last.value, chunk)) return;

      state.last = { value: chunk };
      controller.enqueue(chunk);
    },
  });
}

/**
 * Emits only items whose key has not been seen before.
 *
 * The seen keys are kept in a `Set` for the lifetime of the subscription.
 *
 * ```ts
 * pipe(Observable.of(1, 2, 1, 3, 2), distinct())  // 1, 2, 3
 * pipe(users, distinct(user => user.id))          // first record per id
 * ```
 *
 * @param keySelector - Derives the key to compare, the item itself by default
 */
export function distinct<T, K = T>(
  keySelector?: (value: T) => K,
): Operator<T, T> {
  return createStatefulOperator<T, T, { seen: Set<unknown> }>({
    name: "distinct",
    createState: () => ({ seen: new Set() }),
    transform(chunk, state, controller) {
      const key = keySelector ? keySelector(chunk) : chunk;
      if (state.seen.has(key)) return;

      state.seen.add(key);
      controller.enqueue(chunk);
    },
    cancel(state) {
      state.seen.clear();
    },
  });
}

/**
 * Pairs each item with the one before it. The first item only fills the
 * slot and is not emitted on its own.
 *
 * ```ts
 * pipe(Observable.of(1, 2, 3), pairwise())  // [1, 2], [2, 3]
 * ```
 */
export function pairwise<T>(): Operator<T, [T, T]> {
  return createStatefulOperator<T, [T, T], { previous: { value: T } | null }>({
    name: "pairwise",
    createState: () => ({ previous: null }),
    transform(chunk, state, controller) {
      const previous = state.previous;
      state.previous = { value: chunk };
      if (previous) controller.enqueue([previous.value, chunk]);
    },
  });
}
