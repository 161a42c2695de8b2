// helpers/pipe.ts
// Composition utility for Observable operators

import type { SpecObservable } from "../_types.ts";
import type { Operator } from "./_types.ts";

import { Observable } from "../observable.ts";
import { Symbol } from "../symbol.ts";

/**
 * Applies operators to a source, left to right, with full type inference
 * for up to 9 operators.
 *
 * Wiring is synchronous and lazy: nothing subscribes to `source` until the
 * returned Observable is subscribed.
 *
 * @example
 * ```ts
 * const result = pipe(
 *   Observable.of(1, 2, 3, 4),
 *   map(x => x * 2),
 *   filter(x => x > 4),
 * );
 * result.subscribe(console.log); // 6, 8
 * ```
 */
export function pipe<T>(
  source: SpecObservable<T>,
): Observable<T>;

export function pipe<T, A>(
  source: SpecObservable<T>,
  op1: Operator<T, A>
): Observable<A>;

export function pipe<T, A, B>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>
): Observable<B>;

export function pipe<T, A, B, C>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Observable<C>;

export function pipe<T, A, B, C, D>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>
): Observable<D>;

export function pipe<T, A, B, C, D, E>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>
): Observable<E>;

export function pipe<T, A, B, C, D, E, F>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>
): Observable<F>;

export function pipe<T, A, B, C, D, E, F, G>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>
): Observable<G>;

export function pipe<T, A, B, C, D, E, F, G, H>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>
): Observable<H>;

export function pipe<T, A, B, C, D, E, F, G, H, I>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>
): Observable<I>;

// Implementation
export function pipe(
  source: SpecObservable<unknown>,
  ...operators: Array<Operator<unknown, unknown>>
): Observable<unknown> {
  if (operators.length > 9) {
    throw new Error('pipe: Too many operators (maximum 9).');
  }

  if (typeof source?.[Symbol.observable] !== "function") {
    throw new TypeError('pipe: source must be an Observable');
  }

  let result: Observable<unknown> = Observable.from(source);
  for (const [i, operator] of operators.entries()) {
    if (typeof operator !== "function") {
      throw new TypeError(`pipe: operator[${i + 1}] must be a function`);
    }

    result = operator(result);
  }

  return result;
}
