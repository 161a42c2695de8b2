/**
 * Operators are the building blocks of Observable pipelines.
 *
 * If you've ever used `Array.map` or `Array.filter`, you already know the core idea:
 * an **operator** takes a sequence of values and transforms, filters, or combines them
 * into a new sequence.
 *
 * ```ts
 * // Double every number in a stream
 * const double = createOperator<number, number>({
 *   name: "double",
 *   transform(chunk, controller) {
 *     controller.enqueue(chunk * 2);
 *   }
 * });
 *
 * // Only allow even numbers through
 * const evens = createOperator<number, number>({
 *   name: "evens",
 *   transform(chunk, controller) {
 *     if (chunk % 2 === 0) controller.enqueue(chunk);
 *   }
 * });
 *
 * pipe(Observable.of(1, 2, 3, 4), double, evens).subscribe(console.log);
 * // Output: 2, 4, 6, 8
 * ```
 *
 * ## Synchronous delivery
 *
 * The operators built here run entirely on the stack of whoever pushed the
 * source value: a value emitted while the source is being subscribed comes
 * out of the operator before `subscribe()` returns. `Property` depends on
 * this to compute a derived current value during construction.
 *
 * ## Errors
 *
 * A callback that throws errors the output with an `ObservableError`
 * naming the operator and the value being processed, and unsubscribes from
 * the source. Errors from the source are forwarded unchanged.
 *
 * @module
 */
import type { SpecSubscription } from "../_types.ts";
import type {
  Operator,
  OperatorController,
  StatefulTransformFunctionOptions,
  TransformFunctionOptions,
} from "./_types.ts";

import { Observable } from "../observable.ts";
import { ObservableError } from "../error.ts";

/**
 * Creates a stateless operator from a `transform` callback.
 *
 * @example
 * ```ts
 * const toUpper = createOperator<string, string>({
 *   name: "toUpper",
 *   transform(chunk, controller) {
 *     controller.enqueue(chunk.toUpperCase());
 *   }
 * });
 * ```
 */
export function createOperator<T, R>(options: TransformFunctionOptions<T, R>): Operator<T, R> {
  const { name, transform, flush, start, cancel } = options;

  return createStatefulOperator<T, R, undefined>({
    name,
    createState: () => undefined,
    transform: (chunk, _, controller) => transform(chunk, controller),
    flush: flush && ((_, controller) => flush(controller)),
    start: start && ((_, controller) => start(controller)),
    cancel: cancel && (() => cancel()),
  });
}

/**
 * Creates an operator whose callbacks share a state object.
 *
 * `createState()` runs once per subscription, so two subscribers of the
 * same operated Observable never see each other's state.
 *
 * @example
 * ```ts
 * // Running average that needs to remember previous values
 * const runningAverage = () => createStatefulOperator<number, number, { sum: number; count: number }>({
 *   name: 'runningAverage',
 *   createState: () => ({ sum: 0, count: 0 }),
 *
 *   transform(chunk, state, controller) {
 *     state.sum += chunk;
 *     state.count++;
 *     controller.enqueue(state.sum / state.count);
 *   },
 * });
 * ```
 */
export function createStatefulOperator<T, R, S>(
  options: StatefulTransformFunctionOptions<T, R, S>
): Operator<T, R> {
  const operatorName = `operator:stateful:${options.name || 'unknown'}`;

  // Extract only what we need to avoid retaining the full options object
  const { createState, transform, flush, start, cancel } = options;

  return (source) => new Observable<R>(observer => {
    let upstream: SpecSubscription | null = null;
    let terminated = false;

    const release = () => {
      const sub = upstream;
      upstream = null;
      sub?.unsubscribe();
    };

    const controller: OperatorController<R> = {
      get closed() { return observer.closed; },
      enqueue(value) { observer.next(value); },
      error(err) {
        terminated = true;
        observer.error(err);
        release();
      },
      terminate() {
        terminated = true;
        observer.complete();
        release();
      },
    };

    let state: S;
    try {
      state = createState();
      start?.(state, controller);
    } catch (err) {
      controller.error(ObservableError.from(err, `${operatorName}:start`));
      return;
    }

    if (observer.closed) return;

    Observable.from(source).subscribe({
      start(sub) { upstream = sub; },
      next(chunk) {
        if (observer.closed) return;

        try {
          transform(chunk, state, controller);
        } catch (err) {
          controller.error(ObservableError.from(err, operatorName, chunk));
        }
      },
      error(err) { controller.error(err); },
      complete() {
        upstream = null;
        if (!flush) return controller.terminate();

        try {
          flush(state, controller);
        } catch (err) {
          controller.error(ObservableError.from(err, `${operatorName}:flush`));
        }
      },
    });

    return () => {
      release();
      if (terminated) return;

      try {
        cancel?.(state);
      } catch (err) {
        queueMicrotask(() => { throw ObservableError.from(err, `${operatorName}:cancel`); });
      }
    };
  });
}
