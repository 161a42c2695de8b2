// helpers/operations/combination.ts
// Operators that combine Observables or flatten Observables of Observables

import type { SpecSubscription } from "../../_types.ts";
import type { ObservableInput } from "../../observable.ts";
import type { Operator, OperatorController } from "../_types.ts";

import { Observable } from "../../observable.ts";
import { createOperator, createStatefulOperator } from "../operators.ts";
import type { Queue } from "../../queue.ts";
import { createQueue, dequeue, enqueue, isEmpty, clear } from "../../queue.ts";

/**
 * Emits the given values synchronously on subscribe, then everything the
 * source emits.
 *
 * ```ts
 * pipe(Observable.of(2, 3), startWith(0, 1))  // 0, 1, 2, 3
 * ```
 */
export function startWith<T>(...values: T[]): Operator<T, T> {
  return createOperator<T, T>({
    name: "startWith",
    start(controller) {
      for (const value of values) {
        if (controller.closed) return;
        controller.enqueue(value);
      }
    },
    transform(chunk, controller) {
      controller.enqueue(chunk);
    },
  });
}

/**
 * Subscribes to each source in turn, moving to the next one when the
 * current one completes. Completes after the last source.
 *
 * Sources that complete synchronously are chained in a loop, so a long
 * list of synchronous sources does not grow the stack.
 *
 * ```ts
 * concat(Observable.of(1, 2), [3], Observable.of(4))  // 1, 2, 3, 4
 * ```
 */
export function concat<T>(...sources: Array<ObservableInput<T>>): Observable<T> {
  return new Observable<T>(observer => {
    let index = 0;
    let current: SpecSubscription | null = null;

    const subscribeNext = (): void => {
      while (!observer.closed) {
        if (index >= sources.length) return observer.complete();

        let subscribing = true;
        let completedSynchronously = false;

        Observable.from(sources[index++]).subscribe({
          start(sub) { current = sub; },
          next: value => observer.next(value),
          error: err => observer.error(err),
          complete() {
            current = null;
            if (subscribing) completedSynchronously = true;
            else subscribeNext();
          },
        });

        subscribing = false;
        if (!completedSynchronously) return;
      }
    };

    subscribeNext();

    return () => {
      const sub = current;
      current = null;
      sub?.unsubscribe();
    };
  });
}

/**
 * Maps each value to an inner Observable and forwards only the most recent
 * one.
 *
 * When a new value arrives, the previous inner subscription is cancelled
 * before the next inner Observable is subscribed. The output completes
 * once the source has completed **and** the active inner Observable has
 * completed.
 *
 * ```ts
 * // Only the search for the latest query is kept alive
 * pipe(queries, switchMap(q => search(q)))
 * ```
 *
 * @param project - Maps a value (and its index) to the inner Observable
 */
export function switchMap<T, R>(
  project: (value: T, index: number) => ObservableInput<R>
): Operator<T, R> {
  return createStatefulOperator<T, R, {
    inner: SpecSubscription | null;
    sourceCompleted: boolean;
    index: number;
  }>({
    name: "switchMap",

    createState: () => ({
      inner: null,
      sourceCompleted: false,
      index: 0
    }),

    transform(chunk, state, controller) {
      // Cancel any existing inner subscription
      const previous = state.inner;
      state.inner = null;
      previous?.unsubscribe();

      const innerObservable = Observable.from(project(chunk, state.index++));

      let current: SpecSubscription | null = null;
      innerObservable.subscribe({
        start(sub) {
          current = sub;
          state.inner = sub;
        },
        next: value => controller.enqueue(value),
        error: err => controller.error(err),
        complete() {
          if (state.inner !== current) return;
          state.inner = null;

          if (state.sourceCompleted) controller.terminate();
        },
      });
    },

    flush(state, controller) {
      state.sourceCompleted = true;

      // Otherwise, the active inner's completion ends the output
      if (!state.inner) controller.terminate();
    },

    cancel(state) {
      const inner = state.inner;
      state.inner = null;
      inner?.unsubscribe();
    }
  });
}

interface MergeState<T> {
  active: Set<SpecSubscription>;
  buffer: Queue<T>;
  sourceCompleted: boolean;
  index: number;
}

/**
 * Maps each value to an inner Observable and forwards the values of all of
 * them, with at most `concurrent` inner subscriptions active at a time.
 *
 * Values arriving while the limit is reached wait in a queue and are
 * projected in order as inner Observables complete. The output completes
 * once the source, the queue and every inner Observable are done.
 *
 * ```ts
 * pipe(ids, mergeMap(id => fetchUser(id), 4))  // at most 4 requests in flight
 * ```
 *
 * @param project - Maps a value (and its index) to the inner Observable
 * @param concurrent - Maximum number of active inner subscriptions
 */
export function mergeMap<T, R>(
  project: (value: T, index: number) => ObservableInput<R>,
  concurrent: number = Infinity
): Operator<T, R> {
  const limit = Math.max(1, concurrent);

  return createStatefulOperator<T, R, MergeState<T>>({
    name: "mergeMap",

    createState: () => ({
      active: new Set(),
      buffer: createQueue<T>(),
      sourceCompleted: false,
      index: 0
    }),

    transform(chunk, state, controller) {
      if (state.active.size < limit) subscribeToProjection(chunk, state, controller);
      else enqueue(state.buffer, chunk);
    },

    flush(state, controller) {
      state.sourceCompleted = true;
      if (state.active.size === 0 && isEmpty(state.buffer)) controller.terminate();
    },

    cancel(state) {
      const active = Array.from(state.active);
      state.active.clear();
      clear(state.buffer);

      for (const subscription of active) {
        subscription.unsubscribe();
      }
    }
  });

  function subscribeToProjection(
    value: T,
    state: MergeState<T>,
    controller: OperatorController<R>,
  ): void {
    const innerObservable = Observable.from(project(value, state.index++));

    let current: SpecSubscription | null = null;
    innerObservable.subscribe({
      start(sub) {
        current = sub;
        state.active.add(sub);
      },
      next: innerValue => controller.enqueue(innerValue),
      error: err => controller.error(err),
      complete() {
        if (current) state.active.delete(current);

        // Process the buffer now that there is room
        while (!controller.closed && state.active.size < limit && !isEmpty(state.buffer)) {
          subscribeToProjection(dequeue(state.buffer), state, controller);
        }

        if (state.sourceCompleted && state.active.size === 0 && isEmpty(state.buffer)) {
          controller.terminate();
        }
      },
    });
  }
}

/**
 * Combines two sources: once both have emitted, every emission of either
 * one sends a tuple of the latest value from each.
 *
 * The output completes when both sources have completed, or as soon as a
 * source completes without ever having emitted.
 *
 * ```ts
 * combineLatest(Observable.of(1), Observable.of("a", "b"))  // [1, "a"], [1, "b"]
 * ```
 */
export function combineLatest<A, B>(
  first: ObservableInput<A>,
  second: ObservableInput<B>
): Observable<[A, B]> {
  return new Observable<[A, B]>(observer => {
    let latestA: { value: A } | null = null;
    let latestB: { value: B } | null = null;
    let completed = 0;
    const subscriptions: SpecSubscription[] = [];

    const emit = () => {
      if (latestA && latestB) observer.next([latestA.value, latestB.value]);
    };

    const onComplete = (hasValue: boolean) => {
      completed++;
      if (!hasValue || completed === 2) observer.complete();
    };

    Observable.from(first).subscribe({
      start(sub) { subscriptions.push(sub); },
      next(value) {
        latestA = { value };
        emit();
      },
      error: err => observer.error(err),
      complete: () => onComplete(latestA !== null),
    });

    if (!observer.closed) {
      Observable.from(second).subscribe({
        start(sub) { subscriptions.push(sub); },
        next(value) {
          latestB = { value };
          emit();
        },
        error: err => observer.error(err),
        complete: () => onComplete(latestB !== null),
      });
    }

    return () => {
      for (const sub of subscriptions.splice(0)) sub.unsubscribe();
    };
  });
}

/**
 * Pairs up the values of two sources by position: the n-th value of
 * `first` with the n-th value of `second`.
 *
 * A side that runs ahead is buffered without limit until the other side
 * catches up. The output completes once a source has completed and every
 * value it sent has been paired.
 *
 * ```ts
 * zip(Observable.of(1, 2, 3), Observable.of("a", "b"))  // [1, "a"], [2, "b"]
 * ```
 */
export function zip<A, B>(
  first: ObservableInput<A>,
  second: ObservableInput<B>
): Observable<[A, B]> {
  return new Observable<[A, B]>(observer => {
    const bufferA = createQueue<A>();
    const bufferB = createQueue<B>();
    let completedA = false;
    let completedB = false;
    const subscriptions: SpecSubscription[] = [];

    const drain = () => {
      while (!observer.closed && !isEmpty(bufferA) && !isEmpty(bufferB)) {
        observer.next([dequeue(bufferA), dequeue(bufferB)]);
      }

      if ((completedA && isEmpty(bufferA)) || (completedB && isEmpty(bufferB))) {
        observer.complete();
      }
    };

    Observable.from(first).subscribe({
      start(sub) { subscriptions.push(sub); },
      next(value) {
        enqueue(bufferA, value);
        drain();
      },
      error: err => observer.error(err),
      complete() {
        completedA = true;
        drain();
      },
    });

    if (!observer.closed) {
      Observable.from(second).subscribe({
        start(sub) { subscriptions.push(sub); },
        next(value) {
          enqueue(bufferB, value);
          drain();
        },
        error: err => observer.error(err),
        complete() {
          completedB = true;
          drain();
        },
      });
    }

    return () => {
      clear(bufferA);
      clear(bufferB);
      for (const sub of subscriptions.splice(0)) sub.unsubscribe();
    };
  });
}
