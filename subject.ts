// @filename: subject.ts
/**
 * Hot, multicast producers.
 *
 * A cold {@link Observable} runs its producer once per subscriber. The
 * classes here hold a set of subscribers instead and push every value to
 * all of them, which is what an application needs to feed a `Property`
 * from imperative code.
 *
 * - {@link Subject} forwards values sent after a subscriber joined.
 * - {@link CurrentValueSubject} additionally remembers the latest value and
 *   replays it synchronously to each new subscriber, so `Property.from()`
 *   can mirror it directly.
 *
 * Both never error: a subject completes or keeps running.
 *
 * @example
 * ```ts
 * const clicks = new Subject<number>();
 * const sub = clicks.subscribe(n => console.log("click", n));
 * clicks.next(1); // logs "click 1"
 * clicks.complete();
 * sub.closed; // true
 * ```
 *
 * @module
 */
import type { SubscriptionObserver } from "./observable.ts";

import { Observable } from "./observable.ts";
import { Symbol } from "./symbol.ts";

interface SubjectState<T> {
  observers: Set<SubscriptionObserver<T>>;
  completed: boolean;
}

function attach<T>(state: SubjectState<T>, observer: SubscriptionObserver<T>) {
  if (state.completed) {
    observer.complete();
    return;
  }

  state.observers.add(observer);
  return () => {
    state.observers.delete(observer);
  };
}

function broadcast<T>(state: SubjectState<T>, value: T): void {
  // Snapshot, so observers joining during delivery wait for the next value
  for (const observer of Array.from(state.observers)) {
    observer.next(value);
  }
}

function finish<T>(state: SubjectState<T>): void {
  if (state.completed) return;
  state.completed = true;

  const observers = Array.from(state.observers);
  state.observers.clear();
  for (const observer of observers) {
    observer.complete();
  }
}

/**
 * A multicast producer that forwards values to everyone currently
 * subscribed.
 *
 * Late subscribers only see values sent after they subscribed. Once
 * completed, new subscribers receive completion immediately.
 */
export class Subject<T> extends Observable<T> {
  #state: SubjectState<T>;

  constructor() {
    const state: SubjectState<T> = { observers: new Set(), completed: false };
    super(observer => attach(state, observer));
    this.#state = state;
  }

  /** Number of subscribers currently attached. */
  get observed(): number {
    return this.#state.observers.size;
  }

  /** Whether `complete()` has been called. */
  get completed(): boolean {
    return this.#state.completed;
  }

  /** Sends `value` to every current subscriber. Ignored after completion. */
  next(value: T): void {
    if (this.#state.completed) return;
    broadcast(this.#state, value);
  }

  /** Completes every current and future subscriber. */
  complete(): void {
    finish(this.#state);
  }

  [Symbol.dispose](): void {
    this.complete();
  }
}

/**
 * A multicast producer holding a current value.
 *
 * Every new subscriber receives the current value synchronously during
 * `subscribe()`, then every later value. After completion, new
 * subscribers get completion only.
 *
 * @example
 * ```ts
 * const count = new CurrentValueSubject(0);
 * count.subscribe(n => console.log(n)); // logs 0 right away
 * count.next(1);                        // logs 1
 * count.value;                          // 1
 * ```
 */
export class CurrentValueSubject<T> extends Observable<T> {
  #state: SubjectState<T> & { value: T };

  constructor(initial: T) {
    const state = { observers: new Set<SubscriptionObserver<T>>(), completed: false, value: initial };
    super(observer => {
      const teardown = attach(state, observer);
      if (teardown) observer.next(state.value);
      return teardown;
    });
    this.#state = state;
  }

  /** The latest value passed to the constructor or `next()`. */
  get value(): T {
    return this.#state.value;
  }

  /** Number of subscribers currently attached. */
  get observed(): number {
    return this.#state.observers.size;
  }

  /** Stores `value` and sends it to every current subscriber. Ignored after completion. */
  next(value: T): void {
    if (this.#state.completed) return;
    this.#state.value = value;
    broadcast(this.#state, value);
  }

  /** Completes every current and future subscriber. */
  complete(): void {
    finish(this.#state);
  }

  [Symbol.dispose](): void {
    this.complete();
  }
}
