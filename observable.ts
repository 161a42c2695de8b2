// @filename: observable.ts
/**
 * A TC39-inspired, **synchronous-first** Observable.
 *
 * A push-based stream abstraction: a producer function that, once
 * subscribed, sends zero or more values and then optionally completes or
 * errors. This is the event source every `Property` is built on.
 *
 * ## Delivery
 * Subscribing runs the producer immediately, on the caller's stack. Values
 * the producer emits while it is being subscribed reach the observer before
 * `subscribe()` returns. The Property layer relies on this to read a current
 * value right after construction.
 *
 * ## Error Propagation Policy
 * 1. **Local catch**: If your observer supplies an `error` callback, **all**
 *    upstream errors funnel there.
 * 2. **Unhandled-rejection style**: If no `error` handler is provided the
 *    exception is re-thrown on the micro-task queue (same timing semantics as
 *    an unhandled Promise rejection).
 * 3. **Observer callback failures**: Exceptions thrown inside `next()` or
 *    `complete()` are routed to `error()` if present, otherwise bubble as in
 *    (2).
 * 4. **Errors inside `error()`**: A second-level failure is *always* queued to
 *    the micro-task queue.
 *
 * ## Edge-Cases & Gotchas
 * - `subscribe()` can synchronously call `complete()`/`error()` and still have
 *   its teardown captured. The teardown then runs right after the producer
 *   returns.
 * - Subscribing twice to a *cold* observable runs the producer twice. Wrap it
 *   in a `Property` (or a `Subject`) if you want fan-out.
 *
 * @example
 * ```ts
 * import { Observable } from './observable.ts';
 *
 * const ticks = new Observable<number>(obs => {
 *   let n = 0;
 *   const id = setInterval(() => obs.next(n++), 1000);
 *   return () => clearInterval(id);
 * });
 *
 * const sub = ticks.subscribe({
 *   next: n => console.log("tick", n),
 *   error: err => console.error(err),
 * });
 *
 * setTimeout(() => sub.unsubscribe(), 3500);
 * ```
 *
 * @module
 */
import type {
  ObservableProtocol,
  Observer,
  SpecObservable,
  SpecSubscription,
  Subscription,
} from "./_types.ts";
import { Symbol } from "./symbol.ts";

/**
 * What a producer may return to be called on unsubscribe, error or
 * completion.
 */
export type Teardown =
  | (() => void)
  | SpecSubscription
  | AsyncDisposable
  | Disposable
  | null
  | undefined
  | void;

/**
 * Anything `Observable.from()` knows how to convert.
 */
export type ObservableInput<T> =
  | SpecObservable<T>
  | Iterable<T>
  | AsyncIterable<T>
  | PromiseLike<T>
  | ArrayLike<T>;

/**
 * Internal state of a subscription.
 *
 * Kept outside the public `Subscription` object so observers cannot
 * tamper with it.
 */
interface StateMap<T> {
  closed: boolean;
  observer: Observer<T> | null;
  cleanup: Teardown;
  removeAbortHandler: (() => void) | null;
}

const SubscriptionStateMap = new WeakMap<Subscription, StateMap<unknown>>();

function reportError(err: unknown): void {
  queueMicrotask(() => { throw err; });
}

function hasMethod(value: unknown, key: PropertyKey): boolean {
  return (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    typeof Reflect.get(value, key) === "function";
}

function isTeardown(value: unknown): value is Teardown {
  return value === null || value === undefined ||
    typeof value === "function" ||
    hasMethod(value, "unsubscribe") ||
    hasMethod(value, Symbol.dispose) ||
    hasMethod(value, Symbol.asyncDispose);
}

function createSubscription<T>(observer: Observer<T>, opts?: { signal?: AbortSignal } | null): Subscription {
  // Observer's methods should be functions if they exist
  if (observer.next !== undefined && typeof observer.next !== 'function') {
    throw new TypeError('Observer.next must be a function');
  }
  if (observer.error !== undefined && typeof observer.error !== 'function') {
    throw new TypeError('Observer.error must be a function');
  }
  if (observer.complete !== undefined && typeof observer.complete !== 'function') {
    throw new TypeError('Observer.complete must be a function');
  }

  const stateMap: StateMap<T> = {
    closed: false,
    observer,
    cleanup: null,
    removeAbortHandler: null,
  };

  const subscription: Subscription = {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },

    get closed() { return stateMap.closed; },

    unsubscribe(): void { closeSubscription(this, stateMap); },

    [Symbol.dispose]() {
      this.unsubscribe();
    },

    [Symbol.asyncDispose]() {
      return Promise.resolve(this.unsubscribe());
    }
  };

  // Unsubscribing via AbortSignal
  const signal = opts?.signal;
  if (signal) {
    if (signal.aborted) {
      stateMap.closed = true;
      stateMap.observer = null;
    } else {
      const abortHandler = () => subscription.unsubscribe();
      signal.addEventListener("abort", abortHandler, { once: true });
      stateMap.removeAbortHandler = () => signal.removeEventListener("abort", abortHandler);
    }
  }

  SubscriptionStateMap.set(subscription, stateMap);
  return subscription;
}

function closeSubscription(subscription: Subscription, stateMap?: StateMap<unknown> | null): void {
  const state = stateMap ?? SubscriptionStateMap.get(subscription);
  if (!state || state.closed) return;

  // Mark closed first so re-entrant calls are no-ops
  state.closed = true;

  const cleanup = state.cleanup;
  const removeAbortHandler = state.removeAbortHandler;

  state.cleanup = null;
  state.observer = null;
  state.removeAbortHandler = null;

  removeAbortHandler?.();

  try {
    cleanupSubscription(cleanup);
  } finally {
    SubscriptionStateMap.delete(subscription);
  }
}

function cleanupSubscription(cleanup: Teardown): void {
  if (!cleanup) return;

  try {
    if (typeof cleanup === 'function') cleanup();
    else if ("unsubscribe" in cleanup) cleanup.unsubscribe();
    else if (Symbol.asyncDispose in cleanup) {
      cleanup[Symbol.asyncDispose]().then(undefined, reportError);
    }
    else if (Symbol.dispose in cleanup) cleanup[Symbol.dispose]();
  } catch (err) {
    // Cleanup errors must not interrupt the unsubscribe flow
    reportError(err);
  }
}

/**
 * The object handed to a producer function. Wraps the consumer's observer
 * so that nothing is delivered once the subscription is closed, and
 * closes the subscription on `error()` or `complete()`.
 */
export class SubscriptionObserver<T> {
  #state: StateMap<T> | null = null;

  #subscription: Subscription | null = null;

  /** `true` once the consumer unsubscribed or the producer terminated. */
  get closed(): boolean {
    return this.#state?.closed ?? true;
  }

  constructor(subscription: Subscription) {
    this.#subscription = subscription;
    this.#state = SubscriptionStateMap.get(subscription) ?? null;
  }

  /** Sends the next value to the consumer. */
  next(value: T): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    if (!observer) return;

    const nextFn = observer.next;
    if (typeof nextFn !== 'function') return;

    try {
      nextFn.call(observer, value);
    } catch (err) {
      const errorFn = observer.error;
      if (typeof errorFn === "function") {
        try { errorFn.call(observer, err); }
        catch (innerErr) { reportError(innerErr); }
      }

      // HostReportErrors emulation
      else reportError(err);
    }
  }

  /** Sends an error to the consumer and closes the subscription. */
  error(err: unknown): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    if (observer && typeof observer.error === 'function') {
      try { observer.error.call(observer, err); }
      catch (innerErr) { reportError(innerErr); }
    }

    // No error handler, delegate to host
    else reportError(err);

    this.#close();
  }

  /** Signals completion to the consumer and closes the subscription. */
  complete(): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    if (observer && typeof observer.complete === "function") {
      try {
        observer.complete.call(observer);
      } catch (err) {
        if (typeof observer.error === "function") {
          try { observer.error.call(observer, err); }
          catch (innerErr) { reportError(innerErr); }
        }
        else reportError(err);
      }
    }

    this.#close();
  }

  #close(): void {
    const subscription = this.#subscription;
    this.#subscription = null;
    if (!subscription) return;

    try { subscription.unsubscribe(); }
    catch (err) { reportError(err); }
  }

  get [Symbol.toStringTag](): "Subscription Observer" { return "Subscription Observer" as const; }
}

/**
 * A cold, lazily-run push stream.
 *
 * Nothing happens until `subscribe()` is called; every call runs the
 * producer function again with a fresh {@link SubscriptionObserver}.
 *
 * @typeParam T - Type of the values the stream sends
 */
export class Observable<T> implements SpecObservable<T>, ObservableProtocol<T> {
  #subscribeFn: (obs: SubscriptionObserver<T>) => Teardown;

  /**
   * @param subscribeFn - Producer run once per subscription. It may return
   *   a teardown: a function, an object with `unsubscribe()`, or a
   *   (async) disposable.
   */
  constructor(subscribeFn: (obs: SubscriptionObserver<T>) => Teardown) {
    if (typeof subscribeFn !== 'function') {
      throw new TypeError('Observable initializer must be a function');
    }

    this.#subscribeFn = subscribeFn;
  }

  /** Returns itself, for interop with other Observable libraries. */
  [Symbol.observable](): Observable<T> { return this; }

  /**
   * Subscribes to the stream.
   *
   * The producer runs synchronously: anything it emits during this call is
   * delivered before `subscribe()` returns.
   *
   * @example
   * ```ts
   * const sub = Observable.of(1, 2, 3).subscribe({
   *   next: v => console.log(v),
   *   complete: () => console.log("done"),
   * });
   * // logs 1, 2, 3, "done" before this line runs
   * sub.closed; // true
   * ```
   */
  subscribe(observer: Observer<T>, opts?: { signal?: AbortSignal }): Subscription;

  subscribe(
    next: (value: T) => void,
    error?: (e: unknown) => void,
    complete?: () => void,
    opts?: { signal?: AbortSignal },
  ): Subscription;

  subscribe(
    observerOrNext: Observer<T> | ((value: T) => void),
    errorOrOpts?: ((e: unknown) => void) | { signal?: AbortSignal },
    complete?: () => void,
    _opts?: { signal?: AbortSignal }
  ): Subscription {
    // Null or primitive observers fall back to an empty one
    const observer: Observer<T> = typeof observerOrNext === 'function'
      ? {
        next: observerOrNext,
        error: typeof errorOrOpts === 'function' ? errorOrOpts : undefined,
        complete,
      }
      : (observerOrNext ?? {});

    const opts = typeof observerOrNext === 'function'
      ? _opts
      : (typeof errorOrOpts === 'object' ? errorOrOpts : undefined);

    const subscription = createSubscription(observer, opts);
    const state = SubscriptionStateMap.get(subscription);
    if (!state) return subscription;

    const subObserver = new SubscriptionObserver<T>(subscription);

    try {
      observer.start?.(subscription);
      if (subscription.closed) return subscription;
    } catch (err) {
      // Report, but return a closed subscription
      console.error(err);
      reportError(err);

      subscription.unsubscribe();
      return subscription;
    }

    try {
      const cleanup: unknown = this.#subscribeFn.call(undefined, subObserver);

      if (!isTeardown(cleanup)) {
        throw new TypeError('Expected subscriber to return a function, an unsubscribe object, a disposable with a [Symbol.dispose] method, an async-disposable with a [Symbol.asyncDispose] method, or undefined/null');
      }

      // Producer terminated synchronously, teardown runs right away
      if (subscription.closed) cleanupSubscription(cleanup);
      else state.cleanup = cleanup;
    } catch (err) {
      subObserver.error(err);
    }

    return subscription;
  }

  static readonly from: typeof from = from;

  static readonly of: typeof of = of;

  static readonly empty: typeof empty = empty;

  static readonly never: typeof never = never;

  get [Symbol.toStringTag](): "Observable" { return "Observable"; }
}

/**
 * An Observable that completes immediately on subscribe.
 */
export function empty<T = never>(): Observable<T> {
  return new Observable<T>(obs => obs.complete());
}

/**
 * An Observable that never emits and never completes.
 */
export function never<T = never>(): Observable<T> {
  return new Observable<T>(() => {});
}

/**
 * Emits each argument synchronously, then completes.
 *
 * @example
 * ```ts
 * Observable.of(1, 2, 3).subscribe(v => console.log(v)); // 1, 2, 3
 * ```
 */
export function of<T>(...items: T[]): Observable<T> {
  return new Observable<T>(obs => {
    for (let i = 0; i < items.length; i++) {
      obs.next(items[i]);
      if (obs.closed) return;
    }

    obs.complete();
  });
}

function isInterop<T>(input: ObservableInput<T>): input is SpecObservable<T> {
  return hasMethod(input, Symbol.observable);
}

function isArrayLike<T>(input: ObservableInput<T>): input is ArrayLike<T> {
  return typeof input === "string" ||
    (typeof input === "object" && input !== null && typeof Reflect.get(input, "length") === "number");
}

function isIterable<T>(input: ObservableInput<T>): input is Iterable<T> {
  return hasMethod(input, Symbol.iterator);
}

function isAsyncIterable<T>(input: ObservableInput<T>): input is AsyncIterable<T> {
  return hasMethod(input, Symbol.asyncIterator);
}

function isPromiseLike<T>(input: ObservableInput<T>): input is PromiseLike<T> {
  return hasMethod(input, "then");
}

/**
 * Converts an interop observable, array-like, iterable, async iterable or
 * promise into an Observable.
 *
 * Arrays and other synchronous iterables are emitted synchronously on
 * subscribe. Promises and async iterables emit later.
 *
 * @example
 * ```ts
 * Observable.from([1, 2, 3]);
 * Observable.from(new Set(["a", "b"]));
 * Observable.from(Promise.resolve(42));
 * Observable.from(someRxJsObservable);
 * ```
 */
export function from<T>(input: ObservableInput<T>): Observable<T> {
  if (input === null || input === undefined) {
    throw new TypeError('Cannot convert undefined or null to Observable');
  }

  // Object with @@observable
  if (isInterop(input)) {
    const observable = input[Symbol.observable]();

    if (observable instanceof Observable) return observable;

    if (!observable || typeof observable.subscribe !== 'function') {
      throw new TypeError('Object returned from [Symbol.observable]() does not implement subscribe method');
    }

    return new Observable<T>(observer => {
      const sub = observable.subscribe({
        next: value => observer.next(value),
        error: err => observer.error(err),
        complete: () => observer.complete(),
      });
      return () => sub.unsubscribe();
    });
  }

  // Index loop for arrays, typed arrays and strings
  if (isArrayLike(input)) {
    const len = input.length;
    return new Observable<T>(obs => {
      for (let i = 0; i < len; i++) {
        obs.next(input[i]);
        if (obs.closed) return;
      }

      obs.complete();
    });
  }

  if (isIterable(input)) {
    return new Observable<T>(obs => {
      const iterator = input[Symbol.iterator]();

      try {
        for (let step = iterator.next(); !step.done; step = iterator.next()) {
          obs.next(step.value);
          if (obs.closed) break;
        }

        obs.complete();
      } catch (err) {
        obs.error(err);
      }

      return () => {
        try {
          iterator.return?.(); // IteratorClose
        } catch (err) { reportError(err); }
      };
    });
  }

  if (isAsyncIterable(input)) {
    return new Observable<T>(obs => {
      const asyncIterator = input[Symbol.asyncIterator]();

      (async () => {
        try {
          for (let step = await asyncIterator.next(); !step.done; step = await asyncIterator.next()) {
            obs.next(step.value);
            if (obs.closed) break;
          }

          obs.complete();
        } catch (err) {
          obs.error(err);
        }
      })().then(undefined, reportError);

      return () => {
        asyncIterator.return?.().then(undefined, reportError);
      };
    });
  }

  if (isPromiseLike(input)) {
    return new Observable<T>(obs => {
      input.then(
        value => {
          obs.next(value);
          obs.complete();
        },
        err => obs.error(err)
      );
    });
  }

  throw new TypeError('Input is not Observable, Iterable, AsyncIterable, Promise, or ArrayLike');
}
