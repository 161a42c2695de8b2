// @filename: _types.ts
import type { Symbol } from "./symbol.ts";

/**
 * The minimal subscribable contract that `[Symbol.observable]()` must return.
 *
 * Anything implementing this protocol can feed a `Property` or be passed
 * through `Observable.from()`, so producers from other Observable libraries
 * interoperate without adapters.
 *
 * @example
 * ```ts
 * const source: ObservableProtocol<number> = {
 *   subscribe(observer) {
 *     observer.next?.(1);
 *     observer.complete?.();
 *     return { unsubscribe() {} };
 *   }
 * };
 * ```
 */
export interface ObservableProtocol<T> {
  subscribe(observer: SpecObserver<T>): SpecSubscription;
  subscribe(
    next: (value: T) => void,
    error?: (error: unknown) => void,
    complete?: () => void
  ): SpecSubscription;
}

/**
 * A cancellable connection to a producer. Calling `unsubscribe()` more
 * than once has no further effect.
 */
export interface SpecSubscription {
  unsubscribe(): void;
}

/**
 * A consumer of push notifications. Every callback is optional.
 *
 * `start` runs before the producer does, which is the only place a
 * consumer can get hold of its subscription while the producer is still
 * emitting synchronously.
 */
export interface SpecObserver<T> {
  start?(subscription: SpecSubscription): void;
  next?(value: T): void;
  error?(error: unknown): void;
  complete?(): void;
}

/**
 * Any object exposing `[Symbol.observable]()`.
 */
export interface SpecObservable<T> {
  [Symbol.observable](): ObservableProtocol<T>;
}

/**
 * Observer accepted by this library's `Observable.subscribe`.
 *
 * Identical to {@link SpecObserver} except that `start` receives the richer
 * {@link Subscription}.
 *
 * @example
 * ```ts
 * const observer: Observer<number> = {
 *   start(subscription) {
 *     console.log("open:", !subscription.closed);
 *   },
 *   next(value) {
 *     console.log("tick", value);
 *   },
 * };
 * ```
 */
export interface Observer<T> extends SpecObserver<T> {
  start?(subscription: Subscription): void;
}

/**
 * Subscription handle returned by `Observable.subscribe`.
 *
 * A subscription is closed once `unsubscribe()` is called or the producer
 * errors or completes. It never reopens.
 *
 * Works with `using` / `await using` blocks through `Symbol.dispose` and
 * `Symbol.asyncDispose`.
 *
 * @example
 * ```ts
 * const sub = property.valuesWithoutCurrent.subscribe(render);
 * console.log(sub.closed); // false
 * sub.unsubscribe();
 * console.log(sub.closed); // true
 * ```
 */
export interface Subscription extends SpecSubscription, Disposable, AsyncDisposable {
  readonly closed: boolean;
  [Symbol.dispose](): void;
  [Symbol.asyncDispose](): Promise<void>;
  readonly [Symbol.toStringTag]: "Subscription";
}
