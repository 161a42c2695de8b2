// @filename: property/distributor.ts
/**
 * Fans one producer subscription out to any number of observers.
 *
 * The distributor subscribes to its producer once, when the Property is
 * constructed, and writes every value to the {@link CurrentValueCache}
 * before forwarding it, so an observer that reads `property.value` while
 * handling a value sees that same value.
 *
 * ## Ownership
 *
 * The producer only holds the distributor through an {@link Anchor}: a weak
 * reference, plus a strong one that is set while at least one observer is
 * attached. Consequently:
 *
 * - while observed, the producer keeps the distributor (and through the
 *   observers' teardowns, the Property) alive;
 * - once unobserved, the distributor lives exactly as long as its Property
 *   is reachable, and the Property's finalizer releases the producer
 *   subscription.
 *
 * ## Ordering
 *
 * A value that arrives while another is being delivered (an observer
 * feeding the producer from inside its own callback) is queued and
 * delivered after the current one has reached every observer, so all
 * observers see one order. Until then the cache still holds the value being
 * delivered: an observer that calls `subject.next(2)` and reads
 * `property.value` right after gets the previous value, and sees `2` once
 * its own callback has returned and the queued value is delivered.
 *
 * ## Errors
 *
 * A producer error ends the Property. Observers receive it through their
 * `error` callback. With nobody attached, it is logged with `console.error`
 * so it is not lost, except while the Property is still being constructed:
 * then the constructor throws a `PropertyContractError` carrying it.
 *
 * @module
 */
import type { SpecObservable, Subscription } from "../_types.ts";
import type { ObservableInput, SubscriptionObserver } from "../observable.ts";
import type { Queue } from "../queue.ts";
import type { CurrentValueCache } from "./cache.ts";

import { ObservableError } from "../error.ts";
import { Observable } from "../observable.ts";
import { createQueue, dequeue, enqueue, isEmpty } from "../queue.ts";

type Notification<T> =
  | { kind: "next"; value: T }
  | { kind: "error"; error: unknown }
  | { kind: "complete" };

/**
 * How the producer reaches a distributor.
 */
interface Anchor<T> {
  readonly weak: WeakRef<MulticastDistributor<T>>;
  strong: MulticastDistributor<T> | null;
}

function resolve<T>(anchor: Anchor<T>): MulticastDistributor<T> | undefined {
  return anchor.strong ?? anchor.weak.deref();
}

// Lives outside the class so that no callback closes over the distributor
function createUpstreamObserver<T>(anchor: Anchor<T>) {
  return {
    next: (value: T) => resolve(anchor)?.receive({ kind: "next", value }),
    error: (error: unknown) => resolve(anchor)?.receive({ kind: "error", error }),
    complete: () => resolve(anchor)?.receive({ kind: "complete" }),
  };
}

export class MulticastDistributor<T> {
  #cache: CurrentValueCache<T>;
  #anchor: Anchor<T>;
  #observers = new Set<SubscriptionObserver<T>>();
  #pending: Queue<Notification<T>> = createQueue();
  #delivering = false;
  #terminal: Exclude<Notification<T>, { kind: "next" }> | null = null;
  #upstream: Subscription | null = null;

  // Kept so that the producer lives as long as whoever reads from it
  #source: SpecObservable<T> | null = null;

  constructor(cache: CurrentValueCache<T>) {
    this.#cache = cache;
    this.#anchor = { weak: new WeakRef(this), strong: null };
  }

  /** Number of attached observers. */
  get observerCount(): number {
    return this.#observers.size;
  }

  /** Whether the producer has completed (or errored). */
  get completed(): boolean {
    return this.#terminal !== null;
  }

  /** The producer's error, if it terminated with one. */
  get failure(): { error: unknown } | null {
    const terminal = this.#terminal;
    return terminal?.kind === "error" ? { error: terminal.error } : null;
  }

  /**
   * Subscribes to `producer`. Values it sends synchronously are in the
   * cache when this returns.
   *
   * @returns The producer subscription, for the owner to release.
   */
  connect(producer: ObservableInput<T>): Subscription {
    const source = Observable.from(producer);
    const subscription = source.subscribe(createUpstreamObserver(this.#anchor));

    if (!subscription.closed) {
      this.#upstream = subscription;
      this.#source = source;
    }

    return subscription;
  }

  /**
   * Adds an observer. If the producer already terminated, the observer is
   * terminated right away and `false` is returned.
   */
  attach(observer: SubscriptionObserver<T>): boolean {
    const terminal = this.#terminal;
    if (terminal) {
      if (terminal.kind === "error") observer.error(terminal.error);
      else observer.complete();
      return false;
    }

    this.#observers.add(observer);
    this.#anchor.strong = this;
    return true;
  }

  /** Removes an observer. Detaching twice, or after completion, is a no-op. */
  detach(observer: SubscriptionObserver<T>): void {
    if (!this.#observers.delete(observer)) return;
    if (this.#observers.size === 0) this.#anchor.strong = null;
  }

  /**
   * Entry point for producer notifications. Called through the anchor only.
   *
   * Re-entrant calls only enqueue; the outermost call drains the queue, so
   * the cache lags behind the producer until the running delivery returns.
   */
  receive(notification: Notification<T>): void {
    if (this.#terminal) return;

    enqueue(this.#pending, notification);
    if (this.#delivering) return;

    this.#delivering = true;
    try {
      while (!isEmpty(this.#pending) && !this.#terminal) {
        this.#deliver(dequeue(this.#pending));
      }
    } finally {
      this.#delivering = false;
    }
  }

  #deliver(notification: Notification<T>): void {
    if (notification.kind === "next") {
      this.#cache.write(notification.value);
      for (const observer of Array.from(this.#observers)) {
        observer.next(notification.value);
      }
      return;
    }

    this.#terminal = notification;
    this.#upstream = null;
    this.#source = null;
    this.#anchor.strong = null;

    const observers = Array.from(this.#observers);
    this.#observers.clear();
    if (notification.kind === "error" && observers.length === 0 && this.#cache.hasValue) {
      console.error(ObservableError.from(notification.error, "property:distribute").toString());
    }

    for (const observer of observers) {
      if (notification.kind === "error") observer.error(notification.error);
      else observer.complete();
    }
  }

  /**
   * Cancels the producer subscription and detaches everyone. Used when the
   * owning Property is discarded during construction.
   */
  disconnect(): void {
    const upstream = this.#upstream;
    this.#upstream = null;
    this.#source = null;
    this.#anchor.strong = null;
    this.#observers.clear();
    upstream?.unsubscribe();
  }
}
