// @filename: property/property.ts
/**
 * An observable container that always has a current value.
 *
 * A `Property` wraps a producer that promises to emit at least one value
 * synchronously when subscribed. It subscribes once, at construction, and
 * from then on:
 *
 * - `value` reads the latest value, synchronously;
 * - `valuesWithCurrent` replays `value` to each observer, then forwards
 *   later values;
 * - `valuesWithoutCurrent` only forwards later values.
 *
 * However many observers attach, the producer is subscribed exactly once.
 *
 * ```ts
 * const input = new CurrentValueSubject("a");
 * const upper = Property.from(input).map(s => s.toUpperCase());
 *
 * upper.value;                       // "A"
 * upper.valuesWithCurrent.subscribe(console.log);  // logs "A"
 * input.next("b");                   // logs "B"
 * ```
 *
 * ## Lifetime
 *
 * A Property lives while it is reachable or while anything observes it.
 * Each observer's subscription keeps its Property (and so the producer
 * subscription) alive until it is unsubscribed; a derived Property keeps
 * the Property it was derived from alive in the same way. Once a Property
 * is neither observed nor referenced, it is garbage collected and its
 * producer subscription is released by a finalizer.
 *
 * Keep the `Subscription` you get from `subscribe()` and unsubscribe it
 * when done; that is what ends an observation.
 *
 * @module
 */
import type { SpecObservable, SpecSubscription } from "../_types.ts";
import type { ObservableInput, SubscriptionObserver } from "../observable.ts";
import type { Operator } from "../helpers/_types.ts";
import type { Scheduler } from "../helpers/operations/timing.ts";
import type { CurrentValueSubject } from "../subject.ts";
import type { Result } from "../result.ts";

import { Observable, never, of } from "../observable.ts";
import { PropertyContractError } from "../error.ts";
import { Symbol } from "../symbol.ts";
import { pipe } from "../helpers/pipe.ts";
import {
  compactMap,
  distinct,
  distinctUntilChanged,
  drop,
  filter,
  map,
  pairwise,
  scan,
  take,
} from "../helpers/operations/core.ts";
import {
  combineLatest,
  concat,
  mergeMap,
  startWith,
  switchMap,
  zip,
} from "../helpers/operations/combination.ts";
import { observeOn } from "../helpers/operations/timing.ts";
import { materialize } from "../helpers/operations/errors.ts";
import { CurrentValueCache } from "./cache.ts";
import { MulticastDistributor } from "./distributor.ts";

/**
 * Releases the producer subscription of a Property that was collected.
 * The held subscription never references its Property.
 */
const registry = new FinalizationRegistry<SpecSubscription>((subscription) => {
  subscription.unsubscribe();
});

/** Something that turns a value into another representation, and may throw. */
export interface Decoder<In, Out> {
  decode(input: In): Out;
}

/** Something that serializes a value, and may throw. */
export interface Encoder<In, Out> {
  encode(value: In): Out;
}

export interface FlatMapMergeOptions {
  /**
   * Maximum number of inner Properties observed at once. `0` is treated as
   * `1`. Defaults to no limit.
   */
  concurrent?: number;
}

export class Property<T> implements SpecObservable<T> {
  #cache: CurrentValueCache<T>;
  #distributor: MulticastDistributor<T>;

  /**
   * Emits the current value synchronously on subscribe, then every later
   * value. Completes when the producer completes; an observer joining after
   * that receives the final value and then completion.
   */
  readonly valuesWithCurrent: Observable<T>;

  /**
   * Emits every value that arrives after subscribing. An observer joining
   * after the producer completed receives completion only.
   */
  readonly valuesWithoutCurrent: Observable<T>;

  private constructor(producer: ObservableInput<T>) {
    const cache = new CurrentValueCache<T>();
    const distributor = new MulticastDistributor(cache);
    this.#cache = cache;
    this.#distributor = distributor;

    // Teardowns call back into `this`, so an observed Property stays alive
    this.valuesWithoutCurrent = new Observable<T>(observer => {
      if (!this.#distributor.attach(observer)) return;
      return () => this.#detach(observer);
    });

    this.valuesWithCurrent = new Observable<T>(observer => {
      if (this.#distributor.completed) {
        observer.next(this.#cache.read());
        observer.complete();
        return;
      }

      if (!this.#distributor.attach(observer)) return;
      observer.next(this.#cache.read());
      return () => this.#detach(observer);
    });

    const subscription = distributor.connect(producer);
    if (!cache.hasValue) {
      const failure = distributor.failure;
      distributor.disconnect();

      const error = failure
        ? new PropertyContractError("The producer failed before sending a value.", { cause: failure.error })
        : new PropertyContractError(
          subscription.closed
            ? "The producer terminated without sending a value."
            : "The producer did not send a value synchronously on subscribe.",
        );
      console.error(error.toString());
      throw error;
    }

    if (!subscription.closed) registry.register(this, subscription);
  }

  #detach(observer: SubscriptionObserver<T>): void {
    this.#distributor.detach(observer);
  }

  /**
   * Starts with `initial`, then follows `then`.
   *
   * ```ts
   * Property.of(0).value;                   // 0, never changes
   * Property.of(0, clicks).value;           // 0 until `clicks` emits
   * Property.of("loading", fetchStatus());  // promise resolves later
   * ```
   */
  static of<T>(initial: T, then: ObservableInput<T> = never()): Property<T> {
    return new Property(concat<T>(of(initial), then));
  }

  /**
   * Mirrors a {@link CurrentValueSubject}, or any producer that sends its
   * current value synchronously on subscribe.
   *
   * @throws {PropertyContractError} When the producer sends nothing during
   *   subscription.
   */
  static from<T>(subject: CurrentValueSubject<T> | SpecObservable<T>): Property<T> {
    return new Property(subject);
  }

  /** A Property that holds `value` forever. It is complete from the start. */
  static constant<T>(value: T): Property<T> {
    return new Property(of(value));
  }

  /**
   * Wraps `producer` without adding an initial value. The producer must
   * send at least one value synchronously when subscribed.
   *
   * @throws {PropertyContractError} When it does not.
   */
  static unsafe<T>(producer: ObservableInput<T>): Property<T> {
    return new Property(producer);
  }

  /** The latest value. */
  get value(): T {
    return this.#cache.read();
  }

  /** Number of observers attached to either stream. */
  get observed(): number {
    return this.#distributor.observerCount;
  }

  /** Whether the producer has completed. The value no longer changes. */
  get completed(): boolean {
    return this.#distributor.completed;
  }

  [Symbol.observable](): Observable<T> {
    return this.valuesWithCurrent;
  }

  // Lifting

  /**
   * Builds a Property from the stream of all values, current first. The
   * operator must emit synchronously for the current value.
   */
  lift<R>(operator: Operator<T, R>): Property<R> {
    return Property.unsafe(operator(this.valuesWithCurrent));
  }

  /**
   * Builds a Property that starts at `initial` and then follows the
   * operator applied to later values only.
   */
  liftSubsequent<R>(initial: R, operator: Operator<T, R>): Property<R> {
    return Property.unsafe(concat<R>(of(initial), operator(this.valuesWithoutCurrent)));
  }

  /**
   * Like {@link lift}, for operators that may drop the current value. The
   * current value is recomputed through the operator and used if it passes,
   * otherwise the result starts at `fallback`.
   */
  liftWithFallback<R>(fallback: R, operator: Operator<T, R>): Property<R> {
    return Property.unsafe(pipe(this.valuesWithCurrent, operator, startWith(fallback)));
  }

  /** Builds a Property from this one's and `other`'s streams of all values. */
  liftWith<U, R>(
    other: Property<U>,
    combine: (values: Observable<T>, otherValues: Observable<U>) => ObservableInput<R>,
  ): Property<R> {
    return Property.unsafe(combine(this.valuesWithCurrent, other.valuesWithCurrent));
  }

  /**
   * Applies a function that may throw, capturing each outcome as a
   * {@link Result}.
   */
  liftCatching<R>(transform: (value: T) => R, name?: string): Property<Result<R>> {
    return this.lift(materialize<T, R>(value => transform(value), name));
  }

  // Operators

  map<R>(transform: (value: T) => R): Property<R> {
    return this.lift(map<T, R>(value => transform(value)));
  }

  /** Replaces every value with `value`. */
  mapTo<R>(value: R): Property<R> {
    return this.lift(map<T, R>(() => value));
  }

  /**
   * Projects one key, or a tuple of up to three keys, out of every value.
   *
   * ```ts
   * user.pluck("name");          // Property<string>
   * user.pluck("name", "age");   // Property<[string, number]>
   * ```
   */
  pluck<K extends keyof T>(key: K): Property<T[K]>;
  pluck<K0 extends keyof T, K1 extends keyof T>(key0: K0, key1: K1): Property<[T[K0], T[K1]]>;
  pluck<K0 extends keyof T, K1 extends keyof T, K2 extends keyof T>(
    key0: K0,
    key1: K1,
    key2: K2,
  ): Property<[T[K0], T[K1], T[K2]]>;
  pluck(...keys: Array<keyof T>): Property<unknown> {
    if (keys.length === 1) {
      const [key] = keys;
      return this.map(value => value[key]);
    }

    return this.map(value => keys.map(key => value[key]));
  }

  /**
   * Keeps values passing `predicate`. The current value is `value` if it
   * passes, otherwise `initial`.
   */
  filter(initial: T, predicate: (value: T) => boolean): Property<T> {
    return this.liftWithFallback(initial, filter<T>(value => predicate(value)));
  }

  /**
   * Maps values and drops `null` and `undefined` results. The current value
   * falls back to `initial` when the mapped current value is dropped.
   */
  compactMap<R>(initial: R, transform: (value: T) => R | null | undefined): Property<R> {
    return this.liftWithFallback(initial, compactMap<T, R>(value => transform(value)));
  }

  /**
   * Skips the first `count` values, counting the current one. Starts at
   * `initial` unless `count` is `0`.
   */
  drop(initial: T, count: number): Property<T> {
    return this.liftWithFallback(initial, drop<T>(count));
  }

  /**
   * Takes the first `count` values, counting the current one, then stops
   * changing. Starts at `initial` when `count` is `0`.
   */
  take(initial: T, count: number): Property<T> {
    return this.liftWithFallback(initial, take<T>(count));
  }

  /**
   * Folds later values into an accumulator. The current value is `seed`
   * until this Property changes.
   */
  scan<R>(seed: R, accumulator: (acc: R, value: T) => R): Property<R> {
    return this.liftSubsequent(seed, scan<T, R>((acc, value) => accumulator(acc, value), seed));
  }

  /** Drops values equal to the previous one. */
  removeDuplicates(isEqual: (previous: T, current: T) => boolean = Object.is): Property<T> {
    return this.lift(distinctUntilChanged(isEqual));
  }

  /** Drops values (or their keys) that were seen before. */
  uniqueValues<K = T>(keySelector?: (value: T) => K): Property<T> {
    return this.lift(distinct(keySelector));
  }

  /**
   * Pairs every value with the one before it. The first pair uses
   * `initialPrevious`, or the current value when omitted.
   *
   * ```ts
   * const n = Property.of(1, counter);
   * n.combinePrevious().value;   // [1, 1]
   * n.combinePrevious(0).value;  // [0, 1]
   * ```
   */
  combinePrevious(...initialPrevious: [] | [T]): Property<[T, T]> {
    const previous = initialPrevious.length === 1 ? initialPrevious[0] : this.value;
    return this.lift(values => pipe(values, startWith(previous), pairwise()));
  }

  /**
   * Delivers later values through `scheduler`. The current value is
   * unchanged, and `value` updates when the scheduled delivery runs.
   */
  receiveOn(scheduler: Scheduler): Property<T> {
    return this.liftSubsequent(this.value, observeOn<T>(scheduler));
  }

  /**
   * Follows the Property returned for the latest value. Switching drops the
   * previous inner Property. The result completes once this Property and
   * the inner Property it follows have both completed.
   *
   * ```ts
   * const selected = Property.from(selection);
   * const detail = selected.flatMap(id => loadDetail(id));  // Property<Detail>
   * ```
   */
  flatMap<R>(transform: (value: T) => Property<R>): Property<R> {
    return this.lift(switchMap<T, R>(value => transform(value)));
  }

  /**
   * Merges the values of the Properties returned for each value, observing
   * at most `concurrent` of them at once.
   */
  flatMapMerge<R>(
    transform: (value: T) => Property<R>,
    { concurrent = Infinity }: FlatMapMergeOptions = {},
  ): Property<R> {
    return this.lift(mergeMap<T, R>(value => transform(value), concurrent === 0 ? 1 : concurrent));
  }

  /** Pairs the latest values of this Property and `other`. */
  combineLatest<U>(other: Property<U>): Property<[T, U]> {
    return this.liftWith(other, (values, otherValues) => combineLatest(values, otherValues));
  }

  /** Pairs values of this Property and `other` by position. */
  zip<U>(other: Property<U>): Property<[T, U]> {
    return this.liftWith(other, (values, otherValues) => zip(values, otherValues));
  }

  // Catching operators

  /**
   * Decodes every value, capturing decoder failures as failed results.
   *
   * ```ts
   * const json = { decode: (text: string) => JSON.parse(text) };
   * Property.of('{"a":1}').decode(json).value;  // { success: true, value: { a: 1 } }
   * ```
   */
  decode<R>(decoder: Decoder<T, R>): Property<Result<R>> {
    return this.liftCatching(value => decoder.decode(value), "decode");
  }

  /** Encodes every value, capturing encoder failures as failed results. */
  encode<R>(encoder: Encoder<T, R>): Property<Result<R>> {
    return this.liftCatching(value => encoder.encode(value), "encode");
  }

  /** Maps with a function that may throw, capturing failures as results. */
  tryMap<R>(transform: (value: T) => R): Property<Result<R>> {
    return this.liftCatching(transform, "tryMap");
  }

  // Boolean operators

  negate(this: Property<boolean>): Property<boolean> {
    return this.map(value => !value);
  }

  and(this: Property<boolean>, other: Property<boolean>): Property<boolean> {
    return this.combineLatest(other).map(([a, b]) => a && b);
  }

  or(this: Property<boolean>, other: Property<boolean>): Property<boolean> {
    return this.combineLatest(other).map(([a, b]) => a || b);
  }

  get [Symbol.toStringTag](): "Property" { return "Property"; }
}
