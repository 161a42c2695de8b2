/**
 * Observable **value containers** built on a small, synchronous-first,
 * TC39-inspired Observable.
 *
 * A plain Observable is a stream: it tells you when something changes, but
 * it cannot tell you what the value is *right now*. UI state, settings and
 * connection status need both. A {@link Property} gives you both:
 *
 * ```ts
 * import { CurrentValueSubject, Property } from "./mod.ts";
 *
 * const online = new CurrentValueSubject(false);
 * const status = Property.from(online).map(up => (up ? "online" : "offline"));
 *
 * status.value;  // "offline", readable synchronously
 *
 * const sub = status.valuesWithCurrent.subscribe(s => render(s));  // renders "offline"
 * online.next(true);  // renders "online"
 * sub.unsubscribe();
 * ```
 *
 * Think of it as a **variable you can subscribe to**. Deriving a Property
 * with `map`, `filter`, `flatMap` or `combineLatest` gives you another
 * Property whose current value is already computed, however many observers
 * you attach to it later.
 *
 * ## What's in here
 *
 * - {@link Observable}: the push-based stream everything is built on.
 *   Values sent while subscribing arrive before `subscribe()` returns.
 * - {@link Subject} and {@link CurrentValueSubject}: hot producers you feed
 *   from imperative code.
 * - `pipe()` and the operators in `helpers/`: `map`, `filter`, `scan`,
 *   `switchMap`, `mergeMap`, `combineLatest`, `zip`, `observeOn` and more.
 * - {@link Property} and the collection combinators `all`, `any`,
 *   `reduceLatest`, `combineLatestAll` and `zipAll`.
 * - {@link ObservableError} and {@link Result}, for failures that carry the
 *   operator and the value that caused them.
 *
 * ## Errors
 *
 * Operators that run your callbacks wrap anything they throw in an
 * `ObservableError`. The catching operators (`materialize`, and
 * `decode`/`encode`/`tryMap` on Property) turn failures into `Result`
 * values instead, so one bad value never ends a stream. Breaking the
 * Property contract (a producer with no synchronous first value) throws a
 * {@link PropertyContractError} at construction.
 *
 * @module
 */
export * from "./observable.ts";
export * from "./subject.ts";
export * from "./error.ts";
export * from "./result.ts";
export * from "./helpers/mod.ts";
export * from "./property/mod.ts";

export type * from "./_types.ts";
