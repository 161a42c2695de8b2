// @filename: helpers/mod.ts
/**
 * Observable Operators Library
 *
 * @module
 *
 * A collection of synchronous operators for working with Observables,
 * composed with `pipe`. These are the stream primitives the `Property`
 * layer lifts over.
 *
 * ## Core Features
 *
 * - **Synchronous**: values pushed during `subscribe()` come out before it
 *   returns, through any number of operators
 * - **Functional**: operators are plain functions, easy to compose and test
 * - **Type-safe**: full TypeScript inference through `pipe` for up to 9 operators
 *
 * ## Basic Usage
 *
 * @example
 * ```ts
 * import { pipe, map, filter, take } from "./helpers/mod.ts";
 * import { Observable } from "./observable.ts";
 *
 * const result = pipe(
 *   Observable.of(0, 1, 2, 3, 4, 5, 6, 7, 8, 9),
 *   filter(x => x % 2 === 0), // Keep even numbers
 *   map(x => x * 10),         // Multiply by 10
 *   take(3)                   // Take only the first 3 values
 * );
 *
 * result.subscribe({
 *   next: value => console.log(value),
 *   complete: () => console.log('Done')
 * });
 * // Output: 0, 20, 40, Done
 * ```
 *
 * ## Writing Operators
 *
 * `createOperator` and `createStatefulOperator` build new operators from a
 * `transform` callback, the same way the built-in ones are made.
 */

export type * from "./_types.ts";

export * from "./operations/mod.ts";
export * from "./operators.ts";
export * from "./pipe.ts";
