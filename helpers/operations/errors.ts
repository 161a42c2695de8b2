import type { Operator } from "../_types.ts";
import type { Result } from "../../result.ts";

import { createStatefulOperator } from "../operators.ts";
import { failure, success } from "../../result.ts";

/**
 * Applies a function that may throw to every value, turning each outcome
 * into a `Result` instead of erroring the stream.
 *
 * A plain `map` whose function throws errors the whole output and stops
 * it. `materialize` catches per value: a throw becomes a failure value
 * carrying an `ObservableError` (with the operator name and the failing
 * input) and the next value is processed as usual.
 *
 * @example
 * ```ts
 * import { pipe, materialize } from "./helpers/mod.ts";
 *
 * const parsed = pipe(
 *   Observable.of('{"a":1}', "{oops", "2"),
 *   materialize(text => JSON.parse(text), "json")
 * );
 * // Emits:
 * //   { success: true, value: { a: 1 } }
 * //   { success: false, error: ObservableError (operator "operator:materialize:json", value "{oops") }
 * //   { success: true, value: 2 }
 * ```
 *
 * ## Practical Use Case
 *
 * Use `materialize` for parsing or validating untrusted input, where a
 * single malformed item should be reported rather than tear down the
 * stream for every later item.
 *
 * @template T The type of input values
 * @template R The type the function returns
 * @param project Function that may throw
 * @param name Label added to the operator name of failures
 */
export function materialize<T, R>(
  project: (value: T, index: number) => R,
  name?: string,
): Operator<T, Result<R>> {
  const operatorName = name ? `operator:materialize:${name}` : "operator:materialize";

  return createStatefulOperator<T, Result<R>, { index: number }>({
    name: "materialize",
    createState: () => ({ index: 0 }),
    transform(chunk, state, controller) {
      let result: Result<R>;
      try {
        result = success(project(chunk, state.index++));
      } catch (err) {
        result = failure(err, operatorName, chunk);
      }

      controller.enqueue(result);
    },
  });
}
