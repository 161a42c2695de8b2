// @filename: result.ts
/**
 * A success-or-failure value, for transformations that can fail per value.
 *
 * Catching operators (`materialize`, and the `decode`/`encode`/`tryMap`
 * operators on `Property`) emit these instead of erroring, so one bad input
 * never ends the stream.
 *
 * @example
 * ```ts
 * const parsed = materializeJSON(input);
 * if (isSuccess(parsed)) use(parsed.value);
 * else console.warn(parsed.error.operator, parsed.error.value);
 * ```
 *
 * @module
 */
import { ObservableError } from "./error.ts";

export interface Success<T> {
  readonly success: true;
  readonly value: T;
}

export interface Failure {
  readonly success: false;
  /** Carries the failing operator's name and the input that failed. */
  readonly error: ObservableError;
}

export type Result<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { success: true, value };
}

/**
 * Wraps `error` in an {@link ObservableError} unless it already is one.
 */
export function failure(error: unknown, operator?: string, value?: unknown): Failure {
  return { success: false, error: ObservableError.from(error, operator, value) };
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.success;
}

/**
 * The success value, or `fallback` for a failure.
 */
export function unwrapOr<T, F = T>(result: Result<T>, fallback: F): T | F {
  return result.success ? result.value : fallback;
}
