import type { SpecObservable } from "../_types.ts";
import type { Observable } from "../observable.ts";

/**
 * A function from one Observable to another.
 *
 * Operators are plain functions so they compose with `pipe()` and can be
 * applied to anything exposing `[Symbol.observable]()`, a `Property`'s
 * streams included.
 */
export type Operator<In, Out> = (source: SpecObservable<In>) => Observable<Out>;

/**
 * Synchronous counterpart of a `TransformStreamDefaultController`, handed to
 * operator callbacks.
 *
 * Every call delivers downstream immediately, on the current stack.
 */
export interface OperatorController<R> {
  /** Sends a value downstream. */
  enqueue(value: R): void;

  /** Errors the output and unsubscribes from the source. */
  error(err: unknown): void;

  /** Completes the output and unsubscribes from the source. */
  terminate(): void;

  /** Whether the output has already errored, completed or been unsubscribed. */
  readonly closed: boolean;
}

export interface BaseTransformOptions {
  /** Name used in `ObservableError.operator` when a callback throws. */
  name?: string;
}

// ========================================
// CREATEOPERATOR INTERFACES
// ========================================

/**
 * Options for {@link createOperator}.
 */
export interface TransformFunctionOptions<T, R> extends BaseTransformOptions {
  /**
   * Called for each source value. Enqueue zero or more outputs.
   */
  transform: (chunk: T, controller: OperatorController<R>) => void;

  /**
   * Called when the source completes. The output completes once `flush`
   * calls `controller.terminate()`; without a `flush` it completes right
   * away.
   */
  flush?: (controller: OperatorController<R>) => void;

  /**
   * Called on subscribe, before the source is subscribed.
   */
  start?: (controller: OperatorController<R>) => void;

  /**
   * Called when the consumer unsubscribes before the output terminated.
   */
  cancel?: () => void;
}

// ========================================
// CREATESTATEFULOPERATOR INTERFACES
// ========================================

/**
 * Options for {@link createStatefulOperator}. Like
 * {@link TransformFunctionOptions}, with a state object created per
 * subscription and passed to every callback.
 */
export interface StatefulTransformFunctionOptions<T, R, S> extends BaseTransformOptions {
  createState: () => S;

  transform: (chunk: T, state: S, controller: OperatorController<R>) => void;

  flush?: (state: S, controller: OperatorController<R>) => void;

  start?: (state: S, controller: OperatorController<R>) => void;

  cancel?: (state: S) => void;
}
