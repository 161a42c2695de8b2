// @filename: error.ts
/**
 * Error types for Observable operators and Property construction.
 *
 * Two kinds of failure exist in this library:
 *
 * - **Transformation failures** (a decoder or mapping function throwing) are
 *   wrapped in an {@link ObservableError} that records which operator failed
 *   and on which value. Catching operators such as `materialize` turn these
 *   into `Result` values so the stream keeps going.
 * - **Contract violations** (a producer that promised a synchronous current
 *   value and did not deliver one) throw a {@link PropertyContractError}.
 *   These point at a defect in the calling code and are never turned into
 *   values.
 *
 * @module
 */

/**
 * Represents an error that occurred during Observable operations,
 * with the ability to aggregate multiple underlying errors.
 *
 * This class extends AggregateError to provide additional context about
 * where and how errors occurred in an Observable pipeline. It can collect
 * multiple errors that occur during a chain of operations while preserving
 * the contextual information about each error.
 *
 * Key features:
 * - Tracks which operator caused the error
 * - Captures the value being processed when the error occurred
 * - Preserves the original error objects
 *
 * @example
 * ```ts
 * const err = ObservableError.from(new SyntaxError("bad json"), "property:decode", "{");
 * err.operator; // "property:decode"
 * err.value;    // "{"
 * err.errors;   // [SyntaxError: bad json]
 * ```
 */
// Cyclic objects and BigInt fields make JSON.stringify throw
function stringifyValue(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export class ObservableError extends AggregateError {
  /** The operator where the error occurred */
  readonly operator?: string;

  /** The value being processed when the error occurred */
  readonly value?: unknown;

  /** Helpful potential fixes for errors */
  readonly tip?: unknown;

  /**
   * Creates a new ObservableError.
   *
   * @param errors - The error(s) that caused this error
   * @param message - The error message
   * @param options - Additional error context
   */
  constructor(
    errors: unknown,
    message: string,
    options?: {
      operator?: string;
      value?: unknown;
      cause?: unknown;
      tip?: unknown;
    }
  ) {
    // Normalize errors to an array of Error objects
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'ObservableError';
    this.operator = options?.operator;
    this.value = options?.value;
    this.tip = options?.tip;
  }

  /**
   * Returns a string representation of the error including the operator
   * and value context if available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.operator) {
      result += `\n  in operator: ${this.operator}`;
    }

    if (this.value !== undefined) {
      const valueStr = typeof this.value === 'object'
        ? stringifyValue(this.value).slice(0, 100) // Truncate long objects
        : String(this.value);

      result += `\n  processing value: ${valueStr}`;
    }

    if (this.errors.length > 0) {
      result += '\n  with errors:';
      this.errors.forEach((err, i) => {
        result += `\n    ${i + 1}) ${err}`;
      });
    }

    if (this.tip) {
      result += `\n  tip: ${this.tip}`;
    }

    return result;
  }

  /**
   * Creates an ObservableError from any error that occurs during
   * operator execution.
   *
   * An error that already is an ObservableError is returned as-is, unless it
   * lacks an operator name, in which case a copy carrying `operator` is made.
   *
   * @param error - The original error
   * @param operator - The operator name
   * @param value - The value being processed
   * @param tip - Hint shown by `toString()`
   */
  static from(
    error: unknown,
    operator?: string,
    value?: unknown,
    tip?: unknown
  ): ObservableError {
    if (error instanceof ObservableError) {
      if (!error.operator && operator) {
        return new ObservableError(
          error.errors,
          error.message,
          {
            operator,
            value: error.value ?? value,
            cause: error.cause,
            tip: error.tip ?? tip
          }
        );
      }
      return error;
    }

    return new ObservableError(
      error,
      error instanceof Error ? error.message : String(error),
      { operator, value, cause: error, tip }
    );
  }
}

/**
 * Thrown when a producer handed to `Property` breaks the promise of a
 * synchronously available current value, e.g. it completed without ever
 * emitting, or emitted nothing during subscription.
 *
 * When the producer errored instead, that error is kept as `cause` and as
 * the only entry of `errors`.
 *
 * This is a programming error at the call site. It is logged with
 * `console.error` before being thrown and is never delivered through a
 * stream or wrapped in a `Result`.
 */
export class PropertyContractError extends ObservableError {
  constructor(message: string, options?: { operator?: string; tip?: unknown; cause?: unknown }) {
    super(options?.cause === undefined ? [] : [options.cause], message, {
      operator: options?.operator ?? "property:construct",
      cause: options?.cause,
      tip: options?.tip ??
        "Use Property.of(initial, then) or make the producer emit synchronously on subscribe.",
    });
    this.name = 'PropertyContractError';
  }
}

/**
 * Checks if a value is an ObservableError without throwing.
 *
 * Subclasses such as {@link PropertyContractError} count as well.
 *
 * @example
 * ```ts
 * if (isObservableError(err)) {
 *   console.log(err.operator);
 * }
 * ```
 */
export function isObservableError(value: unknown): value is ObservableError {
  return value instanceof ObservableError;
}
