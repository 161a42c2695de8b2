// @filename: property/cache.ts
import { PropertyContractError } from "../error.ts";

/**
 * Holds the latest value a Property has seen.
 *
 * `write()` and `read()` run to completion on the single JavaScript
 * thread, so a reader never observes a half-written value and no lock is
 * needed. A `hasValue` flag is tracked separately so that `undefined` is a
 * legal value.
 */
export class CurrentValueCache<T> {
  #slot: { value: T } | null = null;

  /** Whether anything has been written yet. */
  get hasValue(): boolean {
    return this.#slot !== null;
  }

  write(value: T): void {
    this.#slot = { value };
  }

  /**
   * @throws {PropertyContractError} When nothing was written yet. This only
   *   happens if a Property is read before its producer delivered a value,
   *   which construction rules out.
   */
  read(): T {
    const slot = this.#slot;
    if (!slot) {
      const error = new PropertyContractError("Property value read before the producer sent one.", {
        operator: "property:value",
      });
      console.error(error.toString());
      throw error;
    }

    return slot.value;
  }
}
