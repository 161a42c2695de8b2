// @filename: property/combinators.ts
/**
 * Combinators over collections of Properties.
 *
 * Every combinator folds the collection left to right with the pairwise
 * operators on {@link Property}, so the result is itself a Property with
 * a current value computed from the current values of its inputs. An
 * empty collection yields a constant Property holding the given fallback.
 *
 * ```ts
 * const ready = all([loggedIn, online, synced]);
 * ready.value;  // true once all three are true
 * ```
 *
 * @module
 */
import { Property } from "./property.ts";

/**
 * The latest value of every Property, in order, whenever any of them
 * changes.
 */
export function combineLatestAll<T>(
  properties: ReadonlyArray<Property<T>>,
  emptyValue: T[] = [],
): Property<T[]> {
  const [first, ...rest] = properties;
  if (!first) return Property.constant(emptyValue);

  return rest.reduce<Property<T[]>>(
    (combined, property) => combined.combineLatest(property).map(([values, value]) => [...values, value]),
    first.map(value => [value]),
  );
}

/**
 * The n-th value of every Property, in order, once all of them have sent
 * an n-th value.
 */
export function zipAll<T>(
  properties: ReadonlyArray<Property<T>>,
  emptyValue: T[] = [],
): Property<T[]> {
  const [first, ...rest] = properties;
  if (!first) return Property.constant(emptyValue);

  return rest.reduce<Property<T[]>>(
    (zipped, property) => zipped.zip(property).map(([values, value]) => [...values, value]),
    first.map(value => [value]),
  );
}

/**
 * Reduces the latest values of all Properties with `reducer`.
 */
export function reduceLatest<T>(
  properties: ReadonlyArray<Property<T>>,
  reducer: (acc: T, value: T) => T,
  emptyValue: T,
): Property<T> {
  if (properties.length === 0) return Property.constant(emptyValue);

  return combineLatestAll(properties).map(values => values.reduce(reducer));
}

/** `true` while every Property is `true`. Empty collections are `true`. */
export function all(properties: ReadonlyArray<Property<boolean>>, emptyValue = true): Property<boolean> {
  return reduceLatest(properties, (acc, value) => acc && value, emptyValue);
}

/** `true` while any Property is `true`. Empty collections are `false`. */
export function any(properties: ReadonlyArray<Property<boolean>>, emptyValue = false): Property<boolean> {
  return reduceLatest(properties, (acc, value) => acc || value, emptyValue);
}
