/**
 * Observable containers with a synchronously readable current value.
 *
 * @module
 */
export * from "./property.ts";
export * from "./combinators.ts";
