import { test, expect, vi } from "vitest";

import { CurrentValueSubject, Subject } from "../../subject.ts";
import { Property } from "../../property/property.ts";
import { map } from "../../helpers/operations/core.ts";
import { asyncScheduler } from "../../helpers/operations/timing.ts";
import { record } from "../_utils/_record.ts";

function source<T>(initial: T) {
  const subject = new CurrentValueSubject(initial);
  return { subject, property: Property.from(subject) };
}

// -----------------------------------------------------------------------------
// map() / mapTo() / pluck()
// -----------------------------------------------------------------------------

test("map computes the current value eagerly and follows changes", () => {
  const { subject, property } = source(2);
  const doubled = property.map((n) => n * 2);

  expect(doubled.value).toBe(4);
  subject.next(5);
  expect(doubled.value).toBe(10);
});

test("map runs once per value, not once per observer", () => {
  const { subject, property } = source(1);
  const transform = vi.fn((n: number) => n + 1);
  const derived = property.map(transform);

  record(derived.valuesWithCurrent);
  record(derived.valuesWithCurrent);
  subject.next(2);

  expect(transform).toHaveBeenCalledTimes(2);
});

test("mapTo replaces every value", () => {
  const { subject, property } = source(1);
  const constant = property.mapTo("x");

  subject.next(2);
  expect(constant.value).toBe("x");
});

test("pluck projects one key or a tuple of keys", () => {
  const { subject, property } = source({ name: "ada", age: 36, admin: false });

  const name = property.pluck("name");
  const pair = property.pluck("name", "age");
  const triple = property.pluck("name", "age", "admin");

  expect(name.value).toBe("ada");
  expect(pair.value).toEqual(["ada", 36]);
  expect(triple.value).toEqual(["ada", 36, false]);

  subject.next({ name: "grace", age: 45, admin: true });
  expect(pair.value).toEqual(["grace", 45]);
});

test("lift applies any operator to the stream of all values", () => {
  const { subject, property } = source(1);
  const labelled = property.lift(map((n: number, i) => `${i}:${n}`));

  expect(labelled.value).toBe("0:1");
  subject.next(7);
  expect(labelled.value).toBe("1:7");
});

// -----------------------------------------------------------------------------
// filter() / compactMap() / drop() / take()
// -----------------------------------------------------------------------------

test("filter keeps the current value when it passes", () => {
  const { property } = source(4);
  expect(property.filter(0, (n) => n % 2 === 0).value).toBe(4);
});

test("filter falls back to the initial value when the current one fails", () => {
  const { subject, property } = source(3);
  const even = property.filter(0, (n) => n % 2 === 0);
  const recording = record(even.valuesWithCurrent);

  expect(even.value).toBe(0);

  subject.next(5);
  subject.next(8);

  expect(recording.values).toEqual([0, 8]);
});

test("compactMap drops null results and falls back for the current value", () => {
  const { subject, property } = source("x");
  const parsed = property.compactMap(-1, (s) => {
    const n = Number(s);
    return Number.isNaN(n) ? null : n;
  });

  expect(parsed.value).toBe(-1);

  subject.next("12");
  subject.next("nope");
  expect(parsed.value).toBe(12);
});

test("drop counts the current value as the first one", () => {
  const { subject, property } = source(1);
  const dropped = property.drop(0, 2);

  expect(dropped.value).toBe(0);
  subject.next(2);
  expect(dropped.value).toBe(0);
  subject.next(3);
  expect(dropped.value).toBe(3);

  expect(property.drop(-1, 0).value).toBe(3);
});

test("take stops following after the requested count", () => {
  const { subject, property } = source(1);
  const taken = property.take(0, 2);

  subject.next(2);
  subject.next(3);

  expect(taken.value).toBe(2);
  expect(taken.completed).toBe(true);
});

test("take(0) holds the initial value", () => {
  const { property } = source(1);
  const none = property.take(-1, 0);

  expect(none.value).toBe(-1);
  expect(none.completed).toBe(true);
});

// -----------------------------------------------------------------------------
// scan() / removeDuplicates() / uniqueValues() / combinePrevious()
// -----------------------------------------------------------------------------

test("scan starts at the seed and folds later values", () => {
  const { subject, property } = source(100);
  const sum = property.scan(0, (acc, n) => acc + n);

  expect(sum.value).toBe(0);

  subject.next(1);
  subject.next(2);
  expect(sum.value).toBe(3);
});

test("removeDuplicates drops repeated values", () => {
  const { subject, property } = source(1);
  const recording = record(property.removeDuplicates().valuesWithCurrent);

  subject.next(1);
  subject.next(2);
  subject.next(2);
  subject.next(1);

  expect(recording.values).toEqual([1, 2, 1]);
});

test("uniqueValues only lets unseen values through", () => {
  const { subject, property } = source("a");
  const recording = record(property.uniqueValues().valuesWithCurrent);

  subject.next("b");
  subject.next("a");
  subject.next("c");

  expect(recording.values).toEqual(["a", "b", "c"]);
});

test("combinePrevious pairs with the current value by default", () => {
  const { subject, property } = source(1);
  const pairs = property.combinePrevious();

  expect(pairs.value).toEqual([1, 1]);
  subject.next(2);
  expect(pairs.value).toEqual([1, 2]);
});

test("combinePrevious takes an explicit first previous value", () => {
  const { subject, property } = source(1);
  const pairs = property.combinePrevious(0);

  expect(pairs.value).toEqual([0, 1]);
  subject.next(5);
  expect(pairs.value).toEqual([1, 5]);
});

// -----------------------------------------------------------------------------
// combineLatest() / zip()
// -----------------------------------------------------------------------------

test("combineLatest pairs the latest values of both", () => {
  const a = source(1);
  const b = source("x");
  const combined = a.property.combineLatest(b.property);

  expect(combined.value).toEqual([1, "x"]);

  a.subject.next(2);
  expect(combined.value).toEqual([2, "x"]);

  b.subject.next("y");
  expect(combined.value).toEqual([2, "y"]);
});

test("zip pairs values by position", () => {
  const first = new Subject<number>();
  const second = new Subject<number>();
  const zipped = Property.of(1, first).zip(Property.of(2, second));

  expect(zipped.value).toEqual([1, 2]);

  first.next(10);
  expect(zipped.value).toEqual([1, 2]);

  second.next(20);
  expect(zipped.value).toEqual([10, 20]);
});

// -----------------------------------------------------------------------------
// receiveOn()
// -----------------------------------------------------------------------------

test("receiveOn keeps the current value and delivers later values on the scheduler", async () => {
  vi.useFakeTimers();
  try {
    const { subject, property } = source(1);
    const later = property.receiveOn(asyncScheduler);

    expect(later.value).toBe(1);

    subject.next(2);
    expect(later.value).toBe(1);

    await vi.runAllTimersAsync();
    expect(later.value).toBe(2);
  } finally {
    vi.useRealTimers();
  }
});

// -----------------------------------------------------------------------------
// Boolean operators
// -----------------------------------------------------------------------------

test("negate, and, or combine boolean Properties", () => {
  const a = source(true);
  const b = source(false);

  expect(a.property.negate().value).toBe(false);
  expect(a.property.and(b.property).value).toBe(false);
  expect(a.property.or(b.property).value).toBe(true);

  const both = a.property.and(b.property);
  b.subject.next(true);
  expect(both.value).toBe(true);
});

test("and of two constants", () => {
  expect(Property.constant(true).and(Property.constant(false)).value).toBe(false);
  expect(Property.constant(true).and(Property.constant(true)).value).toBe(true);
});
