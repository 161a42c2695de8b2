import { test, expect } from "vitest";

import { Observable } from "../../../observable.ts";
import { Subject } from "../../../subject.ts";
import { pipe } from "../../../helpers/pipe.ts";
import {
  combineLatest,
  concat,
  mergeMap,
  startWith,
  switchMap,
  zip,
} from "../../../helpers/operations/combination.ts";
import { record } from "../../_utils/_record.ts";

// -----------------------------------------------------------------------------
// startWith() / concat()
// -----------------------------------------------------------------------------

test("startWith emits its values before the source", () => {
  expect(record(pipe(Observable.of(2, 3), startWith(0, 1))).values).toEqual([0, 1, 2, 3]);
});

test("concat subscribes to each source in turn", () => {
  const second = new Subject<number>();
  const recording = record(concat(Observable.of(1, 2), second, [9]));

  expect(recording.values).toEqual([1, 2]);
  expect(second.observed).toBe(1);

  second.next(3);
  second.complete();

  expect(recording.values).toEqual([1, 2, 3, 9]);
  expect(recording.completed).toBe(true);
});

test("concat handles many synchronous sources", () => {
  const sources = Array.from({ length: 5000 }, (_, i) => Observable.of(i));
  const recording = record(concat(...sources));

  expect(recording.values).toHaveLength(5000);
  expect(recording.values[4999]).toBe(4999);
  expect(recording.completed).toBe(true);
});

test("unsubscribing from concat unsubscribes the active source", () => {
  const first = new Subject<number>();
  const recording = record(concat(first, Observable.of(1)));

  recording.subscription.unsubscribe();
  expect(first.observed).toBe(0);
});

// -----------------------------------------------------------------------------
// switchMap()
// -----------------------------------------------------------------------------

test("switchMap follows only the latest inner observable", () => {
  const source = new Subject<number>();
  const inners = [new Subject<number>(), new Subject<number>()];
  const recording = record(pipe(source, switchMap((i) => inners[i])));

  source.next(0);
  inners[0].next(1);
  source.next(1);
  inners[0].next(2);
  inners[1].next(3);

  expect(recording.values).toEqual([1, 3]);
  expect(inners[0].observed).toBe(0);
});

test("switchMap delivers synchronous inner values immediately", () => {
  const result = pipe(Observable.of(1, 2), switchMap((n) => Observable.of(n * 10, n * 10 + 1)));
  expect(record(result).values).toEqual([10, 11, 20, 21]);
});

test("switchMap completes when the source and the active inner have completed", () => {
  const inner = new Subject<number>();
  const recording = record(pipe(Observable.of(1), switchMap(() => inner)));

  expect(recording.completed).toBe(false);
  inner.complete();
  expect(recording.completed).toBe(true);
});

test("switchMap ignores completion of a replaced inner", () => {
  const source = new Subject<number>();
  const first = new Subject<number>();
  const second = new Subject<number>();
  const recording = record(pipe(source, switchMap((n) => (n === 1 ? first : second))));

  source.next(1);
  source.next(2);
  source.complete();
  first.complete();

  expect(recording.completed).toBe(false);
  second.complete();
  expect(recording.completed).toBe(true);
});

// -----------------------------------------------------------------------------
// mergeMap()
// -----------------------------------------------------------------------------

test("mergeMap forwards values of every inner observable", () => {
  const source = new Subject<number>();
  const inners = [new Subject<string>(), new Subject<string>()];
  const recording = record(pipe(source, mergeMap((i) => inners[i])));

  source.next(0);
  source.next(1);
  inners[1].next("b");
  inners[0].next("a");

  expect(recording.values).toEqual(["b", "a"]);
});

test("mergeMap queues projections beyond the concurrency limit", () => {
  const source = new Subject<number>();
  const inners = [new Subject<number>(), new Subject<number>()];
  const recording = record(pipe(source, mergeMap((i) => inners[i], 1)));

  source.next(0);
  source.next(1);
  expect(inners[1].observed).toBe(0);

  inners[0].next(10);
  inners[0].complete();
  expect(inners[1].observed).toBe(1);

  inners[1].next(20);
  expect(recording.values).toEqual([10, 20]);
});

test("mergeMap treats a limit of 0 as 1", () => {
  const result = pipe(Observable.of(1, 2), mergeMap((n) => Observable.of(n), 0));
  const recording = record(result);

  expect(recording.values).toEqual([1, 2]);
  expect(recording.completed).toBe(true);
});

test("mergeMap completes after the source and every inner complete", () => {
  const source = new Subject<number>();
  const inner = new Subject<number>();
  const recording = record(pipe(source, mergeMap(() => inner)));

  source.next(1);
  source.complete();
  expect(recording.completed).toBe(false);

  inner.complete();
  expect(recording.completed).toBe(true);
});

// -----------------------------------------------------------------------------
// combineLatest() / zip()
// -----------------------------------------------------------------------------

test("combineLatest emits once both sides have a value", () => {
  const a = new Subject<number>();
  const b = new Subject<string>();
  const recording = record(combineLatest(a, b));

  a.next(1);
  expect(recording.values).toEqual([]);

  b.next("x");
  a.next(2);
  b.next("y");

  expect(recording.values).toEqual([[1, "x"], [2, "x"], [2, "y"]]);
});

test("combineLatest completes when a side completes without a value", () => {
  const a = new Subject<number>();
  const recording = record(combineLatest(a, Observable.empty<number>()));

  expect(recording.completed).toBe(true);
  expect(a.observed).toBe(0);
});

test("combineLatest completes when both sides complete", () => {
  const recording = record(combineLatest(Observable.of(1), Observable.of("a", "b")));

  expect(recording.values).toEqual([[1, "a"], [1, "b"]]);
  expect(recording.completed).toBe(true);
});

test("zip pairs values by position", () => {
  const a = new Subject<number>();
  const b = new Subject<string>();
  const recording = record(zip(a, b));

  a.next(1);
  a.next(2);
  b.next("x");

  expect(recording.values).toEqual([[1, "x"]]);

  b.next("y");
  expect(recording.values).toEqual([[1, "x"], [2, "y"]]);
});

test("zip completes once a completed side has been fully paired", () => {
  const recording = record(zip(Observable.of(1, 2, 3), Observable.of("a", "b")));

  expect(recording.values).toEqual([[1, "a"], [2, "b"]]);
  expect(recording.completed).toBe(true);
});
