import { test, expect } from "vitest";

import { CurrentValueSubject, Subject } from "../subject.ts";
import { record } from "./_utils/_record.ts";

// -----------------------------------------------------------------------------
// Subject
// -----------------------------------------------------------------------------

test("Subject forwards values to every current subscriber", () => {
  const subject = new Subject<number>();
  const first = record(subject);
  subject.next(1);
  const second = record(subject);
  subject.next(2);

  expect(first.values).toEqual([1, 2]);
  expect(second.values).toEqual([2]);
  expect(subject.observed).toBe(2);
});

test("Subject forgets unsubscribed observers", () => {
  const subject = new Subject<number>();
  const recording = record(subject);

  recording.subscription.unsubscribe();
  subject.next(1);

  expect(recording.values).toEqual([]);
  expect(subject.observed).toBe(0);
});

test("Subject completes current and late subscribers", () => {
  const subject = new Subject<number>();
  const early = record(subject);

  subject.complete();
  subject.next(1);
  const late = record(subject);

  expect(early.completed).toBe(true);
  expect(early.values).toEqual([]);
  expect(late.completed).toBe(true);
  expect(subject.completed).toBe(true);
  expect(subject.observed).toBe(0);
});

test("an observer joining during delivery waits for the next value", () => {
  const subject = new Subject<number>();
  const joined: number[] = [];

  subject.subscribe((v) => {
    if (v === 1) subject.subscribe((w) => joined.push(w));
  });

  subject.next(1);
  subject.next(2);

  expect(joined).toEqual([2]);
});

// -----------------------------------------------------------------------------
// CurrentValueSubject
// -----------------------------------------------------------------------------

test("CurrentValueSubject replays its value synchronously on subscribe", () => {
  const subject = new CurrentValueSubject("a");
  const recording = record(subject);

  expect(recording.values).toEqual(["a"]);

  subject.next("b");
  expect(recording.values).toEqual(["a", "b"]);
  expect(subject.value).toBe("b");
});

test("CurrentValueSubject stores the value before broadcasting it", () => {
  const subject = new CurrentValueSubject(0);
  const seen: number[] = [];
  subject.subscribe(() => seen.push(subject.value));

  subject.next(5);

  expect(seen).toEqual([0, 5]);
});

test("a completed CurrentValueSubject only sends completion", () => {
  const subject = new CurrentValueSubject(1);
  subject.complete();
  subject.next(2);

  const late = record(subject);

  expect(late.values).toEqual([]);
  expect(late.completed).toBe(true);
  expect(subject.value).toBe(1);
});
