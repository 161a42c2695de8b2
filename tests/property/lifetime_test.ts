import { test, expect } from "vitest";

import type { Subscription } from "../../_types.ts";
import { CurrentValueSubject } from "../../subject.ts";
import { Property } from "../../property/property.ts";
import { pipe } from "../../helpers/pipe.ts";
import { map } from "../../helpers/operations/core.ts";
import { canCollect, collectGarbage, collectUntilReleased } from "../_utils/_gc.ts";

function observeSubject() {
  const subject = new CurrentValueSubject(0);
  const values: string[] = [];
  const subscription: Subscription = pipe(Property.from(subject).valuesWithCurrent, map(String))
    .subscribe((value) => values.push(value));

  return { subscription, values, ref: new WeakRef(subject) };
}

test.skipIf(!canCollect)("a producer stays alive while its Property is observed", async () => {
  const { subscription, values, ref } = observeSubject();

  await collectGarbage();

  ref.deref()?.next(1);
  expect(values).toEqual(["0", "1"]);
  subscription.unsubscribe();
});

test.skipIf(!canCollect)("a producer is released once the last observation ends", async () => {
  const { subscription, ref } = observeSubject();

  subscription.unsubscribe();

  expect(await collectUntilReleased(ref)).toBe(true);
});

function observeLaterValues() {
  const subject = new CurrentValueSubject(0);
  const values: number[] = [];
  const subscription: Subscription = Property.from(subject).valuesWithoutCurrent
    .subscribe((value) => values.push(value));

  return { subscription, values, ref: new WeakRef(subject) };
}

test.skipIf(!canCollect)("observing only later values keeps the producer alive", async () => {
  const { subscription, values, ref } = observeLaterValues();

  await collectGarbage();

  ref.deref()?.next(1);
  ref.deref()?.next(2);
  expect(values).toEqual([1, 2]);
  subscription.unsubscribe();
});

test.skipIf(!canCollect)("a producer observed only for later values is released after unsubscribe", async () => {
  const { subscription, ref } = observeLaterValues();

  subscription.unsubscribe();

  expect(await collectUntilReleased(ref)).toBe(true);
});

test.skipIf(!canCollect)("an unobserved Property releases its producer subscription when collected", async () => {
  const subject = new CurrentValueSubject(0);

  (() => {
    const property = Property.from(subject).map((n) => n + 1);
    expect(property.value).toBe(1);
  })();
  expect(subject.observed).toBe(1);

  await collectGarbage(5);

  expect(subject.observed).toBe(0);
});

test.skipIf(!canCollect)("a derived Property keeps its parent subscribed", async () => {
  const subject = new CurrentValueSubject(1);
  const derived = (() => Property.from(subject).map((n) => n * 2))();

  await collectGarbage();

  subject.next(4);
  expect(derived.value).toBe(8);
  expect(subject.observed).toBe(1);
});
