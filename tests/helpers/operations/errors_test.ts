import { test, expect } from "vitest";

import { Observable } from "../../../observable.ts";
import { ObservableError } from "../../../error.ts";
import { pipe } from "../../../helpers/pipe.ts";
import { materialize } from "../../../helpers/operations/errors.ts";
import { isFailure, isSuccess, unwrapOr } from "../../../result.ts";
import { record } from "../../_utils/_record.ts";

test("materialize turns each outcome into a result and keeps going", () => {
  const parsed = pipe(
    Observable.of('{"a":1}', "{oops", "2"),
    materialize((text: string): unknown => JSON.parse(text), "json"),
  );

  const recording = record(parsed);
  const [first, second, third] = recording.values;

  expect(recording.values).toHaveLength(3);
  expect(recording.completed).toBe(true);
  expect(recording.errors).toEqual([]);

  expect(first).toEqual({ success: true, value: { a: 1 } });
  expect(third).toEqual({ success: true, value: 2 });

  expect(isFailure(second)).toBe(true);
  if (!isFailure(second)) return;
  expect(second.error).toBeInstanceOf(ObservableError);
  expect(second.error.operator).toBe("operator:materialize:json");
  expect(second.error.value).toBe("{oops");
  expect(second.error.errors[0]).toBeInstanceOf(SyntaxError);
});

test("materialize without a name uses the bare operator name", () => {
  const [result] = record(pipe(
    Observable.of(0),
    materialize(() => { throw new Error("always"); }),
  )).values;

  expect(isFailure(result)).toBe(true);
  if (!isFailure(result)) return;
  expect(result.error.operator).toBe("operator:materialize");
  expect(result.error.message).toBe("always");
});

test("materialize passes the index", () => {
  const results = record(pipe(
    Observable.of("a", "b"),
    materialize((value, index) => `${value}${index}`),
  )).values;

  expect(results.filter(isSuccess).map((result) => result.value)).toEqual(["a0", "b1"]);
});

test("unwrapOr falls back for failures", () => {
  const results = record(pipe(
    Observable.of(1, 0, 2),
    materialize((n: number) => {
      if (n === 0) throw new RangeError("zero");
      return 10 / n;
    }),
  )).values;

  expect(results.map((result) => unwrapOr(result, -1))).toEqual([10, -1, 5]);
});
