import { test, expect } from "vitest";

import { CurrentValueSubject } from "../../subject.ts";
import { ObservableError } from "../../error.ts";
import { Property } from "../../property/property.ts";
import { isFailure, unwrapOr } from "../../result.ts";

const json = {
  decode: (text: string): unknown => JSON.parse(text),
};

test("decode captures decoder failures without ending the Property", () => {
  const input = new CurrentValueSubject('{"a":1}');
  const decoded = Property.from(input).decode(json);

  expect(decoded.value).toEqual({ success: true, value: { a: 1 } });

  input.next("{oops");
  const failed = decoded.value;
  expect(isFailure(failed)).toBe(true);
  if (isFailure(failed)) {
    expect(failed.error).toBeInstanceOf(ObservableError);
    expect(failed.error.operator).toBe("operator:materialize:decode");
    expect(failed.error.value).toBe("{oops");
  }

  input.next("[2]");
  expect(decoded.value).toEqual({ success: true, value: [2] });
  expect(decoded.completed).toBe(false);
});

test("encode captures encoder failures", () => {
  const encoder = {
    encode(value: number): string {
      if (value < 0) throw new RangeError("negative");
      return value.toString(16);
    },
  };

  const input = new CurrentValueSubject(255);
  const encoded = Property.from(input).encode(encoder);

  expect(encoded.value).toEqual({ success: true, value: "ff" });

  input.next(-1);
  expect(unwrapOr(encoded.value, "invalid")).toBe("invalid");
});

test("tryMap labels failures with its own operator name", () => {
  const property = Property.of(0).tryMap((n) => {
    if (n === 0) throw new Error("division by zero");
    return 1 / n;
  });

  const result = property.value;
  expect(isFailure(result)).toBe(true);
  if (isFailure(result)) {
    expect(result.error.operator).toBe("operator:materialize:tryMap");
    expect(result.error.message).toBe("division by zero");
  }
});

test("liftCatching without a name uses the bare operator name", () => {
  const property = Property.of("x").liftCatching((): number => {
    throw new Error("nope");
  });

  const result = property.value;
  expect(isFailure(result) && result.error.operator).toBe("operator:materialize");
});
