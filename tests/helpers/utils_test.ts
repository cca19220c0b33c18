import { test, expect } from "vitest";

import { applyOperator, isEnum } from "../../helpers/utils.ts";
import { map } from "../../helpers/operations/core.ts";
import type { Operator } from "../../helpers/_types.ts";
import { EnumError } from "../../error.ts";
import { ofList, toList } from "../../enum.ts";

// -----------------------------------------------------------------------------
// Type guard tests
// -----------------------------------------------------------------------------

test("isEnum accepts factories without calling them", () => {
  let called = false;
  const source = () => {
    called = true;
    return ofList([1])();
  };

  expect(isEnum(source)).toBe(true);
  expect(called).toBe(false);
});

test("isEnum rejects non-functions", () => {
  expect(isEnum([1, 2])).toBe(false);
  expect(isEnum(null)).toBe(false);
  expect(isEnum({ next: () => undefined })).toBe(false);
});

// -----------------------------------------------------------------------------
// applyOperator tests
// -----------------------------------------------------------------------------

test("applyOperator hands the source to the operator", () => {
  const double: Operator<number, number> = map((n: number) => n * 2);
  const result = applyOperator(ofList([1, 2]), double);

  expect(toList(result)).toEqual([2, 4]);
});

test("applyOperator rethrows wiring failures with context", () => {
  expect.assertions(3);
  const original = new Error("cannot wire");
  const broken: Operator<number, number> = () => {
    throw original;
  };

  try {
    applyOperator(ofList([1]), broken, { message: "pipe:operator[4]" });
  } catch (err) {
    expect(err).toBeInstanceOf(EnumError);
    if (err instanceof EnumError) {
      expect(err.operator).toBe("pipe:operator[4]");
      expect(err.errors[0]).toBe(original);
    }
  }
});

test("applyOperator rejects something that is not an operator", () => {
  // goes around the signature the way an untyped caller would
  const call = () => Reflect.apply(applyOperator, undefined, [ofList([1]), 42]);

  expect(call).toThrow(TypeError);
  expect(call).toThrow("pipe:operator: expected an operator function, got number");
});

test("applyOperator keeps the context of an error that already has one", () => {
  expect.assertions(1);
  const tagged = new EnumError(new Error("inner"), "inner", { operator: "enum:inner" });
  const broken: Operator<number, number> = () => {
    throw tagged;
  };

  try {
    applyOperator(ofList([1]), broken, { message: "pipe:operator[1]" });
  } catch (err) {
    expect(err).toBe(tagged);
  }
});
