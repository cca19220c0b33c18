import { test, expect, expectTypeOf, vi } from "vitest";

import { pipe, compose } from "../../helpers/pipe.ts";
import { map, filter, take, drop } from "../../helpers/operations/core.ts";
import type { Operator } from "../../helpers/_types.ts";
import type { Enum, InferEnumType } from "../../_types.ts";
import { EnumError } from "../../error.ts";
import { intRange, iterate, ofList, toList } from "../../enum.ts";

test("pipe with no operators returns the source itself", () => {
  const source = ofList([1, 2]);
  expect(pipe(source)).toBe(source);
});

test("pipe applies operators left to right", () => {
  const result = pipe(
    intRange(1, 10),
    filter((n) => n % 2 === 0),
    map((n) => n * 10),
    take(3)
  );

  expect(toList(result)).toEqual([20, 40, 60]);
});

test("pipe changes the element type through the chain", () => {
  const result = pipe(
    ofList([1, 2, 3]),
    map((n) => `#${n}`),
    map((s) => s.length)
  );

  expectTypeOf<InferEnumType<typeof result>>().toEqualTypeOf<number>();
  expect(toList(result)).toEqual([2, 2, 2]);
});

test("a piped enum can be run again", () => {
  const squares = pipe(iterate(0, (n) => n + 1), map((n) => n * n), take(4));

  expect(toList(squares)).toEqual([0, 1, 4, 9]);
  expect(toList(squares)).toEqual([0, 1, 4, 9]);
});

test("pipe pulls only as much as is consumed", () => {
  const project = vi.fn((n: number) => n);
  toList(pipe(iterate(0, (n) => n + 1), map(project), take(3)));

  expect(project).toHaveBeenCalledTimes(3);
});

test("pipe accepts twelve operators", () => {
  const inc = map((n: number) => n + 1);
  const result = pipe(ofList([0]), inc, inc, inc, inc, inc, inc, inc, inc, inc, inc, inc, inc);

  expect(toList(result)).toEqual([12]);
});

test("compose groups operators into one", () => {
  const evensSquared = compose(
    filter((n: number) => n % 2 === 0),
    map((n) => n * n)
  );

  expect(toList(pipe(intRange(1, 6), evensSquared))).toEqual([4, 16, 36]);
});

test("composed operators nest inside other compositions", () => {
  const page = compose(drop<number>(2), take(2));
  const doubledPage = compose(page, map((n) => n * 2));

  expect(toList(pipe(intRange(1, 10), doubledPage))).toEqual([6, 8]);
});

test("an operator failing while being wired up surfaces as an EnumError", () => {
  expect.assertions(2);
  const eager: Operator<number, number> = (source: Enum<number>) => {
    throw new Error(`refusing ${typeof source}`);
  };

  expect(() => pipe(ofList([1]), eager)).toThrow(EnumError);
  try {
    pipe(ofList([1]), map((n: number) => n), eager);
  } catch (err) {
    expect(err instanceof EnumError && err.operator).toBe("pipe:operator[2]");
  }
});
