import { test, expect } from "vitest";

import { start, nextOrThrow, junk, foldGen, iterGen, lengthGen } from "../gen.ts";
import { ofList, intRange } from "../enum.ts";
import { EnumError, ExhaustedError } from "../error.ts";
import { DONE } from "../signal.ts";

test("start returns a fresh generator", () => {
  const source = ofList(["a", "b"]);
  const first = start(source);
  first.next();

  expect(start(source).next()).toEqual({ done: false, value: "a" });
});

test("nextOrThrow returns values until the generator runs out", () => {
  const gen = ofList([1, 2])();
  expect(nextOrThrow(gen)).toBe(1);
  expect(nextOrThrow(gen)).toBe(2);
  expect(() => nextOrThrow(gen)).toThrow(ExhaustedError);
});

test("ExhaustedError is an EnumError naming nextOrThrow", () => {
  let caught: unknown;
  try {
    nextOrThrow(ofList([])());
  } catch (err) {
    caught = err;
  }

  expect(caught).toBeInstanceOf(EnumError);
  expect(caught).toBeInstanceOf(ExhaustedError);
  if (caught instanceof ExhaustedError) {
    expect(caught.name).toBe("ExhaustedError");
    expect(caught.operator).toBe("nextOrThrow");
  }
});

test("junk discards exactly one element", () => {
  const gen = intRange(1, 3)();
  junk(gen);
  expect(gen.next()).toEqual({ done: false, value: 2 });
});

test("junk on an exhausted generator is harmless", () => {
  const gen = ofList<number>([])();
  junk(gen);
  expect(gen.next()).toBe(DONE);
});

test("foldGen only sees what is left of the run", () => {
  const gen = intRange(1, 4)();
  gen.next();
  expect(foldGen((acc: number, n: number) => acc + n, 0, gen)).toBe(9);
  expect(gen.next()).toBe(DONE);
});

test("iterGen calls back for every remaining element", () => {
  const seen: string[] = [];
  iterGen((s) => seen.push(s), ofList(["x", "y"])());
  expect(seen).toEqual(["x", "y"]);
});

test("lengthGen drains the generator", () => {
  const gen = intRange(0, 9)();
  expect(lengthGen(gen)).toBe(10);
  expect(lengthGen(gen)).toBe(0);
});
