import { test, expect, vi } from "vitest";

import { createEnum, createStatefulEnum, StatefulGen } from "../../helpers/operators.ts";
import { EnumError } from "../../error.ts";
import { ofList, toList } from "../../enum.ts";
import { DONE, emit } from "../../signal.ts";

test("createStatefulEnum builds fresh state for every run", () => {
  const createState = vi.fn(() => ({ count: 0 }));
  const counter = createStatefulEnum<number, { count: number }>({
    name: "counter",
    createState,
    pull(state) {
      return state.count < 3 ? emit(state.count++) : DONE;
    },
  });

  expect(toList(counter)).toEqual([0, 1, 2]);
  expect(toList(counter)).toEqual([0, 1, 2]);
  expect(createState).toHaveBeenCalledTimes(2);
});

test("state is created when the enum is called, not when it is built", () => {
  const createState = vi.fn(() => ({}));
  const lazy = createStatefulEnum<number, object>({ name: "lazy", createState, pull: () => DONE });

  expect(createState).not.toHaveBeenCalled();
  lazy();
  expect(createState).toHaveBeenCalledTimes(1);
});

test("createEnum pulls without state", () => {
  let n = 0;
  const ticks = createEnum({ name: "ticks", pull: () => (n < 2 ? emit(n++) : DONE) });
  expect(toList(ticks)).toEqual([0, 1]);
});

test("errors thrown by pull are wrapped with the operator name", () => {
  const failing = createStatefulEnum({
    name: "parse",
    createState: () => ({ gen: ofList(["1", "x"])() }),
    pull(state) {
      const step = state.gen.next();
      if (step.done) return DONE;
      if (step.value === "x") throw new SyntaxError("not a number");
      return emit(Number(step.value));
    },
  });

  const gen = failing();
  expect(gen.next()).toEqual({ done: false, value: 1 });

  let caught: unknown;
  try {
    gen.next();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(EnumError);
  if (caught instanceof EnumError) {
    expect(caught.operator).toBe("enum:parse");
    expect(caught.message).toBe("not a number");
    expect(caught.errors[0]).toBeInstanceOf(SyntaxError);
  }
});

test("errors thrown while creating state are tagged as start failures", () => {
  expect.assertions(2);
  const broken = createStatefulEnum<number, never>({
    name: "broken",
    createState: () => {
      throw new Error("no state for you");
    },
    pull: () => DONE,
  });

  expect(() => broken()).toThrow(EnumError);
  try {
    broken();
  } catch (err) {
    expect(err instanceof EnumError && err.operator).toBe("enum:broken:start");
  }
});

test("manual error mode lets errors through untouched", () => {
  expect.assertions(2);
  const original = new TypeError("raw");
  const raw = createEnum<number>({
    name: "raw",
    errorMode: "manual",
    pull: () => {
      throw original;
    },
  });

  expect(() => raw().next()).toThrow(original);
  try {
    raw().next();
  } catch (err) {
    expect(err).toBe(original);
  }
});

test("unnamed enums report an unknown operator", () => {
  expect.assertions(1);
  const anonymous = createEnum<number>({
    pull: () => {
      throw new Error("oops");
    },
  });

  try {
    anonymous().next();
  } catch (err) {
    expect(err instanceof EnumError && err.operator).toBe("enum:unknown");
  }
});

test("StatefulGen is its own iterator", () => {
  const gen = new StatefulGen({ left: 2 }, (state: { left: number }) =>
    state.left > 0 ? emit(state.left--) : DONE
  );

  expect(gen[Symbol.iterator]()).toBe(gen);
  expect([...gen]).toEqual([2, 1]);
});
