import { test, expect, vi, afterEach } from "vitest";

import { persistent, tee, teeBranches, TeeHub } from "../../../helpers/operations/sharing.ts";
import type { Logger } from "../../../config.ts";
import { configure, resetConfig } from "../../../config.ts";
import { EnumError } from "../../../error.ts";
import { fromIterable, intRange, ofList, toList } from "../../../enum.ts";
import { DONE } from "../../../signal.ts";

function createLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

afterEach(() => {
  resetConfig();
});

// -----------------------------------------------------------------------------
// persistent
// -----------------------------------------------------------------------------

test("persistent replays a drained generator as often as asked", () => {
  const once = ofList([1, 2, 3])();
  const replay = persistent(once);

  expect(once.next()).toBe(DONE);
  expect(toList(replay)).toEqual([1, 2, 3]);
  expect(toList(replay)).toEqual([1, 2, 3]);
});

test("persistent keeps only what was left of the generator", () => {
  const gen = ofList(["a", "b", "c"])();
  gen.next();

  expect(toList(persistent(gen))).toEqual(["b", "c"]);
});

test("persistent turns a one-shot iterator into a restartable enum", () => {
  function* letters() {
    yield "x";
    yield "y";
  }
  const oneShot = fromIterable(letters());
  const replay = persistent(oneShot());

  expect(toList(oneShot)).toEqual([]);
  expect(toList(replay)).toEqual(["x", "y"]);
  expect(toList(replay)).toEqual(["x", "y"]);
});

test("persistent of an exhausted generator is empty", () => {
  expect(toList(persistent(ofList<number>([])()))).toEqual([]);
});

// -----------------------------------------------------------------------------
// tee
// -----------------------------------------------------------------------------

test("tee yields the requested number of branches, then ends", () => {
  const gen = tee(ofList([1]), 3)();

  expect(gen.next().done).toBe(false);
  expect(gen.next().done).toBe(false);
  expect(gen.next().done).toBe(false);
  expect(gen.next()).toBe(DONE);
});

test("tee defaults to two branches", () => {
  expect(teeBranches(ofList([1])).length).toBe(2);
  expect(teeBranches(ofList([1]), { branches: 4 }).length).toBe(4);
});

test("branches pulled in lockstep see the whole sequence", () => {
  const [left, right] = teeBranches(ofList([1, 2, 3, 4]));
  const seen: number[] = [];

  for (let i = 0; i < 2; i++) {
    const a = left.next();
    const b = right.next();
    if (!a.done) seen.push(a.value);
    if (!b.done) seen.push(b.value);
  }

  expect(seen).toEqual([1, 2, 3, 4]);
  expect(left.next()).toBe(DONE);
  expect(right.next()).toBe(DONE);
});

test("each branch receives the elements dealt to it", () => {
  const [first, second] = teeBranches(ofList([1, 2, 3, 4]));

  expect([...first]).toEqual([1, 3]);
  expect([...second]).toEqual([2, 4]);
});

test("three branches share the elements in rotation", () => {
  const [a, b, c] = teeBranches(intRange(0, 8), 3);

  expect([...c]).toEqual([2, 5, 8]);
  expect([...a]).toEqual([0, 3, 6]);
  expect([...b]).toEqual([1, 4, 7]);
});

test("every run of a tee starts a fresh run of its source", () => {
  const source = vi.fn(ofList([1, 2]));
  const split = tee(source);

  const [a1] = teeBranches(source);
  expect([...a1]).toEqual([1]);
  expect(source).toHaveBeenCalledTimes(1);

  split();
  split();
  expect(source).toHaveBeenCalledTimes(3);
});

test("tee rejects a branch count below one when built", () => {
  expect(() => tee(ofList([1]), 0)).toThrow(EnumError);
  expect(() => tee(ofList([1]), { branches: 2.5 })).toThrow("tee: count must be a positive integer");
});

test("the hub tracks what it buffers and whose turn it is", () => {
  const hub = new TeeHub(ofList([1, 2, 3])(), 2, Infinity, createLogger());

  expect(hub.pullFor(1)).toEqual({ done: false, value: 2 });
  expect(hub.buffered).toBe(1);
  expect(hub.cursor).toBe(0);

  expect(hub.pullFor(0)).toEqual({ done: false, value: 1 });
  expect(hub.buffered).toBe(0);

  expect(hub.pullFor(0)).toEqual({ done: false, value: 3 });
  expect(hub.cursor).toBe(1);
  expect(hub.pullFor(1)).toBe(DONE);
});

test("a lagging branch triggers one warning past the high-water mark", () => {
  const logger = createLogger();
  const [fast] = teeBranches(intRange(1, 6), { highWaterMark: 1, logger });

  expect([...fast]).toEqual([1, 3, 5]);
  expect(logger.warn).toHaveBeenCalledTimes(1);
  expect(logger.warn).toHaveBeenCalledWith(
    "tee: 2 elements buffered across 2 branches (high-water mark 1); " +
      "branches are consumed at very different rates"
  );
});

test("the high-water mark and logger default to the global configuration", () => {
  const logger = createLogger();
  configure({ logger, teeHighWaterMark: 0 });

  const [, slow] = teeBranches(ofList(["a", "b"]));
  expect(slow.next()).toEqual({ done: false, value: "b" });
  expect(logger.warn).toHaveBeenCalledWith(
    "tee: 1 elements buffered across 2 branches (high-water mark 0); " +
      "branches are consumed at very different rates"
  );
});

test("branches in lockstep never warn", () => {
  const logger = createLogger();
  const [a, b] = teeBranches(intRange(1, 100), { highWaterMark: 1, logger });

  for (let step = a.next(); !step.done; step = a.next()) b.next();
  expect(logger.warn).not.toHaveBeenCalled();
});
