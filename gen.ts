/**
 * Helpers that work on a single generator run rather than on an enum.
 *
 * They all consume the generator they are given; what they pull is gone
 * from that run.
 *
 * @module
 */

import type { Enum, Gen } from "./_types.ts";
import { ExhaustedError } from "./error.ts";

/**
 * Starts a run of `source`. Same as calling `source()`, but reads better in
 * a pipeline.
 */
export function start<T>(source: Enum<T>): Gen<T> {
  return source();
}

/**
 * Returns the next value of `gen`.
 *
 * @throws {ExhaustedError} When `gen` is exhausted
 */
export function nextOrThrow<T>(gen: Gen<T>): T {
  const step = gen.next();
  if (step.done) throw new ExhaustedError();
  return step.value;
}

/**
 * Pulls one element and throws it away. Does nothing on an exhausted
 * generator.
 */
export function junk<T>(gen: Gen<T>): void {
  gen.next();
}

/**
 * Folds the rest of `gen` into a single value.
 */
export function foldGen<T, A>(f: (acc: A, value: T) => A, init: A, gen: Gen<T>): A {
  let acc = init;
  for (let step = gen.next(); !step.done; step = gen.next()) {
    acc = f(acc, step.value);
  }
  return acc;
}

/**
 * Calls `f` on every remaining element of `gen`.
 */
export function iterGen<T>(f: (value: T) => void, gen: Gen<T>): void {
  for (let step = gen.next(); !step.done; step = gen.next()) {
    f(step.value);
  }
}

/**
 * Counts the remaining elements of `gen`, draining it.
 */
export function lengthGen<T>(gen: Gen<T>): number {
  return foldGen((n: number) => n + 1, 0, gen);
}
