// @filename: enum.ts
/**
 * Creating enumerations and getting values back out of them.
 *
 * An enum is cold and restartable: nothing runs until it is called, and each
 * call starts over.
 *
 * ```ts
 * const evens = pipe(intRange(1, 10), filter(n => n % 2 === 0));
 *
 * toList(evens);   // [2, 4, 6, 8, 10]
 * length(evens);   // 5, computed by a brand-new run
 * ```
 *
 * @module
 */

import type { Enum, Gen } from "./_types.ts";

import { assertRangeBounds } from "./asserts.ts";
import { foldGen, iterGen, lengthGen } from "./gen.ts";
import { createEnum, createStatefulEnum } from "./helpers/operators.ts";
import { DONE, emit } from "./signal.ts";

///////////////////////////
// Construction          //
///////////////////////////

/**
 * The enumeration with no elements.
 */
export function empty<T = never>(): Enum<T> {
  return createEnum<T>({ name: "empty", pull: () => DONE });
}

/**
 * Yields `value` exactly once.
 */
export function singleton<T>(value: T): Enum<T> {
  return createStatefulEnum<T, { yielded: boolean }>({
    name: "singleton",
    createState: () => ({ yielded: false }),
    pull(state) {
      if (state.yielded) return DONE;
      state.yielded = true;
      return emit(value);
    },
  });
}

/**
 * Yields `value` forever.
 */
export function repeat<T>(value: T): Enum<T> {
  return createEnum<T>({ name: "repeat", pull: () => emit(value) });
}

/**
 * Yields `seed`, `f(seed)`, `f(f(seed))`, … forever.
 *
 * @example
 * ```ts
 * toList(pipe(iterate(1, n => n * 2), take(5))); // [1, 2, 4, 8, 16]
 * ```
 */
export function iterate<T>(seed: T, f: (value: T) => T): Enum<T> {
  return createStatefulEnum<T, { current: T }>({
    name: "iterate",
    createState: () => ({ current: seed }),
    pull(state) {
      const value = state.current;
      state.current = f(value);
      return emit(value);
    },
  });
}

/**
 * Enumerates the elements of an array, in order. The array is read lazily,
 * so mutating it affects runs that have not reached the mutated slot yet.
 */
export function ofList<T>(values: readonly T[]): Enum<T> {
  return createStatefulEnum<T, { index: number }>({
    name: "ofList",
    createState: () => ({ index: 0 }),
    pull(state) {
      if (state.index >= values.length) return DONE;
      return emit(values[state.index++]);
    },
  });
}

/**
 * The integers from `start` to `end`, both included, ascending. Empty when
 * `start > end`.
 *
 * @throws {EnumError} When a bound is not a safe integer
 */
export function intRange(start: number, end: number): Enum<number> {
  assertRangeBounds(start, end, "intRange");

  return createStatefulEnum<number, { current: number }>({
    name: "intRange",
    createState: () => ({ current: start }),
    pull(state) {
      if (state.current > end) return DONE;
      return emit(state.current++);
    },
  });
}

/**
 * Adapts any JavaScript iterable. Each run asks `iterable` for a new
 * iterator, so the result is exactly as restartable as the iterable is: an
 * array or a `Set` replays, a generator object does not.
 */
export function fromIterable<T>(iterable: Iterable<T>): Enum<T> {
  return createStatefulEnum<T, { iterator: Iterator<T> }>({
    name: "fromIterable",
    createState: () => ({ iterator: iterable[Symbol.iterator]() }),
    pull(state) {
      const result = state.iterator.next();
      return result.done ? DONE : emit(result.value);
    },
  });
}

///////////////////////////
// Conversion            //
///////////////////////////

/**
 * Runs `source` to the end and collects the elements.
 */
export function toList<T>(source: Enum<T>): T[] {
  return foldGen((acc: T[], value: T) => {
    acc.push(value);
    return acc;
  }, [], source());
}

/**
 * Like {@link toList}, last element first.
 */
export function toRevList<T>(source: Enum<T>): T[] {
  return toList(source).reverse();
}

/**
 * Number of elements in one run of `source`.
 */
export function length<T>(source: Enum<T>): number {
  return lengthGen(source());
}

/**
 * Whether `source` has no elements.
 *
 * The check pulls once from a throwaway run, which is harmless for a proper
 * enum. An enum that shares one underlying generator between runs (a tee
 * branch wrapped back into an enum, say) does lose that element.
 */
export function isEmpty<T>(source: Enum<T>): boolean {
  return source().next().done;
}

/**
 * Folds one run of `source` from the left.
 */
export function fold<T, A>(f: (acc: A, value: T) => A, init: A, source: Enum<T>): A {
  return foldGen(f, init, source());
}

/**
 * Calls `f` for every element of one run of `source`.
 */
export function iter<T>(f: (value: T) => void, source: Enum<T>): void {
  iterGen(f, source());
}

/**
 * Exposes `source` as a native iterable; every `for…of` starts a new run.
 *
 * @example
 * ```ts
 * for (const n of toIterable(intRange(1, 3))) console.log(n); // 1, 2, 3
 * ```
 */
export function toIterable<T>(source: Enum<T>): Iterable<T> {
  return {
    [Symbol.iterator](): Gen<T> {
      return source();
    },
  };
}
