import type { Enum, Gen } from "../../_types.ts";
import type { Operator } from "../_types.ts";

import { assertCount } from "../../asserts.ts";
import { createStatefulEnum } from "../operators.ts";
import { DONE, emit } from "../../signal.ts";

/**
 * @module operations/core
 *
 * **Core Operators - Like Array Methods, But Lazy and Restartable**
 *
 * These operators read like the Array methods you already know:
 *
 * ```ts
 * // Array methods:
 * [1, 2, 3].map(n => n * 2).filter(n => n > 3)  // [4, 6]
 *
 * // Enum operators:
 * toList(pipe(
 *   ofList([1, 2, 3]),
 *   map(n => n * 2),
 *   filter(n => n > 3)
 * ))  // [4, 6]
 * ```
 *
 * The difference is that nothing happens until somebody pulls, and only as
 * much as they pull: `pipe(repeat(1), map(f), take(3))` calls `f` three
 * times. Each operator returns a new enum, so the whole pipeline can be run
 * again from the start.
 */

/**
 * Transforms each element.
 *
 * ```ts
 * toList(pipe(ofList([1, 2, 3]), map(n => n * 2)))  // [2, 4, 6]
 * ```
 *
 * @param project - Function applied to every element
 */
export function map<T, R>(project: (value: T) => R): Operator<T, R> {
  return (source: Enum<T>) =>
    createStatefulEnum<R, { gen: Gen<T> }>({
      name: "map",
      createState: () => ({ gen: source() }),
      pull(state) {
        const step = state.gen.next();
        return step.done ? DONE : emit(project(step.value));
      },
    });
}

/**
 * Keeps the elements that pass `predicate`.
 *
 * Pulls as many upstream elements as it takes to find one that passes, so
 * a filter that rejects everything on an infinite source never returns.
 *
 * @param predicate - Test deciding which elements to keep
 */
export function filter<T>(predicate: (value: T) => boolean): Operator<T, T> {
  return (source: Enum<T>) =>
    createStatefulEnum<T, { gen: Gen<T> }>({
      name: "filter",
      createState: () => ({ gen: source() }),
      pull(state) {
        for (let step = state.gen.next(); !step.done; step = state.gen.next()) {
          if (predicate(step.value)) return step;
        }
        return DONE;
      },
    });
}

/**
 * Maps and filters in one pass: `project` returns `undefined` to drop an
 * element.
 *
 * ```ts
 * toList(pipe(
 *   ofList(["1", "x", "3"]),
 *   filterMap(s => Number.isNaN(Number(s)) ? undefined : Number(s))
 * ))  // [1, 3]
 * ```
 *
 * @param project - Returns the mapped element, or `undefined` to skip it
 */
export function filterMap<T, R>(project: (value: T) => R | undefined): Operator<T, R> {
  return (source: Enum<T>) =>
    createStatefulEnum<R, { gen: Gen<T> }>({
      name: "filterMap",
      createState: () => ({ gen: source() }),
      pull(state) {
        for (let step = state.gen.next(); !step.done; step = state.gen.next()) {
          const result = project(step.value);
          if (result !== undefined) return emit(result);
        }
        return DONE;
      },
    });
}

/**
 * Takes the first `count` elements.
 *
 * Once `count` elements went out the generator reports exhaustion without
 * pulling upstream again, which makes it the usual way to bound an infinite
 * enum.
 *
 * ```ts
 * toList(pipe(repeat("a"), take(3)))  // ["a", "a", "a"]
 * ```
 *
 * @param count - How many elements to take
 * @throws {EnumError} When `count` is negative or not an integer
 */
export function take<T>(count: number): Operator<T, T> {
  assertCount(count, "take");

  return (source: Enum<T>) =>
    createStatefulEnum<T, { gen: Gen<T>; taken: number }>({
      name: "take",
      createState: () => ({ gen: source(), taken: 0 }),
      pull(state) {
        if (state.taken >= count) return DONE;
        state.taken++;
        return state.gen.next();
      },
    });
}

/**
 * Skips the first `count` elements.
 *
 * ```ts
 * toList(pipe(ofList([1, 2, 3, 4]), drop(2)))  // [3, 4]
 * ```
 *
 * @param count - How many elements to skip
 * @throws {EnumError} When `count` is negative or not an integer
 */
export function drop<T>(count: number): Operator<T, T> {
  assertCount(count, "drop");

  return (source: Enum<T>) =>
    createStatefulEnum<T, { gen: Gen<T>; dropped: number }>({
      name: "drop",
      createState: () => ({ gen: source(), dropped: 0 }),
      pull(state) {
        while (state.dropped < count) {
          state.dropped++;
          if (state.gen.next().done) return DONE;
        }
        return state.gen.next();
      },
    });
}

/**
 * Forwards elements while `predicate` holds.
 *
 * The first element that fails the test is pulled from upstream and then
 * thrown away; it is not handed to anything downstream.
 *
 * ```ts
 * toList(pipe(ofList([1, 2, 5, 1]), takeWhile(n => n < 3)))  // [1, 2]
 * ```
 */
export function takeWhile<T>(predicate: (value: T) => boolean): Operator<T, T> {
  return (source: Enum<T>) =>
    createStatefulEnum<T, { gen: Gen<T>; stopped: boolean }>({
      name: "takeWhile",
      createState: () => ({ gen: source(), stopped: false }),
      pull(state) {
        if (state.stopped) return DONE;

        const step = state.gen.next();
        if (step.done || predicate(step.value)) return step;

        state.stopped = true;
        return DONE;
      },
    });
}

/**
 * Skips elements while `predicate` holds, then forwards everything after,
 * including later elements that would pass the test again.
 *
 * ```ts
 * toList(pipe(ofList([1, 2, 5, 1]), dropWhile(n => n < 3)))  // [5, 1]
 * ```
 */
export function dropWhile<T>(predicate: (value: T) => boolean): Operator<T, T> {
  return (source: Enum<T>) =>
    createStatefulEnum<T, { gen: Gen<T>; dropping: boolean }>({
      name: "dropWhile",
      createState: () => ({ gen: source(), dropping: true }),
      pull(state) {
        if (!state.dropping) return state.gen.next();

        for (let step = state.gen.next(); !step.done; step = state.gen.next()) {
          if (!predicate(step.value)) {
            state.dropping = false;
            return step;
          }
        }
        return DONE;
      },
    });
}

/**
 * Pairs every element with its 0-based position.
 *
 * ```ts
 * toList(pipe(ofList(["a", "b"]), zipIndex()))  // [[0, "a"], [1, "b"]]
 * ```
 */
export function zipIndex<T>(): Operator<T, [number, T]> {
  return (source: Enum<T>) =>
    createStatefulEnum<[number, T], { gen: Gen<T>; index: number }>({
      name: "zipIndex",
      createState: () => ({ gen: source(), index: 0 }),
      pull(state) {
        const step = state.gen.next();
        return step.done ? DONE : emit<[number, T]>([state.index++, step.value]);
      },
    });
}
