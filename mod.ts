/**
 * Lazy, restartable, **pull-based** sequences for TypeScript, with a
 * library of combinators to build them from one another.
 *
 * If you've used JavaScript generators you know the pain point: a generator
 * object runs once. Iterate it a second time and you get nothing, pass it to
 * two consumers and they steal elements from each other.
 *
 * ```ts
 * function* naturals() { let n = 0; while (true) yield n++; }
 * function* take3<T>(it: Iterator<T>) {
 *   for (let i = 0; i < 3; i++) {
 *     const r = it.next();
 *     if (r.done) return;
 *     yield r.value;
 *   }
 * }
 *
 * const it = naturals();
 * [...take3(it)]; // [0, 1, 2]
 * [...take3(it)]; // [3, 4, 5], not a fresh start
 * ```
 *
 * This library separates the two things a generator conflates:
 *
 * - an **Enum** is the *recipe*, a function you can call any number of times;
 * - a **Gen** is one *run* of that recipe, pulled with `next()` until it
 *   reports `done`.
 *
 * ```ts
 * import { iterate, pipe, map, take, toList } from "lazy-enum";
 *
 * const squares = pipe(iterate(0, n => n + 1), map(n => n * n), take(4));
 *
 * toList(squares); // [0, 1, 4, 9]
 * toList(squares); // [0, 1, 4, 9], a brand-new run
 * ```
 *
 * ## Pulling
 *
 * Every generator follows the iterator protocol: `next()` returns
 * `{ done: false, value }` or the shared `DONE` marker. Running out is not an
 * error, it is just the last answer. Generators are also iterable, so
 * `for (const x of squares())` works.
 *
 * ## Operators
 *
 * Single-input operators (`map`, `filter`, `filterMap`, `take`, `drop`,
 * `takeWhile`, `dropWhile`, `zipIndex`, `intersperse`, `flatMap`) are chained
 * with `pipe`. Multi-input combinators are plain functions:
 *
 * - `append(a, b)`, `flatten(enums)`: one after the other
 * - `zip(a, b)`, `zipWith(f, a, b)`, `interleave(a, b)`: side by side
 * - `roundRobin(enums)`: one from each, fairly, until all run dry
 * - `product(a, b)`: every pair, row by row
 * - `cycle(a)`: over and over
 *
 * ## Sharing a single run
 *
 * Two operators trade restartability of their *source* for sharing:
 *
 * - `persistent(gen)` drains a generator once into a circular buffer and
 *   gives back an enum that replays the recording;
 * - `tee(enum, n)` deals one run out to `n` branches, buffering for the ones
 *   that fall behind.
 *
 * ## Errors
 *
 * Bad arguments (`take(-1)`, `cycle(empty())`, `tee(e, 0)`) throw an
 * `EnumError` right away, at the call that made the mistake. Exceptions from
 * your own callbacks surface on the pull that triggered them, wrapped in an
 * `EnumError` that names the operator.
 *
 * @module
 */

export * from "./signal.ts";
export * from "./gen.ts";
export * from "./enum.ts";
export * from "./error.ts";
export * from "./asserts.ts";
export * from "./config.ts";
export * from "./mlist.ts";
export * from "./helpers/mod.ts";

export type * from "./_types.ts";
