// @filename: _types.ts
/**
 * Core types shared by every enumeration in the library.
 *
 * There are two levels to keep apart:
 *
 * - an {@link Enum} is a *recipe*: a nullary factory you can call as many
 *   times as you like, each call describing the same logical sequence from
 *   the start;
 * - a {@link Gen} is one *run* of that recipe: a stateful, one-shot puller
 *   that hands out the next element on every `next()` until it reports
 *   exhaustion.
 *
 * ```ts
 * const digits = intRange(0, 9);  // Enum<number>
 * const run = digits();           // Gen<number>
 * run.next();                     // { done: false, value: 0 }
 * run.next();                     // { done: false, value: 1 }
 * digits().next();                // { done: false, value: 0 }, a fresh run
 * ```
 *
 * @module
 */

/**
 * A successful pull: the generator produced `value`.
 */
export interface Yield<T> {
  readonly done: false;
  readonly value: T;
}

/**
 * The exhaustion signal: the generator has nothing more to give.
 */
export interface Done {
  readonly done: true;
  readonly value: undefined;
}

/**
 * Result of a single pull. Shaped like the native `IteratorResult` so every
 * generator doubles as a JavaScript iterator.
 */
export type Step<T> = Yield<T> | Done;

/**
 * A one-shot, stateful producer of `T`.
 *
 * Once `next()` has returned {@link Done} it is expected to keep doing so.
 * The library never relies on that for its own correctness, but combinators
 * layered over a generator that breaks it may behave oddly.
 *
 * @typeParam T - Type of the produced elements
 */
export interface Gen<T> extends Iterator<T, undefined> {
  next(): Step<T>;
  [Symbol.iterator](): Gen<T>;
}

/**
 * A restartable sequence: every call returns a brand-new {@link Gen}
 * positioned at the start.
 *
 * @typeParam T - Type of the produced elements
 */
export type Enum<T> = () => Gen<T>;

/**
 * Extracts the element type of an {@link Enum}.
 */
export type InferEnumType<E> = E extends Enum<infer T> ? T : never;
