/**
 * The exhaustion protocol.
 *
 * Every pull returns exactly one of two things: `emit(value)` when there is a
 * next element, or the shared {@link DONE} marker when there is none. "No more
 * elements" is a normal return, never an exception, so combinators forward it
 * like any other result.
 *
 * @module
 */

import type { Done, Step, Yield } from "./_types.ts";

/**
 * The exhaustion signal. A single frozen instance is shared by every
 * generator, so `step === DONE` works as well as `step.done`.
 */
export const DONE: Done = Object.freeze({ done: true, value: undefined });

/**
 * Wraps a value as a successful pull.
 *
 * @example
 * ```ts
 * emit(42); // { done: false, value: 42 }
 * ```
 */
export function emit<T>(value: T): Yield<T> {
  return { done: false, value };
}

/**
 * Narrows a step to the exhaustion signal.
 */
export function isDone<T>(step: Step<T>): step is Done {
  return step.done;
}
