/**
 * Building blocks for enumerations.
 *
 * Every combinator in this library has the same shape: an {@link Enum} whose
 * factory builds a little state record, and a generator whose `next()`
 * advances that record by one step. These two helpers capture that shape so
 * each combinator only has to say *what* its state is and *how* to pull.
 *
 * ```ts
 * // Running sum over a source
 * const runningSum = (source: Enum<number>) =>
 *   createStatefulEnum({
 *     name: "runningSum",
 *     createState: () => ({ gen: source(), sum: 0 }),
 *     pull(state) {
 *       const step = state.gen.next();
 *       if (step.done) return step;
 *       state.sum += step.value;
 *       return emit(state.sum);
 *     },
 *   });
 *
 * toList(runningSum(ofList([1, 2, 3]))); // [1, 3, 6]
 * ```
 *
 * Because the state is created inside the factory, calling the resulting enum
 * twice gives two independent runs, which is what makes composites
 * restartable.
 *
 * ## Error handling
 *
 * When a pull throws (typically because a user callback did), the default
 * `"throw"` mode rethrows it as an `EnumError` tagged `enum:<name>`. An error
 * that already carries an operator passes through untouched, so the tag
 * always points at the innermost stage. `"manual"` mode skips the wrapping.
 *
 * @module
 */

import type { Enum, Gen, Step } from "../_types.ts";
import type { EnumErrorMode, EnumOptions, PullHandlerContext, StatefulEnumOptions } from "./_types.ts";

import { EnumError } from "../error.ts";

/**
 * A generator driven by an explicit state record.
 */
export class StatefulGen<T, S> implements Gen<T> {
  readonly #state: S;
  readonly #pull: (state: S) => Step<T>;

  constructor(state: S, pull: (state: S) => Step<T>) {
    this.#state = state;
    this.#pull = pull;
  }

  next(): Step<T> {
    return this.#pull(this.#state);
  }

  [Symbol.iterator](): Gen<T> {
    return this;
  }
}

/**
 * Creates an enumeration whose generators keep no state of their own.
 *
 * @example
 * ```ts
 * const dice = createEnum({ name: "dice", pull: () => emit(1 + Math.floor(Math.random() * 6)) });
 * ```
 */
export function createEnum<T>(options: EnumOptions<T>): Enum<T> {
  const operatorName = `enum:${options.name || 'unknown'}`;
  const pull = handlePull<T, undefined>(options.errorMode ?? "throw", () => options.pull(), { operatorName });

  return () => new StatefulGen<T, undefined>(undefined, pull);
}

/**
 * Creates an enumeration whose generators each own a fresh state record.
 */
export function createStatefulEnum<T, S>(options: StatefulEnumOptions<T, S>): Enum<T> {
  const operatorName = `enum:${options.name || 'unknown'}`;
  const errorMode = options.errorMode ?? "throw";
  const createState = handleCreateState(errorMode, options.createState, { operatorName });
  const pull = handlePull(errorMode, options.pull, { operatorName });

  return () => new StatefulGen<T, S>(createState(), pull);
}

/**
 * Wraps a pull function according to the error mode.
 */
export function handlePull<T, S>(
  errorMode: EnumErrorMode,
  pull: (state: S) => Step<T>,
  context: PullHandlerContext = {}
): (state: S) => Step<T> {
  const operatorName = context.operatorName || `enum:unknown`;

  switch (errorMode) {
    case "throw":
      return function (state: S): Step<T> {
        try {
          return pull(state);
        } catch (err) {
          throw EnumError.from(err, operatorName);
        }
      };

    case "manual":
    default:
      return pull;
  }
}

/**
 * Wraps a state factory according to the error mode.
 */
export function handleCreateState<S>(
  errorMode: EnumErrorMode,
  createState: () => S,
  context: PullHandlerContext = {}
): () => S {
  const operatorName = context.operatorName || `enum:unknown`;

  switch (errorMode) {
    case "throw":
      return function (): S {
        try {
          return createState();
        } catch (err) {
          throw EnumError.from(err, `${operatorName}:start`);
        }
      };

    case "manual":
    default:
      return createState;
  }
}
