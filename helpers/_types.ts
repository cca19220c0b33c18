import type { Enum, Step } from "../_types.ts";

/**
 * Type representing an enumeration operator.
 * Transforms an Enum of type In into an Enum of type Out.
 */
export type Operator<In, Out> = (source: Enum<In>) => Enum<Out>;

/**
 * How a generator reacts when its `pull` (or `createState`) throws.
 *
 * - `"throw"` (default): the error is wrapped in an `EnumError` naming the
 *   operator and rethrown.
 * - `"manual"`: the error propagates untouched. For operators that raise
 *   their own errors on purpose.
 */
export type EnumErrorMode = "throw" | "manual";

/**
 * Base interface with properties shared across all enum options
 */
export interface BaseEnumOptions {
  /**
   * Optional name for the enumeration (used in error reporting)
   */
  name?: string;

  /**
   * What to do with errors raised while pulling
   * @default "throw"
   */
  errorMode?: EnumErrorMode;
}

/**
 * Options for a generator that keeps no state between pulls
 */
export interface EnumOptions<T> extends BaseEnumOptions {
  /**
   * Produces the next step
   */
  pull: () => Step<T>;
}

/**
 * Options for a generator with per-run state
 */
export interface StatefulEnumOptions<T, S> extends BaseEnumOptions {
  /**
   * Builds the state of one run. Called once per factory call, so two runs
   * of the same enum never share state.
   */
  createState: () => S;

  /**
   * Produces the next step, mutating `state` as needed
   */
  pull: (state: S) => Step<T>;
}

/**
 * Context handed to the pull wrappers
 */
export interface PullHandlerContext {
  operatorName?: string;
}
