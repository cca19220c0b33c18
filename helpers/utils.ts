import type { Enum } from "../_types.ts";
import type { Operator } from "./_types.ts";

import { EnumError } from "../error.ts";

/**
 * Checks whether a value can be used as an enumeration: any function does,
 * since an enum is just a nullary factory. Nothing is called to find out.
 */
export function isEnum(value: unknown): value is Enum<unknown> {
  return typeof value === "function";
}

/**
 * Applies an operator to an Enum inside a pipeline.
 *
 * Operators that fail while being wired up (for instance one that checks its
 * source eagerly) have their error rethrown as an `EnumError` carrying
 * `message` as the operator context, unless the error already names one.
 *
 * @param input - The Enum to apply the operator to
 * @param operator - The operator function to apply
 * @param message - Context reported when the operator throws
 * @returns The Enum produced by the operator
 */
export function applyOperator(
  input: Enum<unknown>,
  operator: Operator<never, unknown>,
  { message = `pipe:operator` } = {}
): Enum<unknown> {
  if (typeof operator !== "function") {
    throw new TypeError(`${message}: expected an operator function, got ${typeof operator}`);
  }

  try {
    // an operator only ever sees the output of the stage before it
    return (operator as Operator<unknown, unknown>)(input);
  } catch (err) {
    throw EnumError.from(err, message);
  }
}
