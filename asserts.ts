import { EnumError } from "./error.ts";

/**
 * Precondition checks used by the combinators.
 *
 * They run when a combinator is *built*, not when it is first pulled, so a
 * bad argument fails right at the offending call site.
 *
 * @example
 * ```ts
 * take(-1);        // throws EnumError (operator "take")
 * cycle(empty());  // throws EnumError (operator "cycle")
 * ```
 *
 * @module
 */

/**
 * Asserts that `count` is an integer `>= 0`.
 *
 * @param count - The count to check
 * @param operator - Operator name reported in the error
 * @throws {EnumError} When the count is negative, fractional or not a number
 */
export function assertCount(count: number, operator: string): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new EnumError(
      new RangeError(`expected a non-negative integer, got ${count}`),
      `${operator}: count must be a non-negative integer`,
      { operator, value: count, tip: `Pass 0 or more to ${operator}().` }
    );
  }
}

/**
 * Asserts that `count` is an integer `>= 1`.
 *
 * @throws {EnumError} When the count is not a positive integer
 */
export function assertPositiveCount(count: number, operator: string): void {
  if (!Number.isInteger(count) || count < 1) {
    throw new EnumError(
      new RangeError(`expected a positive integer, got ${count}`),
      `${operator}: count must be a positive integer`,
      { operator, value: count }
    );
  }
}

/**
 * Asserts that both range bounds are safe integers. Past
 * `Number.MAX_SAFE_INTEGER` an increment no longer reaches the next integer,
 * so a range there would never end.
 *
 * @throws {EnumError} When either bound is fractional, unsafe, infinite or NaN
 */
export function assertRangeBounds(start: number, end: number, operator: string): void {
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new EnumError(
      new RangeError(`malformed range bounds [${start}, ${end}]`),
      `${operator}: range bounds must be integers`,
      {
        operator,
        value: [start, end],
        tip: `Keep both bounds within ±${Number.MAX_SAFE_INTEGER}.`
      }
    );
  }
}

/**
 * Throws the error reported for a combinator that needs at least one
 * element to work with.
 */
export function failEmpty(operator: string): never {
  throw new EnumError(
    new RangeError('sequence is empty'),
    `${operator}: the sequence must not be empty`,
    {
      operator,
      tip: 'An empty sequence has nothing to repeat; guard the call with isEmpty().'
    }
  );
}
