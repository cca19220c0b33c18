// @filename: helpers/mod.ts
/**
 * Enumeration Operators Library
 *
 * @module
 *
 * This module provides the operators and combinators for working with
 * enums, plus the `pipe` and `compose` functions that chain them.
 *
 * ## Core Features
 *
 * - **Lazy**: nothing runs until a generator is pulled, and only as far as it is pulled
 * - **Restartable**: every operator returns an enum, so a pipeline can be run again from scratch
 * - **Synchronous**: each pull does its work and returns, no promises involved
 * - **Type-safe**: full TypeScript inference through `pipe`
 *
 * ## Basic Usage
 *
 * @example
 * ```ts
 * import { pipe, map, filter, take } from "./helpers/mod.ts";
 * import { iterate, toList } from "./enum.ts";
 *
 * const result = pipe(
 *   iterate(0, x => x + 1),
 *   filter(x => x % 2 === 0), // Keep even numbers
 *   map(x => x * 10),         // Multiply by 10
 *   take(3)                   // Take only the first 3 values
 * );
 *
 * toList(result); // [0, 20, 40]
 * ```
 *
 * ## Combining Sequences
 *
 * Operators that take several enums (`zip`, `append`, `interleave`,
 * `product`, `roundRobin`, `flatten`, `tee`) are plain functions rather than
 * pipeline stages:
 *
 * @example
 * ```ts
 * const grid = product(intRange(0, 1), ofList(["a", "b"]));
 * toList(grid); // [[0, "a"], [0, "b"], [1, "a"], [1, "b"]]
 * ```
 *
 * ## Limitations
 *
 * - Each pipeline is limited to 12 operators; group them with `compose` when you need more
 */

export type * from "./_types.ts";

export * from "./operations/mod.ts";
export * from "./operators.ts";
export * from "./pipe.ts";
export * from "./utils.ts";
