// helpers/pipe.ts
// Composition utilities for enumeration operators

import type { Enum } from "../_types.ts";
import type { Operator } from "./_types.ts";

import { applyOperator } from "./utils.ts";

/**
 * Pipe function with overloads for up to 12 operators with proper typing.
 * Takes an Enum as input, feeds it through each operator in turn and returns
 * the resulting Enum.
 *
 * Nothing is pulled here: `pipe` only wires the stages together. The result
 * is as restartable as each stage is.
 *
 * @returns A new Enum with all operators applied
 *
 * @example
 * ```ts
 * const firstSquares = pipe(
 *   iterate(1, n => n + 1),
 *   map(n => n * n),
 *   filter(n => n % 2 === 1),
 *   take(3)
 * );
 *
 * toList(firstSquares); // [1, 9, 25]
 * ```
 */

// Overload 0: No operator
export function pipe<T>(
  source: Enum<T>
): Enum<T>;

// Overload 1: Single operator
export function pipe<T, A>(
  source: Enum<T>,
  op1: Operator<T, A>
): Enum<A>;

// Overload 2: 2 operators
export function pipe<T, A, B>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>
): Enum<B>;

// Overload 3: 3 operators
export function pipe<T, A, B, C>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Enum<C>;

// Overload 4: 4 operators
export function pipe<T, A, B, C, D>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>
): Enum<D>;

// Overload 5: 5 operators
export function pipe<T, A, B, C, D, E>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>
): Enum<E>;

// Overload 6: 6 operators
export function pipe<T, A, B, C, D, E, F>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>
): Enum<F>;

// Overload 7: 7 operators
export function pipe<T, A, B, C, D, E, F, G>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>
): Enum<G>;

// Overload 8: 8 operators
export function pipe<T, A, B, C, D, E, F, G, H>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>
): Enum<H>;

// Overload 9: 9 operators
export function pipe<T, A, B, C, D, E, F, G, H, I>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>
): Enum<I>;

// Overload 10: 10 operators
export function pipe<T, A, B, C, D, E, F, G, H, I, J>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>
): Enum<J>;

// Overload 11: 11 operators
export function pipe<T, A, B, C, D, E, F, G, H, I, J, K>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>,
  op11: Operator<J, K>
): Enum<K>;

// Overload 12: 12 operators
export function pipe<T, A, B, C, D, E, F, G, H, I, J, K, L>(
  source: Enum<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>,
  op11: Operator<J, K>,
  op12: Operator<K, L>
): Enum<L>;

// Implementation
export function pipe(
  source: Enum<unknown>,
  ...operators: Array<Operator<never, unknown>>
): Enum<unknown> {
  if (operators.length > 12) {
    throw new TypeError('pipe: Too many operators (maximum 12); group them with compose().');
  }

  return operators.reduce<Enum<unknown>>(
    (result, operator, i) => applyOperator(result, operator, { message: `pipe:operator[${i + 1}]` }),
    source
  );
}

/**
 * Groups operators into a single reusable operator, applied left to right.
 *
 * @example
 * ```ts
 * const evensSquared = compose(
 *   filter((n: number) => n % 2 === 0),
 *   map(n => n * n)
 * );
 *
 * toList(pipe(intRange(1, 6), evensSquared)); // [4, 16, 36]
 * ```
 */

// Overload 1: Single operator
export function compose<T, A>(
  op1: Operator<T, A>
): Operator<T, A>;

// Overload 2: 2 operators
export function compose<T, A, B>(
  op1: Operator<T, A>,
  op2: Operator<A, B>
): Operator<T, B>;

// Overload 3: 3 operators
export function compose<T, A, B, C>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Operator<T, C>;

// Overload 4: 4 operators
export function compose<T, A, B, C, D>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>
): Operator<T, D>;

// Overload 5: 5 operators
export function compose<T, A, B, C, D, E>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>
): Operator<T, E>;

// Overload 6: 6 operators
export function compose<T, A, B, C, D, E, F>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>
): Operator<T, F>;

// Overload 7: 7 operators
export function compose<T, A, B, C, D, E, F, G>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>
): Operator<T, G>;

// Overload 8: 8 operators
export function compose<T, A, B, C, D, E, F, G, H>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>
): Operator<T, H>;

// Overload 9: 9 operators
export function compose<T, A, B, C, D, E, F, G, H, I>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>
): Operator<T, I>;

// Overload 10: 10 operators
export function compose<T, A, B, C, D, E, F, G, H, I, J>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>
): Operator<T, J>;

// Overload 11: 11 operators
export function compose<T, A, B, C, D, E, F, G, H, I, J, K>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>,
  op11: Operator<J, K>
): Operator<T, K>;

// Overload 12: 12 operators
export function compose<T, A, B, C, D, E, F, G, H, I, J, K, L>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>,
  op11: Operator<J, K>,
  op12: Operator<K, L>
): Operator<T, L>;

// Implementation
export function compose(
  ...operators: Array<Operator<never, unknown>>
): Operator<never, unknown> {
  if (operators.length === 0) {
    throw new TypeError('compose: at least one operator is required');
  }
  if (operators.length > 12) {
    throw new TypeError('compose: Too many operators (maximum 12).');
  }

  return (source: Enum<never>) =>
    operators.reduce<Enum<unknown>>(
      (result, operator, i) => applyOperator(result, operator, { message: `compose:operator[${i + 1}]` }),
      source
    );
}
