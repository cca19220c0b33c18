// helpers/operations/combination.ts
// Combinators that merge, chain or nest enumerations

import type { Enum, Gen, Step } from "../../_types.ts";
import type { Operator } from "../_types.ts";
import type { Queue } from "../../queue.ts";

import { failEmpty } from "../../asserts.ts";
import { isEmpty, toList } from "../../enum.ts";
import { createQueue, dequeue, enqueue } from "../../queue.ts";
import { createStatefulEnum } from "../operators.ts";
import { DONE, emit } from "../../signal.ts";
import { map } from "./core.ts";

/**
 * Combines two enums element-wise with `combine`. Stops as soon as either
 * side runs out; the longer side's leftovers are never pulled. `left` is
 * pulled before `right` on every step.
 *
 * @example
 * ```ts
 * toList(zipWith((a, b) => a + b, ofList([1, 2, 3]), ofList([10, 20])));
 * // [11, 22]
 * ```
 */
export function zipWith<A, B, R>(
  combine: (a: A, b: B) => R,
  left: Enum<A>,
  right: Enum<B>,
): Enum<R> {
  return createStatefulEnum<R, { left: Gen<A>; right: Gen<B> }>({
    name: "zipWith",
    createState: () => ({ left: left(), right: right() }),
    pull(state) {
      const a = state.left.next();
      if (a.done) return DONE;
      const b = state.right.next();
      if (b.done) return DONE;
      return emit(combine(a.value, b.value));
    },
  });
}

/**
 * Pairs up two enums element-wise.
 *
 * @example
 * ```ts
 * toList(zip(ofList([1, 2]), ofList(["a", "b", "c"])));
 * // [[1, "a"], [2, "b"]]
 * ```
 */
export function zip<A, B>(left: Enum<A>, right: Enum<B>): Enum<[A, B]> {
  return zipWith((a: A, b: B): [A, B] => [a, b], left, right);
}

/**
 * All of `first`, then all of `second`.
 *
 * `second` is started only once `first` is exhausted, and only once per
 * run.
 */
export function append<T>(first: Enum<T>, second: Enum<T>): Enum<T> {
  return createStatefulEnum<T, { gen: Gen<T>; switched: boolean }>({
    name: "append",
    createState: () => ({ gen: first(), switched: false }),
    pull(state) {
      const step = state.gen.next();
      if (!step.done || state.switched) return step;

      state.switched = true;
      state.gen = second();
      return state.gen.next();
    },
  });
}

/**
 * Repeats `source` forever, starting a new run each time the previous one
 * ends.
 *
 * `source` is checked for emptiness right away, with a throwaway run; an
 * empty cycle would spin without ever producing anything.
 *
 * @example
 * ```ts
 * toList(pipe(cycle(ofList([1, 2])), take(5))); // [1, 2, 1, 2, 1]
 * ```
 *
 * @throws {EnumError} When `source` is empty
 */
export function cycle<T>(source: Enum<T>): Enum<T> {
  if (isEmpty(source)) failEmpty("cycle");

  return createStatefulEnum<T, { gen: Gen<T>; finished: boolean }>({
    name: "cycle",
    createState: () => ({ gen: source(), finished: false }),
    pull(state) {
      if (state.finished) return DONE;

      const step = state.gen.next();
      if (!step.done) return step;

      // one restart per pull: a restart that is itself empty ends the cycle
      state.gen = source();
      const restarted = state.gen.next();
      if (restarted.done) state.finished = true;
      return restarted;
    },
  });
}

/**
 * Concatenates an enum of enums.
 *
 * @example
 * ```ts
 * toList(flatten(ofList([ofList([1, 2]), empty(), ofList([3])]))); // [1, 2, 3]
 * ```
 */
export function flatten<T>(source: Enum<Enum<T>>): Enum<T> {
  return createStatefulEnum<T, { outer: Gen<Enum<T>>; inner: Gen<T> | undefined }>({
    name: "flatten",
    createState: () => ({ outer: source(), inner: undefined }),
    pull(state) {
      for (;;) {
        if (state.inner) {
          const step = state.inner.next();
          if (!step.done) return step;
        }

        const next = state.outer.next();
        if (next.done) {
          state.inner = undefined;
          return DONE;
        }
        state.inner = next.value();
      }
    },
  });
}

/**
 * Expands every element into an enum and concatenates the results.
 *
 * @example
 * ```ts
 * toList(pipe(ofList([1, 2]), flatMap(n => ofList([n, n * 10])))); // [1, 10, 2, 20]
 * ```
 */
export function flatMap<T, R>(project: (value: T) => Enum<R>): Operator<T, R> {
  return (source: Enum<T>) => flatten(map(project)(source));
}

/**
 * Alternates between `left` and `right`, one element each, `left` first.
 * Ends the moment the side whose turn it is runs out, even if the other
 * side still has elements.
 *
 * @example
 * ```ts
 * toList(interleave(ofList([1, 2]), ofList([10, 20]))); // [1, 10, 2, 20]
 * toList(interleave(ofList([1, 2]), ofList([10])));     // [1, 10, 2]
 * ```
 */
export function interleave<T>(left: Enum<T>, right: Enum<T>): Enum<T> {
  return createStatefulEnum<T, { left: Gen<T>; right: Gen<T>; leftTurn: boolean }>({
    name: "interleave",
    createState: () => ({ left: left(), right: right(), leftTurn: true }),
    pull(state) {
      const gen = state.leftTurn ? state.left : state.right;
      state.leftTurn = !state.leftTurn;
      return gen.next();
    },
  });
}

/**
 * Puts `separator` between consecutive elements.
 *
 * @example
 * ```ts
 * toList(pipe(ofList([1, 2, 3]), intersperse(0))); // [1, 0, 2, 0, 3]
 * ```
 */
export function intersperse<T>(separator: T): Operator<T, T> {
  return (source: Enum<T>) =>
    createStatefulEnum<T, { gen: Gen<T>; pending: Step<T>; primed: boolean }>({
      name: "intersperse",
      createState: () => ({ gen: source(), pending: DONE, primed: false }),
      pull(state) {
        if (!state.primed) {
          state.primed = true;
          return state.gen.next();
        }

        if (!state.pending.done) {
          const element = state.pending;
          state.pending = DONE;
          return element;
        }

        // look ahead: only emit a separator if something follows it
        const lookahead = state.gen.next();
        if (lookahead.done) return DONE;
        state.pending = lookahead;
        return emit(separator);
      },
    });
}

/**
 * Merges several enums fairly: one element from each live source in turn.
 * Sources drop out as they run dry; the rest keep rotating.
 *
 * The outer enum is read in full when a run starts, so it must be finite.
 *
 * @example
 * ```ts
 * toList(roundRobin(ofList([ofList([1, 2]), ofList([10, 20, 30])])));
 * // [1, 10, 2, 20, 30]
 * ```
 */
export function roundRobin<T>(sources: Enum<Enum<T>>): Enum<T> {
  return createStatefulEnum<T, { live: Queue<Gen<T>> }>({
    name: "roundRobin",
    createState() {
      const live = createQueue<Gen<T>>();
      for (const source of toList(sources)) {
        enqueue(live, source());
      }
      return { live };
    },
    pull(state) {
      for (let front = dequeue(state.live); !front.done; front = dequeue(state.live)) {
        const gen = front.value;
        const step = gen.next();
        if (!step.done) {
          enqueue(state.live, gen);
          return step;
        }
      }
      return DONE;
    },
  });
}

/**
 * Cartesian product in row-major order: every pair with the first element
 * of `left` comes before any pair with the second.
 *
 * `right` is restarted once per element of `left`, so it has to be a real,
 * restartable enum.
 *
 * @example
 * ```ts
 * toList(product(ofList([1, 2]), ofList(["a", "b"])));
 * // [[1, "a"], [1, "b"], [2, "a"], [2, "b"]]
 * ```
 */
export function product<A, B>(left: Enum<A>, right: Enum<B>): Enum<[A, B]> {
  return createStatefulEnum<[A, B], { left: Gen<A>; current: Step<A>; right: Gen<B> }>({
    name: "product",
    createState() {
      const leftGen = left();
      return { left: leftGen, current: leftGen.next(), right: right() };
    },
    pull(state) {
      for (let current = state.current; !current.done; current = state.current) {
        const step = state.right.next();
        if (!step.done) return emit<[A, B]>([current.value, step.value]);

        state.current = state.left.next();
        if (!state.current.done) state.right = right();
      }
      return DONE;
    },
  });
}
