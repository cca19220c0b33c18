/**
 * Append-only circular doubly-linked list, the backing store of
 * `persistent`.
 *
 * Nodes live in an index arena: three parallel arrays hold each node's value
 * and the indices of its predecessor and successor. The handle points at an
 * anchor node (index 0 once anything was appended) or at `-1` while the list
 * is empty. A single node links to itself in both directions.
 *
 * Walking `next` from the anchor visits every node once, in insertion order,
 * and lands back on the anchor.
 *
 * @module
 */

import type { Enum, Gen, Step } from "./_types.ts";
import { createStatefulEnum } from "./helpers/operators.ts";
import { DONE, emit } from "./signal.ts";

const NIL = -1;

export interface MList<T> {
  /** Node values, by node index */
  values: T[];
  /** Predecessor index of each node */
  prev: number[];
  /** Successor index of each node */
  next: number[];
  /** Index of the anchor node, or -1 when empty */
  anchor: number;
}

export function createMList<T>(): MList<T> {
  return { values: [], prev: [], next: [], anchor: NIL };
}

export function isEmptyMList<T>(list: MList<T>): boolean {
  return list.anchor === NIL;
}

export function sizeOf<T>(list: MList<T>): number {
  return list.values.length;
}

/**
 * Appends `value` behind the last node, i.e. just before the anchor.
 */
export function pushBack<T>(list: MList<T>, value: T): void {
  const node = list.values.length;
  list.values.push(value);

  if (list.anchor === NIL) {
    list.prev.push(node);
    list.next.push(node);
    list.anchor = node;
    return;
  }

  const first = list.anchor;
  const last = list.prev[first];
  list.prev.push(last);
  list.next.push(first);
  list.next[last] = node;
  list.prev[first] = node;
}

/**
 * Views the list as an {@link Enum}. Every generator starts at the anchor and
 * stops once it would come back around to it.
 *
 * Nodes appended after a walk has begun are picked up by that walk as long
 * as it has not yet wrapped.
 */
export function mlistToEnum<T>(list: MList<T>): Enum<T> {
  return createStatefulEnum<T, { cursor: number; stopped: boolean }>({
    name: "mlist",
    createState: () => ({ cursor: list.anchor, stopped: list.anchor === NIL }),
    pull(state): Step<T> {
      if (state.stopped) return DONE;

      const value = list.values[state.cursor];
      state.cursor = list.next[state.cursor];
      if (state.cursor === list.anchor) state.stopped = true;
      return emit(value);
    },
  });
}

/**
 * Walks the list once from the anchor into an array.
 */
export function mlistToArray<T>(list: MList<T>): T[] {
  const result: T[] = [];
  const gen: Gen<T> = mlistToEnum(list)();
  for (let step = gen.next(); !step.done; step = gen.next()) {
    result.push(step.value);
  }
  return result;
}
