/**
 * A small FIFO queue on top of a circular buffer, with O(1) enqueue and
 * dequeue and no `Array.shift()` in sight.
 *
 * Unlike a fixed-capacity ring, this one doubles its backing array when it
 * fills up: the queues used by `tee` and `roundRobin` have no natural bound.
 *
 * Dequeueing returns a {@link Step} rather than `T | undefined`, because the
 * queued elements are whatever the user's sequence produces, `undefined`
 * included.
 *
 * @example
 * ```
 * const pending = createQueue<string>();
 * enqueue(pending, 'a');
 * enqueue(pending, 'b');
 *
 * dequeue(pending);  // { done: false, value: 'a' }
 * dequeue(pending);  // { done: false, value: 'b' }
 * dequeue(pending);  // DONE
 * ```
 *
 * @module
 */

import type { Step } from "./_types.ts";
import { DONE, emit } from "./signal.ts";

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Represents a circular buffer-based queue for efficient FIFO operations.
 *
 * @template T - The type of elements stored in the queue
 */
export interface Queue<T> {
  /** The backing array holding queue elements */
  items: T[];
  /** Index pointing to the front element (next to dequeue) */
  head: number;
  /** Index pointing to where the next element will be added */
  tail: number;
  /** Current number of elements in the queue */
  size: number;
}

export const DEFAULT_QUEUE_CAPACITY = 16;

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates a new empty queue.
 *
 * @param initialCapacity - Slots allocated up front; the queue grows past it as needed
 */
export function createQueue<T>(initialCapacity: number = DEFAULT_QUEUE_CAPACITY): Queue<T> {
  return {
    items: new Array<T>(Math.max(1, initialCapacity)),
    head: 0,
    tail: 0,
    size: 0,
  };
}

/////////////////////////
// Core Queue Operations //
/////////////////////////

/**
 * Adds an element to the back of the queue. Amortized O(1).
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (queue.size === queue.items.length) {
    grow(queue);
  }

  queue.items[queue.tail] = item;
  queue.tail = (queue.tail + 1) % queue.items.length;
  queue.size++;
}

/**
 * Removes and returns the front element, or `DONE` when the queue is empty.
 */
export function dequeue<T>(queue: Queue<T>): Step<T> {
  if (queue.size === 0) {
    return DONE;
  }

  const item = queue.items[queue.head];
  queue.items[queue.head] = undefined as unknown as T;  // help garbage collector
  queue.head = (queue.head + 1) % queue.items.length;
  queue.size--;

  return emit(item);
}

/**
 * Returns the front element without removing it, or `DONE` when empty.
 */
export function peek<T>(queue: Queue<T>): Step<T> {
  return queue.size === 0 ? DONE : emit(queue.items[queue.head]);
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

export function getSize<T>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Creates a new array containing all queue elements, front to back.
 * O(n); meant for inspection and tests.
 */
export function toArray<T>(queue: Queue<T>): T[] {
  const result: T[] = [];
  for (let i = 0; i < queue.size; i++) {
    const index = (queue.head + i) % queue.items.length;
    result.push(queue.items[index]);
  }
  return result;
}

/**
 * Doubles the backing array, unwrapping the ring so the front lands at 0.
 */
function grow<T>(queue: Queue<T>): void {
  const capacity = queue.items.length;
  const items = new Array<T>(capacity * 2);
  for (let i = 0; i < queue.size; i++) {
    items[i] = queue.items[(queue.head + i) % capacity];
  }

  queue.items = items;
  queue.head = 0;
  queue.tail = queue.size;
}
