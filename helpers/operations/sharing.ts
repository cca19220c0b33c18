import type { Enum, Gen, Step } from "../../_types.ts";
import type { Logger } from "../../config.ts";
import type { Queue } from "../../queue.ts";

import { assertPositiveCount } from "../../asserts.ts";
import { getConfig } from "../../config.ts";
import { createMList, mlistToEnum, pushBack } from "../../mlist.ts";
import { createQueue, dequeue, enqueue } from "../../queue.ts";
import { createStatefulEnum, StatefulGen } from "../operators.ts";
import { DONE, emit } from "../../signal.ts";

/**
 * @module operations/sharing
 *
 * **Operators that share one generator between several consumers**
 *
 * Everything else in the library composes enums, so every consumer gets its
 * own run. The two operators here deliberately do not:
 *
 * - {@link persistent} drains a single generator once and turns the recording
 *   into an enum that replays it as often as you like;
 * - {@link tee} splits one run into several branches that take turns
 *   receiving its elements, buffering for whichever branch lags behind.
 */

/**
 * Records the rest of `gen` and returns an enum replaying that recording.
 *
 * `gen` is drained immediately and completely, so it must be finite: an
 * infinite generator makes this call never return.
 *
 * @example
 * ```ts
 * const once = ofList([1, 2, 3])();
 * const replay = persistent(once);
 *
 * toList(replay); // [1, 2, 3]
 * toList(replay); // [1, 2, 3], `once` is not touched again
 * ```
 */
export function persistent<T>(gen: Gen<T>): Enum<T> {
  const list = createMList<T>();
  for (let step = gen.next(); !step.done; step = gen.next()) {
    pushBack(list, step.value);
  }
  return mlistToEnum(list);
}

export interface TeeOptions {
  /**
   * Number of branches
   * @default 2
   */
  branches?: number;

  /**
   * Buffered elements, summed over all branches, above which a warning is
   * logged once. `Infinity` turns the warning off.
   * @default getConfig().teeHighWaterMark
   */
  highWaterMark?: number;

  /**
   * Where the warning goes
   * @default getConfig().logger
   */
  logger?: Logger;
}

/**
 * Shared state of one tee run: the upstream generator, one queue per
 * branch, and the cursor naming the branch owed the next upstream element.
 */
export class TeeHub<T> {
  readonly #upstream: Gen<T>;
  readonly #queues: Queue<T>[];
  readonly #highWaterMark: number;
  readonly #logger: Logger;
  #cursor = 0;
  #buffered = 0;
  #warned = false;

  constructor(upstream: Gen<T>, branches: number, highWaterMark: number, logger: Logger) {
    this.#upstream = upstream;
    this.#queues = Array.from({ length: branches }, () => createQueue<T>());
    this.#highWaterMark = highWaterMark;
    this.#logger = logger;
  }

  /** Elements pulled from upstream but not yet delivered to their branch */
  get buffered(): number {
    return this.#buffered;
  }

  /** Branch that will receive the next upstream element */
  get cursor(): number {
    return this.#cursor;
  }

  /**
   * Next element for `branch`: from its queue if anything is waiting there,
   * otherwise from upstream, parking elements owed to other branches in
   * their queues along the way.
   */
  pullFor(branch: number): Step<T> {
    const waiting = dequeue(this.#queues[branch]);
    if (!waiting.done) {
      this.#buffered--;
      return waiting;
    }

    for (let step = this.#upstream.next(); !step.done; step = this.#upstream.next()) {
      const owner = this.#cursor;
      this.#cursor = (owner + 1) % this.#queues.length;
      if (owner === branch) return step;

      enqueue(this.#queues[owner], step.value);
      this.#buffered++;
      this.#checkHighWaterMark();
    }
    return DONE;
  }

  #checkHighWaterMark(): void {
    if (this.#warned || this.#buffered <= this.#highWaterMark) return;

    this.#warned = true;
    this.#logger.warn(
      `tee: ${this.#buffered} elements buffered across ${this.#queues.length} branches ` +
      `(high-water mark ${this.#highWaterMark}); branches are consumed at very different rates`
    );
  }
}

/**
 * Splits `source` into several branches fed by a single run of it.
 *
 * Each call of the returned enum starts one run of `source` and yields
 * exactly `branches` branch generators (branch 0 first), then ends. Upstream
 * elements are dealt to the branches in rotation, element `k` going to
 * branch `k mod branches`. Pulling a branch whose queue is empty pulls
 * upstream until that branch's element shows up, buffering the elements
 * meant for the others.
 *
 * Branches are one-shot generators, not enums; they cannot be restarted.
 * Memory grows with the gap between the fastest and the slowest branch.
 *
 * @example
 * ```ts
 * const [evens, odds] = teeBranches(intRange(0, 5));
 * evens.next(); // { done: false, value: 0 }
 * odds.next();  // { done: false, value: 1 }
 * evens.next(); // { done: false, value: 2 }
 * ```
 *
 * @param source - The enum to split
 * @param options - Branch count, or a {@link TeeOptions} object
 * @throws {EnumError} When the branch count is not a positive integer
 */
export function tee<T>(source: Enum<T>, options: number | TeeOptions = {}): Enum<Gen<T>> {
  const resolved: TeeOptions = typeof options === "number" ? { branches: options } : options;
  const { branches = 2, highWaterMark, logger } = resolved;
  assertPositiveCount(branches, "tee");

  return createStatefulEnum<Gen<T>, { hub: TeeHub<T>; handedOut: number }>({
    name: "tee",
    createState() {
      const config = getConfig();
      const hub = new TeeHub<T>(
        source(),
        branches,
        highWaterMark ?? config.teeHighWaterMark,
        logger ?? config.logger,
      );
      return { hub, handedOut: 0 };
    },
    pull(state) {
      if (state.handedOut === branches) return DONE;

      const hub = state.hub;
      const branch = state.handedOut++;
      return emit<Gen<T>>(new StatefulGen<T, number>(branch, index => hub.pullFor(index)));
    },
  });
}

/**
 * Runs {@link tee} once and returns its branches as an array.
 */
export function teeBranches<T>(source: Enum<T>, options: number | TeeOptions = {}): Gen<T>[] {
  const branches: Gen<T>[] = [];
  const gen = tee(source, options)();
  for (let step = gen.next(); !step.done; step = gen.next()) {
    branches.push(step.value);
  }
  return branches;
}
