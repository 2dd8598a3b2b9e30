import LazySequence from "../interfaces/LazySequence";
import type { InitialProducer, SuccessorFunction } from "../types/global";
import GeneratingIterator from "./iterators/GeneratingIterator";

/**
 * A sequence whose first value comes from `initial` and whose every later value
 * is `successor` applied to the one before, until `successor` returns `null` or
 * `undefined`.
 *
 * Useful for walking object hierarchies and graphs without collecting them
 * first, e.g. a node and all of its ancestors:
 *
 * ```ts
 * const ancestors = new GeneratingSequence(() => node, (n) => n.parent);
 * const path = ancestors.reversed(); // root first
 * ```
 *
 * Construction evaluates nothing, and neither does obtaining a traversal; see
 * {@link GeneratingIterator} for when each function runs. Every traversal calls
 * `initial` again, so a producer reading live state may yield a different
 * chain on each pass.
 *
 * Element types exclude `null` and `undefined`, which are reserved to mark the
 * end. A successor that never returns one makes `toArray`, `count`, `last` and
 * other exhaustive operations loop forever.
 */
export default class GeneratingSequence<T extends {}> extends LazySequence<T> {
  constructor(
    private readonly initial: InitialProducer<T>,
    private readonly successor: SuccessorFunction<T>,
  ) {
    super("generate");
    if (typeof initial !== "function" || typeof successor !== "function") {
      throw new TypeError(
        "A generating sequence needs an initial producer and a successor function.",
      );
    }
  }

  /**
   * Starts a new, independent traversal. Nothing is evaluated until its first advance.
   */
  iterator(): GeneratingIterator<T> {
    return new GeneratingIterator(this.initial, this.successor, this);
  }

  [Symbol.iterator](): GeneratingIterator<T> {
    return this.iterator();
  }
}
