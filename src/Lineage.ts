import GeneratingSequence from "./sequence/GeneratingSequence";
import type {
  InitialProducer,
  LineageMode,
  SuccessorFunction,
} from "./types/global";

/**
 * Entry point of the library. Holds the process-wide mode and creates
 * sequences configured for it.
 */
export default class Lineage {
  static mode: LineageMode = "production";

  /**
   * Sets the mode applied to sequences created from now on.
   *
   * @param {LineageMode} mode - "debug" logs when traversals start, end or
   *                             fail, "verbose" also logs every value, and
   *                             "production" logs nothing.
   */
  public static setMode(mode: LineageMode) {
    this.mode = mode;
  }

  /**
   * Creates a lazy sequence starting at `initial()` and continuing with
   * `successor` until it returns nullish.
   *
   * @example
   * ```ts
   * const countdown = Lineage.generate(() => 3, (n) => (n > 1 ? n - 1 : null));
   * countdown.toArray(); // [3, 2, 1]
   * ```
   */
  public static generate<T extends {}>(
    initial: InitialProducer<T>,
    successor: SuccessorFunction<T>,
  ): GeneratingSequence<T> {
    return new GeneratingSequence(initial, successor)
      .setDebug(this.mode !== "production")
      .setVerbose(this.mode === "verbose");
  }

  /**
   * A node followed by its parent, grandparent and so on, up to the node whose
   * `parentOf` is nullish.
   *
   * @example
   * ```ts
   * const path = Lineage.ancestors(leaf, (n) => n.parent).reversed();
   * ```
   */
  public static ancestors<T extends {}>(
    node: T,
    parentOf: SuccessorFunction<T>,
  ): GeneratingSequence<T> {
    return this.generate(() => node, parentOf);
  }
}

export function createGeneratingSequence<T extends {}>(
  initialProducer: InitialProducer<T>,
  successorFunction: SuccessorFunction<T>,
): GeneratingSequence<T> {
  return Lineage.generate(initialProducer, successorFunction);
}
