import { isNil } from "lodash-es";
import Traversal from "../../interfaces/Traversal";
import type {
  InitialProducer,
  LogSettings,
  SuccessorFunction,
  TraversalState,
  TraversalStateKind,
} from "../../types/global";
import { UsageError } from "../../utils/errors";
import { describeValue } from "../../utils/tools";

/**
 * Walks a generating sequence one value at a time. Nothing is evaluated until
 * the first advance: that call invokes the initial producer, and every later
 * advance invokes the successor with the current value. A nullish result ends
 * the traversal for good.
 *
 * Only the current value is retained, so arbitrarily long chains can be walked
 * in constant space.
 *
 * If the producer or successor throws, the error reaches the caller untouched
 * and the traversal is left in the `failed` state; it cannot be advanced again.
 */
export default class GeneratingIterator<T extends {}>
  extends Traversal<T>
  implements IterableIterator<T>
{
  private state: TraversalState<T> = { kind: "pending" };
  private yielded = 0;

  constructor(
    private readonly initial: InitialProducer<T>,
    private readonly successor: SuccessorFunction<T>,
    private readonly settings: LogSettings,
  ) {
    super();
  }

  get started(): boolean {
    return this.state.kind !== "pending";
  }

  get done(): boolean {
    return this.state.kind === "terminated";
  }

  get stateKind(): TraversalStateKind {
    return this.state.kind;
  }

  /**
   * The value produced by the last successful advance.
   * @throws {UsageError} Unless the last advance reported a value.
   */
  get current(): T {
    const state = this.state;
    switch (state.kind) {
      case "active":
        return state.value;
      case "pending":
        throw new UsageError(
          "Current value read before the traversal was advanced",
          "pending",
        );
      case "terminated":
        throw new UsageError(
          "Current value read after the traversal ended",
          "terminated",
        );
      case "failed":
        throw new UsageError(
          "Current value read after the traversal failed",
          "failed",
        );
    }
  }

  /**
   * Advances to the next value.
   *
   * @return {boolean} `true` when `current` holds a new value, `false` once the chain has ended.
   * @throws {UsageError} When a previous advance failed.
   */
  moveNext(): boolean {
    const state = this.state;
    switch (state.kind) {
      case "terminated":
        return false;
      case "failed":
        throw new UsageError(
          `Traversal of ${this.settings.label} cannot continue after a failure`,
          "failed",
        );
      case "pending":
        if (this.settings.debug) {
          console.log(
            "Traversal START:",
            this.settings.label,
            this.settings.id,
          );
        }
        return this.settle(() => this.initial());
      case "active": {
        const value = state.value;
        return this.settle(() => this.successor(value));
      }
    }
  }

  next(): IteratorResult<T, undefined> {
    if (this.moveNext()) {
      return { done: false, value: this.current };
    }
    return { done: true, value: undefined };
  }

  /** Abandons the traversal. Called by `for..of` on `break`. */
  return(): IteratorResult<T, undefined> {
    if (this.state.kind === "active" && this.settings.debug) {
      this.logEnd();
    }
    if (this.state.kind !== "failed") {
      this.state = { kind: "terminated" };
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private settle(produce: () => T | null | undefined): boolean {
    let value: T | null | undefined;
    try {
      value = produce();
    } catch (error) {
      this.state = { kind: "failed", error };
      if (this.settings.debug) {
        console.error(
          "Traversal FAILED:",
          this.settings.label,
          this.settings.id,
          error,
        );
      }
      throw error;
    }

    if (isNil(value)) {
      this.state = { kind: "terminated" };
      if (this.settings.debug) this.logEnd();
      return false;
    }

    if (this.settings.verbose) {
      console.log(
        "Traversal STEP:",
        this.settings.label,
        this.yielded,
        describeValue(value),
      );
    }
    this.state = { kind: "active", value };
    this.yielded++;
    return true;
  }

  private logEnd() {
    console.log(
      "Traversal END:",
      this.settings.label,
      this.settings.id,
      `${this.yielded} values`,
    );
  }
}
