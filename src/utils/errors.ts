import type { TraversalStateKind } from "../types/global";

/**
 * Thrown when a traversal is used outside its valid window: reading `current`
 * before the first advance or after the end, or advancing after a failure.
 */
export class UsageError extends Error {
  readonly state: TraversalStateKind;

  constructor(message: string, state: TraversalStateKind) {
    super(message);
    this.name = "UsageError";
    this.state = state;
  }
}

/** Invalid arguments to a sequence operation, or access past the end of a sequence. */
export class SequenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SequenceError";
  }
}
