/** Produces the first value of a traversal. A nullish result means an empty traversal. */
export type InitialProducer<T> = () => T | null | undefined;

/** Computes the value after `value`, or returns nullish to end the traversal. */
export type SuccessorFunction<T> = (value: T) => T | null | undefined;

export type LineageMode = "debug" | "verbose" | "production";

export type TraversalState<T> =
  | { kind: "pending" }
  | { kind: "active"; value: T }
  | { kind: "terminated" }
  | { kind: "failed"; error: unknown };

export type TraversalStateKind = TraversalState<unknown>["kind"];

export interface LogSettings {
  readonly id: string;
  readonly label: string;
  readonly debug: boolean;
  readonly verbose: boolean;
}

export interface SequenceJson {
  __id: string;
  __label: string;
  __debug: boolean;
  __verbose: boolean;
}
