/**
 * A single stateful walk over a sequence. `moveNext` advances and reports
 * whether a value is available, `current` reads it.
 */
export default abstract class Traversal<T> {
  public abstract moveNext(): boolean;
  public abstract get current(): T;
  public abstract get started(): boolean;
  public abstract get done(): boolean;
}
