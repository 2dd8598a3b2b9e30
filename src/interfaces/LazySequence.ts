import { v4 as uuid } from "uuid";
import type { LogSettings, SequenceJson } from "../types/global";
import { SequenceError } from "../utils/errors";
import { assertCount, assertNonNegativeInteger } from "../utils/tools";
import {
  filterValues,
  mapValues,
  skipValues,
  skipValuesWhile,
  takeValues,
  takeValuesWhile,
} from "../utils/transforms";

/**
 * Abstract base for restartable, lazily evaluated sequences. Subclasses only
 * provide `[Symbol.iterator]`; every traversal they hand out must be
 * independent of the others.
 *
 * Operators such as `map` and `take` return new lazy sequences and evaluate
 * nothing. Terminal operations such as `toArray` and `last` walk a fresh
 * traversal to the end and never return on an unbounded sequence.
 */
export default abstract class LazySequence<T>
  implements Iterable<T>, LogSettings
{
  readonly id: string;
  readonly label: string;
  protected debugEnabled: boolean = false;
  protected verboseEnabled: boolean = false;

  protected constructor(label: string) {
    this.id = uuid();
    this.label = label;
  }

  public abstract [Symbol.iterator](): Iterator<T>;

  get debug(): boolean {
    return this.debugEnabled;
  }

  get verbose(): boolean {
    return this.verboseEnabled;
  }

  setDebug(value: boolean): this {
    this.debugEnabled = value;
    return this;
  }

  setVerbose(value: boolean): this {
    this.verboseEnabled = value;
    return this;
  }

  /**
   * Lazily transforms every value.
   *
   * @param {(value: T, index: number) => U} fn - Called once per value, in order, as the result is traversed.
   * @return {LazySequence<U>} A sequence of the transformed values.
   */
  map<U>(fn: (value: T, index: number) => U): LazySequence<U> {
    return new DerivedSequence<T, U>(this, "map", (source) =>
      mapValues(source, fn),
    );
  }

  /**
   * Lazily keeps the values matching `predicate`.
   *
   * @param {(value: T, index: number) => boolean} predicate - Receives each value and its position in the source.
   * @return {LazySequence<T>} A sequence of the matching values.
   */
  filter(predicate: (value: T, index: number) => boolean): LazySequence<T> {
    return new DerivedSequence<T, T>(this, "filter", (source) =>
      filterValues(source, predicate),
    );
  }

  /**
   * Values up to, not including, the first one failing `predicate`. The source
   * is not advanced past that value.
   */
  takeWhile(predicate: (value: T) => boolean): LazySequence<T> {
    return new DerivedSequence<T, T>(this, "takeWhile", (source) =>
      takeValuesWhile(source, predicate),
    );
  }

  /** Drops leading values while `predicate` holds, then yields the rest. */
  skipWhile(predicate: (value: T) => boolean): LazySequence<T> {
    return new DerivedSequence<T, T>(this, "skipWhile", (source) =>
      skipValuesWhile(source, predicate),
    );
  }

  /**
   * The first `count` values. The source is never advanced past the last one
   * taken, so `take` is safe on unbounded sequences.
   *
   * @param {number} count - A non-negative integer, or `Infinity` for no limit.
   * @return {LazySequence<T>} The prefix.
   * @throws {SequenceError} If `count` is negative, NaN or a fraction.
   */
  take(count: number): LazySequence<T> {
    assertCount(count, "Take count");
    return new DerivedSequence<T, T>(this, "take", (source) =>
      takeValues(source, count),
    );
  }

  /**
   * Everything after the first `count` values. `skip(Infinity)` is empty, but
   * still walks the whole source.
   *
   * @throws {SequenceError} If `count` is negative, NaN or a fraction.
   */
  skip(count: number): LazySequence<T> {
    assertCount(count, "Skip count");
    return new DerivedSequence<T, T>(this, "skip", (source) =>
      skipValues(source, count),
    );
  }

  /** Collects every value, in order. Never returns on an unbounded sequence. */
  toArray(): T[] {
    return Array.from(this);
  }

  /**
   * All values, last first. For a chain of ancestors this is the path from the
   * root down to the starting node.
   */
  reversed(): T[] {
    return this.toArray().reverse();
  }

  /** Number of values. Walks the whole sequence. */
  count(): number {
    let count = 0;
    for (const _ of this) count++;
    return count;
  }

  isEmpty(): boolean {
    return this[Symbol.iterator]().next().done === true;
  }

  /**
   * @throws {SequenceError} If the sequence is empty.
   */
  first(): T {
    for (const value of this) return value;
    throw new SequenceError(`No first value: ${this.label} is empty`);
  }

  /**
   * @throws {SequenceError} If the sequence is empty.
   */
  last(): T {
    const iterator = this[Symbol.iterator]();
    let result = iterator.next();
    if (result.done) {
      throw new SequenceError(`No last value: ${this.label} is empty`);
    }

    let last: T = result.value;
    for (result = iterator.next(); !result.done; result = iterator.next()) {
      last = result.value;
    }
    return last;
  }

  /**
   * @throws {SequenceError} If `index` is negative or not less than the length.
   */
  elementAt(index: number): T {
    assertNonNegativeInteger(index, "Index");

    let position = 0;
    for (const value of this) {
      if (position++ === index) return value;
    }
    throw new SequenceError(
      `Index ${index} out of range: ${this.label} has ${position} values`,
    );
  }

  /**
   * Finds the first value matching `predicate`, advancing no further than it.
   *
   * @param {(value: T) => boolean} predicate - The test applied to each value.
   * @return {T | undefined} The match, or `undefined` when there is none.
   */
  find(predicate: (value: T) => boolean): T | undefined {
    for (const value of this) {
      if (predicate(value)) return value;
    }
    return undefined;
  }

  /** Whether any value matches. Stops at the first match. */
  some(predicate: (value: T) => boolean): boolean {
    for (const value of this) {
      if (predicate(value)) return true;
    }
    return false;
  }

  /** Whether all values match. Stops at the first value that does not. */
  every(predicate: (value: T) => boolean): boolean {
    for (const value of this) {
      if (!predicate(value)) return false;
    }
    return true;
  }

  /** Whether `element` occurs, compared with `===`. Stops when found. */
  includes(element: T): boolean {
    for (const value of this) {
      if (value === element) return true;
    }
    return false;
  }

  /**
   * Calls `fn` with every value and its position.
   *
   * @param {(value: T, index: number) => void} fn - The callback.
   */
  forEach(fn: (value: T, index: number) => void): void {
    let index = 0;
    for (const value of this) fn(value, index++);
  }

  /**
   * Folds the values left to right.
   *
   * @param {(accumulator: A, value: T) => A} fn - Combines the running result with the next value.
   * @param {A} initial - The starting result, returned as is for an empty sequence.
   * @return {A} The final result.
   */
  reduce<A>(fn: (accumulator: A, value: T) => A, initial: A): A {
    let accumulator = initial;
    for (const value of this) accumulator = fn(accumulator, value);
    return accumulator;
  }

  /**
   * Concatenates the string forms of all values.
   *
   * @param {string} [separator=""] - Placed between consecutive values.
   * @return {string} The joined string.
   */
  join(separator: string = ""): string {
    return this.toArray().map(String).join(separator);
  }

  log() {
    console.log("vvvvvvvvvvvvvvvvv");
    console.log("Sequence", this.label);
    console.log("id:", this.id);
    console.log("debug:", this.debug, "verbose:", this.verbose);
    console.log("=================");
  }

  export(): SequenceJson {
    return {
      __id: this.id,
      __label: this.label,
      __debug: this.debug,
      __verbose: this.verbose,
    };
  }
}

/**
 * A sequence computed from another one by a generator over the source. Its log
 * flags are the source's: the source's traversals do the logging.
 */
export class DerivedSequence<S, T> extends LazySequence<T> {
  constructor(
    private readonly source: LazySequence<S>,
    operator: string,
    private readonly transform: (source: Iterable<S>) => Iterator<T>,
  ) {
    super(`${operator}(${source.label})`);
  }

  get debug(): boolean {
    return this.source.debug;
  }

  get verbose(): boolean {
    return this.source.verbose;
  }

  setDebug(value: boolean): this {
    this.source.setDebug(value);
    return this;
  }

  setVerbose(value: boolean): this {
    this.source.setVerbose(value);
    return this;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.transform(this.source);
  }
}
