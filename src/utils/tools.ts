import { truncate } from "lodash-es";
import { SequenceError } from "./errors";

/**
 * Renders a sequence value for log output. Objects are reduced to their
 * constructor name since chains of linked nodes are usually circular.
 *
 * @param {unknown} value - The value to describe.
 * @return {string} A short, single-line description.
 */
export function describeValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return `[${value.constructor?.name ?? "Object"}]`;
  }

  return truncate(String(value), { length: 60 });
}

/**
 * Ensures a count or index is a non-negative integer.
 *
 * @param {number} value - The number to check.
 * @param {string} what - Argument name used in the error message.
 * @throws {SequenceError} If the value is negative or not an integer.
 */
export function assertNonNegativeInteger(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new SequenceError(`${what} must be a non-negative integer: ${value}`);
  }
}

/**
 * Like {@link assertNonNegativeInteger}, but also accepts `Infinity` as "no limit".
 *
 * @param {number} value - The count to check.
 * @param {string} what - Argument name used in the error message.
 * @throws {SequenceError} If the value is negative, NaN or a fraction.
 */
export function assertCount(value: number, what: string): void {
  if (value === Infinity) return;
  assertNonNegativeInteger(value, what);
}
