/***
 * Priority — Caller-supplied ordering of handlers.
 *
 * A priority is a number, a bigint, a string, or an object implementing
 * Comparable. Numbers and bigints compare with each other; strings compare
 * with strings; Comparable objects compare through compare_to().
 *
 * Kinds are validated when a binding is created (NaN is rejected there).
 * Two priorities of different kinds are incomparable: that is only
 * discovered when two handlers meet in one list, and it is fatal at that
 * point (PRIORITY_NOT_COMPARABLE) rather than silently ordered.
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";

export interface Comparable {
  /** Negative when this sorts before other, positive after, zero if equal. */
  compare_to(other: Comparable): number;
}

export type Priority = number | bigint | string | Comparable;

function is_comparable(value: unknown): value is Comparable {
  return (
    typeof value === "object" &&
    value !== null &&
    "compare_to" in value &&
    typeof value.compare_to === "function"
  );
}

export function is_valid_priority(value: unknown): value is Priority {
  switch (typeof value) {
    case "number":
      return !Number.isNaN(value);
    case "bigint":
    case "string":
      return true;
    default:
      return is_comparable(value);
  }
}

function not_comparable(a: Priority, b: Priority): ECSError {
  return new ECSError(
    ECS_ERROR.PRIORITY_NOT_COMPARABLE,
    `priorities ${String(a)} and ${String(b)} cannot be compared`,
    { a, b },
  );
}

/**
 * Ascending comparison of two priorities (Array.prototype.sort contract).
 * Throws PRIORITY_NOT_COMPARABLE for priorities of different kinds.
 */
export function compare_priority(a: Priority, b: Priority): number {
  if (typeof a === "object") {
    if (typeof b !== "object") throw not_comparable(a, b);
    const result = a.compare_to(b);
    if (typeof result !== "number" || Number.isNaN(result)) {
      throw not_comparable(a, b);
    }
    return result;
  }
  if (typeof b === "object") throw not_comparable(a, b);
  if (typeof a === "string" || typeof b === "string") {
    if (typeof a !== "string" || typeof b !== "string") {
      throw not_comparable(a, b);
    }
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
