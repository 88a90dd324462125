/***
 * Equality — Value equality for components and states.
 *
 * Components need not be hashable, only comparable. Two values are equal
 * when they are the same object, or when the first one exposes an
 * `equals(other)` method that returns true.
 *
 ***/

export interface Equatable {
  equals(other: unknown): boolean;
}

export function is_equatable(value: object): value is Equatable {
  return "equals" in value && typeof value.equals === "function";
}

export function values_equal(a: object, b: object): boolean {
  if (a === b) return true;
  return is_equatable(a) && a.equals(b);
}
