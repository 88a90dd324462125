/***
 * Merge — Reducers that combine per-type id sets into a query result.
 *
 * A query looks up one id set per requested tag, then one per requested
 * type, and hands all of them, positionally, to a merge function. Any function with that shape works;
 * these cover the usual cases:
 *
 *   intersection          entities having all of the types (default)
 *   union                 entities having any of the types
 *   symmetric_difference  entities having an odd number of the types
 *                         (exactly one of them, for two types)
 *   difference            entities having the first type but none of the rest
 *
 ***/

import type { EntityID } from "../entity/entity_id";

export type MergeFn = (
  ...sets: ReadonlySet<EntityID>[]
) => Iterable<EntityID>;

function intersection(...sets: ReadonlySet<EntityID>[]): Set<EntityID> {
  if (sets.length === 0) return new Set();
  // Walk the smallest set, probe the others
  let smallest = sets[0];
  for (let i = 1; i < sets.length; i++) {
    if (sets[i].size < smallest.size) smallest = sets[i];
  }
  const result = new Set<EntityID>();
  outer: for (const id of smallest) {
    for (let i = 0; i < sets.length; i++) {
      if (!sets[i].has(id)) continue outer;
    }
    result.add(id);
  }
  return result;
}

function union(...sets: ReadonlySet<EntityID>[]): Set<EntityID> {
  const result = new Set<EntityID>();
  for (const set of sets) {
    for (const id of set) result.add(id);
  }
  return result;
}

function symmetric_difference(
  ...sets: ReadonlySet<EntityID>[]
): Set<EntityID> {
  const result = new Set<EntityID>();
  for (const set of sets) {
    for (const id of set) {
      if (result.has(id)) {
        result.delete(id);
      } else {
        result.add(id);
      }
    }
  }
  return result;
}

function difference(...sets: ReadonlySet<EntityID>[]): Set<EntityID> {
  if (sets.length === 0) return new Set();
  const result = new Set(sets[0]);
  for (let i = 1; i < sets.length; i++) {
    for (const id of sets[i]) result.delete(id);
  }
  return result;
}

export const MERGE = Object.freeze({
  intersection,
  union,
  symmetric_difference,
  difference,
} satisfies Record<string, MergeFn>);
