/***
 * EventKeyRegistry — Per-event-class key functions.
 *
 * A key function maps an event to the key (or keys) that narrow which
 * keyed handlers receive it. Key functions are looked up by event class
 * and inherited: a subclass without its own key function uses its
 * nearest ancestor's.
 *
 * A key function is set at most once per class. The registry is passed
 * to a Dispatcher explicitly; nothing is global.
 *
 * A key function's result is read as several keys when it is an array or
 * an iterator (a generator, a Set's values(), ...), and as one key
 * otherwise. A Set itself is one key.
 *
 * Usage:
 *
 *   const keys = new EventKeyRegistry();
 *   keys.set(Moved, (event) => event.kind);
 *   keys.resolve(PlayerMoved);   // Moved's key function
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { unsafe_cast } from "type_primitives";
import { type_name, type Type } from "../hierarchy/type";
import { TypeHierarchy } from "../hierarchy/type_hierarchy";

export type KeyFunction<E> = (event: E) => unknown;

/** A key function with its event type erased, as the dispatcher calls it. */
export type AnyKeyFunction = KeyFunction<object>;

export class EventKeyRegistry {
  private readonly functions: WeakMap<Type, KeyFunction<never>> =
    new WeakMap();

  constructor(public readonly hierarchy: TypeHierarchy = new TypeHierarchy()) {}

  public set<E>(type: Type<E>, fn: KeyFunction<E>): void {
    if (this.functions.has(type)) {
      throw new ECSError(
        ECS_ERROR.KEY_FUNCTION_ALREADY_SET,
        `key function for ${type_name(type)} is already set`,
        { type: type_name(type) },
      );
    }
    this.functions.set(type, fn);
  }

  /** The key function set for exactly this class. */
  public get<E>(type: Type<E>): KeyFunction<E> | undefined {
    return unsafe_cast<KeyFunction<E> | undefined>(this.functions.get(type));
  }

  public has(type: Type): boolean {
    return this.functions.has(type);
  }

  /** Whether this class or one of its ancestors has a key function. */
  public exists(type: Type): boolean {
    return this.resolve(type) !== undefined;
  }

  /** The key function of the class or of its nearest ancestor. */
  public resolve(type: Type): AnyKeyFunction | undefined {
    for (const ancestor of this.hierarchy.ancestors(type)) {
      const fn = this.functions.get(ancestor);
      // stored under the class its events are instances of
      if (fn !== undefined) return unsafe_cast<AnyKeyFunction>(fn);
    }
    return undefined;
  }
}

function is_iterator(value: object): value is IterableIterator<unknown> {
  return (
    "next" in value &&
    typeof value.next === "function" &&
    Symbol.iterator in value
  );
}

/**
 * Classify a key function result. Returns the keys in order when the
 * result is an array or an iterator, or null for a single key.
 */
export function as_key_list(result: unknown): unknown[] | null {
  if (Array.isArray(result)) return result;
  if (typeof result === "object" && result !== null && is_iterator(result)) {
    return [...result];
  }
  return null;
}
