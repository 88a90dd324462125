/***
 * Type — Runtime classes used as map keys.
 *
 * Components, states and events are identified by their exact runtime
 * class. A Type<T> is any constructor function whose prototype yields T,
 * which admits abstract classes as well as concrete ones and lets
 * `value instanceof type` narrow to T.
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";

export type Type<T = unknown> = Function & { readonly prototype: T };

/** Instance types of a tuple of Types, position by position. */
export type InstancesOf<T extends readonly Type[]> = {
  readonly [K in keyof T]: T[K] extends Type<infer I> ? I : never;
};

export function is_type(value: unknown): value is Type {
  return (
    typeof value === "function" &&
    typeof value.prototype === "object" &&
    value.prototype !== null
  );
}

/**
 * The runtime class of an object. Objects created without a prototype
 * carry no class and are rejected.
 */
export function type_of(value: object): Type {
  const ctor: unknown = value.constructor;
  if (!is_type(ctor) || !(value instanceof ctor)) {
    throw new ECSError(
      ECS_ERROR.UNTYPED_VALUE,
      "value has no runtime class",
      { value },
    );
  }
  return ctor;
}

export function type_name(type: Type): string {
  return type.name || "<anonymous>";
}
