/***
 * System — A named group of event handlers.
 *
 * A system is a plain frozen descriptor, not a class instance. Its
 * handlers are BoundHandlers keyed by name: the name identifies the
 * handler within the system, and the property order of `handlers` is the
 * declaration order used to break ties between equal priorities.
 *
 * define_system() assigns a unique SystemID and returns the descriptor,
 * which is the identity handle passed to Dispatcher.register/unregister.
 *
 * Lifecycle:
 *   on_added(ctx)    — called after the dispatcher registers the system
 *   on_removed(ctx)  — called after the dispatcher unregisters it
 *
 * Both hooks only run when the dispatcher has a context attached.
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { BoundHandler } from "./bind";

export type SystemID = Brand<number, "system_id">;

export const as_system_id = (value: number) =>
  validate_and_cast<number, SystemID>(
    value,
    is_non_negative_integer,
    "SystemID must be a non-negative integer",
  );

export type SystemHandlers<Ctx> = Readonly<
  Record<string, BoundHandler<Ctx, never>>
>;

export interface SystemConfig<Ctx = unknown> {
  name?: string;
  handlers?: SystemHandlers<Ctx>;
  on_added?: (ctx: Ctx) => void;
  on_removed?: (ctx: Ctx) => void;
}

export interface SystemDescriptor<Ctx = unknown>
  extends Readonly<SystemConfig<Ctx>> {
  readonly id: SystemID;
  readonly name: string;
  readonly handlers: SystemHandlers<Ctx>;
}

let next_system_id = 0;

export function define_system<Ctx = unknown>(
  config: SystemConfig<Ctx>,
): SystemDescriptor<Ctx> {
  const id = as_system_id(next_system_id++);
  return Object.freeze({
    ...config,
    id,
    name: config.name ?? `system_${id}`,
    handlers: Object.freeze({ ...config.handlers }),
  });
}
