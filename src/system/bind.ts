/***
 * Bind — Declaring which events a handler receives.
 *
 * bind(event_type, priority, options) returns a decorator-style function
 * that wraps a callback into a BoundHandler: the callback plus the list
 * of Bindings it was declared with. Binding again wraps the existing
 * BoundHandler, so one callback can listen to several event classes,
 * each with its own priority and keys.
 *
 * A Binding only describes intent. Nothing is routed until the system
 * holding the handler is registered with a Dispatcher, which also checks
 * that keyed bindings target an event class with a key function.
 *
 * Usage:
 *
 *   const on_move = bind(PlayerMoved, 10, { key: "player" })(
 *     (space: Space, event) => {
 *       event.entity.require(Position).x += event.dx;
 *     },
 *   );
 *
 *   const on_any = bind(Moved, 0)(bind(Teleported, 5)(log_motion));
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { is_type, type_name, type Type } from "../hierarchy/type";
import { is_valid_priority, type Priority } from "../dispatch/priority";

/** A routing key. Compared with SameValueZero, as Map keys are. */
export type EventKey = unknown;

export interface Binding {
  readonly event_type: Type;
  readonly priority: Priority;
  /** Empty for an unkeyed binding. */
  readonly keys: ReadonlySet<EventKey>;
}

export interface BindOptions {
  /** A single key. */
  readonly key?: EventKey;
  /** Several keys; the handler receives events matching any of them. */
  readonly keys?: Iterable<EventKey>;
}

export type HandlerCallback<Ctx, E> = (context: Ctx, event: E) => unknown;

export class BoundHandler<Ctx, E> {
  constructor(
    public readonly callback: HandlerCallback<Ctx, E>,
    public readonly bindings: readonly Binding[],
  ) {
    Object.freeze(this);
  }
}

/**
 * Wrap a callback (or an already bound one) with one more Binding.
 *
 * Throws INVALID_BINDING for a non-class event type, an invalid
 * priority, `key` and `keys` given together, or a second binding of
 * the same handler to the same event class.
 */
export function bind<E>(
  event_type: Type<E>,
  priority: Priority,
  options: BindOptions = {},
) {
  if (!is_type(event_type)) {
    throw new ECSError(ECS_ERROR.INVALID_BINDING, "event type must be a class");
  }
  if (!is_valid_priority(priority)) {
    throw new ECSError(
      ECS_ERROR.INVALID_BINDING,
      `invalid priority for ${type_name(event_type)}`,
      { priority },
    );
  }
  if ("key" in options && options.keys !== undefined) {
    throw new ECSError(
      ECS_ERROR.INVALID_BINDING,
      "pass either key or keys, not both",
      { event_type: type_name(event_type) },
    );
  }

  const keys: ReadonlySet<EventKey> =
    "key" in options ? new Set([options.key]) : new Set(options.keys ?? []);
  const binding: Binding = Object.freeze({ event_type, priority, keys });

  return <Ctx = unknown, H = E>(
    target: HandlerCallback<Ctx, H> | BoundHandler<Ctx, H>,
  ): BoundHandler<Ctx, H> => {
    if (target instanceof BoundHandler) {
      if (target.bindings.some((b) => b.event_type === event_type)) {
        throw new ECSError(
          ECS_ERROR.INVALID_BINDING,
          `handler is already bound to ${type_name(event_type)}`,
          { event_type: type_name(event_type) },
        );
      }
      return new BoundHandler(target.callback, [...target.bindings, binding]);
    }
    return new BoundHandler(target, [binding]);
  };
}
