/***
 * Events — Notifications posted by the engines.
 *
 * The stores and the dispatcher append these to their event sink when
 * their contents change. They are ordinary event classes: a system can
 * bind to them like any other event once the owner of the sink
 * dispatches them (see Space.pump).
 *
 * Keyed notifications carry a key function installed by
 * register_builtin_keys(), so handlers can narrow them:
 *
 *   bind(ComponentAdded, 0, { key: Health })(on_health_added);
 *   bind(EventHandlerAdded, 0, { key: Collision })(on_collision_handler);
 *
 ***/

import type { Entity } from "../entity/entity";
import { type_of, type Type } from "../hierarchy/type";
import { TypeHierarchy } from "../hierarchy/type_hierarchy";
import type { Handler, HandlerFn } from "../dispatch/handler";
import type { Priority } from "../dispatch/priority";
import type { Binding, EventKey } from "../system/bind";
import type { SystemDescriptor } from "../system/system";
import { EventKeyRegistry } from "./event_key_registry";

//=========================================================
// Entities
//=========================================================

export class EntityAdded {
  constructor(public readonly entity: Entity) {}
}

export class EntityRemoved {
  constructor(public readonly entity: Entity) {}
}

/** Key: the component's class. */
export class ComponentAdded<T extends object = object> {
  constructor(
    public readonly entity: Entity,
    public readonly component: T,
  ) {}
}

/** Key: the component's class. */
export class ComponentRemoved<T extends object = object> {
  constructor(
    public readonly entity: Entity,
    public readonly component: T,
  ) {}
}

//=========================================================
// Systems
//=========================================================

/** Key: the system descriptor. */
export class SystemAdded<Ctx = unknown> {
  constructor(public readonly system: SystemDescriptor<Ctx>) {}
}

/** Key: the system descriptor. */
export class SystemRemoved<Ctx = unknown> {
  constructor(public readonly system: SystemDescriptor<Ctx>) {}
}

abstract class HandlerChange<Ctx> {
  constructor(
    public readonly handler: Handler<Ctx>,
    public readonly binding: Binding,
  ) {}

  public get event_type(): Type {
    return this.binding.event_type;
  }

  public get keys(): ReadonlySet<EventKey> {
    return this.binding.keys;
  }

  public get system(): SystemDescriptor<Ctx> {
    return this.handler.system;
  }

  public get callback(): HandlerFn<Ctx> {
    return this.handler.callback;
  }

  public get name(): string {
    return this.handler.name;
  }

  public get priority(): Priority {
    return this.binding.priority;
  }

  /** The binding's only key; undefined when it has none or several. */
  public get key(): EventKey {
    if (this.binding.keys.size !== 1) return undefined;
    const [only] = this.binding.keys;
    return only;
  }
}

/** Key: the bound event class. */
export class EventHandlerAdded<Ctx = unknown> extends HandlerChange<Ctx> {}

/** Key: the bound event class. */
export class EventHandlerRemoved<Ctx = unknown> extends HandlerChange<Ctx> {}

//=========================================================
// States
//=========================================================

/** Key: the state's class. */
export class StateAdded<T extends object = object> {
  constructor(public readonly state: T) {}
}

/** Key: the state's class. */
export class StateRemoved<T extends object = object> {
  constructor(public readonly state: T) {}
}

//=========================================================
// Key functions
//=========================================================

export function register_builtin_keys(registry: EventKeyRegistry): void {
  registry.set(ComponentAdded, (event) => type_of(event.component));
  registry.set(ComponentRemoved, (event) => type_of(event.component));
  registry.set(SystemAdded, (event) => event.system);
  registry.set(SystemRemoved, (event) => event.system);
  registry.set(EventHandlerAdded, (event) => event.event_type);
  registry.set(EventHandlerRemoved, (event) => event.event_type);
  registry.set(StateAdded, (event) => type_of(event.state));
  registry.set(StateRemoved, (event) => type_of(event.state));
}

/** A registry holding the key functions of the notifications above. */
export function create_key_registry(
  hierarchy: TypeHierarchy = new TypeHierarchy(),
): EventKeyRegistry {
  const registry = new EventKeyRegistry(hierarchy);
  register_builtin_keys(registry);
  return registry;
}
