/***
 * Dispatcher — Routes events to the handlers of registered systems.
 *
 * Systems declare handlers with bind(); registering a system inserts its
 * handlers into per-event-class lists kept sorted by:
 *
 *   1. priority, highest first
 *   2. the system registered earlier
 *   3. the handler declared earlier within its system
 *
 * Routing is polymorphic. A handler bound to a class also receives every
 * subclass instance. A handler bound to both a class and one of its
 * subclasses is routed by the nearest binding. The list for a class is
 * built from the registered systems the first time the class is seen
 * (lazy binding), and from then on every registration reaches it through
 * TypeHierarchy.subclasses(). The lists are derived data: building one
 * early or late gives the same list.
 *
 * Routing is also keyed. When the event class has a key function (see
 * EventKeyRegistry), each cache entry holds a list per key next to the
 * unkeyed list. A key list holds the handlers bound to that key plus
 * every unkeyed handler, so one lookup yields the full ordered list:
 *
 *   no key function      → unkeyed list
 *   one key              → that key's list, else the unkeyed list
 *   several keys         → union of the matching key lists (re-sorted),
 *                          else the unkeyed list
 *
 * Handlers run synchronously in list order. The first one that returns
 * a truthy value stops the dispatch. Handlers may register, unregister
 * or dispatch while running; the running dispatch keeps iterating the
 * list it started with.
 *
 * Usage:
 *
 *   const movement = define_system<Space>({
 *     handlers: {
 *       step: bind(Tick, 10)((space, tick) => { ... }),
 *       land: bind(Moved, 0, { key: "player" })((space, moved) => { ... }),
 *     },
 *   });
 *
 *   const dispatcher = new Dispatcher<Space>({ context: space });
 *   dispatcher.register(movement);
 *   dispatcher.dispatch(new Tick(1 / 60));
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { insort, remove_where } from "utils/arrays";
import { unsafe_cast } from "type_primitives";
import { type_name, type_of, type Type } from "../hierarchy/type";
import { TypeHierarchy } from "../hierarchy/type_hierarchy";
import type { EventSink } from "../event/event_sink";
import {
  as_key_list,
  type EventKeyRegistry,
} from "../event/event_key_registry";
import {
  create_key_registry,
  EventHandlerAdded,
  EventHandlerRemoved,
  SystemAdded,
  SystemRemoved,
} from "../event/events";
import type { Binding, EventKey } from "../system/bind";
import type { SystemDescriptor } from "../system/system";
import { Handler, unique_handlers, type HandlerFn } from "./handler";
import { compare_priority, type Priority } from "./priority";

export interface DispatcherOptions<Ctx> {
  /** Passed to every handler and lifecycle hook. */
  context?: Ctx;
  /** Receives SystemAdded/Removed and EventHandlerAdded/Removed. */
  event_queue?: EventSink | null;
  /** Key functions; defaults to one holding the built-in notification keys. */
  keys?: EventKeyRegistry;
  hierarchy?: TypeHierarchy;
}

interface HandlerCache<Ctx> {
  unkeyed: Handler<Ctx>[];
  keyed: Map<EventKey, Handler<Ctx>[]>;
}

interface Route<Ctx> {
  readonly binding: Binding;
  readonly handler: Handler<Ctx>;
}

interface Registration<Ctx> {
  readonly sequence: number;
  readonly routes: readonly Route<Ctx>[];
}

export class Dispatcher<Ctx = unknown>
  implements Iterable<SystemDescriptor<Ctx>>
{
  public event_queue: EventSink | null;
  public readonly keys: EventKeyRegistry;
  public readonly hierarchy: TypeHierarchy;

  private attached: Ctx | undefined;
  private readonly cache: Map<Type, HandlerCache<Ctx>> = new Map();
  private readonly registrations: Map<
    SystemDescriptor<Ctx>,
    Registration<Ctx>
  > = new Map();
  private next_sequence = 0;

  constructor(options: DispatcherOptions<Ctx> = {}) {
    this.attached = options.context;
    this.event_queue = options.event_queue ?? null;
    this.hierarchy =
      options.hierarchy ?? options.keys?.hierarchy ?? new TypeHierarchy();
    this.keys = options.keys ?? create_key_registry(this.hierarchy);
  }

  //=========================================================
  // Context
  //=========================================================

  /** The context handed to handlers when dispatch() is given none. */
  public get context(): Ctx | undefined {
    return this.attached;
  }

  public set context(context: Ctx | undefined) {
    this.attached = context;
  }

  //=========================================================
  // Registration
  //=========================================================

  /**
   * Register systems, in order. Throws DUPLICATE_SYSTEM for a system that
   * is already registered and INVALID_BINDING for a keyed binding to an
   * event class without a key function; systems earlier in the call stay
   * registered.
   */
  public register(...systems: SystemDescriptor<Ctx>[]): void {
    for (const system of systems) {
      this.register_one(system);
    }
  }

  /**
   * Unregister systems, in order. Throws SYSTEM_NOT_FOUND for a system
   * that is not registered; systems earlier in the call stay unregistered.
   */
  public unregister(...systems: SystemDescriptor<Ctx>[]): void {
    for (const system of systems) {
      const registration = this.registrations.get(system);
      if (registration === undefined) {
        throw new ECSError(
          ECS_ERROR.SYSTEM_NOT_FOUND,
          `system ${system.name} is not registered`,
          { system: system.name },
        );
      }
      this.unregister_one(system, registration);
    }
  }

  /** register(), skipping systems that are already registered. */
  public update(...systems: SystemDescriptor<Ctx>[]): void {
    for (const system of systems) {
      if (!this.registrations.has(system)) this.register_one(system);
    }
  }

  /** unregister(), skipping systems that are not registered. */
  public discard(...systems: SystemDescriptor<Ctx>[]): void {
    for (const system of systems) {
      const registration = this.registrations.get(system);
      if (registration !== undefined) {
        this.unregister_one(system, registration);
      }
    }
  }

  public has(system: SystemDescriptor<Ctx>): boolean {
    return this.registrations.has(system);
  }

  public get size(): number {
    return this.registrations.size;
  }

  /** Registered systems, in registration order. */
  public [Symbol.iterator](): Iterator<SystemDescriptor<Ctx>> {
    return this.registrations.keys();
  }

  /**
   * Drop every system and every cached list at once. Unlike unregister(),
   * posts no notifications and runs no on_removed hooks.
   */
  public clear(): void {
    this.registrations.clear();
    this.cache.clear();
  }

  //=========================================================
  // Dispatch
  //=========================================================

  /**
   * Run the handlers for an event. Returns true when a handler stopped
   * the dispatch by returning a truthy value.
   *
   * Throws MISSING_CONTEXT when neither `context` nor an attached
   * context is available.
   */
  public dispatch(event: object, context?: Ctx): boolean {
    const ctx = context !== undefined ? context : this.attached;
    if (ctx === undefined) {
      throw new ECSError(
        ECS_ERROR.MISSING_CONTEXT,
        "dispatch needs a context: pass one or attach one to the dispatcher",
        { event: type_name(type_of(event)) },
      );
    }
    const handlers = [...this.handlers_for(event)];
    for (const handler of handlers) {
      if (handler.invoke(ctx, event)) return true;
    }
    return false;
  }

  /** The handlers an event would be dispatched to, in call order. */
  public handlers_for(event: object): readonly Handler<Ctx>[] {
    const type = type_of(event);
    const entry = this.lazy_bind(type);
    const key_fn = this.keys.resolve(type);
    if (key_fn === undefined) return entry.unkeyed;

    const result = key_fn(event);
    const keys = as_key_list(result);
    if (keys === null) return entry.keyed.get(result) ?? entry.unkeyed;

    const matched: Handler<Ctx>[][] = [];
    for (const key of new Set(keys)) {
      const list = entry.keyed.get(key);
      if (list !== undefined) matched.push(list);
    }
    if (matched.length === 0) return entry.unkeyed;
    if (matched.length === 1) return matched[0];
    return unique_handlers(matched.flat()).sort(this.compare_handlers);
  }

  //=========================================================
  // Internal: ordering
  //=========================================================

  private readonly compare_handlers = (
    a: Handler<Ctx>,
    b: Handler<Ctx>,
  ): number => {
    const by_priority = compare_priority(b.priority, a.priority);
    if (by_priority !== 0) return by_priority;
    const by_system =
      this.sequence_of(a.system) - this.sequence_of(b.system);
    if (by_system !== 0) return by_system;
    return a.order - b.order;
  };

  private sequence_of(system: SystemDescriptor<Ctx>): number {
    return this.registrations.get(system)?.sequence ?? this.next_sequence;
  }

  //=========================================================
  // Internal: cache
  //=========================================================

  /**
   * The cache entry of a class, built on first sight from the registered
   * systems: each handler joins through the binding nearest to the class
   * in its ancestor chain, as register() would have inserted it.
   */
  private lazy_bind(type: Type): HandlerCache<Ctx> {
    const cached = this.cache.get(type);
    if (cached !== undefined) return cached;

    const entry: HandlerCache<Ctx> = { unkeyed: [], keyed: new Map() };
    const chain = this.hierarchy.ancestors(type);
    // registration order, then declaration order: the order insort expects
    for (const { routes } of this.registrations.values()) {
      for (const { binding, handler } of nearest_routes(routes, chain)) {
        this.insert(entry, handler, binding.keys);
      }
    }

    this.cache.set(type, entry);
    this.hierarchy.observe(type);
    return entry;
  }

  /** Bound classes reached by a binding: the class and its bound subclasses. */
  private *bound_targets(type: Type): Generator<Type, void, undefined> {
    for (const subclass of this.hierarchy.subclasses(type)) {
      if (this.cache.has(subclass)) yield subclass;
    }
  }

  //=========================================================
  // Internal: register / unregister
  //=========================================================

  private register_one(system: SystemDescriptor<Ctx>): void {
    if (this.registrations.has(system)) {
      throw new ECSError(
        ECS_ERROR.DUPLICATE_SYSTEM,
        `system ${system.name} is already registered`,
        { system: system.name },
      );
    }

    const declared = Object.entries(system.handlers);
    for (const [name, bound] of declared) {
      for (const binding of bound.bindings) {
        if (binding.keys.size > 0 && !this.keys.exists(binding.event_type)) {
          throw new ECSError(
            ECS_ERROR.INVALID_BINDING,
            `${system.name}.${name}: ${type_name(binding.event_type)} has no key function`,
            { system: system.name, handler: name },
          );
        }
      }
    }

    // Bind every directly bound class while this system is not yet
    // registered; lazy_bind() would otherwise pick up its handlers and
    // the insertion below would add them a second time.
    for (const [, bound] of declared) {
      for (const binding of bound.bindings) {
        this.lazy_bind(binding.event_type);
      }
    }

    const plan = declared.map(([name, bound], order) => ({
      name,
      order,
      // routing guarantees each event is an instance of a bound class
      callback: unsafe_cast<HandlerFn<Ctx>>(bound.callback),
      bindings: bound.bindings,
    }));
    this.check_comparable(plan.flatMap((p) => p.bindings));

    const sequence = this.next_sequence++;
    const routes: Route<Ctx>[] = [];
    this.registrations.set(system, { sequence, routes });

    for (const { name, order, callback, bindings } of plan) {
      const shared: Handler<Ctx>[] = [];
      const handler_for = (priority: Priority): Handler<Ctx> => {
        const existing = shared.find((h) => Object.is(h.priority, priority));
        if (existing !== undefined) return existing;
        const handler = new Handler(system, callback, name, priority, order);
        shared.push(handler);
        return handler;
      };

      for (const binding of bindings) {
        routes.push({ binding, handler: handler_for(binding.priority) });
      }

      for (const [target, binding] of this.nearest_bindings(bindings)) {
        const entry = this.lazy_bind(target);
        this.insert(entry, handler_for(binding.priority), binding.keys);
      }
    }

    this.event_queue?.push(
      new SystemAdded(system),
      ...routes.map((r) => new EventHandlerAdded(r.handler, r.binding)),
    );
    if (this.attached !== undefined) system.on_added?.(this.attached);
  }

  private unregister_one(
    system: SystemDescriptor<Ctx>,
    registration: Registration<Ctx>,
  ): void {
    const is_mine = (h: Handler<Ctx>) => h.system === system;
    for (const { binding } of registration.routes) {
      for (const target of [...this.bound_targets(binding.event_type)]) {
        const entry = this.lazy_bind(target);
        remove_where(entry.unkeyed, is_mine);
        for (const [key, list] of [...entry.keyed]) {
          remove_where(list, is_mine);
          if (list.length === 0) entry.keyed.delete(key);
        }
        if (entry.unkeyed.length === 0 && entry.keyed.size === 0) {
          this.cache.delete(target);
        }
      }
    }
    this.registrations.delete(system);

    this.event_queue?.push(
      ...registration.routes.map(
        (r) => new EventHandlerRemoved(r.handler, r.binding),
      ),
      new SystemRemoved(system),
    );
    if (this.attached !== undefined) system.on_removed?.(this.attached);
  }

  /**
   * For each bound class reached by one handler's bindings, the binding
   * nearest to it in its ancestor chain.
   */
  private nearest_bindings(bindings: readonly Binding[]): Map<Type, Binding> {
    const result: Map<Type, Binding> = new Map();
    for (const binding of bindings) {
      for (const target of this.bound_targets(binding.event_type)) {
        const current = result.get(target);
        if (current === undefined) {
          result.set(target, binding);
          continue;
        }
        const chain = this.hierarchy.ancestors(target);
        const distance = chain.indexOf(binding.event_type);
        if (distance < chain.indexOf(current.event_type)) {
          result.set(target, binding);
        }
      }
    }
    return result;
  }

  private insert(
    entry: HandlerCache<Ctx>,
    handler: Handler<Ctx>,
    keys: ReadonlySet<EventKey>,
  ): void {
    if (keys.size === 0) {
      insort(entry.unkeyed, handler, by_priority);
      for (const list of entry.keyed.values()) {
        insort(list, handler, by_priority);
      }
      return;
    }
    for (const key of keys) {
      let list = entry.keyed.get(key);
      if (list === undefined) {
        list = [...entry.unkeyed];
        entry.keyed.set(key, list);
      }
      insort(list, handler, by_priority);
    }
  }

  /**
   * Fail before any insertion when a new priority cannot be ordered
   * against the priorities it will share a list with.
   */
  private check_comparable(bindings: readonly Binding[]): void {
    const seen: Map<Type, Priority[]> = new Map();
    for (const binding of bindings) {
      for (const target of this.bound_targets(binding.event_type)) {
        let priorities = seen.get(target);
        if (priorities === undefined) {
          const entry = this.lazy_bind(target);
          priorities = [
            ...entry.unkeyed,
            ...[...entry.keyed.values()].flat(),
          ].map((h) => h.priority);
          seen.set(target, priorities);
        }
        for (const other of priorities) {
          compare_priority(binding.priority, other);
        }
        priorities.push(binding.priority);
      }
    }
  }
}

/**
 * Per handler name, the route whose bound class is nearest in `chain`.
 * Routes bound outside the chain are skipped.
 */
function nearest_routes<Ctx>(
  routes: readonly Route<Ctx>[],
  chain: readonly Type[],
): Route<Ctx>[] {
  const nearest: Map<string, { route: Route<Ctx>; distance: number }> =
    new Map();
  for (const route of routes) {
    const distance = chain.indexOf(route.binding.event_type);
    if (distance < 0) continue;
    const current = nearest.get(route.handler.name);
    if (current === undefined || distance < current.distance) {
      nearest.set(route.handler.name, { route, distance });
    }
  }
  return [...nearest.values()].map((n) => n.route);
}

/** Insert order: priority only, highest first; ties go after. */
function by_priority<Ctx>(a: Handler<Ctx>, b: Handler<Ctx>): number {
  return compare_priority(b.priority, a.priority);
}
