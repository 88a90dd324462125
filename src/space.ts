/***
 * Space — Public facade over one program's data, behavior and events.
 *
 * A Space bundles an EntityStore (entities), a StateStore (states), a
 * Dispatcher (systems) and a FIFO event queue they all post to. The
 * Space is the dispatcher's context: every handler receives it, and
 * reaches the rest of the program through it.
 *
 * Stores and a dispatcher built elsewhere can be handed in; the Space
 * points their event_queue at its own queue and attaches itself as the
 * dispatcher's context.
 *
 * Events enter the queue through post() (and as notifications from the
 * stores and the dispatcher) and leave it through pump(), which pops and
 * dispatches them in order. process() dispatches immediately.
 *
 * Usage:
 *
 *   const space = new Space();
 *   space.systems.register(physics, rendering);
 *   space.entities.create(new Position(0, 0), new Velocity(1, 2));
 *
 *   // game loop
 *   space.post(new Tick(1 / 60));
 *   space.pump();
 *
 ***/

import { Dispatcher } from "./dispatch/dispatcher";
import type { EventKeyRegistry } from "./event/event_key_registry";
import { create_key_registry } from "./event/events";
import { TypeHierarchy } from "./hierarchy/type_hierarchy";
import type { Type } from "./hierarchy/type";
import type { QueryOptions, QueryResult } from "./query/query";
import { StateStore } from "./state/state_store";
import { EntityStore } from "./store/entity_store";
import type { TagRegistry } from "./tag/tag_registry";

export interface SpaceOptions {
  /** Initial queue contents; the array is used as-is. */
  event_queue?: object[];
  /**
   * Key functions for a new dispatcher; built-in notification keys by
   * default. Ignored when `systems` is given.
   */
  keys?: EventKeyRegistry;
  /** Tag classes for a new entity store. Ignored when `entities` is given. */
  tags?: TagRegistry;
  systems?: Dispatcher<Space>;
  entities?: EntityStore;
  states?: StateStore;
}

export class Space {
  public readonly event_queue: object[];
  public readonly hierarchy: TypeHierarchy;
  public readonly entities: EntityStore;
  public readonly states: StateStore;
  public readonly systems: Dispatcher<Space>;

  constructor(options: SpaceOptions = {}) {
    const event_queue = options.event_queue ?? [];
    this.event_queue = event_queue;
    this.hierarchy =
      options.systems?.hierarchy ??
      options.keys?.hierarchy ??
      new TypeHierarchy();

    this.systems =
      options.systems ??
      new Dispatcher<Space>({
        keys: options.keys ?? create_key_registry(this.hierarchy),
      });
    this.systems.context = this;
    this.systems.event_queue = event_queue;

    this.entities =
      options.entities ??
      new EntityStore({ hierarchy: this.hierarchy, tags: options.tags });
    this.entities.event_queue = event_queue;

    this.states = options.states ?? new StateStore();
    this.states.event_queue = event_queue;
  }

  /** Append an event to the queue. */
  public post(event: object): void {
    this.event_queue.push(event);
  }

  /**
   * Dispatch an event now. Returns true when a handler stopped the
   * dispatch.
   */
  public process(event: object): boolean {
    return this.systems.dispatch(event, this);
  }

  /**
   * Pop and dispatch queued events, oldest first, until the queue is
   * empty or `limit` events were processed. Events posted while pumping
   * are processed in the same call. Safe to call from a handler.
   * Returns the number of events processed.
   */
  public pump(limit: number = Infinity): number {
    let processed = 0;
    while (processed < limit) {
      const event = this.event_queue.shift();
      if (event === undefined) break;
      this.process(event);
      processed++;
    }
    return processed;
  }

  /** Shorthand for entities.query(). */
  public query<T extends readonly Type[]>(...types: T): QueryResult<T> {
    return this.entities.query(...types);
  }

  /** Shorthand for entities.query_by(). */
  public query_by<T extends readonly Type[]>(
    options: QueryOptions,
    ...types: T
  ): QueryResult<T> {
    return this.entities.query_by(options, ...types);
  }
}
