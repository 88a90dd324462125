/***
 * EntityStore — Owns entities and indexes them by component class.
 *
 * Entities are kept by id in insertion order. Next to them the store
 * keeps a type index: for every class T, the ids of the entities holding
 * a component of class T or of any subclass of T. A component is indexed
 * under every class in its ancestor chain, so a query for a base class
 * finds entities holding any derived component.
 *
 * Removing a component only drops the entity from an ancestor's id set
 * when no other component of that entity still derives from the same
 * ancestor. Id sets that become empty are dropped, so a class is a key
 * of the index iff at least one entity holds a component of it.
 *
 * The store keeps the index in step with entity mutations: an owned
 * entity reports every component change back to its store.
 *
 * With a TagRegistry, components of a tag class are also indexed by
 * value, for tagged() and tag queries. Register tag classes before
 * their components reach the store.
 *
 * When an event sink is attached, every change is posted to it:
 *
 *   add       → EntityAdded, then ComponentAdded per component
 *   remove    → ComponentRemoved per component, then EntityRemoved
 *   mutation  → ComponentAdded / ComponentRemoved
 *
 * Usage:
 *
 *   const store = new EntityStore({ event_queue: queue });
 *   const e = store.create(new Position(0, 0), new Velocity(1, 2));
 *
 *   for (const [pos, vel] of store.query(Position, Velocity).zip()) {
 *     pos.x += vel.dx;
 *   }
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { bucket_add, bucket_delete } from "utils/arrays";
import { Entity, type EntityOwner } from "../entity/entity";
import type { EntityID } from "../entity/entity_id";
import { type_of, type Type } from "../hierarchy/type";
import { TypeHierarchy } from "../hierarchy/type_hierarchy";
import type { EventSink } from "../event/event_sink";
import {
  ComponentAdded,
  ComponentRemoved,
  EntityAdded,
  EntityRemoved,
} from "../event/events";
import { Query, QueryResult, type QueryOptions } from "../query/query";
import { TagIndex } from "../tag/tag_index";
import { TagRegistry } from "../tag/tag_registry";

export interface EntityStoreOptions {
  /** Receives entity and component notifications. */
  event_queue?: EventSink | null;
  hierarchy?: TypeHierarchy;
  /** Tag classes indexed by value; none by default. */
  tags?: TagRegistry;
}

const NO_IDS: ReadonlySet<EntityID> = new Set();

export class EntityStore implements EntityOwner, Iterable<Entity> {
  public event_queue: EventSink | null;
  public readonly hierarchy: TypeHierarchy;
  public readonly tags: TagRegistry;

  private readonly entities: Map<EntityID, Entity> = new Map();
  private readonly index: Map<Type, Set<EntityID>> = new Map();
  private readonly tag_index = new TagIndex();

  constructor(options: EntityStoreOptions = {}) {
    this.event_queue = options.event_queue ?? null;
    this.hierarchy = options.hierarchy ?? new TypeHierarchy();
    this.tags = options.tags ?? new TagRegistry();
  }

  //=========================================================
  // Entity lifecycle
  //=========================================================

  /**
   * Track entities. Entities already in this store are skipped. An
   * entity owned by another live store throws ENTITY_ALREADY_OWNED;
   * entities before it in the call stay added.
   */
  public add(...entities: Entity[]): void {
    for (const entity of entities) {
      if (this.entities.get(entity.id) === entity) continue;
      const owner = entity.owner;
      if (owner !== undefined && owner !== this) {
        throw new ECSError(
          ECS_ERROR.ENTITY_ALREADY_OWNED,
          `entity ${entity.id} belongs to another store`,
          { entity: entity.id },
        );
      }

      this.entities.set(entity.id, entity);
      entity._attach(this);
      for (const component of entity) this.index_component(entity, component);

      this.event_queue?.push(
        new EntityAdded(entity),
        ...[...entity].map((c) => new ComponentAdded(entity, c)),
      );
    }
  }

  /** Create an entity holding the given components and add it. */
  public create(...components: object[]): Entity {
    const entity = new Entity(components);
    this.add(entity);
    return entity;
  }

  /**
   * Stop tracking entities. An entity not in this store throws
   * ENTITY_NOT_FOUND; entities before it in the call stay removed.
   */
  public remove(...entities: Entity[]): void {
    for (const entity of entities) {
      if (!this.has(entity)) {
        throw new ECSError(
          ECS_ERROR.ENTITY_NOT_FOUND,
          `entity ${entity.id} is not in this store`,
          { entity: entity.id },
        );
      }
      this.remove_one(entity);
    }
  }

  /** Same as remove(), skipping entities that are not in this store. */
  public discard(...entities: Entity[]): void {
    for (const entity of entities) {
      if (this.has(entity)) this.remove_one(entity);
    }
  }

  /** Remove the entity with this id and return it. */
  public pop(id: EntityID): Entity {
    const entity = this.entities.get(id);
    if (entity === undefined) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_FOUND,
        `no entity with id ${id}`,
        { entity: id },
      );
    }
    this.remove_one(entity);
    return entity;
  }

  /** Remove every entity, in insertion order, with notifications. */
  public clear(): void {
    for (const entity of [...this.entities.values()]) {
      this.remove_one(entity);
    }
  }

  //=========================================================
  // Queries
  //=========================================================

  /**
   * Entities holding a component of every given class (or a subclass).
   * At least one class is required (EMPTY_QUERY).
   */
  public query<T extends readonly Type[]>(...types: T): QueryResult<T> {
    return this.run(new Query(types));
  }

  /**
   * query() with tags or a merge function:
   *
   *   store.query_by({ tag: new Team("red") }, Position);
   *   store.query_by({ merge: MERGE.union }, Circle, Square);
   */
  public query_by<T extends readonly Type[]>(
    options: QueryOptions,
    ...types: T
  ): QueryResult<T> {
    return this.run(new Query(types, options));
  }

  /** Run a Query, using its own merge function. */
  public run<T extends readonly Type[]>(query: Query<T>): QueryResult<T> {
    const sets = [
      ...query.tags.map((tag) => this.tag_index.get(tag) ?? NO_IDS),
      ...query.types.map((type) => this.index.get(type) ?? NO_IDS),
    ];
    const matched: Map<EntityID, Entity> = new Map();
    for (const id of query.merge(...sets)) {
      const entity = this.entities.get(id);
      if (entity !== undefined) matched.set(id, entity);
    }
    return new QueryResult(matched, query);
  }

  //=========================================================
  // Lookup
  //=========================================================

  public get(id: EntityID): Entity | undefined {
    return this.entities.get(id);
  }

  public has(entity_or_id: Entity | EntityID): boolean {
    if (entity_or_id instanceof Entity) {
      return this.entities.get(entity_or_id.id) === entity_or_id;
    }
    return this.entities.has(entity_or_id);
  }

  /** Entities holding a component of this class or a subclass of it. */
  public entities_with(type: Type): Entity[] {
    const result: Entity[] = [];
    for (const id of this.index.get(type) ?? NO_IDS) {
      const entity = this.entities.get(id);
      if (entity !== undefined) result.push(entity);
    }
    return result;
  }

  /** Entities holding a tag component equal to `tag`. */
  public tagged(tag: object): Entity[] {
    const result: Entity[] = [];
    for (const id of this.tag_index.get(tag) ?? NO_IDS) {
      const entity = this.entities.get(id);
      if (entity !== undefined) result.push(entity);
    }
    return result;
  }

  public tagged_ids(tag: object): EntityID[] {
    return [...(this.tag_index.get(tag) ?? NO_IDS)];
  }

  /** One component of this class (or a subclass) per entity holding one. */
  public *components_of<T>(type: Type<T>): Generator<T, void, undefined> {
    for (const entity of this.entities_with(type)) {
      const component = entity.find(type);
      if (component !== undefined) yield component;
    }
  }

  /** All entity ids, or the ids of entities holding `type`. */
  public ids(type?: Type): EntityID[] {
    if (type === undefined) return [...this.entities.keys()];
    return [...(this.index.get(type) ?? NO_IDS)];
  }

  /** Every class currently indexed, ancestors included. */
  public component_types(): Type[] {
    return [...this.index.keys()];
  }

  public get size(): number {
    return this.entities.size;
  }

  public [Symbol.iterator](): Iterator<Entity> {
    return this.entities.values();
  }

  //=========================================================
  // EntityOwner
  //=========================================================

  public _component_added(entity: Entity, component: object): void {
    if (!this.has(entity)) return;
    this.index_component(entity, component);
    this.event_queue?.push(new ComponentAdded(entity, component));
  }

  public _component_removed(entity: Entity, component: object): void {
    if (!this.has(entity)) return;
    this.unindex_component(entity, component);
    this.event_queue?.push(new ComponentRemoved(entity, component));
  }

  //=========================================================
  // Internal
  //=========================================================

  private remove_one(entity: Entity): void {
    this.entities.delete(entity.id);
    entity._detach();
    const components = [...entity];
    for (const component of components) {
      for (const type of this.hierarchy.ancestors(type_of(component))) {
        bucket_delete(this.index, type, entity.id);
      }
      if (this.tags.is_tag(component)) {
        this.tag_index.delete(component, entity.id);
      }
    }
    this.event_queue?.push(
      ...components.map((c) => new ComponentRemoved(entity, c)),
      new EntityRemoved(entity),
    );
  }

  private index_component(entity: Entity, component: object): void {
    for (const type of this.hierarchy.ancestors(type_of(component))) {
      bucket_add(this.index, type, entity.id);
    }
    if (this.tags.is_tag(component)) this.tag_index.add(component, entity.id);
  }

  /**
   * Called after the component has left the entity: an ancestor keeps
   * the id while another remaining component still derives from it.
   */
  private unindex_component(entity: Entity, removed: object): void {
    const still_held: Set<Type> = new Set();
    for (const type of entity.types()) {
      for (const ancestor of this.hierarchy.ancestors(type)) {
        still_held.add(ancestor);
      }
    }
    for (const type of this.hierarchy.ancestors(type_of(removed))) {
      if (!still_held.has(type)) bucket_delete(this.index, type, entity.id);
    }
    if (this.tags.is_tag(removed)) this.tag_index.delete(removed, entity.id);
  }
}
