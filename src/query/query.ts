/***
 * Query — Self-describing multi-type entity queries.
 *
 * A Query is an immutable (types, merge) pair. Running it against an
 * EntityStore produces a QueryResult: a point-in-time snapshot of the
 * matching entities together with the Query that produced it, so a
 * result can be re-run or narrowed further. Later store mutations never
 * change a result that was already produced.
 *
 * Usage:
 *
 *   for (const [pos, vel] of store.query(Position, Velocity).zip()) {
 *     pos.x += vel.dx;
 *   }
 *
 *   const any_shape = new Query([Circle, Square], MERGE.union);
 *   store.run(any_shape).size;
 *
 * A Query may also select by tag value (see TagRegistry). The id sets
 * of the tags come first in the merge, then those of the types:
 *
 *   store.run(new Query([Position], { tag: new Team("red") }));
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { values_equal } from "utils/equality";
import type { Entity } from "../entity/entity";
import type { EntityID } from "../entity/entity_id";
import {
  type_name,
  type_of,
  type InstancesOf,
  type Type,
} from "../hierarchy/type";
import { MERGE, type MergeFn } from "./merge";

//=========================================================
// Query
//=========================================================

export interface QueryOptions {
  merge?: MergeFn;
  /** A single tag; cannot be combined with `tags`. */
  tag?: object;
  tags?: Iterable<object>;
}

export class Query<T extends readonly Type[] = readonly Type[]> {
  public readonly types: T;
  public readonly tags: readonly object[];
  public readonly merge: MergeFn;

  /**
   * Throws INVALID_QUERY when both `tag` and `tags` are given, and
   * EMPTY_QUERY when there is neither a type nor a tag.
   */
  constructor(types: T, options: MergeFn | QueryOptions = {}) {
    const selection: QueryOptions =
      typeof options === "function" ? { merge: options } : options;
    if (selection.tag !== undefined && selection.tags !== undefined) {
      throw new ECSError(
        ECS_ERROR.INVALID_QUERY,
        "pass either tag or tags, not both",
      );
    }
    const tags =
      selection.tag !== undefined
        ? [selection.tag]
        : [...(selection.tags ?? [])];
    if (types.length === 0 && tags.length === 0) {
      throw new ECSError(
        ECS_ERROR.EMPTY_QUERY,
        "expected at least one component type or tag",
      );
    }
    this.types = types;
    this.tags = Object.freeze(tags);
    this.merge = selection.merge ?? MERGE.intersection;
    Object.freeze(this);
  }

  public static of<T extends readonly Type[]>(...types: T): Query<T> {
    return new Query(types);
  }

  public get length(): number {
    return this.types.length;
  }

  public includes(type: Type): boolean {
    return this.types.includes(type);
  }

  public equals(other: Query): boolean {
    if (this === other) return true;
    if (this.merge !== other.merge) return false;
    if (this.types.length !== other.types.length) return false;
    for (let i = 0; i < this.types.length; i++) {
      if (this.types[i] !== other.types[i]) return false;
    }
    if (this.tags.length !== other.tags.length) return false;
    for (let i = 0; i < this.tags.length; i++) {
      if (!values_equal(this.tags[i], other.tags[i])) return false;
    }
    return true;
  }

  public toString(): string {
    const parts = this.types.map(type_name);
    if (this.tags.length > 0) {
      const tags = this.tags.map((tag) => type_name(type_of(tag)));
      parts.push(`tags=[${tags.join(", ")}]`);
    }
    parts.push(`merge=${this.merge.name || "<anonymous>"}`);
    return `Query(${parts.join(", ")})`;
  }
}

//=========================================================
// QueryResult
//=========================================================

export class QueryResult<T extends readonly Type[] = readonly Type[]>
  implements Iterable<Entity>
{
  constructor(
    private readonly entries: ReadonlyMap<EntityID, Entity>,
    public readonly query: Query<T>,
  ) {}

  /** The requested component types, in call order. */
  public get types(): T {
    return this.query.types;
  }

  /** The requested tags, in call order. */
  public get tags(): readonly object[] {
    return this.query.tags;
  }

  public get merge(): MergeFn {
    return this.query.merge;
  }

  public get ids(): EntityID[] {
    return [...this.entries.keys()];
  }

  public get entities(): Entity[] {
    return [...this.entries.values()];
  }

  public get size(): number {
    return this.entries.size;
  }

  public has(id: EntityID): boolean {
    return this.entries.has(id);
  }

  public get(id: EntityID): Entity | undefined {
    return this.entries.get(id);
  }

  public [Symbol.iterator](): Iterator<Entity> {
    return this.entries.values();
  }

  /** The component of `type` (or of a subclass of it) from each entity. */
  public *components<C>(type: Type<C>): Generator<C, void, undefined> {
    for (const entity of this.entries.values()) {
      yield find_component(entity, type);
    }
  }

  /**
   * One tuple of components per entity, in the order of the given types
   * (the query's own types when none are given). An entity missing one of
   * them throws COMPONENT_NOT_FOUND when it is reached.
   *
   *   for (const [sprite, pos] of store.query(Sprite, Position).zip()) {
   *     draw(sprite, pos);
   *   }
   */
  public zip(): Generator<InstancesOf<T>, void, undefined>;
  public zip<U extends readonly Type[]>(
    ...types: U
  ): Generator<InstancesOf<U>, void, undefined>;
  public *zip(
    ...types: readonly Type[]
  ): Generator<readonly unknown[], void, undefined> {
    const wanted = types.length > 0 ? types : this.query.types;
    for (const entity of this.entries.values()) {
      yield wanted.map((type) => find_component(entity, type));
    }
  }

  /**
   * Same as zip(), pairing each tuple with its entity.
   *
   *   for (const [entity, [lifetime]] of store.query(Lifetime).zip_entity()) {
   *     if (lifetime.timer < 0) space.post(new Expired(entity));
   *   }
   */
  public zip_entity(): Generator<
    readonly [Entity, InstancesOf<T>],
    void,
    undefined
  >;
  public zip_entity<U extends readonly Type[]>(
    ...types: U
  ): Generator<readonly [Entity, InstancesOf<U>], void, undefined>;
  public *zip_entity(
    ...types: readonly Type[]
  ): Generator<readonly [Entity, readonly unknown[]], void, undefined> {
    const wanted = types.length > 0 ? types : this.query.types;
    for (const entity of this.entries.values()) {
      yield [entity, wanted.map((type) => find_component(entity, type))];
    }
  }
}

function find_component<C>(entity: Entity, type: Type<C>): C {
  const component = entity.find(type);
  if (component === undefined) {
    throw new ECSError(
      ECS_ERROR.COMPONENT_NOT_FOUND,
      `entity has no component of type ${type_name(type)}`,
      { entity: entity.id, type: type_name(type) },
    );
  }
  return component;
}
