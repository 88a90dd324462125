/***
 * Entity — An identity plus an open set of typed components.
 *
 * An entity maps each component's exact runtime class to the component,
 * at most one component per class, in insertion order. Any object with a
 * class is a valid component; components are compared by value equality
 * (see utils/equality) and never need to be hashable.
 *
 * Entities do nothing on their own. They are created standalone or by a
 * store's create(), and belong to at most one store at a time. The
 * back-reference to that store is a WeakRef: the entity never keeps its
 * store alive, and removal from the store clears the reference without
 * destroying the entity, which the caller may keep and add elsewhere.
 *
 * While owned, every component mutation is reported to the owner so the
 * owner's type index and notifications stay in step with the entity.
 *
 * Usage:
 *
 *   const e = new Entity([new Position(0, 0), new Velocity(1, 2)]);
 *   e.add(new Health(10));
 *   e.get(Position);       // Position | undefined
 *   e.find(Renderable);    // exact class, else first subclass instance
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { values_equal } from "utils/equality";
import { type_name, type_of, type Type } from "../hierarchy/type";
import { create_entity_id, type EntityID } from "./entity_id";

/** What an entity reports component changes to while it is owned. */
export interface EntityOwner {
  _component_added(entity: Entity, component: object): void;
  _component_removed(entity: Entity, component: object): void;
}

export class Entity implements Iterable<object> {
  public readonly id: EntityID;
  private readonly components: Map<Type, object> = new Map();
  private owner_ref: WeakRef<EntityOwner> | null = null;

  constructor(components: Iterable<object> = []) {
    this.id = create_entity_id();
    for (const component of components) {
      const type = type_of(component);
      const existing = this.components.get(type);
      if (existing !== undefined && values_equal(existing, component)) continue;
      this.components.set(type, component);
    }
  }

  //=========================================================
  // Ownership
  //=========================================================

  /** The store currently holding this entity, if it is still alive. */
  public get owner(): EntityOwner | undefined {
    return this.owner_ref?.deref();
  }

  /** Called by the owning store when the entity is added. */
  public _attach(owner: EntityOwner): void {
    this.owner_ref = new WeakRef(owner);
  }

  /** Called by the owning store when the entity is removed. */
  public _detach(): void {
    this.owner_ref = null;
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Add components. A component whose class is already present throws
   * DUPLICATE_COMPONENT; components before it in the call stay added.
   */
  public add(...components: object[]): void {
    for (const component of components) {
      const type = type_of(component);
      if (this.components.has(type)) {
        throw new ECSError(
          ECS_ERROR.DUPLICATE_COMPONENT,
          `entity already has a component of type ${type_name(type)}`,
          { entity: this.id, type: type_name(type) },
        );
      }
      this.components.set(type, component);
      this.owner?._component_added(this, component);
    }
  }

  /**
   * Add or replace components. A same-class component that is equal to
   * the new one is kept and nothing is reported; otherwise the old one is
   * removed right before the new one is added.
   */
  public update(...components: object[]): void {
    for (const component of components) {
      const type = type_of(component);
      const existing = this.components.get(type);
      if (existing !== undefined) {
        if (values_equal(existing, component)) continue;
        this.components.delete(type);
        this.owner?._component_removed(this, existing);
      }
      this.components.set(type, component);
      this.owner?._component_added(this, component);
    }
  }

  /**
   * Remove components. Each one must match (be equal to) the component
   * stored under its class, else COMPONENT_NOT_FOUND is thrown and the
   * rest of the call is skipped.
   */
  public remove(...components: object[]): void {
    for (const component of components) {
      if (!this.remove_one(component)) {
        const type = type_of(component);
        throw new ECSError(
          ECS_ERROR.COMPONENT_NOT_FOUND,
          `entity has no matching component of type ${type_name(type)}`,
          { entity: this.id, type: type_name(type) },
        );
      }
    }
  }

  /** Same as remove(), skipping components that are not present. */
  public discard(...components: object[]): void {
    for (const component of components) {
      this.remove_one(component);
    }
  }

  /** Remove and return the component of exactly this class. */
  public pop<T extends object>(type: Type<T>): T {
    const component = this.require(type);
    this.components.delete(type);
    this.owner?._component_removed(this, component);
    return component;
  }

  public clear(): void {
    for (const component of [...this.components.values()]) {
      this.remove(component);
    }
  }

  //=========================================================
  // Lookup
  //=========================================================

  /** The component of exactly this class. */
  public get<T>(type: Type<T>): T | undefined {
    const component = this.components.get(type);
    return component instanceof type ? component : undefined;
  }

  public require<T>(type: Type<T>): T {
    const component = this.get(type);
    if (component === undefined) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_FOUND,
        `entity has no component of type ${type_name(type)}`,
        { entity: this.id, type: type_name(type) },
      );
    }
    return component;
  }

  /**
   * The component of exactly this class, else the first component (in
   * insertion order) that is an instance of a subclass of it.
   */
  public find<T>(type: Type<T>): T | undefined {
    const exact = this.get(type);
    if (exact !== undefined) return exact;
    for (const component of this.components.values()) {
      if (component instanceof type) return component;
    }
    return undefined;
  }

  public has(type: Type): boolean {
    return this.components.has(type);
  }

  /** Exact classes of the components, in insertion order. */
  public types(): Type[] {
    return [...this.components.keys()];
  }

  public get size(): number {
    return this.components.size;
  }

  public [Symbol.iterator](): Iterator<object> {
    return this.components.values();
  }

  /** Value equality: same classes holding equal components. */
  public equals(other: Entity): boolean {
    if (this === other) return true;
    if (this.components.size !== other.components.size) return false;
    for (const [type, component] of this.components) {
      const theirs = other.components.get(type);
      if (theirs === undefined || !values_equal(component, theirs)) {
        return false;
      }
    }
    return true;
  }

  //=========================================================
  // Internal
  //=========================================================

  private remove_one(component: object): boolean {
    const type = type_of(component);
    const existing = this.components.get(type);
    if (existing === undefined || !values_equal(existing, component)) {
      return false;
    }
    this.components.delete(type);
    this.owner?._component_removed(this, existing);
    return true;
  }
}
