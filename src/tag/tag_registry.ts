/***
 * TagRegistry — Component classes whose instances act as tags.
 *
 * A tag is a component that the EntityStore indexes by value as well as
 * by class, so entities can be selected by "holds a component equal to
 * this one" (a team, a layer, a leader id) in queries.
 *
 * A class is registered at most once and never unregistered. The
 * registry is passed to an EntityStore explicitly; nothing is global.
 * Only the exact class is a tag type: subclasses of a tag class must be
 * registered on their own.
 *
 * Tag values compare with `equals` when they have it, by identity
 * otherwise. Marker gives a class whose instances are all equal, for
 * tags that carry no data.
 *
 * Usage:
 *
 *   class Team {
 *     constructor(public readonly name: string) {}
 *     equals(other: unknown) {
 *       return other instanceof Team && other.name === this.name;
 *     }
 *   }
 *   class Frozen extends Marker {}
 *
 *   const tags = new TagRegistry().add(Team).add(Frozen);
 *   const store = new EntityStore({ tags });
 *   store.create(new Team("red"), new Frozen());
 *   store.tagged(new Team("red"));
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { type_name, type_of, type Type } from "../hierarchy/type";

export class TagRegistry {
  private readonly types: WeakSet<Type> = new WeakSet();

  /** Register a tag class. Returns the registry, for chaining. */
  public add(...types: Type[]): this {
    for (const type of types) {
      if (this.types.has(type)) {
        throw new ECSError(
          ECS_ERROR.DUPLICATE_TAG_TYPE,
          `${type_name(type)} is already a tag type`,
          { type: type_name(type) },
        );
      }
      this.types.add(type);
    }
    return this;
  }

  public has(type: Type): boolean {
    return this.types.has(type);
  }

  /** Whether a component's own class is a tag type. */
  public is_tag(component: object): boolean {
    return this.types.has(type_of(component));
  }
}

/** Base for data-less tags: all instances of one class are equal. */
export abstract class Marker {
  public equals(other: unknown): boolean {
    return (
      typeof other === "object" &&
      other !== null &&
      other.constructor === this.constructor
    );
  }
}
