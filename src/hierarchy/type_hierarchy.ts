/***
 * TypeHierarchy — Ancestor chains and observed subclasses of runtime classes.
 *
 * JavaScript can walk a class up to its ancestors (the constructor's own
 * prototype chain) but has no way to enumerate the subclasses of a class.
 * The hierarchy therefore keeps an explicit registry: every class passed
 * to observe() links itself under each of its ancestors, and
 * subclasses() enumerates only what was observed.
 *
 * Both engines rely on it:
 *   - EntityStore indexes a component under every class in ancestors().
 *   - Dispatcher observes every event class it binds, so subclasses()
 *     reaches every already-bound subclass when a handler is added or
 *     removed.
 *
 * Ancestor chains are memoized per class and never change: a class's
 * parent is fixed once the class is defined.
 *
 ***/

import { is_type, type Type } from "./type";

export class TypeHierarchy {
  private readonly ancestor_cache: WeakMap<Type, readonly Type[]> =
    new WeakMap();
  // parent → direct subclasses that were observed, in observation order
  private readonly children: WeakMap<Type, Type[]> = new WeakMap();
  private readonly observed: WeakSet<Type> = new WeakSet();

  //=========================================================
  // Ancestors
  //=========================================================

  /**
   * The class followed by its ancestors, nearest first.
   *
   *   class Renderable {}
   *   class Sprite extends Renderable {}
   *   hierarchy.ancestors(Sprite)   // [Sprite, Renderable]
   */
  public ancestors(type: Type): readonly Type[] {
    const cached = this.ancestor_cache.get(type);
    if (cached !== undefined) return cached;

    const chain: Type[] = [type];
    let parent: unknown = Object.getPrototypeOf(type);
    while (is_type(parent) && parent !== Function.prototype) {
      chain.push(parent);
      parent = Object.getPrototypeOf(parent);
    }
    const frozen = Object.freeze(chain);
    this.ancestor_cache.set(type, frozen);
    return frozen;
  }

  public parent_of(type: Type): Type | undefined {
    const chain = this.ancestors(type);
    return chain.length > 1 ? chain[1] : undefined;
  }

  public is_subtype(type: Type, base: Type): boolean {
    return this.ancestors(type).includes(base);
  }

  //=========================================================
  // Subclasses
  //=========================================================

  /**
   * Record a class so that it shows up in subclasses() of its ancestors.
   * Observing a class observes its whole ancestor chain.
   */
  public observe(type: Type): void {
    const chain = this.ancestors(type);
    for (let i = 0; i < chain.length; i++) {
      const current = chain[i];
      if (this.observed.has(current)) return;
      this.observed.add(current);
      if (i + 1 < chain.length) {
        const parent = chain[i + 1];
        const siblings = this.children.get(parent);
        if (siblings !== undefined) {
          siblings.push(current);
        } else {
          this.children.set(parent, [current]);
        }
      }
    }
  }

  public is_observed(type: Type): boolean {
    return this.observed.has(type);
  }

  /**
   * The class itself, then every observed transitive subclass.
   *
   * The class passed in is always yielded first; the rest follow a
   * depth-first walk whose order is stable for one sequence of
   * observe() calls. A subclass is never yielded before its parent.
   */
  public *subclasses(type: Type): Generator<Type, void, undefined> {
    yield type;
    const stack = [...(this.children.get(type) ?? [])].reverse();
    while (stack.length > 0) {
      const subclass = stack.pop();
      if (subclass === undefined) break;
      yield subclass;
      const grand = this.children.get(subclass);
      if (grand !== undefined) {
        for (let i = grand.length - 1; i >= 0; i--) stack.push(grand[i]);
      }
    }
  }
}
