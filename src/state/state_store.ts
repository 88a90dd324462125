/***
 * StateStore — One value per class, for data that is not per-entity.
 *
 * States are keyed by their exact runtime class, like components of a
 * single global entity: a clock, a configuration object, the current
 * level. Adding and removing states posts StateAdded / StateRemoved to
 * the event sink, when one is attached.
 *
 * Usage:
 *
 *   space.states.add(new Clock());
 *   space.states.require(Clock).elapsed += dt;
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { values_equal } from "utils/equality";
import { type_name, type_of, type Type } from "../hierarchy/type";
import type { EventSink } from "../event/event_sink";
import { StateAdded, StateRemoved } from "../event/events";

export interface StateStoreOptions {
  event_queue?: EventSink | null;
}

export class StateStore implements Iterable<object> {
  public event_queue: EventSink | null;
  private readonly states: Map<Type, object> = new Map();

  constructor(options: StateStoreOptions = {}) {
    this.event_queue = options.event_queue ?? null;
  }

  /**
   * Add states. A state whose class is already present throws
   * DUPLICATE_STATE; states before it in the call stay added.
   */
  public add(...states: object[]): void {
    for (const state of states) {
      const type = type_of(state);
      if (this.states.has(type)) {
        throw new ECSError(
          ECS_ERROR.DUPLICATE_STATE,
          `a state of type ${type_name(type)} is already present`,
          { type: type_name(type) },
        );
      }
      this.states.set(type, state);
      this.event_queue?.push(new StateAdded(state));
    }
  }

  /**
   * Add or replace states. An equal state of the same class is kept
   * without notifications; otherwise the old one is removed first.
   */
  public update(...states: object[]): void {
    for (const state of states) {
      const type = type_of(state);
      const existing = this.states.get(type);
      if (existing !== undefined) {
        if (values_equal(existing, state)) continue;
        this.event_queue?.push(new StateRemoved(existing));
      }
      this.states.set(type, state);
      this.event_queue?.push(new StateAdded(state));
    }
  }

  /**
   * Remove states. Each must be equal to the state stored under its
   * class, else STATE_NOT_FOUND is thrown and the rest are skipped.
   */
  public remove(...states: object[]): void {
    for (const state of states) {
      if (!this.remove_one(state)) {
        const type = type_of(state);
        throw new ECSError(
          ECS_ERROR.STATE_NOT_FOUND,
          `no matching state of type ${type_name(type)}`,
          { type: type_name(type) },
        );
      }
    }
  }

  /** Same as remove(), skipping states that are not present. */
  public discard(...states: object[]): void {
    for (const state of states) this.remove_one(state);
  }

  /** Remove and return the state of exactly this class. */
  public pop<T extends object>(type: Type<T>): T {
    const state = this.require(type);
    this.remove_one(state);
    return state;
  }

  public get<T>(type: Type<T>): T | undefined {
    const state = this.states.get(type);
    return state instanceof type ? state : undefined;
  }

  public require<T>(type: Type<T>): T {
    const state = this.get(type);
    if (state === undefined) {
      throw new ECSError(
        ECS_ERROR.STATE_NOT_FOUND,
        `no state of type ${type_name(type)}`,
        { type: type_name(type) },
      );
    }
    return state;
  }

  public has(type: Type): boolean {
    return this.states.has(type);
  }

  public types(): Type[] {
    return [...this.states.keys()];
  }

  public get size(): number {
    return this.states.size;
  }

  public [Symbol.iterator](): Iterator<object> {
    return this.states.values();
  }

  public clear(): void {
    for (const state of [...this.states.values()]) this.remove_one(state);
  }

  private remove_one(state: object): boolean {
    const type = type_of(state);
    const existing = this.states.get(type);
    if (existing === undefined || !values_equal(existing, state)) return false;
    this.states.delete(type);
    this.event_queue?.push(new StateRemoved(existing));
    return true;
  }
}
