import { describe, expect, it } from "vitest";
import { Entity } from "../../entity/entity";
import { Handler } from "../../dispatch/handler";
import { define_system } from "../../system/system";
import type { Binding } from "../../system/bind";
import {
  ComponentAdded,
  create_key_registry,
  EventHandlerAdded,
  StateRemoved,
  SystemAdded,
} from "../events";
import { Health, Position } from "../../__tests__/fixtures";

class Collision {}

function binding_of(keys: unknown[]): Binding {
  return { event_type: Collision, priority: 3, keys: new Set(keys) };
}

describe("notifications", () => {
  const system = define_system({ name: "physics" });
  const handler = new Handler(system, () => false, "on_collision", 3, 0);

  it("EventHandlerAdded exposes its handler and binding", () => {
    const event = new EventHandlerAdded(handler, binding_of(["wall"]));
    expect(event.system).toBe(system);
    expect(event.name).toBe("on_collision");
    expect(event.priority).toBe(3);
    expect(event.event_type).toBe(Collision);
    expect([...event.keys]).toEqual(["wall"]);
    expect(event.key).toBe("wall");
  });

  it("key is undefined unless there is exactly one key", () => {
    expect(new EventHandlerAdded(handler, binding_of([])).key).toBeUndefined();
    expect(
      new EventHandlerAdded(handler, binding_of(["a", "b"])).key,
    ).toBeUndefined();
  });

  //=========================================================
  // Built-in keys
  //=========================================================

  it("built-in key functions key by class, system or event type", () => {
    const keys = create_key_registry();
    const entity = new Entity();

    const by_component = keys.resolve(ComponentAdded);
    expect(by_component?.(new ComponentAdded(entity, new Health()))).toBe(
      Health,
    );

    const by_system = keys.resolve(SystemAdded);
    expect(by_system?.(new SystemAdded(system))).toBe(system);

    const by_event_type = keys.resolve(EventHandlerAdded);
    expect(
      by_event_type?.(new EventHandlerAdded(handler, binding_of([]))),
    ).toBe(Collision);

    const by_state = keys.resolve(StateRemoved);
    expect(by_state?.(new StateRemoved(new Position()))).toBe(Position);
  });
});
