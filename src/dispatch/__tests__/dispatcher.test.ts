import { describe, expect, it, vi } from "vitest";
import { ECS_ERROR } from "utils/error";
import {
  create_key_registry,
  EventHandlerAdded,
  EventHandlerRemoved,
  SystemAdded,
  SystemRemoved,
} from "../../event/events";
import { bind } from "../../system/bind";
import { define_system } from "../../system/system";
import { Dispatcher } from "../dispatcher";
import { thrown_category } from "../../__tests__/fixtures";

//=========================================================
// Fixtures
//=========================================================

type Log = string[];

class Tick {}
class SubTick extends Tick {}

class Moved {
  constructor(public readonly kind: string) {}
}
class PlayerMoved extends Moved {
  constructor() {
    super("player");
  }
}

class Step {
  constructor(public readonly lane: string) {}
}
class SideStep extends Step {}
class QuickSideStep extends SideStep {}

class Collision {
  constructor(public readonly tags: string[]) {}
}

function recorder(name: string, result: unknown = undefined) {
  return (log: Log) => {
    log.push(name);
    return result;
  };
}

function make_dispatcher(): Dispatcher<Log> {
  const keys = create_key_registry();
  keys.set(Moved, (event) => event.kind);
  keys.set(Collision, (event) => event.tags);
  return new Dispatcher<Log>({ keys });
}

function make_lane_dispatcher(): Dispatcher<Log> {
  const keys = create_key_registry();
  keys.set(Step, (event) => event.lane);
  return new Dispatcher<Log>({ keys });
}

function run(dispatcher: Dispatcher<Log>, event: object): Log {
  const log: Log = [];
  dispatcher.dispatch(event, log);
  return log;
}

describe("Dispatcher", () => {
  //=========================================================
  // Ordering
  //=========================================================

  it("runs handlers by priority, highest first", () => {
    const d = make_dispatcher();
    const a = define_system<Log>({
      handlers: {
        low: bind(Tick, 1)(recorder("low")),
        high: bind(Tick, 10)(recorder("high")),
      },
    });
    const b = define_system<Log>({
      handlers: { mid: bind(Tick, 5)(recorder("mid")) },
    });
    d.register(a, b);

    expect(run(d, new Tick())).toEqual(["high", "mid", "low"]);
  });

  it("breaks ties by registration order, then declaration order", () => {
    const d = make_dispatcher();
    const a = define_system<Log>({
      handlers: {
        a1: bind(Tick, 0)(recorder("a1")),
        a2: bind(Tick, 0)(recorder("a2")),
      },
    });
    const b = define_system<Log>({
      handlers: { b1: bind(Tick, 0)(recorder("b1")) },
    });
    d.register(b, a);

    expect(run(d, new Tick())).toEqual(["b1", "a1", "a2"]);
    // a lazily bound subclass sorts the same way
    expect(run(d, new SubTick())).toEqual(["b1", "a1", "a2"]);
  });

  it("orders string priorities", () => {
    const d = make_dispatcher();
    const s = define_system<Log>({
      handlers: {
        b: bind(Tick, "b")(recorder("b")),
        c: bind(Tick, "c")(recorder("c")),
        a: bind(Tick, "a")(recorder("a")),
      },
    });
    d.register(s);
    expect(run(d, new Tick())).toEqual(["c", "b", "a"]);
  });

  //=========================================================
  // Subclass routing
  //=========================================================

  it("routes subclass events to handlers of their ancestors", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: {
          any_move: bind(Moved, 0)(recorder("any_move")),
          player_only: bind(PlayerMoved, 0)(recorder("player_only")),
        },
      }),
    );

    expect(run(d, new PlayerMoved())).toEqual(["any_move", "player_only"]);
    expect(run(d, new Moved("enemy"))).toEqual(["any_move"]);
  });

  it("reaches subclasses that were bound before the registration", () => {
    const d = make_dispatcher();
    expect(run(d, new PlayerMoved())).toEqual([]);

    d.register(
      define_system<Log>({
        handlers: { any_move: bind(Moved, 0)(recorder("any_move")) },
      }),
    );
    expect(run(d, new PlayerMoved())).toEqual(["any_move"]);
  });

  it("routes by the nearest binding of a handler", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: {
          dual: bind(PlayerMoved, 10)(bind(Moved, 0)(recorder("dual"))),
          other: bind(Moved, 5)(recorder("other")),
        },
      }),
    );

    expect(run(d, new PlayerMoved())).toEqual(["dual", "other"]);
    expect(run(d, new Moved("x"))).toEqual(["other", "dual"]);
  });

  it("builds the same lists whether a class is seen before or after registration", () => {
    const make_system = () =>
      define_system<Log>({
        handlers: {
          dual: bind(SideStep, 2, { key: "x" })(bind(Step, 1)(recorder("dual"))),
          plain: bind(Step, 0)(recorder("plain")),
        },
      });

    const early = make_lane_dispatcher();
    expect(run(early, new QuickSideStep("y"))).toEqual([]);
    early.register(make_system());

    const late = make_lane_dispatcher();
    late.register(make_system());

    for (const d of [early, late]) {
      expect(run(d, new QuickSideStep("x"))).toEqual(["dual", "plain"]);
      expect(run(d, new QuickSideStep("y"))).toEqual(["plain"]);
      expect(run(d, new SideStep("y"))).toEqual(["plain"]);
      expect(run(d, new Step("y"))).toEqual(["dual", "plain"]);
    }
  });

  it("unregister keeps the nearest bindings of the remaining systems", () => {
    const d = make_lane_dispatcher();
    const keep = define_system<Log>({
      handlers: {
        dual: bind(SideStep, 2, { key: "x" })(bind(Step, 1)(recorder("dual"))),
      },
    });
    const drop = define_system<Log>({
      handlers: { quick: bind(QuickSideStep, 5)(recorder("quick")) },
    });
    d.register(keep, drop);
    expect(run(d, new QuickSideStep("y"))).toEqual(["quick"]);

    d.unregister(drop);
    expect(run(d, new QuickSideStep("x"))).toEqual(["dual"]);
    expect(run(d, new QuickSideStep("y"))).toEqual([]);
  });

  //=========================================================
  // Keyed routing
  //=========================================================

  it("narrows keyed handlers by the event's key", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: {
          on_player: bind(Moved, 1, { key: "player" })(recorder("on_player")),
          on_enemy: bind(Moved, 1, { key: "enemy" })(recorder("on_enemy")),
          on_any: bind(Moved, 0)(recorder("on_any")),
        },
      }),
    );

    expect(run(d, new Moved("player"))).toEqual(["on_player", "on_any"]);
    expect(run(d, new Moved("enemy"))).toEqual(["on_enemy", "on_any"]);
    expect(run(d, new Moved("npc"))).toEqual(["on_any"]);
  });

  it("seeds new key lists from the unkeyed handlers already present", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: { any: bind(Moved, 0)(recorder("any")) },
      }),
      define_system<Log>({
        handlers: {
          player: bind(Moved, 5, { key: "player" })(recorder("player")),
        },
      }),
      define_system<Log>({
        handlers: { urgent: bind(Moved, 10)(recorder("urgent")) },
      }),
    );

    expect(run(d, new Moved("player"))).toEqual(["urgent", "player", "any"]);
    expect(run(d, new Moved("enemy"))).toEqual(["urgent", "any"]);
  });

  it("merges and re-sorts the lists of several keys", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: {
          wall: bind(Collision, 2, { key: "wall" })(recorder("wall")),
          floor: bind(Collision, 3, { key: "floor" })(recorder("floor")),
          any: bind(Collision, 1)(recorder("any")),
        },
      }),
    );

    expect(run(d, new Collision(["wall", "floor"]))).toEqual([
      "floor",
      "wall",
      "any",
    ]);
    expect(run(d, new Collision(["wall", "ceiling"]))).toEqual([
      "wall",
      "any",
    ]);
    expect(run(d, new Collision(["ceiling"]))).toEqual(["any"]);
    expect(run(d, new Collision([]))).toEqual(["any"]);
  });

  it("keyed subclass events inherit the parent's key function", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: {
          on_player: bind(Moved, 0, { key: "player" })(recorder("on_player")),
        },
      }),
    );
    expect(run(d, new PlayerMoved())).toEqual(["on_player"]);
  });

  //=========================================================
  // Dispatch
  //=========================================================

  it("stops at the first handler returning a truthy value", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: {
          first: bind(Tick, 2)(recorder("first", 1)),
          second: bind(Tick, 1)(recorder("second")),
        },
      }),
    );

    const log: Log = [];
    expect(d.dispatch(new Tick(), log)).toBe(true);
    expect(log).toEqual(["first"]);
  });

  it("returns false when no handler stops the dispatch", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: { only: bind(Tick, 0)(recorder("only", 0)) },
      }),
    );
    expect(d.dispatch(new Tick(), [])).toBe(false);
  });

  it("keeps iterating the list it started with", () => {
    const d = make_dispatcher();
    const late = define_system<Log>({
      handlers: { late: bind(Tick, 0)(recorder("late")) },
    });
    d.register(
      define_system<Log>({
        handlers: {
          installer: bind(Tick, 10)((log: Log) => {
            log.push("installer");
            d.update(late);
          }),
        },
      }),
    );

    expect(run(d, new Tick())).toEqual(["installer"]);
    expect(run(d, new Tick())).toEqual(["installer", "late"]);
  });

  it("passes the event to handlers", () => {
    const d = make_dispatcher();
    const seen = vi.fn();
    d.register(
      define_system<Log>({
        handlers: {
          watch: bind(Moved, 0)((_log: Log, event) => {
            seen(event.kind);
          }),
        },
      }),
    );
    d.dispatch(new PlayerMoved(), []);
    expect(seen).toHaveBeenCalledWith("player");
  });

  it("uses the attached context when none is given", () => {
    const attached: Log = [];
    const d = new Dispatcher<Log>({ context: attached });
    d.register(
      define_system<Log>({ handlers: { t: bind(Tick, 0)(recorder("t")) } }),
    );

    d.dispatch(new Tick());
    expect(attached).toEqual(["t"]);
  });

  it("throws MISSING_CONTEXT without a context", () => {
    const d = make_dispatcher();
    expect(thrown_category(() => d.dispatch(new Tick()))).toBe(
      ECS_ERROR.MISSING_CONTEXT,
    );
  });

  it("shares one handler across bindings with the same priority", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({
        handlers: {
          both: bind(Tick, 3)(bind(Collision, 3)(recorder("both"))),
          split: bind(Tick, 1)(bind(Collision, 2)(recorder("split"))),
        },
      }),
    );

    const [tick_both, tick_split] = d.handlers_for(new Tick());
    const [col_both, col_split] = d.handlers_for(new Collision([]));
    expect(tick_both).toBe(col_both);
    expect(tick_split).not.toBe(col_split);
    expect(tick_split.equals(col_split)).toBe(true);
  });

  //=========================================================
  // Registration
  //=========================================================

  it("rejects a system registered twice", () => {
    const d = make_dispatcher();
    const s = define_system<Log>({});
    d.register(s);
    expect(thrown_category(() => d.register(s))).toBe(
      ECS_ERROR.DUPLICATE_SYSTEM,
    );
    d.update(s);
    expect(d.size).toBe(1);
  });

  it("rejects keys on an event class without a key function, before any change", () => {
    const queue: object[] = [];
    const d = new Dispatcher<Log>({ event_queue: queue });
    const s = define_system<Log>({
      handlers: {
        fine: bind(Moved, 0)(recorder("fine")),
        keyed: bind(Tick, 0, { key: "x" })(recorder("keyed")),
      },
    });

    expect(thrown_category(() => d.register(s))).toBe(
      ECS_ERROR.INVALID_BINDING,
    );
    expect(d.has(s)).toBe(false);
    expect(queue).toEqual([]);
    expect(run(d, new Moved("a"))).toEqual([]);
  });

  it("rejects priorities that cannot be ordered against existing ones", () => {
    const d = make_dispatcher();
    d.register(
      define_system<Log>({ handlers: { n: bind(Tick, 1)(recorder("n")) } }),
    );
    const s = define_system<Log>({
      handlers: { s: bind(Tick, "high")(recorder("s")) },
    });

    expect(thrown_category(() => d.register(s))).toBe(
      ECS_ERROR.PRIORITY_NOT_COMPARABLE,
    );
    expect(d.has(s)).toBe(false);
    expect(run(d, new Tick())).toEqual(["n"]);
  });

  it("unregister removes handlers from the class and its subclasses", () => {
    const d = make_dispatcher();
    const s = define_system<Log>({
      handlers: {
        tick: bind(Tick, 0)(recorder("tick")),
        keyed: bind(Moved, 0, { key: "player" })(recorder("keyed")),
      },
    });
    d.register(s);
    run(d, new SubTick());

    d.unregister(s);
    expect(run(d, new Tick())).toEqual([]);
    expect(run(d, new SubTick())).toEqual([]);
    expect(run(d, new PlayerMoved())).toEqual([]);
    expect(thrown_category(() => d.unregister(s))).toBe(
      ECS_ERROR.SYSTEM_NOT_FOUND,
    );
    d.discard(s);
  });

  it("a re-registered system sorts after systems registered before it", () => {
    const d = make_dispatcher();
    const a = define_system<Log>({
      handlers: { a: bind(Tick, 0)(recorder("a")) },
    });
    const b = define_system<Log>({
      handlers: { b: bind(Tick, 0)(recorder("b")) },
    });
    d.register(a, b);
    d.unregister(a);
    d.register(a);
    expect(run(d, new Tick())).toEqual(["b", "a"]);
  });

  it("tracks registered systems in order", () => {
    const d = make_dispatcher();
    const a = define_system<Log>({});
    const b = define_system<Log>({});
    d.register(a, b);
    expect([...d]).toEqual([a, b]);
    expect(d.has(a)).toBe(true);

    d.clear();
    expect(d.size).toBe(0);
  });

  it("clear drops every system without notifications or hooks", () => {
    const queue: object[] = [];
    const on_removed = vi.fn();
    const d = new Dispatcher<Log>({ context: [], event_queue: queue });
    const s = define_system<Log>({
      on_removed,
      handlers: { t: bind(Tick, 0)(recorder("t")) },
    });
    d.register(s);
    queue.length = 0;

    d.clear();
    expect(d.has(s)).toBe(false);
    expect(queue).toEqual([]);
    expect(on_removed).not.toHaveBeenCalled();
    expect(run(d, new Tick())).toEqual([]);

    d.register(s);
    expect(run(d, new Tick())).toEqual(["t"]);
  });

  //=========================================================
  // Lifecycle & notifications
  //=========================================================

  it("calls on_added and on_removed with the attached context", () => {
    const context: Log = [];
    const on_added = vi.fn();
    const on_removed = vi.fn();
    const d = new Dispatcher<Log>({ context });
    const s = define_system<Log>({ on_added, on_removed });

    d.register(s);
    d.unregister(s);
    expect(on_added).toHaveBeenCalledWith(context);
    expect(on_removed).toHaveBeenCalledWith(context);
  });

  it("skips lifecycle hooks without a context", () => {
    const on_added = vi.fn();
    const d = new Dispatcher<Log>();
    d.register(define_system<Log>({ on_added }));
    expect(on_added).not.toHaveBeenCalled();
  });

  it("posts system and handler notifications", () => {
    const queue: object[] = [];
    const d = new Dispatcher<Log>({ event_queue: queue });
    const s = define_system<Log>({
      handlers: {
        both: bind(Collision, 1)(bind(Tick, 2)(recorder("both"))),
        tick: bind(Tick, 0)(recorder("tick")),
      },
    });

    d.register(s);
    d.unregister(s);

    const described = queue.map((event) => {
      if (event instanceof SystemAdded) return "SystemAdded";
      if (event instanceof SystemRemoved) return "SystemRemoved";
      if (event instanceof EventHandlerAdded) {
        return `+${event.name}:${event.event_type.name}`;
      }
      if (event instanceof EventHandlerRemoved) {
        return `-${event.name}:${event.event_type.name}`;
      }
      return "?";
    });
    expect(described).toEqual([
      "SystemAdded",
      "+both:Tick",
      "+both:Collision",
      "+tick:Tick",
      "-both:Tick",
      "-both:Collision",
      "-tick:Tick",
      "SystemRemoved",
    ]);
  });
});
