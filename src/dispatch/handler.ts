/***
 * Handler — One routed callback of one registered system.
 *
 * A Handler is what the dispatcher keeps in its sorted lists. Its
 * identity is (system, name): two Handler objects with the same system
 * and name are the same handler, which is how lists merged from several
 * ancestor classes are de-duplicated.
 *
 * `order` is the handler's declaration index within its system and
 * breaks ties between handlers of one system with equal priority.
 *
 ***/

import type { SystemDescriptor } from "../system/system";
import type { Priority } from "./priority";

/** A callback with its event type erased, as the dispatcher calls it. */
export type HandlerFn<Ctx> = (context: Ctx, event: object) => unknown;

export class Handler<Ctx = unknown> {
  constructor(
    public readonly system: SystemDescriptor<Ctx>,
    public readonly callback: HandlerFn<Ctx>,
    public readonly name: string,
    public readonly priority: Priority,
    public readonly order: number,
  ) {
    Object.freeze(this);
  }

  public equals(other: Handler<Ctx>): boolean {
    return (
      this === other ||
      (this.system === other.system && this.name === other.name)
    );
  }

  public invoke(context: Ctx, event: object): unknown {
    return this.callback(context, event);
  }
}

/** Handlers in first-seen order, dropping later equal ones. */
export function unique_handlers<Ctx>(
  handlers: Iterable<Handler<Ctx>>,
): Handler<Ctx>[] {
  const seen: Map<SystemDescriptor<Ctx>, Set<string>> = new Map();
  const result: Handler<Ctx>[] = [];
  for (const handler of handlers) {
    let names = seen.get(handler.system);
    if (names === undefined) {
      names = new Set();
      seen.set(handler.system, names);
    }
    if (names.has(handler.name)) continue;
    names.add(handler.name);
    result.push(handler);
  }
  return result;
}
