import { is_ecs_error, type ECS_ERROR } from "utils/error";
import { Marker } from "../tag/tag_registry";

//=========================================================
// Components
//=========================================================

export class Position {
  constructor(
    public x = 0,
    public y = 0,
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Position && other.x === this.x && other.y === this.y;
  }
}

export class Velocity {
  constructor(
    public dx = 0,
    public dy = 0,
  ) {}
}

export class Health {
  constructor(public current = 10) {}
}

export abstract class Shape {}
export class Circle extends Shape {
  constructor(public radius = 1) {
    super();
  }
}
export class Square extends Shape {
  constructor(public side = 1) {
    super();
  }
}

//=========================================================
// Tags
//=========================================================

export class Team {
  constructor(public readonly name: string) {}

  equals(other: unknown): boolean {
    return other instanceof Team && other.name === this.name;
  }
}

export class Frozen extends Marker {}
export class Hidden extends Marker {}

//=========================================================
// Errors
//=========================================================

/** The ECSError category `fn` throws, or undefined when it returns. */
export function thrown_category(fn: () => unknown): ECS_ERROR | undefined {
  try {
    fn();
  } catch (e) {
    if (is_ecs_error(e)) return e.category;
    throw e;
  }
  return undefined;
}
