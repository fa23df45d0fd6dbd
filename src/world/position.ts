// src/world/position.ts
import { type Direction, vec } from "./direction.js";

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;

export function isInt32(v: number): boolean {
  return Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX;
}

/** An immutable grid coordinate. Both components are signed 32-bit integers. */
export class Position {
  public constructor(
    public readonly x: number,
    public readonly y: number,
  ) {
    if (!isInt32(x) || !isInt32(y)) {
      throw new RangeError(`Position out of int32 range: (${x}, ${y})`);
    }
  }

  public equals(other: Position): boolean {
    return this.x === other.x && this.y === other.y;
  }

  /** Stable map key; two positions share a key iff they are equal. */
  public key(): string {
    return `${this.x},${this.y}`;
  }

  /** The neighbouring position, or null if it would leave the int32 grid. */
  public shift(direction: Direction): Position | null {
    const { dx, dy } = vec(direction);
    const x = this.x + dx;
    const y = this.y + dy;
    if (!isInt32(x) || !isInt32(y)) return null;
    return new Position(x, y);
  }

  public toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}
