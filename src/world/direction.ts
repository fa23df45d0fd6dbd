// src/world/direction.ts

export type Direction = "north" | "east" | "south" | "west";

// Canonical visiting order for traversal, serialization and rendering.
export const DIRECTIONS: ReadonlyArray<Direction> = ["north", "east", "south", "west"];

export type DirectionVec = Readonly<{ dx: number; dy: number }>;

export function isDirection(value: string): value is Direction {
  return value === "north" || value === "east" || value === "south" || value === "west";
}

// Screen coordinates: y grows towards the south.
export function vec(direction: Direction): DirectionVec {
  switch (direction) {
    case "north":
      return { dx: 0, dy: -1 };
    case "east":
      return { dx: 1, dy: 0 };
    case "south":
      return { dx: 0, dy: 1 };
    case "west":
      return { dx: -1, dy: 0 };
  }
}
