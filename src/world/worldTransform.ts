// src/world/worldTransform.ts
import { Builder } from "./builder.js";
import { DIRECTIONS, type Direction } from "./direction.js";
import { WorldMapInconsistentError } from "./errors.js";
import { Position, isInt32 } from "./position.js";
import { Tile } from "./tile.js";
import { WorldMap } from "./worldMap.js";

export type WorldTransformKind =
  | "ROTATE_90"
  | "ROTATE_180"
  | "ROTATE_270"
  | "FLIP_H"
  | "FLIP_V"
  | "FLIP_DIAG_NWSE"
  | "FLIP_DIAG_NESW";

export const WORLD_TRANSFORM_KINDS: ReadonlyArray<WorldTransformKind> = [
  "ROTATE_90",
  "ROTATE_180",
  "ROTATE_270",
  "FLIP_H",
  "FLIP_V",
  "FLIP_DIAG_NWSE",
  "FLIP_DIAG_NESW",
];

export function mapDirection(d: Direction, kind: WorldTransformKind): Direction {
  switch (kind) {
    case "ROTATE_90":
      // north->east->south->west->north (clockwise)
      if (d === "north") return "east";
      if (d === "east") return "south";
      if (d === "south") return "west";
      return "north";

    case "ROTATE_180":
      if (d === "north") return "south";
      if (d === "south") return "north";
      if (d === "east") return "west";
      return "east";

    case "ROTATE_270":
      if (d === "north") return "west";
      if (d === "west") return "south";
      if (d === "south") return "east";
      return "north";

    case "FLIP_H":
      if (d === "east") return "west";
      if (d === "west") return "east";
      return d;

    case "FLIP_V":
      if (d === "north") return "south";
      if (d === "south") return "north";
      return d;

    case "FLIP_DIAG_NWSE":
      // mirror across the NW-SE diagonal: north<->west, east<->south
      if (d === "north") return "west";
      if (d === "west") return "north";
      if (d === "east") return "south";
      return "east";

    case "FLIP_DIAG_NESW":
      // mirror across the NE-SW diagonal: north<->east, south<->west
      if (d === "north") return "east";
      if (d === "east") return "north";
      if (d === "south") return "west";
      return "south";
  }
}

function mapXY(x: number, y: number, kind: WorldTransformKind): { x: number; y: number } {
  switch (kind) {
    case "ROTATE_90":
      return { x: -y, y: x };
    case "ROTATE_180":
      return { x: -x, y: -y };
    case "ROTATE_270":
      return { x: y, y: -x };
    case "FLIP_H":
      return { x: -x, y };
    case "FLIP_V":
      return { x, y: -y };
    case "FLIP_DIAG_NWSE":
      return { x: y, y: x };
    case "FLIP_DIAG_NESW":
      return { x: -y, y: -x };
  }
}

/**
 * Maps a coordinate about the origin, consistently with mapDirection under
 * north = y-1. Returns null if the result leaves the 32-bit grid (only
 * -2^31 has no negation).
 */
export function mapPosition(p: Position, kind: WorldTransformKind): Position | null {
  const m = mapXY(p.x, p.y, kind);
  // Negating 0 gives -0; keep map keys and output at "0".
  const x = m.x === 0 ? 0 : m.x;
  const y = m.y === 0 ? 0 : m.y;
  if (!isInt32(x) || !isInt32(y)) return null;
  return new Position(x, y);
}

/**
 * Returns a transformed copy of the world. Blocks and inventory are shared
 * (blocks are immutable); tiles and the builder are new. The builder keeps
 * standing on the image of its current tile.
 *
 * @throws WorldMapInconsistentError if a coordinate has no image on the grid.
 */
export function transformWorldMap(world: WorldMap, kind: WorldTransformKind): WorldMap {
  const source = world.getTiles();
  const copies = new Map<Tile, Tile>();
  for (const t of source) copies.set(t, new Tile(t.getBlocks()));

  for (const t of source) {
    const copy = copies.get(t);
    if (!copy) throw new Error("Internal error: tile copy missing");
    for (const direction of DIRECTIONS) {
      const target = t.getExits().get(direction);
      if (!target) continue;
      const targetCopy = copies.get(target);
      if (!targetCopy) throw new Error("Internal error: exit leads off the map");
      copy.addExit(mapDirection(direction, kind), targetCopy);
    }
  }

  for (const t of source) {
    const at = world.getPosition(t);
    if (at && !mapPosition(at, kind)) {
      throw new WorldMapInconsistentError(`${kind} moves ${at} off the 32-bit grid`);
    }
  }

  const start = mapPosition(world.getStartPosition(), kind);
  if (!start) throw new Error("Internal error: start position checked above");

  const builder = world.getBuilder();
  const startingCopy = copies.get(world.getStartingTile());
  if (!startingCopy) throw new Error("Internal error: starting tile copy missing");
  const standing = copies.get(builder.getCurrentTile()) ?? startingCopy;

  return new WorldMap(startingCopy, start, new Builder(builder.getName(), standing, builder.getInventory()));
}
