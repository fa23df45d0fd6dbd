import { describe, expect, it } from "vitest";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { WorldMapInconsistentError } from "../src/world/errors.js";
import { Position } from "../src/world/position.js";
import { decodeWorldMap, encodeWorldMap } from "../src/world/worldMapCodec.js";
import type { WorldMap } from "../src/world/worldMap.js";
import {
  WORLD_TRANSFORM_KINDS,
  type WorldTransformKind,
  mapDirection,
  mapPosition,
  transformWorldMap,
} from "../src/world/worldTransform.js";
import { vec } from "../src/world/direction.js";

const FIXTURES = ["loop.world", "single.world", "corridor.world"];

async function load(name: string): Promise<WorldMap> {
  return decodeWorldMap(await readFile(path.resolve(process.cwd(), "fixtures", "world", name), "utf8"));
}

function apply(world: WorldMap, ...kinds: WorldTransformKind[]): string {
  return encodeWorldMap(kinds.reduce(transformWorldMap, world));
}

describe("world transforms", () => {
  it("map directions the same way they map positions", () => {
    for (const kind of WORLD_TRANSFORM_KINDS) {
      for (const d of ["north", "east", "south", "west"] as const) {
        const { dx, dy } = vec(d);
        const moved = mapPosition(new Position(dx, dy), kind);
        expect(moved && { dx: moved.x, dy: moved.y }, `${kind} ${d}`).toEqual(vec(mapDirection(d, kind)));
      }
    }
  });

  it("rotate the loop a quarter turn clockwise about the origin", async () => {
    const rotated = transformWorldMap(await load("loop.world"), "ROTATE_90");
    expect(rotated.getStartPosition().toString()).toBe("(2, 3)");
    expect(rotated.getStartingTile().getExits().get("east")?.getBlocks().length).toBe(0);
    expect(rotated.getTile(new Position(3, 3))?.height()).toBe(0);
  });

  it("obey the group laws", async () => {
    for (const f of FIXTURES) {
      const w = await load(f);
      const id = encodeWorldMap(w);

      expect(apply(w, "ROTATE_90", "ROTATE_90", "ROTATE_90", "ROTATE_90"), f).toBe(id);
      expect(apply(w, "ROTATE_90", "ROTATE_270"), f).toBe(id);
      expect(apply(w, "FLIP_H", "FLIP_H"), f).toBe(id);
      expect(apply(w, "FLIP_V", "FLIP_V"), f).toBe(id);
      expect(apply(w, "FLIP_DIAG_NWSE", "FLIP_DIAG_NWSE"), f).toBe(id);
      expect(apply(w, "FLIP_DIAG_NESW", "FLIP_DIAG_NESW"), f).toBe(id);

      expect(apply(w, "ROTATE_90", "ROTATE_90"), f).toBe(apply(w, "ROTATE_180"));
      expect(apply(w, "FLIP_H", "FLIP_V"), f).toBe(apply(w, "ROTATE_180"));
      expect(apply(w, "FLIP_DIAG_NWSE", "FLIP_DIAG_NESW"), f).toBe(apply(w, "ROTATE_180"));
    }
  });

  it("leave the source world untouched", async () => {
    const w = await load("loop.world");
    const before = encodeWorldMap(w);
    transformWorldMap(w, "FLIP_DIAG_NESW");
    expect(encodeWorldMap(w)).toBe(before);
  });

  it("refuse a map whose image leaves the 32-bit grid", () => {
    const w = decodeWorldMap("-2147483648\n0\nEdge\n\n\ntotal:1\n0\n\nexits\n0\n");
    expect(() => transformWorldMap(w, "ROTATE_180")).toThrow(WorldMapInconsistentError);
    expect(encodeWorldMap(transformWorldMap(w, "FLIP_V"))).toBe(
      "-2147483648\n0\nEdge\n\n\ntotal:1\n0 \n\nexits\n0 \n",
    );
  });
});
