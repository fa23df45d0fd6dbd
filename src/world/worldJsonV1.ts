// src/world/worldJsonV1.ts
import { type BlockKind, createBlock, isBlockKind } from "./blocks.js";
import { Builder } from "./builder.js";
import { DIRECTIONS, type Direction, isDirection } from "./direction.js";
import {
  InvalidBlockError,
  TooHighError,
  WorldMapFormatError,
  WorldMapInconsistentError,
} from "./errors.js";
import { Position, isInt32 } from "./position.js";
import { Tile } from "./tile.js";
import { WorldMap } from "./worldMap.js";

export const WORLD_JSON_SCHEMA = "blockworld.world.json.v1";

export type TileJsonV1 = {
  id: number; // breadth-first index; tile 0 is the starting tile
  x: number;
  y: number;
  blocks: BlockKind[]; // bottom to top
  exits: Partial<Record<Direction, number>>;
};

export type WorldJsonV1 = {
  schema: typeof WORLD_JSON_SCHEMA;
  start: { x: number; y: number };
  builder: {
    name: string;
    inventory: BlockKind[];
  };
  tiles: TileJsonV1[];
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function invalid(what: string): WorldMapFormatError {
  return new WorldMapFormatError(`Invalid ${what}`);
}

function parseInt32Field(v: unknown, name: string): number {
  if (typeof v !== "number" || !isInt32(v)) throw invalid(`${name}: expected 32-bit integer`);
  return v;
}

function parseBlockKinds(v: unknown, name: string): BlockKind[] {
  if (!Array.isArray(v)) throw invalid(`${name}: expected array`);
  const out: BlockKind[] = [];
  for (let i = 0; i < v.length; i++) {
    const k: unknown = v[i];
    if (typeof k !== "string" || !isBlockKind(k)) throw invalid(`${name}[${i}]: unknown block type`);
    out.push(k);
  }
  return out;
}

export function parseWorldJsonV1(input: unknown): WorldJsonV1 {
  if (!isRecord(input)) throw invalid("JSON: expected object");
  if (input.schema !== WORLD_JSON_SCHEMA) throw invalid("schema");

  if (!isRecord(input.start)) throw invalid("start: expected object");
  const start = {
    x: parseInt32Field(input.start.x, "start.x"),
    y: parseInt32Field(input.start.y, "start.y"),
  };

  if (!isRecord(input.builder)) throw invalid("builder: expected object");
  const name = input.builder.name;
  if (typeof name !== "string" || /[\r\n]/.test(name)) {
    throw invalid("builder.name: expected single-line string");
  }
  const inventory = parseBlockKinds(input.builder.inventory, "builder.inventory");

  if (!Array.isArray(input.tiles) || input.tiles.length === 0) {
    throw invalid("tiles: expected non-empty array");
  }
  const count = input.tiles.length;
  const tiles: TileJsonV1[] = [];

  for (let i = 0; i < count; i++) {
    const t: unknown = input.tiles[i];
    if (!isRecord(t)) throw invalid(`tiles[${i}]: expected object`);
    if (t.id !== i) throw invalid(`tiles[${i}].id: expected ${i}`);

    if (!isRecord(t.exits)) throw invalid(`tiles[${i}].exits: expected object`);
    const exits: Partial<Record<Direction, number>> = {};
    for (const [label, target] of Object.entries(t.exits)) {
      if (!isDirection(label)) throw invalid(`tiles[${i}].exits.${label}: unknown direction`);
      if (typeof target !== "number" || !Number.isInteger(target) || target < 0 || target >= count) {
        throw invalid(`tiles[${i}].exits.${label}: expected tile id in [0, ${count})`);
      }
      exits[label] = target;
    }

    tiles.push({
      id: i,
      x: parseInt32Field(t.x, `tiles[${i}].x`),
      y: parseInt32Field(t.y, `tiles[${i}].y`),
      blocks: parseBlockKinds(t.blocks, `tiles[${i}].blocks`),
      exits,
    });
  }

  return { schema: WORLD_JSON_SCHEMA, start, builder: { name, inventory }, tiles };
}

export function stringifyWorldJsonV1(doc: WorldJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

export function worldMapToJsonV1(world: WorldMap): WorldJsonV1 {
  const tiles = world.getTiles();
  const ids = new Map<Tile, number>();
  tiles.forEach((t, i) => ids.set(t, i));

  const start = world.getStartPosition();
  const builder = world.getBuilder();

  return {
    schema: WORLD_JSON_SCHEMA,
    start: { x: start.x, y: start.y },
    builder: {
      name: builder.getName(),
      inventory: builder.getInventory().map((b) => b.kind),
    },
    tiles: tiles.map((t, i) => {
      const at = world.getPosition(t);
      if (!at) throw new Error(`Internal error: tile ${i} has no position`);

      const exits: Partial<Record<Direction, number>> = {};
      for (const direction of DIRECTIONS) {
        const target = t.getExits().get(direction);
        if (!target) continue;
        const id = ids.get(target);
        if (id === undefined) throw new Error(`Internal error: exit ${direction} of tile ${i} leads off the map`);
        exits[direction] = id;
      }

      return { id: i, x: at.x, y: at.y, blocks: t.getBlocks().map((b) => b.kind), exits };
    }),
  };
}

/**
 * Rebuilds a world from its JSON view. Coordinates in the document must match
 * the layout the exits imply.
 *
 * @throws WorldMapFormatError for blocks stacked too high or an inventory
 *         block that cannot be carried.
 * @throws WorldMapInconsistentError if the exits cannot be laid out, or do
 *         not put the tiles where the document says.
 */
export function worldMapFromJsonV1(doc: WorldJsonV1): WorldMap {
  const tiles = doc.tiles.map((t) => {
    try {
      return new Tile(t.blocks.map(createBlock));
    } catch (e: unknown) {
      if (e instanceof TooHighError) throw new WorldMapFormatError(`tiles[${t.id}] stacks its blocks too high`);
      throw e;
    }
  });

  doc.tiles.forEach((t, i) => {
    for (const direction of DIRECTIONS) {
      const targetId = t.exits[direction];
      if (targetId === undefined) continue;
      const from = tiles[i];
      const target = tiles[targetId];
      if (!from || !target) throw new Error(`Internal error: unvalidated exit ${direction} of tile ${i}`);
      from.addExit(direction, target);
    }
  });

  const startingTile = tiles[0];
  if (!startingTile) throw new Error("Internal error: unvalidated empty tile list");

  let builder: Builder;
  try {
    builder = new Builder(doc.builder.name, startingTile, doc.builder.inventory.map(createBlock));
  } catch (e: unknown) {
    if (e instanceof InvalidBlockError) {
      throw new WorldMapFormatError("builder.inventory holds a block that cannot be carried");
    }
    throw e;
  }

  const world = new WorldMap(startingTile, new Position(doc.start.x, doc.start.y), builder);

  doc.tiles.forEach((t, i) => {
    const tile = tiles[i];
    const at = tile ? world.getPosition(tile) : undefined;
    if (!at) throw new WorldMapInconsistentError(`tiles[${i}] is unreachable from tile 0`);
    if (at.x !== t.x || at.y !== t.y) {
      throw new WorldMapInconsistentError(`tiles[${i}] declared at (${t.x}, ${t.y}) but lies at ${at}`);
    }
  });

  return world;
}
