// src/world/sections.ts
import { type Block, resolveBlockList } from "./blocks.js";
import { Builder } from "./builder.js";
import { isDirection } from "./direction.js";
import { InvalidBlockError, TooHighError, WorldMapFormatError } from "./errors.js";
import { parseInt32, parseLabeledCounts, parseNumberedRow } from "./grammar.js";
import type { LineReader } from "./lines.js";
import { Position } from "./position.js";
import { Tile } from "./tile.js";

export type BuilderSection = Readonly<{
  startPosition: Position;
  builder: Builder;
}>;

function resolveBlocksAt(text: string, line: number): Block[] {
  try {
    return resolveBlockList(text);
  } catch (e: unknown) {
    if (e instanceof WorldMapFormatError) throw new WorldMapFormatError(e.message, line);
    throw e;
  }
}

export function parseBlankLine(r: LineReader): void {
  const n = r.lineNumber();
  if (r.readLine() !== "") throw new WorldMapFormatError("Expected a blank line", n);
}

export function ensureAtEnd(r: LineReader): void {
  if (!r.atEnd()) {
    throw new WorldMapFormatError("Unexpected content after the exits section", r.lineNumber());
  }
}

/**
 * Start position, builder name and inventory. The builder is placed on a
 * fresh empty tile which becomes tile 0 of the tiles section.
 */
export function parseBuilderSection(r: LineReader): BuilderSection {
  let n = r.lineNumber();
  const x = parseInt32(r.readLine(), n);
  n = r.lineNumber();
  const y = parseInt32(r.readLine(), n);

  const name = r.readLine();

  n = r.lineNumber();
  const inventory = resolveBlocksAt(r.readLine(), n);

  let builder: Builder;
  try {
    builder = new Builder(name, new Tile(), inventory);
  } catch (e: unknown) {
    if (e instanceof InvalidBlockError) {
      throw new WorldMapFormatError(`Inventory holds a block that cannot be carried`, n);
    }
    throw e;
  }

  return { startPosition: new Position(x, y), builder };
}

/**
 * "total:N" followed by N rows of "<id> <blocks>", ids in [0, N) in any
 * order. Returns the tiles indexed by id; tile 0 is startingTile.
 */
export function parseTilesSection(r: LineReader, startingTile: Tile): Tile[] {
  let n = r.lineNumber();
  const header = parseLabeledCounts(r.readLine(), true, n);
  const total = header.get("total");
  if (total === undefined) throw new WorldMapFormatError("Expected 'total:N'", n);
  if (total < 1) throw new WorldMapFormatError("A map needs at least one tile", n);

  const blocksById = new Map<number, { blocks: Block[]; line: number }>();

  for (let i = 0; i < total; i++) {
    n = r.lineNumber();
    const row = parseNumberedRow(r.readLine(), n);

    if (row.id < 0 || row.id >= total) {
      throw new WorldMapFormatError(`Tile id ${row.id} outside [0, ${total})`, n);
    }
    if (blocksById.has(row.id)) throw new WorldMapFormatError(`Duplicate tile id ${row.id}`, n);

    blocksById.set(row.id, { blocks: resolveBlocksAt(row.rest, n), line: n });
  }

  const tiles: Tile[] = [];
  for (let id = 0; id < total; id++) {
    const entry = blocksById.get(id);
    if (!entry) throw new Error(`Internal error: tile ${id} missing after ${total} rows`);

    try {
      if (id === 0) {
        for (const block of entry.blocks) startingTile.placeBlock(block);
        tiles.push(startingTile);
      } else {
        tiles.push(new Tile(entry.blocks));
      }
    } catch (e: unknown) {
      if (e instanceof TooHighError) {
        throw new WorldMapFormatError(`Tile ${id} stacks its blocks too high`, entry.line);
      }
      throw e;
    }
  }

  return tiles;
}

/**
 * "exits" followed by one "<id> <direction:target,...>" row per tile, in any
 * order. Wires the exits into tiles.
 */
export function parseExitsSection(r: LineReader, tiles: ReadonlyArray<Tile>): void {
  let n = r.lineNumber();
  if (r.readLine() !== "exits") throw new WorldMapFormatError("Expected 'exits'", n);

  const seen = new Set<number>();

  for (let i = 0; i < tiles.length; i++) {
    n = r.lineNumber();
    const row = parseNumberedRow(r.readLine(), n);

    const from = tiles[row.id];
    if (!from) throw new WorldMapFormatError(`Tile id ${row.id} outside [0, ${tiles.length})`, n);
    if (seen.has(row.id)) throw new WorldMapFormatError(`Duplicate exits for tile ${row.id}`, n);
    seen.add(row.id);

    for (const [label, targetId] of parseLabeledCounts(row.rest, false, n)) {
      if (!isDirection(label)) throw new WorldMapFormatError(`Invalid direction '${label}'`, n);

      const target = tiles[targetId];
      if (!target) {
        throw new WorldMapFormatError(`Exit target ${targetId} outside [0, ${tiles.length})`, n);
      }
      from.addExit(label, target);
    }
  }
}
