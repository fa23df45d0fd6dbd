// src/world/worldMapCodec.ts
//
// Text format:
//
//   <startX>
//   <startY>
//   <builder name>
//   <inventory: comma-separated block types, may be empty>
//
//   total:<N>
//   <N rows: "<id> <blocks>">
//
//   exits
//   <N rows: "<id> <direction>:<id>,...">

import { formatBlockList } from "./blocks.js";
import { DIRECTIONS } from "./direction.js";
import { LineReader, LineWriter } from "./lines.js";
import {
  ensureAtEnd,
  parseBlankLine,
  parseBuilderSection,
  parseExitsSection,
  parseTilesSection,
} from "./sections.js";
import type { Tile } from "./tile.js";
import { WorldMap } from "./worldMap.js";

export type WarnFn = (msg: string) => void;

/**
 * @throws WorldMapFormatError if the text does not follow the format.
 * @throws WorldMapInconsistentError if the exits cannot be laid out on a grid.
 */
export function decodeWorldMap(text: string, warn: WarnFn = () => {}): WorldMap {
  const r = new LineReader(text);

  const { startPosition, builder } = parseBuilderSection(r);
  parseBlankLine(r);

  const tiles = parseTilesSection(r, builder.getCurrentTile());
  parseBlankLine(r);

  parseExitsSection(r, tiles);
  ensureAtEnd(r);

  const world = new WorldMap(builder.getCurrentTile(), startPosition, builder);

  const reached = world.getTiles().length;
  if (reached < tiles.length) {
    warn(
      `${tiles.length - reached} of ${tiles.length} tiles are unreachable from tile 0 and will not be saved`,
    );
  }
  return world;
}

export function encodeWorldMap(world: WorldMap): string {
  const w = new LineWriter();
  const tiles = world.getTiles();

  const ids = new Map<Tile, number>();
  tiles.forEach((t, i) => ids.set(t, i));

  const start = world.getStartPosition();
  const builder = world.getBuilder();

  w.writeLine(String(start.x));
  w.writeLine(String(start.y));
  w.writeLine(builder.getName());
  w.writeLine(formatBlockList(builder.getInventory()));
  w.writeLine();

  w.writeLine(`total:${tiles.length}`);
  tiles.forEach((t, i) => w.writeLine(`${i} ${formatBlockList(t.getBlocks())}`));
  w.writeLine();

  w.writeLine("exits");
  tiles.forEach((t, i) => {
    const exits: string[] = [];
    for (const direction of DIRECTIONS) {
      const target = t.getExits().get(direction);
      if (!target) continue;
      const id = ids.get(target);
      if (id === undefined) {
        throw new Error(`Internal error: exit ${direction} of tile ${i} leads off the map`);
      }
      exits.push(`${direction}:${id}`);
    }
    w.writeLine(`${i} ${exits.join(",")}`);
  });

  return w.toString();
}
