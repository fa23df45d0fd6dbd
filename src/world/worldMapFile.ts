// src/world/worldMapFile.ts
import { readFile, writeFile } from "node:fs/promises";

import { WorldMapIoError, errorMessage } from "./errors.js";
import type { WorldMap } from "./worldMap.js";
import { type WarnFn, decodeWorldMap, encodeWorldMap } from "./worldMapCodec.js";

/**
 * Reads and validates a world map file. I/O failures surface as
 * WorldMapIoError before any parsing starts.
 */
export async function loadWorldMap(path: string, warn?: WarnFn): Promise<WorldMap> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e: unknown) {
    throw new WorldMapIoError(`Cannot read ${path}: ${errorMessage(e)}`, path, { cause: e });
  }
  return decodeWorldMap(text, warn);
}

/**
 * Writes the map in the text format. A failed write may leave a partial file;
 * cleanup is up to the caller.
 */
export async function saveWorldMap(world: WorldMap, path: string): Promise<void> {
  const text = encodeWorldMap(world);
  try {
    await writeFile(path, text, "utf8");
  } catch (e: unknown) {
    throw new WorldMapIoError(`Cannot write ${path}: ${errorMessage(e)}`, path, { cause: e });
  }
}
