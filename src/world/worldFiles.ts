// src/world/worldFiles.ts
//
// Reading and writing world maps in either on-disk form (.world text or the
// .json view), plus the directory helpers the batch tools share.

import path from "node:path";
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";

import { WorldMapFormatError, WorldMapIoError, errorMessage } from "./errors.js";
import type { WorldMap } from "./worldMap.js";
import { type WarnFn } from "./worldMapCodec.js";
import { loadWorldMap, saveWorldMap } from "./worldMapFile.js";
import {
  parseWorldJsonV1,
  stringifyWorldJsonV1,
  worldMapFromJsonV1,
  worldMapToJsonV1,
} from "./worldJsonV1.js";

export type WorldFileFormat = "world" | "json";

export function isWorldPath(p: string): boolean {
  return p.toLowerCase().endsWith(".world");
}

export function isJsonPath(p: string): boolean {
  return p.toLowerCase().endsWith(".json");
}

/** Anything that is not .json is read as the text format. */
export function formatForPath(p: string): WorldFileFormat {
  return isJsonPath(p) ? "json" : "world";
}

export function inferFormatForDirFile(filePath: string, includeJson: boolean): WorldFileFormat | null {
  if (isWorldPath(filePath)) return "world";
  if (includeJson && isJsonPath(filePath)) return "json";
  return null;
}

export async function readWorldJson(inputPath: string): Promise<WorldMap> {
  let text: string;
  try {
    text = await readFile(inputPath, "utf8");
  } catch (e: unknown) {
    throw new WorldMapIoError(`Cannot read ${inputPath}: ${errorMessage(e)}`, inputPath, { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e: unknown) {
    throw new WorldMapFormatError(`Invalid JSON in ${inputPath}: ${errorMessage(e)}`);
  }
  return worldMapFromJsonV1(parseWorldJsonV1(parsed));
}

export async function writeWorldJson(world: WorldMap, outputPath: string): Promise<void> {
  const text = stringifyWorldJsonV1(worldMapToJsonV1(world));
  try {
    await writeFile(outputPath, text, "utf8");
  } catch (e: unknown) {
    throw new WorldMapIoError(`Cannot write ${outputPath}: ${errorMessage(e)}`, outputPath, { cause: e });
  }
}

export async function readWorldDoc(inputPath: string, warn?: WarnFn): Promise<WorldMap> {
  return formatForPath(inputPath) === "json" ? readWorldJson(inputPath) : loadWorldMap(inputPath, warn);
}

export async function writeWorldDoc(
  world: WorldMap,
  outputPath: string,
  format: WorldFileFormat = formatForPath(outputPath),
): Promise<void> {
  if (format === "json") await writeWorldJson(world, outputPath);
  else await saveWorldMap(world, outputPath);
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isDirectory();
  } catch {
    return false;
  }
}

export async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (recursive) out.push(...(await listFiles(full, true)));
    } else if (e.isFile()) {
      out.push(full);
    }
  }

  out.sort();
  return out;
}

export async function ensureParentDir(p: string): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
}
