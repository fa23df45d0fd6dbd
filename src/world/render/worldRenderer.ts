// src/world/render/worldRenderer.ts
import type { BlockColour } from "../blocks.js";
import type { Direction } from "../direction.js";
import { MAX_HEIGHT, type Tile } from "../tile.js";
import type { WorldMap } from "../worldMap.js";
import { writePngRgba } from "./png.js";
import { type Rgba, type RgbaImage, createImage, fillRect } from "./rgbaImage.js";

export const DEFAULT_CELL_SIZE = 16;

const BACKGROUND: Rgba = [0, 0, 0, 0];
const WALL: Rgba = [20, 20, 20, 255];
const EMPTY_TILE: Rgba = [64, 64, 64, 255];
const BUILDER: Rgba = [255, 255, 255, 255];

const BLOCK_RGB: Record<BlockColour, readonly [number, number, number]> = {
  brown: [139, 90, 43],
  green: [76, 153, 0],
  black: [25, 25, 25],
  gray: [128, 128, 128],
};

export type RenderOptions = Readonly<{
  cellSize?: number;
}>;

export type RenderBounds = Readonly<{
  minX: number;
  minY: number;
  columns: number;
  rows: number;
}>;

/** Top-block colour, darker for lower stacks (full brightness at MAX_HEIGHT). */
export function tileColour(tile: Tile): Rgba {
  if (tile.height() === 0) return EMPTY_TILE;
  const [r, g, b] = BLOCK_RGB[tile.getTopBlock().colour];
  const f = 0.5 + (0.5 * tile.height()) / MAX_HEIGHT;
  return [Math.round(r * f), Math.round(g * f), Math.round(b * f), 255];
}

export function renderBounds(world: WorldMap): RenderBounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const t of world.getTiles()) {
    const p = world.getPosition(t);
    if (!p) continue;
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  if (minX === Infinity) throw new Error("Internal error: world map without positioned tiles");
  return { minX, minY, columns: maxX - minX + 1, rows: maxY - minY + 1 };
}

/**
 * Draws each reachable tile as a square cell. Cell edges are walls except
 * where the tile has an exit in that direction; the builder's tile carries a
 * centred marker.
 */
export function renderWorldMap(world: WorldMap, opts: RenderOptions = {}): RgbaImage {
  const cell = opts.cellSize ?? DEFAULT_CELL_SIZE;
  if (!Number.isInteger(cell) || cell < 4) throw new Error(`Cell size must be an integer >= 4, got ${cell}`);

  const bounds = renderBounds(world);
  const img = createImage(bounds.columns * cell, bounds.rows * cell, BACKGROUND);
  const builderTile = world.getBuilder().getCurrentTile();

  for (const t of world.getTiles()) {
    const p = world.getPosition(t);
    if (!p) continue;

    const left = (p.x - bounds.minX) * cell;
    const top = (p.y - bounds.minY) * cell;
    const right = left + cell;
    const bottom = top + cell;

    fillRect(img, left, top, right, bottom, tileColour(t));

    const open = (d: Direction): boolean => t.getExits().has(d);
    if (!open("north")) fillRect(img, left, top, right, top + 1, WALL);
    if (!open("south")) fillRect(img, left, bottom - 1, right, bottom, WALL);
    if (!open("west")) fillRect(img, left, top, left + 1, bottom, WALL);
    if (!open("east")) fillRect(img, right - 1, top, right, bottom, WALL);

    if (t === builderTile) {
      const m = Math.floor(cell / 4);
      fillRect(img, left + m + 1, top + m + 1, right - m - 1, bottom - m - 1, BUILDER);
    }
  }

  return img;
}

export function renderWorldMapToPng(world: WorldMap, opts: RenderOptions = {}): Buffer {
  return writePngRgba(renderWorldMap(world, opts));
}
