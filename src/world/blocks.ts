// src/world/blocks.ts
import { UnknownBlockTypeError } from "./errors.js";

export type BlockKind = "wood" | "grass" | "soil" | "stone";

export type BlockColour = "brown" | "green" | "black" | "gray";

/**
 * One block on a tile or in a builder's inventory. Blocks carry no mutable
 * state; identity only matters for inventory bookkeeping.
 */
export type Block = Readonly<{
  kind: BlockKind;
  colour: BlockColour;
  /** Placed only while the tile holds fewer than MAX_GROUND_HEIGHT blocks. */
  ground: boolean;
  carryable: boolean;
  diggable: boolean;
  moveable: boolean;
}>;

function woodBlock(): Block {
  return { kind: "wood", colour: "brown", ground: false, carryable: true, diggable: true, moveable: true };
}

function grassBlock(): Block {
  return { kind: "grass", colour: "green", ground: true, carryable: false, diggable: true, moveable: false };
}

function soilBlock(): Block {
  return { kind: "soil", colour: "black", ground: true, carryable: true, diggable: true, moveable: false };
}

function stoneBlock(): Block {
  return { kind: "stone", colour: "gray", ground: false, carryable: false, diggable: false, moveable: false };
}

const BLOCK_FACTORIES: ReadonlyMap<string, () => Block> = new Map<BlockKind, () => Block>([
  ["wood", woodBlock],
  ["grass", grassBlock],
  ["soil", soilBlock],
  ["stone", stoneBlock],
]);

export const BLOCK_KINDS: ReadonlyArray<BlockKind> = ["wood", "grass", "soil", "stone"];

export function isBlockKind(token: string): token is BlockKind {
  return BLOCK_FACTORIES.has(token);
}

export function createBlock(kind: BlockKind): Block {
  return resolveBlock(kind);
}

/** Looks a block-type token up in the registry and builds a fresh block. */
export function resolveBlock(token: string): Block {
  const make = BLOCK_FACTORIES.get(token);
  if (!make) throw new UnknownBlockTypeError(token);
  return make();
}

/**
 * Resolves a comma-delimited token list such as "soil,wood". The empty string
 * is the empty list; any other empty or unknown token fails the whole list.
 */
export function resolveBlockList(text: string): Block[] {
  if (text === "") return [];
  return text.split(",").map((token) => resolveBlock(token));
}

export function formatBlockList(blocks: ReadonlyArray<Block>): string {
  return blocks.map((b) => b.kind).join(",");
}
