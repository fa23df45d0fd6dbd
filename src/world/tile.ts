// src/world/tile.ts
import type { Block } from "./blocks.js";
import type { Direction } from "./direction.js";
import { InvalidBlockError, NoExitError, TooHighError, TooLowError } from "./errors.js";

/** A ground block may only be placed while the tile holds fewer blocks than this. */
export const MAX_GROUND_HEIGHT = 2;

/** No block may be placed once a tile holds this many blocks. */
export const MAX_HEIGHT = 7;

/**
 * A stack of blocks (bottom to top) with exits to neighbouring tiles.
 *
 * Exits are one-way: adding north to B on A says nothing about B's exits.
 */
export class Tile {
  private readonly blocks: Block[] = [];
  private readonly exits = new Map<Direction, Tile>();

  /** @throws TooHighError if the blocks break the height rules. */
  public constructor(blocks: ReadonlyArray<Block> = []) {
    for (const block of blocks) this.placeBlock(block);
  }

  public getBlocks(): ReadonlyArray<Block> {
    return this.blocks;
  }

  public height(): number {
    return this.blocks.length;
  }

  public getTopBlock(): Block {
    const top = this.blocks[this.blocks.length - 1];
    if (!top) throw new TooLowError();
    return top;
  }

  public removeTopBlock(): Block {
    const top = this.blocks.pop();
    if (!top) throw new TooLowError();
    return top;
  }

  /** @throws TooHighError if the block would sit above its permitted height. */
  public placeBlock(block: Block): void {
    if (this.blocks.length >= MAX_HEIGHT) throw new TooHighError();
    if (block.ground && this.blocks.length >= MAX_GROUND_HEIGHT) throw new TooHighError();
    this.blocks.push(block);
  }

  public getExits(): ReadonlyMap<Direction, Tile> {
    return this.exits;
  }

  /** Adds or replaces the exit in this direction. */
  public addExit(direction: Direction, target: Tile): void {
    this.exits.set(direction, target);
  }

  public removeExit(direction: Direction): void {
    if (!this.exits.delete(direction)) throw new NoExitError();
  }

  /** Removes and returns the top block. */
  public dig(): Block {
    const top = this.getTopBlock();
    if (!top.diggable) throw new InvalidBlockError();
    return this.removeTopBlock();
  }

  /**
   * Moves the top block through an exit. The neighbour must be strictly lower
   * than this tile.
   */
  public moveBlock(direction: Direction): void {
    const target = this.exits.get(direction);
    if (!target) throw new NoExitError();

    const top = this.getTopBlock();
    if (!top.moveable) throw new InvalidBlockError();
    if (target.height() >= this.height()) throw new TooHighError();

    target.placeBlock(top);
    this.blocks.pop();
  }
}
