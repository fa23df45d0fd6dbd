// src/world/builder.ts
import type { Block } from "./blocks.js";
import { InvalidBlockError, NoExitError } from "./errors.js";
import type { Tile } from "./tile.js";

export class Builder {
  private readonly inventory: Block[];
  private currentTile: Tile;

  /**
   * @throws RangeError if the name spans more than one line.
   * @throws InvalidBlockError if any starting block cannot be carried.
   */
  public constructor(
    private readonly name: string,
    startingTile: Tile,
    startingInventory: ReadonlyArray<Block> = [],
  ) {
    if (/[\r\n]/.test(name)) {
      throw new RangeError(`Builder name must be a single line: ${JSON.stringify(name)}`);
    }
    for (const block of startingInventory) {
      if (!block.carryable) {
        throw new InvalidBlockError(`Block '${block.kind}' cannot be carried`);
      }
    }
    this.inventory = [...startingInventory];
    this.currentTile = startingTile;
  }

  public getName(): string {
    return this.name;
  }

  public getCurrentTile(): Tile {
    return this.currentTile;
  }

  public getInventory(): ReadonlyArray<Block> {
    return this.inventory;
  }

  /** Places inventory[index] on the current tile; it stays held if that fails. */
  public dropFromInventory(index: number): void {
    const block = this.inventory[index];
    if (!Number.isInteger(index) || !block) throw new InvalidBlockError();

    this.currentTile.placeBlock(block);
    this.inventory.splice(index, 1);
  }

  /** Digs the current tile; carryable blocks end up in the inventory. */
  public digOnCurrentTile(): void {
    const block = this.currentTile.dig();
    if (block.carryable) this.inventory.push(block);
  }

  public canEnter(tile: Tile): boolean {
    let linked = false;
    for (const target of this.currentTile.getExits().values()) {
      if (target === tile) linked = true;
    }
    return linked && Math.abs(tile.height() - this.currentTile.height()) <= 1;
  }

  public moveTo(tile: Tile): void {
    if (!this.canEnter(tile)) throw new NoExitError();
    this.currentTile = tile;
  }
}
