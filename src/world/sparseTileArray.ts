// src/world/sparseTileArray.ts
import { DIRECTIONS } from "./direction.js";
import { WorldMapInconsistentError } from "./errors.js";
import type { Position } from "./position.js";
import type { Tile } from "./tile.js";

/**
 * Assigns grid positions to every tile reachable from a start tile and keeps
 * the reverse lookup. Tiles are not owned here; the exit graph owns them.
 */
export class SparseTileArray {
  private readonly positions = new Map<Tile, Position>();
  private readonly grid = new Map<string, Tile>();
  private order: Tile[] = [];

  public get size(): number {
    return this.order.length;
  }

  /**
   * Breadth-first walk from startingTile, visiting exits in DIRECTIONS order.
   * Replaces any previous contents. On failure the array is left empty.
   *
   * @throws WorldMapInconsistentError if a tile would need two positions or
   *         two tiles would share one.
   */
  public addLinkedTiles(startingTile: Tile, start: Position): void {
    this.clear();
    try {
      this.walk(startingTile, start);
    } catch (e: unknown) {
      this.clear();
      throw e;
    }
  }

  public getTile(position: Position): Tile | undefined {
    return this.grid.get(position.key());
  }

  public getPosition(tile: Tile): Position | undefined {
    return this.positions.get(tile);
  }

  /** Tiles in breadth-first order from the start tile. */
  public getTiles(): ReadonlyArray<Tile> {
    return this.order;
  }

  private clear(): void {
    this.positions.clear();
    this.grid.clear();
    this.order = [];
  }

  private assign(tile: Tile, position: Position): void {
    this.positions.set(tile, position);
    this.grid.set(position.key(), tile);
    this.order.push(tile);
  }

  private walk(startingTile: Tile, start: Position): void {
    this.assign(startingTile, start);
    const queue: Array<{ tile: Tile; at: Position }> = [{ tile: startingTile, at: start }];

    for (let head = 0; head < queue.length; head++) {
      const { tile, at } = queue[head]!;

      for (const direction of DIRECTIONS) {
        const neighbour = tile.getExits().get(direction);
        if (!neighbour) continue;

        const implied = at.shift(direction);
        if (!implied) {
          throw new WorldMapInconsistentError(
            `Exit ${direction} from ${at} leaves the 32-bit grid`,
          );
        }

        const assigned = this.positions.get(neighbour);
        if (assigned) {
          if (!assigned.equals(implied)) {
            throw new WorldMapInconsistentError(
              `Tile at ${assigned} is also reached ${direction} of ${at}, implying ${implied}`,
            );
          }
          continue;
        }

        if (this.grid.has(implied.key())) {
          throw new WorldMapInconsistentError(
            `Two tiles claim ${implied} (reached ${direction} of ${at})`,
          );
        }

        this.assign(neighbour, implied);
        queue.push({ tile: neighbour, at: implied });
      }
    }
  }
}
