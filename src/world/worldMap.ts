// src/world/worldMap.ts
import type { Builder } from "./builder.js";
import type { Position } from "./position.js";
import { SparseTileArray } from "./sparseTileArray.js";
import type { Tile } from "./tile.js";

/**
 * A geometrically consistent block world: a builder, the start position and
 * every tile reachable from the starting tile.
 */
export class WorldMap {
  private readonly sparseArray = new SparseTileArray();

  /**
   * @throws WorldMapInconsistentError if the exits from startingTile cannot be
   *         laid out on the grid.
   */
  public constructor(
    startingTile: Tile,
    private readonly startPosition: Position,
    private readonly builder: Builder,
  ) {
    this.sparseArray.addLinkedTiles(startingTile, startPosition);
  }

  public getBuilder(): Builder {
    return this.builder;
  }

  public getStartPosition(): Position {
    return this.startPosition;
  }

  /** The tile the map was built from; always getTiles()[0]. */
  public getStartingTile(): Tile {
    const first = this.sparseArray.getTiles()[0];
    if (!first) throw new Error("Internal error: world map without a starting tile");
    return first;
  }

  public getTile(position: Position): Tile | undefined {
    return this.sparseArray.getTile(position);
  }

  public getPosition(tile: Tile): Position | undefined {
    return this.sparseArray.getPosition(tile);
  }

  /** Reachable tiles in breadth-first order; index i is tile id i on save. */
  public getTiles(): ReadonlyArray<Tile> {
    return this.sparseArray.getTiles();
  }
}
