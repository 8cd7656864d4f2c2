/**
 * Gravity and refill.
 *
 * Each column is compacted downward with a stable write-cursor pass,
 * then topped up with new tiles. Tiles only ever move down, and never
 * change their vertical order relative to other tiles in the column.
 */

import type { Grid } from '@tile-system/Grid';
import type { Palette } from '@tile-system/Palette';
import { randomColor } from '@tile-system/Palette';
import type { Position, Tile } from '@tile-system/Tile';
import type { TileFactory } from '@tile-system/TileFactory';
import type { Rng } from './Random';

/**
 * A tile that changed slot. Spawned tiles start from a virtual slot
 * above the column: `y = rows + spawnIndex`.
 */
export interface TileMove {
  readonly tile: Tile;
  readonly from: Position;
  readonly to: Position;
}

export interface GravityResult {
  /** Pre-existing tiles moved down within their column. */
  readonly fell: TileMove[];
  /** New tiles filling vacated top slots. */
  readonly spawned: TileMove[];
}

export class GravityResolver {
  constructor(
    private readonly grid: Grid,
    private readonly palette: Palette,
    private readonly factory: TileFactory,
    private readonly rng: Rng,
  ) {}

  applyGravityAndRefill(): GravityResult {
    const fell: TileMove[] = [];
    const spawned: TileMove[] = [];

    for (let x = 0; x < this.grid.columns; x++) {
      const writeY = this.compactColumn(x, fell);
      this.refillColumn(x, writeY, spawned);
    }

    return { fell, spawned };
  }

  /**
   * Move every tile of column `x` down to the lowest free slot.
   * @returns The write cursor: the first slot left empty.
   */
  private compactColumn(x: number, fell: TileMove[]): number {
    let writeY = 0;
    for (let y = 0; y < this.grid.rows; y++) {
      const tile = this.grid.get(x, y);
      if (tile === undefined) continue;

      if (writeY !== y) {
        this.grid.set(x, writeY, tile);
        this.grid.clear(x, y);
        tile.y = writeY;
        tile.setState('falling');
        fell.push({ tile, from: { x, y }, to: { x, y: writeY } });
      }
      writeY++;
    }
    return writeY;
  }

  private refillColumn(x: number, writeY: number, spawned: TileMove[]): void {
    const toSpawn = this.grid.rows - writeY;
    for (let i = 0; i < toSpawn; i++) {
      const y = writeY + i;
      const tile = this.factory.create(x, y, randomColor(this.palette, this.rng));
      this.grid.set(x, y, tile);
      spawned.push({ tile, from: { x, y: this.grid.rows + i }, to: { x, y } });
    }
  }
}
