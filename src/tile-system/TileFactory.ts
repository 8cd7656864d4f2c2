/**
 * Creates tiles with unique ids and binds each one to the state
 * observer supplied by the owner of the board.
 */

import { Tile, type TileStateObserver } from './Tile';

export class TileFactory {
  private nextId = 0;

  constructor(private readonly observer: TileStateObserver | null = null) {}

  /** Create a tile in the `spawning` state. */
  create(x: number, y: number, color: number): Tile {
    const tile = new Tile(this.nextId++, x, y, color);
    tile.bind(this.observer);
    return tile;
  }

  /** Number of tiles created so far. */
  get createdCount(): number {
    return this.nextId;
  }
}
