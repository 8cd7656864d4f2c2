/**
 * Grid Store for the Tile Blast Engine.
 *
 * A dense `columns x rows` slot array; each slot holds at most one
 * Tile. Pure data access: no adjacency, color or state logic lives
 * here.
 *
 * Out-of-bounds coordinates are an expected outcome of neighbor
 * probing, so queries return `undefined` and mutations do nothing
 * instead of throwing.
 */

import type { Tile } from './Tile';

export class Grid {
  readonly columns: number;
  readonly rows: number;
  private readonly slots: Array<Tile | undefined>;

  /**
   * @throws If either dimension is not a positive integer.
   */
  constructor(columns: number, rows: number) {
    if (!Number.isInteger(columns) || columns < 1) {
      throw new Error(`Grid columns must be a positive integer, got ${columns}`);
    }
    if (!Number.isInteger(rows) || rows < 1) {
      throw new Error(`Grid rows must be a positive integer, got ${rows}`);
    }
    this.columns = columns;
    this.rows = rows;
    this.slots = new Array<Tile | undefined>(columns * rows).fill(undefined);
  }

  /** Whether (x, y) lies on the board. */
  isValid(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.columns &&
      y >= 0 &&
      y < this.rows
    );
  }

  get(x: number, y: number): Tile | undefined {
    if (!this.isValid(x, y)) return undefined;
    return this.slots[this.index(x, y)];
  }

  set(x: number, y: number, tile: Tile): void {
    if (!this.isValid(x, y)) return;
    this.slots[this.index(x, y)] = tile;
  }

  clear(x: number, y: number): void {
    if (!this.isValid(x, y)) return;
    this.slots[this.index(x, y)] = undefined;
  }

  clearAll(): void {
    this.slots.fill(undefined);
  }

  /**
   * Visit every occupied slot in row-major order, bottom row first.
   */
  forEach(callback: (tile: Tile, x: number, y: number) => void): void {
    for (let y = 0; y < this.rows; y++) {
      for (let x = 0; x < this.columns; x++) {
        const tile = this.slots[this.index(x, y)];
        if (tile !== undefined) {
          callback(tile, x, y);
        }
      }
    }
  }

  /** All tiles in row-major order. */
  allTiles(): Tile[] {
    const tiles: Tile[] = [];
    this.forEach((tile) => tiles.push(tile));
    return tiles;
  }

  /** Number of occupied slots. */
  count(): number {
    let n = 0;
    for (const slot of this.slots) {
      if (slot !== undefined) n++;
    }
    return n;
  }

  private index(x: number, y: number): number {
    return y * this.columns + x;
  }
}
