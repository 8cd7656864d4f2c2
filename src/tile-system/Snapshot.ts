/**
 * Serializable board snapshots.
 *
 * Provides plain-data views of tiles and boards for tooling, test
 * assertions and replay. A board snapshot is a color layout indexed
 * `[y][x]` with `y = 0` as the bottom row, which is also the layout
 * format accepted when filling a board.
 */

import type { Grid } from './Grid';
import type { IconTier, Tile, TileState } from './Tile';

/** Color layout indexed `[y][x]`; `null` marks an empty slot. */
export type BoardSnapshot = Array<Array<number | null>>;

/** Serializable tile snapshot (no methods). */
export interface TileSnapshot {
  id: number;
  x: number;
  y: number;
  color: number;
  state: TileState;
  groupSize: number;
  iconTier: IconTier;
}

export function snapshotTile(tile: Tile): TileSnapshot {
  return {
    id: tile.id,
    x: tile.x,
    y: tile.y,
    color: tile.color,
    state: tile.state,
    groupSize: tile.groupSize,
    iconTier: tile.iconTier,
  };
}

/**
 * Capture the color of every slot.
 */
export function snapshotBoard(grid: Grid): BoardSnapshot {
  const rows: BoardSnapshot = [];
  for (let y = 0; y < grid.rows; y++) {
    const row: Array<number | null> = [];
    for (let x = 0; x < grid.columns; x++) {
      row.push(grid.get(x, y)?.color ?? null);
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Count tiles per color id.
 */
export function countColors(grid: Grid): Map<number, number> {
  const counts = new Map<number, number>();
  grid.forEach((tile) => {
    counts.set(tile.color, (counts.get(tile.color) ?? 0) + 1);
  });
  return counts;
}
