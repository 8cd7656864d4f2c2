/**
 * Group detection for the Tile Blast Engine.
 *
 * A group is the maximal 4-connected set of idle tiles sharing the
 * seed's color. Detection is an iterative breadth-first flood fill;
 * membership is independent of traversal order.
 */

import type { Grid } from '@tile-system/Grid';
import type { Palette } from '@tile-system/Palette';
import { iconTierFor } from '@tile-system/Palette';
import type { Position, Tile } from '@tile-system/Tile';

/** Up, down, left, right. No diagonals. */
export const DIRECTIONS: readonly Position[] = [
  { x: 0, y: 1 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 },
];

export class GroupDetector {
  constructor(
    private readonly grid: Grid,
    private readonly palette: Palette,
  ) {}

  /**
   * Find the group containing the seed cell.
   *
   * @returns The group's tiles, or `null` when the seed is empty or
   *          out of bounds, not groupable, or its component is smaller
   *          than the palette's minimum group size.
   */
  findGroup(seedX: number, seedY: number): Tile[] | null {
    const component = this.findComponent(seedX, seedY);
    if (component === null) return null;
    return component.length >= this.palette.minGroupSize ? component : null;
  }

  /**
   * Flood fill from the seed without applying the minimum size.
   * Returns `null` only when the seed itself is not groupable.
   */
  findComponent(seedX: number, seedY: number): Tile[] | null {
    const seed = this.grid.get(seedX, seedY);
    if (seed === undefined || !seed.canBeGrouped()) return null;

    const color = seed.color;
    const columns = this.grid.columns;
    const visited = new Set<number>([seedY * columns + seedX]);
    const queue: Position[] = [{ x: seedX, y: seedY }];
    const group: Tile[] = [];

    for (let head = 0; head < queue.length; head++) {
      const { x, y } = queue[head];
      const tile = this.grid.get(x, y);
      if (tile === undefined) continue;
      group.push(tile);

      for (const dir of DIRECTIONS) {
        const nx = x + dir.x;
        const ny = y + dir.y;
        if (!this.grid.isValid(nx, ny)) continue;

        const key = ny * columns + nx;
        if (visited.has(key)) continue;

        const neighbor = this.grid.get(nx, ny);
        if (neighbor !== undefined && neighbor.color === color && neighbor.canBeGrouped()) {
          visited.add(key);
          queue.push({ x: nx, y: ny });
        }
      }
    }

    return group;
  }

  /**
   * Recompute the cached group size and icon tier of every tile.
   *
   * Each qualifying group is flood-filled once; cells whose component
   * is too small are marked visited individually.
   */
  refreshAllGroupMetadata(): void {
    this.grid.forEach((tile) => {
      if (tile.canBeGrouped()) tile.resetGroupMetadata();
    });

    const columns = this.grid.columns;
    const visited = new Set<number>();

    this.grid.forEach((tile, x, y) => {
      const key = y * columns + x;
      if (visited.has(key) || !tile.canBeGrouped()) return;

      const group = this.findGroup(x, y);
      if (group === null) {
        visited.add(key);
        return;
      }

      const tier = iconTierFor(this.palette, group.length);
      for (const member of group) {
        member.groupSize = group.length;
        member.iconTier = tier;
        visited.add(member.y * columns + member.x);
      }
    });
  }
}
