/**
 * Deadlock detection: a board is deadlocked when no cell anywhere
 * yields a group of at least the minimum size.
 */

import type { Grid } from '@tile-system/Grid';
import type { Tile } from '@tile-system/Tile';
import type { GroupDetector } from './GroupDetector';

export class DeadlockChecker {
  constructor(
    private readonly grid: Grid,
    private readonly detector: GroupDetector,
  ) {}

  /**
   * The first qualifying group in row-major order, or `null` when the
   * board is deadlocked.
   */
  findAnyGroup(): Tile[] | null {
    for (let y = 0; y < this.grid.rows; y++) {
      for (let x = 0; x < this.grid.columns; x++) {
        const tile = this.grid.get(x, y);
        if (tile === undefined || !tile.canBeGrouped()) continue;

        const group = this.detector.findGroup(x, y);
        if (group !== null) return group;
      }
    }
    return null;
  }

  isDeadlocked(): boolean {
    return this.findAnyGroup() === null;
  }
}
