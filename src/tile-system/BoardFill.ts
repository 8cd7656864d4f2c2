/**
 * Initial board fill.
 *
 * Fills every slot either from a color layout or uniformly at random
 * from the palette. Initial tiles skip their entry effect: they are
 * created `spawning` and settled to `idle` straight away.
 */

import type { Grid } from './Grid';
import type { Palette } from './Palette';
import { isColorAvailable, randomColor } from './Palette';
import type { TileFactory } from './TileFactory';

/** Color layout indexed `[y][x]`, `y = 0` being the bottom row. */
export type BoardLayout = ReadonlyArray<ReadonlyArray<number>>;

/**
 * @throws If the layout's dimensions do not match the grid.
 */
export function validateLayout(grid: Grid, layout: BoardLayout): void {
  if (layout.length !== grid.rows) {
    throw new Error(
      `Layout has ${layout.length} rows, expected ${grid.rows}`,
    );
  }
  layout.forEach((row, y) => {
    if (row.length !== grid.columns) {
      throw new Error(
        `Layout row ${y} has ${row.length} columns, expected ${grid.columns}`,
      );
    }
  });
}

/**
 * Fill every slot of the grid with a new idle tile.
 *
 * Layout colors missing from the palette are replaced with a random
 * palette color.
 *
 * @returns Number of layout colors that had to be replaced.
 */
export function fillGrid(
  grid: Grid,
  factory: TileFactory,
  palette: Palette,
  rng: () => number,
  layout?: BoardLayout,
): number {
  if (layout) validateLayout(grid, layout);

  let replaced = 0;
  for (let y = 0; y < grid.rows; y++) {
    for (let x = 0; x < grid.columns; x++) {
      let color = layout ? layout[y][x] : randomColor(palette, rng);
      if (!isColorAvailable(palette, color)) {
        const substitute = randomColor(palette, rng);
        console.warn(
          `[BoardFill] Color ${color} at (${x},${y}) is not in the palette. Using ${substitute}.`,
        );
        color = substitute;
        replaced++;
      }

      const tile = factory.create(x, y, color);
      grid.set(x, y, tile);
      tile.setState('idle');
    }
  }
  return replaced;
}
