/**
 * Engine configuration: board dimensions, palette, shuffle guarantees
 * and randomness.
 */

import type { BoardLayout } from '@tile-system/BoardFill';
import type { Palette } from '@tile-system/Palette';

export const MIN_GUARANTEED_COLORS = 1;
export const MAX_GUARANTEED_COLORS = 4;

export interface EngineConfig {
  readonly columns: number;
  readonly rows: number;
  readonly palette: Palette;
  /** Colors given a reserved playable cluster when shuffling. */
  readonly guaranteedColorCount: number;
  /** Seed for deterministic play; `undefined` uses Math.random. */
  readonly seed?: number;
  /** Initial colors indexed `[y][x]`; random fill when absent. */
  readonly layout?: BoardLayout;
}

export interface EngineConfigOptions {
  columns: number;
  rows: number;
  palette: Palette;
  /** Defaults to 1. */
  guaranteedColorCount?: number;
  seed?: number;
  layout?: BoardLayout;
}

/**
 * Create a validated engine configuration.
 *
 * @throws If a dimension is not a positive integer.
 * @throws If `guaranteedColorCount` is outside [1, 4].
 * @throws If `layout` does not match the dimensions.
 */
export function createEngineConfig(options: EngineConfigOptions): EngineConfig {
  const {
    columns,
    rows,
    palette,
    guaranteedColorCount = MIN_GUARANTEED_COLORS,
    seed,
    layout,
  } = options;

  if (!Number.isInteger(columns) || columns < 1) {
    throw new Error(`columns must be a positive integer, got ${columns}`);
  }
  if (!Number.isInteger(rows) || rows < 1) {
    throw new Error(`rows must be a positive integer, got ${rows}`);
  }

  if (
    !Number.isInteger(guaranteedColorCount) ||
    guaranteedColorCount < MIN_GUARANTEED_COLORS ||
    guaranteedColorCount > MAX_GUARANTEED_COLORS
  ) {
    throw new Error(
      `guaranteedColorCount must be an integer in [${MIN_GUARANTEED_COLORS}, ${MAX_GUARANTEED_COLORS}], got ${guaranteedColorCount}`,
    );
  }

  if (seed !== undefined && !Number.isFinite(seed)) {
    throw new Error(`seed must be a finite number, got ${seed}`);
  }

  if (layout) {
    if (layout.length !== rows || layout.some((row) => row.length !== columns)) {
      throw new Error(`layout must be ${rows} rows of ${columns} colors`);
    }
  }

  return { columns, rows, palette, guaranteedColorCount, seed, layout };
}
