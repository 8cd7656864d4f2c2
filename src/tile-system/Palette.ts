/**
 * Palette definitions for the Tile Blast Engine.
 *
 * A Palette lists the colors a board may use, the minimum size of a
 * playable group, and the thresholds that map a group's size to its
 * icon tier.
 */

import type { IconTier } from './Tile';

/** A single palette color. Only `id` matters to the simulation. */
export interface ColorDefinition {
  readonly id: number;
  readonly name: string;
}

/**
 * Group sizes above which a group is shown with a higher icon tier.
 * Must be strictly increasing.
 */
export interface TierThresholds {
  readonly first: number;
  readonly second: number;
  readonly third: number;
}

export interface Palette {
  readonly colors: readonly ColorDefinition[];
  /** Smallest connected group the player may blast. */
  readonly minGroupSize: number;
  readonly tierThresholds: TierThresholds;
}

export interface PaletteOptions {
  colors: ColorDefinition[];
  /** Defaults to 2. */
  minGroupSize?: number;
  /** Defaults to { first: 4, second: 7, third: 9 }. */
  tierThresholds?: TierThresholds;
}

export const DEFAULT_MIN_GROUP_SIZE = 2;

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = {
  first: 4,
  second: 7,
  third: 9,
};

/**
 * Create a validated palette.
 *
 * @throws If no colors are given, ids are duplicated or negative,
 *         `minGroupSize` is below 2, or thresholds are not increasing.
 */
export function createPalette(options: PaletteOptions): Palette {
  const {
    colors,
    minGroupSize = DEFAULT_MIN_GROUP_SIZE,
    tierThresholds = DEFAULT_TIER_THRESHOLDS,
  } = options;

  if (colors.length === 0) {
    throw new Error('A palette requires at least 1 color');
  }

  const seen = new Set<number>();
  for (const color of colors) {
    if (!Number.isInteger(color.id) || color.id < 0) {
      throw new Error(
        `Color id must be a non-negative integer, got ${color.id} ("${color.name}")`,
      );
    }
    if (seen.has(color.id)) {
      throw new Error(`Duplicate color id ${color.id} in palette`);
    }
    seen.add(color.id);
  }

  if (!Number.isInteger(minGroupSize) || minGroupSize < 2) {
    throw new Error(`minGroupSize must be an integer >= 2, got ${minGroupSize}`);
  }

  const { first, second, third } = tierThresholds;
  if (!(first < second && second < third)) {
    throw new Error(
      `Tier thresholds must be strictly increasing, got ${first}, ${second}, ${third}`,
    );
  }

  return {
    colors: [...colors],
    minGroupSize,
    tierThresholds: { first, second, third },
  };
}

/**
 * Map a group size to its icon tier. Pure function of size.
 */
export function iconTierFor(palette: Palette, groupSize: number): IconTier {
  const { first, second, third } = palette.tierThresholds;
  if (groupSize > third) return 'third';
  if (groupSize > second) return 'second';
  if (groupSize > first) return 'first';
  return 'default';
}

/** Whether a color id belongs to the palette. */
export function isColorAvailable(palette: Palette, colorId: number): boolean {
  return palette.colors.some((c) => c.id === colorId);
}

/**
 * Pick a palette color id uniformly at random.
 */
export function randomColor(palette: Palette, rng: () => number): number {
  const index = Math.floor(rng() * palette.colors.length);
  return palette.colors[index].id;
}
