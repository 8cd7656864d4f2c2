import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MIN_GROUP_SIZE,
  DEFAULT_TIER_THRESHOLDS,
  createPalette,
  iconTierFor,
  isColorAvailable,
  randomColor,
} from '../../src/tile-system/Palette';
import { TEST_COLORS } from '../helpers/board';

describe('createPalette', () => {
  it('applies defaults', () => {
    const palette = createPalette({ colors: TEST_COLORS });
    expect(palette.minGroupSize).toBe(DEFAULT_MIN_GROUP_SIZE);
    expect(palette.tierThresholds).toEqual(DEFAULT_TIER_THRESHOLDS);
    expect(palette.colors.map((c) => c.id)).toEqual([0, 1, 2]);
  });

  it('copies the color list', () => {
    const colors = [{ id: 0, name: 'red' }];
    const palette = createPalette({ colors });
    colors.push({ id: 1, name: 'blue' });
    expect(palette.colors).toHaveLength(1);
  });

  it('rejects an empty palette', () => {
    expect(() => createPalette({ colors: [] })).toThrow(
      'A palette requires at least 1 color',
    );
  });

  it('rejects negative and duplicate ids', () => {
    expect(() => createPalette({ colors: [{ id: -1, name: 'x' }] })).toThrow(
      'Color id must be a non-negative integer, got -1 ("x")',
    );
    expect(() =>
      createPalette({
        colors: [
          { id: 3, name: 'a' },
          { id: 3, name: 'b' },
        ],
      }),
    ).toThrow('Duplicate color id 3 in palette');
  });

  it('rejects a minimum group size below 2', () => {
    expect(() => createPalette({ colors: TEST_COLORS, minGroupSize: 1 })).toThrow(
      'minGroupSize must be an integer >= 2, got 1',
    );
  });

  it('rejects thresholds that are not strictly increasing', () => {
    expect(() =>
      createPalette({
        colors: TEST_COLORS,
        tierThresholds: { first: 4, second: 4, third: 9 },
      }),
    ).toThrow('Tier thresholds must be strictly increasing, got 4, 4, 9');
  });
});

describe('iconTierFor', () => {
  const palette = createPalette({ colors: TEST_COLORS });

  it('maps sizes above each threshold to its tier', () => {
    expect(iconTierFor(palette, 1)).toBe('default');
    expect(iconTierFor(palette, 4)).toBe('default');
    expect(iconTierFor(palette, 5)).toBe('first');
    expect(iconTierFor(palette, 7)).toBe('first');
    expect(iconTierFor(palette, 8)).toBe('second');
    expect(iconTierFor(palette, 9)).toBe('second');
    expect(iconTierFor(palette, 10)).toBe('third');
  });
});

describe('palette colors', () => {
  const palette = createPalette({ colors: TEST_COLORS });

  it('checks membership', () => {
    expect(isColorAvailable(palette, 2)).toBe(true);
    expect(isColorAvailable(palette, 3)).toBe(false);
  });

  it('picks colors from the rng', () => {
    expect(randomColor(palette, () => 0)).toBe(0);
    expect(randomColor(palette, () => 0.5)).toBe(1);
    expect(randomColor(palette, () => 0.99)).toBe(2);
  });
});
