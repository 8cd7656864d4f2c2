import { describe, it, expect } from 'vitest';
import {
  TILE_SYSTEM_VERSION,
  Tile,
  canTransition,
  Grid,
  TileFactory,
  createPalette,
  iconTierFor,
  isColorAvailable,
  randomColor,
  DEFAULT_MIN_GROUP_SIZE,
  DEFAULT_TIER_THRESHOLDS,
  fillGrid,
  validateLayout,
  snapshotTile,
  snapshotBoard,
  countColors,
} from '../../src/tile-system/index';

describe('tile-system barrel exports', () => {
  it('should export the module version', () => {
    expect(TILE_SYSTEM_VERSION).toBe('0.1.0');
  });

  it('should export the tile model', () => {
    expect(typeof Tile).toBe('function');
    expect(typeof canTransition).toBe('function');
    expect(typeof Grid).toBe('function');
    expect(typeof TileFactory).toBe('function');
  });

  it('should export palette helpers', () => {
    expect(typeof createPalette).toBe('function');
    expect(typeof iconTierFor).toBe('function');
    expect(typeof isColorAvailable).toBe('function');
    expect(typeof randomColor).toBe('function');
    expect(DEFAULT_MIN_GROUP_SIZE).toBe(2);
    expect(DEFAULT_TIER_THRESHOLDS).toEqual({ first: 4, second: 7, third: 9 });
  });

  it('should export fill and snapshot helpers', () => {
    expect(typeof fillGrid).toBe('function');
    expect(typeof validateLayout).toBe('function');
    expect(typeof snapshotTile).toBe('function');
    expect(typeof snapshotBoard).toBe('function');
    expect(typeof countColors).toBe('function');
  });
});
