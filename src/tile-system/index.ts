/**
 * Tile System Module
 *
 * Provides the board's data model: tiles and their lifecycle, the
 * palette, the Grid Store, initial fill, and serializable snapshots.
 */
export const TILE_SYSTEM_VERSION = '0.1.0';

// Tile types and lifecycle
export type {
  TileState,
  IconTier,
  Position,
  TileStateObserver,
} from './Tile';
export { Tile, canTransition } from './Tile';

// Palette
export type {
  ColorDefinition,
  TierThresholds,
  Palette,
  PaletteOptions,
} from './Palette';
export {
  DEFAULT_MIN_GROUP_SIZE,
  DEFAULT_TIER_THRESHOLDS,
  createPalette,
  iconTierFor,
  isColorAvailable,
  randomColor,
} from './Palette';

// Grid Store
export { Grid } from './Grid';
export { TileFactory } from './TileFactory';

// Initial fill
export type { BoardLayout } from './BoardFill';
export { fillGrid, validateLayout } from './BoardFill';

// Snapshots
export type { BoardSnapshot, TileSnapshot } from './Snapshot';
export { snapshotTile, snapshotBoard, countColors } from './Snapshot';
