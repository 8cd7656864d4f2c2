/**
 * Tile types and lifecycle for the Tile Blast Engine.
 *
 * A Tile is the logical entity behind one colored cell. It carries
 * its grid coordinates, a palette color id, a cached group size and
 * icon tier (recomputed after every board mutation), and a lifecycle
 * state. Tiles never reference other tiles; adjacency is derived from
 * coordinates by the grid.
 */

/**
 * Lifecycle states of a tile.
 *
 * - `spawning`  -- Just created; waiting for its entry effect.
 * - `idle`      -- Settled and playable.
 * - `blasting`  -- Part of a group being removed.
 * - `falling`   -- Moved down by gravity; waiting for its drop effect.
 * - `shuffling` -- Repositioned by a shuffle; waiting for its move effect.
 */
export type TileState = 'spawning' | 'idle' | 'blasting' | 'falling' | 'shuffling';

/** Cosmetic classification of a group, derived from its size. */
export type IconTier = 'default' | 'first' | 'second' | 'third';

/** A grid coordinate. `y = 0` is the bottom row. */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/**
 * Receives every state transition of the tile it is bound to.
 */
export type TileStateObserver = (
  tile: Tile,
  from: TileState,
  to: TileState,
) => void;

/** Map of valid tile state transitions. Blasted tiles are discarded. */
const VALID_TRANSITIONS: Record<TileState, TileState[]> = {
  spawning: ['idle'],
  idle: ['blasting', 'falling', 'shuffling'],
  blasting: [],
  falling: ['idle'],
  shuffling: ['idle'],
};

export class Tile {
  readonly id: number;
  x: number;
  y: number;
  color: number;
  /** Size of the qualifying group this tile belongs to (1 if none). */
  groupSize = 1;
  iconTier: IconTier = 'default';

  private currentState: TileState = 'spawning';
  private observer: TileStateObserver | null = null;

  constructor(id: number, x: number, y: number, color: number) {
    this.id = id;
    this.x = x;
    this.y = y;
    this.color = color;
  }

  get state(): TileState {
    return this.currentState;
  }

  /**
   * Bind the single observer notified of state transitions.
   * Passing `null` unbinds.
   */
  bind(observer: TileStateObserver | null): void {
    this.observer = observer;
  }

  /**
   * Transition to a new lifecycle state and notify the bound observer.
   *
   * Setting the current state again is a no-op.
   *
   * @throws If the transition is not allowed (e.g. `blasting` -> `idle`).
   */
  setState(next: TileState): void {
    const from = this.currentState;
    if (from === next) return;

    if (!VALID_TRANSITIONS[from].includes(next)) {
      throw new Error(
        `Invalid tile state transition for tile ${this.id}: "${from}" -> "${next}"`,
      );
    }

    this.currentState = next;
    this.observer?.(this, from, next);
  }

  /** Whether the tile may take part in group detection. */
  canBeGrouped(): boolean {
    return this.currentState === 'idle';
  }

  /** Whether the player may tap this tile. */
  canInteract(): boolean {
    return this.currentState === 'idle';
  }

  /** Reset the cached group metadata to its ungrouped values. */
  resetGroupMetadata(): void {
    this.groupSize = 1;
    this.iconTier = 'default';
  }

  position(): Position {
    return { x: this.x, y: this.y };
  }
}

/**
 * Whether a transition from one state to another is allowed.
 */
export function canTransition(from: TileState, to: TileState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
