/**
 * Guaranteed-match shuffle.
 *
 * Repositions every tile so that up to `guaranteedColorCount` colors
 * get a reserved cluster of adjacent cells, which makes each of them
 * immediately playable. The rest of the board is a uniform random
 * permutation of the remaining tiles.
 *
 * Shuffling never invents colors: the color multiset is unchanged.
 * The separate emergency fix, used only when a shuffled board is still
 * deadlocked, is the one operation here that recolors tiles.
 */

import type { Grid } from '@tile-system/Grid';
import type { Palette } from '@tile-system/Palette';
import type { Position, Tile } from '@tile-system/Tile';
import { DIRECTIONS } from './GroupDetector';
import { randomInt, shuffleInPlace, type Rng } from './Random';

/** Restarts allowed when searching for a cluster of free cells. */
export const CLUSTER_SEARCH_ATTEMPTS = 20;

/** Upper bound on the size of a reserved cluster. */
export const MAX_GUARANTEED_CLUSTER_SIZE = 5;

/** Cells reserved for one guaranteed color. */
export interface GuaranteedCluster {
  readonly color: number;
  readonly positions: readonly Position[];
}

/**
 * Where every tile goes, and which colors received a guarantee.
 * `shortfall` counts requested guarantees that could not be placed.
 */
export interface ShufflePlan {
  readonly mapping: ReadonlyMap<Tile, Position>;
  readonly guaranteed: readonly GuaranteedCluster[];
  readonly requestedColorCount: number;
  readonly shortfall: number;
}

/** A plan that has been written to the board. */
export type ShuffleResult = ShufflePlan;

export interface RecoloredTile {
  readonly tile: Tile;
  readonly fromColor: number;
}

export interface EmergencyFix {
  readonly color: number;
  readonly recolored: readonly RecoloredTile[];
}

export class ShuffleResolver {
  constructor(
    private readonly grid: Grid,
    private readonly palette: Palette,
    private readonly rng: Rng,
  ) {}

  /**
   * Shuffle the board and write the result back.
   * Every tile ends in the `shuffling` state.
   */
  shuffle(guaranteedColorCount: number): ShuffleResult {
    const plan = this.plan(guaranteedColorCount);
    this.commit(plan);
    return plan;
  }

  /**
   * Compute target positions without touching the board.
   */
  plan(guaranteedColorCount: number): ShufflePlan {
    const tiles = this.grid.allTiles();
    const positions: Position[] = tiles.map((t) => ({ x: t.x, y: t.y }));
    const byColor = this.partitionByColor(tiles);
    const selected = this.selectColors(byColor, guaranteedColorCount);

    const mapping = new Map<Tile, Position>();
    const reserved = new Set<number>();
    const guaranteed: GuaranteedCluster[] = [];

    for (const color of selected) {
      const colorTiles = byColor.get(color) ?? [];
      const upper = Math.max(
        this.palette.minGroupSize,
        Math.min(colorTiles.length, MAX_GUARANTEED_CLUSTER_SIZE),
      );
      const target = randomInt(this.rng, this.palette.minGroupSize, upper);
      const cluster = this.findCluster(target, reserved);

      if (cluster.length < this.palette.minGroupSize) {
        console.warn(
          `[ShuffleResolver] No free cluster of ${target} cells for color ${color} after ${CLUSTER_SEARCH_ATTEMPTS} attempts`,
        );
        continue;
      }

      const placed = cluster.slice(0, colorTiles.length);
      placed.forEach((pos, i) => {
        mapping.set(colorTiles[i], pos);
        reserved.add(this.key(pos));
      });
      guaranteed.push({ color, positions: placed });
    }

    const remainingPositions = shuffleInPlace(
      positions.filter((pos) => !reserved.has(this.key(pos))),
      this.rng,
    );
    const remainingTiles = tiles.filter((t) => !mapping.has(t));
    remainingTiles.forEach((tile, i) => {
      mapping.set(tile, remainingPositions[i]);
    });

    const shortfall = Math.max(0, guaranteedColorCount - guaranteed.length);
    if (shortfall > 0) {
      console.warn(
        `[ShuffleResolver] Guaranteed ${guaranteed.length} of ${guaranteedColorCount} requested colors`,
      );
    }

    return {
      mapping,
      guaranteed,
      requestedColorCount: guaranteedColorCount,
      shortfall,
    };
  }

  /**
   * Write a plan to the board: move every tile, rebuild the grid,
   * then transition each tile to `shuffling`.
   */
  commit(plan: ShufflePlan): void {
    this.grid.clearAll();
    for (const [tile, pos] of plan.mapping) {
      tile.x = pos.x;
      tile.y = pos.y;
      this.grid.set(pos.x, pos.y, tile);
    }
    for (const tile of plan.mapping.keys()) {
      tile.setState('shuffling');
    }
  }

  /**
   * Force one playable group on a deadlocked board.
   *
   * Finds the first horizontal run of `minGroupSize` groupable tiles in
   * row-major order (or, failing that, the first vertical run) and
   * recolors the run to its first tile's color. With a minimum group
   * size of 2 this recolors exactly one tile.
   *
   * @returns The recoloring applied, or `null` if no run exists.
   */
  applyEmergencyFix(): EmergencyFix | null {
    const run = this.findRun({ x: 1, y: 0 }) ?? this.findRun({ x: 0, y: 1 });
    if (run === null) return null;

    const color = run[0].color;
    const recolored: RecoloredTile[] = [];
    for (const tile of run.slice(1)) {
      if (tile.color !== color) {
        recolored.push({ tile, fromColor: tile.color });
        tile.color = color;
      }
    }

    console.warn(
      `[ShuffleResolver] Emergency fix recolored ${recolored.length} tile(s) to color ${color} at (${run[0].x},${run[0].y})`,
    );
    return { color, recolored };
  }

  // ── Helpers ────────────────────────────────────────────────

  private partitionByColor(tiles: readonly Tile[]): Map<number, Tile[]> {
    const byColor = new Map<number, Tile[]>();
    for (const tile of tiles) {
      const list = byColor.get(tile.color);
      if (list) {
        list.push(tile);
      } else {
        byColor.set(tile.color, [tile]);
      }
    }
    return byColor;
  }

  /**
   * Pick up to `count` distinct colors that have enough tiles to form
   * a group, uniformly without replacement.
   */
  private selectColors(byColor: Map<number, Tile[]>, count: number): number[] {
    const eligible: number[] = [];
    for (const [color, list] of byColor) {
      if (list.length >= this.palette.minGroupSize) eligible.push(color);
    }
    shuffleInPlace(eligible, this.rng);
    return eligible.slice(0, Math.max(0, Math.min(count, eligible.length)));
  }

  /**
   * Randomized BFS for `count` adjacent, occupied, unreserved cells.
   *
   * A cluster reaching `count` is returned at once. Otherwise the
   * largest cluster of at least `minGroupSize` cells seen over all
   * attempts is returned, or an empty list if there was none.
   */
  private findCluster(count: number, reserved: ReadonlySet<number>): Position[] {
    const candidates: Position[] = [];
    this.grid.forEach((_tile, x, y) => {
      if (!reserved.has(this.key({ x, y }))) candidates.push({ x, y });
    });
    if (candidates.length === 0) return [];

    let best: Position[] = [];
    for (let attempt = 0; attempt < CLUSTER_SEARCH_ATTEMPTS; attempt++) {
      const start = candidates[Math.floor(this.rng() * candidates.length)];
      const result: Position[] = [];
      const queue: Position[] = [start];
      const visited = new Set<number>([this.key(start)]);

      for (let head = 0; head < queue.length && result.length < count; head++) {
        const current = queue[head];
        result.push(current);

        for (const dir of shuffleInPlace([...DIRECTIONS], this.rng)) {
          const next = { x: current.x + dir.x, y: current.y + dir.y };
          const key = this.key(next);
          if (!this.grid.isValid(next.x, next.y)) continue;
          if (visited.has(key) || reserved.has(key)) continue;
          if (this.grid.get(next.x, next.y) === undefined) continue;

          visited.add(key);
          queue.push(next);
        }
      }

      if (result.length >= count) return result;
      if (result.length > best.length) best = result;
    }

    return best.length >= this.palette.minGroupSize ? best : [];
  }

  private findRun(step: Position): Tile[] | null {
    const length = this.palette.minGroupSize;
    for (let y = 0; y < this.grid.rows; y++) {
      for (let x = 0; x < this.grid.columns; x++) {
        const run: Tile[] = [];
        for (let i = 0; i < length; i++) {
          const tile = this.grid.get(x + step.x * i, y + step.y * i);
          if (tile === undefined || !tile.canBeGrouped()) break;
          run.push(tile);
        }
        if (run.length === length) return run;
      }
    }
    return null;
  }

  private key(pos: Position): number {
    return pos.y * this.grid.columns + pos.x;
  }
}
