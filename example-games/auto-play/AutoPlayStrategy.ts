/**
 * Auto-play strategies for the Tile Blast Engine.
 *
 * Provides:
 *   - AutoPlayStrategy interface: chooseMove(engine, rng)
 *   - RandomStrategy: uniformly random playable group
 *   - LargestGroupStrategy: the biggest playable group
 *   - enumerateGroups: every playable group on the board
 */

import type { PipelineOrchestrator } from '../../src/core-engine/PipelineOrchestrator';
import type { Position, Tile } from '../../src/tile-system/Tile';

// ── Strategy interface ──────────────────────────────────────

/**
 * A strategy picks the cell to tap next.
 */
export interface AutoPlayStrategy {
  /** Human-readable strategy name. */
  readonly name: string;

  /**
   * Choose a cell whose group is playable.
   *
   * @returns The cell to tap, or `null` if no group is playable.
   */
  chooseMove(engine: PipelineOrchestrator, rng: () => number): Position | null;
}

/**
 * Every playable group on the board, each listed once, in row-major
 * order of its first cell.
 */
export function enumerateGroups(engine: PipelineOrchestrator): Tile[][] {
  const seen = new Set<Tile>();
  const groups: Tile[][] = [];

  engine.grid.forEach((tile, x, y) => {
    if (seen.has(tile)) return;
    const group = engine.evaluateMove(x, y);
    if (group === null) {
      seen.add(tile);
      return;
    }
    for (const member of group) seen.add(member);
    groups.push(group);
  });

  return groups;
}

// ── RandomStrategy ──────────────────────────────────────────

/**
 * Taps a uniformly random playable group.
 */
export const RandomStrategy: AutoPlayStrategy = {
  name: 'random',

  chooseMove(engine: PipelineOrchestrator, rng: () => number): Position | null {
    const groups = enumerateGroups(engine);
    if (groups.length === 0) return null;
    const group = groups[Math.floor(rng() * groups.length)];
    return group[0].position();
  },
};

// ── LargestGroupStrategy ────────────────────────────────────

/**
 * Taps the largest playable group. Ties are broken randomly.
 */
export const LargestGroupStrategy: AutoPlayStrategy = {
  name: 'largest-group',

  chooseMove(engine: PipelineOrchestrator, rng: () => number): Position | null {
    const groups = enumerateGroups(engine);
    if (groups.length === 0) return null;

    const maxSize = Math.max(...groups.map((g) => g.length));
    const best = groups.filter((g) => g.length === maxSize);
    const chosen = best[Math.floor(rng() * best.length)];
    return chosen[0].position();
  },
};

/** Strategies by name, for command-line selection. */
export const STRATEGIES: Readonly<Record<string, AutoPlayStrategy>> = {
  [RandomStrategy.name]: RandomStrategy,
  [LargestGroupStrategy.name]: LargestGroupStrategy,
};

/** Look up a strategy by name. Inherited object keys never match. */
export function findStrategy(name: string): AutoPlayStrategy | undefined {
  return Object.hasOwn(STRATEGIES, name) ? STRATEGIES[name] : undefined;
}
