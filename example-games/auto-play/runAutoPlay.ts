/**
 * Headless auto-play for the Tile Blast Engine.
 *
 * Builds an engine with a {@link HeadlessAnimator} standing in for the
 * animation layer, then lets a strategy play a fixed number of moves,
 * collecting statistics from the engine's events.
 */

import { createEngineConfig } from '../../src/core-engine/EngineConfig';
import { HeadlessAnimator } from '../../src/core-engine/HeadlessAnimator';
import { PipelineOrchestrator } from '../../src/core-engine/PipelineOrchestrator';
import { createSeededRng } from '../../src/rule-engine/Random';
import { createPalette, type ColorDefinition } from '../../src/tile-system/Palette';
import type { BoardSnapshot } from '../../src/tile-system/Snapshot';
import { LargestGroupStrategy, type AutoPlayStrategy } from './AutoPlayStrategy';

/** Color names used when building a palette by count. */
export const COLOR_NAMES = ['red', 'blue', 'green', 'yellow', 'purple', 'pink'] as const;

export interface AutoPlayOptions {
  /** Seed for both the board and the strategy. */
  seed: number;
  /** Number of moves to attempt. */
  moves: number;
  /** Defaults to 8. */
  columns?: number;
  /** Defaults to 8. */
  rows?: number;
  /** Number of palette colors, 1-6. Defaults to 4. */
  colorCount?: number;
  /** Defaults to 2. */
  minGroupSize?: number;
  /** Defaults to 1. */
  guaranteedColorCount?: number;
  /** Defaults to {@link LargestGroupStrategy}. */
  strategy?: AutoPlayStrategy;
}

export interface AutoPlaySummary {
  seed: number;
  strategy: string;
  movesPlayed: number;
  tilesBlasted: number;
  largestGroup: number;
  shuffles: number;
  emergencyFixes: number;
  /** Total guaranteed colors that shuffles failed to place. */
  shuffleShortfall: number;
  /** Moves that ended with the board still deadlocked. */
  unresolvedDeadlocks: number;
  finalBoard: BoardSnapshot;
}

/**
 * Build a palette of the first `count` named colors.
 * @throws If `count` is outside [1, 6].
 */
export function paletteColors(count: number): ColorDefinition[] {
  if (!Number.isInteger(count) || count < 1 || count > COLOR_NAMES.length) {
    throw new Error(
      `colorCount must be an integer in [1, ${COLOR_NAMES.length}], got ${count}`,
    );
  }
  return COLOR_NAMES.slice(0, count).map((name, id) => ({ id, name }));
}

/**
 * Play `moves` moves headlessly and summarize what happened.
 * Stops early if no group is playable.
 */
export async function runAutoPlay(options: AutoPlayOptions): Promise<AutoPlaySummary> {
  const {
    seed,
    moves,
    columns = 8,
    rows = 8,
    colorCount = 4,
    minGroupSize = 2,
    guaranteedColorCount = 1,
    strategy = LargestGroupStrategy,
  } = options;

  const config = createEngineConfig({
    columns,
    rows,
    palette: createPalette({ colors: paletteColors(colorCount), minGroupSize }),
    guaranteedColorCount,
    seed,
  });
  const engine = new PipelineOrchestrator(config);
  const animator = new HeadlessAnimator(engine.events);
  const strategyRng = createSeededRng(seed + 1);

  const summary: AutoPlaySummary = {
    seed,
    strategy: strategy.name,
    movesPlayed: 0,
    tilesBlasted: 0,
    largestGroup: 0,
    shuffles: 0,
    emergencyFixes: 0,
    shuffleShortfall: 0,
    unresolvedDeadlocks: 0,
    finalBoard: [],
  };

  engine.events.on('blast-complete', ({ removed }) => {
    summary.tilesBlasted += removed.length;
    summary.largestGroup = Math.max(summary.largestGroup, removed.length);
  });
  engine.events.on('shuffle-complete', ({ shortfall }) => {
    summary.shuffles++;
    summary.shuffleShortfall += shortfall;
  });
  engine.events.on('emergency-fix-applied', () => {
    summary.emergencyFixes++;
  });
  engine.events.on('state-settled', ({ deadlocked }) => {
    if (deadlocked) summary.unresolvedDeadlocks++;
  });

  try {
    engine.initialize();
    for (let i = 0; i < moves; i++) {
      const target = strategy.chooseMove(engine, strategyRng);
      if (target === null) break;
      if (await engine.tap(target.x, target.y)) {
        summary.movesPlayed++;
      }
    }
  } finally {
    animator.detach();
  }

  summary.finalBoard = engine.snapshot();
  return summary;
}
