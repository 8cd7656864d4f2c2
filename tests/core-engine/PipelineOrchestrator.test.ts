import { describe, it, expect, vi, afterEach } from 'vitest';
import { createEngineConfig } from '../../src/core-engine/EngineConfig';
import type { EngineEventName } from '../../src/core-engine/EngineEventEmitter';
import { HeadlessAnimator } from '../../src/core-engine/HeadlessAnimator';
import {
  PipelineOrchestrator,
  type PipelineOrchestratorOptions,
} from '../../src/core-engine/PipelineOrchestrator';
import type { PipelinePhase } from '../../src/core-engine/PipelinePhase';
import type { Rng } from '../../src/rule-engine/Random';
import { createPalette, type Palette } from '../../src/tile-system/Palette';
import { countColors } from '../../src/tile-system/Snapshot';
import { BLUE, RED, TEST_COLORS, sequenceRng, testPalette } from '../helpers/board';

afterEach(() => {
  vi.restoreAllMocks();
});

// Bottom row first. Tapping (0,0) blasts (0,0), (1,0) and (1,1).
const LAYOUT = [
  [RED, RED, BLUE],
  [BLUE, RED, BLUE],
  [BLUE, BLUE, RED],
];

function createEngine(
  layout: number[][],
  rng: Rng,
  palette: Palette = testPalette(),
  options: PipelineOrchestratorOptions = {},
) {
  const config = createEngineConfig({
    columns: layout[0].length,
    rows: layout.length,
    palette,
    layout,
  });
  const engine = new PipelineOrchestrator(config, { rng, ...options });
  const animator = new HeadlessAnimator(engine.events);
  engine.initialize();
  return { engine, animator };
}

function recordPhases(engine: PipelineOrchestrator): PipelinePhase[] {
  const phases: PipelinePhase[] = [];
  engine.events.on('phase-changed', ({ to }) => phases.push(to));
  return phases;
}

describe('PipelineOrchestrator', () => {
  describe('initialize', () => {
    it('fills the board from the layout with idle tiles and metadata', () => {
      const { engine } = createEngine(LAYOUT, () => 0);

      expect(engine.snapshot()).toEqual(LAYOUT);
      expect(engine.phase).toBe('idle');
      expect(engine.isProcessing).toBe(false);
      expect(engine.moveNumber).toBe(0);
      expect(engine.grid.get(0, 0)?.groupSize).toBe(3);
      engine.grid.forEach((tile) => expect(tile.state).toBe('idle'));
    });

    it('fills the same random board for the same seed', () => {
      const config = createEngineConfig({ columns: 5, rows: 5, palette: testPalette(), seed: 42 });
      const a = new PipelineOrchestrator(config);
      const b = new PipelineOrchestrator(config);
      a.initialize();
      b.initialize();
      expect(a.snapshot()).toEqual(b.snapshot());
    });

    it('throws when called twice', () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      expect(() => engine.initialize()).toThrow('PipelineOrchestrator is already initialized');
    });
  });

  describe('evaluateMove', () => {
    it('returns the group a tap would blast', () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const group = engine.evaluateMove(1, 1) ?? [];
      expect(group.map((t) => `${t.x},${t.y}`).sort()).toEqual(['0,0', '1,0', '1,1']);
    });

    it('returns null for singletons, empty cells and busy tiles', () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      expect(engine.evaluateMove(2, 2)).toBeNull();
      expect(engine.evaluateMove(9, 9)).toBeNull();
      engine.grid.get(0, 0)?.setState('falling');
      expect(engine.evaluateMove(0, 0)).toBeNull();
    });
  });

  describe('a move without deadlock', () => {
    it('blasts, drops, refills and settles', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const phases = recordPhases(engine);
      const settled = vi.fn();
      engine.events.on('state-settled', settled);

      await expect(engine.tap(0, 0)).resolves.toBe(true);

      expect(engine.snapshot()).toEqual([
        [BLUE, BLUE, BLUE],
        [BLUE, RED, BLUE],
        [RED, RED, RED],
      ]);
      expect(phases).toEqual(['blasting', 'gravity', 'resolving', 'idle']);
      expect(settled).toHaveBeenCalledWith({ moveNumber: 1, shuffled: false, deadlocked: false });
      expect(engine.moveNumber).toBe(1);
      expect(engine.isProcessing).toBe(false);
      engine.grid.forEach((tile) => expect(tile.state).toBe('idle'));
    });

    it('refreshes group metadata after the board settles', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      await engine.tap(0, 0);

      expect(engine.grid.get(0, 0)?.groupSize).toBe(5);
      expect(engine.grid.get(0, 0)?.iconTier).toBe('first');
      expect(engine.grid.get(1, 1)?.groupSize).toBe(4);
      expect(engine.grid.get(1, 1)?.iconTier).toBe('default');
    });

    it('reports blast and gravity results', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const blastComplete = vi.fn();
      const gravityComplete = vi.fn();
      engine.events.on('blast-complete', blastComplete);
      engine.events.on('gravity-complete', ({ moveNumber, fell, spawned }) =>
        gravityComplete(moveNumber, fell.length, spawned.length),
      );

      await engine.tap(0, 0);

      expect(blastComplete).toHaveBeenCalledOnce();
      const [{ removed }] = blastComplete.mock.calls[0];
      expect(removed).toHaveLength(3);
      expect(gravityComplete).toHaveBeenCalledWith(1, 3, 3);
    });

    it('emits events in pipeline order', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const order: EngineEventName[] = [];
      const names: EngineEventName[] = [
        'phase-changed',
        'blast-started',
        'animation-complete',
        'blast-complete',
        'gravity-complete',
        'deadlock-detected',
        'shuffle-complete',
        'state-settled',
      ];
      for (const name of names) {
        engine.events.on(name, () => order.push(name));
      }

      await engine.tap(0, 0);

      expect(order).toEqual([
        'phase-changed',
        'blast-started',
        'animation-complete',
        'blast-complete',
        'phase-changed',
        'gravity-complete',
        'phase-changed',
        'phase-changed',
        'state-settled',
      ]);
    });
  });

  describe('rejections', () => {
    it('rejects taps while a move is in flight', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const rejected = vi.fn();
      engine.events.on('move-rejected', rejected);

      const first = engine.tap(0, 0);
      expect(engine.isProcessing).toBe(true);
      await expect(engine.tap(2, 0)).resolves.toBe(false);
      expect(rejected).toHaveBeenCalledWith({ reason: 'processing', x: 2, y: 0 });

      await expect(first).resolves.toBe(true);
      expect(engine.moveNumber).toBe(1);
    });

    it('rejects blast requests while a move is in flight', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const rejected = vi.fn();
      engine.events.on('move-rejected', rejected);
      const group = engine.evaluateMove(2, 0);

      const first = engine.tap(0, 0);
      await expect(engine.requestBlast(group)).resolves.toBe(false);
      expect(rejected).toHaveBeenCalledWith({ reason: 'processing', groupSize: 2 });
      await first;
    });

    it('rejects taps on singletons with the component size', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const rejected = vi.fn();
      engine.events.on('move-rejected', rejected);

      await expect(engine.tap(2, 2)).resolves.toBe(false);
      expect(rejected).toHaveBeenCalledWith({ reason: 'invalid-group', x: 2, y: 2, groupSize: 1 });
      expect(engine.moveNumber).toBe(0);
      expect(engine.snapshot()).toEqual(LAYOUT);
    });

    it('rejects taps on empty cells and busy tiles', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const rejected = vi.fn();
      engine.events.on('move-rejected', rejected);

      await engine.tap(7, 0);
      engine.grid.get(0, 1)?.setState('falling');
      await engine.tap(0, 1);

      expect(rejected).toHaveBeenNthCalledWith(1, { reason: 'empty-cell', x: 7, y: 0 });
      expect(rejected).toHaveBeenNthCalledWith(2, { reason: 'not-interactive', x: 0, y: 1 });
    });

    it('rejects empty and partial groups', async () => {
      const { engine } = createEngine(LAYOUT, () => 0);
      const rejected = vi.fn();
      engine.events.on('move-rejected', rejected);
      const group = engine.evaluateMove(0, 0) ?? [];

      await expect(engine.requestBlast(null)).resolves.toBe(false);
      await expect(engine.requestBlast([])).resolves.toBe(false);
      await expect(engine.requestBlast(group.slice(0, 2))).resolves.toBe(false);

      expect(rejected.mock.calls.map(([p]) => p)).toEqual([
        { reason: 'invalid-group', groupSize: 0 },
        { reason: 'invalid-group', groupSize: 0 },
        { reason: 'invalid-group', groupSize: 2 },
      ]);
      expect(engine.phase).toBe('idle');
    });
  });

  describe('deadlock handling', () => {
    const twoColors = createPalette({ colors: TEST_COLORS.slice(0, 2) });

    it('shuffles a board left without moves', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      // Refill draws blue then red, leaving blue, red, blue, red
      const { engine } = createEngine(
        [[RED, RED, BLUE, RED]],
        sequenceRng([0.75, 0.25, 0.6, 0.1, 0.9, 0.3, 0.45]),
        twoColors,
      );
      const phases = recordPhases(engine);
      const deadlock = vi.fn();
      const shuffle = vi.fn();
      const settled = vi.fn();
      const fix = vi.fn();
      engine.events.on('deadlock-detected', deadlock);
      engine.events.on('shuffle-complete', ({ guaranteed, shortfall }) =>
        shuffle(guaranteed.length, shortfall),
      );
      engine.events.on('state-settled', settled);
      engine.events.on('emergency-fix-applied', fix);

      await expect(engine.tap(0, 0)).resolves.toBe(true);

      expect(phases).toEqual(['blasting', 'gravity', 'resolving', 'shuffling', 'idle']);
      expect(deadlock).toHaveBeenCalledWith({ moveNumber: 1 });
      expect(shuffle).toHaveBeenCalledWith(1, 0);
      expect(fix).not.toHaveBeenCalled();
      expect(settled).toHaveBeenCalledWith({ moveNumber: 1, shuffled: true, deadlocked: false });
      expect(engine.isDeadlocked()).toBe(false);
      expect(countColors(engine.grid)).toEqual(new Map([[BLUE, 2], [RED, 2]]));
      expect(console.warn).toHaveBeenCalledWith(
        '[PipelineOrchestrator] Deadlock after move 1, shuffling',
      );
    });

    it('recolors a tile when shuffling cannot help', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      // Refill draws green then red, leaving three distinct colors
      const { engine } = createEngine([[RED, RED, BLUE]], sequenceRng([0.9, 0.1, 0.5, 0.2]));
      const fixes = vi.fn();
      const settled = vi.fn();
      engine.events.on('emergency-fix-applied', ({ fix }) => fixes(fix.recolored.length));
      engine.events.on('state-settled', settled);

      await expect(engine.tap(1, 0)).resolves.toBe(true);

      expect(fixes).toHaveBeenCalledWith(1);
      expect(settled).toHaveBeenCalledWith({ moveNumber: 1, shuffled: true, deadlocked: false });
      const [row] = engine.snapshot();
      expect(row[0]).toBe(row[1]);
      expect(engine.isDeadlocked()).toBe(false);
    });
  });

  describe('failures', () => {
    it('returns to idle and rethrows when a phase fails', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const failure = new Error('renderer gone');
      const config = createEngineConfig({
        columns: 3,
        rows: 3,
        palette: testPalette(),
        layout: LAYOUT,
      });
      const engine = new PipelineOrchestrator(config, {
        rng: () => 0,
        channel: {
          playBlast: () => Promise.reject(failure),
          awaitSettled: () => Promise.resolve(),
        },
      });
      engine.initialize();

      await expect(engine.tap(0, 0)).rejects.toBe(failure);
      expect(engine.phase).toBe('idle');
      expect(error).toHaveBeenCalledWith('[PipelineOrchestrator] Move 1 failed:', failure);
    });
  });
});
