import { describe, it, expect } from 'vitest';
import { DeadlockChecker } from '../../src/rule-engine/DeadlockChecker';
import { GroupDetector } from '../../src/rule-engine/GroupDetector';
import { BLUE, GREEN, RED, buildBoard, checkerboard, testPalette } from '../helpers/board';

function checkerFor(layout: number[][], minGroupSize = 2) {
  const { grid, palette } = buildBoard(layout, testPalette(minGroupSize));
  return { grid, checker: new DeadlockChecker(grid, new GroupDetector(grid, palette)) };
}

describe('DeadlockChecker', () => {
  it('a single-color board is not deadlocked', () => {
    const { checker } = checkerFor([
      [RED, RED, RED],
      [RED, RED, RED],
    ]);
    expect(checker.isDeadlocked()).toBe(false);
  });

  it('a checkerboard is deadlocked', () => {
    const { checker } = checkerFor(checkerboard(4, 4));
    expect(checker.isDeadlocked()).toBe(true);
    expect(checker.findAnyGroup()).toBeNull();
  });

  it('finds the first group in row-major order', () => {
    const { grid, checker } = checkerFor([
      [RED, BLUE, GREEN],
      [GREEN, GREEN, RED],
    ]);
    const group = checker.findAnyGroup();
    expect(group).toHaveLength(2);
    expect(group).toContain(grid.get(0, 1));
    expect(group).toContain(grid.get(1, 1));
  });

  it('respects the minimum group size', () => {
    const layout = [[RED, RED, BLUE, BLUE]];
    expect(checkerFor(layout, 2).checker.isDeadlocked()).toBe(false);
    expect(checkerFor(layout, 3).checker.isDeadlocked()).toBe(true);
  });

  it('ignores tiles that are not idle', () => {
    const { grid, checker } = checkerFor([[RED, RED]]);
    grid.get(1, 0)?.setState('falling');
    expect(checker.isDeadlocked()).toBe(true);
  });

  it('treats an empty board as deadlocked', () => {
    const { grid, checker } = checkerFor([[RED, RED]]);
    grid.clearAll();
    expect(checker.isDeadlocked()).toBe(true);
  });
});
