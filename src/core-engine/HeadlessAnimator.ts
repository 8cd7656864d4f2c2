/**
 * An animation layer with no visuals.
 *
 * Plays the role a renderer would: it answers every `blast-started`
 * with `animation-complete` and settles the tiles listed in
 * `gravity-complete` and `shuffle-complete` back to `idle`. Each reply
 * is deferred (by default to the next microtask), the way a real
 * effect finishes after the notification that started it.
 *
 * Used by tests, the simulation script, and any headless consumer.
 */

import type { Tile } from '@tile-system/Tile';
import type { EngineEventEmitter } from './EngineEventEmitter';

export interface HeadlessAnimatorOptions {
  /** Schedules each reply. Defaults to `queueMicrotask`. */
  defer?: (task: () => void) => void;
}

export class HeadlessAnimator {
  private readonly unsubs: Array<() => void> = [];
  private readonly defer: (task: () => void) => void;

  constructor(
    private readonly events: EngineEventEmitter,
    options: HeadlessAnimatorOptions = {},
  ) {
    this.defer = options.defer ?? ((task) => queueMicrotask(task));

    this.unsubs.push(
      this.events.on('blast-started', ({ moveNumber }) => {
        this.defer(() =>
          this.events.emit('animation-complete', { animation: 'blast', moveNumber }),
        );
      }),
      this.events.on('gravity-complete', ({ fell, spawned }) => {
        const tiles = [...fell, ...spawned].map((move) => move.tile);
        this.defer(() => settle(tiles));
      }),
      this.events.on('shuffle-complete', ({ mapping }) => {
        const tiles = [...mapping.keys()];
        this.defer(() => settle(tiles));
      }),
    );
  }

  /** Stop responding to engine events. */
  detach(): void {
    for (const unsub of this.unsubs) {
      unsub();
    }
    this.unsubs.length = 0;
  }
}

function settle(tiles: readonly Tile[]): void {
  for (const tile of tiles) {
    if (tile.state !== 'idle') tile.setState('idle');
  }
}
