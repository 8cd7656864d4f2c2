/**
 * AnimationChannel backed by the engine's event emitter.
 *
 * `playBlast` announces `blast-started` and waits for the animation
 * layer's `animation-complete` for the current move (a reply without
 * a move number counts as the current one); `awaitSettled` waits for the tiles'
 * state changes back to `idle`. Neither has a timeout.
 */

import type { AnimationChannel } from '@rule-engine/AnimationChannel';
import type { Tile } from '@tile-system/Tile';
import type { EngineEventEmitter } from './EngineEventEmitter';

export class EventAnimationChannel implements AnimationChannel {
  constructor(
    private readonly events: EngineEventEmitter,
    private readonly moveNumber: () => number,
  ) {}

  playBlast(tiles: readonly Tile[]): Promise<void> {
    const move = this.moveNumber();
    return new Promise<void>((resolve) => {
      // Subscribe before announcing so a synchronous reply is not lost
      this.events.onceWhere(
        'animation-complete',
        ({ animation, moveNumber }) =>
          animation === 'blast' && (moveNumber === undefined || moveNumber === move),
        () => resolve(),
      );
      this.events.emit('blast-started', { moveNumber: move, tiles });
    });
  }

  awaitSettled(tiles: readonly Tile[]): Promise<void> {
    const pending = new Set(tiles.filter((t) => t.state !== 'idle'));
    if (pending.size === 0) return Promise.resolve();

    return new Promise<void>((resolve) => {
      const unsubscribe = this.events.on('tile-state-changed', ({ tile, to }) => {
        if (to !== 'idle' || !pending.delete(tile)) return;
        if (pending.size === 0) {
          unsubscribe();
          resolve();
        }
      });
    });
  }
}
