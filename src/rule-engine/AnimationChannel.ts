/**
 * The resolvers' view of the animation layer.
 *
 * The core never assumes an animation duration. It asks the channel to
 * play an effect and waits, without timeout, until the animation layer
 * reports completion.
 */

import type { Tile } from '@tile-system/Tile';

export interface AnimationChannel {
  /**
   * Start the removal effect for a blasting group.
   * Resolves once the animation layer reports it finished.
   */
  playBlast(tiles: readonly Tile[]): Promise<void>;

  /**
   * Resolves once every given tile is back in the `idle` state.
   * Resolves immediately when they already are.
   */
  awaitSettled(tiles: readonly Tile[]): Promise<void>;
}

/**
 * A channel with no visual layer: blasts finish at once and tiles are
 * settled by the caller. Useful for synchronous resolver tests.
 */
export const IMMEDIATE_CHANNEL: AnimationChannel = {
  playBlast: () => Promise.resolve(),
  awaitSettled: () => Promise.resolve(),
};
