/**
 * Removes a validated group from the board.
 *
 * Members move to `blasting` first so the animation layer can start
 * its removal effect; their slots are cleared only after the channel
 * reports the effect finished.
 */

import type { Grid } from '@tile-system/Grid';
import type { Palette } from '@tile-system/Palette';
import type { Position, Tile } from '@tile-system/Tile';
import type { AnimationChannel } from './AnimationChannel';
import type { GroupDetector } from './GroupDetector';

export type InvalidGroupReason =
  | 'empty'
  | 'too-small'
  | 'not-groupable'
  | 'not-on-board'
  | 'not-a-group';

/**
 * Thrown for a group that may not be blasted. No board state changes
 * when this is thrown.
 */
export class InvalidGroupError extends Error {
  readonly reason: InvalidGroupReason;

  constructor(reason: InvalidGroupReason, message: string) {
    super(message);
    this.name = 'InvalidGroupError';
    this.reason = reason;
  }
}

export class BlastResolver {
  constructor(
    private readonly grid: Grid,
    private readonly palette: Palette,
    private readonly detector: GroupDetector,
    private readonly channel: AnimationChannel,
  ) {}

  /**
   * @throws InvalidGroupError If the group is empty, smaller than the
   *         minimum, holds a tile that is not idle or not in its slot,
   *         or is not exactly one maximal connected group.
   */
  validate(group: readonly Tile[] | null | undefined): asserts group is readonly Tile[] {
    if (!group || group.length === 0) {
      throw new InvalidGroupError('empty', 'Cannot blast an empty group');
    }
    if (group.length < this.palette.minGroupSize) {
      throw new InvalidGroupError(
        'too-small',
        `Group of ${group.length} is below the minimum size of ${this.palette.minGroupSize}`,
      );
    }
    for (const tile of group) {
      if (!tile.canBeGrouped()) {
        throw new InvalidGroupError(
          'not-groupable',
          `Tile ${tile.id} at (${tile.x},${tile.y}) is ${tile.state} and cannot be blasted`,
        );
      }
      if (this.grid.get(tile.x, tile.y) !== tile) {
        throw new InvalidGroupError(
          'not-on-board',
          `Tile ${tile.id} is not in slot (${tile.x},${tile.y})`,
        );
      }
    }

    const first = group[0];
    const component = this.detector.findComponent(first.x, first.y) ?? [];
    const members = new Set(group);
    if (
      members.size !== group.length ||
      component.length !== members.size ||
      !component.every((tile) => members.has(tile))
    ) {
      throw new InvalidGroupError(
        'not-a-group',
        `Tiles do not form the connected group at (${first.x},${first.y})`,
      );
    }
  }

  /**
   * Blast a group and clear its slots once the removal effect ends.
   *
   * @returns The positions that were cleared.
   * @throws InvalidGroupError See {@link validate}.
   */
  async blast(group: readonly Tile[] | null | undefined): Promise<Position[]> {
    this.validate(group);
    const members = [...group];

    for (const tile of members) {
      tile.setState('blasting');
    }

    await this.channel.playBlast(members);

    const cleared: Position[] = [];
    for (const tile of members) {
      if (this.grid.get(tile.x, tile.y) === tile) {
        this.grid.clear(tile.x, tile.y);
      }
      tile.bind(null);
      cleared.push(tile.position());
    }
    return cleared;
  }
}
