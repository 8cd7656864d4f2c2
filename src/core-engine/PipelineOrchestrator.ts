/**
 * Pipeline Orchestrator for the Tile Blast Engine.
 *
 * Owns the board, the resolvers and the processing lock, and drives
 * one move through its phases:
 *
 *   blast -> gravity -> metadata refresh + deadlock check -> [shuffle]
 *
 * Each phase mutates the grid, announces the result, and waits for the
 * animation layer before the next phase starts. While a move is in
 * flight, new requests are rejected (not queued) and reported with
 * `move-rejected`.
 */

import { fillGrid } from '@tile-system/BoardFill';
import { Grid } from '@tile-system/Grid';
import { snapshotBoard, type BoardSnapshot } from '@tile-system/Snapshot';
import type { Tile } from '@tile-system/Tile';
import { TileFactory } from '@tile-system/TileFactory';
import type { AnimationChannel } from '@rule-engine/AnimationChannel';
import { BlastResolver, InvalidGroupError } from '@rule-engine/BlastResolver';
import { DeadlockChecker } from '@rule-engine/DeadlockChecker';
import { GravityResolver } from '@rule-engine/GravityResolver';
import { GroupDetector } from '@rule-engine/GroupDetector';
import { createSeededRng, type Rng } from '@rule-engine/Random';
import { ShuffleResolver } from '@rule-engine/ShuffleResolver';
import type { EngineConfig } from './EngineConfig';
import {
  EngineEventEmitter,
  type MoveRejectedPayload,
} from './EngineEventEmitter';
import { EventAnimationChannel } from './EventAnimationChannel';
import {
  assertPhaseTransition,
  isProcessingPhase,
  type PipelinePhase,
} from './PipelinePhase';

export interface PipelineOrchestratorOptions {
  /** Event emitter to publish on. A new one is created by default. */
  events?: EngineEventEmitter;
  /** Defaults to an {@link EventAnimationChannel} on `events`. */
  channel?: AnimationChannel;
  /** Overrides the randomness derived from `config.seed`. */
  rng?: Rng;
}

export class PipelineOrchestrator {
  readonly config: EngineConfig;
  readonly events: EngineEventEmitter;
  readonly grid: Grid;

  private readonly rng: Rng;
  private readonly channel: AnimationChannel;
  private readonly factory: TileFactory;
  private readonly detector: GroupDetector;
  private readonly deadlock: DeadlockChecker;
  private readonly blaster: BlastResolver;
  private readonly gravity: GravityResolver;
  private readonly shuffler: ShuffleResolver;

  private currentPhase: PipelinePhase = 'idle';
  private moves = 0;
  private initialized = false;

  constructor(config: EngineConfig, options: PipelineOrchestratorOptions = {}) {
    this.config = config;
    this.events = options.events ?? new EngineEventEmitter();
    this.rng =
      options.rng ??
      (config.seed !== undefined ? createSeededRng(config.seed) : Math.random);
    this.channel =
      options.channel ?? new EventAnimationChannel(this.events, () => this.moves);

    this.grid = new Grid(config.columns, config.rows);
    this.factory = new TileFactory((tile, from, to) =>
      this.events.emit('tile-state-changed', { tile, from, to }),
    );

    const { palette } = config;
    this.detector = new GroupDetector(this.grid, palette);
    this.deadlock = new DeadlockChecker(this.grid, this.detector);
    this.blaster = new BlastResolver(this.grid, palette, this.detector, this.channel);
    this.gravity = new GravityResolver(this.grid, palette, this.factory, this.rng);
    this.shuffler = new ShuffleResolver(this.grid, palette, this.rng);
  }

  // ── State ───────────────────────────────────────────────

  get phase(): PipelinePhase {
    return this.currentPhase;
  }

  /** Whether a move is in flight. */
  get isProcessing(): boolean {
    return isProcessingPhase(this.currentPhase);
  }

  /** Number of moves accepted so far. */
  get moveNumber(): number {
    return this.moves;
  }

  /**
   * Fill the board from `config.layout`, or at random, and compute
   * group metadata.
   *
   * @throws If called twice.
   */
  initialize(): void {
    if (this.initialized) {
      throw new Error('PipelineOrchestrator is already initialized');
    }
    fillGrid(this.grid, this.factory, this.config.palette, this.rng, this.config.layout);
    this.detector.refreshAllGroupMetadata();
    this.initialized = true;
  }

  // ── Queries ─────────────────────────────────────────────

  /**
   * The group a tap at (x, y) would blast, or `null`. Read-only.
   */
  evaluateMove(x: number, y: number): Tile[] | null {
    const tile = this.grid.get(x, y);
    if (tile === undefined || !tile.canInteract()) return null;
    return this.detector.findGroup(x, y);
  }

  isDeadlocked(): boolean {
    return this.deadlock.isDeadlocked();
  }

  snapshot(): BoardSnapshot {
    return snapshotBoard(this.grid);
  }

  // ── Moves ───────────────────────────────────────────────

  /**
   * Handle a tap on (x, y): evaluate the group there and blast it.
   *
   * @returns `true` once the move's full cycle has completed, `false`
   *          if the tap was rejected.
   */
  async tap(x: number, y: number): Promise<boolean> {
    if (this.isProcessing) {
      this.reject({ reason: 'processing', x, y });
      return false;
    }

    const tile = this.grid.get(x, y);
    if (tile === undefined) {
      this.reject({ reason: 'empty-cell', x, y });
      return false;
    }
    if (!tile.canInteract()) {
      this.reject({ reason: 'not-interactive', x, y });
      return false;
    }

    const group = this.detector.findGroup(x, y);
    if (group === null) {
      const size = this.detector.findComponent(x, y)?.length ?? 0;
      this.reject({ reason: 'invalid-group', x, y, groupSize: size });
      return false;
    }

    return this.requestBlast(group);
  }

  /**
   * Blast a group and run the rest of the pipeline.
   *
   * Silently ignored (resolves `false`, emits `move-rejected`) when a
   * move is already in flight or the group is not a valid group.
   */
  async requestBlast(group: readonly Tile[] | null): Promise<boolean> {
    if (this.isProcessing) {
      this.reject({ reason: 'processing', groupSize: group?.length });
      return false;
    }

    try {
      this.blaster.validate(group);
    } catch (e) {
      if (e instanceof InvalidGroupError) {
        this.reject({ reason: 'invalid-group', groupSize: group?.length ?? 0 });
        return false;
      }
      throw e;
    }

    this.moves++;
    try {
      await this.runCycle(group);
    } catch (e) {
      console.error(`[PipelineOrchestrator] Move ${this.moves} failed:`, e);
      this.currentPhase = 'idle';
      throw e;
    }
    return true;
  }

  // ── Pipeline ────────────────────────────────────────────

  private async runCycle(group: readonly Tile[]): Promise<void> {
    const moveNumber = this.moves;

    this.transition('blasting');
    const removed = await this.blaster.blast(group);
    this.events.emit('blast-complete', { moveNumber, removed });

    this.transition('gravity');
    const { fell, spawned } = this.gravity.applyGravityAndRefill();
    this.events.emit('gravity-complete', { moveNumber, fell, spawned });
    await this.channel.awaitSettled([...fell, ...spawned].map((move) => move.tile));

    this.transition('resolving');
    this.detector.refreshAllGroupMetadata();
    if (!this.deadlock.isDeadlocked()) {
      this.finish(moveNumber, false, false);
      return;
    }

    console.warn(`[PipelineOrchestrator] Deadlock after move ${moveNumber}, shuffling`);
    this.events.emit('deadlock-detected', { moveNumber });
    this.transition('shuffling');

    const result = this.shuffler.shuffle(this.config.guaranteedColorCount);
    this.events.emit('shuffle-complete', {
      moveNumber,
      mapping: result.mapping,
      guaranteed: result.guaranteed,
      shortfall: result.shortfall,
    });
    await this.channel.awaitSettled([...result.mapping.keys()]);

    let deadlocked = this.deadlock.isDeadlocked();
    if (deadlocked) {
      const fix = this.shuffler.applyEmergencyFix();
      if (fix !== null) {
        this.events.emit('emergency-fix-applied', { moveNumber, fix });
      }
      deadlocked = this.deadlock.isDeadlocked();
      if (deadlocked) {
        console.error(
          `[PipelineOrchestrator] Board is still deadlocked after shuffle and emergency fix (move ${moveNumber})`,
        );
      }
    }

    this.detector.refreshAllGroupMetadata();
    this.finish(moveNumber, true, deadlocked);
  }

  private finish(moveNumber: number, shuffled: boolean, deadlocked: boolean): void {
    this.transition('idle');
    this.events.emit('state-settled', { moveNumber, shuffled, deadlocked });
  }

  private transition(next: PipelinePhase): void {
    const from = this.currentPhase;
    assertPhaseTransition(from, next);
    this.currentPhase = next;
    this.events.emit('phase-changed', { moveNumber: this.moves, from, to: next });
  }

  private reject(payload: MoveRejectedPayload): void {
    this.events.emit('move-rejected', payload);
  }
}
