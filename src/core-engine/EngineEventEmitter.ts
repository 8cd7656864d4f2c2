/**
 * Typed Event Emitter for the Tile Blast Engine.
 *
 * Provides a type-safe, zero-dependency event emitter for pipeline
 * and tile lifecycle events. Works in both Node.js (headless) and
 * browser environments without any renderer dependency.
 *
 * The pipeline emits these events at each phase boundary. The
 * animation layer subscribes to drive visuals and reports back through
 * `animation-complete` and tile state changes.
 */

import type { Position, Tile, TileState } from '@tile-system/Tile';
import type { TileMove } from '@rule-engine/GravityResolver';
import type {
  EmergencyFix,
  GuaranteedCluster,
} from '@rule-engine/ShuffleResolver';
import type { PipelinePhase } from './PipelinePhase';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted for every tile lifecycle transition.
 */
export interface TileStateChangedPayload {
  readonly tile: Tile;
  readonly from: TileState;
  readonly to: TileState;
}

/**
 * Emitted whenever the pipeline moves to a new phase.
 */
export interface PhaseChangedPayload {
  /** Number of the move being processed (1-based; 0 before any move). */
  readonly moveNumber: number;
  readonly from: PipelinePhase;
  readonly to: PipelinePhase;
}

/**
 * Emitted when a group starts its removal effect. The animation layer
 * answers with `animation-complete` once the effect ends.
 */
export interface BlastStartedPayload {
  readonly moveNumber: number;
  readonly tiles: readonly Tile[];
}

/**
 * Sent by the animation layer when an effect the core waits on ends.
 */
export interface AnimationCompletePayload {
  readonly animation: 'blast';
  /** The move the animation relates to, when known. */
  readonly moveNumber?: number;
}

/**
 * Emitted once a blasted group's slots have been cleared.
 */
export interface BlastCompletePayload {
  readonly moveNumber: number;
  readonly removed: readonly Position[];
}

/**
 * Emitted after gravity and refill have been applied to the board.
 * Every listed tile is `falling` or `spawning` until the animation
 * layer settles it.
 */
export interface GravityCompletePayload {
  readonly moveNumber: number;
  readonly fell: readonly TileMove[];
  readonly spawned: readonly TileMove[];
}

/**
 * Emitted when the settled board has no playable group.
 */
export interface DeadlockDetectedPayload {
  readonly moveNumber: number;
}

/**
 * Emitted after a shuffle has been written to the board. Every tile in
 * `mapping` is `shuffling` until the animation layer settles it.
 */
export interface ShuffleCompletePayload {
  readonly moveNumber: number;
  readonly mapping: ReadonlyMap<Tile, Position>;
  readonly guaranteed: readonly GuaranteedCluster[];
  /** Requested guarantees that could not be placed. */
  readonly shortfall: number;
}

/**
 * Emitted when a shuffled board was still deadlocked and tiles had to
 * be recolored.
 */
export interface EmergencyFixAppliedPayload {
  readonly moveNumber: number;
  readonly fix: EmergencyFix;
}

/**
 * Emitted when a move's cycle has fully completed and input is
 * accepted again.
 */
export interface StateSettledPayload {
  readonly moveNumber: number;
  /** Whether the cycle had to shuffle. */
  readonly shuffled: boolean;
  /** Whether the board is still deadlocked (a logic error). */
  readonly deadlocked: boolean;
}

export type MoveRejectionReason =
  | 'processing'
  | 'empty-cell'
  | 'not-interactive'
  | 'invalid-group';

/**
 * Emitted when a move request is ignored.
 */
export interface MoveRejectedPayload {
  readonly reason: MoveRejectionReason;
  readonly x?: number;
  readonly y?: number;
  /** Size of the offending group, when there was one. */
  readonly groupSize?: number;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface EngineEventMap {
  'tile-state-changed': TileStateChangedPayload;
  'phase-changed': PhaseChangedPayload;
  'blast-started': BlastStartedPayload;
  'animation-complete': AnimationCompletePayload;
  'blast-complete': BlastCompletePayload;
  'gravity-complete': GravityCompletePayload;
  'deadlock-detected': DeadlockDetectedPayload;
  'shuffle-complete': ShuffleCompletePayload;
  'emergency-fix-applied': EmergencyFixAppliedPayload;
  'state-settled': StateSettledPayload;
  'move-rejected': MoveRejectedPayload;
}

/** Union of all valid engine event names. */
export type EngineEventName = keyof EngineEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type EngineEventListener<K extends EngineEventName> = (
  payload: EngineEventMap[K],
) => void;

// ── Emitter ─────────────────────────────────────────────────

interface Subscription<K extends EngineEventName> {
  readonly listener: EngineEventListener<K>;
  /** Payloads that fail this test are skipped. */
  readonly accept?: (payload: EngineEventMap[K]) => boolean;
  readonly once: boolean;
}

type SubscriptionTable = {
  [K in EngineEventName]: Set<Subscription<K>>;
};

function createSubscriptionTable(): SubscriptionTable {
  return {
    'tile-state-changed': new Set(),
    'phase-changed': new Set(),
    'blast-started': new Set(),
    'animation-complete': new Set(),
    'blast-complete': new Set(),
    'gravity-complete': new Set(),
    'deadlock-detected': new Set(),
    'shuffle-complete': new Set(),
    'emergency-fix-applied': new Set(),
    'state-settled': new Set(),
    'move-rejected': new Set(),
  };
}

/**
 * Typed, synchronous event emitter for engine events.
 *
 * Besides plain and one-shot listeners it supports filtered one-shot
 * listeners ({@link onceWhere}), which the animation channel uses to
 * wait for the completion of one particular move.
 *
 * Usage:
 * ```ts
 * const emitter = new EngineEventEmitter();
 * emitter.on('gravity-complete', ({ fell, spawned }) => {
 *   animateDrops(fell, spawned);
 * });
 * ```
 */
export class EngineEventEmitter {
  private readonly subscriptions: SubscriptionTable = createSubscriptionTable();

  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends EngineEventName>(
    event: K,
    listener: EngineEventListener<K>,
  ): () => void {
    return this.subscribe(event, { listener, once: false });
  }

  /**
   * Subscribe for a single emission. The returned function cancels the
   * subscription if it has not fired yet.
   */
  once<K extends EngineEventName>(
    event: K,
    listener: EngineEventListener<K>,
  ): () => void {
    return this.subscribe(event, { listener, once: true });
  }

  /**
   * Subscribe for the first emission whose payload passes `accept`.
   * Rejected payloads leave the subscription in place.
   */
  onceWhere<K extends EngineEventName>(
    event: K,
    accept: (payload: EngineEventMap[K]) => boolean,
    listener: EngineEventListener<K>,
  ): () => void {
    return this.subscribe(event, { listener, accept, once: true });
  }

  /** Remove the first subscription of `listener` for an event. */
  off<K extends EngineEventName>(
    event: K,
    listener: EngineEventListener<K>,
  ): void {
    const subscriptions = this.subscriptions[event];
    for (const subscription of subscriptions) {
      if (subscription.listener === listener) {
        subscriptions.delete(subscription);
        return;
      }
    }
  }

  /**
   * Emit an event. Listeners run synchronously in subscription order;
   * a listener removed by an earlier one during the same emission is
   * not called, and one added during it waits for the next emission.
   */
  emit<K extends EngineEventName>(event: K, payload: EngineEventMap[K]): void {
    const subscriptions = this.subscriptions[event];
    if (subscriptions.size === 0) return;

    for (const subscription of [...subscriptions]) {
      if (!subscriptions.has(subscription)) continue;
      if (subscription.accept && !subscription.accept(payload)) continue;
      if (subscription.once) subscriptions.delete(subscription);
      subscription.listener(payload);
    }
  }

  /** Remove all listeners, optionally for a specific event only. */
  removeAllListeners(event?: EngineEventName): void {
    if (event) {
      this.subscriptions[event].clear();
      return;
    }
    for (const subscriptions of Object.values(this.subscriptions)) {
      subscriptions.clear();
    }
  }

  listenerCount(event: EngineEventName): number {
    return this.subscriptions[event].size;
  }

  private subscribe<K extends EngineEventName>(
    event: K,
    subscription: Subscription<K>,
  ): () => void {
    const subscriptions = this.subscriptions[event];
    subscriptions.add(subscription);
    return () => {
      subscriptions.delete(subscription);
    };
  }
}
