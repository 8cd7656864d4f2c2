/**
 * Renderer Event Bridge for the Tile Blast Engine.
 *
 * Forwards engine events to a renderer's event system (a Phaser
 * scene's `events`, a Node `EventEmitter`, ...) and forwards the
 * renderer's `animation-complete` back to the engine. This lets the
 * animation layer listen and report through the API it already uses,
 * while the engine itself stays renderer-free.
 *
 * Usage:
 * ```ts
 * const bridge = new RendererEventBridge(engine.events, scene.events);
 * // Engine events now appear on scene.events.
 * scene.events.emit('animation-complete', { animation: 'blast' });
 * bridge.destroy(); // Clean up when the scene shuts down.
 * ```
 */

import type {
  AnimationCompletePayload,
  EngineEventEmitter,
  EngineEventMap,
  EngineEventName,
} from './EngineEventEmitter';

// ── Minimal renderer-compatible interface ───────────────────

/**
 * Minimal subset of an `on/off/emit` event emitter that the bridge
 * needs. Matches both Phaser's and Node's emitters.
 */
export interface RendererLikeEventEmitter {
  on(event: string, fn: (...args: unknown[]) => void, context?: unknown): this;
  off(
    event: string,
    fn: (...args: unknown[]) => void,
    context?: unknown,
  ): this;
  emit(event: string, ...args: unknown[]): boolean;
}

// ── Bridge ──────────────────────────────────────────────────

/** Events forwarded from the engine to the renderer. */
const OUTBOUND_EVENTS: EngineEventName[] = [
  'tile-state-changed',
  'phase-changed',
  'blast-started',
  'blast-complete',
  'gravity-complete',
  'deadlock-detected',
  'shuffle-complete',
  'emergency-fix-applied',
  'state-settled',
  'move-rejected',
];

/** Check an inbound `animation-complete` payload from the renderer. */
export function isAnimationCompletePayload(
  value: unknown,
): value is AnimationCompletePayload {
  if (typeof value !== 'object' || value === null) return false;
  if (!('animation' in value) || value.animation !== 'blast') return false;
  return (
    !('moveNumber' in value) ||
    value.moveNumber === undefined ||
    typeof value.moveNumber === 'number'
  );
}

/**
 * Bridge between {@link EngineEventEmitter} and a renderer-side
 * emitter.
 *
 * Engine events go out; `animation-complete` comes in. No event is
 * bridged both ways, so a renderer may reply or change tile states from
 * inside a forwarded event without anything being dropped.
 */
export class RendererEventBridge {
  private readonly engineUnsubs: Array<() => void> = [];
  private readonly rendererHandlers: Array<{
    event: string;
    handler: (...args: unknown[]) => void;
  }> = [];

  constructor(
    private readonly engine: EngineEventEmitter,
    private readonly renderer: RendererLikeEventEmitter,
  ) {
    this.wireEngineToRenderer();
    this.wireRendererToEngine();
  }

  // ── Engine -> Renderer ──────────────────────────────────

  private wireEngineToRenderer(): void {
    for (const event of OUTBOUND_EVENTS) {
      const unsub = this.engine.on(event, (payload: EngineEventMap[typeof event]) => {
        this.renderer.emit(event, payload);
      });
      this.engineUnsubs.push(unsub);
    }
  }

  // ── Renderer -> Engine ──────────────────────────────────

  private wireRendererToEngine(): void {
    const handler = (payload: unknown) => {
      if (!isAnimationCompletePayload(payload)) {
        console.warn('[RendererEventBridge] Ignoring malformed animation-complete payload:', payload);
        return;
      }
      this.engine.emit('animation-complete', payload);
    };
    this.renderer.on('animation-complete', handler);
    this.rendererHandlers.push({ event: 'animation-complete', handler });
  }

  // ── Cleanup ─────────────────────────────────────────────

  /**
   * Remove all bridge listeners from both sides.
   */
  destroy(): void {
    for (const unsub of this.engineUnsubs) {
      unsub();
    }
    this.engineUnsubs.length = 0;

    for (const { event, handler } of this.rendererHandlers) {
      this.renderer.off(event, handler);
    }
    this.rendererHandlers.length = 0;
  }
}
