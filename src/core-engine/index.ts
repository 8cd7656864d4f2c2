/**
 * Core Engine Module
 *
 * Drives the blast -> gravity -> deadlock -> shuffle pipeline over a
 * board, with typed events, configuration, and adapters for the
 * animation layer.
 */
export const ENGINE_VERSION = '0.1.0';

// Configuration
export type { EngineConfig, EngineConfigOptions } from './EngineConfig';
export {
  MIN_GUARANTEED_COLORS,
  MAX_GUARANTEED_COLORS,
  createEngineConfig,
} from './EngineConfig';

// Pipeline phases
export type { PipelinePhase } from './PipelinePhase';
export { assertPhaseTransition, isProcessingPhase } from './PipelinePhase';

// Orchestrator
export type { PipelineOrchestratorOptions } from './PipelineOrchestrator';
export { PipelineOrchestrator } from './PipelineOrchestrator';

// Engine event system
export type {
  TileStateChangedPayload,
  PhaseChangedPayload,
  BlastStartedPayload,
  AnimationCompletePayload,
  BlastCompletePayload,
  GravityCompletePayload,
  DeadlockDetectedPayload,
  ShuffleCompletePayload,
  EmergencyFixAppliedPayload,
  StateSettledPayload,
  MoveRejectionReason,
  MoveRejectedPayload,
  EngineEventMap,
  EngineEventName,
  EngineEventListener,
} from './EngineEventEmitter';
export { EngineEventEmitter } from './EngineEventEmitter';

// Animation layer adapters
export { EventAnimationChannel } from './EventAnimationChannel';
export type { HeadlessAnimatorOptions } from './HeadlessAnimator';
export { HeadlessAnimator } from './HeadlessAnimator';
export type { RendererLikeEventEmitter } from './RendererEventBridge';
export {
  RendererEventBridge,
  isAnimationCompletePayload,
} from './RendererEventBridge';
