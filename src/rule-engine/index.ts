/**
 * Rule Engine Module
 *
 * Board rules for tile-collapse puzzles: group detection, deadlock
 * detection, and the blast, gravity and shuffle resolvers.
 */
export const RULE_ENGINE_VERSION = '0.1.0';

// Randomness
export type { Rng } from './Random';
export { createSeededRng, randomInt, shuffleInPlace } from './Random';

// Detection
export { DIRECTIONS, GroupDetector } from './GroupDetector';
export { DeadlockChecker } from './DeadlockChecker';

// Animation channel contract
export type { AnimationChannel } from './AnimationChannel';
export { IMMEDIATE_CHANNEL } from './AnimationChannel';

// Resolvers
export type { InvalidGroupReason } from './BlastResolver';
export { BlastResolver, InvalidGroupError } from './BlastResolver';
export type { TileMove, GravityResult } from './GravityResolver';
export { GravityResolver } from './GravityResolver';
export type {
  GuaranteedCluster,
  ShufflePlan,
  ShuffleResult,
  RecoloredTile,
  EmergencyFix,
} from './ShuffleResolver';
export {
  CLUSTER_SEARCH_ATTEMPTS,
  MAX_GUARANTEED_CLUSTER_SIZE,
  ShuffleResolver,
} from './ShuffleResolver';
