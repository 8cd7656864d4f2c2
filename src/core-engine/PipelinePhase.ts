/**
 * Pipeline phases for the Tile Blast Engine.
 *
 * The pipeline is idle between moves and processing otherwise. While
 * it is processing, move requests are rejected rather than queued;
 * the phase value is the engine's only lock.
 *
 * - `idle`      -- Accepting input.
 * - `blasting`  -- Removing the selected group.
 * - `gravity`   -- Compacting columns and refilling.
 * - `resolving` -- Refreshing group metadata and checking for deadlock.
 * - `shuffling` -- Rearranging a deadlocked board.
 */
export type PipelinePhase = 'idle' | 'blasting' | 'gravity' | 'resolving' | 'shuffling';

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<PipelinePhase, PipelinePhase[]> = {
  idle: ['blasting'],
  blasting: ['gravity'],
  gravity: ['resolving'],
  resolving: ['idle', 'shuffling'],
  shuffling: ['idle'],
};

/**
 * Check a phase transition.
 *
 * @throws If transitioning to the same phase.
 * @throws If the transition is invalid (e.g. `idle` -> `gravity`).
 */
export function assertPhaseTransition(
  current: PipelinePhase,
  next: PipelinePhase,
): void {
  if (current === next) {
    throw new Error(`Pipeline is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(next)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${next}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ')}`,
    );
  }
}

/** Whether the pipeline is busy with a move. */
export function isProcessingPhase(phase: PipelinePhase): boolean {
  return phase !== 'idle';
}
