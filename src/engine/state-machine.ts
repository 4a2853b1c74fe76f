/**
 * Run, stage and phase state machines.
 *
 * Enforces valid state transitions, producing typed errors on invalid
 * transitions.
 */

import {
  RunStatus,
  StagePhase,
  StageRunStatus,
  VALID_PHASE_TRANSITIONS,
  VALID_RUN_TRANSITIONS,
  VALID_STAGE_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError, runInvalidStateTransition } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> = { success: true; newStatus: S } | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus, runId = ''): TransitionResult<RunStatus> {
  if (!VALID_RUN_TRANSITIONS[current].includes(target)) {
    return { success: false, error: runInvalidStateTransition(runId, current, target) };
  }
  return { success: true, newStatus: target };
}

/** Attempt a stage state transition. */
export function transitionStageStatus(
  current: StageRunStatus,
  target: StageRunStatus,
  stageName?: string,
): TransitionResult<StageRunStatus> {
  const validTargets = VALID_STAGE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'STAGE.INVALID_TRANSITION',
        message: `Invalid stage state transition: ${current} -> ${target}`,
        stageName,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/**
 * Attempt a phase transition. A stage with no phase yet may only enter
 * Acquiring.
 */
export function transitionPhase(
  current: StagePhase | undefined,
  target: StagePhase,
  stageName?: string,
): TransitionResult<StagePhase> {
  const validTargets = current === undefined ? [StagePhase.Acquiring] : VALID_PHASE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'STAGE.INVALID_PHASE_TRANSITION',
        message: `Invalid stage phase transition: ${current ?? 'none'} -> ${target}`,
        stageName,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return status === RunStatus.Succeeded || status === RunStatus.Failed || status === RunStatus.Aborted;
}

/** Check if a stage status is terminal. */
export function isTerminalStageStatus(status: StageRunStatus): boolean {
  return VALID_STAGE_TRANSITIONS[status].length === 0;
}
