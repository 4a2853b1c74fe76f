/**
 * Run domain model.
 *
 * A PipelineRun is one execution of a pipeline for one commit. It carries
 * the frozen stage list, per-stage results and the outputs passed between
 * stages (artifact, publication, deployment).
 */

import { Artifact, PublishAck } from './artifact';
import { DeploymentAck } from './deployment';
import { TypedError } from './errors';
import { SourceRef } from './source';
import { StageActionKind, StageSpec } from './stage';

export enum RunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Aborted = 'aborted',
}

export enum StageRunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Aborted = 'aborted',
  /** Not run because an earlier stage failed. */
  Skipped = 'skipped',
}

/** Lifecycle of a single stage attempt. */
export enum StagePhase {
  Acquiring = 'acquiring',
  SecretResolving = 'secret-resolving',
  Executing = 'executing',
  Releasing = 'releasing',
  Done = 'done',
}

export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Pending]: [RunStatus.Running, RunStatus.Aborted],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Aborted],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Aborted]: [],
};

export const VALID_STAGE_TRANSITIONS: Record<StageRunStatus, StageRunStatus[]> = {
  [StageRunStatus.Pending]: [StageRunStatus.Running, StageRunStatus.Skipped, StageRunStatus.Aborted],
  [StageRunStatus.Running]: [StageRunStatus.Succeeded, StageRunStatus.Failed, StageRunStatus.Aborted],
  [StageRunStatus.Succeeded]: [],
  [StageRunStatus.Failed]: [],
  [StageRunStatus.Aborted]: [],
  [StageRunStatus.Skipped]: [],
};

/**
 * Valid phase transitions. Acquiring may go straight to Done when no
 * environment was obtained; any phase after Acquiring must pass through
 * Releasing. Done -> Acquiring starts the next attempt.
 */
export const VALID_PHASE_TRANSITIONS: Record<StagePhase, StagePhase[]> = {
  [StagePhase.Acquiring]: [StagePhase.SecretResolving, StagePhase.Releasing, StagePhase.Done],
  [StagePhase.SecretResolving]: [StagePhase.Executing, StagePhase.Releasing],
  [StagePhase.Executing]: [StagePhase.Releasing],
  [StagePhase.Releasing]: [StagePhase.Done],
  [StagePhase.Done]: [StagePhase.Acquiring],
};

export interface StageLogEntry {
  timestamp: string;
  level: 'info' | 'warn' | 'error';
  message: string;
}

/** One attempt of a stage, from acquire to release. */
export interface StageAttempt {
  attempt: number;
  phases: StagePhase[];
  environmentId?: string;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
}

export interface StageRunResult {
  name: string;
  action: StageActionKind;
  status: StageRunStatus;
  phase?: StagePhase;
  attempts: StageAttempt[];
  logs: StageLogEntry[];
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
}

export interface PipelineRun {
  id: string;
  pipelineId: string;
  /** Monotonically increasing per pipeline, starting at 1. */
  runNumber: number;
  status: RunStatus;
  source: SourceRef;
  triggeredBy: string;
  /** Frozen at creation. */
  stages: StageSpec[];
  /** Same order as `stages`. */
  stageResults: StageRunResult[];
  artifact?: Artifact;
  publication?: PublishAck;
  deployment?: DeploymentAck;
  error?: TypedError;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  abortedBy?: string;
  abortReason?: string;
}

export interface CreateRunInput {
  pipelineId: string;
  source: SourceRef;
  /** Who or what started the run, e.g. "webhook:push" or a user id. */
  triggeredBy: string;
}
