/**
 * Pipeline Executor: the core orchestration engine.
 *
 * Creates runs, executes their stages strictly in order with durable state
 * transitions, passes the artifact forward and publishes run-time events.
 * Cancellation (manual or by a newer run superseding an older one) is
 * delivered through a per-run AbortSignal.
 */

import { v4 as uuid } from 'uuid';
import {
  ExecutorError,
  createTypedError,
  notFoundError,
  runAlreadyRunningError,
  runNotFoundError,
} from '../domain/errors';
import { RunEventType } from '../domain/events';
import { SecretRedactor } from '../domain/redaction';
import {
  CreateRunInput,
  PipelineRun,
  RunStatus,
  StageLogEntry,
  StageRunResult,
  StageRunStatus,
} from '../domain/run';
import { freezeStage } from '../domain/stage';
import { RunEventPublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { isTerminalRunStatus, transitionRunStatus, transitionStageStatus } from './state-machine';
import { StageOutcome, StageOutput, StageRunHooks, StageRunner } from './stage-runner';

/** Executor configuration. */
export interface ExecutorConfig {
  /** A new run aborts older pending or running runs of the same pipeline. */
  supersedeActiveRuns: boolean;
}

const DEFAULT_CONFIG: ExecutorConfig = {
  supersedeActiveRuns: true,
};

/** Bookkeeping for a run that is executing in this process. */
interface ActiveRun {
  controller: AbortController;
  done: Promise<PipelineRun>;
}

/** The pipeline executor. */
export class PipelineExecutor {
  private readonly config: ExecutorConfig;
  /** Guard against concurrent executeRun calls on the same run. */
  private readonly runningRuns = new Map<string, ActiveRun>();
  /** Secret values resolved by each executing run. */
  private readonly redactors = new Map<string, SecretRedactor>();
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly publisher: RunEventPublisher,
    private readonly stageRunner: StageRunner,
    config?: Partial<ExecutorConfig>,
    log: Logger = rootLogger.child({ module: 'executor' }),
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.log = log;
  }

  /** Create a pending run for a commit. */
  async createRun(input: CreateRunInput): Promise<PipelineRun> {
    const pipeline = await this.store.pipelines.getById(input.pipelineId);
    if (!pipeline) {
      throw new ExecutorError(notFoundError('Pipeline', input.pipelineId));
    }

    const runNumber = await this.store.runs.nextRunNumber(pipeline.id);
    const stages = pipeline.stages.map(freezeStage);
    const now = new Date().toISOString();
    const run: PipelineRun = {
      id: `run_${uuid()}`,
      pipelineId: pipeline.id,
      runNumber,
      status: RunStatus.Pending,
      source: { ...input.source },
      triggeredBy: input.triggeredBy,
      stages,
      stageResults: stages.map((stage) => ({
        name: stage.name,
        action: stage.action.kind,
        status: StageRunStatus.Pending,
        attempts: [],
        logs: [],
      })),
      createdAt: now,
      updatedAt: now,
    };

    await this.store.runs.create(run);
    await this.safePublishRunEvent(run, 'run.created');
    this.log.info('Run created', {
      pipelineId: run.pipelineId,
      runId: run.id,
      runNumber,
      commit: run.source.commit,
      branch: run.source.branch,
      triggeredBy: run.triggeredBy,
    });

    if (this.config.supersedeActiveRuns) {
      await this.supersedeOlderRuns(run);
    }

    return run;
  }

  /** Execute a pending run to a terminal state. */
  async executeRun(runId: string): Promise<PipelineRun> {
    if (this.runningRuns.has(runId)) {
      throw new ExecutorError(runAlreadyRunningError(runId));
    }

    const controller = new AbortController();
    const done = this.executeRunInternal(runId, controller.signal);
    this.runningRuns.set(runId, { controller, done });

    try {
      return await done;
    } finally {
      this.runningRuns.delete(runId);
      this.redactors.delete(runId);
    }
  }

  /**
   * Cancel a run. A pending run is aborted at once; a running run is
   * signalled and the execution loop finalizes it. Terminal runs are
   * returned unchanged.
   */
  async cancelRun(runId: string, canceledBy: string, reason?: string): Promise<PipelineRun> {
    const run = await this.store.runs.getById(runId);
    if (!run) {
      throw new ExecutorError(runNotFoundError(runId));
    }
    if (isTerminalRunStatus(run.status)) {
      return run;
    }

    const active = this.runningRuns.get(runId);
    if (active) {
      const updated = await this.store.runs.update(runId, { abortedBy: canceledBy, abortReason: reason });
      this.log.info('Run abort requested', { runId, runNumber: run.runNumber, abortedBy: canceledBy, reason });
      active.controller.abort(reason ?? `canceled by ${canceledBy}`);
      return updated ?? run;
    }

    // Hold the run while it is aborted so executeRun cannot start it meanwhile.
    const controller = new AbortController();
    controller.abort(reason ?? `canceled by ${canceledBy}`);
    run.abortedBy = canceledBy;
    run.abortReason = reason;
    const done = Promise.resolve().then(() => this.abortRun(run));
    this.runningRuns.set(runId, { controller, done });
    try {
      return await done;
    } finally {
      this.runningRuns.delete(runId);
    }
  }

  /** Resolves once the run stops executing in this process (at once if it is not). */
  async waitForRun(runId: string): Promise<PipelineRun | null> {
    const active = this.runningRuns.get(runId);
    if (active) {
      try {
        await active.done;
      } catch (err) {
        this.log.warn('Run execution ended with an error', {
          runId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return this.store.runs.getById(runId);
  }

  /** Abort every run executing in this process and wait for them to settle. */
  async shutdown(reason = 'shutdown'): Promise<void> {
    const runIds = [...this.runningRuns.keys()];
    for (const runId of runIds) {
      await this.cancelRun(runId, 'system', reason);
    }
    await Promise.all(runIds.map((runId) => this.waitForRun(runId)));
  }

  /** Ids of runs currently executing in this process. */
  activeRunIds(): string[] {
    return [...this.runningRuns.keys()];
  }

  /** Redacts the secrets a run has resolved so far. */
  private redactorFor(runId: string): SecretRedactor {
    let redactor = this.redactors.get(runId);
    if (!redactor) {
      redactor = new SecretRedactor();
      this.redactors.set(runId, redactor);
    }
    return redactor;
  }

  private async executeRunInternal(runId: string, signal: AbortSignal): Promise<PipelineRun> {
    let run = await this.store.runs.getById(runId);
    if (!run) {
      throw new ExecutorError(runNotFoundError(runId));
    }
    const pipeline = await this.store.pipelines.getById(run.pipelineId);
    if (!pipeline) {
      throw new ExecutorError(notFoundError('Pipeline', run.pipelineId));
    }

    run = await this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.started');
    this.log.info('Run started', { runId: run.id, runNumber: run.runNumber, pipelineId: run.pipelineId });

    const redactor = this.redactorFor(run.id);
    const outputs: StageOutput = {};

    for (let index = 0; index < run.stages.length; index++) {
      const stage = run.stages[index];
      const result = run.stageResults[index];

      if (signal.aborted) {
        return this.abortRun(run);
      }

      this.setStageStatus(result, StageRunStatus.Running);
      result.startedAt = new Date().toISOString();
      await this.store.runs.update(run.id, run);
      await this.safePublishStageEvent(run, stage.name, 'stage.started');
      this.logStage(run, result, 'Stage started');

      const outcome = await this.stageRunner.run(
        {
          pipelineId: run.pipelineId,
          runId: run.id,
          runNumber: run.runNumber,
          source: run.source,
          stage,
          credentials: pipeline.credentials,
          inputs: Object.freeze({ ...outputs }),
          redactor,
          signal,
        },
        result,
        this.stageHooks(run),
      );

      result.completedAt = new Date().toISOString();
      result.durationMs = new Date(result.completedAt).getTime() - new Date(result.startedAt).getTime();

      if (outcome.status === 'succeeded') {
        this.setStageStatus(result, StageRunStatus.Succeeded);
        await this.recordOutput(run, stage.name, outcome.output, outputs);
        await this.store.runs.update(run.id, run);
        await this.safePublishStageEvent(run, stage.name, 'stage.succeeded');
        this.logStage(run, result, 'Stage succeeded');
        continue;
      }

      result.error = outcome.error;
      if (outcome.status === 'aborted') {
        this.setStageStatus(result, StageRunStatus.Aborted);
        await this.store.runs.update(run.id, run);
        await this.safePublishStageEvent(run, stage.name, 'stage.aborted');
        this.logStage(run, result, 'Stage aborted');
        return this.abortRun(run);
      }

      this.setStageStatus(result, StageRunStatus.Failed);
      await this.store.runs.update(run.id, run);
      await this.safePublishStageEvent(run, stage.name, 'stage.failed');
      this.logStage(run, result, 'Stage failed', { errorCode: outcome.error.code });
      return this.failRun(run, outcome);
    }

    await this.transitionRun(run, RunStatus.Succeeded);
    run.completedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.succeeded');
    this.log.info('Run succeeded', {
      runId: run.id,
      runNumber: run.runNumber,
      durationMs: elapsed(run.startedAt, run.completedAt),
    });
    return run;
  }

  private stageHooks(run: PipelineRun): StageRunHooks {
    return {
      onPhase: async (result, attempt) => {
        this.logStage(run, result, 'Stage phase', { phase: result.phase, attempt: attempt.attempt }, 'debug');
        await this.safeUpdate(run);
        await this.safePublishStageEvent(run, result.name, 'stage.phase', {
          phase: result.phase,
          attempt: attempt.attempt,
          environmentId: attempt.environmentId,
        });
      },
      onRetry: async (result, attempt, delayMs) => {
        await this.safeUpdate(run);
        await this.safePublishStageEvent(run, result.name, 'stage.retrying', {
          attempt: attempt.attempt,
          nextAttempt: attempt.attempt + 1,
          delayMs,
          errorCode: attempt.error?.code,
        });
      },
      log: (result, level, message) => this.appendStageLog(run, result, level, message),
    };
  }

  private async recordOutput(
    run: PipelineRun,
    stageName: string,
    output: StageOutput,
    outputs: StageOutput,
  ): Promise<void> {
    if (output.artifact) {
      outputs.artifact = output.artifact;
      run.artifact = output.artifact;
      await this.safePublishStageEvent(run, stageName, 'artifact.built', {
        repository: output.artifact.repository,
        tag: output.artifact.tag,
        digest: output.artifact.digest,
      });
    }
    if (output.publication) {
      outputs.publication = output.publication;
      run.publication = output.publication;
      await this.safePublishStageEvent(run, stageName, 'artifact.published', {
        registryUrl: output.publication.registryUrl,
        digest: output.publication.digest,
        tags: output.publication.tags.map((t) => t.tag),
      });
    }
    if (output.deployment) {
      outputs.deployment = output.deployment;
      run.deployment = output.deployment;
      await this.safePublishStageEvent(run, stageName, 'deployment.triggered', {
        deploymentId: output.deployment.deploymentId,
        cluster: output.deployment.cluster,
        service: output.deployment.service,
        imageRef: output.deployment.imageRef,
      });
    }
  }

  private async supersedeOlderRuns(run: PipelineRun): Promise<void> {
    const active = await this.store.runs.listActive(run.pipelineId);
    for (const older of active) {
      if (older.id === run.id || older.runNumber > run.runNumber) continue;
      await this.cancelRun(older.id, `run:${run.id}`, `superseded by run #${run.runNumber}`);
    }
  }

  private async failRun(run: PipelineRun, outcome: Extract<StageOutcome, { status: 'failed' }>): Promise<PipelineRun> {
    for (const result of run.stageResults) {
      if (result.status === StageRunStatus.Pending) {
        this.setStageStatus(result, StageRunStatus.Skipped);
        await this.safePublishStageEvent(run, result.name, 'stage.skipped');
      }
    }

    await this.transitionRun(run, RunStatus.Failed);
    run.error = { ...outcome.error, runId: run.id };
    run.completedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.failed');
    this.log.error('Run failed', {
      runId: run.id,
      runNumber: run.runNumber,
      stage: outcome.error.stageName,
      errorCode: outcome.error.code,
      durationMs: elapsed(run.startedAt, run.completedAt),
    });
    return run;
  }

  private async abortRun(run: PipelineRun): Promise<PipelineRun> {
    // Pick up abortedBy/abortReason recorded by cancelRun while executing.
    const stored = await this.store.runs.getById(run.id);
    run.abortedBy = run.abortedBy ?? stored?.abortedBy;
    run.abortReason = run.abortReason ?? stored?.abortReason;

    const now = new Date().toISOString();
    for (const result of run.stageResults) {
      if (result.status === StageRunStatus.Pending || result.status === StageRunStatus.Running) {
        this.setStageStatus(result, StageRunStatus.Aborted);
        result.completedAt = now;
        await this.safePublishStageEvent(run, result.name, 'stage.aborted');
      }
    }

    await this.transitionRun(run, RunStatus.Aborted);
    run.completedAt = now;
    run.error =
      run.error ??
      createTypedError({
        code: 'RUN.ABORTED',
        message: run.abortReason ? `Run aborted: ${run.abortReason}` : 'Run aborted',
        runId: run.id,
        retryable: false,
      });
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.aborted');
    this.log.warn('Run aborted', {
      runId: run.id,
      runNumber: run.runNumber,
      abortedBy: run.abortedBy,
      reason: run.abortReason,
    });
    return run;
  }

  private async transitionRun(run: PipelineRun, target: RunStatus): Promise<PipelineRun> {
    const result = transitionRunStatus(run.status, target, run.id);
    if (!result.success) {
      throw new ExecutorError(result.error);
    }
    run.status = result.newStatus;
    run.updatedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    return run;
  }

  private setStageStatus(result: StageRunResult, target: StageRunStatus): void {
    const transition = transitionStageStatus(result.status, target, result.name);
    if (!transition.success) {
      throw new ExecutorError(transition.error);
    }
    result.status = transition.newStatus;
  }

  private appendStageLog(
    run: PipelineRun,
    result: StageRunResult,
    level: StageLogEntry['level'],
    message: string,
  ): void {
    const redacted = this.redactorFor(run.id).redact(message);
    result.logs.push({ timestamp: new Date().toISOString(), level, message: redacted });
  }

  private logStage(
    run: PipelineRun,
    result: StageRunResult,
    message: string,
    extra: Record<string, unknown> = {},
    level: 'debug' | 'info' = 'info',
  ): void {
    const log = this.log.withRedactor((text) => this.redactorFor(run.id).redact(text));
    log[level](message, {
      runId: run.id,
      runNumber: run.runNumber,
      stage: result.name,
      status: result.status,
      phase: result.phase,
      durationMs: result.durationMs,
      ...extra,
    });
  }

  /*
   * Event publishing and progress persistence are observational: a failing
   * store or subscriber is logged and never changes the run's outcome.
   */
  private async safeUpdate(run: PipelineRun): Promise<void> {
    try {
      await this.store.runs.update(run.id, run);
    } catch (err) {
      this.log.error('Failed to persist run progress', { runId: run.id, error: errorMessage(err) });
    }
  }

  private async safePublishRunEvent(run: PipelineRun, eventType: RunEventType): Promise<void> {
    try {
      await this.publisher.publishRunEvent(run, eventType);
    } catch (err) {
      this.log.error('Failed to publish run event', { runId: run.id, eventType, error: errorMessage(err) });
    }
  }

  private async safePublishStageEvent(
    run: PipelineRun,
    stageName: string,
    eventType: RunEventType,
    payload?: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.publisher.publishStageEvent(run, stageName, eventType, payload);
    } catch (err) {
      this.log.error('Failed to publish stage event', {
        runId: run.id,
        stage: stageName,
        eventType,
        error: errorMessage(err),
      });
    }
  }
}

function elapsed(startedAt: string | undefined, completedAt: string | undefined): number | undefined {
  if (!startedAt || !completedAt) return undefined;
  return new Date(completedAt).getTime() - new Date(startedAt).getTime();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
