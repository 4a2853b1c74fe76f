/**
 * Stage runner: executes one stage of a run.
 *
 * Every attempt walks acquiring -> secret-resolving -> executing ->
 * releasing -> done with a fresh environment. Release always happens,
 * whatever the attempt's outcome. Retries, timeouts and backoff follow the
 * stage's retry policy.
 */

import { Artifact, PublishAck } from '../domain/artifact';
import { CredentialDeclaration, StageSecrets } from '../domain/credential';
import { DeploymentAck } from '../domain/deployment';
import {
  ExecutorError,
  ProvisionError,
  StageAbortedError,
  StageTimeoutError,
  TypedError,
  createTypedError,
  toTypedError,
} from '../domain/errors';
import { SecretRedactor } from '../domain/redaction';
import { StageAttempt, StageLogEntry, StagePhase, StageRunResult } from '../domain/run';
import { SourceRef } from '../domain/source';
import { BackoffStrategy, StageActionKind, StageSpec } from '../domain/stage';
import { EnvironmentHandle, EnvironmentProvisioner } from '../environment/provisioner';
import { SecretResolver } from '../secrets/resolver';
import { transitionPhase } from './state-machine';

/** What a stage hands forward to later stages. */
export interface StageOutput {
  artifact?: Artifact;
  publication?: PublishAck;
  deployment?: DeploymentAck;
}

/**
 * Everything a stage action can see. Frozen: an action cannot change the
 * run, the stage spec or another stage's output.
 */
export interface StageActionContext {
  readonly pipelineId: string;
  readonly runId: string;
  readonly runNumber: number;
  readonly source: Readonly<SourceRef>;
  readonly stage: StageSpec;
  readonly attempt: number;
  readonly environment: EnvironmentHandle;
  readonly secrets: StageSecrets;
  /** Built by an earlier stage of this run. */
  readonly artifact?: Artifact;
  readonly publication?: PublishAck;
  readonly signal: AbortSignal;
  log(message: string, level?: StageLogEntry['level']): void;
}

/** Executes the action of a stage inside its environment. */
export interface StageActionExecutor {
  execute(context: StageActionContext): Promise<StageOutput>;
}

/** Callbacks the executor uses to persist and publish progress. Must not throw. */
export interface StageRunHooks {
  onPhase(result: StageRunResult, attempt: StageAttempt): Promise<void>;
  onRetry(result: StageRunResult, attempt: StageAttempt, delayMs: number): Promise<void>;
  log(result: StageRunResult, level: StageLogEntry['level'], message: string): void;
}

export interface StageRunRequest {
  pipelineId: string;
  runId: string;
  runNumber: number;
  source: SourceRef;
  stage: StageSpec;
  credentials: readonly CredentialDeclaration[];
  /** Outputs of the stages that already ran. */
  inputs: Readonly<StageOutput>;
  redactor: SecretRedactor;
  /** Aborted when the run is canceled. */
  signal: AbortSignal;
}

export type StageOutcome =
  | { status: 'succeeded'; output: StageOutput }
  | { status: 'failed'; error: TypedError }
  | { status: 'aborted'; error: TypedError };

export class StageRunner {
  constructor(
    private readonly provisioner: EnvironmentProvisioner,
    private readonly secrets: SecretResolver,
    private readonly actions: StageActionExecutor,
  ) {}

  /** Run all attempts of a stage, recording them on `result`. */
  async run(request: StageRunRequest, result: StageRunResult, hooks: StageRunHooks): Promise<StageOutcome> {
    const { stage, signal, redactor } = request;
    const policy = stage.retry;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      if (signal.aborted) {
        return { status: 'aborted', error: toTypedError(new StageAbortedError(stage.name, abortReason(signal))) };
      }

      const record: StageAttempt = { attempt, phases: [], startedAt: new Date().toISOString() };
      result.attempts.push(record);

      const { output, error } = await this.runAttempt(request, result, record, hooks);

      record.completedAt = new Date().toISOString();
      record.durationMs = new Date(record.completedAt).getTime() - new Date(record.startedAt).getTime();

      if (error === undefined) {
        return { status: 'succeeded', output: output ?? {} };
      }

      const typed = toTypedError(error, stage.name);
      record.error = redactor.redactError({
        ...typed,
        details: { ...typed.details, attempt, maxAttempts: policy.maxAttempts },
      });

      if (error instanceof StageAbortedError || signal.aborted) {
        return { status: 'aborted', error: record.error };
      }

      if (!shouldRetry(stage, error, record.error, attempt)) {
        hooks.log(result, 'error', `Attempt ${attempt} failed: ${record.error.message}`);
        return { status: 'failed', error: record.error };
      }

      const delayMs = computeBackoff(policy.backoffStrategy, policy.backoffBaseMs, policy.backoffMaxMs, attempt);
      hooks.log(result, 'warn', `Attempt ${attempt} failed, retrying in ${delayMs}ms: ${record.error.message}`);
      await hooks.onRetry(result, record, delayMs);

      if (!(await sleep(delayMs, signal))) {
        return { status: 'aborted', error: toTypedError(new StageAbortedError(stage.name, abortReason(signal))) };
      }
    }

    // maxAttempts < 1 is rejected by the definition validator.
    throw new ExecutorError(
      createTypedError({
        code: 'STAGE.NO_ATTEMPTS',
        message: `Stage "${stage.name}" allows no attempts`,
        stageName: stage.name,
      }),
    );
  }

  /**
   * One attempt. The timeout and the run's abort signal cover the whole
   * attempt, provisioning and secret resolution included. Once the race is
   * lost, the attempt body stops touching `result`; a handle that arrives
   * late is released by the body itself.
   */
  private async runAttempt(
    request: StageRunRequest,
    result: StageRunResult,
    record: StageAttempt,
    hooks: StageRunHooks,
  ): Promise<{ output?: StageOutput; error?: unknown }> {
    const { stage, signal } = request;

    const enter = async (phase: StagePhase): Promise<void> => {
      const transition = transitionPhase(result.phase, phase, stage.name);
      if (!transition.success) {
        throw new ExecutorError(transition.error);
      }
      result.phase = transition.newStatus;
      record.phases.push(transition.newStatus);
      await hooks.onPhase(result, record);
    };

    // Set by the attempt body once it owns an environment.
    const held: { environment?: EnvironmentHandle } = {};
    let output: StageOutput | undefined;
    let error: unknown;

    const attemptBody = async (attemptSignal: AbortSignal): Promise<StageOutput> => {
      const checkpoint = (): void => {
        if (attemptSignal.aborted) {
          throw stoppedError(attemptSignal, stage.name);
        }
      };
      const step = async (phase: StagePhase): Promise<void> => {
        checkpoint();
        await enter(phase);
        checkpoint();
      };

      await step(StagePhase.Acquiring);
      const acquired = await this.provisioner.acquire(
        stage.environment,
        {
          runId: request.runId,
          runNumber: request.runNumber,
          stageName: stage.name,
          attempt: record.attempt,
        },
        attemptSignal,
      );
      if (attemptSignal.aborted) {
        await this.provisioner.release(acquired);
        throw stoppedError(attemptSignal, stage.name);
      }
      held.environment = acquired;
      record.environmentId = acquired.id;

      await step(StagePhase.SecretResolving);
      const secrets = await this.secrets.resolve(stage.name, stage.secretScopes, request.credentials);
      checkpoint();
      request.redactor.add(Object.values(secrets));

      await step(StagePhase.Executing);
      return this.actions.execute(
        Object.freeze({
          pipelineId: request.pipelineId,
          runId: request.runId,
          runNumber: request.runNumber,
          source: request.source,
          stage,
          attempt: record.attempt,
          environment: acquired,
          secrets,
          artifact: request.inputs.artifact,
          publication: request.inputs.publication,
          signal: attemptSignal,
          log: (message: string, level: StageLogEntry['level'] = 'info') => hooks.log(result, level, message),
        }),
      );
    };

    try {
      output = await executeWithTimeout(
        attemptBody,
        stage.retry.timeoutMs,
        signal,
        () => new StageTimeoutError(stage.name, stage.retry.timeoutMs, record.attempt),
        () => new StageAbortedError(stage.name, abortReason(signal)),
      );
    } catch (err) {
      error = err;
    } finally {
      if (held.environment) {
        await enter(StagePhase.Releasing);
        await this.provisioner.release(held.environment);
      }
      await enter(StagePhase.Done);
    }

    return { output, error };
  }
}

/**
 * Retry decision. Build stages never retry. Provisioning failures retry
 * only when the policy opts in; everything else follows the error's own
 * retryable flag.
 */
export function shouldRetry(stage: StageSpec, cause: unknown, error: TypedError, attempt: number): boolean {
  if (attempt >= stage.retry.maxAttempts) return false;
  if (stage.action.kind === StageActionKind.Build) return false;
  if (cause instanceof ProvisionError) return stage.retry.retryProvisioning;
  return error.retryable;
}

/** Compute backoff delay based on strategy, capped at `maxMs`. */
export function computeBackoff(strategy: BackoffStrategy, baseMs: number, maxMs: number, attempt: number): number {
  const delay = strategy === 'fixed' ? baseMs : baseMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxMs);
}

/**
 * Run `fn` with a timeout and the run's abort signal. `fn` receives a
 * signal that fires on either, so the in-flight command is stopped too.
 */
export function executeWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal,
  onTimeout: () => Error,
  onAbort: () => Error,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;

    const settle = (complete: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent.removeEventListener('abort', handleAbort);
      complete();
    };
    const stop = (err: Error): void => {
      controller.abort(err);
      settle(() => reject(err));
    };
    const handleAbort = (): void => stop(onAbort());

    const timer = setTimeout(() => stop(onTimeout()), timeoutMs);
    if (parent.aborted) {
      handleAbort();
      return;
    }
    parent.addEventListener('abort', handleAbort, { once: true });

    fn(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (err: unknown) => settle(() => reject(err)),
    );
  });
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** The error an attempt signal was aborted with, or a generic abort. */
function stoppedError(signal: AbortSignal, stageName: string): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new StageAbortedError(stageName, abortReason(signal));
}

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string') return reason;
  return reason instanceof Error ? reason.message : undefined;
}
