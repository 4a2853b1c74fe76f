/**
 * Typed error model.
 *
 * Failures are described by a TypedError: a namespaced code, a message,
 * a retryability flag and machine-actionable suggested fixes. Components
 * throw PipelineError subclasses that carry a TypedError; the executor
 * records the TypedError on the stage and run.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'PROVISION'
  | 'SECRETS'
  | 'BUILD'
  | 'PUBLISH'
  | 'TRIGGER'
  | 'STAGE'
  | 'RUN'
  | 'PIPELINE'
  | 'VALIDATION'
  | 'AUTH'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix an operator (or automation) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The typed error structure recorded on runs and returned by the API. */
export interface TypedError {
  /** Namespaced error code (e.g. "PUBLISH.PUSH_FAILED"). */
  code: string;
  message: string;
  stageName?: string;
  runId?: string;
  /** Whether repeating the same operation unchanged may succeed. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stageName?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stageName: params.stageName,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Options accepted by the PipelineError subclasses. */
export interface PipelineErrorOptions {
  retryable?: boolean;
  stageName?: string;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}

/** Base class for every error a pipeline component throws. */
export class PipelineError extends Error {
  public readonly typedError: TypedError;

  constructor(code: string, message: string, options: PipelineErrorOptions = {}) {
    super(message);
    this.name = 'PipelineError';
    this.typedError = createTypedError({
      code,
      message,
      stageName: options.stageName,
      retryable: options.retryable ?? false,
      details: options.details,
      suggestedFixes: options.suggestedFixes,
    });
  }

  get code(): string {
    return this.typedError.code;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

/** The execution environment could not be created or used. */
export class ProvisionError extends PipelineError {
  constructor(code: string, message: string, options?: PipelineErrorOptions) {
    super(code, message, options);
    this.name = 'ProvisionError';
  }
}

/** A requested credential does not exist in the secret store. */
export class SecretNotFoundError extends PipelineError {
  constructor(names: string[], options?: PipelineErrorOptions) {
    super('SECRETS.NOT_FOUND', `Secret(s) not found: ${names.join(', ')}`, {
      ...options,
      retryable: false,
      details: { names, ...options?.details },
      suggestedFixes: names.map((name) => ({
        type: 'PROVIDE_SECRET',
        params: { name },
        description: `Create secret "${name}" in the secret store`,
      })),
    });
    this.name = 'SecretNotFoundError';
  }
}

/** The stage may not read a credential, or the store refused access. */
export class AccessDeniedError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('SECRETS.ACCESS_DENIED', message, { ...options, retryable: false });
    this.name = 'AccessDeniedError';
  }
}

/** The artifact could not be built. Never retried. */
export class BuildError extends PipelineError {
  constructor(code: string, message: string, options?: PipelineErrorOptions) {
    super(code, message, { ...options, retryable: false });
    this.name = 'BuildError';
  }
}

/** Pushing to the registry failed. Retryable unless stated otherwise. */
export class PublishError extends PipelineError {
  constructor(code: string, message: string, options?: PipelineErrorOptions) {
    super(code, message, { retryable: true, ...options });
    this.name = 'PublishError';
  }
}

/** The deployment convergence request was rejected. */
export class TriggerError extends PipelineError {
  constructor(code: string, message: string, options?: PipelineErrorOptions) {
    super(code, message, options);
    this.name = 'TriggerError';
  }
}

/** A stage attempt exceeded its timeout. */
export class StageTimeoutError extends PipelineError {
  constructor(stageName: string, timeoutMs: number, attempt: number) {
    super('STAGE.TIMEOUT', `Stage "${stageName}" timed out after ${timeoutMs}ms`, {
      stageName,
      retryable: true,
      details: { timeoutMs, attempt },
      suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
    });
    this.name = 'StageTimeoutError';
  }
}

/** A stage attempt was interrupted by run cancellation. */
export class StageAbortedError extends PipelineError {
  constructor(stageName: string, reason?: string) {
    super('STAGE.ABORTED', reason ? `Stage "${stageName}" aborted: ${reason}` : `Stage "${stageName}" aborted`, {
      stageName,
      retryable: false,
      details: reason ? { reason } : undefined,
    });
    this.name = 'StageAbortedError';
  }
}

/** Executor-level misuse: unknown run, duplicate execution, bad transition. */
export class ExecutorError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExecutorError';
  }
}

/** Normalize anything thrown by a stage into a TypedError. */
export function toTypedError(err: unknown, stageName?: string): TypedError {
  if (err instanceof PipelineError) {
    return { ...err.typedError, stageName: err.typedError.stageName ?? stageName };
  }
  return createTypedError({
    code: 'STAGE.EXECUTION_ERROR',
    message: err instanceof Error ? err.message : 'Unknown stage execution error',
    stageName,
    retryable: true,
  });
}

// --- Common factories ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code: 'VALIDATION.SCHEMA', message, retryable: false, details });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runAlreadyRunningError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.ALREADY_RUNNING',
    message: `Run "${runId}" is already being executed`,
    runId,
    retryable: false,
  });
}

export function runInvalidStateTransition(runId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'RUN.INVALID_STATE_TRANSITION',
    message: `Cannot transition run from "${from}" to "${to}"`,
    runId,
    retryable: false,
    details: { from, to },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
