/**
 * Container runtime boundary.
 *
 * The contract the environment provisioner needs from a container engine.
 * The production implementation shells out to the Docker CLI; the memory
 * implementation (src/testing/) runs in-process for tests and dry runs.
 */

import { MountRequest } from '../domain/stage';

/** Request to create one isolated environment. */
export interface EnvironmentRequest {
  imageRef: string;
  mounts: MountRequest[];
  entrypointOverride?: string[];
  workingDir?: string;
  /** Labels identifying the owning run and stage. */
  labels: Record<string, string>;
}

export interface ExecOptions {
  /** Variables set for this command only. Values never appear on argv. */
  env?: Record<string, string>;
  /** Data written to the command's stdin. */
  stdin?: string;
  workingDir?: string;
  signal?: AbortSignal;
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type RuntimeErrorReason =
  | 'image-unavailable'
  | 'mount-unavailable'
  | 'not-found'
  | 'runtime-unavailable';

/** Raised by ContainerRuntime implementations. */
export class RuntimeError extends Error {
  constructor(
    message: string,
    public readonly reason: RuntimeErrorReason,
  ) {
    super(message);
    this.name = 'RuntimeError';
  }
}

export interface ContainerRuntime {
  /** Create and start an environment. Rejects early when `signal` aborts. */
  create(request: EnvironmentRequest, signal?: AbortSignal): Promise<{ handleId: string }>;
  /** Run a command inside an environment. Non-zero exits resolve, they do not reject. */
  exec(handleId: string, command: string[], options?: ExecOptions): Promise<ExecResult>;
  /** Remove an environment. Must tolerate one that is already gone. */
  destroy(handleId: string): Promise<void>;
  /** Whether a host path exists and can be mounted. */
  hostPathExists(hostPath: string): Promise<boolean>;
}
