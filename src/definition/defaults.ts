/**
 * Pipeline definition defaults and limits.
 */

import { DEFAULT_PUBLISH_TAGS, EnvironmentCapability, EnvironmentSpec, RetryPolicy, StageActionKind } from '../domain/stage';

export const DOCKER_SOCKET_PATH = '/var/run/docker.sock';

/** Stage names and pipeline ids. */
export const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/** Environment variable names a trigger stage may set. */
export const ENV_VAR_PATTERN = /^[A-Z_][A-Z0-9_]*$/;

export const RETRY_LIMITS = {
  minAttempts: 1,
  maxAttempts: 10,
} as const;

const MINUTE_MS = 60_000;

export const DEFAULT_RETRY_POLICIES: Record<StageActionKind, RetryPolicy> = {
  [StageActionKind.Build]: {
    maxAttempts: 1,
    backoffStrategy: 'fixed',
    backoffBaseMs: 0,
    backoffMaxMs: 0,
    timeoutMs: 30 * MINUTE_MS,
    retryProvisioning: false,
  },
  [StageActionKind.Publish]: {
    maxAttempts: 3,
    backoffStrategy: 'exponential',
    backoffBaseMs: 2_000,
    backoffMaxMs: 30_000,
    timeoutMs: 10 * MINUTE_MS,
    retryProvisioning: false,
  },
  [StageActionKind.Trigger]: {
    maxAttempts: 1,
    backoffStrategy: 'fixed',
    backoffBaseMs: 5_000,
    backoffMaxMs: 30_000,
    timeoutMs: 2 * MINUTE_MS,
    retryProvisioning: false,
  },
};

const dockerCliEnvironment = (): EnvironmentSpec => ({
  image: 'docker:24-cli',
  mounts: [{ hostPath: DOCKER_SOCKET_PATH, containerPath: DOCKER_SOCKET_PATH }],
  capabilities: [EnvironmentCapability.ContainerRuntimeSocket],
});

/** Environment used when a stage does not declare one. */
export const DEFAULT_ENVIRONMENTS: Record<StageActionKind, () => EnvironmentSpec> = {
  [StageActionKind.Build]: dockerCliEnvironment,
  [StageActionKind.Publish]: dockerCliEnvironment,
  [StageActionKind.Trigger]: () => ({ image: 'amazon/aws-cli:2.15.30', mounts: [], capabilities: [] }),
};

export const DEFAULT_BUILD_CONTEXT = '.';

export { DEFAULT_PUBLISH_TAGS };
