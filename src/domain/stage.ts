/**
 * Stage model.
 *
 * A pipeline is an ordered list of StageSpec values. Each stage names the
 * environment it runs in, one action (build, publish, or trigger), the
 * credentials it may read, and its retry policy. Specs are frozen when a
 * run is created.
 */

import { DeploymentTarget } from './deployment';

/** Privileged grants an environment must request explicitly. */
export enum EnvironmentCapability {
  /** Bind-mount the host container runtime's control socket. */
  ContainerRuntimeSocket = 'container-runtime-socket',
}

/** A host path to expose inside the environment. */
export interface MountRequest {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
}

/** Where a stage runs. */
export interface EnvironmentSpec {
  /** Execution image, e.g. "docker:24-cli". */
  image: string;
  workingDir?: string;
  mounts: MountRequest[];
  capabilities: EnvironmentCapability[];
  /** Replaces the keep-alive entrypoint. */
  entrypointOverride?: string[];
}

export enum StageActionKind {
  Build = 'build',
  Publish = 'publish',
  Trigger = 'trigger',
}

export interface BuildAction {
  kind: StageActionKind.Build;
  /** Image repository the artifact is tagged into. */
  repository: string;
  contextDir: string;
  dockerfile?: string;
  buildArgs?: Record<string, string>;
}

export interface PublishAction {
  kind: StageActionKind.Publish;
  registryUrl: string;
  /** Credential names (must be among the stage's secret scopes). */
  usernameSecret: string;
  passwordSecret: string;
  /** Tag templates; `{runNumber}` and `{shortCommit}` are expanded. */
  tags: string[];
}

export interface TriggerAction {
  kind: StageActionKind.Trigger;
  target: DeploymentTarget;
  /** Environment variables for the cluster client, mapped to credential names. */
  credentialEnv?: Record<string, string>;
}

export type StageAction = BuildAction | PublishAction | TriggerAction;

export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  maxAttempts: number;
  backoffStrategy: BackoffStrategy;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Per-attempt timeout. */
  timeoutMs: number;
  /** Retry attempts that fail while provisioning the environment. */
  retryProvisioning: boolean;
}

export interface StageSpec {
  name: string;
  environment: EnvironmentSpec;
  action: StageAction;
  /** Credential names this stage may read. */
  secretScopes: string[];
  retry: RetryPolicy;
}

export const DEFAULT_PUBLISH_TAGS: readonly string[] = ['{runNumber}', 'latest'];

/** Expand tag templates for a run. */
export function renderTags(
  templates: readonly string[],
  vars: { runNumber: number; shortCommit: string },
): string[] {
  const rendered = templates.map((template) =>
    template
      .split('{runNumber}')
      .join(String(vars.runNumber))
      .split('{shortCommit}')
      .join(vars.shortCommit),
  );
  return [...new Set(rendered)];
}

/** Deep-freeze a stage spec so nothing can change it mid-run. */
export function freezeStage(stage: StageSpec): StageSpec {
  const copy: StageSpec = structuredClone(stage);
  deepFreeze(copy);
  return copy;
}

function deepFreeze(value: unknown): void {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
}
