/**
 * Environment provisioner.
 *
 * Creates one isolated environment per stage attempt and tears it down.
 * Privileged host mounts (the container runtime socket) are only granted
 * when the stage spec lists the matching capability.
 */

import { ProvisionError } from '../domain/errors';
import { EnvironmentCapability, EnvironmentSpec } from '../domain/stage';
import { Logger, logger as rootLogger } from '../logger';
import { ContainerRuntime, ExecOptions, ExecResult, RuntimeError } from './runtime';

/** Identifies the stage attempt an environment belongs to. */
export interface EnvironmentOwner {
  runId: string;
  runNumber: number;
  stageName: string;
  attempt: number;
}

/** A live environment. Owned by exactly one stage attempt. */
export interface EnvironmentHandle {
  readonly id: string;
  readonly owner: Readonly<EnvironmentOwner>;
  readonly imageRef: string;
  readonly released: boolean;
  exec(command: string[], options?: ExecOptions): Promise<ExecResult>;
}

export interface EnvironmentProvisioner {
  /** `signal` stops a creation that is still in progress. */
  acquire(spec: EnvironmentSpec, owner: EnvironmentOwner, signal?: AbortSignal): Promise<EnvironmentHandle>;
  /** Idempotent; never throws. */
  release(handle: EnvironmentHandle): Promise<void>;
}

export interface ProvisionerConfig {
  /** Host paths that may only be mounted with the given capability. */
  privilegedHostPaths: Record<string, EnvironmentCapability>;
}

export const DEFAULT_PROVISIONER_CONFIG: ProvisionerConfig = {
  privilegedHostPaths: {
    '/var/run/docker.sock': EnvironmentCapability.ContainerRuntimeSocket,
  },
};

export interface ProvisionerStats {
  acquired: number;
  released: number;
  active: number;
}

class ContainerEnvironment implements EnvironmentHandle {
  private isReleased = false;

  constructor(
    readonly id: string,
    readonly owner: Readonly<EnvironmentOwner>,
    readonly imageRef: string,
    private readonly runtime: ContainerRuntime,
  ) {}

  get released(): boolean {
    return this.isReleased;
  }

  markReleased(): void {
    this.isReleased = true;
  }

  async exec(command: string[], options?: ExecOptions): Promise<ExecResult> {
    if (this.isReleased) {
      throw new ProvisionError('PROVISION.RELEASED', `Environment ${this.id} has already been released`, {
        stageName: this.owner.stageName,
      });
    }
    return this.runtime.exec(this.id, command, options);
  }
}

/** Provisioner backed by a ContainerRuntime. */
export class ContainerEnvironmentProvisioner implements EnvironmentProvisioner {
  private readonly config: ProvisionerConfig;
  private readonly handles = new Map<string, ContainerEnvironment>();
  private acquiredCount = 0;
  private releasedCount = 0;

  constructor(
    private readonly runtime: ContainerRuntime,
    config?: Partial<ProvisionerConfig>,
    private readonly log: Logger = rootLogger.child({ module: 'provisioner' }),
  ) {
    this.config = { ...DEFAULT_PROVISIONER_CONFIG, ...config };
  }

  async acquire(spec: EnvironmentSpec, owner: EnvironmentOwner, signal?: AbortSignal): Promise<EnvironmentHandle> {
    const stageName = owner.stageName;

    for (const mount of spec.mounts) {
      const required = this.config.privilegedHostPaths[mount.hostPath];
      if (required && !spec.capabilities.includes(required)) {
        throw new ProvisionError(
          'PROVISION.CAPABILITY_NOT_GRANTED',
          `Mounting ${mount.hostPath} requires the "${required}" capability`,
          {
            stageName,
            details: { hostPath: mount.hostPath, capability: required },
            suggestedFixes: [
              {
                type: 'GRANT_CAPABILITY',
                params: { capability: required },
                description: `Add "${required}" to the stage environment's capabilities`,
              },
            ],
          },
        );
      }
      if (!(await this.runtime.hostPathExists(mount.hostPath))) {
        throw new ProvisionError('PROVISION.MOUNT_UNAVAILABLE', `Host path ${mount.hostPath} is not available`, {
          stageName,
          details: { hostPath: mount.hostPath },
        });
      }
    }

    let handleId: string;
    try {
      const created = await this.runtime.create(
        {
          imageRef: spec.image,
          mounts: spec.mounts,
          entrypointOverride: spec.entrypointOverride,
          workingDir: spec.workingDir,
          labels: {
            'shipyard.run': owner.runId,
            'shipyard.run-number': String(owner.runNumber),
            'shipyard.stage': stageName,
            'shipyard.attempt': String(owner.attempt),
          },
        },
        signal,
      );
      handleId = created.handleId;
    } catch (err) {
      throw toProvisionError(err, spec.image, stageName);
    }

    const handle = new ContainerEnvironment(handleId, Object.freeze({ ...owner }), spec.image, this.runtime);
    this.handles.set(handleId, handle);
    this.acquiredCount++;
    this.log.debug('Environment acquired', { environmentId: handleId, image: spec.image, ...owner });
    return handle;
  }

  async release(handle: EnvironmentHandle): Promise<void> {
    const tracked = this.handles.get(handle.id);
    if (!tracked || tracked.released) return;

    tracked.markReleased();
    this.handles.delete(handle.id);
    this.releasedCount++;

    try {
      await this.runtime.destroy(handle.id);
      this.log.debug('Environment released', { environmentId: handle.id, ...handle.owner });
    } catch (err) {
      // The handle is released from the pipeline's point of view; a
      // container the runtime could not remove is left for its own GC.
      this.log.error('Environment teardown failed', {
        environmentId: handle.id,
        ...handle.owner,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  stats(): ProvisionerStats {
    return {
      acquired: this.acquiredCount,
      released: this.releasedCount,
      active: this.handles.size,
    };
  }
}

function toProvisionError(err: unknown, image: string, stageName: string): ProvisionError {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof RuntimeError && err.reason === 'image-unavailable') {
    return new ProvisionError('PROVISION.IMAGE_UNAVAILABLE', `Execution image ${image} could not be obtained: ${message}`, {
      stageName,
      details: { image },
      suggestedFixes: [{ type: 'CHECK_IMAGE', params: { image }, description: 'Verify the image name and registry access' }],
    });
  }
  if (err instanceof RuntimeError && err.reason === 'mount-unavailable') {
    return new ProvisionError('PROVISION.MOUNT_UNAVAILABLE', message, { stageName });
  }
  return new ProvisionError('PROVISION.FAILED', `Environment could not be created: ${message}`, {
    stageName,
    details: { image },
  });
}
