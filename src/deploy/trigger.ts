/**
 * Deployment trigger.
 *
 * Turns the run's outputs into a convergence request and hands it to the
 * cluster. The request is acknowledged, not awaited: the service rolls out
 * on its own schedule. Repeating a trigger for the same image leaves the
 * service where it already is.
 */

import { Artifact, LATEST_TAG, PublishAck, imageRef } from '../domain/artifact';
import { DeploymentAck, DeploymentRequest, DeploymentTarget } from '../domain/deployment';
import { PipelineError, TriggerError } from '../domain/errors';
import { EnvironmentHandle } from '../environment/provisioner';
import { ClusterClientError, ClusterClientFactory, awsCliClusterClientFactory } from './cluster-client';

/**
 * Build the request for a target from what earlier stages produced.
 * `version` targets need the run's artifact; `latest` targets do not.
 */
export function resolveDeploymentRequest(
  target: DeploymentTarget,
  artifact: Artifact | undefined,
  publication: PublishAck | undefined,
  stageName?: string,
): DeploymentRequest {
  if (target.imageSelection === 'latest') {
    const latest = publication?.tags.find((t) => t.tag === LATEST_TAG);
    return {
      target,
      imageRef: imageRef(target.repository, LATEST_TAG),
      expectedDigest: latest?.digest,
    };
  }

  if (!artifact) {
    throw new TriggerError('TRIGGER.NO_ARTIFACT', `Deploying a pinned version of ${target.repository} needs a built artifact`, {
      stageName,
      retryable: false,
    });
  }
  return {
    target,
    imageRef: imageRef(target.repository, artifact.tag),
    expectedDigest: publication?.digest ?? artifact.digest,
  };
}

export class DeploymentTrigger {
  constructor(private readonly clientFactory: ClusterClientFactory = awsCliClusterClientFactory()) {}

  async trigger(
    environment: EnvironmentHandle,
    request: DeploymentRequest,
    env: Record<string, string> = {},
    signal?: AbortSignal,
  ): Promise<DeploymentAck> {
    const stageName = environment.owner.stageName;
    const client = this.clientFactory(environment, { env, signal });
    const { target } = request;

    try {
      return await client.updateService(request);
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      const details = { cluster: target.cluster, service: target.service, region: target.region };

      if (err instanceof ClusterClientError && err.reason === 'unauthorized') {
        throw new TriggerError('TRIGGER.UNAUTHORIZED', `Not authorized to update ${target.service}: ${message}`, {
          stageName,
          retryable: false,
          details,
          suggestedFixes: [{ type: 'CHECK_CREDENTIALS', params: {}, description: 'Verify the deploy credentials and their permissions' }],
        });
      }
      if (err instanceof ClusterClientError && err.reason === 'not-found') {
        throw new TriggerError('TRIGGER.TARGET_NOT_FOUND', `Deployment target not found: ${message}`, {
          stageName,
          retryable: false,
          details,
        });
      }
      throw new TriggerError('TRIGGER.FAILED', `Deployment request failed: ${message}`, {
        stageName,
        retryable: true,
        details,
      });
    }
  }
}
