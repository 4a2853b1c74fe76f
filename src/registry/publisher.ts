/**
 * Registry publisher.
 *
 * Pushes the run's artifact under every requested tag. The version tag is
 * pushed before `latest`, so the floating pointer never moves to an image
 * whose versioned tag failed to land. Re-pushing an existing tag with the
 * same digest is a no-op.
 */

import { Artifact, LATEST_TAG, PublishAck, PublishedTag, imageRef } from '../domain/artifact';
import { PipelineError, PublishError } from '../domain/errors';
import { EnvironmentHandle } from '../environment/provisioner';
import {
  RegistryClient,
  RegistryClientError,
  RegistryClientFactory,
  RegistryCredentials,
  dockerCliRegistryClientFactory,
} from './registry-client';

export interface PublishRequest {
  registryUrl: string;
  artifact: Artifact;
  tags: string[];
  credentials: RegistryCredentials;
  signal?: AbortSignal;
  onOutput?: (line: string) => void;
}

export class RegistryPublisher {
  constructor(private readonly clientFactory: RegistryClientFactory = dockerCliRegistryClientFactory()) {}

  async publish(environment: EnvironmentHandle, request: PublishRequest): Promise<PublishAck> {
    const stageName = environment.owner.stageName;
    const { artifact } = request;
    const client = this.clientFactory(environment, request.signal);

    await this.call(stageName, () => client.authenticate(request.registryUrl, request.credentials));
    request.onOutput?.(`Authenticated against ${request.registryUrl}`);

    const source = imageRef(artifact.repository, artifact.tag);
    const pushed: PublishedTag[] = [];
    for (const tag of orderTags(request.tags)) {
      const result = await this.push(client, stageName, source, tag);
      pushed.push({ tag, imageRef: result.imageRef, digest: result.digest, pushedAt: new Date().toISOString() });
      request.onOutput?.(`Pushed ${result.imageRef} (${result.digest})`);
    }

    const digests = new Set(pushed.map((p) => p.digest));
    if (digests.size > 1) {
      throw new PublishError('PUBLISH.DIGEST_MISMATCH', `Tags of ${artifact.repository} resolved to different digests`, {
        stageName,
        retryable: false,
        details: { tags: pushed.map((p) => ({ tag: p.tag, digest: p.digest })) },
      });
    }

    return {
      registryUrl: request.registryUrl,
      digest: pushed[0]?.digest ?? artifact.digest,
      tags: pushed,
    };
  }

  private push(client: RegistryClient, stageName: string, source: string, tag: string) {
    return this.call(stageName, () => client.push(source, tag), { tag });
  }

  private async call<T>(stageName: string, fn: () => Promise<T>, details?: Record<string, unknown>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      if (err instanceof RegistryClientError && err.reason === 'unauthorized') {
        throw new PublishError('PUBLISH.AUTH_FAILED', `Registry authentication failed: ${message}`, {
          stageName,
          details,
          suggestedFixes: [{ type: 'CHECK_CREDENTIALS', params: {}, description: 'Verify the registry credentials' }],
        });
      }
      throw new PublishError('PUBLISH.PUSH_FAILED', `Registry push failed: ${message}`, { stageName, details });
    }
  }
}

/** Versioned tags first, `latest` last. */
export function orderTags(tags: readonly string[]): string[] {
  const unique = [...new Set(tags)];
  return [...unique.filter((t) => t !== LATEST_TAG), ...unique.filter((t) => t === LATEST_TAG)];
}
