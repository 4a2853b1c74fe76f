/**
 * Registry boundary.
 *
 * `authenticate(registryUrl, credentials)` and `push(imageRef, tag)`, as
 * seen from inside a stage environment. The Docker CLI client reaches the
 * host daemon through the environment's mounted runtime socket, which is
 * where the build stage left the image.
 */

import { imageRef, parseImageRef } from '../domain/artifact';
import { EnvironmentHandle } from '../environment/provisioner';

export interface RegistryCredentials {
  username: string;
  password: string;
}

export interface PushResult {
  imageRef: string;
  digest: string;
}

export interface RegistryClient {
  authenticate(registryUrl: string, credentials: RegistryCredentials): Promise<void>;
  /** Push `sourceRef` under `tag` of the same repository. */
  push(sourceRef: string, tag: string): Promise<PushResult>;
}

export type RegistryClientErrorReason = 'unauthorized' | 'network' | 'rejected';

export class RegistryClientError extends Error {
  constructor(
    message: string,
    public readonly reason: RegistryClientErrorReason,
  ) {
    super(message);
    this.name = 'RegistryClientError';
  }
}

export type RegistryClientFactory = (environment: EnvironmentHandle, signal?: AbortSignal) => RegistryClient;

const UNAUTHORIZED_PATTERN = /unauthorized|authentication required|denied|incorrect username or password/i;
const PUSH_DIGEST_PATTERN = /digest: (sha256:[a-f0-9]{64})/;

export class DockerCliRegistryClient implements RegistryClient {
  constructor(
    private readonly environment: EnvironmentHandle,
    private readonly dockerPath: string = 'docker',
    private readonly signal?: AbortSignal,
  ) {}

  async authenticate(registryUrl: string, credentials: RegistryCredentials): Promise<void> {
    const result = await this.environment.exec(
      [this.dockerPath, 'login', '--username', credentials.username, '--password-stdin', registryUrl],
      { stdin: credentials.password, signal: this.signal },
    );
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new RegistryClientError(
        stderr || `docker login exited with ${result.exitCode}`,
        UNAUTHORIZED_PATTERN.test(stderr) ? 'unauthorized' : 'network',
      );
    }
  }

  async push(sourceRef: string, tag: string): Promise<PushResult> {
    const target = imageRef(parseImageRef(sourceRef).repository, tag);

    if (target !== sourceRef) {
      const tagged = await this.environment.exec([this.dockerPath, 'tag', sourceRef, target], { signal: this.signal });
      if (tagged.exitCode !== 0) {
        throw new RegistryClientError(tagged.stderr.trim() || `docker tag exited with ${tagged.exitCode}`, 'rejected');
      }
    }

    const pushed = await this.environment.exec([this.dockerPath, 'push', target], { signal: this.signal });
    if (pushed.exitCode !== 0) {
      const stderr = pushed.stderr.trim();
      throw new RegistryClientError(
        stderr || `docker push exited with ${pushed.exitCode}`,
        UNAUTHORIZED_PATTERN.test(stderr) ? 'unauthorized' : 'network',
      );
    }

    const match = PUSH_DIGEST_PATTERN.exec(pushed.stdout);
    if (!match) {
      throw new RegistryClientError(`docker push did not report a digest for ${target}`, 'rejected');
    }
    return { imageRef: target, digest: match[1] };
  }
}

export function dockerCliRegistryClientFactory(dockerPath = 'docker'): RegistryClientFactory {
  return (environment, signal) => new DockerCliRegistryClient(environment, dockerPath, signal);
}
