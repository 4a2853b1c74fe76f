/**
 * Artifact builder.
 *
 * Builds the run's image inside the build stage's environment and returns
 * the immutable Artifact record. The tag is always `<repository>:<runNumber>`
 * and the image is labelled with its source revision, so the same commit
 * and build context produce the same artifact.
 */

import { Artifact, createArtifact, imageRef, isDigest } from '../domain/artifact';
import { BuildError } from '../domain/errors';
import { SourceRef } from '../domain/source';
import { EnvironmentHandle } from '../environment/provisioner';

export interface BuildTagHint {
  repository: string;
  runNumber: number;
}

export interface BuildOptions {
  contextDir: string;
  dockerfile?: string;
  buildArgs?: Record<string, string>;
  signal?: AbortSignal;
  /** Receives build output lines for the stage log. */
  onOutput?: (line: string) => void;
}

const STDERR_TAIL_LINES = 20;

export class ArtifactBuilder {
  constructor(private readonly dockerPath: string = 'docker') {}

  async build(
    environment: EnvironmentHandle,
    source: SourceRef,
    tagHint: BuildTagHint,
    options: BuildOptions,
  ): Promise<Artifact> {
    const stageName = environment.owner.stageName;
    const ref = imageRef(tagHint.repository, String(tagHint.runNumber));

    const contextCheck = await environment.exec(['test', '-d', options.contextDir], { signal: options.signal });
    if (contextCheck.exitCode !== 0) {
      throw new BuildError('BUILD.MISSING_CONTEXT', `Build context ${options.contextDir} does not exist`, {
        stageName,
        details: { contextDir: options.contextDir },
      });
    }

    const args = [
      this.dockerPath,
      'build',
      '--tag',
      ref,
      '--label',
      `org.opencontainers.image.revision=${source.commit}`,
      '--label',
      `org.opencontainers.image.source=${source.repository}`,
    ];
    if (options.dockerfile) {
      args.push('--file', options.dockerfile);
    }
    for (const key of Object.keys(options.buildArgs ?? {}).sort()) {
      args.push('--build-arg', `${key}=${options.buildArgs?.[key] ?? ''}`);
    }
    args.push(options.contextDir);

    const build = await environment.exec(args, { signal: options.signal });
    emitLines(build.stdout, options.onOutput);
    if (build.exitCode !== 0) {
      throw new BuildError('BUILD.FAILED', `docker build exited with code ${build.exitCode}`, {
        stageName,
        details: { imageRef: ref, exitCode: build.exitCode, stderr: tail(build.stderr, STDERR_TAIL_LINES) },
      });
    }

    const inspect = await environment.exec(
      [this.dockerPath, 'image', 'inspect', '--format', '{{.Id}}', ref],
      { signal: options.signal },
    );
    const digest = inspect.stdout.trim();
    if (inspect.exitCode !== 0 || !isDigest(digest)) {
      throw new BuildError('BUILD.MISSING_DIGEST', `Could not read the digest of ${ref}`, {
        stageName,
        details: { imageRef: ref, output: digest, stderr: tail(inspect.stderr, STDERR_TAIL_LINES) },
      });
    }

    return createArtifact({
      repository: tagHint.repository,
      runNumber: tagHint.runNumber,
      digest,
      source,
    });
  }
}

function emitLines(output: string, sink?: (line: string) => void): void {
  if (!sink) return;
  for (const line of output.split('\n')) {
    if (line.trim().length > 0) sink(line);
  }
}

function tail(text: string, lines: number): string {
  return text.trim().split('\n').slice(-lines).join('\n');
}
