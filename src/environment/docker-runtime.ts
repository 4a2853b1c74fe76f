/**
 * Docker CLI container runtime.
 *
 * Implements ContainerRuntime by shelling out to the `docker` binary; no
 * Docker SDK dependency. Environments are started detached with a
 * keep-alive entrypoint and commands run through `docker exec`.
 *
 * Exec environment values are passed as `-e NAME` with the value set in the
 * CLI's own process environment, so secrets never appear on a command line.
 */

import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import { ContainerRuntime, EnvironmentRequest, ExecOptions, ExecResult, RuntimeError } from './runtime';

/** Process runner (injectable for testing). */
export type ProcessRunner = (
  file: string,
  args: readonly string[],
  options: { env?: Record<string, string>; stdin?: string; signal?: AbortSignal },
) => Promise<ExecResult>;

export interface DockerCliRuntimeOptions {
  dockerPath?: string;
  run?: ProcessRunner;
  /** Keep-alive command used when a spec has no entrypoint override. */
  keepAlive?: string[];
}

const IMAGE_UNAVAILABLE_PATTERNS = [
  /unable to find image/i,
  /pull access denied/i,
  /manifest unknown/i,
  /repository does not exist/i,
  /not found: manifest/i,
];

const NO_SUCH_CONTAINER = /no such container/i;

export class DockerCliRuntime implements ContainerRuntime {
  private readonly dockerPath: string;
  private readonly run: ProcessRunner;
  private readonly keepAlive: string[];

  constructor(options: DockerCliRuntimeOptions = {}) {
    this.dockerPath = options.dockerPath ?? 'docker';
    this.run = options.run ?? runProcess;
    this.keepAlive = options.keepAlive ?? ['sleep', 'infinity'];
  }

  async create(request: EnvironmentRequest, signal?: AbortSignal): Promise<{ handleId: string }> {
    const args = ['run', '--detach'];
    for (const [key, value] of Object.entries(request.labels)) {
      args.push('--label', `${key}=${value}`);
    }
    for (const mount of request.mounts) {
      args.push('--volume', `${mount.hostPath}:${mount.containerPath}${mount.readOnly ? ':ro' : ''}`);
    }
    if (request.workingDir) {
      args.push('--workdir', request.workingDir);
    }
    const [entrypoint, ...entrypointArgs] = request.entrypointOverride ?? this.keepAlive;
    args.push('--entrypoint', entrypoint, request.imageRef, ...entrypointArgs);

    const result = await this.run(this.dockerPath, args, { signal });
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      const reason = IMAGE_UNAVAILABLE_PATTERNS.some((p) => p.test(stderr))
        ? 'image-unavailable'
        : 'runtime-unavailable';
      throw new RuntimeError(stderr || `docker run exited with ${result.exitCode}`, reason);
    }
    return { handleId: result.stdout.trim() };
  }

  async exec(handleId: string, command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const args = ['exec'];
    if (options.stdin !== undefined) {
      args.push('--interactive');
    }
    for (const name of Object.keys(options.env ?? {})) {
      args.push('--env', name);
    }
    if (options.workingDir) {
      args.push('--workdir', options.workingDir);
    }
    args.push(handleId, ...command);

    const result = await this.run(this.dockerPath, args, {
      env: options.env,
      stdin: options.stdin,
      signal: options.signal,
    });
    if (result.exitCode !== 0 && NO_SUCH_CONTAINER.test(result.stderr)) {
      throw new RuntimeError(`Environment ${handleId} no longer exists`, 'not-found');
    }
    return result;
  }

  async destroy(handleId: string): Promise<void> {
    const result = await this.run(this.dockerPath, ['rm', '--force', handleId], {});
    if (result.exitCode !== 0 && !NO_SUCH_CONTAINER.test(result.stderr)) {
      throw new RuntimeError(result.stderr.trim() || `docker rm exited with ${result.exitCode}`, 'runtime-unavailable');
    }
  }

  async hostPathExists(hostPath: string): Promise<boolean> {
    try {
      await fs.access(hostPath);
      return true;
    } catch {
      return false;
    }
  }
}

/** Default runner: spawn the process, pipe stdin, collect output. */
export const runProcess: ProcessRunner = (file, args, options) =>
  new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(file, args, {
      env: { ...process.env, ...options.env },
      signal: options.signal,
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8').on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.setEncoding('utf8').on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', reject);
    child.on('close', (code) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
    if (options.stdin !== undefined) {
      child.stdin.end(options.stdin);
    } else {
      child.stdin.end();
    }
  });
