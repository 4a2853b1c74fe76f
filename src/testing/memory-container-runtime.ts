/**
 * In-memory container runtime.
 *
 * Implements ContainerRuntime without Docker, for tests and the `memory`
 * backend. Commands are answered by a pluggable handler (see FakeDockerCli).
 * Every create, exec and destroy is recorded on a timeline so tests can
 * assert ordering and that each environment was torn down.
 */

import { ContainerRuntime, EnvironmentRequest, ExecOptions, ExecResult, RuntimeError } from '../environment/runtime';

export interface MemoryEnvironment {
  id: string;
  request: EnvironmentRequest;
  destroyed: boolean;
}

export interface CommandContext {
  environment: MemoryEnvironment;
  options: ExecOptions;
}

/** Answers commands run inside an environment. */
export type CommandHandler = (command: string[], context: CommandContext) => ExecResult | Promise<ExecResult>;

export interface TimelineEntry {
  type: 'create' | 'exec' | 'destroy';
  environmentId: string;
  stage?: string;
  attempt?: number;
  command?: string[];
}

const succeed: CommandHandler = () => ({ exitCode: 0, stdout: '', stderr: '' });

export class MemoryContainerRuntime implements ContainerRuntime {
  private readonly environments = new Map<string, MemoryEnvironment>();
  private readonly events: TimelineEntry[] = [];
  private readonly hostPaths: Set<string>;
  private idCounter = 0;

  // -- Failure simulation --
  private nextCreateFailure: RuntimeError | null = null;
  private nextDestroyFailure: string | null = null;
  private nextCreateDelay: { ms: number; ignoreSignal: boolean } | null = null;

  constructor(
    private handler: CommandHandler = succeed,
    hostPaths: Iterable<string> = ['/var/run/docker.sock'],
  ) {
    this.hostPaths = new Set(hostPaths);
  }

  async create(request: EnvironmentRequest, signal?: AbortSignal): Promise<{ handleId: string }> {
    if (this.nextCreateDelay) {
      const { ms, ignoreSignal } = this.nextCreateDelay;
      this.nextCreateDelay = null;
      await this.wait(ms, ignoreSignal ? undefined : signal);
    }
    if (this.nextCreateFailure) {
      const failure = this.nextCreateFailure;
      this.nextCreateFailure = null;
      throw failure;
    }

    this.idCounter += 1;
    const id = `mem-env-${this.idCounter}`;
    this.environments.set(id, { id, request, destroyed: false });
    this.record('create', id);
    return { handleId: id };
  }

  async exec(handleId: string, command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const environment = this.environments.get(handleId);
    if (!environment || environment.destroyed) {
      throw new RuntimeError(`No such container: ${handleId}`, 'not-found');
    }
    this.record('exec', handleId, command);
    return this.handler(command, { environment, options });
  }

  async destroy(handleId: string): Promise<void> {
    if (this.nextDestroyFailure !== null) {
      const message = this.nextDestroyFailure;
      this.nextDestroyFailure = null;
      throw new RuntimeError(message, 'runtime-unavailable');
    }
    const environment = this.environments.get(handleId);
    if (!environment || environment.destroyed) return;
    environment.destroyed = true;
    this.record('destroy', handleId);
  }

  async hostPathExists(hostPath: string): Promise<boolean> {
    return this.hostPaths.has(hostPath);
  }

  // -----------------------------------------------------------------------
  // Configuration and failure simulation
  // -----------------------------------------------------------------------

  setCommandHandler(handler: CommandHandler): void {
    this.handler = handler;
  }

  /** Make the next create() reject. */
  simulateCreateFailure(error: RuntimeError = new RuntimeError('Unable to find image', 'image-unavailable')): void {
    this.nextCreateFailure = error;
  }

  /**
   * Make the next create() take `ms`. By default it rejects as soon as its
   * signal aborts; with `ignoreSignal` it finishes creating regardless.
   */
  simulateSlowCreate(ms: number, options: { ignoreSignal?: boolean } = {}): void {
    this.nextCreateDelay = { ms, ignoreSignal: options.ignoreSignal ?? false };
  }

  /** Make the next destroy() reject. */
  simulateDestroyFailure(message = 'Cannot connect to the Docker daemon'): void {
    this.nextDestroyFailure = message;
  }

  // -----------------------------------------------------------------------
  // Inspection
  // -----------------------------------------------------------------------

  get createCount(): number {
    return this.events.filter((e) => e.type === 'create').length;
  }

  get destroyCount(): number {
    return this.events.filter((e) => e.type === 'destroy').length;
  }

  activeEnvironments(): MemoryEnvironment[] {
    return [...this.environments.values()].filter((e) => !e.destroyed);
  }

  getEnvironment(id: string): MemoryEnvironment | undefined {
    return this.environments.get(id);
  }

  /** Create, exec and destroy calls in the order they happened. */
  timeline(): TimelineEntry[] {
    return this.events.map((e) => ({ ...e }));
  }

  private wait(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new RuntimeError('Environment creation canceled', 'runtime-unavailable'));
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new RuntimeError('Environment creation canceled', 'runtime-unavailable'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private record(type: TimelineEntry['type'], environmentId: string, command?: string[]): void {
    const labels = this.environments.get(environmentId)?.request.labels ?? {};
    const attempt = labels['shipyard.attempt'];
    this.events.push({
      type,
      environmentId,
      stage: labels['shipyard.stage'],
      attempt: attempt === undefined ? undefined : Number(attempt),
      command: command ? [...command] : undefined,
    });
  }
}
