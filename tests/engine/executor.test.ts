import { ExecutorError } from '../../src/domain/errors';
import { RunEvent } from '../../src/domain/events';
import { PipelineDefinition } from '../../src/domain/pipeline';
import { RunStatus, StagePhase, StageRunStatus } from '../../src/domain/run';
import {
  COMMIT,
  DEPLOY_KEY,
  Harness,
  IMAGE_REPOSITORY,
  REGISTRY_PASSWORD,
  TARGET,
  buildStage,
  createHarness,
  definePipeline,
  deployStage,
  pipelineDocument,
  publishStage,
  source,
} from '../fixtures';

async function startRun(h: Harness, commit: string = COMMIT) {
  return h.ctx.executor.createRun({ pipelineId: h.pipeline.id, source: source(commit), triggeredBy: 'test' });
}

function stageStatuses(run: { stageResults: Array<{ name: string; status: StageRunStatus }> }) {
  return run.stageResults.map((r) => [r.name, r.status]);
}

describe('PipelineExecutor', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
  });

  it('creates a pending run with frozen stages and pending results', async () => {
    const run = await startRun(h);

    expect(run.id).toMatch(/^run_/);
    expect(run.runNumber).toBe(1);
    expect(run.status).toBe(RunStatus.Pending);
    expect(stageStatuses(run)).toEqual([
      ['build', StageRunStatus.Pending],
      ['publish', StageRunStatus.Pending],
      ['deploy', StageRunStatus.Pending],
    ]);
    expect(Object.isFrozen(run.stages[1].retry)).toBe(true);
  });

  it('rejects a run for an unknown pipeline', async () => {
    await expect(
      h.ctx.executor.createRun({ pipelineId: 'missing', source: source(), triggeredBy: 'test' }),
    ).rejects.toBeInstanceOf(ExecutorError);
  });

  it('run numbers increase per pipeline', async () => {
    const first = await startRun(h);
    const second = await startRun(h);
    expect([first.runNumber, second.runNumber]).toEqual([1, 2]);
  });

  it('executes build, publish and deploy to success', async () => {
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);

    expect(finished.status).toBe(RunStatus.Succeeded);
    expect(stageStatuses(finished)).toEqual([
      ['build', StageRunStatus.Succeeded],
      ['publish', StageRunStatus.Succeeded],
      ['deploy', StageRunStatus.Succeeded],
    ]);
    expect(finished.artifact?.repository).toBe(IMAGE_REPOSITORY);
    expect(finished.artifact?.tag).toBe('1');
    expect(finished.artifact?.source.commit).toBe(COMMIT);
    expect(finished.publication?.tags.map((t) => t.tag)).toEqual(['1', 'latest']);
    expect(finished.deployment?.imageRef).toBe(`${IMAGE_REPOSITORY}:latest`);

    const stored = await h.ctx.store.runs.getById(run.id);
    expect(stored?.status).toBe(RunStatus.Succeeded);
  });

  it('the version tag and latest resolve to the built digest', async () => {
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);
    const digest = finished.artifact?.digest;

    expect(digest).toMatch(/^sha256:[a-f0-9]{64}$/);
    expect(h.backends.registry.resolve(`${IMAGE_REPOSITORY}:1`)).toBe(digest);
    expect(h.backends.registry.resolve(`${IMAGE_REPOSITORY}:latest`)).toBe(digest);
    expect(finished.publication?.digest).toBe(digest);
    expect(h.backends.cluster.describeService(TARGET)?.digest).toBe(digest);
  });

  it('stages run in order and each environment is released before the next is acquired', async () => {
    const run = await startRun(h);
    await h.ctx.executor.executeRun(run.id);

    const lifecycle = h.backends.runtime
      .timeline()
      .filter((e) => e.type !== 'exec')
      .map((e) => `${e.type}:${e.stage}`);
    expect(lifecycle).toEqual([
      'create:build',
      'destroy:build',
      'create:publish',
      'destroy:publish',
      'create:deploy',
      'destroy:deploy',
    ]);
  });

  it('every acquired environment is released', async () => {
    const run = await startRun(h);
    await h.ctx.executor.executeRun(run.id);

    expect(h.ctx.provisioner.stats()).toEqual({ acquired: 3, released: 3, active: 0 });
    expect(h.backends.runtime.activeEnvironments()).toHaveLength(0);
  });

  it('each attempt walks every phase', async () => {
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);

    for (const result of finished.stageResults) {
      expect(result.attempts).toHaveLength(1);
      expect(result.attempts[0].phases).toEqual([
        StagePhase.Acquiring,
        StagePhase.SecretResolving,
        StagePhase.Executing,
        StagePhase.Releasing,
        StagePhase.Done,
      ]);
    }
  });

  it('a failed build skips publish and deploy', async () => {
    h.backends.docker.failNextBuild();
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);

    expect(finished.status).toBe(RunStatus.Failed);
    expect(finished.error?.code).toBe('BUILD.FAILED');
    expect(finished.error?.stageName).toBe('build');
    expect(finished.error?.runId).toBe(run.id);
    expect(stageStatuses(finished)).toEqual([
      ['build', StageRunStatus.Failed],
      ['publish', StageRunStatus.Skipped],
      ['deploy', StageRunStatus.Skipped],
    ]);
    expect(h.backends.registry.pushLog()).toEqual([]);
    expect(h.backends.cluster.requests()).toEqual([]);
    expect(h.ctx.provisioner.stats()).toEqual({ acquired: 1, released: 1, active: 0 });
  });

  it('each stage fetches only the credentials in its own scope', async () => {
    const run = await startRun(h);
    await h.ctx.executor.executeRun(run.id);

    expect(h.secrets.requests()).toEqual([
      { names: ['registry/username', 'registry/password'], withDecryption: true },
      { names: ['deploy/secret-key'], withDecryption: true },
    ]);
    expect(h.backends.cluster.requests()[0].env).toEqual({ AWS_SECRET_ACCESS_KEY: DEPLOY_KEY });
  });

  it('a stage scoping a credential it is not allowed fails before the store is read', async () => {
    const pipeline: PipelineDefinition = {
      ...h.pipeline,
      stages: h.pipeline.stages.map((s) => (s.name === 'build' ? { ...s, secretScopes: ['registry/password'] } : s)),
    };
    await h.ctx.store.pipelines.put(pipeline);

    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);

    expect(finished.status).toBe(RunStatus.Failed);
    expect(finished.error?.code).toBe('SECRETS.ACCESS_DENIED');
    expect(finished.stageResults[0].attempts[0].phases).toEqual([
      StagePhase.Acquiring,
      StagePhase.SecretResolving,
      StagePhase.Releasing,
      StagePhase.Done,
    ]);
    expect(h.secrets.requests()).toEqual([]);
  });

  it('a transient push failure is retried in a fresh environment under a two-attempt policy', async () => {
    h = await createHarness(
      definePipeline(
        pipelineDocument([
          buildStage(),
          publishStage({ retry: { maxAttempts: 2, backoffBaseMs: 1, backoffMaxMs: 5 } }),
          deployStage(),
        ]),
      ),
    );
    h.backends.registry.failNextPushes(1);
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);

    expect(finished.stages[1].retry.maxAttempts).toBe(2);
    expect(finished.status).toBe(RunStatus.Succeeded);
    expect(stageStatuses(finished)).toEqual([
      ['build', StageRunStatus.Succeeded],
      ['publish', StageRunStatus.Succeeded],
      ['deploy', StageRunStatus.Succeeded],
    ]);
    const publish = finished.stageResults[1];
    expect(publish.attempts).toHaveLength(2);
    expect(publish.attempts[0].error?.code).toBe('PUBLISH.PUSH_FAILED');
    expect(publish.attempts[0].error?.details?.attempt).toBe(1);
    expect(publish.attempts[1].error).toBeUndefined();
    expect(publish.attempts[0].environmentId).not.toBe(publish.attempts[1].environmentId);

    const digest = finished.artifact?.digest;
    expect(finished.publication?.digest).toBe(digest);
    expect(h.backends.registry.pushLog()).toEqual([
      { repository: IMAGE_REPOSITORY, tag: '1', digest },
      { repository: IMAGE_REPOSITORY, tag: 'latest', digest },
    ]);
    expect(h.ctx.provisioner.stats()).toEqual({ acquired: 4, released: 4, active: 0 });
    expect(h.backends.cluster.describeService(TARGET)?.digest).toBe(digest);

    const retries = await h.ctx.publisher.getEventsByRun(run.id, { eventTypes: ['stage.retrying'] });
    expect(retries).toHaveLength(1);
    expect(retries[0].payload.nextAttempt).toBe(2);
  });

  it('a failed deployment fails the run but keeps what was published', async () => {
    h.backends.cluster.failNext('unauthorized');
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);

    expect(finished.status).toBe(RunStatus.Failed);
    expect(finished.error?.code).toBe('TRIGGER.UNAUTHORIZED');
    expect(stageStatuses(finished)).toEqual([
      ['build', StageRunStatus.Succeeded],
      ['publish', StageRunStatus.Succeeded],
      ['deploy', StageRunStatus.Failed],
    ]);

    const digest = finished.artifact?.digest;
    expect(finished.publication?.digest).toBe(digest);
    expect(h.backends.registry.resolve(`${IMAGE_REPOSITORY}:1`)).toBe(digest);
    expect(h.backends.registry.resolve(`${IMAGE_REPOSITORY}:latest`)).toBe(digest);
    expect(h.backends.cluster.describeService(TARGET)?.deployments).toBe(0);
    expect(h.ctx.provisioner.stats()).toEqual({ acquired: 3, released: 3, active: 0 });
  });

  it('secret values never reach recorded errors or stage logs', async () => {
    h.backends.registry.failNextPushes(3, `denied for ${REGISTRY_PASSWORD}`);
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);

    expect(finished.status).toBe(RunStatus.Failed);
    expect(finished.stageResults[1].attempts).toHaveLength(3);
    expect(finished.error?.code).toBe('PUBLISH.AUTH_FAILED');
    expect(finished.error?.message).toBe(
      `Registry authentication failed: error pushing ${IMAGE_REPOSITORY}:1: denied for [REDACTED]`,
    );
    for (const entry of finished.stageResults[1].logs) {
      expect(entry.message).not.toContain(REGISTRY_PASSWORD);
    }
  });

  it('repeating a deployment of the same commit leaves the service in the same state', async () => {
    const first = await startRun(h);
    const firstDone = await h.ctx.executor.executeRun(first.id);
    const afterFirst = h.backends.cluster.describeService(TARGET);

    const second = await startRun(h);
    const secondDone = await h.ctx.executor.executeRun(second.id);
    const afterSecond = h.backends.cluster.describeService(TARGET);

    expect(secondDone.artifact?.digest).toBe(firstDone.artifact?.digest);
    expect(afterSecond?.imageRef).toBe(afterFirst?.imageRef);
    expect(afterSecond?.digest).toBe(afterFirst?.digest);
    expect(afterSecond?.deployments).toBe(2);
  });

  it('emits lifecycle events in order', async () => {
    const run = await startRun(h);
    await h.ctx.executor.executeRun(run.id);

    const events = await h.ctx.publisher.getEventsByRun(run.id);
    const types = events.map((e) => e.type);
    expect(types[0]).toBe('run.created');
    expect(types[1]).toBe('run.started');
    expect(types[types.length - 1]).toBe('run.succeeded');
    expect(types.filter((t) => t === 'stage.succeeded')).toHaveLength(3);
    expect(types.indexOf('artifact.built')).toBeLessThan(types.indexOf('artifact.published'));
    expect(types.indexOf('artifact.published')).toBeLessThan(types.indexOf('deployment.triggered'));
  });

  it('a throwing subscriber does not change the outcome', async () => {
    h.ctx.publisher.subscribe({
      id: 'broken',
      callback: () => {
        throw new Error('subscriber exploded');
      },
    });
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);
    expect(finished.status).toBe(RunStatus.Succeeded);
  });

  it('rejects a second concurrent execution of the same run', async () => {
    const run = await startRun(h);
    const execution = h.ctx.executor.executeRun(run.id);

    await expect(h.ctx.executor.executeRun(run.id)).rejects.toMatchObject({
      typedError: { code: 'RUN.ALREADY_RUNNING' },
    });
    await expect(execution).resolves.toMatchObject({ status: RunStatus.Succeeded });
  });

  it('a pending run cannot start executing while it is being canceled', async () => {
    const run = await startRun(h);
    const runs = h.ctx.store.runs;
    const getById = runs.getById.bind(runs);
    let execution: Promise<unknown> | undefined;
    const spy = jest.spyOn(runs, 'getById').mockImplementation(async (id: string) => {
      // The second read happens inside the abort, after cancelRun has checked the run.
      if (spy.mock.calls.length === 2 && execution === undefined) {
        execution = h.ctx.executor.executeRun(id);
      }
      return getById(id);
    });

    const canceled = await h.ctx.executor.cancelRun(run.id, 'ops', 'wrong commit');
    spy.mockRestore();

    expect(canceled.status).toBe(RunStatus.Aborted);
    await expect(execution).rejects.toMatchObject({ typedError: { code: 'RUN.ALREADY_RUNNING' } });
    const stored = await h.ctx.store.runs.getById(run.id);
    expect(stored?.status).toBe(RunStatus.Aborted);
    expect(stored?.abortReason).toBe('wrong commit');
    expect(h.backends.runtime.createCount).toBe(0);
    expect(h.ctx.executor.activeRunIds()).toEqual([]);
  });

  it('canceling a running run aborts the in-flight stage and releases its environment', async () => {
    h.backends.docker.delay('build', 10_000);
    const run = await startRun(h);

    let cancellation: Promise<unknown> = Promise.resolve();
    h.ctx.publisher.subscribe({
      id: 'canceller',
      eventTypes: ['stage.phase'],
      callback: (event: RunEvent) => {
        if (event.stageName === 'build' && event.payload.phase === StagePhase.Executing) {
          cancellation = h.ctx.executor.cancelRun(run.id, 'tester', 'stop requested');
        }
      },
    });

    const finished = await h.ctx.executor.executeRun(run.id);
    await cancellation;

    expect(finished.status).toBe(RunStatus.Aborted);
    expect(finished.abortedBy).toBe('tester');
    expect(finished.abortReason).toBe('stop requested');
    expect(finished.error?.code).toBe('RUN.ABORTED');
    expect(finished.error?.message).toBe('Run aborted: stop requested');
    expect(stageStatuses(finished)).toEqual([
      ['build', StageRunStatus.Aborted],
      ['publish', StageRunStatus.Aborted],
      ['deploy', StageRunStatus.Aborted],
    ]);
    expect(finished.stageResults[0].error?.code).toBe('STAGE.ABORTED');
    expect(h.ctx.provisioner.stats()).toEqual({ acquired: 1, released: 1, active: 0 });
  });

  it('canceling a pending run aborts it at once', async () => {
    const run = await startRun(h);
    const canceled = await h.ctx.executor.cancelRun(run.id, 'tester');

    expect(canceled.status).toBe(RunStatus.Aborted);
    expect(canceled.abortedBy).toBe('tester');
    expect(canceled.error?.message).toBe('Run aborted');
    expect(stageStatuses(canceled).every(([, status]) => status === StageRunStatus.Aborted)).toBe(true);
  });

  it('canceling a finished run returns it unchanged', async () => {
    const run = await startRun(h);
    const finished = await h.ctx.executor.executeRun(run.id);
    const canceled = await h.ctx.executor.cancelRun(run.id, 'tester');

    expect(canceled.status).toBe(RunStatus.Succeeded);
    expect(canceled.completedAt).toBe(finished.completedAt);
  });

  it('canceling an unknown run raises RUN.NOT_FOUND', async () => {
    await expect(h.ctx.executor.cancelRun('run_missing', 'tester')).rejects.toMatchObject({
      typedError: { code: 'RUN.NOT_FOUND' },
    });
  });

  it('a newer run supersedes an older pending run', async () => {
    const older = await startRun(h);
    const newer = await startRun(h);

    const stored = await h.ctx.store.runs.getById(older.id);
    expect(stored?.status).toBe(RunStatus.Aborted);
    expect(stored?.abortReason).toBe('superseded by run #2');
    expect(stored?.abortedBy).toBe(`run:${newer.id}`);
    expect((await h.ctx.store.runs.getById(newer.id))?.status).toBe(RunStatus.Pending);
  });

  it('superseding can be turned off', async () => {
    const harness = await createHarness(definePipeline(), { SHIPYARD_SUPERSEDE_RUNS: 'false' });
    const older = await startRun(harness);
    await startRun(harness);

    expect((await harness.ctx.store.runs.getById(older.id))?.status).toBe(RunStatus.Pending);
  });

  it('an attempt that exceeds its timeout fails the stage', async () => {
    const document = pipelineDocument();
    const stages = document.stages;
    if (!Array.isArray(stages)) throw new Error('fixture has no stages');
    stages[0] = { name: 'build', action: { kind: 'build', repository: IMAGE_REPOSITORY }, retry: { timeoutMs: 50 } };
    const harness = await createHarness(definePipeline(document));
    harness.backends.docker.delay('build', 10_000);

    const run = await startRun(harness);
    const finished = await harness.ctx.executor.executeRun(run.id);

    expect(finished.status).toBe(RunStatus.Failed);
    expect(finished.error?.code).toBe('STAGE.TIMEOUT');
    expect(finished.stageResults[0].attempts).toHaveLength(1);
    expect(harness.ctx.provisioner.stats()).toEqual({ acquired: 1, released: 1, active: 0 });
  });

  it('shutdown aborts active runs and waits for them', async () => {
    h.backends.docker.delay('build', 10_000);
    const run = await startRun(h);
    const execution = h.ctx.executor.executeRun(run.id);

    // Let the run reach its build stage.
    await new Promise((resolve) => setTimeout(resolve, 20));
    await h.ctx.executor.shutdown('test shutdown');

    const finished = await execution;
    expect(finished.status).toBe(RunStatus.Aborted);
    expect(finished.abortReason).toBe('test shutdown');
    expect(h.ctx.executor.activeRunIds()).toEqual([]);
    expect(h.ctx.provisioner.stats().active).toBe(0);
  });
});
