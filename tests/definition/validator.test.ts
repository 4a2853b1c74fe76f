/**
 * Pipeline definition validator tests.
 */

import { validatePipelineDefinition } from '../../src/definition/validator';
import { StageActionKind } from '../../src/domain/stage';
import { IMAGE_REPOSITORY, TARGET, buildStage, deployStage, pipelineDocument, publishStage } from '../fixtures';

function errorMessages(document: unknown): string[] {
  return validatePipelineDefinition(document).errors.map((e) => e.message);
}

describe('validatePipelineDefinition', () => {
  it('accepts a build -> publish -> deploy pipeline and applies defaults', () => {
    const result = validatePipelineDefinition(pipelineDocument());

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);

    const pipeline = result.pipeline;
    expect(pipeline?.id).toBe('web');
    expect(pipeline?.credentials.map((c) => c.kind)).toEqual(['SecureString', 'SecureString', 'SecureString']);

    const [build, publish, deploy] = pipeline?.stages ?? [];
    expect(build.action).toEqual({
      kind: StageActionKind.Build,
      repository: IMAGE_REPOSITORY,
      contextDir: '.',
      dockerfile: undefined,
      buildArgs: undefined,
    });
    expect(build.environment.image).toBe('docker:24-cli');
    expect(build.environment.capabilities).toEqual(['container-runtime-socket']);
    expect(build.retry.maxAttempts).toBe(1);
    expect(build.secretScopes).toEqual([]);

    expect(publish.action.kind === StageActionKind.Publish && publish.action.tags).toEqual(['{runNumber}', 'latest']);
    expect(publish.retry).toMatchObject({ maxAttempts: 3, backoffStrategy: 'exponential', backoffBaseMs: 1, backoffMaxMs: 5 });

    expect(deploy.environment).toEqual({ image: 'amazon/aws-cli:2.15.30', mounts: [], capabilities: [] });
    expect(deploy.action.kind === StageActionKind.Trigger && deploy.action.target.imageSelection).toBe('latest');
  });

  it('rejects a non-object document', () => {
    expect(validatePipelineDefinition([]).errors.map((e) => e.code)).toEqual(['VALIDATION.SCHEMA']);
  });

  it('reports missing required fields with their path', () => {
    const result = validatePipelineDefinition({ ...pipelineDocument(), id: undefined });

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      code: 'VALIDATION.REQUIRED_FIELD',
      message: 'pipeline.id: is required',
      details: { path: 'pipeline.id' },
    });
  });

  it('requires at least one stage', () => {
    expect(errorMessages(pipelineDocument([]))).toEqual(['pipeline.stages: must be a non-empty array']);
  });

  it('rejects duplicate stage names', () => {
    expect(errorMessages(pipelineDocument([buildStage(), buildStage()]))).toEqual([
      'pipeline.stages[1].name: stage name "build" is used twice',
    ]);
  });

  it('rejects publish before build', () => {
    expect(errorMessages(pipelineDocument([publishStage(), buildStage(), deployStage()]))).toEqual([
      'stage "publish": a publish stage must come after a build stage',
    ]);
  });

  it('rejects a version deployment when no publish pushes the run tag', () => {
    const stages = [buildStage(), publishStage({ action: { ...publishAction(), tags: ['latest'] } }), deployStage('version')];

    expect(errorMessages(pipelineDocument(stages))).toEqual([
      'stage "deploy": imageSelection "version" needs an earlier publish stage that pushes "{runNumber}"',
    ]);
  });

  it('warns when a trigger has no earlier publish', () => {
    const result = validatePipelineDefinition(pipelineDocument([buildStage(), deployStage()]));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'stage "deploy": no earlier publish stage; the deployment will use whatever the registry holds',
      'credential "registry/username": allowedStages names unknown stage "publish"',
      'credential "registry/password": allowedStages names unknown stage "publish"',
    ]);
  });

  it('rejects a scope the credential does not allow', () => {
    const stages = [{ ...buildStage(), secretScopes: ['registry/password'] }, publishStage(), deployStage()];

    expect(errorMessages(pipelineDocument(stages))).toEqual([
      'stage "build".secretScopes: credential "registry/password" is not allowed for this stage',
    ]);
  });

  it('rejects an action reading a secret outside its scopes', () => {
    const stages = [buildStage(), publishStage({ secretScopes: ['registry/username'] }), deployStage()];

    expect(errorMessages(pipelineDocument(stages))).toEqual([
      'stage "publish".action: reads "registry/password" which is not in its secretScopes',
    ]);
  });

  it('keeps build stages at one attempt with a warning', () => {
    const stages = [{ ...buildStage(), retry: { maxAttempts: 3 } }, publishStage(), deployStage()];
    const result = validatePipelineDefinition(pipelineDocument(stages));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['stage "build".retry.maxAttempts: build stages are never retried; using 1']);
    expect(result.pipeline?.stages[0].retry.maxAttempts).toBe(1);
  });

  it('rejects invalid retry values', () => {
    const stages = [
      buildStage(),
      publishStage({ retry: { maxAttempts: 0, timeoutMs: -1, backoffBaseMs: 100, backoffMaxMs: 50, backoffStrategy: 'random' } }),
      deployStage(),
    ];

    expect(validatePipelineDefinition(pipelineDocument(stages)).errors.map((e) => e.code)).toEqual([
      'VALIDATION.INVALID_ATTEMPTS',
      'VALIDATION.INVALID_TIMEOUT',
      'VALIDATION.INVALID_BACKOFF',
      'VALIDATION.INVALID_VALUE',
    ]);
  });

  it('rejects unknown capabilities and relative mount paths', () => {
    const stages = [
      {
        ...buildStage(),
        environment: {
          image: 'docker:24-cli',
          mounts: [{ hostPath: 'var/run/docker.sock', containerPath: '/var/run/docker.sock' }],
          capabilities: ['root'],
        },
      },
    ];

    expect(validatePipelineDefinition(pipelineDocument(stages)).errors.map((e) => e.code)).toEqual([
      'VALIDATION.INVALID_MOUNT',
      'VALIDATION.UNKNOWN_CAPABILITY',
    ]);
  });

  it('rejects invalid variable names in credentialEnv', () => {
    const stages = [
      buildStage(),
      publishStage(),
      {
        ...deployStage(),
        action: { kind: 'trigger', target: TARGET, credentialEnv: { 'aws-key': 'deploy/secret-key' } },
      },
    ];

    expect(errorMessages(pipelineDocument(stages))).toEqual([
      'stage "deploy".action.credentialEnv: "aws-key" is not a valid variable name',
    ]);
  });

  it('rejects an unknown action kind', () => {
    expect(errorMessages(pipelineDocument([{ name: 'lint', action: { kind: 'lint' } }]))).toEqual([
      'stage "lint".action.kind: must be one of build, publish, trigger',
    ]);
  });
});

function publishAction(): Record<string, unknown> {
  return {
    kind: 'publish',
    registryUrl: 'registry.example.test',
    usernameSecret: 'registry/username',
    passwordSecret: 'registry/password',
  };
}
