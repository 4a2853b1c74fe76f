import { MemoryBackends, memoryBackends } from '../src/backends';
import { loadConfig } from '../src/config';
import { validatePipelineDefinition } from '../src/definition/validator';
import { PipelineDefinition } from '../src/domain/pipeline';
import { AppContext, createAppContext, registerPipelines } from '../src/server';
import { MemoryCluster, MemoryRegistry, MemorySecretStore } from '../src/testing';

export const IMAGE_REPOSITORY = 'registry.example.test/team/web';
export const SOURCE_REPOSITORY = 'team/web';
export const COMMIT = '3f2a9c1d5e7b8a0f4c6d2e1b9a8f7c6d5e4b3a21';

export const REGISTRY_USER = 'ci-bot';
export const REGISTRY_PASSWORD = 'test-secret';
export const DEPLOY_KEY = 'test-deploy-key';

export const TARGET = {
  cluster: 'prod',
  service: 'web',
  region: 'eu-west-1',
  repository: IMAGE_REPOSITORY,
};

export function buildStage(): Record<string, unknown> {
  return { name: 'build', action: { kind: 'build', repository: IMAGE_REPOSITORY } };
}

export function publishStage(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'publish',
    secretScopes: ['registry/username', 'registry/password'],
    action: {
      kind: 'publish',
      registryUrl: 'registry.example.test',
      usernameSecret: 'registry/username',
      passwordSecret: 'registry/password',
    },
    retry: { backoffBaseMs: 1, backoffMaxMs: 5 },
    ...overrides,
  };
}

export function deployStage(imageSelection: 'latest' | 'version' = 'latest'): Record<string, unknown> {
  return {
    name: 'deploy',
    secretScopes: ['deploy/secret-key'],
    action: {
      kind: 'trigger',
      target: { ...TARGET, imageSelection },
      credentialEnv: { AWS_SECRET_ACCESS_KEY: 'deploy/secret-key' },
    },
  };
}

/** build -> publish -> deploy, deploying the floating `latest` tag. */
export function pipelineDocument(stages: unknown[] = [buildStage(), publishStage(), deployStage()]): Record<string, unknown> {
  return {
    id: 'web',
    name: 'Web service',
    sourceRepository: SOURCE_REPOSITORY,
    branches: ['main'],
    credentials: [
      { name: 'registry/username', allowedStages: ['publish'] },
      { name: 'registry/password', allowedStages: ['publish'] },
      { name: 'deploy/secret-key', allowedStages: ['deploy'] },
    ],
    stages,
  };
}

export function definePipeline(document: unknown = pipelineDocument()): PipelineDefinition {
  const result = validatePipelineDefinition(document);
  if (!result.pipeline) {
    throw new Error(`invalid test pipeline: ${result.errors.map((e) => e.message).join('; ')}`);
  }
  return result.pipeline;
}

export interface Harness {
  ctx: AppContext;
  backends: MemoryBackends;
  secrets: MemorySecretStore;
  pipeline: PipelineDefinition;
}

/** App context on in-process backends with one registered pipeline. */
export async function createHarness(
  pipeline: PipelineDefinition = definePipeline(),
  env: NodeJS.ProcessEnv = {},
): Promise<Harness> {
  const config = loadConfig({ SHIPYARD_BACKEND: 'memory', ...env });
  const secrets = new MemorySecretStore({
    'registry/username': REGISTRY_USER,
    'registry/password': REGISTRY_PASSWORD,
    'deploy/secret-key': DEPLOY_KEY,
  });
  const registry = new MemoryRegistry({ username: REGISTRY_USER, password: REGISTRY_PASSWORD });
  const cluster = new MemoryCluster(registry, { AWS_SECRET_ACCESS_KEY: DEPLOY_KEY });
  const backends = memoryBackends(config, { secretStore: secrets, registry, cluster });
  const ctx = createAppContext(config, backends);
  await registerPipelines(ctx, [pipeline]);
  return { ctx, backends, secrets, pipeline };
}

export function source(commit: string = COMMIT) {
  return { repository: SOURCE_REPOSITORY, branch: 'main', commit };
}
