/**
 * Backends: the external systems a stage reaches, wired per configuration.
 *
 * `docker` drives the real Docker CLI, reads secrets from the process
 * environment and deploys through the AWS CLI. `memory` uses the in-process
 * stand-ins, for dry runs and tests.
 */

import { AppConfig } from './config';
import { PipelineDefinition } from './domain/pipeline';
import { StageActionKind } from './domain/stage';
import { ClusterClientFactory, awsCliClusterClientFactory } from './deploy/cluster-client';
import { DockerCliRuntime } from './environment/docker-runtime';
import { ContainerRuntime } from './environment/runtime';
import { RegistryClientFactory, dockerCliRegistryClientFactory } from './registry/registry-client';
import { EnvSecretStore, SecretStore } from './secrets/secret-store';
import { FakeDockerCli, MemoryCluster, MemoryContainerRuntime, MemoryRegistry } from './testing';

export interface Backends {
  kind: AppConfig['backend'];
  runtime: ContainerRuntime;
  secretStore: SecretStore;
  registryClients: RegistryClientFactory;
  clusterClients: ClusterClientFactory;
  /** Prepare the backend for a pipeline (no-op for real systems). */
  register(pipeline: PipelineDefinition): void;
}

export function dockerBackends(config: AppConfig, env: NodeJS.ProcessEnv = process.env): Backends {
  return {
    kind: 'docker',
    runtime: new DockerCliRuntime({ dockerPath: config.dockerPath }),
    secretStore: new EnvSecretStore(config.secretPrefix, env),
    registryClients: dockerCliRegistryClientFactory(config.dockerPath),
    clusterClients: awsCliClusterClientFactory(),
    register: () => undefined,
  };
}

export interface MemoryBackends extends Backends {
  runtime: MemoryContainerRuntime;
  docker: FakeDockerCli;
  registry: MemoryRegistry;
  cluster: MemoryCluster;
}

export interface MemoryBackendOptions {
  secretStore?: SecretStore;
  registry?: MemoryRegistry;
  cluster?: MemoryCluster;
}

/**
 * In-process backends. Registering a pipeline creates its build contexts
 * and deployment services so a dry run can complete.
 */
export function memoryBackends(
  config: AppConfig,
  options: MemoryBackendOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): MemoryBackends {
  const registry = options.registry ?? new MemoryRegistry();
  const cluster = options.cluster ?? new MemoryCluster(registry);
  const docker = new FakeDockerCli(registry, config.dockerPath);
  const runtime = new MemoryContainerRuntime(docker.handler, Object.keys(config.privilegedHostPaths));

  return {
    kind: 'memory',
    runtime,
    docker,
    registry,
    cluster,
    secretStore: options.secretStore ?? new EnvSecretStore(config.secretPrefix, env),
    registryClients: dockerCliRegistryClientFactory(config.dockerPath),
    clusterClients: cluster.clientFactory(),
    register(pipeline) {
      for (const stage of pipeline.stages) {
        const { action } = stage;
        if (action.kind === StageActionKind.Build && !docker.contexts.has(action.contextDir)) {
          docker.setContext(action.contextDir, `context ${action.contextDir} of ${pipeline.id}`);
        }
        if (action.kind === StageActionKind.Trigger && !cluster.describeService(action.target)) {
          cluster.addService(action.target);
        }
      }
    },
  };
}
