/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes and dependency
 * injection.
 */

import express from 'express';
import { AppConfig } from './config';
import { Backends, dockerBackends, memoryBackends } from './backends';
import { ArtifactBuilder } from './artifact/builder';
import { RunEventPublisher } from './data-plane/publisher';
import { DeploymentTrigger } from './deploy/trigger';
import { PipelineDefinition } from './domain/pipeline';
import { DefaultStageActions } from './engine/stage-actions';
import { PipelineExecutor } from './engine/executor';
import { StageRunner } from './engine/stage-runner';
import { ContainerEnvironmentProvisioner } from './environment/provisioner';
import { RegistryPublisher } from './registry/publisher';
import { SecretResolver } from './secrets/resolver';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { errorHandler } from './api/middleware';
import { createWebhookRoutes } from './api/webhooks';
import { createPipelineRoutes } from './api/pipelines';
import { createRunRoutes } from './api/runs';
import { createEventRoutes } from './api/events';
import { logger } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  backends: Backends;
  publisher: RunEventPublisher;
  provisioner: ContainerEnvironmentProvisioner;
  executor: PipelineExecutor;
}

/** Create the application context with all services. */
export function createAppContext(config: AppConfig, backends?: Backends, store?: Store): AppContext {
  const appBackends = backends ?? (config.backend === 'memory' ? memoryBackends(config) : dockerBackends(config));
  const appStore = store ?? createMemoryStore();
  const publisher = new RunEventPublisher(appStore.events);
  const provisioner = new ContainerEnvironmentProvisioner(appBackends.runtime, {
    privilegedHostPaths: config.privilegedHostPaths,
  });
  const actions = new DefaultStageActions(
    new ArtifactBuilder(config.dockerPath),
    new RegistryPublisher(appBackends.registryClients),
    new DeploymentTrigger(appBackends.clusterClients),
  );
  const stageRunner = new StageRunner(provisioner, new SecretResolver(appBackends.secretStore), actions);
  const executor = new PipelineExecutor(appStore, publisher, stageRunner, {
    supersedeActiveRuns: config.supersedeRuns,
  });

  return { config, store: appStore, backends: appBackends, publisher, provisioner, executor };
}

/** Store validated pipelines and prepare the backend for them. */
export async function registerPipelines(ctx: AppContext, pipelines: PipelineDefinition[]): Promise<void> {
  for (const pipeline of pipelines) {
    await ctx.store.pipelines.put(pipeline);
    ctx.backends.register(pipeline);
    logger.info('Pipeline registered', {
      pipelineId: pipeline.id,
      sourceRepository: pipeline.sourceRepository,
      stages: pipeline.stages.map((s) => s.name),
    });
  }
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  // Webhooks read their body raw for signature checks, so they are
  // mounted ahead of the JSON parser.
  app.use('/api/webhooks', createWebhookRoutes(ctx.store, ctx.executor, { secret: ctx.config.webhookSecret }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      backend: ctx.backends.kind,
      activeRuns: ctx.executor.activeRunIds().length,
      environments: ctx.provisioner.stats(),
    });
  });

  app.use('/api/pipelines', createPipelineRoutes(ctx.store, ctx.executor));
  app.use('/api/runs', createRunRoutes(ctx.store, ctx.executor));
  app.use('/api', createEventRoutes(ctx.store, ctx.publisher));

  app.use(errorHandler);

  return app;
}
