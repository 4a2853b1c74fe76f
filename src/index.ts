/**
 * Shipyard: build, publish and deploy container images per commit.
 *
 * Entry point for the server. Loads configuration and pipeline
 * definitions, serves the webhook and run API, and on SIGTERM aborts
 * active runs and waits for their environments to be released.
 */

import { ConfigError, loadConfig } from './config';
import { PipelineDefinitionError, loadPipelineFile } from './definition/loader';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext, registerPipelines } from './server';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const context = createAppContext(config);
  if (config.pipelineFile) {
    const { pipelines, warnings } = await loadPipelineFile(config.pipelineFile);
    for (const warning of warnings) {
      logger.warn('Pipeline definition warning', { file: config.pipelineFile, warning });
    }
    await registerPipelines(context, pipelines);
  } else {
    logger.warn('No pipeline file configured; set SHIPYARD_PIPELINE_FILE');
  }

  const server = createApp(context).listen(config.port, () => {
    logger.info('Server listening', { port: config.port, backend: config.backend });
  });

  let stopping = false;
  const stop = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal, activeRuns: context.executor.activeRunIds().length });
    server.close();
    context.executor
      .shutdown(`server ${signal}`)
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', { error: err.message, code: err.typedError.code });
    } else if (err instanceof PipelineDefinitionError) {
      logger.error('Invalid pipeline definition', { error: err.message });
    } else {
      logger.error('Startup failed', { error: err instanceof Error ? err.message : String(err) });
    }
    process.exit(1);
  });
}

// Public exports for programmatic use
export { createApp, createAppContext, registerPipelines } from './server';
export * from './backends';
export * from './config';
export * from './domain';
export * from './definition';
export * from './engine';
export * from './environment';
export * from './secrets';
export * from './artifact';
export * from './registry';
export * from './deploy';
export * from './storage';
export * from './data-plane';
