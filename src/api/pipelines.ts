/**
 * Pipeline API routes.
 *
 * GET /pipelines: List pipelines
 * GET /pipelines/:pipelineId: Get a pipeline definition
 * POST /pipelines/:pipelineId/runs: Start a run for a commit (manual trigger)
 * GET /pipelines/:pipelineId/runs: List runs, newest first
 */

import { Request, Router } from 'express';
import { apiError, notFoundError, validationError } from '../domain/errors';
import { PipelineExecutor } from '../engine/executor';
import { Logger, logger as rootLogger } from '../logger';
import { Store, toListResult } from '../storage/store';
import { parsePagination, sendError } from './middleware';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

export function createPipelineRoutes(
  store: Store,
  executor: PipelineExecutor,
  log: Logger = rootLogger.child({ module: 'api' }),
): Router {
  const router = Router();

  router.get('/', async (_req: Request, res) => {
    try {
      const pipelines = await store.pipelines.list();
      res.json({ pipelines, total: pipelines.length });
    } catch (err) {
      sendError(res, err, 'Failed to list pipelines');
    }
  });

  router.get('/:pipelineId', async (req: Request, res) => {
    try {
      const pipeline = await store.pipelines.getById(req.params.pipelineId);
      if (!pipeline) {
        res.status(404).json(apiError(notFoundError('Pipeline', req.params.pipelineId)));
        return;
      }
      res.json({ pipeline });
    } catch (err) {
      sendError(res, err, 'Failed to fetch pipeline');
    }
  });

  /**
   * POST /pipelines/:pipelineId/runs
   * Body: { branch, commit, triggeredBy? }. Branch filters do not apply.
   */
  router.post('/:pipelineId/runs', async (req: Request, res) => {
    try {
      const body: unknown = req.body;
      const fields = isRecord(body) ? body : {};
      const branch = nonEmptyString(fields.branch);
      const commit = nonEmptyString(fields.commit);
      if (!branch || !commit) {
        res.status(400).json(apiError(validationError('branch and commit are required', { fields: ['branch', 'commit'] })));
        return;
      }

      const pipeline = await store.pipelines.getById(req.params.pipelineId);
      if (!pipeline) {
        res.status(404).json(apiError(notFoundError('Pipeline', req.params.pipelineId)));
        return;
      }

      const run = await executor.createRun({
        pipelineId: pipeline.id,
        source: { repository: pipeline.sourceRepository, branch, commit },
        triggeredBy: nonEmptyString(fields.triggeredBy) ?? 'api',
      });

      executor.executeRun(run.id).catch((err: unknown) => {
        log.error('Run execution failed', {
          runId: run.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });

      res.status(201).json({ run });
    } catch (err) {
      sendError(res, err, 'Run creation failed');
    }
  });

  router.get('/:pipelineId/runs', async (req: Request, res) => {
    try {
      const pipeline = await store.pipelines.getById(req.params.pipelineId);
      if (!pipeline) {
        res.status(404).json(apiError(notFoundError('Pipeline', req.params.pipelineId)));
        return;
      }
      const page = parsePagination(req.query, { limit: 20, max: 100 });
      const [runs, total] = await Promise.all([
        store.runs.listByPipeline(pipeline.id, page),
        store.runs.countByPipeline(pipeline.id),
      ]);
      res.json(toListResult(runs, total, page));
    } catch (err) {
      sendError(res, err, 'Failed to list runs');
    }
  });

  return router;
}
