/**
 * Run API routes.
 *
 * GET /runs/:runId: Run status with per-stage status, attempts and logs
 * POST /runs/:runId/cancel: Abort a pending or running run
 */

import { Request, Router } from 'express';
import { apiError, runNotFoundError } from '../domain/errors';
import { PipelineExecutor } from '../engine/executor';
import { Store } from '../storage/store';
import { sendError } from './middleware';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(body: unknown, key: string): string | undefined {
  const value = isRecord(body) ? body[key] : undefined;
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createRunRoutes(store: Store, executor: PipelineExecutor): Router {
  const router = Router();

  router.get('/:runId', async (req: Request, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(runNotFoundError(req.params.runId)));
        return;
      }
      res.json({ run });
    } catch (err) {
      sendError(res, err, 'Failed to fetch run');
    }
  });

  /**
   * POST /runs/:runId/cancel
   * Body: { reason?, canceledBy? }
   */
  router.post('/:runId/cancel', async (req: Request, res) => {
    try {
      const body: unknown = req.body;
      const run = await executor.cancelRun(
        req.params.runId,
        optionalString(body, 'canceledBy') ?? 'api',
        optionalString(body, 'reason'),
      );
      res.json({ run });
    } catch (err) {
      sendError(res, err, 'Run cancellation failed');
    }
  });

  return router;
}
