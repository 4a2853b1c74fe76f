/**
 * Event stream API routes.
 *
 * GET /runs/:runId/events: List events for a run, oldest first.
 * Query: types (comma list), limit, offset.
 */

import { Request, Router } from 'express';
import { apiError, runNotFoundError } from '../domain/errors';
import { isRunEventType } from '../domain/events';
import { RunEventPublisher } from '../data-plane/publisher';
import { Store } from '../storage/store';
import { parsePagination, sendError } from './middleware';

export function createEventRoutes(store: Store, publisher: RunEventPublisher): Router {
  const router = Router();

  router.get('/runs/:runId/events', async (req: Request, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(runNotFoundError(req.params.runId)));
        return;
      }

      const eventTypes =
        typeof req.query.types === 'string' ? req.query.types.split(',').filter(isRunEventType) : undefined;
      const page = parsePagination(req.query, { limit: 1000, max: 1000 });

      const events = await publisher.getEventsByRun(run.id, { ...page, eventTypes });
      res.json({ events, total: events.length });
    } catch (err) {
      sendError(res, err, 'Failed to fetch run events');
    }
  });

  return router;
}
