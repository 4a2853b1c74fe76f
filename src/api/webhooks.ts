/**
 * Push webhook route.
 *
 * POST /webhooks/push: start a run for every pipeline built from the
 * pushed repository and branch.
 *
 * The body is read raw so the signature is checked over the exact bytes
 * the sender signed. GitHub sends `X-Hub-Signature-256: sha256=<hmac>`,
 * GitLab sends the shared secret itself in `X-Gitlab-Token`.
 */

import express, { Request, Router } from 'express';
import { createHmac, timingSafeEqual } from 'crypto';
import { apiError, createTypedError, notFoundError, validationError } from '../domain/errors';
import { pipelineAcceptsBranch } from '../domain/pipeline';
import { parsePushEvent } from '../domain/source';
import { PipelineExecutor } from '../engine/executor';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { sendError } from './middleware';

const SIGNATURE_PREFIX = 'sha256=';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
}

/** Check a push request against the shared webhook secret. */
export function verifyPushSignature(
  rawBody: Buffer,
  headers: { hubSignature?: string; gitlabToken?: string },
  secret: string,
): boolean {
  if (headers.hubSignature !== undefined) {
    const expected = SIGNATURE_PREFIX + createHmac('sha256', secret).update(rawBody).digest('hex');
    return safeEqual(headers.hubSignature, expected);
  }
  if (headers.gitlabToken !== undefined) {
    return safeEqual(headers.gitlabToken, secret);
  }
  return false;
}

function parseJson(raw: Buffer): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(raw.toString('utf8')) };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : 'Invalid JSON' };
  }
}

export function createWebhookRoutes(
  store: Store,
  executor: PipelineExecutor,
  options: { secret?: string; log?: Logger } = {},
): Router {
  const router = Router();
  const log = options.log ?? rootLogger.child({ module: 'webhooks' });

  router.post('/push', express.raw({ type: () => true, limit: '5mb' }), async (req: Request, res) => {
    try {
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

      if (options.secret) {
        const verified = verifyPushSignature(
          rawBody,
          { hubSignature: req.get('x-hub-signature-256'), gitlabToken: req.get('x-gitlab-token') },
          options.secret,
        );
        if (!verified) {
          log.warn('Rejected push with an invalid signature', { ip: req.ip });
          res.status(401).json(
            apiError(
              createTypedError({
                code: 'AUTH.INVALID_SIGNATURE',
                message: 'Webhook signature verification failed',
                retryable: false,
              }),
            ),
          );
          return;
        }
      }

      const body = parseJson(rawBody);
      if (!body.ok) {
        res.status(400).json(apiError(validationError(`Push payload is not valid JSON: ${body.message}`)));
        return;
      }

      const parsed = parsePushEvent(body.value);
      if (parsed.kind === 'invalid') {
        res.status(400).json(apiError(validationError(parsed.reason)));
        return;
      }
      if (parsed.kind === 'ignored') {
        log.info('Push ignored', { reason: parsed.reason });
        res.status(202).json({ ignored: true, reason: parsed.reason });
        return;
      }

      const { source } = parsed;
      const pipelines = await store.pipelines.listBySourceRepository(source.repository);
      if (pipelines.length === 0) {
        res.status(404).json(apiError(notFoundError('Pipeline for repository', source.repository)));
        return;
      }

      const accepting = pipelines.filter((p) => pipelineAcceptsBranch(p, source.branch));
      if (accepting.length === 0) {
        const reason = `branch ${source.branch} is not built`;
        log.info('Push ignored', { repository: source.repository, reason });
        res.status(202).json({ ignored: true, reason });
        return;
      }

      const runs: Array<{ runId: string; runNumber: number; pipelineId: string; status: string }> = [];
      for (const pipeline of accepting) {
        const run = await executor.createRun({ pipelineId: pipeline.id, source, triggeredBy: 'webhook:push' });
        executor.executeRun(run.id).catch((err: unknown) => {
          log.error('Run execution failed', {
            runId: run.id,
            error: err instanceof Error ? err.message : String(err),
          });
        });
        runs.push({ runId: run.id, runNumber: run.runNumber, pipelineId: run.pipelineId, status: run.status });
      }

      res.status(202).json({ runs });
    } catch (err) {
      sendError(res, err, 'Push handling failed');
    }
  });

  return router;
}
