/**
 * API middleware: error mapping.
 */

import { NextFunction, Request, Response } from 'express';
import { ApiErrorResponse, TypedError, apiError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

/** Anything carrying a TypedError (PipelineError, ExecutorError, ConfigError). */
interface WithTypedError {
  typedError: TypedError;
}

function hasTypedError(err: unknown): err is WithTypedError {
  if (err === null || typeof err !== 'object' || !('typedError' in err)) return false;
  const typed: unknown = err.typedError;
  return typed !== null && typeof typed === 'object' && 'code' in typed && typeof typed.code === 'string';
}

/** HTTP status for a TypedError code. */
export function getHttpStatus(error: TypedError): number {
  if (error.code === 'AUTH.UNAUTHENTICATED' || error.code === 'AUTH.INVALID_SIGNATURE') return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'RUN.ALREADY_RUNNING' || error.code === 'RUN.INVALID_STATE_TRANSITION') return 409;
  return 500;
}

/** Map a thrown value to a status and error body. */
export function toErrorResponse(err: unknown, fallbackMessage: string): { status: number; body: ApiErrorResponse } {
  if (hasTypedError(err)) {
    return { status: getHttpStatus(err.typedError), body: apiError(err.typedError) };
  }
  return {
    status: 500,
    body: apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: err instanceof Error ? err.message : fallbackMessage,
        retryable: false,
      }),
    ),
  };
}

/** Send the error response for a failed route handler. */
export function sendError(res: Response, err: unknown, fallbackMessage: string): void {
  const { status, body } = toErrorResponse(err, fallbackMessage);
  if (status >= 500) {
    logger.error('Request failed', { code: body.error.code, message: body.error.message });
  }
  res.status(status).json(body);
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorResponse(err, 'Internal server error');
  if (status < 500) {
    logger.warn('Request error', { code: body.error.code, status });
  } else {
    logger.error('Unhandled request error', {
      message: body.error.message,
      stack: err instanceof Error ? err.stack : undefined,
    });
  }
  res.status(status).json(body);
}

/** Parse `limit` and `offset` query parameters. */
export function parsePagination(
  query: Request['query'],
  defaults: { limit: number; max: number },
): { limit: number; offset: number } {
  const rawLimit = typeof query.limit === 'string' ? parseInt(query.limit, 10) : defaults.limit;
  const rawOffset = typeof query.offset === 'string' ? parseInt(query.offset, 10) : 0;
  return {
    limit: Number.isNaN(rawLimit) || rawLimit < 1 ? defaults.limit : Math.min(rawLimit, defaults.max),
    offset: Number.isNaN(rawOffset) || rawOffset < 0 ? 0 : rawOffset,
  };
}
