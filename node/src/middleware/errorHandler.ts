// node/src/middleware/errorHandler.ts — maps thrown errors onto the JSON error envelope
import type { Request, Response, NextFunction } from 'express';
import { InvalidQueryError, RecipeServiceError, errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { createErrorResponse, type ErrorResponse } from '@/utils/errorResponse';
import { getCorrelationId } from './correlation';

export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof InvalidQueryError) {
    return { status: 400, body: createErrorResponse('Invalid query', err.issues, err.code) };
  }
  if (err instanceof SyntaxError) {
    return { status: 400, body: createErrorResponse('Malformed JSON body', undefined, 'INVALID_QUERY') };
  }
  if (err instanceof RecipeServiceError) {
    return { status: 503, body: createErrorResponse(err.message, undefined, err.code) };
  }
  return { status: 500, body: createErrorResponse('Internal server error', undefined, 'INTERNAL') };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'NOT_FOUND'));
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  const { status, body } = toErrorResponse(err);
  const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
  log('http:request_failed', {
    correlationId: getCorrelationId(res),
    path: req.path,
    status,
    err: errorMessage(err),
  });
  res.status(status).json(body);
}
