// src/routes/query.ts — POST /api/recipes/query: validate body → orchestrator → JSON envelope
import express, { type Request, type Response, type NextFunction } from 'express';
import { getCorrelationId } from '@/middleware/correlation';
import { logger } from '@/services/logger';
import type { QueryOrchestrator } from '@/services/orchestrator';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { validateRecipeQueryRequest } from '@/validation/recipeQuery.validation';

export function createQueryRouter(orchestrator: QueryOrchestrator): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateRecipeQueryRequest(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid request body', validation.error, 'INVALID_QUERY'));
      return;
    }

    const { message, preferences } = validation.data;
    try {
      const response = await orchestrator.answer({ text: message, preferences });
      logger.info('http:query_answered', {
        correlationId: getCorrelationId(res),
        candidates: response.candidates.length,
        elapsedMs: response.degraded.elapsedMs,
      });
      res.status(200).json(createSuccessResponse(response));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
