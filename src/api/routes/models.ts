/**
 * Gateway - Model Info Route
 * GET /models/info describes the configured models without loading them
 */

import { Router, type Request, type RequestHandler, type Response } from 'express';

import { asyncHandler } from '../../gateway/middleware/errorHandler.js';
import type { PredictionOrchestrator } from '../../prediction/orchestrator.js';

export interface ModelsRouterOptions {
  orchestrator: PredictionOrchestrator;
  authenticate: RequestHandler;
  rateLimit: RequestHandler;
}

export function createModelsRouter(options: ModelsRouterOptions): Router {
  const router = Router();

  router.get(
    '/models/info',
    options.authenticate,
    options.rateLimit,
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await options.orchestrator.describeModels());
    })
  );

  return router;
}
