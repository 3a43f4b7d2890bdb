/**
 * Gateway - Prediction Route
 *
 * POST /predict
 * Authenticated, rate limited. Body parsing happens after both so anonymous or
 * throttled callers never cost a parse.
 */

import express, { Router, type Request, type RequestHandler, type Response } from 'express';

import { asyncHandler } from '../../gateway/middleware/errorHandler.js';
import type { PredictionOrchestrator } from '../../prediction/orchestrator.js';
import logger from '../../utils/logger.js';
import { validatePassenger } from '../../validation/validator.js';

export interface PredictRouterOptions {
  orchestrator: PredictionOrchestrator;
  authenticate: RequestHandler;
  rateLimit: RequestHandler;
  bodyLimit: string;
}

export function createPredictRouter(options: PredictRouterOptions): Router {
  const router = Router();

  router.post(
    '/predict',
    options.authenticate,
    options.rateLimit,
    express.json({ limit: options.bodyLimit }),
    asyncHandler(async (req: Request, res: Response) => {
      const { features, anomalies } = validatePassenger(req.body);

      if (anomalies.length > 0) {
        logger.warn('Unusual prediction input', {
          requestId: req.requestId,
          userId: req.identity?.userId,
          anomalies,
        });
      }

      const result = await options.orchestrator.predict(features);

      logger.info('Prediction served', {
        requestId: req.requestId,
        userId: req.identity?.userId,
        label: result.ensemble.label,
        confidenceLevel: result.ensemble.confidence_level,
      });

      res.json(result);
    })
  );

  return router;
}
