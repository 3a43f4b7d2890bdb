/**
 * Gateway - Health Route
 *
 * GET /health            lifecycle state only
 * GET /health?detailed=true  adds model, resource and configuration checks
 *
 * Unauthenticated and never rate limited so orchestrators can always probe it.
 */

import { Router, type Request, type Response } from 'express';

import type { HealthChecker } from '../../gateway/health-checker.js';
import { asyncHandler } from '../../gateway/middleware/errorHandler.js';

export function createHealthRouter(healthChecker: HealthChecker): Router {
  const router = Router();

  router.get(
    '/health',
    asyncHandler(async (req: Request, res: Response) => {
      const detailed = req.query['detailed'] === 'true';
      const report = await healthChecker.check(detailed);

      res.status(healthChecker.isReady() ? 200 : 503).json(report);
    })
  );

  return router;
}
