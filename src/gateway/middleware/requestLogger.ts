/**
 * Gateway - Request Logging Middleware
 * Logs each request once its response has been sent
 */

import type { Request, Response, NextFunction } from 'express';

import { logRequest, type RequestLogData } from '../../utils/logger.js';
import { getClientIp } from '../../utils/helpers.js';

// =============================================================================
// Types
// =============================================================================

export interface RequestLoggerOptions {
  /** Skip logging for certain paths (e.g., health probes) */
  skipPaths?: string[];
}

// =============================================================================
// Request Logger Middleware
// =============================================================================

export function requestLogger(
  options: RequestLoggerOptions = {}
): (req: Request, res: Response, next: NextFunction) => void {
  const { skipPaths = [] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.some((path) => req.path.startsWith(path))) {
      next();
      return;
    }

    const startTime = req.startTime ?? Date.now();

    res.on('finish', () => {
      const logData: RequestLogData = {
        requestId: req.requestId ?? 'unknown',
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - startTime,
        ipAddress: getClientIp(req.headers, req.ip ?? 'unknown'),
      };

      const userAgent = req.headers['user-agent'];
      if (userAgent !== undefined) {
        logData.userAgent = userAgent;
      }
      if (req.identity !== undefined) {
        logData.userId = req.identity.userId;
      }
      const remaining = Number(res.getHeader('X-RateLimit-Remaining'));
      if (Number.isInteger(remaining)) {
        logData.rateLimitRemaining = remaining;
      }

      logRequest(logData);
    });

    next();
  };
}

export default requestLogger;
