/**
 * Gateway - Rate Limit Middleware
 * Runs after authentication; callers are counted by verified user id
 */

import type { NextFunction, Request, Response } from 'express';

import { logRateLimit } from '../utils/logger.js';
import { getClientIp } from '../utils/helpers.js';
import { RateLimitExceededError } from '../utils/types.js';

import type { RateLimiter } from './limiter.js';

export interface RateLimitMiddlewareOptions {
  limiter: RateLimiter;
  /** Counter name; defaults to the matched route path */
  endpoint?: string;
}

export function createRateLimitMiddleware(options: RateLimitMiddlewareOptions) {
  const { limiter } = options;

  return async function rateLimitMiddleware(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    const endpoint = options.endpoint ?? req.path;
    const identifier =
      req.identity !== undefined
        ? `user:${req.identity.userId}`
        : `ip:${getClientIp(req.headers, req.ip ?? 'unknown')}`;

    try {
      const decision = await limiter.allow(identifier, endpoint);
      const policy = limiter.policyFor(endpoint);

      res.setHeader('X-RateLimit-Limit', decision.limit.toString());
      res.setHeader('X-RateLimit-Remaining', decision.remaining.toString());
      res.setHeader('X-RateLimit-Reset', Math.ceil(decision.resetAt / 1000).toString());

      logRateLimit({
        requestId: req.requestId,
        identifier,
        endpoint,
        currentCount: decision.limit - decision.remaining,
        limit: decision.limit,
        windowMs: policy.windowMs,
        blocked: !decision.permitted,
      });

      if (!decision.permitted) {
        next(new RateLimitExceededError(decision.retryAfterMs ?? policy.windowMs));
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };
}
