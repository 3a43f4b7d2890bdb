/**
 * Gateway - Authentication Middleware
 */

import type { NextFunction, Request, Response } from 'express';

import logger from '../utils/logger.js';
import { AuthenticationError } from '../utils/types.js';

import { decodeUnverified, extractBearerToken, type TokenVerifier } from './token-verifier.js';

export interface AuthMiddlewareOptions {
  verifier: TokenVerifier;
}

/**
 * Require a valid bearer token and attach the caller identity to the request
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions) {
  const { verifier } = options;

  return async function authMiddleware(
    req: Request,
    _res: Response,
    next: NextFunction
  ): Promise<void> {
    let token: string | undefined;

    try {
      token = extractBearerToken(req.headers.authorization);
      req.identity = await verifier.verify(token);
      next();
    } catch (error) {
      if (error instanceof AuthenticationError) {
        // Expected client behaviour: debug only, with unverified claims for context
        const claimed = token !== undefined ? decodeUnverified(token) : null;
        logger.debug('Authentication rejected', {
          requestId: req.requestId,
          path: req.path,
          reason: error.reason,
          claimedSubject: claimed?.subject,
          claimedExpiry: claimed?.expiresAt?.toISOString(),
        });
      }
      next(error);
    }
  };
}
