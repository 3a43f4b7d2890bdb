/**
 * Gateway - Request ID Middleware
 * Assigns a unique identifier to each incoming request for tracing
 */

import type { Request, Response, NextFunction } from 'express';
import { generateRequestId } from '../../utils/helpers.js';

// =============================================================================
// Constants
// =============================================================================

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';
const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[\w.:-]+$/;

// =============================================================================
// Request ID Middleware
// =============================================================================

/**
 * Reuse the caller's X-Request-ID when it is a plain token, otherwise mint a
 * UUID. The id is echoed on the response and stamped on `req.requestId`.
 */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const existingId = req.headers[REQUEST_ID_HEADER];
    const candidate = Array.isArray(existingId) ? existingId[0] : existingId;
    const requestId =
      candidate !== undefined &&
      candidate.length > 0 &&
      candidate.length <= MAX_REQUEST_ID_LENGTH &&
      REQUEST_ID_PATTERN.test(candidate)
        ? candidate
        : generateRequestId();

    req.requestId = requestId;
    req.startTime = Date.now();
    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);

    next();
  };
}

export default requestIdMiddleware;
