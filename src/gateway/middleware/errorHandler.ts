/**
 * Gateway - Error Handler Middleware
 * Centralized error handling for the gateway
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

import logger from '../../utils/logger.js';
import { isRecord } from '../../utils/helpers.js';
import {
  AuthenticationError,
  GatewayError,
  RateLimitExceededError,
  ValidationError,
  type FieldErrors,
} from '../../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  details?: FieldErrors;
  reason?: string;
  retryAfter?: number;
}

/**
 * Errors raised by Express's body parser carry a `type` and a `status`
 */
interface BodyParserError {
  type: string;
  status: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return isRecord(err) && typeof err['type'] === 'string' && typeof err['status'] === 'number';
}

// =============================================================================
// Error Handler Middleware
// =============================================================================

/**
 * Central error handling middleware
 * Catches all errors and returns appropriate JSON responses
 */
export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorResponse = buildErrorResponse(err, req.requestId);

  logError(err, req, errorResponse);

  if (err instanceof RateLimitExceededError) {
    res.setHeader('Retry-After', err.retryAfterSeconds.toString());
  }

  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Build a standardized error response object
 */
export function buildErrorResponse(err: unknown, requestId?: string): ErrorResponse {
  let response: ErrorResponse;

  if (err instanceof GatewayError) {
    response = {
      error: err.isOperational ? err.message : 'Internal server error',
      code: err.code,
      statusCode: err.statusCode,
    };

    if (err instanceof ValidationError && Object.keys(err.fieldErrors).length > 0) {
      response.details = err.fieldErrors;
    }
    if (err instanceof AuthenticationError) {
      response.reason = err.reason;
    }
    if (err instanceof RateLimitExceededError) {
      response.retryAfter = err.retryAfterSeconds;
    }
  } else if (isBodyParserError(err) && err.type === 'entity.parse.failed') {
    response = { error: 'Request body is not valid JSON', code: 'MALFORMED_JSON', statusCode: 400 };
  } else if (isBodyParserError(err) && err.type === 'entity.too.large') {
    response = { error: 'Request body is too large', code: 'PAYLOAD_TOO_LARGE', statusCode: 413 };
  } else if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    response = { error: 'Request body could not be read', code: 'BAD_REQUEST', statusCode: err.status };
  } else {
    response = { error: 'Internal server error', code: 'INTERNAL_ERROR', statusCode: 500 };
  }

  if (requestId !== undefined) {
    response.requestId = requestId;
  }
  return response;
}

/**
 * Log error with appropriate level and context.
 * Client errors are expected traffic and stay at debug.
 */
function logError(err: unknown, req: Request, errorResponse: ErrorResponse): void {
  const logContext = {
    requestId: errorResponse.requestId,
    method: req.method,
    path: req.path,
    statusCode: errorResponse.statusCode,
    errorCode: errorResponse.code,
    userId: req.identity?.userId,
  };

  if (errorResponse.statusCode >= 500) {
    logger.error(err instanceof Error ? err.message : 'Unhandled non-error value', {
      ...logContext,
      stack: err instanceof Error ? err.stack : undefined,
      cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
    });
  } else {
    logger.debug(errorResponse.error, logContext);
  }
}

// =============================================================================
// Not Found Handler
// =============================================================================

/**
 * Handle 404 Not Found errors
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const errorResponse: ErrorResponse = {
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
    statusCode: 404,
  };
  if (req.requestId !== undefined) {
    errorResponse.requestId = req.requestId;
  }

  logger.debug('Route not found', {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
  });

  res.status(404).json(errorResponse);
};

// =============================================================================
// Async Handler Wrapper
// =============================================================================

/**
 * Wrap async route handlers to properly catch and forward errors
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export default errorHandler;
