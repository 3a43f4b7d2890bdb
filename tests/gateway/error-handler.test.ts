/**
 * Error Response Tests
 */

import { describe, it, expect } from '@jest/globals';

import { buildErrorResponse } from '../../src/gateway/middleware/errorHandler.js';
import {
  ConfigurationError,
  ModelUnavailableError,
  RateLimitExceededError,
  TransformError,
} from '../../src/utils/types.js';

describe('buildErrorResponse', () => {
  it('should round Retry-After up to whole seconds', () => {
    expect(buildErrorResponse(new RateLimitExceededError(1_200), 'r1')).toEqual({
      error: 'Rate limit exceeded',
      code: 'RATE_LIMIT_EXCEEDED',
      statusCode: 429,
      retryAfter: 2,
      requestId: 'r1',
    });
    expect(buildErrorResponse(new RateLimitExceededError(0)).retryAfter).toBe(1);
  });

  it('should expose operational errors as they are', () => {
    expect(buildErrorResponse(new ModelUnavailableError('decision_tree'))).toEqual({
      error: "Model 'decision_tree' is currently unavailable",
      code: 'MODEL_UNAVAILABLE',
      statusCode: 503,
    });
    expect(buildErrorResponse(new TransformError("Unseen category 'X' for feature 'embarked'"))).toEqual({
      error: "Unseen category 'X' for feature 'embarked'",
      code: 'TRANSFORM_ERROR',
      statusCode: 422,
    });
  });

  it('should hide the message of non-operational errors', () => {
    expect(buildErrorResponse(new ConfigurationError('models dir /srv/models unreadable'))).toEqual({
      error: 'Internal server error',
      code: 'CONFIGURATION_ERROR',
      statusCode: 500,
    });
  });

  it('should map body parser failures', () => {
    expect(buildErrorResponse({ type: 'entity.parse.failed', status: 400 })).toEqual({
      error: 'Request body is not valid JSON',
      code: 'MALFORMED_JSON',
      statusCode: 400,
    });
    expect(buildErrorResponse({ type: 'encoding.unsupported', status: 415 })).toEqual({
      error: 'Request body could not be read',
      code: 'BAD_REQUEST',
      statusCode: 415,
    });
  });

  it('should answer anything else with a generic 500', () => {
    expect(buildErrorResponse(new Error('secret detail'))).toEqual({
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    });
    expect(buildErrorResponse('thrown string')).toHaveProperty('statusCode', 500);
  });
});
