/**
 * Gateway - Shared Type Definitions
 * Configuration shapes, request extensions and the error taxonomy
 */

import type { CallerIdentity } from '../auth/types.js';

// =============================================================================
// Configuration Types
// =============================================================================

export type RateLimitBackendKind = 'memory' | 'shared';

export type ModelKey = 'logistic_regression' | 'decision_tree';

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  bodyLimit: string;
  nodeEnv: 'development' | 'production' | 'test';
}

export interface ModelsConfig {
  /** Absolute path of the artifact directory */
  dir: string;
  keys: ModelKey[];
  loadTimeoutMs: number;
  preload: boolean;
}

export interface AuthConfig {
  issuer: string;
  audience: string;
  /** SPKI PEM, resolved from `publicKey` or `publicKeyFile` */
  publicKeyPem: string;
  algorithm: 'RS256';
  clockToleranceSeconds: number;
}

export interface EndpointRateLimit {
  max: number;
  windowMs: number;
}

export interface RateLimitConfig {
  backend: RateLimitBackendKind;
  windowMs: number;
  max: number;
  keyPrefix: string;
  storeTimeoutMs: number;
  endpoints: Record<string, EndpointRateLimit>;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  tls: boolean;
}

export interface HealthThresholds {
  minFreeMemoryPercent: number;
  minFreeDiskMb: number;
  minAccuracy: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
}

export interface GatewayConfig {
  server: ServerConfig;
  models: ModelsConfig;
  auth: AuthConfig;
  rateLimit: RateLimitConfig;
  redis: RedisConfig;
  health: HealthThresholds;
  logging: LoggingConfig;
  configFilePath: string;
}

// =============================================================================
// Runtime Types
// =============================================================================

/** Milliseconds since the epoch */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
      identity?: CallerIdentity;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export class GatewayError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'GatewayError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, 'CONFIGURATION_ERROR', false, options);
    this.name = 'ConfigurationError';
  }
}

export type AuthFailureReason =
  | 'missing'
  | 'malformed'
  | 'expired'
  | 'bad_signature'
  | 'issuer_mismatch'
  | 'audience_mismatch';

const AUTH_FAILURE_MESSAGES: Record<AuthFailureReason, string> = {
  missing: 'Authorization header with a Bearer token is required',
  malformed: 'Bearer token is malformed',
  expired: 'Bearer token has expired',
  bad_signature: 'Bearer token signature is invalid',
  issuer_mismatch: 'Bearer token was issued by an untrusted issuer',
  audience_mismatch: 'Bearer token is not intended for this service',
};

export class AuthenticationError extends GatewayError {
  public readonly reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, options?: { cause?: unknown }) {
    super(AUTH_FAILURE_MESSAGES[reason], 401, 'AUTHENTICATION_ERROR', true, options);
    this.name = 'AuthenticationError';
    this.reason = reason;
  }
}

export type FieldErrors = Record<string, string[]>;

export class ValidationError extends GatewayError {
  public readonly fieldErrors: FieldErrors;

  constructor(message: string, fieldErrors: FieldErrors = {}) {
    super(message, 400, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }
}

export class RateLimitExceededError extends GatewayError {
  public readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super('Rate limit exceeded', 429, 'RATE_LIMIT_EXCEEDED', true);
    this.name = 'RateLimitExceededError';
    this.retryAfterMs = retryAfterMs;
  }

  /** Whole seconds for the Retry-After header, never below one */
  get retryAfterSeconds(): number {
    return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
  }
}

export class RateLimiterUnavailableError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, 'RATE_LIMITER_UNAVAILABLE', true, options);
    this.name = 'RateLimiterUnavailableError';
  }
}

export class ModelUnavailableError extends GatewayError {
  public readonly modelKey: string;

  constructor(modelKey: string, options?: { cause?: unknown }) {
    super(`Model '${modelKey}' is currently unavailable`, 503, 'MODEL_UNAVAILABLE', true, options);
    this.name = 'ModelUnavailableError';
    this.modelKey = modelKey;
  }
}

export class TransformError extends GatewayError {
  constructor(message: string) {
    super(message, 422, 'TRANSFORM_ERROR', true);
    this.name = 'TransformError';
  }
}

export class ArtifactError extends GatewayError {
  public readonly artifact: string;

  constructor(artifact: string, message: string, options?: { cause?: unknown }) {
    super(message, 500, 'ARTIFACT_ERROR', true, options);
    this.name = 'ArtifactError';
    this.artifact = artifact;
  }
}

