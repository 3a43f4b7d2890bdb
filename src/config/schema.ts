/**
 * Gateway - Configuration Schema
 * Zod-based validation schemas for gateway configuration
 */

import { z } from 'zod';

import { isDuration } from '../utils/helpers.js';

// =============================================================================
// Shared Schemas
// =============================================================================

export const DurationSchema = z
  .string()
  .refine(isDuration, { message: 'must be a duration such as 500ms, 60s, 5m or 1h' });

export const ModelKeySchema = z.enum(['logistic_regression', 'decision_tree']);

export const RateLimitBackendSchema = z.enum(['memory', 'shared']);

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  corsOrigins: z.array(z.string()).default(['http://localhost:3000']),
  bodyLimit: z.string().default('16kb'),
});

// =============================================================================
// Model Artifact Configuration Schema
// =============================================================================

export const ModelsConfigSchema = z.object({
  dir: z.string().min(1).default('./models'),
  keys: z
    .array(ModelKeySchema)
    .min(1)
    .refine((keys) => new Set(keys).size === keys.length, { message: 'model keys must be unique' })
    .default(['logistic_regression', 'decision_tree']),
  loadTimeoutMs: z.number().int().min(1).default(5000),
  preload: z.boolean().default(false),
});

// =============================================================================
// Authentication Configuration Schema
// =============================================================================

export const AuthConfigSchema = z
  .object({
    issuer: z.string().min(1),
    audience: z.string().min(1),
    publicKey: z.string().min(1).optional(),
    publicKeyFile: z.string().min(1).optional(),
    algorithm: z.literal('RS256').default('RS256'),
    clockToleranceSeconds: z.number().int().min(0).default(0),
  })
  .refine((auth) => auth.publicKey !== undefined || auth.publicKeyFile !== undefined, {
    message: 'either publicKey or publicKeyFile is required',
    path: ['publicKey'],
  });

// =============================================================================
// Rate Limiting Configuration Schema
// =============================================================================

export const EndpointRateLimitSchema = z.object({
  max: z.number().int().min(1).optional(),
  window: DurationSchema.optional(),
});

export const RateLimitConfigSchema = z.object({
  backend: RateLimitBackendSchema.default('memory'),
  window: DurationSchema.default('60s'),
  max: z.number().int().min(1).default(10),
  keyPrefix: z.string().default('ratelimit:'),
  storeTimeoutMs: z.number().int().min(1).default(1000),
  endpoints: z.record(EndpointRateLimitSchema).default({}),
});

// =============================================================================
// Redis Configuration Schema
// =============================================================================

export const RedisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).max(15).default(0),
  tls: z.boolean().default(false),
});

// =============================================================================
// Health Check Configuration Schema
// =============================================================================

export const HealthConfigSchema = z.object({
  minFreeMemoryPercent: z.number().min(0).max(100).default(5),
  minFreeDiskMb: z.number().min(0).default(100),
  minAccuracy: z.number().min(0).max(1).default(0.7),
});

// =============================================================================
// Logging Configuration Schema
// =============================================================================

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
});

// =============================================================================
// Root Configuration Schema
// =============================================================================

export const ConfigFileSchema = z.object({
  server: ServerConfigSchema.default({}),
  models: ModelsConfigSchema.default({}),
  auth: AuthConfigSchema,
  rateLimit: RateLimitConfigSchema.default({}),
  redis: RedisConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// =============================================================================
// Exported Types from Schemas
// =============================================================================

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;
export type RateLimitConfigOutput = z.output<typeof RateLimitConfigSchema>;
export type AuthConfigOutput = z.output<typeof AuthConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, ConfigFileOutput> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
