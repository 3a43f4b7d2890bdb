/**
 * Gateway - Rate Limiter Module
 */

import { createRedisClient, type RedisClientWrapper } from '../storage/redis.js';
import logger from '../utils/logger.js';
import type { Clock, RateLimitConfig, RedisConfig } from '../utils/types.js';

import { MemoryRateLimitBackend } from './backends/memory.js';
import { RedisRateLimitBackend } from './backends/redis.js';
import { RateLimiter } from './limiter.js';
import type { RateLimitBackend } from './types.js';

export { RateLimiter, type RateLimiterOptions } from './limiter.js';
export { createRateLimitMiddleware, type RateLimitMiddlewareOptions } from './middleware.js';
export { MemoryRateLimitBackend } from './backends/memory.js';
export { RedisRateLimitBackend } from './backends/redis.js';
export { FIXED_WINDOW_SCRIPT } from './scripts.js';
export type * from './types.js';

export interface RateLimiterFactoryOptions {
  config: RateLimitConfig;
  redisConfig: RedisConfig;
  /** Pre-built client; otherwise one is created and connected for the shared backend */
  redis?: RedisClientWrapper;
  clock?: Clock;
}

/**
 * Pick the backend named by configuration. Callers only ever see RateLimitBackend.
 */
export async function createRateLimitBackend(options: RateLimiterFactoryOptions): Promise<RateLimitBackend> {
  const { config } = options;

  if (config.backend === 'memory') {
    return new MemoryRateLimitBackend({ sweepIntervalMs: config.windowMs });
  }

  const redis = options.redis ?? createRedisClient({ config: options.redisConfig, keyPrefix: '' });
  if (!redis.isConnected) {
    await redis.connect();
  }
  logger.info('Shared rate limit backend ready', {
    host: options.redisConfig.host,
    port: options.redisConfig.port,
  });

  return new RedisRateLimitBackend({
    redis,
    keyPrefix: config.keyPrefix,
    timeoutMs: config.storeTimeoutMs,
  });
}

export async function createRateLimiter(options: RateLimiterFactoryOptions): Promise<RateLimiter> {
  const limiterOptions: ConstructorParameters<typeof RateLimiter>[0] = {
    backend: await createRateLimitBackend(options),
    max: options.config.max,
    windowMs: options.config.windowMs,
    endpoints: options.config.endpoints,
  };
  if (options.clock !== undefined) {
    limiterOptions.clock = options.clock;
  }
  return new RateLimiter(limiterOptions);
}
