/**
 * Gateway - Redis Rate Limit Backend
 *
 * Shared counters for horizontally scaled deployments. Each window has its own
 * key (`<prefix><key>:<windowStart>`) so counters never straddle windows.
 * Every store call is bounded; a slow or failing store fails the request.
 */

import type { RedisClientWrapper } from '../../storage/redis.js';
import logger from '../../utils/logger.js';
import { errorMessage, withTimeout } from '../../utils/helpers.js';
import { RateLimiterUnavailableError } from '../../utils/types.js';
import { FIXED_WINDOW_SCRIPT } from '../scripts.js';
import type { RateLimitBackend, WindowCount, WindowSpec } from '../types.js';

export interface RedisBackendOptions {
  redis: RedisClientWrapper;
  keyPrefix?: string;
  timeoutMs: number;
}

function parseScriptReply(reply: unknown): WindowCount | null {
  if (!Array.isArray(reply) || reply.length < 2) {
    return null;
  }
  const [allowed, count]: unknown[] = reply;
  if (typeof allowed !== 'number' || typeof count !== 'number') {
    return null;
  }
  return { allowed: allowed === 1, count };
}

export class RedisRateLimitBackend implements RateLimitBackend {
  public readonly kind = 'shared' as const;
  private readonly redis: RedisClientWrapper;
  private readonly keyPrefix: string;
  private readonly timeoutMs: number;

  constructor(options: RedisBackendOptions) {
    this.redis = options.redis;
    this.keyPrefix = options.keyPrefix ?? 'ratelimit:';
    this.timeoutMs = options.timeoutMs;
  }

  private buildKey(key: string, window: WindowSpec): string {
    return `${this.keyPrefix}${key}:${window.start}`;
  }

  public async consume(key: string, limit: number, window: WindowSpec): Promise<WindowCount> {
    const reply = await this.call('consume', key, () =>
      this.redis.eval(
        FIXED_WINDOW_SCRIPT,
        [this.buildKey(key, window)],
        [limit.toString(), window.durationMs.toString()]
      )
    );

    const parsed = parseScriptReply(reply);
    if (parsed === null) {
      logger.error('Unexpected rate limit script reply', { key, reply: JSON.stringify(reply) });
      throw new RateLimiterUnavailableError('Rate limit store returned an unexpected reply');
    }
    return parsed;
  }

  public async reset(key: string, window: WindowSpec): Promise<void> {
    await this.call('reset', key, () => this.redis.del(this.buildKey(key, window)));
  }

  public async close(): Promise<void> {
    await this.redis.disconnect();
  }

  private async call<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        fn(),
        this.timeoutMs,
        () => new RateLimiterUnavailableError(`Rate limit store timed out after ${this.timeoutMs}ms`)
      );
    } catch (error) {
      logger.error('Rate limit store call failed', {
        operation,
        key,
        error: errorMessage(error),
      });
      if (error instanceof RateLimiterUnavailableError) {
        throw error;
      }
      throw new RateLimiterUnavailableError('Rate limit store is unavailable', { cause: error });
    }
  }
}
