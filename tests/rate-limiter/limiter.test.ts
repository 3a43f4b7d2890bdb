/**
 * Rate Limiter Tests
 * Both backends run against the same behaviour suite.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { createRateLimiter } from '../../src/rate-limiter/index.js';
import { MemoryRateLimitBackend } from '../../src/rate-limiter/backends/memory.js';
import { RedisRateLimitBackend } from '../../src/rate-limiter/backends/redis.js';
import { RateLimiter } from '../../src/rate-limiter/limiter.js';
import type { RateLimitBackend } from '../../src/rate-limiter/types.js';
import { RateLimiterUnavailableError } from '../../src/utils/types.js';
import { FakeRedis } from '../helpers/fake-redis.js';
import { createFakeClock, FIXED_NOW, type FakeClock } from '../helpers/fixtures.js';

const WINDOW_MS = 60_000;
const MAX = 10;

const backends: Array<[string, (clock: FakeClock) => RateLimitBackend]> = [
  ['memory', () => new MemoryRateLimitBackend({ sweepIntervalMs: WINDOW_MS })],
  ['shared', (clock) => new RedisRateLimitBackend({ redis: new FakeRedis(clock), timeoutMs: 1000 })],
];

describe.each(backends)('RateLimiter with the %s backend', (_name, makeBackend) => {
  let clock: FakeClock;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = createFakeClock();
    limiter = new RateLimiter({
      backend: makeBackend(clock),
      max: MAX,
      windowMs: WINDOW_MS,
      endpoints: { '/models/info': { max: 3, windowMs: 10_000 } },
      clock,
    });
  });

  it('should admit exactly max requests in a window', async () => {
    for (let i = 1; i <= MAX; i++) {
      const decision = await limiter.allow('user:u1', '/predict');
      expect(decision).toEqual({
        permitted: true,
        limit: MAX,
        remaining: MAX - i,
        resetAt: FIXED_NOW + WINDOW_MS,
      });
    }

    clock.advance(15_000);
    await expect(limiter.allow('user:u1', '/predict')).resolves.toEqual({
      permitted: false,
      limit: MAX,
      remaining: 0,
      resetAt: FIXED_NOW + WINDOW_MS,
      retryAfterMs: 45_000,
    });
  });

  it('should start a fresh window at the boundary', async () => {
    for (let i = 0; i <= MAX; i++) {
      await limiter.allow('user:u1', '/predict');
    }

    clock.set(FIXED_NOW + WINDOW_MS);
    const decision = await limiter.allow('user:u1', '/predict');
    expect(decision.permitted).toBe(true);
    expect(decision.remaining).toBe(MAX - 1);
    expect(decision.resetAt).toBe(FIXED_NOW + 2 * WINDOW_MS);
  });

  it('should count callers and endpoints separately', async () => {
    for (let i = 0; i < MAX; i++) {
      await limiter.allow('user:u1', '/predict');
    }

    await expect(limiter.allow('user:u2', '/predict')).resolves.toHaveProperty('permitted', true);
    await expect(limiter.allow('user:u1', '/other')).resolves.toHaveProperty('permitted', true);
    await expect(limiter.allow('user:u1', '/predict')).resolves.toHaveProperty('permitted', false);
  });

  it('should apply per-endpoint limits', async () => {
    const results: boolean[] = [];
    for (let i = 0; i < 4; i++) {
      results.push((await limiter.allow('user:u1', '/models/info')).permitted);
    }

    expect(results).toEqual([true, true, true, false]);
    expect(limiter.policyFor('/models/info')).toEqual({ max: 3, windowMs: 10_000 });
    expect(limiter.policyFor('/predict')).toEqual({ max: MAX, windowMs: WINDOW_MS });
  });

  it('should never admit more than max under concurrency', async () => {
    const decisions = await Promise.all(
      Array.from({ length: 25 }, () => limiter.allow('user:u1', '/predict'))
    );

    expect(decisions.filter((decision) => decision.permitted)).toHaveLength(MAX);
  });

  it('should clear a caller on reset', async () => {
    for (let i = 0; i < MAX; i++) {
      await limiter.allow('user:u1', '/predict');
    }

    await limiter.reset('user:u1', '/predict');
    await expect(limiter.allow('user:u1', '/predict')).resolves.toHaveProperty('remaining', MAX - 1);
  });
});

describe('RedisRateLimitBackend', () => {
  let clock: FakeClock;
  let redis: FakeRedis;

  beforeEach(() => {
    clock = createFakeClock();
    redis = new FakeRedis(clock);
  });

  function limiterWith(timeoutMs: number): RateLimiter {
    return new RateLimiter({
      backend: new RedisRateLimitBackend({ redis, keyPrefix: 'test:', timeoutMs }),
      max: MAX,
      windowMs: WINDOW_MS,
      clock,
    });
  }

  it('should key counters by window start and expire them with the window', async () => {
    await limiterWith(1000).allow('user:u1', '/predict');

    const key = `test:user:u1:/predict:${FIXED_NOW}`;
    expect(redis.keys()).toEqual([key]);
    expect(redis.ttl(key)).toBe(FIXED_NOW + WINDOW_MS);
  });

  it('should fail closed when the store errors', async () => {
    redis.failWith(new Error('ECONNREFUSED'));

    await expect(limiterWith(1000).allow('user:u1', '/predict')).rejects.toThrow(
      new RateLimiterUnavailableError('Rate limit store is unavailable')
    );
  });

  it('should fail closed when the store does not answer in time', async () => {
    redis.hang();

    const error = await limiterWith(20)
      .allow('user:u1', '/predict')
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimiterUnavailableError);
    expect(error).toHaveProperty('message', 'Rate limit store timed out after 20ms');
    expect(error).toHaveProperty('statusCode', 503);
  });
});

describe('createRateLimiter', () => {
  it('should build the memory backend by default', async () => {
    const limiter = await createRateLimiter({
      config: {
        backend: 'memory',
        windowMs: WINDOW_MS,
        max: MAX,
        keyPrefix: 'ratelimit:',
        storeTimeoutMs: 1000,
        endpoints: {},
      },
      redisConfig: { host: 'localhost', port: 6379, db: 0, tls: false },
    });

    expect(limiter.getBackendKind()).toBe('memory');
    await limiter.close();
  });

  it('should use a supplied client for the shared backend', async () => {
    const clock = createFakeClock();
    const redis = new FakeRedis(clock);
    await redis.disconnect();

    const limiter = await createRateLimiter({
      config: {
        backend: 'shared',
        windowMs: WINDOW_MS,
        max: 2,
        keyPrefix: 'ratelimit:',
        storeTimeoutMs: 1000,
        endpoints: {},
      },
      redisConfig: { host: 'localhost', port: 6379, db: 0, tls: false },
      redis,
      clock,
    });

    expect(redis.isConnected).toBe(true);
    expect(limiter.getBackendKind()).toBe('shared');
    await limiter.allow('ip:10.0.0.1', '/predict');
    expect(redis.keys()).toEqual([`ratelimit:ip:10.0.0.1:/predict:${FIXED_NOW}`]);
    expect(redis.evalCalls).toBe(1);
  });
});
