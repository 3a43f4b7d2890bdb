/**
 * Gateway - Rate Limiter
 *
 * Fixed-window admission control per (identity, endpoint). Windows are aligned
 * to multiples of their length on the injected clock, so every instance sharing
 * a store agrees on where a window starts.
 */

import type { EndpointRateLimit, RateLimitBackendKind } from '../utils/types.js';
import { systemClock, type Clock } from '../utils/types.js';

import type { RateLimitBackend, RateLimitDecision, RateLimitPolicy, WindowSpec } from './types.js';

export interface RateLimiterOptions {
  backend: RateLimitBackend;
  max: number;
  windowMs: number;
  /** Per-endpoint overrides keyed by route path */
  endpoints?: Record<string, EndpointRateLimit>;
  clock?: Clock;
}

export class RateLimiter {
  private readonly backend: RateLimitBackend;
  private readonly defaultPolicy: RateLimitPolicy;
  private readonly endpoints: Record<string, EndpointRateLimit>;
  private readonly clock: Clock;

  constructor(options: RateLimiterOptions) {
    this.backend = options.backend;
    this.defaultPolicy = { max: options.max, windowMs: options.windowMs };
    this.endpoints = options.endpoints ?? {};
    this.clock = options.clock ?? systemClock;
  }

  public getBackendKind(): RateLimitBackendKind {
    return this.backend.kind;
  }

  public policyFor(endpoint: string): RateLimitPolicy {
    return this.endpoints[endpoint] ?? this.defaultPolicy;
  }

  /**
   * Count one request for the caller on the endpoint.
   * Rejects with RateLimiterUnavailableError when the backend cannot answer.
   */
  public async allow(identity: string, endpoint: string): Promise<RateLimitDecision> {
    const policy = this.policyFor(endpoint);
    const window = this.currentWindow(policy);
    const result = await this.backend.consume(this.buildKey(identity, endpoint), policy.max, window);

    const resetAt = window.start + window.durationMs;
    const decision: RateLimitDecision = {
      permitted: result.allowed,
      limit: policy.max,
      remaining: Math.max(0, policy.max - result.count),
      resetAt,
    };

    if (!result.allowed) {
      decision.retryAfterMs = resetAt - window.now;
    }
    return decision;
  }

  /**
   * Clear the caller's counter for the current window
   */
  public async reset(identity: string, endpoint: string): Promise<void> {
    const window = this.currentWindow(this.policyFor(endpoint));
    await this.backend.reset(this.buildKey(identity, endpoint), window);
  }

  public async close(): Promise<void> {
    await this.backend.close();
  }

  private currentWindow(policy: RateLimitPolicy): WindowSpec {
    const now = this.clock();
    const start = Math.floor(now / policy.windowMs) * policy.windowMs;
    return { start, durationMs: policy.windowMs, now };
  }

  private buildKey(identity: string, endpoint: string): string {
    return `${identity}:${endpoint}`;
  }
}
