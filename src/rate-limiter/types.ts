/**
 * Gateway - Rate Limiter Type Definitions
 */

import type { RateLimitBackendKind } from '../utils/types.js';

/**
 * Outcome of one admission check
 */
export interface RateLimitDecision {
  permitted: boolean;
  /** Maximum requests allowed in the window */
  limit: number;
  /** Requests still available in the current window */
  remaining: number;
  /** When the current window ends (Unix milliseconds) */
  resetAt: number;
  /** Set only when rejected: time until the window resets */
  retryAfterMs?: number;
}

/**
 * A fixed window on the limiter's clock. `start` is a multiple of `durationMs`.
 */
export interface WindowSpec {
  start: number;
  durationMs: number;
  now: number;
}

export interface WindowCount {
  allowed: boolean;
  /** Requests counted in this window after the call */
  count: number;
}

/**
 * Storage for per-key window counters. A call to `consume` must be atomic per
 * key: concurrent calls may not lose increments or admit more than `limit`.
 */
export interface RateLimitBackend {
  readonly kind: RateLimitBackendKind;
  consume(key: string, limit: number, window: WindowSpec): Promise<WindowCount>;
  reset(key: string, window: WindowSpec): Promise<void>;
  close(): Promise<void>;
}

export interface RateLimitPolicy {
  max: number;
  windowMs: number;
}
