/**
 * Gateway - In-Memory Rate Limit Backend
 *
 * Counters live in a Map owned by this process. `consume` does its read and
 * write without yielding to the event loop, which makes each call atomic with
 * respect to every other request in the process.
 */

import type { RateLimitBackend, WindowCount, WindowSpec } from '../types.js';

interface CounterEntry {
  windowStart: number;
  windowEnd: number;
  count: number;
}

export interface MemoryBackendOptions {
  /** How often expired counters are swept, on the limiter's clock */
  sweepIntervalMs?: number;
}

export class MemoryRateLimitBackend implements RateLimitBackend {
  public readonly kind = 'memory' as const;
  private readonly counters = new Map<string, CounterEntry>();
  private readonly sweepIntervalMs: number;
  private lastSweep = Number.NEGATIVE_INFINITY;

  constructor(options: MemoryBackendOptions = {}) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
  }

  public consume(key: string, limit: number, window: WindowSpec): Promise<WindowCount> {
    this.sweep(window.now);

    let entry = this.counters.get(key);
    if (entry === undefined || entry.windowStart !== window.start) {
      entry = { windowStart: window.start, windowEnd: window.start + window.durationMs, count: 0 };
      this.counters.set(key, entry);
    }

    if (entry.count >= limit) {
      return Promise.resolve({ allowed: false, count: entry.count });
    }

    entry.count++;
    return Promise.resolve({ allowed: true, count: entry.count });
  }

  public reset(key: string): Promise<void> {
    this.counters.delete(key);
    return Promise.resolve();
  }

  public close(): Promise<void> {
    this.counters.clear();
    return Promise.resolve();
  }

  /** Number of live counters, for diagnostics */
  public size(): number {
    return this.counters.size;
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < this.sweepIntervalMs) {
      return;
    }
    this.lastSweep = now;

    for (const [key, entry] of this.counters) {
      if (entry.windowEnd <= now) {
        this.counters.delete(key);
      }
    }
  }
}
