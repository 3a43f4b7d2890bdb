/**
 * Gateway - Model Cache
 *
 * Lazy, single-flight loader for expensive artifacts. The first `get` for a key
 * starts the load; every concurrent caller for that key awaits the same promise.
 * Successful loads are kept for the life of the process. A failed load is
 * reported to everyone waiting on that attempt and then forgotten, so the next
 * `get` tries again.
 *
 * Keys are independent: loading one never waits on another.
 */

import { createChildLogger, logModelLoad } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { ModelUnavailableError, systemClock, type Clock } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export type CacheEntryStatus = 'unloaded' | 'loading' | 'loaded' | 'failed';

export interface CacheKeyStatus {
  status: CacheEntryStatus;
  loadedAt: Date | null;
  lastAttemptAt: Date | null;
  lastError: string | null;
  /** Number of load attempts started for this key */
  attempts: number;
}

export type CacheLoader<K extends string, V> = (key: K) => Promise<V>;

export interface ModelCacheOptions<K extends string, V> {
  /** Used in logs only */
  name: string;
  loader: CacheLoader<K, V>;
  clock?: Clock;
}

export type WarmOutcome = { loaded: true } | { loaded: false; error: string };

interface KeyState {
  loadedAt: number | null;
  lastAttemptAt: number | null;
  lastError: string | null;
  attempts: number;
}

// =============================================================================
// Model Cache Class
// =============================================================================

export class ModelCache<K extends string, V> {
  private readonly name: string;
  private readonly loader: CacheLoader<K, V>;
  private readonly clock: Clock;
  private readonly values = new Map<K, { readonly value: V }>();
  private readonly inflight = new Map<K, Promise<V>>();
  private readonly states = new Map<K, KeyState>();
  private readonly log: ReturnType<typeof createChildLogger>;

  constructor(options: ModelCacheOptions<K, V>) {
    this.name = options.name;
    this.loader = options.loader;
    this.clock = options.clock ?? systemClock;
    this.log = createChildLogger({ component: 'model-cache', cache: options.name });
  }

  /**
   * Return the cached value, loading it on first use.
   * Rejects with ModelUnavailableError when the load fails.
   */
  public get(key: K): Promise<V> {
    const cached = this.values.get(key);
    if (cached !== undefined) {
      return Promise.resolve(cached.value);
    }

    const pending = this.inflight.get(key);
    if (pending !== undefined) {
      this.log.debug('Joining in-flight load', { key });
      return pending;
    }

    return this.startLoad(key);
  }

  /**
   * Cached value without triggering a load
   */
  public peek(key: K): V | undefined {
    return this.values.get(key)?.value;
  }

  public isLoaded(key: K): boolean {
    return this.values.has(key);
  }

  public status(key: K): CacheKeyStatus {
    const state = this.states.get(key);
    let status: CacheEntryStatus = 'unloaded';

    if (this.values.has(key)) {
      status = 'loaded';
    } else if (this.inflight.has(key)) {
      status = 'loading';
    } else if (state?.lastError != null) {
      status = 'failed';
    }

    return {
      status,
      loadedAt: state?.loadedAt != null ? new Date(state.loadedAt) : null,
      lastAttemptAt: state?.lastAttemptAt != null ? new Date(state.lastAttemptAt) : null,
      lastError: state?.lastError ?? null,
      attempts: state?.attempts ?? 0,
    };
  }

  /**
   * Load several keys concurrently. Never rejects; failures are reported per key.
   */
  public async warm(keys: readonly K[]): Promise<Map<K, WarmOutcome>> {
    const settled = await Promise.allSettled(keys.map((key) => this.get(key)));
    const outcomes = new Map<K, WarmOutcome>();

    settled.forEach((result, index) => {
      const key = keys[index];
      if (key === undefined) {
        return;
      }
      outcomes.set(
        key,
        result.status === 'fulfilled'
          ? { loaded: true }
          : { loaded: false, error: errorMessage(result.reason) }
      );
    });

    return outcomes;
  }

  private startLoad(key: K): Promise<V> {
    const state = this.stateFor(key);
    const startedAt = this.clock();
    state.attempts++;
    state.lastAttemptAt = startedAt;

    logModelLoad({ cache: this.name, key, event: 'load_start' });

    // Deferred by a microtask so a loader that throws synchronously is handled
    // like any other failure and the in-flight entry exists before it runs.
    const load = Promise.resolve()
      .then(() => this.loader(key))
      .then(
        (value) => {
          this.values.set(key, { value });
          state.loadedAt = this.clock();
          state.lastError = null;
          logModelLoad({
            cache: this.name,
            key,
            event: 'load_complete',
            durationMs: state.loadedAt - startedAt,
          });
          return value;
        },
        (error: unknown) => {
          state.lastError = errorMessage(error);
          logModelLoad({
            cache: this.name,
            key,
            event: 'load_failed',
            durationMs: this.clock() - startedAt,
            error: state.lastError,
          });
          throw new ModelUnavailableError(key, { cause: error });
        }
      )
      .finally(() => {
        this.inflight.delete(key);
      });

    this.inflight.set(key, load);
    return load;
  }

  private stateFor(key: K): KeyState {
    let state = this.states.get(key);
    if (state === undefined) {
      state = { loadedAt: null, lastAttemptAt: null, lastError: null, attempts: 0 };
      this.states.set(key, state);
    }
    return state;
  }
}
