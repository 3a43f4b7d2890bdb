/**
 * Gateway - Redis Client
 * Connection management for the shared rate-limit store
 */

import { createClient } from 'redis';

import logger, { logLifecycle } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import type { RedisConfig } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface RedisConnectionOptions {
  config: RedisConfig;
  keyPrefix?: string;
  connectTimeout?: number;
}

/**
 * The slice of Redis the gateway relies on. Tests substitute an in-process
 * implementation behind this interface.
 */
export interface RedisClientWrapper {
  readonly isConnected: boolean;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  del: (key: string | string[]) => Promise<number>;
  eval: (script: string, keys: string[], args: string[]) => Promise<unknown>;
}

type NodeRedisClient = ReturnType<typeof createClient>;

// =============================================================================
// Redis Client Class
// =============================================================================

export class RedisClient implements RedisClientWrapper {
  public readonly client: NodeRedisClient;
  public isConnected = false;
  private readonly config: RedisConfig;
  private readonly keyPrefix: string;
  private reconnectAttempts = 0;
  private readonly maxReconnectAttempts = 10;
  private readonly reconnectDelay = 1000;

  constructor(options: RedisConnectionOptions) {
    this.config = options.config;
    this.keyPrefix = options.keyPrefix ?? 'gateway:';

    const reconnectStrategy = (retries: number): number | Error => {
      if (retries > this.maxReconnectAttempts) {
        logger.error('Max Redis reconnection attempts reached');
        return new Error('Max reconnection attempts reached');
      }
      const delay = Math.min(retries * this.reconnectDelay, 30000);
      logger.warn(`Redis reconnecting in ${delay}ms (attempt ${retries})`);
      return delay;
    };

    const connectTimeout = options.connectTimeout ?? 10000;

    this.client = createClient({
      socket: this.config.tls
        ? {
            host: this.config.host,
            port: this.config.port,
            connectTimeout,
            reconnectStrategy,
            tls: true,
          }
        : {
            host: this.config.host,
            port: this.config.port,
            connectTimeout,
            reconnectStrategy,
          },
      database: this.config.db,
      ...(this.config.password ? { password: this.config.password } : {}),
      // Commands fail fast while disconnected instead of queueing
      disableOfflineQueue: true,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.on('ready', () => {
      this.isConnected = true;
      this.reconnectAttempts = 0;
      logLifecycle('ready', 'Redis client connected', {
        host: this.config.host,
        port: this.config.port,
        db: this.config.db,
      });
    });

    this.client.on('error', (err: Error) => {
      logger.error('Redis client error', { error: err.message });
    });

    this.client.on('end', () => {
      this.isConnected = false;
      logger.warn('Redis client disconnected');
    });

    this.client.on('reconnecting', () => {
      this.reconnectAttempts++;
      logger.info('Redis client reconnecting...', {
        attempt: this.reconnectAttempts,
      });
    });
  }

  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  public async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    try {
      await this.client.connect();
    } catch (error) {
      logger.error('Failed to connect to Redis', { error: errorMessage(error) });
      throw error;
    }
  }

  public async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    try {
      await this.client.quit();
      this.isConnected = false;
      logLifecycle('shutdown', 'Redis client disconnected');
    } catch (error) {
      logger.error('Error disconnecting from Redis', { error: errorMessage(error) });
      throw error;
    }
  }

  public async del(key: string | string[]): Promise<number> {
    const keys = Array.isArray(key) ? key.map((k) => this.prefixKey(k)) : [this.prefixKey(key)];
    return this.client.del(keys);
  }

  /**
   * Execute a Lua script; keys are prefixed, arguments are passed through
   */
  public async eval(script: string, keys: string[], args: string[]): Promise<unknown> {
    return this.client.eval(script, {
      keys: keys.map((k) => this.prefixKey(k)),
      arguments: args,
    });
  }
}

export function createRedisClient(options: RedisConnectionOptions): RedisClient {
  return new RedisClient(options);
}

export default RedisClient;
