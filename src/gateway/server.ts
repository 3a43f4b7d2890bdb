/**
 * Gateway - Gateway Server
 * Wires artifacts, caches, auth and rate limiting into the Express app
 */

import http from 'http';
import { type AddressInfo } from 'net';

import compression from 'compression';
import cors from 'cors';
import express, { type Application } from 'express';
import helmet from 'helmet';

import { createHealthRouter } from '../api/routes/health.js';
import { createModelsRouter } from '../api/routes/models.js';
import { createPredictRouter } from '../api/routes/predict.js';
import { FileArtifactStore, type ArtifactStore } from '../artifacts/store.js';
import { createAuthMiddleware, TokenVerifier } from '../auth/index.js';
import { loadFeatureManifest, loadPreprocessor, type Preprocessor } from '../features/preprocessor.js';
import {
  EVALUATION_KEY,
  ModelCache,
  PREPROCESSOR_KEY,
  createModelLoader,
  loadEvaluation,
  type EvaluationKey,
  type EvaluationMetadata,
  type ModelHandle,
  type PreprocessorKey,
} from '../models/index.js';
import { PredictionOrchestrator } from '../prediction/index.js';
import { createRateLimiter, createRateLimitMiddleware, type RateLimiter } from '../rate-limiter/index.js';
import type { RedisClientWrapper } from '../storage/redis.js';
import logger, { logLifecycle } from '../utils/logger.js';
import { errorMessage, formatDuration } from '../utils/helpers.js';
import { systemClock, type Clock, type GatewayConfig, type ModelKey } from '../utils/types.js';

import { HealthChecker, LifecycleState, type SystemProbe } from './health-checker.js';
import { errorHandler, notFoundHandler, requestIdMiddleware, requestLogger } from './middleware/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Collaborators that tests replace with in-process stand-ins
 */
export interface GatewayDependencies {
  store?: ArtifactStore;
  redis?: RedisClientWrapper;
  clock?: Clock;
  systemProbe?: SystemProbe;
}

interface GatewayComponents {
  models: ModelCache<ModelKey, ModelHandle>;
  preprocessor: ModelCache<PreprocessorKey, Preprocessor>;
  orchestrator: PredictionOrchestrator;
  rateLimiter: RateLimiter;
  healthChecker: HealthChecker;
  verifier: TokenVerifier;
}

// =============================================================================
// Gateway Server Class
// =============================================================================

export class GatewayServer {
  private readonly app: Application;
  private readonly config: GatewayConfig;
  private readonly components: GatewayComponents;
  private server: http.Server | null = null;
  private isShuttingDown = false;

  private constructor(config: GatewayConfig, components: GatewayComponents) {
    this.config = config;
    this.components = components;
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Build every component. Fails with ConfigurationError when the public key or
   * the feature manifest is unusable; models themselves load lazily.
   */
  public static async create(config: GatewayConfig, deps: GatewayDependencies = {}): Promise<GatewayServer> {
    const clock = deps.clock ?? systemClock;

    const store =
      deps.store ??
      new FileArtifactStore({ directory: config.models.dir, readTimeoutMs: config.models.loadTimeoutMs });

    const manifest = await loadFeatureManifest(store);
    logLifecycle('startup', 'Feature manifest validated', { columns: manifest.length, modelsDir: store.directory });

    const verifier = await TokenVerifier.fromPem(config.auth.publicKeyPem, {
      issuer: config.auth.issuer,
      audience: config.auth.audience,
      clockToleranceSeconds: config.auth.clockToleranceSeconds,
      clock,
    });

    const evaluation = new ModelCache<EvaluationKey, EvaluationMetadata>({
      name: 'evaluation',
      loader: () => loadEvaluation(store),
      clock,
    });
    const preprocessor = new ModelCache<PreprocessorKey, Preprocessor>({
      name: 'preprocessor',
      loader: () => loadPreprocessor(store),
      clock,
    });
    const models = new ModelCache<ModelKey, ModelHandle>({
      name: 'models',
      loader: createModelLoader({
        store,
        featureColumns: manifest,
        evaluation: () => evaluation.get(EVALUATION_KEY),
        clock,
      }),
      clock,
    });

    const orchestrator = new PredictionOrchestrator({
      models,
      preprocessor,
      evaluation,
      modelKeys: config.models.keys,
      manifest,
    });

    const rateLimiter = await createRateLimiter({
      config: config.rateLimit,
      redisConfig: config.redis,
      redis: deps.redis,
      clock,
    });
    logLifecycle('startup', 'Rate limiter initialized', {
      backend: rateLimiter.getBackendKind(),
      max: config.rateLimit.max,
      window: formatDuration(config.rateLimit.windowMs),
    });

    const healthChecker = new HealthChecker({
      models,
      evaluation,
      modelKeys: config.models.keys,
      store,
      thresholds: config.health,
      probe: deps.systemProbe,
      clock,
    });

    return new GatewayServer(config, {
      models,
      preprocessor,
      orchestrator,
      rateLimiter,
      healthChecker,
      verifier,
    });
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(helmet({ contentSecurityPolicy: false }));
    this.app.use(cors({ origin: this.config.server.corsOrigins }));
    this.app.use(compression());
    this.app.use(requestIdMiddleware());
    this.app.use(requestLogger({ skipPaths: ['/health'] }));
  }

  /**
   * Set up Express routes
   */
  private setupRoutes(): void {
    const { orchestrator, rateLimiter, healthChecker, verifier } = this.components;
    const authenticate = createAuthMiddleware({ verifier });

    this.app.use(createHealthRouter(healthChecker));
    this.app.use(
      createPredictRouter({
        orchestrator,
        authenticate,
        rateLimit: createRateLimitMiddleware({ limiter: rateLimiter, endpoint: '/predict' }),
        bodyLimit: this.config.server.bodyLimit,
      })
    );
    this.app.use(
      createModelsRouter({
        orchestrator,
        authenticate,
        rateLimit: createRateLimitMiddleware({ limiter: rateLimiter, endpoint: '/models/info' }),
      })
    );

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  /**
   * Start listening and report ready, then optionally warm the caches.
   * A slow artifact read never holds /health at 503.
   */
  public async start(): Promise<AddressInfo> {
    const { port, host } = this.config.server;

    const server = http.createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (error) => {
      logLifecycle('error', 'Server error', { error: error.message });
    });
    this.server = server;

    this.components.healthChecker.markReady();

    if (this.config.models.preload) {
      await this.preload();
    }

    const address = this.address();
    if (address === null) {
      throw new Error('Server is not bound to a TCP address');
    }

    logLifecycle('ready', `Gateway listening on ${address.address}:${address.port}`, {
      environment: this.config.server.nodeEnv,
      models: this.config.models.keys,
      rateLimitBackend: this.components.rateLimiter.getBackendKind(),
    });
    return address;
  }

  /**
   * Load the preprocessor and every model ahead of the first request.
   * Failures are logged; the caches retry on demand.
   */
  private async preload(): Promise<void> {
    const { preprocessor, models } = this.components;
    const [preprocessorOutcome, modelOutcomes] = await Promise.all([
      preprocessor.warm([PREPROCESSOR_KEY]),
      models.warm(this.config.models.keys),
    ]);

    for (const [key, outcome] of [...preprocessorOutcome, ...modelOutcomes]) {
      if (!outcome.loaded) {
        logger.warn('Preload failed, will retry on first use', { key, error: outcome.error });
      }
    }
    logLifecycle('startup', 'Artifact preload finished', {
      loaded: [...preprocessorOutcome, ...modelOutcomes].filter(([, outcome]) => outcome.loaded).length,
    });
  }

  /**
   * Gracefully shutdown the server
   */
  public async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;
    this.components.healthChecker.markStopping();

    logLifecycle('shutdown', `Shutting down gateway${signal !== undefined ? ` (${signal})` : ''}...`);

    const server = this.server;
    if (server !== null) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error !== undefined ? reject(error) : resolve()));
        server.closeIdleConnections();
      });
      this.server = null;
    }

    try {
      await this.components.rateLimiter.close();
    } catch (error) {
      logger.error('Error closing rate limit backend', { error: errorMessage(error) });
    }

    logLifecycle('shutdown', 'Gateway shutdown complete');
  }

  /**
   * Get the Express application (for testing)
   */
  public getApp(): Application {
    return this.app;
  }

  public address(): AddressInfo | null {
    const address = this.server?.address();
    return address !== undefined && address !== null && typeof address !== 'string' ? address : null;
  }

  public getState(): LifecycleState {
    return this.components.healthChecker.getState();
  }

  public getRateLimiter(): RateLimiter {
    return this.components.rateLimiter;
  }

  public getModelCache(): ModelCache<ModelKey, ModelHandle> {
    return this.components.models;
  }
}

export function createGatewayServer(config: GatewayConfig, deps?: GatewayDependencies): Promise<GatewayServer> {
  return GatewayServer.create(config, deps);
}

export default GatewayServer;
