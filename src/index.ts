/**
 * Passenger Inference Gateway
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { GatewayServer } from './gateway/server.js';
import { applyLoggingConfig, ConfigurationError, errorMessage, logger, logLifecycle } from './utils/index.js';

// =============================================================================
// Global State
// =============================================================================

let gatewayServer: GatewayServer | null = null;
let isShuttingDown = false;

const SHUTDOWN_TIMEOUT_MS = 30_000;

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'Gateway starting up...');

  try {
    const config = await loadConfig();
    applyLoggingConfig(config.logging);

    logLifecycle('startup', 'Configuration loaded', {
      configFile: config.configFilePath,
      port: config.server.port,
      host: config.server.host,
      environment: config.server.nodeEnv,
      modelsDir: config.models.dir,
      rateLimitBackend: config.rateLimit.backend,
    });

    gatewayServer = await GatewayServer.create(config);
    await gatewayServer.start();
  } catch (error) {
    logLifecycle('error', 'Failed to start gateway', {
      error: errorMessage(error),
      kind: error instanceof ConfigurationError ? 'configuration' : 'startup',
      stack: error instanceof Error && !(error instanceof ConfigurationError) ? error.stack : undefined,
    });
    process.exit(1);
  }
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    if (gatewayServer !== null) {
      await gatewayServer.shutdown(signal);
    }

    clearTimeout(shutdownTimeout);
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: errorMessage(reason),
  });
});

// =============================================================================
// Start Application
// =============================================================================

void bootstrap();
