import winston from 'winston';

import type { LoggingConfig } from './types.js';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Human-readable format for development
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;

  const cleanMetadata: Record<string, unknown> = {};
  for (const key of Object.keys(metadata)) {
    if (!key.startsWith('Symbol')) {
      cleanMetadata[key] = metadata[key];
    }
  }
  if (Object.keys(cleanMetadata).length > 0) {
    msg += ` ${JSON.stringify(cleanMetadata)}`;
  }

  return msg;
});

const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

const buildFormat = (format: LoggingConfig['format'] | undefined): winston.Logform.Format => {
  const isDev = process.env['NODE_ENV'] !== 'production';

  if (format === 'json' || (format === undefined && !isDev)) {
    return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  return combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    errors({ stack: true }),
    devFormat
  );
};

const envFormat = process.env['LOG_FORMAT'];

const logger = winston.createLogger({
  level: getLogLevel(),
  format: buildFormat(envFormat === 'json' || envFormat === 'pretty' ? envFormat : undefined),
  transports: [new winston.transports.Console()],
  // Jest runs are quiet unless a level is asked for explicitly
  silent: process.env['NODE_ENV'] === 'test' && process.env['LOG_LEVEL'] === undefined,
  exitOnError: false,
});

/**
 * Apply the loaded logging section. Environment variables were already folded
 * into the config by the loader, so this simply wins over the bootstrap defaults.
 */
export const applyLoggingConfig = (config: LoggingConfig): void => {
  logger.level = config.level;
  logger.format = buildFormat(config.format);
};

// =============================================================================
// Structured helpers
// =============================================================================

export interface RequestLogData {
  requestId: string;
  method: string;
  path: string;
  statusCode?: number;
  responseTimeMs?: number;
  userId?: string;
  ipAddress?: string;
  userAgent?: string;
  /** Budget left in the caller's window, when the route is rate limited */
  rateLimitRemaining?: number;
}

// Client errors (400, 401, 404, 413, 429) are expected traffic, not failures
export const logRequest = (data: RequestLogData): void => {
  const level = data.statusCode !== undefined && data.statusCode >= 500 ? 'error' : 'info';

  logger.log(level, `${data.method} ${data.path}`, {
    type: 'request',
    ...data,
  });
};

export interface RateLimitLogData {
  requestId?: string;
  identifier: string;
  endpoint: string;
  currentCount: number;
  limit: number;
  windowMs: number;
  blocked: boolean;
}

export const logRateLimit = (data: RateLimitLogData): void => {
  const level = data.blocked ? 'info' : 'debug';

  logger.log(level, data.blocked ? 'Rate limit exceeded' : 'Rate limit check passed', {
    type: 'rate_limit',
    ...data,
  });
};

export interface ModelLoadLogData {
  cache: string;
  key: string;
  event: 'load_start' | 'load_complete' | 'load_failed';
  durationMs?: number;
  error?: string;
}

export const logModelLoad = (data: ModelLoadLogData): void => {
  const level = data.event === 'load_failed' ? 'error' : data.event === 'load_start' ? 'debug' : 'info';

  logger.log(level, `Artifact ${data.event.replace('_', ' ')}: ${data.cache}/${data.key}`, {
    type: 'model_load',
    ...data,
  });
};

export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

export const createChildLogger = (context: Record<string, unknown>): winston.Logger => {
  return logger.child(context);
};

export default logger;
