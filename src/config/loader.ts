/**
 * Gateway - Configuration Loader
 * Reads the YAML/JSON config file, folds in environment overrides and validates
 * the result. Any failure is a ConfigurationError: the gateway refuses to start.
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';

import logger, { logConfig } from '../utils/logger.js';
import { errorMessage, isRecord, parseDuration } from '../utils/helpers.js';
import {
  ConfigurationError,
  type EndpointRateLimit,
  type GatewayConfig,
  type ServerConfig,
} from '../utils/types.js';

import { formatValidationErrors, safeValidateConfigFile, type ConfigFileOutput } from './schema.js';

export const DEFAULT_CONFIG_PATH = './config/gateway.config.yaml';

// =============================================================================
// Environment Variable Helpers
// =============================================================================

type Env = Record<string, string | undefined>;

function getEnvString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvInt(env: Env, key: string): number | undefined {
  const value = getEnvString(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be an integer, got '${value}'`);
  }
  return parsed;
}

function getEnvBool(env: Env, key: string): boolean | undefined {
  const value = getEnvString(env, key);
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getNodeEnv(env: Env): ServerConfig['nodeEnv'] {
  const value = getEnvString(env, 'NODE_ENV');
  return value === 'production' || value === 'test' ? value : 'development';
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export interface ConfigLoaderOptions {
  configPath?: string;
  env?: Env;
}

export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: Env;

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath =
      options.configPath ?? getEnvString(this.env, 'CONFIG_FILE_PATH') ?? DEFAULT_CONFIG_PATH;
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file and environment variables
   */
  public async load(): Promise<GatewayConfig> {
    const fileConfig = await this.readConfigFile();
    const merged = this.applyEnvOverrides(fileConfig);

    const result = safeValidateConfigFile(merged);
    if (!result.success) {
      const problems = formatValidationErrors(result.error);
      throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
    }

    const config = await this.buildConfig(result.data);

    logConfig('Configuration loaded', {
      path: this.configPath,
      modelsDir: config.models.dir,
      rateLimitBackend: config.rateLimit.backend,
      rateLimitWindowMs: config.rateLimit.windowMs,
      rateLimitMax: config.rateLimit.max,
    });

    return config;
  }

  private async readConfigFile(): Promise<Record<string, unknown>> {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    const extension = path.extname(this.configPath).toLowerCase();
    let parsed: unknown;

    try {
      const content = await fs.promises.readFile(this.configPath, 'utf-8');

      if (extension === '.yaml' || extension === '.yml') {
        parsed = parseYaml(content);
      } else if (extension === '.json') {
        parsed = JSON.parse(content);
      } else {
        throw new ConfigurationError(`Unsupported config file format: ${extension}`);
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(
        `Failed to read config file ${this.configPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    // An empty YAML document parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config file ${this.configPath} must contain a mapping`);
    }

    logConfig('Configuration file loaded', { path: this.configPath });
    return parsed;
  }

  /**
   * Environment variables win over the file. Values are written into the raw
   * document so they go through the same schema validation.
   */
  private applyEnvOverrides(fileConfig: Record<string, unknown>): Record<string, unknown> {
    const env = this.env;
    const merged: Record<string, unknown> = { ...fileConfig };

    const override = (sectionName: string, values: Record<string, unknown>): void => {
      const defined = Object.entries(values).filter(([, value]) => value !== undefined);
      if (defined.length === 0) {
        return;
      }

      const current = merged[sectionName];
      let base: Record<string, unknown> = {};
      if (isRecord(current)) {
        base = current;
      } else if (current !== undefined) {
        // leave it for the schema to report
        return;
      }
      merged[sectionName] = { ...base, ...Object.fromEntries(defined) };
    };

    override('server', {
      port: getEnvInt(env, 'PORT'),
      host: getEnvString(env, 'HOST'),
    });
    // Paths from the environment are relative to the working directory, not the file
    const fromCwd = (value: string | undefined): string | undefined =>
      value !== undefined ? path.resolve(value) : undefined;

    override('models', {
      dir: fromCwd(getEnvString(env, 'MODELS_DIR')),
      preload: getEnvBool(env, 'MODELS_PRELOAD'),
    });
    override('auth', {
      issuer: getEnvString(env, 'JWT_ISSUER'),
      audience: getEnvString(env, 'JWT_AUDIENCE'),
      publicKey: getEnvString(env, 'JWT_PUBLIC_KEY'),
      publicKeyFile: fromCwd(getEnvString(env, 'JWT_PUBLIC_KEY_FILE')),
    });
    override('rateLimit', {
      backend: getEnvString(env, 'RATE_LIMIT_BACKEND'),
      window: getEnvString(env, 'RATE_LIMIT_WINDOW'),
      max: getEnvInt(env, 'RATE_LIMIT_MAX'),
    });
    override('redis', {
      host: getEnvString(env, 'REDIS_HOST'),
      port: getEnvInt(env, 'REDIS_PORT'),
      password: getEnvString(env, 'REDIS_PASSWORD'),
      db: getEnvInt(env, 'REDIS_DB'),
      tls: getEnvBool(env, 'REDIS_TLS'),
    });
    override('logging', {
      level: getEnvString(env, 'LOG_LEVEL')?.toLowerCase(),
      format: getEnvString(env, 'LOG_FORMAT'),
    });

    return merged;
  }

  private async buildConfig(file: ConfigFileOutput): Promise<GatewayConfig> {
    const baseDir = path.dirname(path.resolve(this.configPath));

    const endpoints: Record<string, EndpointRateLimit> = {};
    for (const [endpoint, limit] of Object.entries(file.rateLimit.endpoints)) {
      endpoints[endpoint] = {
        max: limit.max ?? file.rateLimit.max,
        windowMs: parseDuration(limit.window ?? file.rateLimit.window),
      };
    }

    const redis: GatewayConfig['redis'] = {
      host: file.redis.host,
      port: file.redis.port,
      db: file.redis.db,
      tls: file.redis.tls,
    };
    if (file.redis.password !== undefined) {
      redis.password = file.redis.password;
    }

    return {
      server: { ...file.server, nodeEnv: getNodeEnv(this.env) },
      models: {
        ...file.models,
        dir: path.resolve(baseDir, file.models.dir),
      },
      auth: {
        issuer: file.auth.issuer,
        audience: file.auth.audience,
        publicKeyPem: await this.resolvePublicKey(file, baseDir),
        algorithm: file.auth.algorithm,
        clockToleranceSeconds: file.auth.clockToleranceSeconds,
      },
      rateLimit: {
        backend: file.rateLimit.backend,
        windowMs: parseDuration(file.rateLimit.window),
        max: file.rateLimit.max,
        keyPrefix: file.rateLimit.keyPrefix,
        storeTimeoutMs: file.rateLimit.storeTimeoutMs,
        endpoints,
      },
      redis,
      health: file.health,
      logging: file.logging,
      configFilePath: this.configPath,
    };
  }

  /**
   * Inline PEM wins over a key file. A private key is rejected outright: the
   * verification key must be distributed on its own.
   */
  private async resolvePublicKey(file: ConfigFileOutput, baseDir: string): Promise<string> {
    let pem = file.auth.publicKey;

    if (pem === undefined && file.auth.publicKeyFile !== undefined) {
      const keyPath = path.resolve(baseDir, file.auth.publicKeyFile);
      try {
        pem = await fs.promises.readFile(keyPath, 'utf-8');
      } catch (error) {
        throw new ConfigurationError(`Cannot read JWT public key file ${keyPath}`, {
          cause: error,
        });
      }
    }

    if (pem === undefined) {
      throw new ConfigurationError('auth.publicKey or auth.publicKeyFile is required');
    }

    // Escaped newlines are common when the key travels through an env var
    const normalized = pem.replace(/\\n/g, '\n').trim();

    if (normalized.includes('PRIVATE KEY')) {
      throw new ConfigurationError(
        'auth.publicKey contains a private key; configure the SPKI public key instead'
      );
    }
    if (!normalized.startsWith('-----BEGIN PUBLIC KEY-----')) {
      logger.warn('JWT public key does not look like an SPKI PEM block');
    }

    return normalized;
  }
}

export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<GatewayConfig> {
  return new ConfigLoader(options).load();
}

export default ConfigLoader;
