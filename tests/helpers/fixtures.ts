/**
 * Shared test fixtures: artifact stores and a complete gateway config
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import type { ArtifactStat, ArtifactStore } from '../../src/artifacts/store.js';
import { ArtifactError, type GatewayConfig } from '../../src/utils/types.js';

export const FIXTURE_MODELS_DIR = path.resolve(__dirname, '../fixtures/models');

/** Fixed instant used by clock-driven tests: 2026-03-01T12:00:00.000Z */
export const FIXED_NOW = Date.UTC(2026, 2, 1, 12, 0, 0);

/**
 * A clock that only moves when told to
 */
export function createFakeClock(start = FIXED_NOW) {
  let now = start;
  const clock = (): number => now;
  return Object.assign(clock, {
    advance(ms: number): void {
      now += ms;
    },
    set(value: number): void {
      now = value;
    },
  });
}

export type FakeClock = ReturnType<typeof createFakeClock>;

export function readFixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(FIXTURE_MODELS_DIR, name), 'utf-8'));
}

/**
 * Copy the fixture artifacts into a fresh temporary directory
 */
export async function copyFixtures(): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'gateway-models-'));
  for (const name of await fs.promises.readdir(FIXTURE_MODELS_DIR)) {
    await fs.promises.copyFile(path.join(FIXTURE_MODELS_DIR, name), path.join(dir, name));
  }
  return dir;
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/**
 * In-memory artifact store. Every read is counted so tests can assert how
 * often a loader touched the disk.
 */
export class MemoryArtifactStore implements ArtifactStore {
  public readonly directory = '/memory/models';
  public readonly reads = new Map<string, number>();
  private readonly files = new Map<string, unknown>();
  private readonly failures = new Map<string, Error>();
  private readonly holds = new Map<string, Promise<void>>();

  constructor(files: Record<string, unknown> = {}) {
    for (const [name, value] of Object.entries(files)) {
      this.files.set(name, value);
    }
  }

  static fromFixtures(): MemoryArtifactStore {
    const files: Record<string, unknown> = {};
    for (const name of fs.readdirSync(FIXTURE_MODELS_DIR)) {
      files[name] = readFixture(name);
    }
    return new MemoryArtifactStore(files);
  }

  set(name: string, value: unknown): void {
    this.files.set(name, value);
  }

  remove(name: string): void {
    this.files.delete(name);
  }

  failNext(name: string, error: Error): void {
    this.failures.set(name, error);
  }

  /**
   * Park reads of one artifact until the returned function is called
   */
  hold(name: string): () => void {
    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.holds.set(name, gate);
    return () => {
      this.holds.delete(name);
      release();
    };
  }

  readCount(name: string): number {
    return this.reads.get(name) ?? 0;
  }

  async readJson(name: string): Promise<unknown> {
    this.reads.set(name, this.readCount(name) + 1);
    await (this.holds.get(name) ?? Promise.resolve());

    const failure = this.failures.get(name);
    if (failure !== undefined) {
      this.failures.delete(name);
      throw failure;
    }
    if (!this.files.has(name)) {
      throw new ArtifactError(name, `Artifact '${name}' not found in ${this.directory}`);
    }
    return this.files.get(name);
  }

  exists(name: string): Promise<boolean> {
    return Promise.resolve(this.files.has(name));
  }

  stat(name: string): Promise<ArtifactStat> {
    if (!this.files.has(name)) {
      return Promise.reject(new ArtifactError(name, `Artifact '${name}' not found in ${this.directory}`));
    }
    return Promise.resolve({ sizeBytes: 0, modifiedAt: new Date(FIXED_NOW) });
  }
}

/**
 * Gateway config for in-process tests: ephemeral loopback port, memory backend
 */
export function createTestConfig(publicKeyPem: string, overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    server: {
      port: 0,
      host: '127.0.0.1',
      corsOrigins: ['http://localhost:3000'],
      bodyLimit: '16kb',
      nodeEnv: 'test',
    },
    models: {
      dir: FIXTURE_MODELS_DIR,
      keys: ['logistic_regression', 'decision_tree'],
      loadTimeoutMs: 5000,
      preload: false,
    },
    auth: {
      issuer: 'test-issuer',
      audience: 'test-audience',
      publicKeyPem,
      algorithm: 'RS256',
      clockToleranceSeconds: 0,
    },
    rateLimit: {
      backend: 'memory',
      windowMs: 60_000,
      max: 10,
      keyPrefix: 'ratelimit:',
      storeTimeoutMs: 1000,
      endpoints: {},
    },
    redis: { host: 'localhost', port: 6379, db: 0, tls: false },
    health: { minFreeMemoryPercent: 5, minFreeDiskMb: 100, minAccuracy: 0.7 },
    logging: { level: 'error', format: 'json' },
    configFilePath: path.join(FIXTURE_MODELS_DIR, 'gateway.config.yaml'),
    ...overrides,
  };
}

export const SURVIVOR = {
  pclass: 1,
  sex: 'female',
  age: 29,
  sibsp: 0,
  parch: 0,
  fare: 211.34,
  embarked: 'S',
} as const;

export const NON_SURVIVOR = {
  pclass: 3,
  sex: 'male',
  age: 22,
  sibsp: 1,
  parch: 0,
  fare: 7.25,
  embarked: 'S',
} as const;

export const FEATURE_COLUMNS: readonly string[] = [
  'pclass',
  'sex',
  'age',
  'sibsp',
  'parch',
  'fare',
  'embarked',
  'family_size',
  'is_alone',
  'age_group',
];
