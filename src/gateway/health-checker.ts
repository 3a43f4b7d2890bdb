/**
 * Gateway - Health Check Service
 * Lifecycle state plus on-demand checks of models, host resources and artifacts
 */

import { EventEmitter } from 'events';
import fs from 'fs';
import os from 'os';

import { ARTIFACT_FILES, type ArtifactStore } from '../artifacts/store.js';
import { findManifestProblems } from '../features/preprocessor.js';
import type { ModelCache } from '../models/cache.js';
import { EVALUATION_KEY, type EvaluationKey, type EvaluationMetadata, type ModelHandle } from '../models/types.js';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { systemClock, type Clock, type HealthThresholds, type ModelKey } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export enum LifecycleState {
  STARTING = 'starting',
  READY = 'ready',
  STOPPING = 'stopping',
}

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
}

export type CheckStatus = 'ok' | 'degraded';

export interface CheckResult {
  status: CheckStatus;
  message: string;
  durationMs: number;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  state: LifecycleState;
  status: HealthStatus;
  uptimeSeconds: number;
  timestamp: string;
  checks?: Record<string, CheckResult>;
}

export interface ResourceUsage {
  freeBytes: number;
  totalBytes: number;
}

/**
 * Host measurements. Swapped out in tests.
 */
export interface SystemProbe {
  memory(): ResourceUsage;
  disk(directory: string): Promise<ResourceUsage>;
}

export const osSystemProbe: SystemProbe = {
  memory: () => ({ freeBytes: os.freemem(), totalBytes: os.totalmem() }),
  disk: async (directory) => {
    const stats = await fs.promises.statfs(directory);
    return { freeBytes: stats.bavail * stats.bsize, totalBytes: stats.blocks * stats.bsize };
  },
};

export interface HealthCheckerOptions {
  models: ModelCache<ModelKey, ModelHandle>;
  evaluation: ModelCache<EvaluationKey, EvaluationMetadata>;
  modelKeys: readonly ModelKey[];
  store: ArtifactStore;
  thresholds: HealthThresholds;
  probe?: SystemProbe;
  clock?: Clock;
}

type CheckOutcome = Omit<CheckResult, 'durationMs'>;

const BYTES_PER_MB = 1024 * 1024;

// =============================================================================
// Health Checker Class
// =============================================================================

export class HealthChecker extends EventEmitter {
  private state: LifecycleState = LifecycleState.STARTING;
  private readonly startedAt: number;
  private readonly options: HealthCheckerOptions;
  private readonly probe: SystemProbe;
  private readonly clock: Clock;

  constructor(options: HealthCheckerOptions) {
    super();
    this.options = options;
    this.probe = options.probe ?? osSystemProbe;
    this.clock = options.clock ?? systemClock;
    this.startedAt = this.clock();
  }

  getState(): LifecycleState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === LifecycleState.READY;
  }

  markReady(): void {
    if (this.state === LifecycleState.STARTING) {
      this.transition(LifecycleState.READY);
    }
  }

  markStopping(): void {
    if (this.state !== LifecycleState.STOPPING) {
      this.transition(LifecycleState.STOPPING);
    }
  }

  /**
   * Build a health report. The fast path never touches the caches; the
   * detailed path inspects them without forcing a model load.
   */
  async check(detailed = false): Promise<HealthReport> {
    const report: HealthReport = {
      state: this.state,
      status: this.isReady() ? HealthStatus.HEALTHY : HealthStatus.DEGRADED,
      uptimeSeconds: Math.floor((this.clock() - this.startedAt) / 1000),
      timestamp: new Date(this.clock()).toISOString(),
    };

    if (!detailed) {
      return report;
    }

    const [models, accuracy, memory, disk, configuration] = await Promise.all([
      this.runCheck('models', () => Promise.resolve(this.checkModels())),
      this.runCheck('accuracy', () => this.checkAccuracy()),
      this.runCheck('memory', () => Promise.resolve(this.checkMemory())),
      this.runCheck('disk', () => this.checkDisk()),
      this.runCheck('configuration', () => this.checkConfiguration()),
    ]);

    report.checks = { models, accuracy, memory, disk, configuration };
    if (Object.values(report.checks).some((check) => check.status === 'degraded')) {
      report.status = HealthStatus.DEGRADED;
    }

    this.emit('checkComplete', report);
    return report;
  }

  private transition(next: LifecycleState): void {
    const previous = this.state;
    this.state = next;
    this.emit('stateChange', previous, next);
    logger.info(`Gateway state changed: ${previous} → ${next}`, { component: 'health-checker' });
  }

  private async runCheck(name: string, check: () => Promise<CheckOutcome>): Promise<CheckResult> {
    const startTime = this.clock();
    let outcome: CheckOutcome;

    try {
      outcome = await check();
    } catch (error) {
      outcome = { status: 'degraded', message: `${name} check failed: ${errorMessage(error)}` };
    }

    if (outcome.status === 'degraded') {
      logger.warn(`Health check degraded: ${name}`, {
        component: 'health-checker',
        message: outcome.message,
      });
    }

    return { ...outcome, durationMs: this.clock() - startTime };
  }

  private checkModels(): CheckOutcome {
    const details: Record<string, unknown> = {};
    const failed: string[] = [];

    for (const key of this.options.modelKeys) {
      const status = this.options.models.status(key);
      details[key] = {
        status: status.status,
        loadedAt: status.loadedAt?.toISOString() ?? null,
        lastError: status.lastError,
        attempts: status.attempts,
      };
      if (status.status === 'failed') {
        failed.push(key);
      }
    }

    if (failed.length > 0) {
      return { status: 'degraded', message: `Models failed to load: ${failed.join(', ')}`, details };
    }
    return { status: 'ok', message: 'No model load failures', details };
  }

  private async checkAccuracy(): Promise<CheckOutcome> {
    const evaluation = await this.options.evaluation.get(EVALUATION_KEY);
    const { minAccuracy } = this.options.thresholds;

    if (!evaluation.available) {
      return { status: 'degraded', message: 'Evaluation results are not available' };
    }

    const low = this.options.modelKeys.filter((key) => {
      const accuracy = evaluation.accuracy[key];
      return accuracy !== undefined && accuracy < minAccuracy;
    });
    const details = { accuracy: evaluation.accuracy, minAccuracy };

    if (low.length > 0) {
      return { status: 'degraded', message: `Models with low accuracy: ${low.join(', ')}`, details };
    }
    return { status: 'ok', message: 'Model accuracy within threshold', details };
  }

  private checkMemory(): CheckOutcome {
    const usage = this.probe.memory();
    const freePercent = usage.totalBytes > 0 ? (usage.freeBytes / usage.totalBytes) * 100 : 0;
    const { minFreeMemoryPercent } = this.options.thresholds;
    const details = { freePercent: Math.round(freePercent * 10) / 10, minFreeMemoryPercent };

    if (freePercent < minFreeMemoryPercent) {
      return { status: 'degraded', message: 'Free memory below threshold', details };
    }
    return { status: 'ok', message: 'Free memory within threshold', details };
  }

  private async checkDisk(): Promise<CheckOutcome> {
    const usage = await this.probe.disk(this.options.store.directory);
    const freeMb = Math.floor(usage.freeBytes / BYTES_PER_MB);
    const { minFreeDiskMb } = this.options.thresholds;
    const details = { freeMb, minFreeDiskMb };

    if (freeMb < minFreeDiskMb) {
      return { status: 'degraded', message: 'Free disk space below threshold', details };
    }
    return { status: 'ok', message: 'Free disk space within threshold', details };
  }

  private async checkConfiguration(): Promise<CheckOutcome> {
    const { store } = this.options;
    const problems = findManifestProblems(await store.readJson(ARTIFACT_FILES.featureColumns));
    const details = { modelsDir: store.directory };

    if (problems.length > 0) {
      return { status: 'degraded', message: `Feature manifest invalid: ${problems.join('; ')}`, details };
    }
    return { status: 'ok', message: 'Models directory and feature manifest are valid', details };
  }
}
