/**
 * Health Checker Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import {
  HealthChecker,
  HealthStatus,
  LifecycleState,
  type HealthReport,
  type ResourceUsage,
  type SystemProbe,
} from '../../src/gateway/health-checker.js';
import { ModelCache } from '../../src/models/cache.js';
import { createModelLoader, loadEvaluation } from '../../src/models/loaders.js';
import type { EvaluationKey, EvaluationMetadata, ModelHandle } from '../../src/models/types.js';
import type { HealthThresholds, ModelKey } from '../../src/utils/types.js';
import { createFakeClock, FEATURE_COLUMNS, FIXED_NOW, MemoryArtifactStore, type FakeClock } from '../helpers/fixtures.js';

const MB = 1024 * 1024;

class FakeProbe implements SystemProbe {
  public memoryUsage: ResourceUsage = { freeBytes: 50, totalBytes: 100 };
  public diskUsage: ResourceUsage | Error = { freeBytes: 500 * MB, totalBytes: 1000 * MB };

  memory(): ResourceUsage {
    return this.memoryUsage;
  }

  disk(): Promise<ResourceUsage> {
    return this.diskUsage instanceof Error ? Promise.reject(this.diskUsage) : Promise.resolve(this.diskUsage);
  }
}

const THRESHOLDS: HealthThresholds = { minFreeMemoryPercent: 5, minFreeDiskMb: 100, minAccuracy: 0.7 };

describe('HealthChecker', () => {
  let clock: FakeClock;
  let store: MemoryArtifactStore;
  let probe: FakeProbe;
  let models: ModelCache<ModelKey, ModelHandle>;

  function buildChecker(thresholds: HealthThresholds = THRESHOLDS): HealthChecker {
    const evaluation = new ModelCache<EvaluationKey, EvaluationMetadata>({
      name: 'evaluation',
      loader: () => loadEvaluation(store),
    });
    models = new ModelCache<ModelKey, ModelHandle>({
      name: 'models',
      loader: createModelLoader({
        store,
        featureColumns: FEATURE_COLUMNS,
        evaluation: () => evaluation.get('evaluation'),
      }),
    });

    return new HealthChecker({
      models,
      evaluation,
      modelKeys: ['logistic_regression', 'decision_tree'],
      store,
      thresholds,
      probe,
      clock,
    });
  }

  beforeEach(() => {
    clock = createFakeClock();
    store = MemoryArtifactStore.fromFixtures();
    probe = new FakeProbe();
  });

  describe('lifecycle', () => {
    it('should report degraded until ready', async () => {
      const checker = buildChecker();

      await expect(checker.check()).resolves.toEqual({
        state: LifecycleState.STARTING,
        status: HealthStatus.DEGRADED,
        uptimeSeconds: 0,
        timestamp: '2026-03-01T12:00:00.000Z',
      });

      checker.markReady();
      clock.advance(5_500);

      await expect(checker.check()).resolves.toEqual({
        state: LifecycleState.READY,
        status: HealthStatus.HEALTHY,
        uptimeSeconds: 5,
        timestamp: new Date(FIXED_NOW + 5_500).toISOString(),
      });
    });

    it('should emit state changes and never leave stopping', () => {
      const checker = buildChecker();
      const transitions: Array<[LifecycleState, LifecycleState]> = [];
      checker.on('stateChange', (previous: LifecycleState, next: LifecycleState) => {
        transitions.push([previous, next]);
      });

      checker.markReady();
      checker.markReady();
      checker.markStopping();
      checker.markReady();

      expect(transitions).toEqual([
        [LifecycleState.STARTING, LifecycleState.READY],
        [LifecycleState.READY, LifecycleState.STOPPING],
      ]);
      expect(checker.getState()).toBe(LifecycleState.STOPPING);
      expect(checker.isReady()).toBe(false);
    });

    it('should not touch any artifact on the fast path', async () => {
      const checker = buildChecker();
      checker.markReady();

      await checker.check();
      expect(store.reads.size).toBe(0);
    });
  });

  describe('detailed checks', () => {
    it('should report every check without loading a model', async () => {
      const checker = buildChecker();
      checker.markReady();
      const completed: HealthReport[] = [];
      checker.on('checkComplete', (report: HealthReport) => completed.push(report));

      const report = await checker.check(true);

      expect(report.status).toBe(HealthStatus.HEALTHY);
      expect(report.checks).toEqual({
        models: {
          status: 'ok',
          message: 'No model load failures',
          durationMs: 0,
          details: {
            logistic_regression: { status: 'unloaded', loadedAt: null, lastError: null, attempts: 0 },
            decision_tree: { status: 'unloaded', loadedAt: null, lastError: null, attempts: 0 },
          },
        },
        accuracy: {
          status: 'ok',
          message: 'Model accuracy within threshold',
          durationMs: 0,
          details: { accuracy: { logistic_regression: 0.81, decision_tree: 0.79 }, minAccuracy: 0.7 },
        },
        memory: {
          status: 'ok',
          message: 'Free memory within threshold',
          durationMs: 0,
          details: { freePercent: 50, minFreeMemoryPercent: 5 },
        },
        disk: {
          status: 'ok',
          message: 'Free disk space within threshold',
          durationMs: 0,
          details: { freeMb: 500, minFreeDiskMb: 100 },
        },
        configuration: {
          status: 'ok',
          message: 'Models directory and feature manifest are valid',
          durationMs: 0,
          details: { modelsDir: '/memory/models' },
        },
      });
      expect(store.readCount('logistic_model.json')).toBe(0);
      expect(store.readCount('decision_tree_model.json')).toBe(0);
      expect(completed).toEqual([report]);
    });

    it('should degrade on a failed model load', async () => {
      store.failNext('decision_tree_model.json', new Error('truncated file'));
      const checker = buildChecker();
      checker.markReady();
      await models.get('decision_tree').catch(() => undefined);

      const report = await checker.check(true);

      expect(report.status).toBe(HealthStatus.DEGRADED);
      expect(report.checks?.models?.status).toBe('degraded');
      expect(report.checks?.models?.message).toBe('Models failed to load: decision_tree');
    });

    it('should degrade on low accuracy', async () => {
      const checker = buildChecker({ ...THRESHOLDS, minAccuracy: 0.8 });
      checker.markReady();

      const report = await checker.check(true);
      expect(report.checks?.accuracy?.message).toBe('Models with low accuracy: decision_tree');
      expect(report.status).toBe(HealthStatus.DEGRADED);
    });

    it('should degrade when evaluation results are missing', async () => {
      store.remove('evaluation_results.json');
      const checker = buildChecker();
      checker.markReady();

      const report = await checker.check(true);
      expect(report.checks?.accuracy).toEqual({
        status: 'degraded',
        message: 'Evaluation results are not available',
        durationMs: 0,
      });
    });

    it('should degrade on low memory and disk', async () => {
      probe.memoryUsage = { freeBytes: 3, totalBytes: 100 };
      probe.diskUsage = { freeBytes: 99.5 * MB, totalBytes: 1000 * MB };
      const checker = buildChecker();

      const report = await checker.check(true);
      expect(report.checks?.memory?.details).toEqual({ freePercent: 3, minFreeMemoryPercent: 5 });
      expect(report.checks?.memory?.status).toBe('degraded');
      expect(report.checks?.disk?.details).toEqual({ freeMb: 99, minFreeDiskMb: 100 });
      expect(report.checks?.disk?.status).toBe('degraded');
    });

    it('should turn a failing probe into a degraded check', async () => {
      probe.diskUsage = new Error('statfs unsupported');
      const checker = buildChecker();
      checker.markReady();

      const report = await checker.check(true);
      expect(report.checks?.disk).toEqual({
        status: 'degraded',
        message: 'disk check failed: statfs unsupported',
        durationMs: 0,
      });
      expect(report.status).toBe(HealthStatus.DEGRADED);
    });

    it('should degrade when the feature manifest becomes invalid', async () => {
      store.set('feature_columns.json', ['pclass', 'cabin']);
      const checker = buildChecker();

      const report = await checker.check(true);
      expect(report.checks?.configuration?.message).toBe("Feature manifest invalid: unknown column 'cabin'");
    });
  });
});
