/**
 * Gateway - Artifact Loaders
 * Turn artifact files into the values the caches hold
 */

import { z } from 'zod';

import { ARTIFACT_FILES, parseArtifact, type ArtifactStore } from '../artifacts/store.js';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { ArtifactError, type ModelKey } from '../utils/types.js';

import {
  DecisionTreeClassifier,
  DecisionTreeSchema,
  LogisticModelSchema,
  LogisticRegressionClassifier,
  type Classifier,
} from './classifiers.js';
import type { EvaluationMetadata, ModelHandle } from './types.js';

const AccuracySchema = z.number().min(0).max(1);

const EvaluationResultsSchema = z.object({
  logistic_regression_accuracy: AccuracySchema.optional(),
  decision_tree_accuracy: AccuracySchema.optional(),
  ensemble_accuracy: AccuracySchema.optional(),
  trained_at: z.string().datetime({ offset: true }).optional(),
});

export const MISSING_EVALUATION: EvaluationMetadata = Object.freeze({
  accuracy: Object.freeze({}),
  ensembleAccuracy: null,
  trainedAt: null,
  available: false,
});

/**
 * Read evaluation_results.json. A missing file is not an error: the gateway
 * serves without accuracy figures.
 */
export async function loadEvaluation(store: ArtifactStore): Promise<EvaluationMetadata> {
  const name = ARTIFACT_FILES.evaluation;
  if (!(await store.exists(name))) {
    return MISSING_EVALUATION;
  }

  const results = parseArtifact(name, EvaluationResultsSchema, await store.readJson(name));
  const trainedAt =
    results.trained_at !== undefined ? new Date(results.trained_at) : (await store.stat(name)).modifiedAt;

  const accuracy: Partial<Record<ModelKey, number>> = {};
  if (results.logistic_regression_accuracy !== undefined) {
    accuracy.logistic_regression = results.logistic_regression_accuracy;
  }
  if (results.decision_tree_accuracy !== undefined) {
    accuracy.decision_tree = results.decision_tree_accuracy;
  }

  return Object.freeze({
    accuracy: Object.freeze(accuracy),
    ensembleAccuracy: results.ensemble_accuracy ?? null,
    trainedAt,
    available: true,
  });
}

const MODEL_FILES: Record<ModelKey, string> = {
  logistic_regression: ARTIFACT_FILES.logisticModel,
  decision_tree: ARTIFACT_FILES.decisionTreeModel,
};

async function readClassifier(store: ArtifactStore, key: ModelKey, name: string): Promise<Classifier> {
  switch (key) {
    case 'logistic_regression':
      return new LogisticRegressionClassifier(parseArtifact(name, LogisticModelSchema, await store.readJson(name)));
    case 'decision_tree':
      return new DecisionTreeClassifier(parseArtifact(name, DecisionTreeSchema, await store.readJson(name)));
  }
}

/**
 * Load a classifier and check it against the feature manifest, which is the
 * column contract every model was trained on.
 */
async function loadClassifier(store: ArtifactStore, key: ModelKey, columns: number): Promise<Classifier> {
  const name = MODEL_FILES[key];
  const classifier = await readClassifier(store, key, name);
  if (!classifier.acceptsWidth(columns)) {
    throw new ArtifactError(
      name,
      `Artifact '${name}' reads ${classifier.minFeatures} features but the manifest has ${columns} columns`
    );
  }
  return classifier;
}

export interface ModelLoaderOptions {
  store: ArtifactStore;
  /** Validated feature manifest */
  featureColumns: readonly string[];
  /** Source of accuracy figures; failures leave accuracy unknown */
  evaluation: () => Promise<EvaluationMetadata>;
  clock?: () => number;
}

export function createModelLoader(options: ModelLoaderOptions): (key: ModelKey) => Promise<ModelHandle> {
  const { store, evaluation, featureColumns } = options;
  const clock = options.clock ?? Date.now;

  return async (key: ModelKey): Promise<ModelHandle> => {
    const [classifier, metadata] = await Promise.all([
      loadClassifier(store, key, featureColumns.length),
      evaluation().catch((error: unknown) => {
        logger.warn('Evaluation metadata unavailable, model accuracy unknown', {
          model: key,
          error: errorMessage(error),
        });
        return MISSING_EVALUATION;
      }),
    ]);

    return Object.freeze({
      key,
      classifier,
      accuracy: metadata.accuracy[key] ?? null,
      loadedAt: new Date(clock()),
    });
  };
}
