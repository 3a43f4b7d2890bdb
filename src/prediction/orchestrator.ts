/**
 * Gateway - Prediction Orchestrator
 *
 * Turns validated passenger features into an ensemble prediction: fetch the
 * preprocessor and every configured model from their caches, transform once,
 * score with each model and average the probabilities.
 */

import { transform, type PassengerAttributes } from '../features/transformer.js';
import type { Preprocessor } from '../features/preprocessor.js';
import type { CacheEntryStatus, ModelCache } from '../models/cache.js';
import { MISSING_EVALUATION } from '../models/loaders.js';
import {
  EVALUATION_KEY,
  PREPROCESSOR_KEY,
  type EvaluationKey,
  type EvaluationMetadata,
  type ModelHandle,
  type PreprocessorKey,
} from '../models/types.js';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { ConfigurationError, ModelUnavailableError, TransformError, type ModelKey } from '../utils/types.js';

// =============================================================================
// Constants
// =============================================================================

/** Probabilities at or above this are labelled `survived` */
export const DECISION_THRESHOLD = 0.5;

/** Upper bounds (exclusive) of the `low` and `medium` confidence bands */
export const CONFIDENCE_THRESHOLDS = {
  low: 0.4,
  medium: 0.8,
} as const;

export const ENSEMBLE_METHOD = 'mean_probability';

// =============================================================================
// Types
// =============================================================================

export type PredictionLabel = 'survived' | 'died';

export type ConfidenceLevel = 'low' | 'medium' | 'high';

export interface ModelPrediction {
  probability: number;
  label: PredictionLabel;
}

export interface EnsemblePrediction extends ModelPrediction {
  confidence: number;
  confidence_level: ConfidenceLevel;
}

export interface EnsembleResult {
  per_model: Partial<Record<ModelKey, ModelPrediction>>;
  ensemble: EnsemblePrediction;
}

export interface ModelDescription {
  kind: ModelKey;
  status: CacheEntryStatus;
  accuracy: number | null;
  loaded_at: string | null;
  last_error: string | null;
}

export interface ModelsInfo {
  models: Partial<Record<ModelKey, ModelDescription>>;
  ensemble: {
    method: typeof ENSEMBLE_METHOD;
    decision_threshold: number;
    accuracy: number | null;
  };
  feature_columns: readonly string[];
  trained_at: string | null;
  evaluation_available: boolean;
}

export interface PredictionOrchestratorOptions {
  models: ModelCache<ModelKey, ModelHandle>;
  preprocessor: ModelCache<PreprocessorKey, Preprocessor>;
  evaluation: ModelCache<EvaluationKey, EvaluationMetadata>;
  modelKeys: readonly ModelKey[];
  /** Feature manifest validated at startup */
  manifest: readonly string[];
}

// =============================================================================
// Scoring helpers
// =============================================================================

export function labelFor(probability: number): PredictionLabel {
  return probability >= DECISION_THRESHOLD ? 'survived' : 'died';
}

/**
 * Distance from the decision boundary, scaled to [0, 1]
 */
export function confidenceOf(probability: number): number {
  return Math.abs(probability - DECISION_THRESHOLD) * 2;
}

export function confidenceLevelFor(confidence: number): ConfidenceLevel {
  if (confidence < CONFIDENCE_THRESHOLDS.low) {
    return 'low';
  }
  if (confidence < CONFIDENCE_THRESHOLDS.medium) {
    return 'medium';
  }
  return 'high';
}

export function combine(probabilities: readonly number[]): EnsemblePrediction {
  const probability = probabilities.reduce((sum, p) => sum + p, 0) / probabilities.length;
  const confidence = confidenceOf(probability);

  return {
    probability,
    label: labelFor(probability),
    confidence,
    confidence_level: confidenceLevelFor(confidence),
  };
}

// =============================================================================
// Orchestrator
// =============================================================================

export class PredictionOrchestrator {
  private readonly models: ModelCache<ModelKey, ModelHandle>;
  private readonly preprocessor: ModelCache<PreprocessorKey, Preprocessor>;
  private readonly evaluation: ModelCache<EvaluationKey, EvaluationMetadata>;
  private readonly modelKeys: readonly ModelKey[];
  private readonly manifest: readonly string[];

  constructor(options: PredictionOrchestratorOptions) {
    if (options.modelKeys.length === 0) {
      throw new ConfigurationError('At least one model key must be configured');
    }
    this.models = options.models;
    this.preprocessor = options.preprocessor;
    this.evaluation = options.evaluation;
    this.modelKeys = Object.freeze([...options.modelKeys]);
    this.manifest = options.manifest;
  }

  /**
   * Score one passenger with every configured model.
   * Any cache failure fails the whole prediction.
   */
  public async predict(features: PassengerAttributes): Promise<EnsembleResult> {
    const [preprocessor, handles] = await Promise.all([
      this.preprocessor.get(PREPROCESSOR_KEY),
      Promise.all(this.modelKeys.map((key) => this.models.get(key))),
    ]);

    const vector = transform(features, preprocessor);
    const perModel: Partial<Record<ModelKey, ModelPrediction>> = {};
    const probabilities: number[] = [];

    for (const handle of handles) {
      const { classifier } = handle;
      if (!classifier.acceptsWidth(vector.length)) {
        throw new TransformError(
          `Model '${handle.key}' expects ${classifier.minFeatures} features, got ${vector.length}`
        );
      }

      const probability = classifier.predictProbability(vector);
      perModel[handle.key] = { probability, label: labelFor(probability) };
      probabilities.push(probability);
    }

    return { per_model: perModel, ensemble: combine(probabilities) };
  }

  /**
   * Model metadata from cache state and evaluation results. Never loads a model.
   */
  public async describeModels(): Promise<ModelsInfo> {
    const evaluation = await this.evaluation.get(EVALUATION_KEY).catch((error: unknown) => {
      if (error instanceof ModelUnavailableError) {
        logger.warn('Evaluation results unavailable for model info', { error: errorMessage(error) });
        return MISSING_EVALUATION;
      }
      throw error;
    });

    const models: Partial<Record<ModelKey, ModelDescription>> = {};
    for (const key of this.modelKeys) {
      const status = this.models.status(key);
      models[key] = {
        kind: key,
        status: status.status,
        accuracy: evaluation.accuracy[key] ?? null,
        loaded_at: status.loadedAt?.toISOString() ?? null,
        last_error: status.lastError,
      };
    }

    return {
      models,
      ensemble: {
        method: ENSEMBLE_METHOD,
        decision_threshold: DECISION_THRESHOLD,
        accuracy: evaluation.ensembleAccuracy,
      },
      feature_columns: this.manifest,
      trained_at: evaluation.trainedAt?.toISOString() ?? null,
      evaluation_available: evaluation.available,
    };
  }
}
