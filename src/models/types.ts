import type { ModelKey } from '../utils/types.js';

import type { Classifier } from './classifiers.js';

export const DEFAULT_MODEL_KEYS: readonly ModelKey[] = ['logistic_regression', 'decision_tree'];

/**
 * A loaded classifier. Frozen once the cache hands it out.
 */
export interface ModelHandle {
  readonly key: ModelKey;
  readonly classifier: Classifier;
  /** Held-out accuracy reported by the trainer, when known */
  readonly accuracy: number | null;
  readonly loadedAt: Date;
}

export interface EvaluationMetadata {
  readonly accuracy: Readonly<Partial<Record<ModelKey, number>>>;
  readonly ensembleAccuracy: number | null;
  /** When the artifacts were produced; falls back to the results file mtime */
  readonly trainedAt: Date | null;
  /** False when the trainer left no evaluation results */
  readonly available: boolean;
}

export const EVALUATION_KEY = 'evaluation';
export type EvaluationKey = typeof EVALUATION_KEY;

export const PREPROCESSOR_KEY = 'preprocessor';
export type PreprocessorKey = typeof PREPROCESSOR_KEY;
