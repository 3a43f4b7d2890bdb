/**
 * Gateway - Models Module
 */

export { ModelCache } from './cache.js';
export type { CacheEntryStatus, CacheKeyStatus, CacheLoader, ModelCacheOptions, WarmOutcome } from './cache.js';

export {
  DecisionTreeClassifier,
  LogisticRegressionClassifier,
  sigmoid,
  type Classifier,
} from './classifiers.js';

export { createModelLoader, loadEvaluation, MISSING_EVALUATION } from './loaders.js';

export {
  DEFAULT_MODEL_KEYS,
  EVALUATION_KEY,
  PREPROCESSOR_KEY,
  type EvaluationKey,
  type EvaluationMetadata,
  type ModelHandle,
  type PreprocessorKey,
} from './types.js';
