/**
 * Gateway - Prediction Module
 */

export {
  CONFIDENCE_THRESHOLDS,
  DECISION_THRESHOLD,
  ENSEMBLE_METHOD,
  PredictionOrchestrator,
  combine,
  confidenceLevelFor,
  confidenceOf,
  labelFor,
} from './orchestrator.js';

export type {
  ConfidenceLevel,
  EnsemblePrediction,
  EnsembleResult,
  ModelDescription,
  ModelPrediction,
  ModelsInfo,
  PredictionLabel,
  PredictionOrchestratorOptions,
} from './orchestrator.js';
