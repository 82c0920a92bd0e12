/**
 * model-gate: evaluation gate, model registry and alias promotion for binary classifiers.
 *
 * The CLI (src/cli) wires these services against DynamoDB and S3; the same services can be
 * embedded directly in a pipeline or deployment job.
 */

export * from './types/ModelGateErrors';
export * from './types/ModelArtifactTypes';
export * from './types/RunTypes';
export * from './types/EvaluationTypes';
export * from './types/RegistryTypes';
export * from './types/LedgerTypes';

export * from './config/pipelineConfig';

export { Logger } from './services/core/Logger';
export { LedgerService } from './services/ledger/LedgerService';
export { ArtifactStore } from './services/tracking/ArtifactStore';
export { ExperimentTrackerService } from './services/tracking/ExperimentTrackerService';
export { TrainingRunner, createTrainer } from './services/training/TrainingRunner';
export type { TrainingRequest, TrainingResult } from './services/training/TrainingRunner';
export { predictProbabilities } from './services/training/ModelPredictor';
export { loadDataset, parseDataset } from './services/data/DatasetLoader';
export type { Dataset } from './services/data/DatasetLoader';
export { writePredictions } from './services/data/PredictionWriter';
export { computeMetric, computeMetricSet, isGreaterBetter, STANDARD_METRICS } from './services/evaluation/MetricCalculator';
export { checkThresholds, normalizeThresholds, formatBound } from './services/evaluation/ThresholdGate';
export { buildPromotionPolicy, computePolicyFingerprint } from './services/evaluation/PromotionPolicy';
export { GateDecisionStore } from './services/evaluation/GateDecisionStore';
export { ModelEvaluator } from './services/evaluation/ModelEvaluator';
export type { EvaluationRequest, EvaluationResult, BaselineTarget } from './services/evaluation/ModelEvaluator';
export { ModelRegistryService } from './services/registry/ModelRegistryService';
export { AliasPromotionService } from './services/registry/AliasPromotionService';
export type { PromoteRequest, AssignAliasRequest, RemoveAliasRequest } from './services/registry/AliasPromotionService';
export { runCli } from './cli';
