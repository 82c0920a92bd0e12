import type { BoosterType, Hyperparameters, ModelParameters } from '../../types/ModelArtifactTypes';
import type { MetricPoint } from '../../types/RunTypes';

export interface TrainingData {
  features: number[][];
  labels: number[];
}

export interface TrainerResult {
  /** Parameters at the best iteration */
  model: ModelParameters;
  bestIteration: number;
  /** train_<metric> / validation_<metric> per iteration */
  history: MetricPoint[];
}

/**
 * Black-box trainer: fits a binary classifier and reports per-iteration metrics
 */
export interface ITrainer {
  readonly booster: BoosterType;
  fit(train: TrainingData, validation: TrainingData, params: Hyperparameters): TrainerResult;
}
