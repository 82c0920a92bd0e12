import type { Hyperparameters, LinearModel } from '../../types/ModelArtifactTypes';
import { BoosterTrainer } from './BoosterTrainer';
import type { TrainingData } from './ITrainer';
import { sigmoid } from './ModelPredictor';

interface LinearState {
  means: number[];
  scales: number[];
  standardized: number[][];
  weights: number[];
  bias: number;
}

/**
 * gblinear: logistic regression on standardized features,
 * full-batch gradient descent with L2 penalty on the weights
 */
export class LinearBoosterTrainer extends BoosterTrainer<LinearState> {
  readonly booster = 'gblinear' as const;

  protected initialize(train: TrainingData): LinearState {
    const n = train.features.length;
    const width = train.features[0]?.length ?? 0;
    const means = Array.from({ length: width }, (_, j) => train.features.reduce((s, row) => s + row[j], 0) / n);
    const scales = means.map((mean, j) => {
      const variance = train.features.reduce((s, row) => s + (row[j] - mean) ** 2, 0) / n;
      const std = Math.sqrt(variance);
      return std > 0 ? std : 1;
    });

    return {
      means,
      scales,
      standardized: train.features.map((row) => row.map((v, j) => (v - means[j]) / scales[j])),
      weights: new Array<number>(width).fill(0),
      bias: 0,
    };
  }

  protected boost(state: LinearState, train: TrainingData, params: Hyperparameters): void {
    const n = state.standardized.length;
    const gradient = new Array<number>(state.weights.length).fill(0);
    let biasGradient = 0;

    state.standardized.forEach((row, i) => {
      const margin = row.reduce((m, v, j) => m + state.weights[j] * v, state.bias);
      const error = sigmoid(margin) - train.labels[i];
      biasGradient += error;
      row.forEach((v, j) => {
        gradient[j] += error * v;
      });
    });

    state.weights = state.weights.map(
      (w, j) => w - params.learning_rate * ((gradient[j] + params.l2_regularization * w) / n)
    );
    state.bias -= params.learning_rate * (biasGradient / n);
  }

  protected snapshot(state: LinearState): LinearModel {
    return {
      type: 'gblinear',
      bias: state.bias,
      weights: [...state.weights],
      means: [...state.means],
      scales: [...state.scales],
    };
  }
}
