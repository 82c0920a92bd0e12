import type { BoosterType, Hyperparameters, ModelParameters } from '../../types/ModelArtifactTypes';
import type { MetricPoint } from '../../types/RunTypes';
import { computeMetric, isGreaterBetter } from '../evaluation/MetricCalculator';
import { predictProbabilities } from './ModelPredictor';
import type { ITrainer, TrainerResult, TrainingData } from './ITrainer';

const TRAINING_DECISION_THRESHOLD = 0.5;

interface BestIteration {
  iteration: number;
  score: number;
  model: ModelParameters;
}

/**
 * Shared boosting loop: one update per round, metrics on both splits,
 * early stopping on the first eval metric measured on the validation split.
 */
export abstract class BoosterTrainer<TState> implements ITrainer {
  abstract readonly booster: BoosterType;

  protected abstract initialize(train: TrainingData, params: Hyperparameters): TState;

  protected abstract boost(state: TState, train: TrainingData, params: Hyperparameters): void;

  /** Copy of the current parameters */
  protected abstract snapshot(state: TState): ModelParameters;

  fit(train: TrainingData, validation: TrainingData, params: Hyperparameters): TrainerResult {
    const state = this.initialize(train, params);
    const monitored = params.eval_metrics[0];
    const greaterIsBetter = isGreaterBetter(monitored);
    const history: MetricPoint[] = [];
    let best: BestIteration | null = null;

    for (let iteration = 0; iteration < params.num_boost_round; iteration++) {
      this.boost(state, train, params);
      const model = this.snapshot(state);

      let score = 0;
      for (const [split, data] of [
        ['train', train],
        ['validation', validation],
      ] as const) {
        const probabilities = predictProbabilities(model, data.features);
        for (const metric of params.eval_metrics) {
          const value = computeMetric(metric, {
            labels: data.labels,
            probabilities,
            decisionThreshold: TRAINING_DECISION_THRESHOLD,
          });
          if (!Number.isFinite(value)) {
            throw new Error(`Training diverged: ${split} ${metric} is ${value} at iteration ${iteration}`);
          }
          history.push({ key: `${split}_${metric}`, value, step: iteration });
          if (split === 'validation' && metric === monitored) {
            score = value;
          }
        }
      }

      const improved = best === null || (greaterIsBetter ? score > best.score : score < best.score);
      if (best === null || improved) {
        best = { iteration, score, model };
      } else if (params.early_stopping_rounds && iteration - best.iteration >= params.early_stopping_rounds) {
        break;
      }
    }

    if (best === null) {
      throw new Error('No boosting rounds were run');
    }

    return { model: best.model, bestIteration: best.iteration, history };
  }
}
