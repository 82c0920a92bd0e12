import type { Hyperparameters, Stump, TreeModel } from '../../types/ModelArtifactTypes';
import { BoosterTrainer } from './BoosterTrainer';
import type { TrainingData } from './ITrainer';
import { sigmoid } from './ModelPredictor';

interface TreeState {
  baseScore: number;
  stumps: Stump[];
  margins: number[];
}

const PROBABILITY_FLOOR = 1e-6;

function logit(p: number): number {
  const clipped = Math.min(Math.max(p, PROBABILITY_FLOOR), 1 - PROBABILITY_FLOOR);
  return Math.log(clipped / (1 - clipped));
}

function leafWeight(gradient: number, hessian: number, params: Hyperparameters): number {
  return (-gradient / (hessian + params.l2_regularization)) * params.learning_rate;
}

function score(gradient: number, hessian: number, lambda: number): number {
  return (gradient * gradient) / (hessian + lambda);
}

/**
 * gbtree: gradient boosting of depth-one trees on logistic loss,
 * splits chosen by second-order gain
 */
export class TreeBoosterTrainer extends BoosterTrainer<TreeState> {
  readonly booster = 'gbtree' as const;

  protected initialize(train: TrainingData): TreeState {
    const positiveRate = train.labels.reduce((s, y) => s + y, 0) / train.labels.length;
    const baseScore = logit(positiveRate);
    return { baseScore, stumps: [], margins: train.labels.map(() => baseScore) };
  }

  protected boost(state: TreeState, train: TrainingData, params: Hyperparameters): void {
    const gradients: number[] = [];
    const hessians: number[] = [];
    state.margins.forEach((margin, i) => {
      const p = sigmoid(margin);
      gradients.push(p - train.labels[i]);
      hessians.push(Math.max(p * (1 - p), PROBABILITY_FLOOR));
    });

    const stump = this.bestSplit(train.features, gradients, hessians, params);
    state.stumps.push(stump);
    state.margins = state.margins.map(
      (margin, i) => margin + (train.features[i][stump.feature] <= stump.threshold ? stump.left : stump.right)
    );
  }

  private bestSplit(features: number[][], gradients: number[], hessians: number[], params: Hyperparameters): Stump {
    const lambda = params.l2_regularization;
    const totalG = gradients.reduce((s, g) => s + g, 0);
    const totalH = hessians.reduce((s, h) => s + h, 0);
    const parentScore = score(totalG, totalH, lambda);
    const width = features[0]?.length ?? 0;

    // A constant leaf when no feature separates the rows
    let best: Stump = {
      feature: 0,
      threshold: 0,
      left: leafWeight(totalG, totalH, params),
      right: leafWeight(totalG, totalH, params),
      gain: 0,
    };

    for (let feature = 0; feature < width; feature++) {
      const order = features.map((row, i) => ({ value: row[feature], i })).sort((a, b) => a.value - b.value);
      let leftG = 0;
      let leftH = 0;

      for (let k = 0; k < order.length - 1; k++) {
        leftG += gradients[order[k].i];
        leftH += hessians[order[k].i];
        if (order[k].value === order[k + 1].value) continue;

        const rightG = totalG - leftG;
        const rightH = totalH - leftH;
        const gain = score(leftG, leftH, lambda) + score(rightG, rightH, lambda) - parentScore;
        if (gain > best.gain) {
          best = {
            feature,
            threshold: (order[k].value + order[k + 1].value) / 2,
            left: leafWeight(leftG, leftH, params),
            right: leafWeight(rightG, rightH, params),
            gain,
          };
        }
      }
    }

    return best;
  }

  protected snapshot(state: TreeState): TreeModel {
    return { type: 'gbtree', base_score: state.baseScore, stumps: [...state.stumps] };
  }
}
