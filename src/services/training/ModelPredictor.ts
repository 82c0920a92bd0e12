import type { LinearModel, ModelParameters, TreeModel } from '../../types/ModelArtifactTypes';

export function sigmoid(margin: number): number {
  return 1 / (1 + Math.exp(-margin));
}

function linearMargin(model: LinearModel, row: number[]): number {
  return row.reduce(
    (margin, value, j) => margin + model.weights[j] * ((value - model.means[j]) / model.scales[j]),
    model.bias
  );
}

function treeMargin(model: TreeModel, row: number[]): number {
  return model.stumps.reduce(
    (margin, stump) => margin + (row[stump.feature] <= stump.threshold ? stump.left : stump.right),
    model.base_score
  );
}

/**
 * Positive-class probability for each encoded row
 */
export function predictProbabilities(model: ModelParameters, features: number[][]): number[] {
  switch (model.type) {
    case 'gblinear':
      return features.map((row) => sigmoid(linearMargin(model, row)));
    case 'gbtree':
      return features.map((row) => sigmoid(treeMargin(model, row)));
  }
}
