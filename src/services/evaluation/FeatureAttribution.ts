import type { FeatureAttribution } from '../../types/EvaluationTypes';
import type { ModelArtifact } from '../../types/ModelArtifactTypes';

/**
 * Global feature importance, normalized to sum to 1, largest first.
 * gblinear: |weight| on standardized features. gbtree: total split gain per feature.
 */
export function computeFeatureAttributions(artifact: ModelArtifact, maxFeatures: number): FeatureAttribution[] {
  const raw = artifact.feature_names.map(() => 0);
  const model = artifact.model;

  if (model.type === 'gblinear') {
    model.weights.forEach((weight, j) => {
      raw[j] = Math.abs(weight);
    });
  } else {
    for (const stump of model.stumps) {
      raw[stump.feature] += stump.gain;
    }
  }

  const total = raw.reduce((sum, value) => sum + value, 0);
  if (total === 0) {
    return [];
  }

  return artifact.feature_names
    .map((feature, j) => ({ feature, importance: raw[j] / total }))
    .filter((attribution) => attribution.importance > 0)
    .sort((a, b) => b.importance - a.importance || a.feature.localeCompare(b.feature))
    .slice(0, maxFeatures);
}
