/**
 * Shared test data: a one-feature linear artifact (probability = sigmoid(weight * score))
 * and a six-row evaluation set whose metrics are easy to derive by hand.
 */

import type { ModelArtifact } from '../../types/ModelArtifactTypes';
import type { GateDecision } from '../../types/EvaluationTypes';
import { parseDataset } from '../../services/data/DatasetLoader';
import { parsePipelineConfig, PipelineConfig } from '../../config/pipelineConfig';

/** Positives score 2, 1, -0.5; negatives -2, -1, 0.5 */
export const EVAL_CSV = 'score,label\n2,1\n1,1\n-0.5,1\n-2,0\n-1,0\n0.5,0\n';

export function evalDataset() {
  return parseDataset(EVAL_CSV, 'eval.csv');
}

export function linearArtifact(weight = 1, overrides: Partial<ModelArtifact> = {}): ModelArtifact {
  return {
    schema_version: '1',
    model_name: 'churn_model',
    objective: 'binary:logistic',
    feature_names: ['score'],
    target_column: 'label',
    positive_label: '1',
    negative_label: '0',
    feature_encoders: {},
    imputation: [0],
    model: { type: 'gblinear', bias: 0, weights: [weight], means: [0], scales: [1] },
    best_iteration: 0,
    training_config: { booster: 'gblinear' },
    created_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function gateDecision(overrides: Partial<GateDecision> = {}): GateDecision {
  return {
    decision_id: 'decision-1',
    run_id: 'run-1',
    passed: true,
    reasons: [],
    policy_fingerprint: 'fp-test',
    dataset_digest: 'digest-1',
    metrics: { auc: 0.9 },
    evaluated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export const BASE_CONFIG = {
  tracking: {
    experiment_name: 'churn',
    runs_table: 'test-runs',
    artifact_bucket: 'test-bucket',
  },
  registry: {
    registry_table: 'test-registry',
    ledger_table: 'test-ledger',
  },
  model: {
    name: 'churn_model',
    booster: 'gblinear',
  },
  features: {
    target_column: 'label',
    training_features: ['score'],
  },
};

export function pipelineConfig(evaluation: Record<string, unknown> = {}): PipelineConfig {
  return parsePipelineConfig({ ...BASE_CONFIG, evaluation });
}
