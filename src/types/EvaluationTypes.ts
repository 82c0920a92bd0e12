/**
 * Evaluation / gate types.
 * A GateDecision is produced once per evaluation call and never altered afterwards;
 * changing a threshold means evaluating again.
 */

import { z } from 'zod';

export type ThresholdDirection = 'min' | 'max';

/** Threshold as written in config: a bare bound takes the metric's natural direction. */
export type ThresholdBound = number | { min: number } | { max: number };

export interface NormalizedThreshold {
  metric: string;
  direction: ThresholdDirection;
  bound: number;
}

export interface BaselinePolicy {
  primary_metric: string;
  tolerance: number;
  alias?: string;
}

/** Everything that makes up "the promotion policy currently in force". */
export interface PromotionPolicy {
  thresholds: NormalizedThreshold[];
  baseline?: BaselinePolicy;
}

export type GateReasonCode = 'THRESHOLD_VIOLATION' | 'BASELINE_REGRESSION';

export const GateReasonSchema = z.object({
  code: z.enum(['THRESHOLD_VIOLATION', 'BASELINE_REGRESSION']),
  metric: z.string(),
  actual: z.number(),
  bound: z.number(),
  message: z.string(),
});

export type GateReason = z.infer<typeof GateReasonSchema>;

export const BaselineComparisonSchema = z.object({
  model_name: z.string(),
  version: z.number().int().positive(),
  run_id: z.string(),
  metric: z.string(),
  baseline_value: z.number(),
  candidate_value: z.number(),
  delta: z.number(),
  tolerance: z.number(),
  regressed: z.boolean(),
});

export type BaselineComparison = z.infer<typeof BaselineComparisonSchema>;

export const FeatureAttributionSchema = z.object({
  feature: z.string(),
  importance: z.number(),
});

export type FeatureAttribution = z.infer<typeof FeatureAttributionSchema>;

export const GateDecisionSchema = z.object({
  decision_id: z.string().min(1),
  run_id: z.string().min(1),
  passed: z.boolean(),
  reasons: z.array(GateReasonSchema),
  baseline_comparison: BaselineComparisonSchema.optional(),
  policy_fingerprint: z.string().min(1),
  dataset_digest: z.string().min(1),
  metrics: z.record(z.number()),
  evaluated_at: z.string(),
  attributions: z.array(FeatureAttributionSchema).optional(),
});

export type GateDecision = z.infer<typeof GateDecisionSchema>;

export const EvaluationMetricSetSchema = z.object({
  run_id: z.string().min(1),
  dataset_digest: z.string().min(1),
  metrics: z.record(z.number()),
  evaluated_at: z.string(),
});

export type EvaluationMetricSet = z.infer<typeof EvaluationMetricSetSchema>;

/**
 * Storage for evaluation metric sets and gate decisions, associated with the run.
 */
export interface IGateDecisionStore {
  /** Store the metric set for (run, dataset); an existing set is kept and returned. */
  saveEvaluation(evaluation: EvaluationMetricSet): Promise<EvaluationMetricSet>;
  getEvaluation(runId: string, datasetDigest: string): Promise<EvaluationMetricSet | null>;
  saveDecision(decision: GateDecision): Promise<void>;
  /** Most recent decision for the run under the given policy fingerprint. */
  getLatestDecision(runId: string, policyFingerprint: string): Promise<GateDecision | null>;
  listDecisions(runId: string): Promise<GateDecision[]>;
}
