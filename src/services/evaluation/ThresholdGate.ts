/**
 * Threshold and baseline checks for the evaluation gate.
 * Deterministic and side-effect free: same metrics + same policy → same reasons, in the same order.
 */

import type {
  BaselineComparison,
  GateReason,
  NormalizedThreshold,
  ThresholdBound,
} from '../../types/EvaluationTypes';
import { isGreaterBetter, isKnownMetric } from './MetricCalculator';

/**
 * Bounds print with two decimals when that is exact (0.8 → "0.80"), otherwise in full
 */
export function formatBound(value: number): string {
  const fixed = value.toFixed(2);
  return Number(fixed) === value ? fixed : String(value);
}

/**
 * Normalize configured thresholds, keeping declaration order.
 * A bare number takes the metric's natural direction (min for scores, max for losses).
 */
export function normalizeThresholds(thresholds: Record<string, ThresholdBound>): NormalizedThreshold[] {
  return Object.entries(thresholds).map(([metric, bound]) => {
    if (typeof bound === 'number') {
      const direction = isKnownMetric(metric) && !isGreaterBetter(metric) ? 'max' : 'min';
      return { metric, direction, bound };
    }
    if ('min' in bound) {
      return { metric, direction: 'min', bound: bound.min };
    }
    return { metric, direction: 'max', bound: bound.max };
  });
}

/**
 * Check every threshold (no short circuit); one reason per violated threshold
 */
export function checkThresholds(metrics: Record<string, number>, thresholds: NormalizedThreshold[]): GateReason[] {
  const reasons: GateReason[] = [];
  for (const threshold of thresholds) {
    const actual = metrics[threshold.metric];
    const violated = threshold.direction === 'min' ? actual < threshold.bound : actual > threshold.bound;
    if (violated) {
      reasons.push({
        code: 'THRESHOLD_VIOLATION',
        metric: threshold.metric,
        actual,
        bound: threshold.bound,
        message: `${threshold.metric} ${threshold.direction === 'min' ? 'below' : 'above'} ${formatBound(threshold.bound)}`,
      });
    }
  }
  return reasons;
}

export interface BaselineInput {
  modelName: string;
  version: number;
  runId: string;
  metric: string;
  tolerance: number;
  baselineValue: number;
  candidateValue: number;
}

/**
 * Candidate may not be worse than the baseline by more than the tolerance on the primary metric
 */
export function compareWithBaseline(input: BaselineInput): { comparison: BaselineComparison; reason?: GateReason } {
  const greaterIsBetter = isGreaterBetter(input.metric);
  const delta = input.candidateValue - input.baselineValue;
  const regressed = greaterIsBetter ? delta < -input.tolerance : delta > input.tolerance;
  const comparison: BaselineComparison = {
    model_name: input.modelName,
    version: input.version,
    run_id: input.runId,
    metric: input.metric,
    baseline_value: input.baselineValue,
    candidate_value: input.candidateValue,
    delta,
    tolerance: input.tolerance,
    regressed,
  };

  if (!regressed) {
    return { comparison };
  }

  const bound = greaterIsBetter ? input.baselineValue - input.tolerance : input.baselineValue + input.tolerance;
  return {
    comparison,
    reason: {
      code: 'BASELINE_REGRESSION',
      metric: input.metric,
      actual: input.candidateValue,
      bound,
      message:
        `${input.metric} regressed against baseline ${input.modelName} v${input.version}: ` +
        `${input.candidateValue.toFixed(4)} vs ${input.baselineValue.toFixed(4)} (tolerance ${formatBound(input.tolerance)})`,
    },
  };
}
