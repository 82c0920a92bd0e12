/**
 * The promotion policy in force is the normalized threshold set plus the baseline rule.
 * Decisions are stored under the policy fingerprint, so a policy change invalidates
 * earlier decisions without touching them.
 */

import { createHash } from 'crypto';
import type { BaselinePolicy, PromotionPolicy, ThresholdBound } from '../../types/EvaluationTypes';
import { normalizeThresholds } from './ThresholdGate';

export function buildPromotionPolicy(
  thresholds: Record<string, ThresholdBound>,
  baseline?: BaselinePolicy
): PromotionPolicy {
  return {
    thresholds: normalizeThresholds(thresholds),
    ...(baseline ? { baseline } : {}),
  };
}

/**
 * Stable 16-hex-char fingerprint; threshold declaration order does not matter
 */
export function computePolicyFingerprint(policy: PromotionPolicy): string {
  const canonical = {
    thresholds: [...policy.thresholds]
      .sort((a, b) => a.metric.localeCompare(b.metric))
      .map((t) => [t.metric, t.direction, t.bound]),
    baseline: policy.baseline
      ? [policy.baseline.primary_metric, policy.baseline.tolerance, policy.baseline.alias ?? null]
      : null,
  };
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex').slice(0, 16);
}
