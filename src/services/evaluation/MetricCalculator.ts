/**
 * Binary classification metrics computed from labels (0/1) and positive-class probabilities.
 * Deterministic: the same labels and probabilities always give the same values.
 */

import { MetricComputationError } from '../../types/ModelGateErrors';

export interface MetricInput {
  labels: number[];
  probabilities: number[];
  /** Probability at or above which a row is predicted positive */
  decisionThreshold: number;
}

interface MetricDefinition {
  greaterIsBetter: boolean;
  /** Why the metric cannot be computed for this input, or null */
  unavailableReason(input: MetricInput): string | null;
  compute(input: MetricInput): number;
}

const EPSILON = 1e-15;

interface ConfusionCounts {
  tp: number;
  fp: number;
  tn: number;
  fn: number;
}

function confusion(input: MetricInput): ConfusionCounts {
  const counts: ConfusionCounts = { tp: 0, fp: 0, tn: 0, fn: 0 };
  input.labels.forEach((label, i) => {
    const predicted = input.probabilities[i] >= input.decisionThreshold ? 1 : 0;
    if (predicted === 1 && label === 1) counts.tp++;
    else if (predicted === 1) counts.fp++;
    else if (label === 1) counts.fn++;
    else counts.tn++;
  });
  return counts;
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

function precision(input: MetricInput): number {
  const { tp, fp } = confusion(input);
  return ratio(tp, tp + fp);
}

function recall(input: MetricInput): number {
  const { tp, fn } = confusion(input);
  return ratio(tp, tp + fn);
}

/**
 * ROC AUC via the rank-sum statistic, averaging ranks over tied scores
 */
function rocAuc(input: MetricInput): number {
  const order = input.probabilities.map((p, i) => ({ p, label: input.labels[i] })).sort((a, b) => a.p - b.p);

  let positiveRankSum = 0;
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].p === order[i].p) j++;
    const averageRank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) {
      if (order[k].label === 1) positiveRankSum += averageRank;
    }
    i = j + 1;
  }

  const positives = input.labels.filter((l) => l === 1).length;
  const negatives = input.labels.length - positives;
  return (positiveRankSum - (positives * (positives + 1)) / 2) / (positives * negatives);
}

function logLoss(input: MetricInput): number {
  const total = input.labels.reduce((sum, label, i) => {
    const p = Math.min(Math.max(input.probabilities[i], EPSILON), 1 - EPSILON);
    return sum - (label === 1 ? Math.log(p) : Math.log(1 - p));
  }, 0);
  return total / input.labels.length;
}

const alwaysAvailable = (): null => null;

function requiresBothClasses(input: MetricInput): string | null {
  const positives = input.labels.filter((l) => l === 1).length;
  if (positives === 0 || positives === input.labels.length) {
    return 'only one class is present in the label column';
  }
  return null;
}

const METRICS: Record<string, MetricDefinition> = {
  accuracy: {
    greaterIsBetter: true,
    unavailableReason: alwaysAvailable,
    compute: (input) => {
      const { tp, tn } = confusion(input);
      return (tp + tn) / input.labels.length;
    },
  },
  precision: { greaterIsBetter: true, unavailableReason: alwaysAvailable, compute: precision },
  recall: { greaterIsBetter: true, unavailableReason: alwaysAvailable, compute: recall },
  f1_score: {
    greaterIsBetter: true,
    unavailableReason: alwaysAvailable,
    compute: (input) => {
      const p = precision(input);
      const r = recall(input);
      return ratio(2 * p * r, p + r);
    },
  },
  auc: { greaterIsBetter: true, unavailableReason: requiresBothClasses, compute: rocAuc },
  log_loss: { greaterIsBetter: false, unavailableReason: alwaysAvailable, compute: logLoss },
};

const METRIC_ALIASES: Record<string, string> = {
  roc_auc: 'auc',
  f1: 'f1_score',
  logloss: 'log_loss',
};

/** Metrics reported on every evaluation, when computable. */
export const STANDARD_METRICS = ['accuracy', 'precision', 'recall', 'f1_score', 'auc', 'log_loss'];

function resolve(name: string): MetricDefinition | undefined {
  return METRICS[METRIC_ALIASES[name] ?? name];
}

export function isKnownMetric(name: string): boolean {
  return resolve(name) !== undefined;
}

/**
 * Natural direction of a metric; error-type metrics (log_loss) are bounded from above
 */
export function isGreaterBetter(name: string): boolean {
  const definition = resolve(name);
  if (!definition) {
    throw new MetricComputationError(`Unknown metric '${name}'`);
  }
  return definition.greaterIsBetter;
}

function validateInput(input: MetricInput): void {
  if (input.labels.length === 0) {
    throw new MetricComputationError('Cannot compute metrics on an empty dataset');
  }
  if (input.labels.length !== input.probabilities.length) {
    throw new MetricComputationError(
      `Label count (${input.labels.length}) does not match prediction count (${input.probabilities.length})`
    );
  }
}

/**
 * Compute one metric; throws MetricComputationError when it is unknown or not computable
 */
export function computeMetric(name: string, input: MetricInput): number {
  const definition = resolve(name);
  if (!definition) {
    throw new MetricComputationError(`Unknown metric '${name}'`);
  }
  validateInput(input);
  const reason = definition.unavailableReason(input);
  if (reason) {
    throw new MetricComputationError(`Cannot compute '${name}': ${reason}`);
  }
  return definition.compute(input);
}

/**
 * Compute every required metric (failing on any that cannot be computed) plus the
 * standard metrics that are computable for this input
 */
export function computeMetricSet(required: string[], input: MetricInput): Record<string, number> {
  validateInput(input);
  const metrics: Record<string, number> = {};
  for (const name of STANDARD_METRICS) {
    if (resolve(name)?.unavailableReason(input) === null) {
      metrics[name] = computeMetric(name, input);
    }
  }
  for (const name of required) {
    metrics[name] = computeMetric(name, input);
  }
  return metrics;
}
