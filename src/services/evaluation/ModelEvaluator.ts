import { v4 as uuidv4 } from 'uuid';
import {
  BaselineComparison,
  GateDecision,
  GateReason,
  IGateDecisionStore,
  PromotionPolicy,
} from '../../types/EvaluationTypes';
import type { IExperimentTracker } from '../../types/RunTypes';
import type { IModelRegistry, ModelVersion } from '../../types/RegistryTypes';
import type { ModelArtifact } from '../../types/ModelArtifactTypes';
import { ILedgerService, LedgerEventType } from '../../types/LedgerTypes';
import { ConfigError, MetricComputationError } from '../../types/ModelGateErrors';
import { Logger } from '../core/Logger';
import type { Dataset } from '../data/DatasetLoader';
import { encodeFeatures, encodeLabels, missingColumns } from '../data/FeatureEncoder';
import { predictProbabilities } from '../training/ModelPredictor';
import { computeMetricSet } from './MetricCalculator';
import { checkThresholds, compareWithBaseline } from './ThresholdGate';
import { computePolicyFingerprint } from './PromotionPolicy';
import { computeFeatureAttributions } from './FeatureAttribution';
import { errorMessage } from '../../utils/aws-errors';

/**
 * Which registered version to compare against: an explicit version, else the version
 * an alias currently binds
 */
export interface BaselineTarget {
  modelName: string;
  version?: number;
  alias?: string;
}

export interface EvaluationRequest {
  runId: string;
  dataset: Dataset;
  policy: PromotionPolicy;
  decisionThreshold: number;
  baseline?: BaselineTarget;
  explain?: { maxFeatures: number };
}

export interface EvaluationResult {
  decision: GateDecision;
  /** Positive-class probability per dataset row */
  probabilities: number[];
}

interface ScoredDataset {
  labels: number[];
  probabilities: number[];
}

/**
 * ModelEvaluator - scores a run's artifact on a held-out dataset and records a gate decision
 *
 * The decision is a pure function of (artifact, dataset, policy, baseline metrics): re-running
 * with the same inputs yields the same outcome and reasons. Every call stores a new decision.
 */
export class ModelEvaluator {
  constructor(
    private tracker: Pick<IExperimentTracker, 'loadModel'>,
    private decisionStore: IGateDecisionStore,
    private registry: Pick<IModelRegistry, 'getAlias' | 'getVersionInfo'>,
    private ledgerService: ILedgerService,
    private logger: Logger,
    private actor: string = 'model-gate'
  ) {}

  async evaluate(request: EvaluationRequest): Promise<EvaluationResult> {
    const { runId, dataset, policy } = request;
    // The fingerprint covers the baseline rule, so a decision under it must include the comparison
    if (policy.baseline && !request.baseline) {
      throw new ConfigError('The promotion policy compares against a baseline; name the baseline model');
    }
    const artifact = await this.tracker.loadModel(runId);
    const scored = this.score(artifact, dataset);

    const baselineVersion =
      request.baseline && policy.baseline ? await this.resolveBaseline(request.baseline) : null;

    const required = policy.thresholds.map((t) => t.metric);
    if (baselineVersion && policy.baseline) {
      required.push(policy.baseline.primary_metric);
    }

    const metrics = computeMetricSet(required, { ...scored, decisionThreshold: request.decisionThreshold });
    const evaluatedAt = new Date().toISOString();

    await this.decisionStore.saveEvaluation({
      run_id: runId,
      dataset_digest: dataset.digest,
      metrics,
      evaluated_at: evaluatedAt,
    });

    const reasons: GateReason[] = checkThresholds(metrics, policy.thresholds);

    let baselineComparison: BaselineComparison | undefined;
    if (baselineVersion && policy.baseline) {
      const metric = policy.baseline.primary_metric;
      const baselineValue = await this.baselineMetric(baselineVersion, dataset, metric, request.decisionThreshold);
      const { comparison, reason } = compareWithBaseline({
        modelName: baselineVersion.model_name,
        version: baselineVersion.version,
        runId: baselineVersion.run_id,
        metric,
        tolerance: policy.baseline.tolerance,
        baselineValue,
        candidateValue: metrics[metric],
      });
      baselineComparison = comparison;
      if (reason) {
        reasons.push(reason);
      }
    }

    const decision: GateDecision = {
      decision_id: uuidv4(),
      run_id: runId,
      passed: reasons.length === 0,
      reasons,
      ...(baselineComparison ? { baseline_comparison: baselineComparison } : {}),
      policy_fingerprint: computePolicyFingerprint(policy),
      dataset_digest: dataset.digest,
      metrics,
      evaluated_at: evaluatedAt,
      ...(request.explain ? { attributions: computeFeatureAttributions(artifact, request.explain.maxFeatures) } : {}),
    };

    await this.decisionStore.saveDecision(decision);
    await this.ledgerService.append({
      subjectType: 'RUN',
      subjectId: runId,
      eventType: LedgerEventType.GATE_EVALUATED,
      actor: this.actor,
      data: {
        decision_id: decision.decision_id,
        passed: decision.passed,
        policy_fingerprint: decision.policy_fingerprint,
        dataset_digest: decision.dataset_digest,
        reasons: reasons.map((r) => r.message),
      },
    });

    this.logger.info('Gate decision recorded', {
      runId,
      decisionId: decision.decision_id,
      passed: decision.passed,
      reasons: reasons.length,
    });

    return { decision, probabilities: scored.probabilities };
  }

  /**
   * Encode the dataset with the artifact's encoders and score it
   */
  private score(artifact: ModelArtifact, dataset: Dataset): ScoredDataset {
    const missing = missingColumns(dataset, [artifact.target_column, ...artifact.feature_names]);
    if (missing.length > 0) {
      throw new MetricComputationError(
        `Evaluation dataset ${dataset.source} is missing required column(s): ${missing.join(', ')}`
      );
    }

    let labels: number[];
    try {
      labels = encodeLabels(dataset.rows, artifact.target_column, artifact);
    } catch (error) {
      throw new MetricComputationError(`Evaluation dataset ${dataset.source}: ${errorMessage(error)}`);
    }

    const features = encodeFeatures(dataset.rows, artifact);
    return { labels, probabilities: predictProbabilities(artifact.model, features) };
  }

  private async resolveBaseline(target: BaselineTarget): Promise<ModelVersion | null> {
    if (target.version !== undefined) {
      return this.registry.getVersionInfo(target.modelName, target.version);
    }
    if (!target.alias) {
      return null;
    }

    const binding = await this.registry.getAlias(target.modelName, target.alias);
    if (!binding) {
      this.logger.info('Baseline alias is unbound; skipping baseline comparison', {
        modelName: target.modelName,
        alias: target.alias,
      });
      return null;
    }
    return this.registry.getVersionInfo(target.modelName, binding.version);
  }

  /**
   * Baseline metric on this dataset: the stored metric set when it has the metric,
   * otherwise scored now and stored
   */
  private async baselineMetric(
    baseline: ModelVersion,
    dataset: Dataset,
    metric: string,
    decisionThreshold: number
  ): Promise<number> {
    const stored = await this.decisionStore.getEvaluation(baseline.run_id, dataset.digest);
    const storedValue = stored?.metrics[metric];
    if (storedValue !== undefined) {
      return storedValue;
    }

    const artifact = await this.tracker.loadModel(baseline.run_id);
    const metrics = computeMetricSet([metric], { ...this.score(artifact, dataset), decisionThreshold });
    if (!stored) {
      await this.decisionStore.saveEvaluation({
        run_id: baseline.run_id,
        dataset_digest: dataset.digest,
        metrics,
        evaluated_at: new Date().toISOString(),
      });
    }
    return metrics[metric];
  }
}
