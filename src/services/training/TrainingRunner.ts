import type { IExperimentTracker } from '../../types/RunTypes';
import type { BoosterType, Hyperparameters, ModelArtifact } from '../../types/ModelArtifactTypes';
import { TrainingFailedError } from '../../types/ModelGateErrors';
import type { FeaturesConfig } from '../../config/pipelineConfig';
import { Logger } from '../core/Logger';
import type { Dataset } from '../data/DatasetLoader';
import { encodeFeatures, encodeLabels, fitEncoding, fitLabelEncoding, missingColumns } from '../data/FeatureEncoder';
import { computeMetric } from '../evaluation/MetricCalculator';
import { errorMessage } from '../../utils/aws-errors';
import type { ITrainer, TrainingData } from './ITrainer';
import { LinearBoosterTrainer } from './LinearBoosterTrainer';
import { TreeBoosterTrainer } from './TreeBoosterTrainer';
import { predictProbabilities } from './ModelPredictor';
import { stratifiedSplit } from './random';

export interface TrainingRequest {
  dataset: Dataset;
  modelName: string;
  hyperparameters: Hyperparameters;
  features: FeaturesConfig;
  experimentName: string;
  runName?: string;
  tags?: Record<string, string>;
}

export interface TrainingResult {
  runId: string;
  artifact: ModelArtifact;
  artifactUri: string;
  metrics: Record<string, number>;
}

const FINAL_DECISION_THRESHOLD = 0.5;

export function createTrainer(booster: BoosterType): ITrainer {
  switch (booster) {
    case 'gblinear':
      return new LinearBoosterTrainer();
    case 'gbtree':
      return new TreeBoosterTrainer();
  }
}

function configSnapshot(h: Hyperparameters): Record<string, string | number | boolean> {
  return {
    booster: h.booster,
    objective: h.objective,
    eval_metrics: h.eval_metrics.join(','),
    device: h.device,
    num_boost_round: h.num_boost_round,
    learning_rate: h.learning_rate,
    l2_regularization: h.l2_regularization,
    ...(h.early_stopping_rounds !== undefined ? { early_stopping_rounds: h.early_stopping_rounds } : {}),
    validation_fraction: h.validation_fraction,
    random_seed: h.random_seed,
  };
}

function subset(data: TrainingData, indices: number[]): TrainingData {
  return {
    features: indices.map((i) => data.features[i]),
    labels: indices.map((i) => data.labels[i]),
  };
}

/**
 * TrainingRunner - trains a model under a new tracked run
 *
 * Parameters are logged before training, the metric history and final metrics after,
 * the artifact last. Any failure closes the run as FAILED (the tracker discards a partial
 * artifact), so a failed run can never be registered.
 */
export class TrainingRunner {
  constructor(
    private tracker: IExperimentTracker,
    private logger: Logger,
    private trainerFactory: (booster: BoosterType) => ITrainer = createTrainer
  ) {}

  async train(request: TrainingRequest): Promise<TrainingResult> {
    const run = await this.tracker.startRun({
      experimentName: request.experimentName,
      runName: request.runName,
      tags: request.tags,
    });
    const runId = run.run_id;
    this.logger.info('Training started', { runId, booster: request.hyperparameters.booster });

    try {
      await this.tracker.logParams(runId, this.describeParams(request));

      const { artifact, history, metrics } = this.fit(request);

      await this.tracker.logMetricHistory(runId, history);
      await this.tracker.logMetrics(runId, metrics);
      const artifactUri = await this.tracker.logModel(runId, artifact);
      await this.tracker.endRun(runId, 'FINISHED');

      this.logger.info('Training finished', { runId, bestIteration: artifact.best_iteration });
      return { runId, artifact, artifactUri, metrics };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error('Training failed', { runId, error: reason });
      try {
        await this.tracker.endRun(runId, 'FAILED', reason);
      } catch (closeError) {
        this.logger.error('Failed to close run as FAILED', { runId, error: errorMessage(closeError) });
      }
      throw new TrainingFailedError(
        `Training run ${runId} failed: ${reason}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  private describeParams(request: TrainingRequest): Record<string, string> {
    const params: Record<string, string> = {
      model_name: request.modelName,
      target_column: request.features.target_column,
      training_features: request.features.training_features.join(','),
      dataset_digest: request.dataset.digest,
    };
    for (const [key, value] of Object.entries(configSnapshot(request.hyperparameters))) {
      params[key] = String(value);
    }
    return params;
  }

  private fit(request: TrainingRequest) {
    const { dataset, features, hyperparameters } = request;
    const missing = missingColumns(dataset, [features.target_column, ...features.training_features]);
    if (missing.length > 0) {
      throw new Error(`Training dataset is missing column(s): ${missing.join(', ')}`);
    }

    const labelEncoding = fitLabelEncoding(dataset.rows, features.target_column, features.positive_label);
    const labels = encodeLabels(dataset.rows, features.target_column, labelEncoding);
    const positives = labels.filter((l) => l === 1).length;
    if (positives < 2 || labels.length - positives < 2) {
      throw new Error(
        `Training data needs at least two rows of each class (positive label '${features.positive_label}': ` +
          `${positives} positive, ${labels.length - positives} negative)`
      );
    }

    const split = stratifiedSplit(labels, hyperparameters.validation_fraction, hyperparameters.random_seed);
    const encoding = fitEncoding(
      split.train.map((i) => dataset.rows[i]),
      features.training_features
    );
    const all: TrainingData = { features: encodeFeatures(dataset.rows, encoding), labels };
    const train = subset(all, split.train);
    const validation = subset(all, split.validation);

    const trainer = this.trainerFactory(hyperparameters.booster);
    const result = trainer.fit(train, validation, hyperparameters);

    const metrics: Record<string, number> = {};
    const tracked = [...new Set(['accuracy', ...hyperparameters.eval_metrics])];
    for (const [prefix, data] of [
      ['train', train],
      ['validation', validation],
    ] as const) {
      const probabilities = predictProbabilities(result.model, data.features);
      for (const metric of tracked) {
        metrics[`${prefix}_${metric}`] = computeMetric(metric, {
          labels: data.labels,
          probabilities,
          decisionThreshold: FINAL_DECISION_THRESHOLD,
        });
      }
    }
    metrics.best_iteration = result.bestIteration;

    const artifact: ModelArtifact = {
      schema_version: '1',
      model_name: request.modelName,
      objective: hyperparameters.objective,
      feature_names: encoding.feature_names,
      target_column: features.target_column,
      positive_label: labelEncoding.positive_label,
      negative_label: labelEncoding.negative_label,
      feature_encoders: encoding.feature_encoders,
      imputation: encoding.imputation,
      model: result.model,
      best_iteration: result.bestIteration,
      training_config: configSnapshot(hyperparameters),
      created_at: new Date().toISOString(),
    };

    return { artifact, history: result.history, metrics };
  }
}
