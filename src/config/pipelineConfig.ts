/**
 * Pipeline configuration: one YAML document validated up front, before any command runs.
 * Unknown keys and missing required keys are rejected at load time.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { BOOSTER_TYPES, Hyperparameters } from '../types/ModelArtifactTypes';
import { ConfigError } from '../types/ModelGateErrors';

const ThresholdBoundSchema = z.union([
  z.number(),
  z.object({ min: z.number() }).strict(),
  z.object({ max: z.number() }).strict(),
]);

const TrackingConfigSchema = z
  .object({
    region: z.string().min(1).default('us-east-1'),
    endpoint: z.string().url().optional(),
    experiment_name: z.string().min(1),
    runs_table: z.string().min(1),
    artifact_bucket: z.string().min(1),
    artifact_prefix: z.string().min(1).default('runs'),
    tags: z.record(z.string()).default({}),
  })
  .strict();

const RegistryConfigSchema = z
  .object({
    region: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    registry_table: z.string().min(1),
    ledger_table: z.string().min(1),
    default_alias: z.string().min(1).default('champion'),
  })
  .strict();

const ModelConfigSchema = z
  .object({
    name: z.string().min(1),
    booster: z.enum(BOOSTER_TYPES),
    objective: z.literal('binary:logistic').default('binary:logistic'),
    eval_metrics: z.array(z.string().min(1)).min(1).default(['log_loss']),
    device: z.literal('cpu').default('cpu'),
    num_boost_round: z.number().int().positive().default(100),
    learning_rate: z.number().positive().max(1).default(0.1),
    l2_regularization: z.number().min(0).default(1),
    early_stopping_rounds: z.number().int().positive().optional(),
    validation_fraction: z.number().gt(0).lt(1).default(0.2),
    random_seed: z.number().int().default(42),
  })
  .strict();

const FeaturesConfigSchema = z
  .object({
    target_column: z.string().min(1),
    training_features: z.array(z.string().min(1)).min(1),
    positive_label: z.union([z.string(), z.number()]).transform(String).default('1'),
  })
  .strict()
  .refine((features) => !features.training_features.includes(features.target_column), {
    message: 'target_column must not be listed in training_features',
  });

const EvaluationConfigSchema = z
  .object({
    thresholds: z.record(ThresholdBoundSchema).default({}),
    baseline: z
      .object({
        primary_metric: z.string().min(1),
        tolerance: z.number().min(0).default(0),
        alias: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    explain: z
      .object({
        enable: z.boolean().default(false),
        max_features: z.number().int().positive().default(10),
      })
      .strict()
      .default({}),
    decision_threshold: z.number().gt(0).lt(1).default(0.5),
  })
  .strict();

export const PipelineConfigSchema = z
  .object({
    tracking: TrackingConfigSchema,
    registry: RegistryConfigSchema,
    model: ModelConfigSchema,
    features: FeaturesConfigSchema,
    evaluation: EvaluationConfigSchema.default({}),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type TrackingConfig = PipelineConfig['tracking'];
export type RegistryConfig = PipelineConfig['registry'];
export type ModelConfig = PipelineConfig['model'];
export type FeaturesConfig = PipelineConfig['features'];
export type EvaluationConfig = PipelineConfig['evaluation'];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}

/**
 * Validate an already-parsed configuration document
 */
export function parsePipelineConfig(raw: unknown, source = 'configuration'): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load and validate a YAML configuration file
 */
export function loadPipelineConfig(configPath: string): PipelineConfig {
  if (!configPath) {
    throw new ConfigError('--config is required');
  }
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigError(`Config file is not valid YAML: ${configPath}`, [error.message]);
    }
    throw error;
  }

  return parsePipelineConfig(raw, `config file ${configPath}`);
}

/**
 * Hyperparameter view of the model section, as passed to the trainers
 */
export function toHyperparameters(model: ModelConfig): Hyperparameters {
  return {
    booster: model.booster,
    objective: model.objective,
    eval_metrics: model.eval_metrics,
    device: model.device,
    num_boost_round: model.num_boost_round,
    learning_rate: model.learning_rate,
    l2_regularization: model.l2_regularization,
    early_stopping_rounds: model.early_stopping_rounds,
    validation_fraction: model.validation_fraction,
    random_seed: model.random_seed,
  };
}
