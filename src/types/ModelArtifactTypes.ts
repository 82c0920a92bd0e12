/**
 * Model artifact - the serialized classifier plus the metadata needed to score a dataset.
 *
 * Artifacts are stored as JSON and validated with ArtifactSchema on every load; anything that
 * does not parse is treated as a corrupt (missing) artifact.
 */

import { z } from 'zod';

export const BOOSTER_TYPES = ['gbtree', 'gblinear'] as const;
export type BoosterType = (typeof BOOSTER_TYPES)[number];

export const LinearModelSchema = z
  .object({
    type: z.literal('gblinear'),
    bias: z.number(),
    weights: z.array(z.number()),
    means: z.array(z.number()),
    scales: z.array(z.number().positive()),
  })
  .strict();

export const StumpSchema = z
  .object({
    feature: z.number().int().nonnegative(),
    threshold: z.number(),
    left: z.number(),
    right: z.number(),
    gain: z.number(),
  })
  .strict();

export const TreeModelSchema = z
  .object({
    type: z.literal('gbtree'),
    base_score: z.number(),
    stumps: z.array(StumpSchema),
  })
  .strict();

export const ModelParametersSchema = z.discriminatedUnion('type', [LinearModelSchema, TreeModelSchema]);

export const ArtifactSchema = z
  .object({
    schema_version: z.literal('1'),
    model_name: z.string().min(1),
    objective: z.literal('binary:logistic'),
    feature_names: z.array(z.string().min(1)).min(1),
    target_column: z.string().min(1),
    positive_label: z.string(),
    negative_label: z.string().min(1),
    feature_encoders: z.record(z.array(z.string())),
    imputation: z.array(z.number()),
    model: ModelParametersSchema,
    best_iteration: z.number().int().nonnegative(),
    training_config: z.record(z.union([z.string(), z.number(), z.boolean()])),
    created_at: z.string().min(1),
  })
  .strict()
  .refine(
    (artifact) =>
      artifact.imputation.length === artifact.feature_names.length &&
      (artifact.model.type !== 'gblinear' || artifact.model.weights.length === artifact.feature_names.length),
    { message: 'artifact parameter lengths do not match feature_names' }
  );

export type LinearModel = z.infer<typeof LinearModelSchema>;
export type Stump = z.infer<typeof StumpSchema>;
export type TreeModel = z.infer<typeof TreeModelSchema>;
export type ModelParameters = z.infer<typeof ModelParametersSchema>;
export type ModelArtifact = z.infer<typeof ArtifactSchema>;

/**
 * Hyperparameters accepted by the built-in trainers
 */
export interface Hyperparameters {
  booster: BoosterType;
  objective: 'binary:logistic';
  eval_metrics: string[];
  device: 'cpu';
  num_boost_round: number;
  learning_rate: number;
  l2_regularization: number;
  early_stopping_rounds?: number;
  validation_fraction: number;
  random_seed: number;
}
