/**
 * Experiment tracking types: runs, metric history and the tracker contract.
 */

import { z } from 'zod';
import type { ModelArtifact } from './ModelArtifactTypes';

export type RunStatus = 'RUNNING' | 'FINISHED' | 'FAILED';

export const RunRecordSchema = z.object({
  run_id: z.string().min(1),
  experiment_name: z.string().min(1),
  run_name: z.string().optional(),
  status: z.enum(['RUNNING', 'FINISHED', 'FAILED']),
  params: z.record(z.string()),
  metrics: z.record(z.number()),
  tags: z.record(z.string()),
  artifact_uri: z.string().optional(),
  created_at: z.string(),
  ended_at: z.string().optional(),
  failure_reason: z.string().optional(),
});

export type RunRecord = z.infer<typeof RunRecordSchema>;

/** One per-iteration metric value logged during training. */
export interface MetricPoint {
  key: string;
  value: number;
  step: number;
}

export interface StartRunInput {
  experimentName: string;
  runName?: string;
  tags?: Record<string, string>;
}

/**
 * Experiment tracker contract consumed by the training runner and the evaluator.
 * Writes are only accepted while the run is RUNNING; a closed run is immutable.
 */
export interface IExperimentTracker {
  startRun(input: StartRunInput): Promise<RunRecord>;
  logParams(runId: string, params: Record<string, string>): Promise<void>;
  logMetrics(runId: string, metrics: Record<string, number>): Promise<void>;
  logMetricHistory(runId: string, points: MetricPoint[]): Promise<void>;
  setTags(runId: string, tags: Record<string, string>): Promise<void>;
  /** Store the model artifact for the run; returns its URI. */
  logModel(runId: string, artifact: ModelArtifact): Promise<string>;
  /** Close the run. A FAILED run has its partial artifact discarded. */
  endRun(runId: string, status: Exclude<RunStatus, 'RUNNING'>, failureReason?: string): Promise<void>;
  getRun(runId: string): Promise<RunRecord | null>;
  getMetricHistory(runId: string, key: string): Promise<MetricPoint[]>;
  /** Load and validate the artifact of a finished run (RunNotFound / ArtifactNotFound). */
  loadModel(runId: string): Promise<ModelArtifact>;
}

/** Read-only view of runs used by the registry. */
export type IRunReader = Pick<IExperimentTracker, 'getRun'>;
