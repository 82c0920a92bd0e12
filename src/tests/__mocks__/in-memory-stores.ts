/**
 * In-process stand-ins for the DynamoDB-backed services, behind the same interfaces.
 * Each compare-and-swap runs without an await between check and write, so it is atomic
 * with respect to concurrent callers in the same test.
 */

import type { ILedgerService, LedgerEntry } from '../../types/LedgerTypes';
import type {
  AliasBinding,
  AliasRemoveInput,
  AliasWriteInput,
  IModelRegistry,
  ModelVersion,
  RegisteredModel,
  RegisterOptions,
} from '../../types/RegistryTypes';
import type { EvaluationMetricSet, GateDecision, IGateDecisionStore } from '../../types/EvaluationTypes';
import type { IExperimentTracker, MetricPoint, RunRecord, RunStatus, StartRunInput } from '../../types/RunTypes';
import type { ModelArtifact } from '../../types/ModelArtifactTypes';
import {
  AliasNotFoundError,
  ArtifactMissingError,
  ArtifactNotFoundError,
  RegistryConflictError,
  RunClosedError,
  RunNotFoundError,
  VersionInUseError,
  VersionNotFoundError,
} from '../../types/ModelGateErrors';

export function createMockLedger(): jest.Mocked<ILedgerService> {
  return {
    append: jest.fn(async (entry: Omit<LedgerEntry, 'entryId' | 'timestamp'>): Promise<LedgerEntry> => ({
      ...entry,
      entryId: `entry-${entry.eventType}`,
      timestamp: '2026-01-01T00:00:00.000Z',
    })),
    query: jest.fn().mockResolvedValue([]),
  };
}

export class InMemoryExperimentTracker implements IExperimentTracker {
  readonly runs = new Map<string, RunRecord>();
  readonly artifacts = new Map<string, ModelArtifact>();
  readonly history = new Map<string, MetricPoint[]>();
  private counter = 0;

  async startRun(input: StartRunInput): Promise<RunRecord> {
    this.counter++;
    const run: RunRecord = {
      run_id: `run-${this.counter}`,
      experiment_name: input.experimentName,
      ...(input.runName ? { run_name: input.runName } : {}),
      status: 'RUNNING',
      params: {},
      metrics: {},
      tags: input.tags ?? {},
      created_at: '2026-01-01T00:00:00.000Z',
    };
    this.runs.set(run.run_id, run);
    return run;
  }

  async logParams(runId: string, params: Record<string, string>): Promise<void> {
    const run = this.requireRunning(runId);
    run.params = { ...run.params, ...params };
  }

  async logMetrics(runId: string, metrics: Record<string, number>): Promise<void> {
    const run = this.requireRunning(runId);
    run.metrics = { ...run.metrics, ...metrics };
  }

  async logMetricHistory(runId: string, points: MetricPoint[]): Promise<void> {
    this.requireRunning(runId);
    this.history.set(runId, [...(this.history.get(runId) ?? []), ...points]);
  }

  async setTags(runId: string, tags: Record<string, string>): Promise<void> {
    const run = this.requireRunning(runId);
    run.tags = { ...run.tags, ...tags };
  }

  async logModel(runId: string, artifact: ModelArtifact): Promise<string> {
    const run = this.requireRunning(runId);
    const uri = `s3://test-bucket/runs/${runId}/model.json`;
    this.artifacts.set(uri, artifact);
    run.artifact_uri = uri;
    return uri;
  }

  async endRun(runId: string, status: Exclude<RunStatus, 'RUNNING'>, failureReason?: string): Promise<void> {
    const run = this.requireRunning(runId);
    if (status === 'FAILED' && run.artifact_uri) {
      this.artifacts.delete(run.artifact_uri);
      delete run.artifact_uri;
    }
    run.status = status;
    run.ended_at = '2026-01-01T00:05:00.000Z';
    if (failureReason) {
      run.failure_reason = failureReason;
    }
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    return this.runs.get(runId) ?? null;
  }

  async getMetricHistory(runId: string, key: string): Promise<MetricPoint[]> {
    return (this.history.get(runId) ?? []).filter((p) => p.key === key).sort((a, b) => a.step - b.step);
  }

  async loadModel(runId: string): Promise<ModelArtifact> {
    const run = this.runs.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    const artifact = run.artifact_uri ? this.artifacts.get(run.artifact_uri) : undefined;
    if (!artifact) {
      throw new ArtifactNotFoundError(runId);
    }
    return artifact;
  }

  /** Seed a FINISHED run holding the given artifact */
  addFinishedRun(runId: string, artifact: ModelArtifact): RunRecord {
    const uri = `s3://test-bucket/runs/${runId}/model.json`;
    const run: RunRecord = {
      run_id: runId,
      experiment_name: 'test-experiment',
      status: 'FINISHED',
      params: {},
      metrics: {},
      tags: {},
      artifact_uri: uri,
      created_at: '2026-01-01T00:00:00.000Z',
      ended_at: '2026-01-01T00:05:00.000Z',
    };
    this.runs.set(runId, run);
    this.artifacts.set(uri, artifact);
    return run;
  }

  private requireRunning(runId: string): RunRecord {
    const run = this.runs.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    if (run.status !== 'RUNNING') {
      throw new RunClosedError(runId, run.status);
    }
    return run;
  }
}

export class InMemoryGateDecisionStore implements IGateDecisionStore {
  readonly evaluations = new Map<string, EvaluationMetricSet>();
  readonly decisions: GateDecision[] = [];

  async saveEvaluation(evaluation: EvaluationMetricSet): Promise<EvaluationMetricSet> {
    const key = `${evaluation.run_id}#${evaluation.dataset_digest}`;
    const existing = this.evaluations.get(key);
    if (existing) {
      return existing;
    }
    this.evaluations.set(key, evaluation);
    return evaluation;
  }

  async getEvaluation(runId: string, datasetDigest: string): Promise<EvaluationMetricSet | null> {
    return this.evaluations.get(`${runId}#${datasetDigest}`) ?? null;
  }

  async saveDecision(decision: GateDecision): Promise<void> {
    this.decisions.push(decision);
  }

  async getLatestDecision(runId: string, policyFingerprint: string): Promise<GateDecision | null> {
    const matching = this.decisions.filter(
      (d) => d.run_id === runId && d.policy_fingerprint === policyFingerprint
    );
    return matching[matching.length - 1] ?? null;
  }

  async listDecisions(runId: string): Promise<GateDecision[]> {
    return this.decisions.filter((d) => d.run_id === runId).reverse();
  }
}

interface StoredModel {
  header: RegisteredModel;
  versions: Map<number, Omit<ModelVersion, 'aliases'>>;
  claims: Map<string, number>;
  aliases: Map<string, AliasBinding>;
}

export class InMemoryModelRegistry implements IModelRegistry {
  private models = new Map<string, StoredModel>();

  constructor(private runs: Pick<IExperimentTracker, 'getRun'>) {}

  async register(
    runId: string,
    modelName: string,
    description: string,
    options: RegisterOptions = {}
  ): Promise<ModelVersion> {
    const run = await this.runs.getRun(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    if (run.status !== 'FINISHED' || !run.artifact_uri) {
      throw new ArtifactMissingError(runId, run.status);
    }

    const model = this.models.get(modelName) ?? {
      header: { model_name: modelName, latest_version: 0, created_at: '2026-01-01T00:00:00.000Z' },
      versions: new Map(),
      claims: new Map(),
      aliases: new Map(),
    };
    this.models.set(modelName, model);

    const claimed = model.claims.get(runId);
    if (claimed !== undefined && !options.allowReregister) {
      return this.getVersionInfo(modelName, claimed);
    }

    model.header.latest_version++;
    const version = model.header.latest_version;
    const stored = {
      model_name: modelName,
      version,
      run_id: runId,
      artifact_uri: run.artifact_uri,
      description,
      created_at: '2026-01-01T00:10:00.000Z',
    };
    model.versions.set(version, stored);
    model.claims.set(runId, version);
    return { ...stored, aliases: [] };
  }

  async listModels(): Promise<RegisteredModel[]> {
    return [...this.models.values()].map((m) => ({ ...m.header }));
  }

  async getModel(modelName: string): Promise<RegisteredModel | null> {
    const model = this.models.get(modelName);
    return model ? { ...model.header } : null;
  }

  async listVersions(modelName: string): Promise<ModelVersion[]> {
    const model = this.models.get(modelName);
    if (!model) return [];
    return [...model.versions.keys()].sort((a, b) => a - b).map((v) => this.view(model, v));
  }

  async getVersionInfo(modelName: string, version: number): Promise<ModelVersion> {
    const model = this.models.get(modelName);
    if (!model || !model.versions.has(version)) {
      throw new VersionNotFoundError(modelName, version);
    }
    return this.view(model, version);
  }

  async updateDescription(modelName: string, version: number, description: string): Promise<ModelVersion> {
    const model = this.models.get(modelName);
    const stored = model?.versions.get(version);
    if (!model || !stored) {
      throw new VersionNotFoundError(modelName, version);
    }
    stored.description = description;
    stored.updated_at = '2026-01-01T00:20:00.000Z';
    return this.view(model, version);
  }

  async deleteVersion(modelName: string, version: number): Promise<void> {
    const info = await this.getVersionInfo(modelName, version);
    if (info.aliases.length > 0) {
      throw new VersionInUseError(modelName, version, info.aliases);
    }
    const model = this.models.get(modelName);
    model?.versions.delete(version);
    if (model?.claims.get(info.run_id) === version) {
      model.claims.delete(info.run_id);
    }
  }

  async getAlias(modelName: string, alias: string): Promise<AliasBinding | null> {
    const binding = this.models.get(modelName)?.aliases.get(alias);
    return binding ? { ...binding } : null;
  }

  async listAliases(modelName: string): Promise<AliasBinding[]> {
    return [...(this.models.get(modelName)?.aliases.values() ?? [])].map((b) => ({ ...b }));
  }

  async compareAndSetAlias(input: AliasWriteInput): Promise<AliasBinding> {
    const model = this.models.get(input.modelName);
    if (!model || !model.versions.has(input.version)) {
      throw new VersionNotFoundError(input.modelName, input.version);
    }
    const current = model.aliases.get(input.alias);
    const matches =
      input.expected.state === 'unbound'
        ? current === undefined
        : current !== undefined && current.version === input.expected.version;
    if (!matches) {
      throw new RegistryConflictError(`Alias '${input.alias}' of ${input.modelName} was changed concurrently`);
    }

    const binding: AliasBinding = {
      model_name: input.modelName,
      alias: input.alias,
      version: input.version,
      mode: input.mode,
      updated_at: '2026-01-01T00:30:00.000Z',
      updated_by: input.actor,
      ...(current ? { previous_version: current.version } : {}),
      ...(input.decisionId ? { decision_id: input.decisionId } : {}),
      ...(input.auditReason ? { audit_reason: input.auditReason } : {}),
    };
    model.aliases.set(input.alias, binding);
    return { ...binding };
  }

  async deleteAlias(input: AliasRemoveInput): Promise<void> {
    const model = this.models.get(input.modelName);
    const current = model?.aliases.get(input.alias);
    if (!model || !current) {
      throw new AliasNotFoundError(input.modelName, input.alias);
    }
    if (current.version !== input.expectedVersion) {
      throw new RegistryConflictError(`Alias '${input.alias}' now binds v${current.version}`);
    }
    model.aliases.delete(input.alias);
  }

  private view(model: StoredModel, version: number): ModelVersion {
    const stored = model.versions.get(version);
    if (!stored) {
      throw new VersionNotFoundError(model.header.model_name, version);
    }
    const aliases = [...model.aliases.values()]
      .filter((b) => b.version === version)
      .map((b) => b.alias)
      .sort();
    return { ...stored, aliases };
  }
}
