/**
 * Model registry types: registered models, versions, aliases.
 *
 * Version numbers are unique per model name, strictly increasing and never reused
 * (not necessarily contiguous). An alias binds at most one version at a time.
 */

export interface RegisteredModel {
  model_name: string;
  /** Highest version number allocated so far (including failed allocations). */
  latest_version: number;
  created_at: string;
}

export interface ModelVersion {
  model_name: string;
  version: number;
  run_id: string;
  artifact_uri: string;
  description: string;
  created_at: string;
  updated_at?: string;
  /** Aliases currently bound to this version, sorted. */
  aliases: string[];
}

/** How the current binding was made. */
export type AliasBindingMode = 'ASSIGNED' | 'GATED' | 'OVERRIDE';

export interface AliasBinding {
  model_name: string;
  alias: string;
  version: number;
  mode: AliasBindingMode;
  updated_at: string;
  updated_by: string;
  previous_version?: number;
  decision_id?: string;
  audit_reason?: string;
}

/**
 * Expected prior state for a compare-and-swap on an alias.
 */
export type AliasExpectation = { state: 'unbound' } | { state: 'bound'; version: number };

export interface AliasWriteInput {
  modelName: string;
  alias: string;
  version: number;
  expected: AliasExpectation;
  mode: AliasBindingMode;
  actor: string;
  decisionId?: string;
  auditReason?: string;
}

export interface AliasRemoveInput {
  modelName: string;
  alias: string;
  expectedVersion: number;
}

export interface RegisterOptions {
  /** Create a new version even if this run is already registered under the model name. */
  allowReregister?: boolean;
}

/**
 * Registry contract. Alias writes are single atomic conditional updates;
 * reads are snapshots and hold no locks.
 */
export interface IModelRegistry {
  register(runId: string, modelName: string, description: string, options?: RegisterOptions): Promise<ModelVersion>;
  listModels(): Promise<RegisteredModel[]>;
  getModel(modelName: string): Promise<RegisteredModel | null>;
  listVersions(modelName: string): Promise<ModelVersion[]>;
  getVersionInfo(modelName: string, version: number): Promise<ModelVersion>;
  updateDescription(modelName: string, version: number, description: string): Promise<ModelVersion>;
  deleteVersion(modelName: string, version: number): Promise<void>;
  getAlias(modelName: string, alias: string): Promise<AliasBinding | null>;
  listAliases(modelName: string): Promise<AliasBinding[]>;
  /** Fails with RegistryConflictError when the alias is not in the expected state. */
  compareAndSetAlias(input: AliasWriteInput): Promise<AliasBinding>;
  /** Fails with RegistryConflictError when the alias no longer binds expectedVersion. */
  deleteAlias(input: AliasRemoveInput): Promise<void>;
}
