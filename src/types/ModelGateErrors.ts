/**
 * Model Gate Errors - typed errors for CLI exit codes and caller retry decisions
 *
 * Each error carries an error_class, an error_code and a retryable flag. Gate failures
 * (threshold violations, baseline regressions) are not errors: they are GateReason entries
 * on a stored GateDecision.
 */

export type ModelGateErrorClass =
  | 'CONFIG'
  | 'REFERENCE'
  | 'EVALUATION'
  | 'CONFLICT'
  | 'GATE'
  | 'TRAINING';

/**
 * Base error for every failure the pipeline reports deliberately
 */
export class ModelGateError extends Error {
  constructor(
    message: string,
    public readonly error_class: ModelGateErrorClass,
    public readonly error_code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Configuration errors (fatal, no retry)
 */
export class ConfigError extends ModelGateError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message,
      'CONFIG',
      'CONFIG_INVALID',
      false
    );
  }
}

/**
 * Referential integrity errors (surfaced to caller, not retried)
 */
export class RunNotFoundError extends ModelGateError {
  constructor(runId: string) {
    super(`Run not found: ${runId}`, 'REFERENCE', 'RUN_NOT_FOUND', false);
  }
}

export class ArtifactNotFoundError extends ModelGateError {
  constructor(runId: string, detail?: string) {
    super(
      detail ? `Model artifact not found for run ${runId}: ${detail}` : `Model artifact not found for run ${runId}`,
      'REFERENCE',
      'ARTIFACT_NOT_FOUND',
      false
    );
  }
}

export class ArtifactMissingError extends ModelGateError {
  constructor(runId: string, status: string) {
    super(
      `Run ${runId} has no completed artifact (status: ${status}); only finished runs can be registered`,
      'REFERENCE',
      'ARTIFACT_MISSING',
      false
    );
  }
}

export class ModelNotFoundError extends ModelGateError {
  constructor(modelName: string) {
    super(`Registered model not found: ${modelName}`, 'REFERENCE', 'MODEL_NOT_FOUND', false);
  }
}

export class VersionNotFoundError extends ModelGateError {
  constructor(modelName: string, version: number) {
    super(`Model version not found: ${modelName} v${version}`, 'REFERENCE', 'VERSION_NOT_FOUND', false);
  }
}

export class AliasNotFoundError extends ModelGateError {
  constructor(modelName: string, alias: string) {
    super(`Alias not bound: ${modelName}@${alias}`, 'REFERENCE', 'ALIAS_NOT_FOUND', false);
  }
}

/**
 * Write to a run that is no longer RUNNING (closed runs are immutable)
 */
export class RunClosedError extends ModelGateError {
  constructor(runId: string, status: string) {
    super(`Run ${runId} is ${status}; a closed run cannot be modified`, 'CONFLICT', 'RUN_CLOSED', false);
  }
}

/**
 * Evaluation errors (fatal to that evaluation)
 */
export class MetricComputationError extends ModelGateError {
  constructor(message: string) {
    super(message, 'EVALUATION', 'METRIC_COMPUTATION_FAILED', false);
  }
}

/**
 * Concurrent registration/promotion lost the race (safe to retry)
 */
export class RegistryConflictError extends ModelGateError {
  constructor(message: string) {
    super(message, 'CONFLICT', 'REGISTRY_CONFLICT', true);
  }
}

/**
 * Deletion blocked by an active alias
 */
export class VersionInUseError extends ModelGateError {
  constructor(
    modelName: string,
    version: number,
    public readonly aliases: string[]
  ) {
    super(
      `Model version ${modelName} v${version} is bound by alias(es) ${aliases.map((a) => `'${a}'`).join(', ')}; ` +
        'reassign or remove them before deleting',
      'CONFLICT',
      'VERSION_IN_USE',
      false
    );
  }
}

/**
 * Promotion refused by the gate (no passing decision and no override)
 */
export class PromotionRejectedError extends ModelGateError {
  constructor(
    modelName: string,
    version: number,
    alias: string,
    public readonly reasons: string[]
  ) {
    super(
      `Promotion of ${modelName} v${version} to '${alias}' rejected: ${reasons.join('; ')}`,
      'GATE',
      'PROMOTION_REJECTED',
      false
    );
  }
}

/**
 * Training did not produce an artifact
 */
export class TrainingFailedError extends ModelGateError {
  constructor(message: string, originalError?: Error) {
    super(message, 'TRAINING', 'TRAINING_FAILED', false);
    if (originalError) {
      this.cause = originalError;
    }
  }
}
