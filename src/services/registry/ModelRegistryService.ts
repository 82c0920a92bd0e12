import {
  DynamoDBDocumentClient,
  GetCommand,
  UpdateCommand,
  TransactWriteCommand,
  TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import {
  AliasBinding,
  AliasRemoveInput,
  AliasWriteInput,
  IModelRegistry,
  ModelVersion,
  RegisteredModel,
  RegisterOptions,
} from '../../types/RegistryTypes';
import type { IRunReader } from '../../types/RunTypes';
import {
  AliasNotFoundError,
  ArtifactMissingError,
  ConfigError,
  RegistryConflictError,
  RunNotFoundError,
  VersionInUseError,
  VersionNotFoundError,
} from '../../types/ModelGateErrors';
import { ILedgerService, LedgerEventType } from '../../types/LedgerTypes';
import { Logger } from '../core/Logger';
import {
  errorMessage,
  isConditionalCheckFailed,
  isTransactionCanceled,
  transactionCancellationCodes,
} from '../../utils/aws-errors';
import { queryAll } from '../../utils/dynamo-query';

const MODELS_PK = 'MODELS';
const CONDITION_FAILED = 'ConditionalCheckFailed';

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

const RegisteredModelSchema = z.object({
  model_name: z.string(),
  latest_version: z.number().int().nonnegative(),
  created_at: z.string(),
});

const VersionItemSchema = z.object({
  model_name: z.string(),
  version: z.number().int().positive(),
  run_id: z.string(),
  artifact_uri: z.string(),
  description: z.string(),
  created_at: z.string(),
  updated_at: z.string().optional(),
  bound_aliases: z.set(z.string()).optional(),
});

const ClaimItemSchema = z.object({
  version: z.number().int().positive(),
});

const AliasBindingSchema = z.object({
  model_name: z.string(),
  alias: z.string(),
  version: z.number().int().positive(),
  mode: z.enum(['ASSIGNED', 'GATED', 'OVERRIDE']),
  updated_at: z.string(),
  updated_by: z.string(),
  previous_version: z.number().int().positive().optional(),
  decision_id: z.string().optional(),
  audit_reason: z.string().optional(),
});

function modelPk(modelName: string): string {
  return `MODEL#${modelName}`;
}

function versionSk(version: number): string {
  return `VERSION#${String(version).padStart(10, '0')}`;
}

function claimSk(runId: string): string {
  return `RUN#${runId}`;
}

function aliasSk(alias: string): string {
  return `ALIAS#${alias}`;
}

function toModelVersion(item: Record<string, unknown>): ModelVersion {
  const { bound_aliases, ...fields } = VersionItemSchema.parse(item);
  return { ...fields, aliases: [...(bound_aliases ?? [])].sort() };
}

function requireIdentifier(name: string, value: string): void {
  if (!value || !value.trim()) {
    throw new ConfigError(`${name} is required`);
  }
}

/**
 * ModelRegistryService - registered models, versions and alias bindings
 *
 * Table layout (pk / sk):
 *   MODELS / MODEL#<name>                  model header, latest_version allocation counter
 *   MODEL#<name> / VERSION#<0000000001>    model version (bound_aliases string set)
 *   MODEL#<name> / RUN#<runId>             registration claim: run → version
 *   MODEL#<name> / ALIAS#<alias>           alias binding
 *
 * Alias writes are single transactions: the conditional alias write and the bound_aliases
 * bookkeeping on both versions commit together or not at all.
 */
export class ModelRegistryService implements IModelRegistry {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tableName: string,
    private runReader: IRunReader,
    private ledgerService: ILedgerService,
    private logger: Logger,
    private actor: string = 'model-gate'
  ) {}

  /**
   * Register a finished run as a new version. A run already registered under the same
   * name returns its existing version unless re-registration is requested.
   */
  async register(
    runId: string,
    modelName: string,
    description: string,
    options: RegisterOptions = {}
  ): Promise<ModelVersion> {
    requireIdentifier('run id', runId);
    requireIdentifier('model name', modelName);

    const run = await this.runReader.getRun(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    if (run.status !== 'FINISHED' || !run.artifact_uri) {
      throw new ArtifactMissingError(runId, run.status);
    }

    if (!options.allowReregister) {
      const existing = await this.getRegisteredVersion(modelName, runId);
      if (existing) {
        this.logger.info('Run already registered; returning existing version', {
          runId,
          modelName,
          version: existing.version,
        });
        return existing;
      }
    }

    const version = await this.allocateVersion(modelName);
    const now = new Date().toISOString();
    const versionFields = {
      model_name: modelName,
      version,
      run_id: runId,
      artifact_uri: run.artifact_uri,
      description,
      created_at: now,
    };

    try {
      await this.dynamoClient.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Put: {
                TableName: this.tableName,
                Item: { pk: modelPk(modelName), sk: versionSk(version), ...versionFields },
                ConditionExpression: 'attribute_not_exists(pk)',
              },
            },
            {
              Put: {
                TableName: this.tableName,
                Item: { pk: modelPk(modelName), sk: claimSk(runId), run_id: runId, version },
                ...(options.allowReregister ? {} : { ConditionExpression: 'attribute_not_exists(pk)' }),
              },
            },
          ],
        })
      );
    } catch (error) {
      // The allocated number stays consumed
      if (isTransactionCanceled(error)) {
        this.logger.warn('Registration lost a race', { runId, modelName, version });
        throw new RegistryConflictError(
          `Run ${runId} was registered under ${modelName} concurrently; version ${version} was not used`
        );
      }
      this.logger.error('Failed to register model version', { runId, modelName, version, error: errorMessage(error) });
      throw error;
    }

    await this.ledgerService.append({
      subjectType: 'MODEL',
      subjectId: modelName,
      eventType: LedgerEventType.MODEL_VERSION_REGISTERED,
      actor: this.actor,
      data: { version, run_id: runId, artifact_uri: run.artifact_uri },
    });

    this.logger.info('Model version registered', { runId, modelName, version });
    return { ...versionFields, aliases: [] };
  }

  async listModels(): Promise<RegisteredModel[]> {
    const items = await queryAll(this.dynamoClient, {
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': MODELS_PK },
    });
    return items.map((item) => RegisteredModelSchema.parse(item));
  }

  async getModel(modelName: string): Promise<RegisteredModel | null> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: MODELS_PK, sk: modelPk(modelName) },
      })
    );
    return result.Item ? RegisteredModelSchema.parse(result.Item) : null;
  }

  /**
   * All versions of a model, ascending
   */
  async listVersions(modelName: string): Promise<ModelVersion[]> {
    const items = await queryAll(this.dynamoClient, {
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      ExpressionAttributeValues: { ':pk': modelPk(modelName), ':prefix': 'VERSION#' },
    });
    return items.map(toModelVersion).sort((a, b) => a.version - b.version);
  }

  async getVersionInfo(modelName: string, version: number): Promise<ModelVersion> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: modelPk(modelName), sk: versionSk(version) },
      })
    );
    if (!result.Item) {
      throw new VersionNotFoundError(modelName, version);
    }
    return toModelVersion(result.Item);
  }

  async updateDescription(modelName: string, version: number, description: string): Promise<ModelVersion> {
    let updated: ModelVersion;
    try {
      const result = await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { pk: modelPk(modelName), sk: versionSk(version) },
          UpdateExpression: 'SET description = :description, updated_at = :now',
          ConditionExpression: 'attribute_exists(pk)',
          ExpressionAttributeValues: { ':description': description, ':now': new Date().toISOString() },
          ReturnValues: 'ALL_NEW',
        })
      );
      updated = toModelVersion(result.Attributes ?? {});
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new VersionNotFoundError(modelName, version);
      }
      throw error;
    }

    await this.ledgerService.append({
      subjectType: 'MODEL',
      subjectId: modelName,
      eventType: LedgerEventType.MODEL_VERSION_DESCRIBED,
      actor: this.actor,
      data: { version, description },
    });

    this.logger.info('Model version description updated', { modelName, version });
    return updated;
  }

  /**
   * Delete a version that no alias binds. The version number is never reused.
   */
  async deleteVersion(modelName: string, version: number): Promise<void> {
    const existing = await this.getVersionInfo(modelName, version);
    if (existing.aliases.length > 0) {
      throw new VersionInUseError(modelName, version, existing.aliases);
    }

    const claim = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: modelPk(modelName), sk: claimSk(existing.run_id) },
      })
    );
    const claimPointsHere = claim.Item !== undefined && ClaimItemSchema.parse(claim.Item).version === version;

    const transactItems: TransactItem[] = [
      {
        Delete: {
          TableName: this.tableName,
          Key: { pk: modelPk(modelName), sk: versionSk(version) },
          ConditionExpression: 'attribute_exists(pk) AND attribute_not_exists(bound_aliases)',
        },
      },
    ];
    if (claimPointsHere) {
      transactItems.push({
        Delete: {
          TableName: this.tableName,
          Key: { pk: modelPk(modelName), sk: claimSk(existing.run_id) },
          ConditionExpression: '#version = :version',
          ExpressionAttributeNames: { '#version': 'version' },
          ExpressionAttributeValues: { ':version': version },
        },
      });
    }

    try {
      await this.dynamoClient.send(new TransactWriteCommand({ TransactItems: transactItems }));
    } catch (error) {
      if (!isTransactionCanceled(error)) {
        throw error;
      }
      if (transactionCancellationCodes(error)[0] === CONDITION_FAILED) {
        // An alias was bound, or the version deleted, after our read
        const current = await this.getVersionInfo(modelName, version);
        throw new VersionInUseError(modelName, version, current.aliases);
      }
      throw new RegistryConflictError(`Registration claim for ${modelName} v${version} changed concurrently`);
    }

    await this.ledgerService.append({
      subjectType: 'MODEL',
      subjectId: modelName,
      eventType: LedgerEventType.MODEL_VERSION_DELETED,
      actor: this.actor,
      data: { version, run_id: existing.run_id },
    });

    this.logger.info('Model version deleted', { modelName, version });
  }

  async getAlias(modelName: string, alias: string): Promise<AliasBinding | null> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: modelPk(modelName), sk: aliasSk(alias) },
        ConsistentRead: true,
      })
    );
    return result.Item ? AliasBindingSchema.parse(result.Item) : null;
  }

  async listAliases(modelName: string): Promise<AliasBinding[]> {
    const items = await queryAll(this.dynamoClient, {
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      ExpressionAttributeValues: { ':pk': modelPk(modelName), ':prefix': 'ALIAS#' },
    });
    return items.map((item) => AliasBindingSchema.parse(item));
  }

  /**
   * Bind an alias to a version iff the alias is in the expected state
   */
  async compareAndSetAlias(input: AliasWriteInput): Promise<AliasBinding> {
    const { modelName, alias, version, expected } = input;
    const now = new Date().toISOString();
    const previousVersion = expected.state === 'bound' ? expected.version : undefined;

    const binding: AliasBinding = {
      model_name: modelName,
      alias,
      version,
      mode: input.mode,
      updated_at: now,
      updated_by: input.actor,
      ...(previousVersion !== undefined ? { previous_version: previousVersion } : {}),
      ...(input.decisionId ? { decision_id: input.decisionId } : {}),
      ...(input.auditReason ? { audit_reason: input.auditReason } : {}),
    };

    const aliasSet = new Set([alias]);
    const transactItems: TransactItem[] = [
      {
        Put: {
          TableName: this.tableName,
          Item: { pk: modelPk(modelName), sk: aliasSk(alias), ...binding },
          ConditionExpression:
            expected.state === 'unbound' ? 'attribute_not_exists(pk)' : 'attribute_exists(pk) AND #version = :expected',
          ...(expected.state === 'bound'
            ? {
                ExpressionAttributeNames: { '#version': 'version' },
                ExpressionAttributeValues: { ':expected': expected.version },
              }
            : {}),
        },
      },
      {
        Update: {
          TableName: this.tableName,
          Key: { pk: modelPk(modelName), sk: versionSk(version) },
          UpdateExpression: 'ADD bound_aliases :alias',
          ConditionExpression: 'attribute_exists(pk)',
          ExpressionAttributeValues: { ':alias': aliasSet },
        },
      },
    ];
    if (previousVersion !== undefined && previousVersion !== version) {
      transactItems.push({
        Update: {
          TableName: this.tableName,
          Key: { pk: modelPk(modelName), sk: versionSk(previousVersion) },
          UpdateExpression: 'DELETE bound_aliases :alias',
          ConditionExpression: 'attribute_exists(pk)',
          ExpressionAttributeValues: { ':alias': aliasSet },
        },
      });
    }

    try {
      await this.dynamoClient.send(new TransactWriteCommand({ TransactItems: transactItems }));
    } catch (error) {
      if (!isTransactionCanceled(error)) {
        this.logger.error('Failed to write alias', { modelName, alias, version, error: errorMessage(error) });
        throw error;
      }
      const codes = transactionCancellationCodes(error);
      if (codes[1] === CONDITION_FAILED && codes[0] !== CONDITION_FAILED) {
        throw new VersionNotFoundError(modelName, version);
      }
      throw new RegistryConflictError(
        `Alias '${alias}' of ${modelName} was changed concurrently (expected ${
          expected.state === 'unbound' ? 'unbound' : `v${expected.version}`
        }); re-read and retry`
      );
    }

    this.logger.info('Alias bound', { modelName, alias, version, previousVersion, mode: input.mode });
    return binding;
  }

  /**
   * Unbind an alias iff it still binds the expected version
   */
  async deleteAlias(input: AliasRemoveInput): Promise<void> {
    const { modelName, alias, expectedVersion } = input;
    try {
      await this.dynamoClient.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Delete: {
                TableName: this.tableName,
                Key: { pk: modelPk(modelName), sk: aliasSk(alias) },
                ConditionExpression: '#version = :expected',
                ExpressionAttributeNames: { '#version': 'version' },
                ExpressionAttributeValues: { ':expected': expectedVersion },
              },
            },
            {
              Update: {
                TableName: this.tableName,
                Key: { pk: modelPk(modelName), sk: versionSk(expectedVersion) },
                UpdateExpression: 'DELETE bound_aliases :alias',
                ConditionExpression: 'attribute_exists(pk)',
                ExpressionAttributeValues: { ':alias': new Set([alias]) },
              },
            },
          ],
        })
      );
    } catch (error) {
      if (!isTransactionCanceled(error)) {
        throw error;
      }
      const current = await this.getAlias(modelName, alias);
      if (!current) {
        throw new AliasNotFoundError(modelName, alias);
      }
      throw new RegistryConflictError(
        `Alias '${alias}' of ${modelName} now binds v${current.version}, not v${expectedVersion}`
      );
    }

    this.logger.info('Alias removed', { modelName, alias, version: expectedVersion });
  }

  private async getRegisteredVersion(modelName: string, runId: string): Promise<ModelVersion | null> {
    const claim = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: modelPk(modelName), sk: claimSk(runId) },
      })
    );
    if (!claim.Item) {
      return null;
    }
    return this.getVersionInfo(modelName, ClaimItemSchema.parse(claim.Item).version);
  }

  /**
   * Atomically take the next version number; a number once taken is never handed out again
   */
  private async allocateVersion(modelName: string): Promise<number> {
    const result = await this.dynamoClient.send(
      new UpdateCommand({
        TableName: this.tableName,
        Key: { pk: MODELS_PK, sk: modelPk(modelName) },
        UpdateExpression:
          'SET latest_version = if_not_exists(latest_version, :zero) + :one, ' +
          'model_name = :name, created_at = if_not_exists(created_at, :now)',
        ExpressionAttributeValues: {
          ':zero': 0,
          ':one': 1,
          ':name': modelName,
          ':now': new Date().toISOString(),
        },
        ReturnValues: 'UPDATED_NEW',
      })
    );
    return z.number().int().positive().parse(result.Attributes?.latest_version);
  }
}
