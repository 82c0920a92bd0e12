import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
  BatchWriteCommand,
  BatchWriteCommandInput,
  BatchWriteCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import { v4 as uuidv4 } from 'uuid';
import {
  IExperimentTracker,
  MetricPoint,
  RunRecord,
  RunRecordSchema,
  RunStatus,
  StartRunInput,
} from '../../types/RunTypes';
import { ModelArtifact } from '../../types/ModelArtifactTypes';
import { ArtifactNotFoundError, RunClosedError, RunNotFoundError } from '../../types/ModelGateErrors';
import { ILedgerService, LedgerEventType } from '../../types/LedgerTypes';
import { Logger } from '../core/Logger';
import { ArtifactStore } from './ArtifactStore';
import { errorMessage, isConditionalCheckFailed } from '../../utils/aws-errors';
import { queryAll } from '../../utils/dynamo-query';

const RUN_SK = 'RUN';
const BATCH_SIZE = 25;
const MAX_BATCH_ATTEMPTS = 5;

export function runKey(runId: string): { pk: string; sk: string } {
  return { pk: `RUN#${runId}`, sk: RUN_SK };
}

function metricSortKey(key: string, step: number): string {
  return `METRIC#${key}#${String(step).padStart(8, '0')}`;
}

/**
 * ExperimentTrackerService - runs, parameters, metrics and artifacts
 *
 * Runs live in the runs table (RUN#<id> / RUN), per-iteration metrics beside them
 * (METRIC#<key>#<step>), artifacts in S3. Every write is conditional on the run
 * still being RUNNING.
 */
export class ExperimentTrackerService implements IExperimentTracker {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tableName: string,
    private artifactStore: ArtifactStore,
    private ledgerService: ILedgerService,
    private logger: Logger,
    private actor: string = 'model-gate'
  ) {}

  async startRun(input: StartRunInput): Promise<RunRecord> {
    const run: RunRecord = {
      run_id: uuidv4(),
      experiment_name: input.experimentName,
      ...(input.runName ? { run_name: input.runName } : {}),
      status: 'RUNNING',
      params: {},
      metrics: {},
      tags: input.tags ?? {},
      created_at: new Date().toISOString(),
    };

    await this.dynamoClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { ...runKey(run.run_id), ...run },
        ConditionExpression: 'attribute_not_exists(pk)',
      })
    );

    await this.ledgerService.append({
      subjectType: 'RUN',
      subjectId: run.run_id,
      eventType: LedgerEventType.RUN_STARTED,
      actor: this.actor,
      data: { experiment_name: run.experiment_name, run_name: run.run_name },
    });

    this.logger.info('Run started', { runId: run.run_id, experiment: run.experiment_name });
    return run;
  }

  async logParams(runId: string, params: Record<string, string>): Promise<void> {
    await this.updateMap(runId, 'params', params);
  }

  async logMetrics(runId: string, metrics: Record<string, number>): Promise<void> {
    await this.updateMap(runId, 'metrics', metrics);
  }

  async setTags(runId: string, tags: Record<string, string>): Promise<void> {
    await this.updateMap(runId, 'tags', tags);
  }

  async logMetricHistory(runId: string, points: MetricPoint[]): Promise<void> {
    await this.requireRunning(runId);

    for (let offset = 0; offset < points.length; offset += BATCH_SIZE) {
      const requests = points.slice(offset, offset + BATCH_SIZE).map((point) => ({
        PutRequest: {
          Item: {
            pk: runKey(runId).pk,
            sk: metricSortKey(point.key, point.step),
            key: point.key,
            value: point.value,
            step: point.step,
          },
        },
      }));
      await this.batchWrite(requests);
    }

    this.logger.debug('Metric history logged', { runId, points: points.length });
  }

  async logModel(runId: string, artifact: ModelArtifact): Promise<string> {
    await this.requireRunning(runId);
    const uri = await this.artifactStore.put(runId, artifact);

    try {
      await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: runKey(runId),
          UpdateExpression: 'SET artifact_uri = :uri',
          ConditionExpression: 'attribute_exists(pk) AND #status = :running',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: { ':uri': uri, ':running': 'RUNNING' },
        })
      );
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        // Closed underneath us; the object is unreferenced
        await this.artifactStore.delete(uri);
        throw await this.closedRunError(runId);
      }
      throw error;
    }

    this.logger.info('Model artifact logged', { runId, uri });
    return uri;
  }

  /**
   * Close the run. FAILED discards the partial artifact.
   */
  async endRun(runId: string, status: Exclude<RunStatus, 'RUNNING'>, failureReason?: string): Promise<void> {
    const run = await this.requireRunning(runId);

    if (status === 'FAILED' && run.artifact_uri) {
      await this.artifactStore.delete(run.artifact_uri);
    }

    const sets = ['#status = :status', 'ended_at = :endedAt'];
    const values: Record<string, string> = {
      ':status': status,
      ':endedAt': new Date().toISOString(),
      ':running': 'RUNNING',
    };
    if (failureReason) {
      sets.push('failure_reason = :reason');
      values[':reason'] = failureReason;
    }

    try {
      await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: runKey(runId),
          UpdateExpression: `SET ${sets.join(', ')}${status === 'FAILED' ? ' REMOVE artifact_uri' : ''}`,
          ConditionExpression: 'attribute_exists(pk) AND #status = :running',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: values,
        })
      );
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw await this.closedRunError(runId);
      }
      throw error;
    }

    await this.ledgerService.append({
      subjectType: 'RUN',
      subjectId: runId,
      eventType: status === 'FINISHED' ? LedgerEventType.RUN_FINISHED : LedgerEventType.RUN_FAILED,
      actor: this.actor,
      data: { failure_reason: failureReason },
    });

    if (status === 'FAILED') {
      this.logger.warn('Run failed', { runId, reason: failureReason });
    } else {
      this.logger.info('Run finished', { runId });
    }
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    try {
      const result = await this.dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: runKey(runId),
        })
      );
      if (!result.Item) {
        return null;
      }
      return RunRecordSchema.parse(result.Item);
    } catch (error) {
      this.logger.error('Failed to get run', { runId, error: errorMessage(error) });
      throw error;
    }
  }

  async getMetricHistory(runId: string, key: string): Promise<MetricPoint[]> {
    const items = await queryAll(this.dynamoClient, {
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      ExpressionAttributeValues: {
        ':pk': runKey(runId).pk,
        ':prefix': `METRIC#${key}#`,
      },
    });

    return items
      .map((item) => ({ key, value: Number(item.value), step: Number(item.step) }))
      .sort((a, b) => a.step - b.step);
  }

  async loadModel(runId: string): Promise<ModelArtifact> {
    const run = await this.getRun(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    if (!run.artifact_uri) {
      throw new ArtifactNotFoundError(runId, `run status is ${run.status}`);
    }
    return this.artifactStore.get(runId, run.artifact_uri);
  }

  private async requireRunning(runId: string): Promise<RunRecord> {
    const run = await this.getRun(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    if (run.status !== 'RUNNING') {
      throw new RunClosedError(runId, run.status);
    }
    return run;
  }

  private async closedRunError(runId: string): Promise<Error> {
    const run = await this.getRun(runId);
    return run ? new RunClosedError(runId, run.status) : new RunNotFoundError(runId);
  }

  private async updateMap(
    runId: string,
    field: 'params' | 'metrics' | 'tags',
    entries: Record<string, string | number>
  ): Promise<void> {
    const keys = Object.keys(entries);
    if (keys.length === 0) {
      return;
    }

    const names: Record<string, string> = { '#status': 'status', '#field': field };
    const values: Record<string, string | number> = { ':running': 'RUNNING' };
    const sets = keys.map((key, i) => {
      names[`#k${i}`] = key;
      values[`:v${i}`] = entries[key];
      return `#field.#k${i} = :v${i}`;
    });

    try {
      await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: runKey(runId),
          UpdateExpression: `SET ${sets.join(', ')}`,
          ConditionExpression: 'attribute_exists(pk) AND #status = :running',
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
        })
      );
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw await this.closedRunError(runId);
      }
      this.logger.error(`Failed to log ${field}`, { runId, error: errorMessage(error) });
      throw error;
    }
  }

  private async batchWrite(requests: { PutRequest: { Item: Record<string, unknown> } }[]): Promise<void> {
    let pending: BatchWriteCommandInput['RequestItems'] = { [this.tableName]: requests };

    for (let attempt = 1; attempt <= MAX_BATCH_ATTEMPTS; attempt++) {
      const result: BatchWriteCommandOutput = await this.dynamoClient.send(
        new BatchWriteCommand({ RequestItems: pending })
      );
      const unprocessed: BatchWriteCommandOutput['UnprocessedItems'] = result.UnprocessedItems;
      if (!unprocessed || Object.keys(unprocessed).length === 0) {
        return;
      }
      pending = unprocessed;
    }

    throw new Error(`Metric history write left unprocessed items after ${MAX_BATCH_ATTEMPTS} attempts`);
  }
}
