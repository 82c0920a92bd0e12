import { DynamoDBDocumentClient, GetCommand, PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import {
  EvaluationMetricSet,
  EvaluationMetricSetSchema,
  GateDecision,
  GateDecisionSchema,
  IGateDecisionStore,
} from '../../types/EvaluationTypes';
import { Logger } from '../core/Logger';
import { errorMessage, isConditionalCheckFailed } from '../../utils/aws-errors';
import { queryAll } from '../../utils/dynamo-query';
import { runKey } from '../tracking/ExperimentTrackerService';

function evaluationSortKey(datasetDigest: string): string {
  return `EVAL#${datasetDigest}`;
}

function decisionSortKey(decision: GateDecision): string {
  return `DECISION#${decision.policy_fingerprint}#${decision.evaluated_at}#${decision.decision_id}`;
}

/**
 * GateDecisionStore - evaluation metric sets and gate decisions, stored beside the run
 *
 * Metric sets are write-once per (run, dataset). Decisions are append-only and keyed by
 * policy fingerprint, so the latest decision under a given policy is one query away.
 */
export class GateDecisionStore implements IGateDecisionStore {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tableName: string,
    private logger: Logger
  ) {}

  async saveEvaluation(evaluation: EvaluationMetricSet): Promise<EvaluationMetricSet> {
    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk: runKey(evaluation.run_id).pk,
            sk: evaluationSortKey(evaluation.dataset_digest),
            ...evaluation,
          },
          ConditionExpression: 'attribute_not_exists(pk)',
        })
      );
      this.logger.debug('Evaluation metric set stored', {
        runId: evaluation.run_id,
        datasetDigest: evaluation.dataset_digest,
      });
      return evaluation;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        const existing = await this.getEvaluation(evaluation.run_id, evaluation.dataset_digest);
        if (existing) {
          this.logger.debug('Evaluation metric set already stored', { runId: evaluation.run_id });
          return existing;
        }
      }
      this.logger.error('Failed to store evaluation metric set', {
        runId: evaluation.run_id,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  async getEvaluation(runId: string, datasetDigest: string): Promise<EvaluationMetricSet | null> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: runKey(runId).pk, sk: evaluationSortKey(datasetDigest) },
      })
    );
    return result.Item ? EvaluationMetricSetSchema.parse(result.Item) : null;
  }

  async saveDecision(decision: GateDecision): Promise<void> {
    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk: runKey(decision.run_id).pk,
            sk: decisionSortKey(decision),
            ...decision,
          },
          ConditionExpression: 'attribute_not_exists(pk)',
        })
      );
      this.logger.info('Gate decision stored', {
        runId: decision.run_id,
        decisionId: decision.decision_id,
        passed: decision.passed,
      });
    } catch (error) {
      this.logger.error('Failed to store gate decision', {
        runId: decision.run_id,
        decisionId: decision.decision_id,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  async getLatestDecision(runId: string, policyFingerprint: string): Promise<GateDecision | null> {
    const result = await this.dynamoClient.send(
      new QueryCommand({
        TableName: this.tableName,
        KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
        ExpressionAttributeValues: {
          ':pk': runKey(runId).pk,
          ':prefix': `DECISION#${policyFingerprint}#`,
        },
        ScanIndexForward: false,
        Limit: 1,
      })
    );
    const item = result.Items?.[0];
    return item ? GateDecisionSchema.parse(item) : null;
  }

  /**
   * Every decision for the run, most recent first
   */
  async listDecisions(runId: string): Promise<GateDecision[]> {
    const items = await queryAll(this.dynamoClient, {
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      ExpressionAttributeValues: { ':pk': runKey(runId).pk, ':prefix': 'DECISION#' },
    });
    return items
      .map((item) => GateDecisionSchema.parse(item))
      .sort((a, b) => b.evaluated_at.localeCompare(a.evaluated_at));
  }
}
