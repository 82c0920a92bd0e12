import { DynamoDBDocumentClient, PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
  LedgerEntry,
  LedgerQuery,
  ILedgerService,
  LedgerEventType,
  LedgerSubjectType,
} from '../../types/LedgerTypes';
import { Logger } from '../core/Logger';
import { errorMessage } from '../../utils/aws-errors';

const LedgerEntrySchema = z.object({
  entryId: z.string(),
  subjectType: z.enum(['MODEL', 'RUN']),
  subjectId: z.string(),
  eventType: z.nativeEnum(LedgerEventType),
  timestamp: z.string(),
  actor: z.string(),
  data: z.record(
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]).optional()
  ),
});

function subjectKey(subjectType: LedgerSubjectType, subjectId: string): string {
  return `${subjectType}#${subjectId}`;
}

/**
 * LedgerService - Append-only audit ledger
 *
 * Ledger entries are append-only and cannot be modified or deleted.
 */
export class LedgerService implements ILedgerService {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tableName: string,
    private logger: Logger
  ) {}

  /**
   * Append entry to ledger (append-only)
   */
  async append(entry: Omit<LedgerEntry, 'entryId' | 'timestamp'>): Promise<LedgerEntry> {
    const entryId = `entry-${Date.now()}-${uuidv4()}`;
    const timestamp = new Date().toISOString();

    const ledgerEntry: LedgerEntry = {
      ...entry,
      entryId,
      timestamp,
    };

    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...ledgerEntry,
            pk: subjectKey(entry.subjectType, entry.subjectId),
            sk: `ENTRY#${timestamp}#${entryId}`,
          },
          // Prevent overwrites (append-only)
          ConditionExpression: 'attribute_not_exists(entryId)',
        })
      );

      this.logger.debug('Ledger entry appended', {
        entryId,
        subject: subjectKey(entry.subjectType, entry.subjectId),
        eventType: entry.eventType,
      });

      return ledgerEntry;
    } catch (error) {
      this.logger.error('Failed to append ledger entry', {
        entryId,
        eventType: entry.eventType,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Query ledger entries for one subject, most recent first
   */
  async query(query: LedgerQuery): Promise<LedgerEntry[]> {
    const expressionAttributeValues: Record<string, string> = {
      ':pk': subjectKey(query.subjectType, query.subjectId),
      ':sk': 'ENTRY#',
    };
    if (query.eventType) {
      expressionAttributeValues[':eventType'] = query.eventType;
    }

    try {
      const result = await this.dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: 'pk = :pk AND begins_with(sk, :sk)',
          ...(query.eventType ? { FilterExpression: 'eventType = :eventType' } : {}),
          ExpressionAttributeValues: expressionAttributeValues,
          ...(query.limit ? { Limit: query.limit } : {}),
          ScanIndexForward: false, // Most recent first
        })
      );

      return (result.Items ?? []).map((item) => LedgerEntrySchema.parse(item));
    } catch (error) {
      this.logger.error('Failed to query ledger', {
        subject: subjectKey(query.subjectType, query.subjectId),
        error: errorMessage(error),
      });
      throw error;
    }
  }
}
