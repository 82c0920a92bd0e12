import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { GateDecisionStore } from '../../../services/evaluation/GateDecisionStore';
import { Logger } from '../../../services/core/Logger';
import { awsError, mockDynamoDBDocumentClient, resetAllMocks } from '../../__mocks__/aws-sdk-clients';
import { gateDecision } from '../../__mocks__/fixtures';

jest.mock('@aws-sdk/lib-dynamodb', () => ({
  DynamoDBDocumentClient: { from: jest.fn(() => mockDynamoDBDocumentClient) },
  GetCommand: jest.fn(),
  PutCommand: jest.fn(),
  QueryCommand: jest.fn(),
}));

describe('GateDecisionStore', () => {
  let store: GateDecisionStore;
  const evaluation = {
    run_id: 'run-1',
    dataset_digest: 'digest-1',
    metrics: { auc: 0.82, accuracy: 0.9 },
    evaluated_at: '2026-01-01T00:00:00.000Z',
  };

  beforeEach(() => {
    resetAllMocks();
    jest.clearAllMocks();
    store = new GateDecisionStore(
      DynamoDBDocumentClient.from(new DynamoDBClient({ region: 'us-east-1' })),
      'test-runs',
      new Logger('GateDecisionStoreTest')
    );
  });

  describe('saveEvaluation', () => {
    it('writes the metric set once per run and dataset', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});

      await expect(store.saveEvaluation(evaluation)).resolves.toEqual(evaluation);
      expect(PutCommand).toHaveBeenCalledWith({
        TableName: 'test-runs',
        Item: { pk: 'RUN#run-1', sk: 'EVAL#digest-1', ...evaluation },
        ConditionExpression: 'attribute_not_exists(pk)',
      });
    });

    it('returns the stored set when one exists', async () => {
      const stored = { ...evaluation, metrics: { auc: 0.81 } };
      mockDynamoDBDocumentClient.send
        .mockRejectedValueOnce(awsError('ConditionalCheckFailedException'))
        .mockResolvedValueOnce({ Item: { pk: 'RUN#run-1', sk: 'EVAL#digest-1', ...stored } });

      await expect(store.saveEvaluation(evaluation)).resolves.toEqual(stored);
    });

    it('rethrows other failures', async () => {
      mockDynamoDBDocumentClient.send.mockRejectedValue(awsError('ProvisionedThroughputExceededException', 'throttled'));
      await expect(store.saveEvaluation(evaluation)).rejects.toThrow('throttled');
    });
  });

  describe('getEvaluation', () => {
    it('returns null when absent', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});
      await expect(store.getEvaluation('run-1', 'digest-2')).resolves.toBeNull();
      expect(GetCommand).toHaveBeenCalledWith({
        TableName: 'test-runs',
        Key: { pk: 'RUN#run-1', sk: 'EVAL#digest-2' },
      });
    });
  });

  describe('decisions', () => {
    it('stores a decision under its policy fingerprint', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});
      const decision = gateDecision();

      await store.saveDecision(decision);

      expect(PutCommand).toHaveBeenCalledWith(
        expect.objectContaining({
          Item: expect.objectContaining({
            pk: 'RUN#run-1',
            sk: 'DECISION#fp-test#2026-01-01T00:00:00.000Z#decision-1',
            passed: true,
          }),
        })
      );
    });

    it('queries the latest decision for a policy newest first', async () => {
      const decision = gateDecision({ passed: false, reasons: [] });
      mockDynamoDBDocumentClient.send.mockResolvedValue({ Items: [{ pk: 'RUN#run-1', sk: 'DECISION#x', ...decision }] });

      await expect(store.getLatestDecision('run-1', 'fp-test')).resolves.toEqual(decision);
      expect(QueryCommand).toHaveBeenCalledWith({
        TableName: 'test-runs',
        KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
        ExpressionAttributeValues: { ':pk': 'RUN#run-1', ':prefix': 'DECISION#fp-test#' },
        ScanIndexForward: false,
        Limit: 1,
      });
    });

    it('returns null when the run has no decision under the policy', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({ Items: [] });
      await expect(store.getLatestDecision('run-1', 'fp-other')).resolves.toBeNull();
    });

    it('lists every decision newest first across pages', async () => {
      const older = gateDecision({ decision_id: 'd-1', evaluated_at: '2026-01-01T00:00:00.000Z' });
      const newer = gateDecision({ decision_id: 'd-2', evaluated_at: '2026-01-02T00:00:00.000Z' });
      mockDynamoDBDocumentClient.send
        .mockResolvedValueOnce({ Items: [older], LastEvaluatedKey: { pk: 'RUN#run-1', sk: 'x' } })
        .mockResolvedValueOnce({ Items: [newer] });

      const decisions = await store.listDecisions('run-1');
      expect(decisions.map((d) => d.decision_id)).toEqual(['d-2', 'd-1']);
      expect(QueryCommand).toHaveBeenCalledTimes(2);
    });
  });
});
