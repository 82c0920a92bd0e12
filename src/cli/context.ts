import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { S3Client } from '@aws-sdk/client-s3';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { IExperimentTracker } from '../types/RunTypes';
import type { IGateDecisionStore } from '../types/EvaluationTypes';
import type { IModelRegistry } from '../types/RegistryTypes';
import { Logger } from '../services/core/Logger';
import { LedgerService } from '../services/ledger/LedgerService';
import { ArtifactStore } from '../services/tracking/ArtifactStore';
import { ExperimentTrackerService } from '../services/tracking/ExperimentTrackerService';
import { GateDecisionStore } from '../services/evaluation/GateDecisionStore';
import { ModelEvaluator } from '../services/evaluation/ModelEvaluator';
import { ModelRegistryService } from '../services/registry/ModelRegistryService';
import { AliasPromotionService } from '../services/registry/AliasPromotionService';
import { TrainingRunner } from '../services/training/TrainingRunner';
import { getAWSClientConfig, getS3ClientConfig } from '../utils/aws-client-config';

export interface CliServices {
  tracker: IExperimentTracker;
  trainingRunner: TrainingRunner;
  evaluator: ModelEvaluator;
  decisionStore: IGateDecisionStore;
  registry: IModelRegistry;
  promotions: AliasPromotionService;
}

export interface CommandContext {
  config: PipelineConfig;
  services: CliServices;
  logger: Logger;
  actor: string;
  /** Command output (stdout) */
  out: (line: string) => void;
}

export type ServicesFactory = (config: PipelineConfig, logger: Logger, actor: string) => CliServices;

function documentClient(region: string | undefined, endpoint: string | undefined): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient(getAWSClientConfig(region, endpoint)), {
    marshallOptions: { removeUndefinedValues: true },
  });
}

/**
 * Wire the services against DynamoDB and S3 as configured
 */
export const createServices: ServicesFactory = (config, logger, actor) => {
  const { tracking, registry } = config;
  const trackingClient = documentClient(tracking.region, tracking.endpoint);
  const registryClient =
    registry.region || registry.endpoint
      ? documentClient(registry.region ?? tracking.region, registry.endpoint)
      : trackingClient;
  const s3Client = new S3Client(getS3ClientConfig(tracking.region, tracking.endpoint));

  const ledgerService = new LedgerService(registryClient, registry.ledger_table, logger.child('LedgerService'));
  const artifactStore = new ArtifactStore(
    s3Client,
    tracking.artifact_bucket,
    tracking.artifact_prefix,
    logger.child('ArtifactStore')
  );
  const tracker = new ExperimentTrackerService(
    trackingClient,
    tracking.runs_table,
    artifactStore,
    ledgerService,
    logger.child('ExperimentTracker'),
    actor
  );
  const decisionStore = new GateDecisionStore(trackingClient, tracking.runs_table, logger.child('GateDecisionStore'));
  const modelRegistry = new ModelRegistryService(
    registryClient,
    registry.registry_table,
    tracker,
    ledgerService,
    logger.child('ModelRegistry'),
    actor
  );

  return {
    tracker,
    trainingRunner: new TrainingRunner(tracker, logger.child('TrainingRunner')),
    evaluator: new ModelEvaluator(
      tracker,
      decisionStore,
      modelRegistry,
      ledgerService,
      logger.child('ModelEvaluator'),
      actor
    ),
    decisionStore,
    registry: modelRegistry,
    promotions: new AliasPromotionService(modelRegistry, decisionStore, ledgerService, logger.child('AliasPromotion')),
  };
};
