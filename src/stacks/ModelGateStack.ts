import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import { Construct } from 'constructs';
import { OperatorPolicy } from './OperatorPolicy';

export interface ModelGateStackProps extends cdk.StackProps {
  /** Prefix for table and bucket names */
  resourcePrefix?: string;
}

/**
 * State for the model gate: runs + gate decisions, model registry + aliases,
 * audit ledger (DynamoDB) and model artifacts (S3)
 */
export class ModelGateStack extends cdk.Stack {
  public readonly artifactsBucket: s3.Bucket;
  public readonly runsTable: dynamodb.Table;
  public readonly registryTable: dynamodb.Table;
  public readonly ledgerTable: dynamodb.Table;
  public readonly operatorPolicy: OperatorPolicy;

  constructor(scope: Construct, id: string, props?: ModelGateStackProps) {
    super(scope, id, props);
    const prefix = props?.resourcePrefix ?? 'model-gate';

    this.artifactsBucket = new s3.Bucket(this, 'ArtifactsBucket', {
      bucketName: `${prefix}-artifacts-${this.account}-${this.region}`,
      versioned: true,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.runsTable = this.createTable('RunsTable', `${prefix}-runs`);
    this.registryTable = this.createTable('RegistryTable', `${prefix}-registry`);
    this.ledgerTable = this.createTable('LedgerTable', `${prefix}-ledger`);

    this.operatorPolicy = new OperatorPolicy(this, 'Operators', {
      artifactsBucket: this.artifactsBucket,
      tables: [this.runsTable, this.registryTable, this.ledgerTable],
    });

    new cdk.CfnOutput(this, 'ArtifactsBucketName', {
      value: this.artifactsBucket.bucketName,
      description: 'S3 bucket for model artifacts (tracking.artifact_bucket)',
    });
    new cdk.CfnOutput(this, 'RunsTableName', {
      value: this.runsTable.tableName,
      description: 'Runs, metric history, evaluations and gate decisions (tracking.runs_table)',
    });
    new cdk.CfnOutput(this, 'RegistryTableName', {
      value: this.registryTable.tableName,
      description: 'Registered models, versions and aliases (registry.registry_table)',
    });
    new cdk.CfnOutput(this, 'LedgerTableName', {
      value: this.ledgerTable.tableName,
      description: 'Append-only audit ledger (registry.ledger_table)',
    });
    new cdk.CfnOutput(this, 'OperatorPolicyArn', {
      value: this.operatorPolicy.policy.managedPolicyArn,
      description: 'Managed policy to attach to CLI operators',
    });
  }

  private createTable(id: string, tableName: string): dynamodb.Table {
    return new dynamodb.Table(this, id, {
      tableName,
      partitionKey: { name: 'pk', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'sk', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: {
        pointInTimeRecoveryEnabled: true,
      },
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });
  }
}
