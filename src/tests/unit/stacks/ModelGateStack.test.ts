/**
 * ModelGateStack infrastructure tests
 *
 * The CLI's default configuration names these tables and the bucket; a rename here
 * breaks every operator config, so the names are pinned.
 */

import { App } from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { ModelGateStack } from '../../../stacks/ModelGateStack';

describe('ModelGateStack Infrastructure', () => {
  let template: Template;

  beforeEach(() => {
    const app = new App();
    const stack = new ModelGateStack(app, 'TestStack', {
      env: {
        account: '123456789012',
        region: 'us-east-1',
      },
    });
    template = Template.fromStack(stack);
  });

  it('should create the runs, registry and ledger tables with pk/sk keys', () => {
    template.resourceCountIs('AWS::DynamoDB::Table', 3);

    for (const tableName of ['model-gate-runs', 'model-gate-registry', 'model-gate-ledger']) {
      template.hasResourceProperties('AWS::DynamoDB::Table', {
        TableName: tableName,
        KeySchema: [
          { AttributeName: 'pk', KeyType: 'HASH' },
          { AttributeName: 'sk', KeyType: 'RANGE' },
        ],
        BillingMode: 'PAY_PER_REQUEST',
        PointInTimeRecoverySpecification: { PointInTimeRecoveryEnabled: true },
      });
    }
  });

  it('should retain tables on stack deletion', () => {
    template.hasResource('AWS::DynamoDB::Table', {
      DeletionPolicy: 'Retain',
      UpdateReplacePolicy: 'Retain',
    });
  });

  it('should create a versioned private artifacts bucket', () => {
    template.hasResourceProperties('AWS::S3::Bucket', {
      BucketName: 'model-gate-artifacts-123456789012-us-east-1',
      VersioningConfiguration: { Status: 'Enabled' },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true,
      },
    });
  });

  it('should grant operators the conditional-write and transaction actions', () => {
    template.hasResourceProperties('AWS::IAM::ManagedPolicy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Effect: 'Allow',
            Action: Match.arrayWith(['dynamodb:UpdateItem', 'dynamodb:ConditionCheckItem', 'dynamodb:Query']),
          }),
          Match.objectLike({
            Effect: 'Allow',
            Action: ['s3:GetObject', 's3:PutObject', 's3:DeleteObject'],
          }),
        ]),
      },
    });
  });

  it('should honor a custom resource prefix', () => {
    const app = new App();
    const stack = new ModelGateStack(app, 'PrefixedStack', {
      resourcePrefix: 'churn',
      env: { account: '123456789012', region: 'eu-west-1' },
    });

    Template.fromStack(stack).hasResourceProperties('AWS::DynamoDB::Table', { TableName: 'churn-registry' });
  });

  it('should export the names the CLI config needs', () => {
    const outputs = Template.fromStack(
      new ModelGateStack(new App(), 'OutputsStack', { env: { account: '123456789012', region: 'us-east-1' } })
    ).findOutputs('*');

    expect(Object.keys(outputs).sort()).toEqual([
      'ArtifactsBucketName',
      'LedgerTableName',
      'OperatorPolicyArn',
      'RegistryTableName',
      'RunsTableName',
    ]);
  });
});
