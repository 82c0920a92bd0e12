import * as iam from 'aws-cdk-lib/aws-iam';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';

export interface OperatorPolicyProps {
  artifactsBucket: s3.IBucket;
  tables: dynamodb.ITable[];
}

/**
 * IAM policy for pipeline operators and CI jobs running the CLI
 *
 * Attach to the user/role that runs train, eval, register and promote.
 */
export class OperatorPolicy extends Construct {
  public readonly policy: iam.ManagedPolicy;

  constructor(scope: Construct, id: string, props: OperatorPolicyProps) {
    super(scope, id);

    this.policy = new iam.ManagedPolicy(this, 'OperatorPolicy', {
      description: 'Model gate operators: runs, decisions, registry, ledger and model artifacts',
      statements: [
        // Transactions are authorized per item action
        new iam.PolicyStatement({
          effect: iam.Effect.ALLOW,
          actions: [
            'dynamodb:PutItem',
            'dynamodb:GetItem',
            'dynamodb:UpdateItem',
            'dynamodb:DeleteItem',
            'dynamodb:ConditionCheckItem',
            'dynamodb:Query',
            'dynamodb:BatchWriteItem',
          ],
          resources: props.tables.map((table) => table.tableArn),
        }),
        new iam.PolicyStatement({
          effect: iam.Effect.ALLOW,
          actions: ['s3:GetObject', 's3:PutObject', 's3:DeleteObject'],
          resources: [props.artifactsBucket.arnForObjects('*')],
        }),
        new iam.PolicyStatement({
          effect: iam.Effect.ALLOW,
          actions: ['s3:ListBucket'],
          resources: [props.artifactsBucket.bucketArn],
        }),
      ],
    });
  }
}
