#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { ModelGateStack } from '../../src/stacks/ModelGateStack';

const app = new cdk.App();

new ModelGateStack(app, 'ModelGateStack', {
  resourcePrefix: app.node.tryGetContext('resourcePrefix'),
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT || process.env.AWS_ACCOUNT_ID,
    region: process.env.CDK_DEFAULT_REGION || process.env.AWS_REGION || 'us-east-1',
  },
});
