/**
 * Read-only calls proving the caller can reach each service the CLI touches
 */

import { CloudFormationClient, ListStacksCommand } from '@aws-sdk/client-cloudformation';
import { DynamoDBClient, ListTablesCommand } from '@aws-sdk/client-dynamodb';
import { IAMClient, ListOpenIDConnectProvidersCommand } from '@aws-sdk/client-iam';
import { S3Client, ListBucketsCommand } from '@aws-sdk/client-s3';
import { SSMClient, DescribeParametersCommand } from '@aws-sdk/client-ssm';
import type { AwsCredentialIdentity } from '@aws-sdk/types';

export interface PermissionProbe {
  /** Service and action being exercised, e.g. "cloudformation:ListStacks" */
  name: string;
  run(): Promise<void>;
}

export function createPermissionProbes(region: string, credentials?: AwsCredentialIdentity): PermissionProbe[] {
  const config = { region, credentials };

  return [
    {
      name: 'cloudformation:ListStacks',
      run: async () => {
        await new CloudFormationClient(config).send(new ListStacksCommand({}));
      },
    },
    {
      name: 'iam:ListOpenIDConnectProviders',
      run: async () => {
        await new IAMClient(config).send(new ListOpenIDConnectProvidersCommand({}));
      },
    },
    {
      name: 's3:ListAllMyBuckets',
      run: async () => {
        await new S3Client(config).send(new ListBucketsCommand({}));
      },
    },
    {
      name: 'dynamodb:ListTables',
      run: async () => {
        await new DynamoDBClient(config).send(new ListTablesCommand({ Limit: 1 }));
      },
    },
    {
      name: 'ssm:DescribeParameters',
      run: async () => {
        await new SSMClient(config).send(new DescribeParametersCommand({ MaxResults: 1 }));
      },
    },
  ];
}
