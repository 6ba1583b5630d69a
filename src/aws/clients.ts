/**
 * AWS-backed implementations of every gateway, bound to one region
 */

import type { AwsCredentialIdentity } from '@aws-sdk/types';
import type { CloudGateways } from '../types/gateways.js';
import { AwsStackGateway } from './cloudformation.js';
import { AwsBucketGateway } from './s3.js';
import { AwsIdentityProviderGateway } from './oidc-provider.js';
import { AwsLockTableGateway } from './dynamodb.js';
import { AwsParameterGateway } from './ssm.js';

export function createCloudGateways(region: string, credentials?: AwsCredentialIdentity): CloudGateways {
  return {
    stacks: new AwsStackGateway(region, credentials),
    buckets: new AwsBucketGateway(region, credentials),
    identityProviders: new AwsIdentityProviderGateway(region, credentials),
    lockTables: new AwsLockTableGateway(region, credentials),
    parameters: new AwsParameterGateway(region, credentials),
  };
}
