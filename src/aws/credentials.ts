/**
 * AWS credential detection and account metadata
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { IAMClient, ListAccountAliasesCommand } from '@aws-sdk/client-iam';
import { NoCredentialsError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { DEFAULT_REGION } from '../types/config.js';
import type { CurrentIdentity } from '../types/aws.js';
import type { AwsCredentialIdentity } from '@aws-sdk/types';

export async function getCurrentIdentity(region: string, credentials?: AwsCredentialIdentity): Promise<CurrentIdentity> {
  const client = new STSClient({ region, credentials });

  try {
    logger.verbose('Checking AWS credentials...');
    const response = await client.send(new GetCallerIdentityCommand({}));

    if (!response.Account || !response.Arn || !response.UserId) {
      throw new NoCredentialsError();
    }

    logger.verbose(`Authenticated as: ${response.Arn}`);
    logger.verbose(`Account ID: ${response.Account}`);

    return {
      accountId: response.Account,
      arn: response.Arn,
      userId: response.UserId,
    };
  } catch (error) {
    if (error instanceof NoCredentialsError) {
      throw error;
    }

    const message = errorMessage(error);

    if (
      message.includes('Could not load credentials') ||
      message.includes('Missing credentials') ||
      message.includes('ExpiredToken') ||
      message.includes('InvalidClientTokenId')
    ) {
      throw new NoCredentialsError();
    }

    throw error;
  }
}

/**
 * First IAM account alias, or an empty string when none is set or it cannot be read
 */
export async function getAccountAlias(region: string, credentials?: AwsCredentialIdentity): Promise<string> {
  const client = new IAMClient({ region, credentials });
  try {
    const response = await client.send(new ListAccountAliasesCommand({}));
    return response.AccountAliases?.[0] ?? '';
  } catch (error) {
    logger.verbose(`Could not read the account alias: ${errorMessage(error)}`);
    return '';
  }
}

/**
 * Region from the flag, the environment, the shared AWS config, then the default
 */
export async function resolveRegion(flagRegion?: string, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const explicit = flagRegion || env.AWS_REGION || env.AWS_DEFAULT_REGION;
  if (explicit) {
    return explicit;
  }

  try {
    const configured = await new STSClient({}).config.region();
    if (configured) {
      return configured;
    }
  } catch (error) {
    logger.verbose(`No region in the shared AWS config: ${errorMessage(error)}`);
  }
  return DEFAULT_REGION;
}

/**
 * Resolve the default provider chain once so every client in the run signs
 * with the same identity that was validated
 */
export async function captureCredentials(region: string): Promise<AwsCredentialIdentity> {
  try {
    return await new STSClient({ region }).config.credentials();
  } catch (error) {
    logger.verbose(`Credential resolution failed: ${errorMessage(error)}`);
    throw new NoCredentialsError();
  }
}
