/**
 * Parameter Store publication of the foundation's identifiers
 *
 * Downstream Terraform projects read these paths instead of the stack outputs.
 */

import {
  SSMClient,
  DeleteParameterCommand,
  GetParameterCommand,
  PutParameterCommand,
  ParameterNotFound,
} from '@aws-sdk/client-ssm';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { PARAMETER_PATHS, STACK_OUTPUTS } from '../types/config.js';
import type { ParameterGateway } from '../types/gateways.js';
import { PartialFailureError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';

export class AwsParameterGateway implements ParameterGateway {
  private readonly client: SSMClient;

  constructor(region: string, credentials?: AwsCredentialIdentity) {
    this.client = new SSMClient({ region, credentials });
  }

  async putParameter(name: string, value: string, description: string): Promise<void> {
    await this.client.send(
      new PutParameterCommand({
        Name: name,
        Value: value,
        Description: description,
        Type: 'String',
        Overwrite: true,
      })
    );
  }

  async getParameter(name: string): Promise<string | null> {
    try {
      const response = await this.client.send(new GetParameterCommand({ Name: name }));
      return response.Parameter?.Value ?? null;
    } catch (error) {
      if (error instanceof ParameterNotFound) {
        return null;
      }
      throw error;
    }
  }

  async deleteParameter(name: string): Promise<boolean> {
    try {
      await this.client.send(new DeleteParameterCommand({ Name: name }));
      return true;
    } catch (error) {
      if (error instanceof ParameterNotFound) {
        return false;
      }
      throw error;
    }
  }
}

interface PublishedValue {
  path: string;
  outputKey: string;
  description: string;
}

export const PUBLISHED_VALUES: readonly PublishedValue[] = [
  {
    path: PARAMETER_PATHS.stateBucket,
    outputKey: STACK_OUTPUTS.stateBucket,
    description: 'Terraform state bucket',
  },
  {
    path: PARAMETER_PATHS.lockTable,
    outputKey: STACK_OUTPUTS.lockTable,
    description: 'Terraform state lock table',
  },
  {
    path: PARAMETER_PATHS.oidcProvider,
    outputKey: STACK_OUTPUTS.oidcProviderArn,
    description: 'OIDC identity provider ARN',
  },
  {
    path: PARAMETER_PATHS.deploymentRolesRoleArn,
    outputKey: STACK_OUTPUTS.deploymentRolesRoleArn,
    description: 'Role assumed by the deployment-roles repository',
  },
];

export interface PublishResult {
  written: string[];
  unchanged: string[];
}

/**
 * Write stack outputs to their well-known paths, skipping values already current
 */
export async function publishFoundationParameters(
  parameters: ParameterGateway,
  outputs: Record<string, string>
): Promise<PublishResult> {
  const result: PublishResult = { written: [], unchanged: [] };

  for (const { path, outputKey, description } of PUBLISHED_VALUES) {
    const value = outputs[outputKey];
    if (value === undefined) {
      throw new PartialFailureError('Cannot publish parameters, stack output missing', [outputKey]);
    }

    if ((await parameters.getParameter(path)) === value) {
      result.unchanged.push(path);
      continue;
    }

    await parameters.putParameter(path, value, description);
    logger.verbose(`Published ${path} = ${value}`);
    result.written.push(path);
  }

  return result;
}

/**
 * Remove every published path; failures are collected and reported together
 */
export async function unpublishFoundationParameters(parameters: ParameterGateway): Promise<string[]> {
  const removed: string[] = [];
  const failed: string[] = [];

  for (const { path } of PUBLISHED_VALUES) {
    try {
      if (await parameters.deleteParameter(path)) {
        removed.push(path);
      }
    } catch (error) {
      failed.push(`${path}: ${errorMessage(error)}`);
    }
  }

  if (failed.length > 0) {
    throw new PartialFailureError(
      'Some published parameters could not be deleted',
      failed,
      'Delete the listed parameters in the Systems Manager console.'
    );
  }
  return removed;
}
