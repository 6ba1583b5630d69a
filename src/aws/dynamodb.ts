/**
 * Lock table protection toggling ahead of stack deletion
 */

import {
  DynamoDBClient,
  DescribeTableCommand,
  UpdateTableCommand,
  ResourceNotFoundException,
} from '@aws-sdk/client-dynamodb';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import type { LockTableGateway } from '../types/gateways.js';

export class AwsLockTableGateway implements LockTableGateway {
  private readonly client: DynamoDBClient;

  constructor(region: string, credentials?: AwsCredentialIdentity) {
    this.client = new DynamoDBClient({ region, credentials });
  }

  async disableDeletionProtection(tableName: string): Promise<boolean> {
    try {
      const response = await this.client.send(new DescribeTableCommand({ TableName: tableName }));
      if (response.Table?.DeletionProtectionEnabled) {
        await this.client.send(new UpdateTableCommand({ TableName: tableName, DeletionProtectionEnabled: false }));
      }
      return true;
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        return false;
      }
      throw error;
    }
  }
}
