/**
 * CloudFormation stack operations
 */

import {
  CloudFormationClient,
  DescribeStacksCommand,
  ListStackResourcesCommand,
  DescribeStackEventsCommand,
  CreateStackCommand,
  UpdateStackCommand,
  DeleteStackCommand,
  CreateChangeSetCommand,
  DescribeChangeSetCommand,
  DeleteChangeSetCommand,
  ExecuteChangeSetCommand,
  UpdateTerminationProtectionCommand,
  waitUntilChangeSetCreateComplete,
  ChangeSetType,
  type Parameter,
  type StackEvent,
} from '@aws-sdk/client-cloudformation';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import type { ImportTarget, StackGateway, StackRequest, UpdateResult } from '../types/gateways.js';
import type { ResourceFailure, ResourceKind, ResourceRecord, StackRecord } from '../types/stacks.js';
import { errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';

const CHANGE_SET_MAX_WAIT_SECONDS = 300;

const RESOURCE_KINDS: Record<string, ResourceKind> = {
  'AWS::S3::Bucket': 'bucket',
  'AWS::DynamoDB::Table': 'table',
  'AWS::IAM::OIDCProvider': 'identity-provider',
  'AWS::IAM::Role': 'role',
  'AWS::SSM::Parameter': 'parameter',
};

export function resourceKindOf(resourceType: string): ResourceKind {
  return RESOURCE_KINDS[resourceType] ?? 'other';
}

function isMissingStackError(error: unknown): boolean {
  return errorMessage(error).includes('does not exist');
}

function isNoChangesError(error: unknown): boolean {
  const message = errorMessage(error);
  return message.includes('No updates are to be performed') || message.includes("didn't contain changes");
}

export class AwsStackGateway implements StackGateway {
  private readonly client: CloudFormationClient;

  constructor(region: string, credentials?: AwsCredentialIdentity) {
    this.client = new CloudFormationClient({ region, credentials });
  }

  async describeStack(stackName: string): Promise<StackRecord | null> {
    try {
      const response = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      const stack = response.Stacks?.[0];
      if (!stack || !stack.StackStatus) {
        return null;
      }

      const outputs: Record<string, string> = {};
      for (const output of stack.Outputs ?? []) {
        if (output.OutputKey && output.OutputValue) {
          outputs[output.OutputKey] = output.OutputValue;
        }
      }

      return {
        stackName,
        stackId: stack.StackId,
        status: stack.StackStatus,
        outputs,
        terminationProtection: stack.EnableTerminationProtection ?? false,
        creationTime: stack.CreationTime,
      };
    } catch (error) {
      if (isMissingStackError(error)) {
        return null;
      }
      throw error;
    }
  }

  async listStackResources(stackName: string): Promise<ResourceRecord[]> {
    const resources: ResourceRecord[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListStackResourcesCommand({ StackName: stackName, NextToken: nextToken })
      );
      for (const summary of response.StackResourceSummaries ?? []) {
        if (!summary.LogicalResourceId || !summary.ResourceType) continue;
        const status = summary.ResourceStatus ?? 'UNKNOWN';
        resources.push({
          logicalId: summary.LogicalResourceId,
          physicalId: summary.PhysicalResourceId,
          resourceType: summary.ResourceType,
          kind: resourceKindOf(summary.ResourceType),
          status,
          statusReason: summary.ResourceStatusReason,
          retained: status === 'DELETE_SKIPPED',
        });
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return resources;
  }

  /**
   * Failure events in chronological order, so the first entry per resource is the root cause
   */
  async listFailureEvents(stackName: string, since?: Date): Promise<ResourceFailure[]> {
    const events: StackEvent[] = [];
    let nextToken: string | undefined;
    let reachedOlder = false;

    do {
      const response = await this.client.send(
        new DescribeStackEventsCommand({ StackName: stackName, NextToken: nextToken })
      );
      for (const event of response.StackEvents ?? []) {
        // Newest first: stop at the first event older than the operation
        if (since && event.Timestamp && event.Timestamp < since) {
          reachedOlder = true;
          break;
        }
        events.push(event);
      }
      nextToken = response.NextToken;
    } while (nextToken && !reachedOlder);

    return events
      .reverse()
      .filter(event => event.ResourceStatus?.includes('FAILED') && event.LogicalResourceId)
      .map(event => ({
        logicalId: event.LogicalResourceId ?? '',
        resourceType: event.ResourceType,
        status: event.ResourceStatus ?? 'UNKNOWN',
        reason: event.ResourceStatusReason,
      }));
  }

  async createStack(request: StackRequest, options: { terminationProtection: boolean }): Promise<void> {
    await this.client.send(
      new CreateStackCommand({
        StackName: request.stackName,
        TemplateBody: request.templateBody,
        Capabilities: ['CAPABILITY_NAMED_IAM'],
        Parameters: toParameters(request),
        Tags: request.tags,
        EnableTerminationProtection: options.terminationProtection,
      })
    );
  }

  async updateStack(request: StackRequest): Promise<UpdateResult> {
    try {
      await this.client.send(
        new UpdateStackCommand({
          StackName: request.stackName,
          TemplateBody: request.templateBody,
          Capabilities: ['CAPABILITY_NAMED_IAM'],
          Parameters: toParameters(request),
          Tags: request.tags,
        })
      );
      return 'UPDATE_STARTED';
    } catch (error) {
      // "No updates are to be performed" is not an error
      if (isNoChangesError(error)) {
        return 'NO_CHANGES';
      }
      throw error;
    }
  }

  async createImportChangeSet(
    request: StackRequest,
    targets: ImportTarget[],
    changeSetName: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.client.send(
      new CreateChangeSetCommand({
        StackName: request.stackName,
        ChangeSetName: changeSetName,
        ChangeSetType: ChangeSetType.IMPORT,
        TemplateBody: request.templateBody,
        Capabilities: ['CAPABILITY_NAMED_IAM'],
        Parameters: toParameters(request),
        Tags: request.tags,
        ResourcesToImport: targets.map(target => ({
          ResourceType: target.resourceType,
          LogicalResourceId: target.logicalId,
          ResourceIdentifier: target.identifier,
        })),
      })
    );

    try {
      await waitUntilChangeSetCreateComplete(
        { client: this.client, maxWaitTime: CHANGE_SET_MAX_WAIT_SECONDS, abortSignal: signal },
        { StackName: request.stackName, ChangeSetName: changeSetName }
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      // The waiter's own message is generic; the change set carries the reason
      const reason = await this.changeSetStatusReason(request.stackName, changeSetName);
      throw new Error(reason ?? errorMessage(error));
    }
  }

  private async changeSetStatusReason(stackName: string, changeSetName: string): Promise<string | undefined> {
    try {
      const response = await this.client.send(
        new DescribeChangeSetCommand({ StackName: stackName, ChangeSetName: changeSetName })
      );
      return response.StatusReason;
    } catch (error) {
      logger.verbose(`Could not describe change set ${changeSetName}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  async executeChangeSet(stackName: string, changeSetName: string): Promise<void> {
    await this.client.send(new ExecuteChangeSetCommand({ StackName: stackName, ChangeSetName: changeSetName }));
  }

  async deleteChangeSet(stackName: string, changeSetName: string): Promise<void> {
    await this.client.send(new DeleteChangeSetCommand({ StackName: stackName, ChangeSetName: changeSetName }));
  }

  async setTerminationProtection(stackName: string, enabled: boolean): Promise<void> {
    await this.client.send(
      new UpdateTerminationProtectionCommand({ StackName: stackName, EnableTerminationProtection: enabled })
    );
  }

  async deleteStack(stackName: string): Promise<void> {
    await this.client.send(new DeleteStackCommand({ StackName: stackName }));
  }
}

function toParameters(request: StackRequest): Parameter[] {
  return request.parameters.map(({ key, value }) => ({ ParameterKey: key, ParameterValue: value }));
}
