/**
 * List command: read-only view of the foundation stack, its resources,
 * published parameters and any orphaned resources
 */

import ora from 'ora';
import { PUBLISHED_VALUES } from '../aws/ssm.js';
import { StackStateResolver } from '../orchestration/stack-state.js';
import type { GlobalOptions } from '../types/config.js';
import type { CloudGateways } from '../types/gateways.js';
import type { StackResolution } from '../types/stacks.js';
import { errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';
import { failCommand, gatewaysFor, openAwsSession, resolveTarget } from './shared.js';

export async function listCommand(options: GlobalOptions): Promise<void> {
  const spinner = ora();
  try {
    if (options.verbose) {
      setVerbose(true);
    }

    spinner.start('Checking AWS credentials...');
    const session = await openAwsSession(options);
    spinner.succeed(`Authenticated as ${session.identity.arn} (${session.region})`);

    const target = await resolveTarget(session);
    const gateways = gatewaysFor(session);

    spinner.start(`Reading stack ${target.stackName}...`);
    const resolution = await new StackStateResolver(gateways.stacks, gateways.buckets).resolve(target);
    spinner.stop();

    await printStack(resolution, gateways);
    await printParameters(gateways);
    printOrphans(resolution);
  } catch (error) {
    failCommand(error, spinner);
  }
}

async function printStack(resolution: StackResolution, gateways: CloudGateways): Promise<void> {
  logger.header(`Stack ${resolution.stackName}`);

  const stack = resolution.stack;
  if (!stack) {
    logger.info('Stack does not exist');
    return;
  }

  logger.table([
    ['Property', 'Value'],
    ['Status', stack.status],
    ['State', resolution.state],
    ['Created', stack.creationTime?.toISOString() ?? '-'],
    ['Termination protection', stack.terminationProtection ? 'enabled' : 'disabled'],
  ]);

  const outputs = Object.entries(stack.outputs);
  if (outputs.length > 0) {
    logger.newline();
    logger.table([['Output', 'Value'], ...outputs]);
  }

  try {
    const resources = await gateways.stacks.listStackResources(stack.stackName);
    logger.newline();
    logger.table([
      ['Logical ID', 'Type', 'Physical ID', 'Status', 'Retained'],
      ...resources.map(r => [r.logicalId, r.resourceType, r.physicalId ?? '-', r.status, r.retained ? 'yes' : 'no']),
    ]);
  } catch (error) {
    logger.warn(`Could not list stack resources: ${errorMessage(error)}`);
  }
}

async function printParameters(gateways: CloudGateways): Promise<void> {
  logger.header('Published parameters');
  const rows: string[][] = [['Path', 'Value']];
  for (const { path } of PUBLISHED_VALUES) {
    try {
      rows.push([path, (await gateways.parameters.getParameter(path)) ?? '(missing)']);
    } catch (error) {
      rows.push([path, `(unreadable: ${errorMessage(error)})`]);
    }
  }
  logger.table(rows);
}

function printOrphans(resolution: StackResolution): void {
  if (resolution.orphans.length === 0) {
    return;
  }
  logger.header('Orphaned resources');
  logger.table([
    ['Resource', 'Kind', 'Matched by', 'Importable'],
    ...resolution.orphans.map(o => [o.physicalId, o.kind, o.confidence, o.logicalId ? `as ${o.logicalId}` : 'no']),
  ]);
}
