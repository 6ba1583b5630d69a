/**
 * Destroy command implementation
 */

import ora from 'ora';
import { destroyFoundation, type DestructionReport } from '../orchestration/destruction.js';
import { assertReady } from '../prerequisites/index.js';
import type { DestroyOptions } from '../types/config.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';
import { InteractiveConfirmations } from '../utils/prompts.js';
import {
  failCommand,
  gatewaysFor,
  interruptSignal,
  openAwsSession,
  printPrerequisiteFailures,
  resolveTarget,
  runPrerequisites,
  statusReporter,
  waitOptionsFrom,
} from './shared.js';

export async function destroyCommand(options: DestroyOptions): Promise<void> {
  const spinner = ora();
  try {
    if (options.verbose) {
      setVerbose(true);
    }

    logger.header('Terraform Foundation Destroy');

    const signal = interruptSignal();
    const wait = waitOptionsFrom(options, { signal, onStatus: statusReporter(spinner) });

    spinner.start('Checking AWS credentials...');
    const session = await openAwsSession(options);
    spinner.succeed(`Authenticated as ${session.identity.arn} (${session.region})`);

    spinner.start('Checking prerequisites...');
    const report = await runPrerequisites(session.region, session);
    if (!report.ready) {
      spinner.fail('Prerequisites not satisfied');
      printPrerequisiteFailures(report);
      assertReady(report);
    }
    spinner.succeed('Prerequisites satisfied');

    const target = await resolveTarget(session);
    const result = await destroyFoundation({
      target,
      gateways: gatewaysFor(session),
      confirmations: new InteractiveConfirmations(),
      wait,
    });
    if (spinner.isSpinning) {
      spinner.stop();
    }

    printDestructionReport(target.stackName, result);
  } catch (error) {
    failCommand(error, spinner);
  }
}

function printDestructionReport(stackName: string, result: DestructionReport): void {
  switch (result.outcome) {
    case 'nothing-to-destroy':
      logger.success('Nothing to destroy');
      return;
    case 'declined':
      return;
    case 'destroyed':
      break;
  }

  if (result.stackDeleted) {
    logger.success(`Stack ${stackName} deleted`);
  }
  for (const bucket of result.bucketsDeleted) {
    logger.success(`Bucket ${bucket} deleted`);
  }
  if (result.parametersRemoved.length > 0) {
    logger.success(`Removed parameters: ${result.parametersRemoved.join(', ')}`);
  }

  if (result.retainedBuckets.length > 0) {
    logger.newline();
    logger.info('Retained buckets (Terraform state preserved):');
    for (const bucket of result.retainedBuckets) {
      logger.detail(bucket);
    }
    logger.info('The next deploy will offer to import them into the new stack.');
  }
}
