/**
 * Deploy command implementation
 *
 * Brings the repository's foundation stack to its desired state, whatever
 * state the previous run left it in, then publishes its identifiers.
 */

import ora from 'ora';
import { PROVIDER_DISPLAY_NAMES } from '../oidc/identity-provider.js';
import { deployFoundation, type DeploymentReport } from '../orchestration/deployment.js';
import { PARAMETER_PATHS, type DeployOptions } from '../types/config.js';
import type { OrphanDisposition } from '../types/stacks.js';
import { InvalidConfigurationError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';
import { InteractiveConfirmations } from '../utils/prompts.js';
import { assertReady } from '../prerequisites/index.js';
import {
  failCommand,
  gatewaysFor,
  interruptSignal,
  openAwsSession,
  printPrerequisiteFailures,
  resolveDeploymentParameters,
  runPrerequisites,
  statusReporter,
  waitOptionsFrom,
} from './shared.js';

export function parseOrphanDisposition(value: string | undefined): OrphanDisposition | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === 'import' || value === 'discard') {
    return value;
  }
  throw new InvalidConfigurationError(`--on-orphans must be "import" or "discard", got "${value}"`);
}

export async function deployCommand(options: DeployOptions): Promise<void> {
  const spinner = ora();
  try {
    if (options.verbose) {
      setVerbose(true);
    }

    logger.header('Terraform Foundation Deploy');

    const disposition = parseOrphanDisposition(options.onOrphans);
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

    spinner.start('Resolving deployment parameters...');
    const params = await resolveDeploymentParameters(session);
    spinner.succeed(`Stack ${params.stackName} in account ${params.accountId} (${PROVIDER_DISPLAY_NAMES[params.identityProvider.kind]} OIDC)`);

    const result = await deployFoundation({
      params,
      gateways: gatewaysFor(session),
      confirmations: new InteractiveConfirmations(disposition),
      wait,
      disposition,
    });
    if (spinner.isSpinning) {
      spinner.stop();
    }

    printDeploymentReport(result);
  } catch (error) {
    failCommand(error, spinner);
  }
}

const OUTCOME_MESSAGES: Record<DeploymentReport['outcome'], string> = {
  created: 'created',
  updated: 'updated',
  imported: 'created from imported resources',
  'no-changes': 'already up to date (no changes)',
};

function printDeploymentReport(result: DeploymentReport): void {
  logger.success(`Stack ${result.stackName} ${OUTCOME_MESSAGES[result.outcome]}`);
  logger.newline();

  logger.table([['Output', 'Value'], ...Object.entries(result.outputs).map(([key, value]) => [key, value])]);
  logger.newline();

  logger.info('Published parameters:');
  for (const path of Object.values(PARAMETER_PATHS)) {
    logger.detail(`${path}${result.publishedParameters.includes(path) ? '' : ' (not published)'}`);
  }

  for (const reclaim of result.reclaimed.filter(r => r.existed)) {
    logger.verbose(
      `${reclaim.bucket}: ${reclaim.versionsDeleted} version(s), ${reclaim.markersDeleted} delete marker(s) removed`
    );
  }
}
