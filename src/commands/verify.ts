/**
 * Verify command: run every prerequisite check and report each result
 */

import ora from 'ora';
import { resolveRegion } from '../aws/credentials.js';
import { loadEnvironmentFile } from '../config/deployment-parameters.js';
import type { GlobalOptions } from '../types/config.js';
import { EXIT_FAILURE, failCommand, printPrerequisiteFailures, runPrerequisites } from './shared.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';

export async function verifyCommand(options: GlobalOptions): Promise<void> {
  const spinner = ora();
  try {
    if (options.verbose) {
      setVerbose(true);
    }

    loadEnvironmentFile();
    const region = await resolveRegion(options.region);

    spinner.start(`Checking prerequisites (${region})...`);
    const report = await runPrerequisites(region);
    spinner.stop();

    logger.table([
      ['Check', 'Result', 'Detail'],
      ...report.checks.map(check => [
        check.name,
        check.passed ? 'pass' : 'FAIL',
        check.detail ?? '',
      ]),
    ]);
    logger.newline();

    if (!report.ready) {
      printPrerequisiteFailures(report);
      process.exit(EXIT_FAILURE);
    }
    logger.success('All prerequisites satisfied');
  } catch (error) {
    failCommand(error, spinner);
  }
}
