/**
 * Plumbing shared by every command: run context capture, wait flags,
 * interrupt handling and error reporting
 */

import type { Ora } from 'ora';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { createCloudGateways } from '../aws/clients.js';
import { captureCredentials, getAccountAlias, getCurrentIdentity, resolveRegion } from '../aws/credentials.js';
import { createPermissionProbes } from '../aws/permissions.js';
import {
  buildDeploymentParameters,
  loadEnvironmentFile,
  readEnvironmentSettings,
} from '../config/deployment-parameters.js';
import { GitRepository } from '../git/repository.js';
import { projectNameFromRepository, normalizeRepositoryUrl, stackNameForProject } from '../naming/index.js';
import { fetchLeafCertificateFingerprint } from '../oidc/certificate.js';
import { resolveIdentityProvider } from '../oidc/identity-provider.js';
import type { ResolveTarget } from '../orchestration/stack-state.js';
import type { StackWaiterOptions } from '../orchestration/stack-waiter.js';
import { validatePrerequisites, type PrerequisiteReport } from '../prerequisites/index.js';
import type { CurrentIdentity } from '../types/aws.js';
import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
  type DeploymentParameters,
  type GlobalOptions,
} from '../types/config.js';
import type { CloudGateways } from '../types/gateways.js';
import { FoundationError, InvalidConfigurationError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';

export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(error: unknown): number {
  return error instanceof FoundationError && error.category === 'CANCELLED' ? EXIT_INTERRUPTED : EXIT_FAILURE;
}

/**
 * Print the failure reason and next step, then exit with the matching code
 */
export function failCommand(error: unknown, spinner?: Ora): never {
  if (spinner?.isSpinning) {
    spinner.fail();
  }

  if (error instanceof FoundationError) {
    logger.error(error.message);
    if (error.hint) {
      logger.detail(error.hint);
    }
  } else {
    logger.error(`Unexpected error: ${errorMessage(error)}`);
    if (logger.isVerbose() && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
  process.exit(exitCodeFor(error));
}

let interruptController: AbortController | undefined;

/**
 * Signal aborted by the first Ctrl-C; a second one exits immediately
 */
export function interruptSignal(): AbortSignal {
  if (!interruptController) {
    const controller = new AbortController();
    process.on('SIGINT', () => {
      if (controller.signal.aborted) {
        process.exit(EXIT_INTERRUPTED);
      }
      logger.warn('Interrupted; stopping after the current step (press Ctrl-C again to exit now)');
      controller.abort();
    });
    interruptController = controller;
  }
  return interruptController.signal;
}

function parsePositive(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidConfigurationError(`${flag} must be a positive number, got "${value}"`);
  }
  return parsed;
}

/**
 * Wait settings from `--poll-interval <seconds>` and `--timeout <minutes>`
 */
export function waitOptionsFrom(
  options: { pollInterval?: string; timeout?: string },
  extra: Pick<StackWaiterOptions, 'signal' | 'onStatus'> = {}
): StackWaiterOptions {
  const pollSeconds = parsePositive(options.pollInterval, '--poll-interval');
  const timeoutMinutes = parsePositive(options.timeout, '--timeout');
  return {
    pollIntervalMs: pollSeconds !== undefined ? pollSeconds * 1000 : DEFAULT_POLL_INTERVAL_MS,
    timeoutMs: timeoutMinutes !== undefined ? timeoutMinutes * 60_000 : DEFAULT_WAIT_TIMEOUT_MS,
    ...extra,
  };
}

/**
 * Spinner text that tracks stack status while a wait is in progress
 */
export function statusReporter(spinner: Ora): NonNullable<StackWaiterOptions['onStatus']> {
  return (stackName, status) => {
    spinner.text = `${stackName}: ${status}`;
    if (!spinner.isSpinning) {
      spinner.start();
    }
  };
}

export interface AwsSession {
  region: string;
  credentials: AwsCredentialIdentity;
  identity: CurrentIdentity;
}

/**
 * Region, credentials and caller identity, resolved once per run
 */
export async function openAwsSession(options: GlobalOptions): Promise<AwsSession> {
  loadEnvironmentFile();
  const region = await resolveRegion(options.region);
  const credentials = await captureCredentials(region);
  const identity = await getCurrentIdentity(region, credentials);
  return { region, credentials, identity };
}

/**
 * Prerequisite checks; without a session the default credential chain is tried
 */
export async function runPrerequisites(region: string, session?: AwsSession): Promise<PrerequisiteReport> {
  return validatePrerequisites({
    git: new GitRepository(),
    authenticate: async () => {
      if (session) {
        return session.identity.arn;
      }
      const credentials = await captureCredentials(region);
      return (await getCurrentIdentity(region, credentials)).arn;
    },
    permissionProbes: createPermissionProbes(region, session?.credentials),
  });
}

export async function repositoryRemote(git: GitRepository = new GitRepository()): Promise<string> {
  const remote = await git.remoteUrl();
  if (!remote) {
    throw new InvalidConfigurationError('The repository has no "origin" remote to derive the project from');
  }
  return normalizeRepositoryUrl(remote);
}

/**
 * The identifiers needed to find the stack and its orphans, without OIDC lookups
 */
export async function resolveTarget(session: AwsSession): Promise<ResolveTarget> {
  const repository = await repositoryRemote();
  let project: string;
  let stackName: string;
  try {
    project = projectNameFromRepository(repository);
    stackName = stackNameForProject(project);
  } catch (error) {
    throw new InvalidConfigurationError(errorMessage(error));
  }
  return { stackName, project, accountId: session.identity.accountId, region: session.region };
}

export async function resolveDeploymentParameters(session: AwsSession): Promise<DeploymentParameters> {
  const repositoryUrl = await repositoryRemote();
  const identityProvider = await resolveIdentityProvider(repositoryUrl, fetchLeafCertificateFingerprint);
  const accountAlias = await getAccountAlias(session.region, session.credentials);

  return buildDeploymentParameters({
    identity: session.identity,
    accountAlias,
    region: session.region,
    repositoryUrl,
    identityProvider,
    settings: readEnvironmentSettings(),
  });
}

export function gatewaysFor(session: AwsSession): CloudGateways {
  return createCloudGateways(session.region, session.credentials);
}

export function printPrerequisiteFailures(report: PrerequisiteReport): void {
  for (const failure of report.failures) {
    logger.error(`${failure.message} [${failure.reason}]`);
  }
}
