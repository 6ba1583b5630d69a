/**
 * Assembly of the immutable per-run DeploymentParameters
 */

import { config as loadDotenv } from 'dotenv';
import {
  normalizeRepositoryUrl,
  projectNameFromRepository,
  repositoryOwner,
  stackNameForProject,
} from '../naming/index.js';
import type { CurrentIdentity } from '../types/aws.js';
import {
  DEFAULT_COST_CENTER,
  DEFAULT_ENVIRONMENT,
  DEFAULT_OWNER,
  DEFAULT_TARGET_ROLES_REPOSITORY,
  MANAGED_BY,
  type DeploymentParameters,
  type IdentityProviderConfig,
  type ResourceTags,
} from '../types/config.js';
import { InvalidConfigurationError, errorMessage } from '../utils/errors.js';
import { validateAwsAccountId, validateAwsRegion, validateTagValue } from '../utils/validation.js';
import * as logger from '../utils/logger.js';

export interface EnvironmentSettings {
  tags: ResourceTags;
  /** Repository name, or `<org>/<repo>` to point outside the current owner */
  targetRepository: string;
}

/**
 * Load `.env` from the working directory. Variables already set in the real
 * environment win.
 */
export function loadEnvironmentFile(path: string = '.env'): void {
  const result = loadDotenv({ path, override: false });
  if (result.error) {
    logger.verbose(`No environment file loaded from ${path}: ${errorMessage(result.error)}`);
  } else {
    logger.verbose(`Loaded environment from ${path}`);
  }
}

export function readEnvironmentSettings(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
  const pick = (name: string, fallback: string): string => {
    const value = env[name]?.trim();
    return value ? value : fallback;
  };

  return {
    tags: {
      costCenter: pick('TAG_COST_CENTER', DEFAULT_COST_CENTER),
      environment: pick('TAG_ENVIRONMENT', DEFAULT_ENVIRONMENT),
      owner: pick('TAG_OWNER', DEFAULT_OWNER),
      managedBy: MANAGED_BY,
    },
    targetRepository: pick('TARGET_DEPLOYMENT_ROLES_REPOSITORY', DEFAULT_TARGET_ROLES_REPOSITORY),
  };
}

export interface ParameterInputs {
  identity: CurrentIdentity;
  accountAlias: string;
  region: string;
  repositoryUrl: string;
  identityProvider: IdentityProviderConfig;
  settings: EnvironmentSettings;
}

/**
 * Validate the captured inputs and freeze them into the parameters every
 * transition reads from.
 *
 * @throws InvalidConfigurationError when a value would be rejected by AWS
 */
export function buildDeploymentParameters(inputs: ParameterInputs): DeploymentParameters {
  const { identity, accountAlias, region, settings } = inputs;

  validateAwsAccountId(identity.accountId);
  validateAwsRegion(region);

  const repository = normalizeRepositoryUrl(inputs.repositoryUrl);
  let project: string;
  let owner: string;
  let stackName: string;
  try {
    project = projectNameFromRepository(repository);
    owner = repositoryOwner(repository);
    stackName = stackNameForProject(project);
  } catch (error) {
    throw new InvalidConfigurationError(errorMessage(error));
  }

  const targetRepository = settings.targetRepository.includes('/')
    ? settings.targetRepository
    : `${owner}/${settings.targetRepository}`;

  const tags = Object.freeze({ ...settings.tags });
  const tagValues: Array<[string, string]> = [
    ['AccountAlias', accountAlias],
    ['CostCenter', tags.costCenter],
    ['DeploymentRole', identity.arn],
    ['Environment', tags.environment],
    ['Owner', tags.owner],
    ['Project', project],
    ['Repository', repository],
  ];
  for (const [name, value] of tagValues) {
    validateTagValue(name, value);
  }

  return Object.freeze({
    accountId: identity.accountId,
    accountAlias,
    region,
    deploymentRole: identity.arn,
    repository,
    project,
    stackName,
    tags,
    targetRepository,
    identityProvider: Object.freeze({
      ...inputs.identityProvider,
      thumbprints: Object.freeze([...inputs.identityProvider.thumbprints]),
    }),
  });
}
