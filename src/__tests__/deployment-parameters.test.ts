import { describe, it, expect, vi } from 'vitest';
import {
  buildDeploymentParameters,
  readEnvironmentSettings,
  type ParameterInputs,
} from '../config/deployment-parameters.js';
import { InvalidConfigurationError } from '../utils/errors.js';

vi.mock('../utils/logger.js', () => ({
  verbose: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

function inputs(overrides: Partial<ParameterInputs> = {}): ParameterInputs {
  return {
    identity: { accountId: '123456789012', arn: 'arn:aws:iam::123456789012:user/ci', userId: 'AIDAEXAMPLE' },
    accountAlias: 'test-alias',
    region: 'eu-west-1',
    repositoryUrl: 'git@github.com:acme/infra.git',
    identityProvider: {
      kind: 'github',
      issuerUrl: 'https://token.actions.githubusercontent.com',
      audience: 'sts.amazonaws.com',
      thumbprints: ['6938fd4d98bab03faadb97b34396831e3780aea1'],
    },
    settings: readEnvironmentSettings({}),
    ...overrides,
  };
}

describe('readEnvironmentSettings', () => {
  it('should fall back to defaults for unset or blank variables', () => {
    expect(readEnvironmentSettings({ TAG_OWNER: '   ' })).toEqual({
      tags: { costCenter: 'default', environment: 'prod', owner: 'unassigned', managedBy: 'CloudFormation' },
      targetRepository: 'terraform-aws-deployment-roles',
    });
  });

  it('should take trimmed values from the environment', () => {
    const settings = readEnvironmentSettings({
      TAG_COST_CENTER: ' cc-42 ',
      TAG_ENVIRONMENT: 'staging',
      TAG_OWNER: 'platform-team',
      TARGET_DEPLOYMENT_ROLES_REPOSITORY: 'other-org/roles',
    });

    expect(settings).toEqual({
      tags: { costCenter: 'cc-42', environment: 'staging', owner: 'platform-team', managedBy: 'CloudFormation' },
      targetRepository: 'other-org/roles',
    });
  });
});

describe('buildDeploymentParameters', () => {
  it('should derive project, stack and target repository from an scp-style remote', () => {
    const params = buildDeploymentParameters(inputs());

    expect(params).toMatchObject({
      accountId: '123456789012',
      region: 'eu-west-1',
      deploymentRole: 'arn:aws:iam::123456789012:user/ci',
      repository: 'https://github.com/acme/infra.git',
      project: 'infra',
      stackName: 'infra',
      targetRepository: 'acme/terraform-aws-deployment-roles',
    });
  });

  it('should keep an explicit org/repo target as given', () => {
    const settings = readEnvironmentSettings({ TARGET_DEPLOYMENT_ROLES_REPOSITORY: 'other-org/roles' });

    expect(buildDeploymentParameters(inputs({ settings })).targetRepository).toBe('other-org/roles');
  });

  it('should return a deeply frozen value', () => {
    const params = buildDeploymentParameters(inputs());

    expect(Object.isFrozen(params)).toBe(true);
    expect(Object.isFrozen(params.tags)).toBe(true);
    expect(Object.isFrozen(params.identityProvider)).toBe(true);
    expect(Object.isFrozen(params.identityProvider.thumbprints)).toBe(true);
  });

  it('should make a stack name that starts with a letter', () => {
    const params = buildDeploymentParameters(inputs({ repositoryUrl: 'https://gitlab.com/acme/9lives.git' }));

    expect(params.project).toBe('9lives');
    expect(params.stackName).toBe('lives');
  });

  it('should reject an invalid account id or region', () => {
    expect(() =>
      buildDeploymentParameters(inputs({ identity: { accountId: '12345', arn: 'arn:aws:iam::12345:user/ci', userId: 'x' } }))
    ).toThrow(InvalidConfigurationError);
    expect(() => buildDeploymentParameters(inputs({ region: 'mars-1' }))).toThrow(InvalidConfigurationError);
  });

  it('should reject a remote without an owner segment', () => {
    expect(() => buildDeploymentParameters(inputs({ repositoryUrl: 'https://github.com/' }))).toThrow(
      'Cannot derive the repository owner from URL: https://github.com/'
    );
  });

  it('should name the tag whose value AWS would reject', () => {
    const settings = readEnvironmentSettings({ TAG_OWNER: 'team#1' });

    expect(() => buildDeploymentParameters(inputs({ settings }))).toThrow('Invalid value for tag Owner: "team#1"');
  });
});
