import { describe, it, expect } from 'vitest';
import {
  deploymentRolesRoleName,
  foundationResourceNames,
  normalizeRepositoryUrl,
  projectNameFromRepository,
  repositoryOwner,
  stackNameForProject,
  truncateName,
} from '../naming/index.js';

describe('normalizeRepositoryUrl', () => {
  it('should rewrite scp-style remotes to https', () => {
    expect(normalizeRepositoryUrl('git@github.com:acme/infra.git')).toBe('https://github.com/acme/infra.git');
  });

  it('should rewrite ssh:// remotes and drop the port', () => {
    expect(normalizeRepositoryUrl('ssh://git@gitlab.com:2222/group/infra.git')).toBe('https://gitlab.com/group/infra.git');
  });

  it('should leave https remotes untouched', () => {
    expect(normalizeRepositoryUrl(' https://bitbucket.org/team/infra ')).toBe('https://bitbucket.org/team/infra');
  });
});

describe('projectNameFromRepository', () => {
  it('should strip the .git suffix and trailing slashes', () => {
    expect(projectNameFromRepository('https://github.com/acme/infra.git')).toBe('infra');
    expect(projectNameFromRepository('https://github.com/acme/infra/')).toBe('infra');
  });
});

describe('repositoryOwner', () => {
  it('should return the first path segment', () => {
    expect(repositoryOwner('git@github.com:acme/infra.git')).toBe('acme');
  });

  it('should throw when there is no owner segment', () => {
    expect(() => repositoryOwner('https://github.com/infra')).toThrow(/repository owner/);
  });
});

describe('foundationResourceNames', () => {
  it('should follow <purpose>-<account>-<region>', () => {
    expect(foundationResourceNames('123456789012', 'eu-west-1')).toEqual({
      stateBucket: 'terraform-state-123456789012-eu-west-1',
      logBucket: 'terraform-state-logs-123456789012-eu-west-1',
      lockTable: 'terraform-state-locks',
    });
  });
});

describe('stackNameForProject', () => {
  it('should keep valid names as they are', () => {
    expect(stackNameForProject('infra-core')).toBe('infra-core');
  });

  it('should replace characters CloudFormation rejects and strip a leading non-letter', () => {
    expect(stackNameForProject('1st_infra.repo')).toBe('st-infra-repo');
  });

  it('should throw when nothing usable remains', () => {
    expect(() => stackNameForProject('123')).toThrow(/does not yield a valid stack name/);
  });
});

describe('deploymentRolesRoleName', () => {
  it('should suffix the normalized project name', () => {
    expect(deploymentRolesRoleName('Infra_Core')).toBe('infra-core-deployment-roles');
  });

  it('should stay within the IAM role name limit', () => {
    expect(deploymentRolesRoleName('p'.repeat(80))).toHaveLength(64);
  });
});

describe('truncateName', () => {
  it('should not change names within the limit', () => {
    expect(truncateName('short', 10)).toBe('short');
  });

  it('should cut and append a separator and hash', () => {
    const truncated = truncateName('a'.repeat(20), 12, 4);
    expect(truncated).toHaveLength(12);
    expect(truncated.startsWith('aaaaaaa-')).toBe(true);
  });
});
