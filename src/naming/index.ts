/**
 * Resource naming for the foundation stack
 *
 * AWS Resource Limits:
 * - S3 bucket names: 3-63 characters, lowercase, alphanumeric and hyphens
 * - IAM role names: 1-64 characters
 * - CloudFormation stack names: 1-128 characters, alphanumeric and hyphens, starting with a letter
 *
 * Orphan detection relies on these names being derivable from account id and
 * region alone, so they must stay stable across releases.
 */

const IAM_ROLE_MAX_LENGTH = 64;
const CF_STACK_MAX_LENGTH = 128;

export const STATE_BUCKET_PURPOSE = 'terraform-state';
export const LOG_BUCKET_PURPOSE = 'terraform-state-logs';
export const LOCK_TABLE_NAME = 'terraform-state-locks';

/**
 * Normalize a name for use in resource identifiers
 * - Lowercase
 * - Replace non-alphanumeric with hyphens
 * - Remove consecutive hyphens
 * - Remove leading/trailing hyphens
 */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * Generate a short hash from a string for uniqueness
 */
function generateShortHash(input: string, length: number = 6): string {
  let hash = 0;
  for (let i = 0; i < input.length; i++) {
    const char = input.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash = hash & hash; // Convert to 32-bit integer
  }
  return Math.abs(hash).toString(36).substring(0, length).padStart(length, '0');
}

/**
 * Truncate a name to a maximum length, adding a hash suffix when it had to be cut
 */
export function truncateName(name: string, maxLength: number, hashLength: number = 6): string {
  if (name.length <= maxLength) {
    return name;
  }

  const availableLength = maxLength - hashLength - 1; // -1 for separator
  const hash = generateShortHash(name, hashLength);

  return `${name.substring(0, availableLength)}-${hash}`;
}

// ============================================================================
// S3 Bucket Names
// ============================================================================

/**
 * Regional bucket name
 * Format: <purpose>-<account_id>-<region>
 */
export function regionalBucketName(purpose: string, accountId: string, region: string): string {
  return `${purpose}-${accountId}-${region}`;
}

export function stateBucketName(accountId: string, region: string): string {
  return regionalBucketName(STATE_BUCKET_PURPOSE, accountId, region);
}

export function logBucketName(accountId: string, region: string): string {
  return regionalBucketName(LOG_BUCKET_PURPOSE, accountId, region);
}

export interface FoundationResourceNames {
  stateBucket: string;
  logBucket: string;
  lockTable: string;
}

export function foundationResourceNames(accountId: string, region: string): FoundationResourceNames {
  return {
    stateBucket: stateBucketName(accountId, region),
    logBucket: logBucketName(accountId, region),
    lockTable: LOCK_TABLE_NAME,
  };
}

// ============================================================================
// Repository-derived names
// ============================================================================

/**
 * Rewrite scp-style and ssh:// remotes to https, keeping any .git suffix.
 * e.g. "git@github.com:acme/infra.git" -> "https://github.com/acme/infra.git"
 */
export function normalizeRepositoryUrl(remoteUrl: string): string {
  const trimmed = remoteUrl.trim();

  const scp = /^[\w.-]+@([^:/]+):(.+)$/.exec(trimmed);
  if (scp) {
    return `https://${scp[1]}/${scp[2].replace(/^\/+/, '')}`;
  }

  const ssh = /^ssh:\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/(.+)$/.exec(trimmed);
  if (ssh) {
    return `https://${ssh[1]}/${ssh[2]}`;
  }

  return trimmed;
}

/**
 * Repository base name without the .git suffix
 */
export function projectNameFromRepository(repositoryUrl: string): string {
  const path = repositoryUrl.replace(/\/+$/, '');
  const base = path.substring(path.lastIndexOf('/') + 1).replace(/\.git$/, '');
  if (!base) {
    throw new Error(`Cannot derive a project name from repository URL: ${repositoryUrl}`);
  }
  return base;
}

/**
 * First path segment of the repository (organization, group or workspace)
 */
export function repositoryOwner(repositoryUrl: string): string {
  const match = /^https?:\/\/[^/]+\/([^/]+)\//.exec(normalizeRepositoryUrl(repositoryUrl));
  if (!match) {
    throw new Error(`Cannot derive the repository owner from URL: ${repositoryUrl}`);
  }
  return match[1];
}

// ============================================================================
// CloudFormation Stack and IAM Names
// ============================================================================

/**
 * Stack name equals the repository base name, made CloudFormation-safe
 */
export function stackNameForProject(project: string): string {
  const safe = project.replace(/[^a-zA-Z0-9-]/g, '-').replace(/^[^a-zA-Z]+/, '');
  if (!safe) {
    throw new Error(`Project name '${project}' does not yield a valid stack name`);
  }
  return truncateName(safe, CF_STACK_MAX_LENGTH);
}

/**
 * Role assumed by the deployment-roles repository pipeline
 * Format: <project>-deployment-roles
 */
export function deploymentRolesRoleName(project: string): string {
  return truncateName(`${normalizeName(project)}-deployment-roles`, IAM_ROLE_MAX_LENGTH);
}
