/**
 * CLI configuration, deployment parameters and well-known constants
 */

export interface GlobalOptions {
  verbose?: boolean;
  region?: string;
}

export interface DeployOptions extends GlobalOptions {
  onOrphans?: string;
  pollInterval?: string;
  timeout?: string;
}

export interface DestroyOptions extends GlobalOptions {
  pollInterval?: string;
  timeout?: string;
}

export type IdentityProviderKind = 'github' | 'gitlab' | 'bitbucket';

/**
 * OIDC federation settings derived from the repository remote.
 * Computed on every run; never persisted outside the stack itself.
 */
export interface IdentityProviderConfig {
  readonly kind: IdentityProviderKind;
  readonly issuerUrl: string;
  readonly audience: string;
  readonly thumbprints: readonly string[];
}

export interface ResourceTags {
  readonly costCenter: string;
  readonly environment: string;
  readonly owner: string;
  readonly managedBy: string;
}

/**
 * Everything a transition needs, captured once at process start.
 */
export interface DeploymentParameters {
  readonly accountId: string;
  readonly accountAlias: string;
  readonly region: string;
  /** ARN of the caller running the deployment */
  readonly deploymentRole: string;
  readonly repository: string;
  readonly project: string;
  readonly stackName: string;
  readonly tags: ResourceTags;
  /** `<org>/<repo>` of the repository allowed to assume the deployment-roles role */
  readonly targetRepository: string;
  readonly identityProvider: IdentityProviderConfig;
}

/**
 * Timing knobs for blocking waits on stack operations
 */
export interface WaitSettings {
  pollIntervalMs: number;
  timeoutMs: number;
}

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_WAIT_TIMEOUT_MS = 30 * 60 * 1000;

export const DEFAULT_COST_CENTER = 'default';
export const DEFAULT_ENVIRONMENT = 'prod';
export const DEFAULT_OWNER = 'unassigned';
export const MANAGED_BY = 'CloudFormation';
export const DEFAULT_TARGET_ROLES_REPOSITORY = 'terraform-aws-deployment-roles';

/**
 * Parameter Store paths read by downstream Terraform projects
 */
export const PARAMETER_PATHS = {
  stateBucket: '/terraform/foundation/s3-state-bucket',
  lockTable: '/terraform/foundation/dynamodb-lock-table',
  oidcProvider: '/terraform/foundation/oidc-provider',
  deploymentRolesRoleArn: '/terraform/foundation/deployment-roles-role-arn',
} as const;

/**
 * Stack output keys, relied upon by exact name
 */
export const STACK_OUTPUTS = {
  stateBucket: 'TerraformStateBucket',
  logBucket: 'TerraformStateLogBucket',
  lockTable: 'TerraformLockTable',
  oidcProviderArn: 'OidcProviderArn',
  deploymentRolesRoleArn: 'DeploymentRolesRoleArn',
} as const;

/**
 * Logical ids of the template resources that may be adopted through an import
 */
export const LOGICAL_IDS = {
  stateBucket: 'TerraformStateBucket',
  logBucket: 'TerraformStateLogBucket',
  lockTable: 'TerraformLockTable',
  oidcProvider: 'OidcProvider',
  deploymentRolesRole: 'DeploymentRolesRole',
} as const;
