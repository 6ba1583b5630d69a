import { vi } from 'vitest';
import type { DeploymentParameters } from '../../types/config.js';
import type { StackWaiterOptions } from '../../orchestration/stack-waiter.js';
import type { ConfirmationProvider, OrphanDisposition } from '../../types/stacks.js';
import { ACCOUNT_ID, REGION } from './fake-cloud.js';

export const GITHUB_PROVIDER_ARN = `arn:aws:iam::${ACCOUNT_ID}:oidc-provider/token.actions.githubusercontent.com`;

export function testParameters(overrides: Partial<DeploymentParameters> = {}): DeploymentParameters {
  return {
    accountId: ACCOUNT_ID,
    accountAlias: 'test-alias',
    region: REGION,
    deploymentRole: `arn:aws:iam::${ACCOUNT_ID}:user/ci`,
    repository: 'https://github.com/acme/infra.git',
    project: 'infra',
    stackName: 'infra',
    tags: { costCenter: 'default', environment: 'prod', owner: 'unassigned', managedBy: 'CloudFormation' },
    targetRepository: 'acme/terraform-aws-deployment-roles',
    identityProvider: {
      kind: 'github',
      issuerUrl: 'https://token.actions.githubusercontent.com',
      audience: 'sts.amazonaws.com',
      thumbprints: ['6938fd4d98bab03faadb97b34396831e3780aea1', '1c58a3a8518e8759bf075b76b750d4f2df264fcd'],
    },
    ...overrides,
  };
}

export function fastWait(overrides: Partial<StackWaiterOptions> = {}): StackWaiterOptions {
  return {
    pollIntervalMs: 1,
    timeoutMs: 60_000,
    now: () => 0,
    sleep: async () => {},
    retry: { sleep: async () => {} },
    ...overrides,
  };
}

export interface ScriptedAnswers {
  disposition?: OrphanDisposition;
  destroy?: boolean;
  deleteBuckets?: boolean;
}

/**
 * Confirmation provider that answers from a script and records each question
 */
export function scriptedConfirmations(answers: ScriptedAnswers = {}) {
  const confirmations = {
    chooseOrphanDisposition: vi.fn(async (): Promise<OrphanDisposition> => answers.disposition ?? 'import'),
    confirmDestroy: vi.fn(async (): Promise<boolean> => answers.destroy ?? false),
    confirmBucketDeletion: vi.fn(async (): Promise<boolean> => answers.deleteBuckets ?? false),
  } satisfies ConfirmationProvider;
  return confirmations;
}
