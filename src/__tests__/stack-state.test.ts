import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  KNOWN_STACK_STATUSES,
  StackStateResolver,
  classifyStackStatus,
  type ResolveTarget,
} from '../orchestration/stack-state.js';
import { StackState } from '../types/stacks.js';
import { ACCOUNT_ID, FakeCloud, REGION } from './helpers/fake-cloud.js';

vi.mock('../utils/logger.js', () => ({
  verbose: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

const target: ResolveTarget = { stackName: 'infra', project: 'infra', accountId: ACCOUNT_ID, region: REGION };

describe('classifyStackStatus', () => {
  it('should map every in-progress status to BUSY', () => {
    const inProgress = KNOWN_STACK_STATUSES.filter(status => status.endsWith('_IN_PROGRESS'));
    expect(inProgress).toHaveLength(10);
    for (const status of inProgress) {
      expect(classifyStackStatus(status)).toBe(StackState.BUSY);
    }
  });

  it('should treat non-rollback completes as HEALTHY', () => {
    expect(classifyStackStatus('CREATE_COMPLETE')).toBe(StackState.HEALTHY);
    expect(classifyStackStatus('UPDATE_COMPLETE')).toBe(StackState.HEALTHY);
    expect(classifyStackStatus('IMPORT_COMPLETE')).toBe(StackState.HEALTHY);
  });

  it('should separate a failed first creation from a failed update', () => {
    expect(classifyStackStatus('ROLLBACK_COMPLETE')).toBe(StackState.FAILED_INITIAL);
    expect(classifyStackStatus('UPDATE_ROLLBACK_COMPLETE')).toBe(StackState.FAILED_UPDATE);
    expect(classifyStackStatus('IMPORT_ROLLBACK_COMPLETE')).toBe(StackState.FAILED_UPDATE);
  });

  it('should classify a failed deletion as STUCK and a finished one as ABSENT', () => {
    expect(classifyStackStatus('DELETE_FAILED')).toBe(StackState.STUCK);
    expect(classifyStackStatus('DELETE_COMPLETE')).toBe(StackState.ABSENT);
    expect(classifyStackStatus(undefined)).toBe(StackState.ABSENT);
  });

  it('should fall back to DEGRADED for other failures and unknown statuses', () => {
    expect(classifyStackStatus('UPDATE_ROLLBACK_FAILED')).toBe(StackState.DEGRADED);
    expect(classifyStackStatus('CREATE_FAILED')).toBe(StackState.DEGRADED);
    expect(classifyStackStatus('SOMETHING_NEW')).toBe(StackState.DEGRADED);
  });
});

describe('StackStateResolver', () => {
  let cloud: FakeCloud;
  let resolver: StackStateResolver;

  beforeEach(() => {
    cloud = new FakeCloud();
    resolver = new StackStateResolver(cloud.stacks, cloud.buckets, { sleep: async () => {} });
  });

  it('should report ABSENT with no orphans on a clean account', async () => {
    const resolution = await resolver.resolve(target);

    expect(resolution).toEqual({ stackName: 'infra', state: StackState.ABSENT, rawStatus: undefined, stack: null, orphans: [] });
  });

  it('should report exactly one name-match orphan for a leftover state bucket', async () => {
    cloud.seedBucket(cloud.names.stateBucket, { versions: 3 });

    const resolution = await resolver.resolve(target);

    expect(resolution.state).toBe(StackState.ABSENT);
    expect(resolution.orphans).toEqual([
      {
        physicalId: 'terraform-state-123456789012-us-east-1',
        kind: 'bucket',
        confidence: 'name-match',
        logicalId: 'TerraformStateBucket',
        resourceType: 'AWS::S3::Bucket',
      },
    ]);
  });

  it('should upgrade a name match that also carries the project tag', async () => {
    cloud.seedBucket(cloud.names.logBucket, { tags: { Project: 'infra' } });

    const resolution = await resolver.resolve(target);

    expect(resolution.orphans).toHaveLength(1);
    expect(resolution.orphans[0]).toMatchObject({ confidence: 'name-and-tag-match', logicalId: 'TerraformStateLogBucket' });
  });

  it('should report project-tagged buckets outside the naming convention without a template slot', async () => {
    cloud.seedBucket(`access-logs-${ACCOUNT_ID}-${REGION}`, { tags: { Project: 'infra' } });
    cloud.seedBucket(`access-logs-${ACCOUNT_ID}-eu-west-1`, { region: 'eu-west-1', tags: { Project: 'infra' } });
    cloud.seedBucket(`other-${ACCOUNT_ID}-${REGION}`, { tags: { Project: 'another' } });

    const resolution = await resolver.resolve(target);

    expect(resolution.orphans).toEqual([
      { physicalId: `access-logs-${ACCOUNT_ID}-${REGION}`, kind: 'bucket', confidence: 'tag-match' },
    ]);
  });

  it('should match the project tag on buckets whose names carry neither account nor region', async () => {
    cloud.seedBucket('infra-access-logs', { tags: { Project: 'infra' } });
    cloud.seedBucket('infra-archive', { region: 'eu-west-1', tags: { Project: 'infra' } });

    const resolution = await resolver.resolve(target);

    expect(resolution.orphans).toEqual([{ physicalId: 'infra-access-logs', kind: 'bucket', confidence: 'tag-match' }]);
  });

  it('should treat an inconclusive probe as not found without failing', async () => {
    cloud.seedBucket(cloud.names.stateBucket);
    cloud.probeErrors.set(cloud.names.stateBucket, Object.assign(new Error('Forbidden'), { name: 'AccessDenied' }));
    cloud.seedBucket(cloud.names.logBucket);

    const resolution = await resolver.resolve(target);

    expect(resolution.orphans.map(o => o.physicalId)).toEqual([cloud.names.logBucket]);
  });

  it('should not report resources the live stack owns', async () => {
    cloud.seedBucket(cloud.names.stateBucket, { tags: { Project: 'infra' } });
    cloud.seedStack('infra', {
      status: 'UPDATE_COMPLETE',
      resources: [
        {
          logicalId: 'TerraformStateBucket',
          physicalId: cloud.names.stateBucket,
          resourceType: 'AWS::S3::Bucket',
          kind: 'bucket',
          status: 'CREATE_COMPLETE',
          retained: false,
        },
      ],
    });

    const resolution = await resolver.resolve(target);

    expect(resolution.state).toBe(StackState.HEALTHY);
    expect(resolution.rawStatus).toBe('UPDATE_COMPLETE');
    expect(resolution.orphans).toEqual([]);
  });

  it('should not probe names for a stack that exists', async () => {
    cloud.seedBucket(cloud.names.stateBucket);
    cloud.seedStack('infra', { status: 'ROLLBACK_COMPLETE' });

    const resolution = await resolver.resolve(target);

    expect(resolution.state).toBe(StackState.FAILED_INITIAL);
    expect(resolution.orphans).toEqual([]);
  });

  it('should retry a throttled describe and then succeed', async () => {
    const describe = vi.spyOn(cloud.stacks, 'describeStack');
    describe.mockRejectedValueOnce(Object.assign(new Error('Rate exceeded'), { name: 'Throttling' }));

    const resolution = await resolver.resolve(target);

    expect(resolution.state).toBe(StackState.ABSENT);
    expect(describe).toHaveBeenCalledTimes(2);
  });
});
