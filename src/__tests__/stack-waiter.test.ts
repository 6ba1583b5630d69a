import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StackWaiter, abortableSleep, type StackWaiterOptions } from '../orchestration/stack-waiter.js';
import { OperationCancelledError, StackOperationError, StackTimeoutError } from '../utils/errors.js';
import { FakeCloud } from './helpers/fake-cloud.js';

vi.mock('../utils/logger.js', () => ({
  verbose: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

const since = new Date('2026-05-01T00:00:00Z');

describe('StackWaiter', () => {
  let cloud: FakeCloud;
  let options: StackWaiterOptions;

  beforeEach(() => {
    cloud = new FakeCloud();
    options = {
      pollIntervalMs: 5_000,
      timeoutMs: 60_000,
      now: () => 0,
      sleep: vi.fn().mockResolvedValue(undefined),
    };
  });

  it('should poll until a success status and report each status change', async () => {
    cloud.seedStack('infra', { status: 'CREATE_IN_PROGRESS' });
    const stack = cloud.stackMap.get('infra');
    stack?.pending.push('CREATE_IN_PROGRESS', 'CREATE_IN_PROGRESS', 'CREATE_COMPLETE');
    const onStatus = vi.fn();

    const result = await new StackWaiter(cloud.stacks, { ...options, onStatus }).waitFor({
      stackName: 'infra',
      success: ['CREATE_COMPLETE'],
      since,
    });

    expect(result?.status).toBe('CREATE_COMPLETE');
    expect(onStatus.mock.calls).toEqual([
      ['infra', 'CREATE_IN_PROGRESS'],
      ['infra', 'CREATE_COMPLETE'],
    ]);
    expect(options.sleep).toHaveBeenCalledTimes(2);
    expect(options.sleep).toHaveBeenCalledWith(5_000, undefined);
  });

  it('should name the failing sub-resources of a terminal failure', async () => {
    cloud.seedStack('infra', {
      status: 'ROLLBACK_COMPLETE',
      events: [
        { logicalId: 'TerraformStateBucket', resourceType: 'AWS::S3::Bucket', status: 'CREATE_FAILED', reason: 'bucket already exists' },
        { logicalId: 'infra', resourceType: 'AWS::CloudFormation::Stack', status: 'ROLLBACK_FAILED', reason: 'stack level' },
        { logicalId: 'TerraformStateBucket', resourceType: 'AWS::S3::Bucket', status: 'DELETE_FAILED', reason: 'later symptom' },
      ],
      resources: [
        {
          logicalId: 'DeploymentRolesRole',
          physicalId: 'infra-deployment-roles',
          resourceType: 'AWS::IAM::Role',
          kind: 'role',
          status: 'CREATE_FAILED',
          statusReason: 'Access denied',
          retained: false,
        },
        {
          logicalId: 'TerraformLockTable',
          physicalId: 'terraform-state-locks',
          resourceType: 'AWS::DynamoDB::Table',
          kind: 'table',
          status: 'DELETE_COMPLETE',
          retained: false,
        },
      ],
    });

    const error = await new StackWaiter(cloud.stacks, options)
      .waitFor({ stackName: 'infra', success: ['CREATE_COMPLETE'], since })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StackOperationError);
    expect(error).toMatchObject({
      status: 'ROLLBACK_COMPLETE',
      failures: [
        { logicalId: 'TerraformStateBucket', resourceType: 'AWS::S3::Bucket', status: 'CREATE_FAILED', reason: 'bucket already exists' },
        { logicalId: 'DeploymentRolesRole', resourceType: 'AWS::IAM::Role', status: 'CREATE_FAILED', reason: 'Access denied' },
      ],
    });
    expect(error).toHaveProperty(
      'message',
      "Stack 'infra' ended in ROLLBACK_COMPLETE. Failed resources: TerraformStateBucket (AWS::S3::Bucket) CREATE_FAILED: bucket already exists; DeploymentRolesRole (AWS::IAM::Role) CREATE_FAILED: Access denied"
    );
  });

  it('should report missing per-resource detail as its own condition', async () => {
    cloud.seedStack('infra', { status: 'UPDATE_ROLLBACK_FAILED' });

    await expect(
      new StackWaiter(cloud.stacks, options).waitFor({ stackName: 'infra', success: ['UPDATE_COMPLETE'], since })
    ).rejects.toThrow("Stack 'infra' ended in UPDATE_ROLLBACK_FAILED. Per-resource failure detail unavailable.");
  });

  it('should time out distinctly from a failure status', async () => {
    cloud.seedStack('infra', { status: 'UPDATE_IN_PROGRESS' });
    let clock = 0;
    const now = (): number => (clock += 5_000);

    const error = await new StackWaiter(cloud.stacks, { ...options, timeoutMs: 12_000, now })
      .waitFor({ stackName: 'infra', success: ['UPDATE_COMPLETE'], since })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StackTimeoutError);
    expect(error).toMatchObject({ category: 'TIMEOUT', lastStatus: 'UPDATE_IN_PROGRESS' });
    expect(error).toHaveProperty(
      'message',
      "Timed out after 12s waiting for stack 'infra' (last status: UPDATE_IN_PROGRESS)."
    );
  });

  it('should stop promptly on cancellation, reporting the last status', async () => {
    cloud.seedStack('infra', { status: 'UPDATE_IN_PROGRESS' });
    const controller = new AbortController();
    const sleep = vi.fn(async () => {
      controller.abort();
    });

    const error = await new StackWaiter(cloud.stacks, { ...options, sleep, signal: controller.signal })
      .waitFor({ stackName: 'infra', success: ['UPDATE_COMPLETE'], since })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toHaveProperty('message', 'Cancelled by user (last observed status: UPDATE_IN_PROGRESS).');
    expect(cloud.describeCalls).toBe(1);
  });

  it('should accept a vanished stack only when deletion was expected', async () => {
    const waiter = new StackWaiter(cloud.stacks, options);

    await expect(
      waiter.waitFor({ stackName: 'infra', success: ['DELETE_COMPLETE'], since, absentIsSuccess: true })
    ).resolves.toBeNull();
    await expect(waiter.waitFor({ stackName: 'infra', success: ['CREATE_COMPLETE'], since })).rejects.toMatchObject({
      status: 'DOES_NOT_EXIST',
    });
  });
});

describe('abortableSleep', () => {
  it('should resolve early when the signal fires', async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(60_000, controller.signal);

    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
  });
});
