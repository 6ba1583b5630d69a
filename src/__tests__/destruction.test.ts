import { describe, it, expect, vi, beforeEach } from 'vitest';
import { deployFoundation } from '../orchestration/deployment.js';
import { destroyFoundation, type DestructionContext } from '../orchestration/destruction.js';
import { PARAMETER_PATHS } from '../types/config.js';
import { IrrecoverableStateError, PartialFailureError, StateConflictError } from '../utils/errors.js';
import { ACCOUNT_ID, FakeCloud, REGION } from './helpers/fake-cloud.js';
import { fastWait, scriptedConfirmations, testParameters } from './helpers/fixtures.js';

vi.mock('../utils/logger.js', () => ({
  verbose: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

const UNPUBLISHES = ['deleteParameter', 'deleteParameter', 'deleteParameter', 'deleteParameter'];

describe('destroyFoundation', () => {
  let cloud: FakeCloud;

  const context = (confirmations: DestructionContext['confirmations']): DestructionContext => ({
    target: { stackName: 'infra', accountId: ACCOUNT_ID, region: REGION, project: 'infra' },
    gateways: cloud.gateways(),
    confirmations,
    wait: fastWait(),
    retry: { sleep: async () => {} },
    clock: () => new Date('2026-06-01T00:00:00Z'),
  });

  const deployed = async (): Promise<void> => {
    await deployFoundation({
      params: testParameters(),
      gateways: cloud.gateways(),
      confirmations: scriptedConfirmations(),
      wait: fastWait(),
      retry: { sleep: async () => {} },
    });
    cloud.mutations.splice(0);
  };

  beforeEach(() => {
    cloud = new FakeCloud();
  });

  it('should touch nothing and ask nothing on a clean account', async () => {
    const confirmations = scriptedConfirmations({ destroy: true, deleteBuckets: true });

    const report = await destroyFoundation(context(confirmations));

    expect(report).toEqual({
      outcome: 'nothing-to-destroy',
      stackDeleted: false,
      bucketsDeleted: [],
      retainedBuckets: [],
      reclaimed: [],
      parametersRemoved: [],
    });
    expect(confirmations.confirmDestroy).not.toHaveBeenCalled();
    expect(cloud.mutations).toEqual([]);
  });

  it('should stop when the operator declines', async () => {
    await deployed();
    const confirmations = scriptedConfirmations({ destroy: false });

    const report = await destroyFoundation(context(confirmations));

    expect(report.outcome).toBe('declined');
    expect(confirmations.confirmDestroy).toHaveBeenCalledWith({
      stackName: 'infra',
      stackExists: true,
      buckets: [cloud.names.logBucket, cloud.names.stateBucket],
      lockTable: 'terraform-state-locks',
      parameters: Object.values(PARAMETER_PATHS),
    });
    expect(confirmations.confirmBucketDeletion).not.toHaveBeenCalled();
    expect(cloud.mutations).toEqual([]);
    expect(cloud.stackStatus('infra')).toBe('CREATE_COMPLETE');
  });

  it('should delete the stack, its buckets and the published parameters when both prompts are accepted', async () => {
    await deployed();
    cloud.seedBucket(cloud.names.stateBucket, { versions: 2 });
    const confirmations = scriptedConfirmations({ destroy: true, deleteBuckets: true });

    const report = await destroyFoundation(context(confirmations));

    expect(cloud.mutations).toEqual([
      'setTerminationProtection',
      'disableDeletionProtection',
      'deleteObjectVersions',
      'deleteStack',
      'deleteBucket',
      'deleteBucket',
      ...UNPUBLISHES,
    ]);
    expect(report).toMatchObject({
      outcome: 'destroyed',
      stackDeleted: true,
      bucketsDeleted: [cloud.names.logBucket, cloud.names.stateBucket],
      retainedBuckets: [],
      parametersRemoved: Object.values(PARAMETER_PATHS),
    });
    expect(cloud.stackMap.size).toBe(0);
    expect(cloud.bucketMap.size).toBe(0);
    expect(cloud.lockTableMap.size).toBe(0);
    expect(cloud.providerArns.size).toBe(0);
    expect(cloud.parameterMap.size).toBe(0);
  });

  it('should retain the buckets when bucket deletion is declined, ready to be imported again', async () => {
    await deployed();
    cloud.seedBucket(cloud.names.stateBucket, { versions: 2 });
    const confirmations = scriptedConfirmations({ destroy: true, deleteBuckets: false });

    const report = await destroyFoundation(context(confirmations));

    expect(confirmations.confirmBucketDeletion).toHaveBeenCalledWith([cloud.names.logBucket, cloud.names.stateBucket]);
    expect(cloud.mutations).toEqual([
      'setTerminationProtection',
      'disableDeletionProtection',
      'deleteStack',
      ...UNPUBLISHES,
    ]);
    expect(report).toMatchObject({
      outcome: 'destroyed',
      stackDeleted: true,
      bucketsDeleted: [],
      retainedBuckets: [cloud.names.logBucket, cloud.names.stateBucket],
    });

    const redeploy = await deployFoundation({
      params: testParameters(),
      gateways: cloud.gateways(),
      confirmations: scriptedConfirmations(),
      disposition: 'import',
      wait: fastWait(),
      retry: { sleep: async () => {} },
    });
    expect(redeploy.outcome).toBe('imported');
    expect(cloud.bucketMap.get(cloud.names.stateBucket)?.entries).toHaveLength(2);
  });

  it('should keep going past a bucket that refuses deletion and report it at the end', async () => {
    await deployed();
    cloud.lateDeliveries.add(cloud.names.logBucket);
    const confirmations = scriptedConfirmations({ destroy: true, deleteBuckets: true });

    const error = await destroyFoundation(context(confirmations)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialFailureError);
    expect(error).toMatchObject({
      items: [`${cloud.names.logBucket}: BucketNotEmpty: ${cloud.names.logBucket}`],
      hint: `Buckets kept: ${cloud.names.logBucket}. Remove the listed objects or buckets, then run destroy again.`,
    });
    expect(cloud.mutations).toEqual([
      'setTerminationProtection',
      'disableDeletionProtection',
      'deleteStack',
      'deleteBucket',
      ...UNPUBLISHES,
    ]);
    expect([...cloud.bucketMap.keys()]).toEqual([cloud.names.logBucket]);
    expect(cloud.parameterMap.size).toBe(0);
  });

  it('should name the resources that blocked stack deletion', async () => {
    await deployed();
    cloud.scriptNext('delete', {
      status: 'DELETE_FAILED',
      failures: [
        { logicalId: 'TerraformLockTable', resourceType: 'AWS::DynamoDB::Table', status: 'DELETE_FAILED', reason: 'Table is in use' },
      ],
    });
    const confirmations = scriptedConfirmations({ destroy: true, deleteBuckets: false });

    const error = await destroyFoundation(context(confirmations)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IrrecoverableStateError);
    expect(error).toHaveProperty(
      'message',
      "Stack 'infra' could not be deleted. Failed resources: TerraformLockTable (AWS::DynamoDB::Table) DELETE_FAILED: Table is in use"
    );
    expect(cloud.mutations).toEqual(['setTerminationProtection', 'disableDeletionProtection', 'deleteStack']);
    expect(cloud.parameterMap.size).toBe(4);
  });

  it('should delete orphaned buckets left without a stack', async () => {
    cloud.seedBucket(cloud.names.stateBucket, { versions: 1 });
    cloud.seedBucket(cloud.names.logBucket);
    const confirmations = scriptedConfirmations({ destroy: true, deleteBuckets: true });

    const report = await destroyFoundation(context(confirmations));

    expect(confirmations.confirmDestroy).toHaveBeenCalledWith({
      stackName: 'infra',
      stackExists: false,
      buckets: [cloud.names.stateBucket, cloud.names.logBucket],
      lockTable: undefined,
      parameters: [],
    });
    expect(cloud.mutations).toEqual(['deleteObjectVersions', 'deleteBucket', 'deleteBucket']);
    expect(report).toMatchObject({
      outcome: 'destroyed',
      stackDeleted: false,
      bucketsDeleted: [cloud.names.stateBucket, cloud.names.logBucket],
      retainedBuckets: [],
    });
  });

  it('should refuse while a stack operation is in progress', async () => {
    cloud.seedStack('infra', { status: 'UPDATE_IN_PROGRESS' });
    const confirmations = scriptedConfirmations({ destroy: true });

    await expect(destroyFoundation(context(confirmations))).rejects.toBeInstanceOf(StateConflictError);
    expect(confirmations.confirmDestroy).not.toHaveBeenCalled();
    expect(cloud.mutations).toEqual([]);
  });
});
