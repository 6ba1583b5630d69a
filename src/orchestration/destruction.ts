/**
 * Destroy flow
 *
 * Stack deletion is routine because the buckets are retained; deleting bucket
 * contents is not, so it sits behind its own confirmation. Running destroy on
 * a clean account is a no-op that touches nothing.
 */

import { BucketReclaimer, type ReclaimResult } from '../aws/bucket-reclaimer.js';
import { PUBLISHED_VALUES, unpublishFoundationParameters } from '../aws/ssm.js';
import type { CloudGateways } from '../types/gateways.js';
import { StackState, type ConfirmationProvider, type ResourceRecord } from '../types/stacks.js';
import {
  IrrecoverableStateError,
  OperationCancelledError,
  PartialFailureError,
  StackOperationError,
  StateConflictError,
  describeFailures,
  ensureNotCancelled,
  errorMessage,
} from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import * as logger from '../utils/logger.js';
import { StackStateResolver, type ResolveTarget } from './stack-state.js';
import { StackWaiter, type StackWaiterOptions } from './stack-waiter.js';

export interface DestructionContext {
  target: ResolveTarget;
  gateways: CloudGateways;
  confirmations: ConfirmationProvider;
  wait: StackWaiterOptions;
  reclaimer?: BucketReclaimer;
  retry?: RetryOptions;
  clock?: () => Date;
}

export type DestructionOutcome = 'nothing-to-destroy' | 'declined' | 'destroyed';

export interface DestructionReport {
  outcome: DestructionOutcome;
  stackDeleted: boolean;
  bucketsDeleted: string[];
  retainedBuckets: string[];
  reclaimed: ReclaimResult[];
  parametersRemoved: string[];
}

function emptyReport(outcome: DestructionOutcome): DestructionReport {
  return {
    outcome,
    stackDeleted: false,
    bucketsDeleted: [],
    retainedBuckets: [],
    reclaimed: [],
    parametersRemoved: [],
  };
}

export async function destroyFoundation(context: DestructionContext): Promise<DestructionReport> {
  const { target, gateways, confirmations } = context;
  const { stackName } = target;
  const signal = context.wait.signal;
  const clock = context.clock ?? (() => new Date());
  const reclaimer = context.reclaimer ?? new BucketReclaimer(gateways.buckets, { retry: context.retry });

  const resolver = new StackStateResolver(gateways.stacks, gateways.buckets, context.retry);
  const resolution = await resolver.resolve(target);
  const stack = resolution.stack;
  const orphanBuckets = resolution.orphans
    .filter(orphan => orphan.kind === 'bucket' && orphan.logicalId !== undefined)
    .map(orphan => orphan.physicalId);

  if (!stack && orphanBuckets.length === 0) {
    logger.info(`Stack '${stackName}' does not exist and no orphaned buckets were found`);
    return emptyReport('nothing-to-destroy');
  }

  if (resolution.state === StackState.BUSY) {
    throw new StateConflictError(stackName, resolution.rawStatus ?? 'unknown');
  }

  let resources: ResourceRecord[] = [];
  if (stack) {
    resources = await withRetry(
      `List resources of ${stackName}`,
      () => gateways.stacks.listStackResources(stackName),
      context.retry
    );
  }
  const buckets = stack
    ? resources.flatMap(r => (r.kind === 'bucket' && r.physicalId ? [r.physicalId] : []))
    : orphanBuckets;
  const lockTable = resources.find(r => r.kind === 'table' && r.physicalId)?.physicalId;

  const proceed = await confirmations.confirmDestroy({
    stackName,
    stackExists: stack !== null,
    buckets,
    lockTable,
    parameters: stack ? PUBLISHED_VALUES.map(value => value.path) : [],
  });
  if (!proceed) {
    logger.info('Destruction cancelled');
    return emptyReport('declined');
  }

  const destroyBuckets = buckets.length > 0 && (await confirmations.confirmBucketDeletion(buckets));
  logger.info(destroyBuckets ? 'Buckets will be destroyed' : 'Buckets will be retained');

  const report = emptyReport('destroyed');
  const failures: string[] = [];
  const recordReclaim = (result: ReclaimResult): void => {
    report.reclaimed.push(result);
    if (result.bucketDeleted) report.bucketsDeleted.push(result.bucket);
    for (const failure of result.failures) {
      failures.push(`${result.bucket}/${failure.key}: ${failure.message}`);
    }
  };
  // A bucket that refuses deletion is reported with the rest; the remaining ones still go
  const reclaimAndDelete = async (bucket: string): Promise<ReclaimResult | undefined> => {
    try {
      return await reclaimer.reclaim(bucket, { deleteBucket: true, signal });
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      logger.warn(`Could not delete bucket ${bucket}: ${errorMessage(error)}`);
      failures.push(`${bucket}: ${errorMessage(error)}`);
      return undefined;
    }
  };

  if (!stack) {
    if (destroyBuckets) {
      for (const bucket of buckets) {
        logger.info(`Deleting orphaned bucket ${bucket}...`);
        const result = await reclaimAndDelete(bucket);
        if (result) recordReclaim(result);
      }
    }
    return finish(report, buckets, failures);
  }

  ensureNotCancelled(signal);
  if (stack.terminationProtection) {
    await gateways.stacks.setTerminationProtection(stackName, false);
    logger.verbose('Termination protection disabled');
  }

  if (lockTable) {
    ensureNotCancelled(signal);
    if (await gateways.lockTables.disableDeletionProtection(lockTable)) {
      logger.verbose(`Deletion protection disabled on ${lockTable}`);
    }
  }

  if (destroyBuckets) {
    for (const bucket of buckets) {
      logger.info(`Emptying bucket ${bucket}...`);
      // Failures surface from the final pass after the stack is gone
      report.reclaimed.push(await reclaimer.reclaim(bucket, { deleteBucket: false, signal }));
    }
  }

  ensureNotCancelled(signal);
  logger.info(`Deleting stack ${stackName}...`);
  const since = clock();
  await gateways.stacks.deleteStack(stackName);
  try {
    await new StackWaiter(gateways.stacks, context.wait).waitFor({
      stackName,
      success: ['DELETE_COMPLETE'],
      since,
      absentIsSuccess: true,
    });
  } catch (error) {
    if (error instanceof StackOperationError && error.status === 'DELETE_FAILED') {
      const stuck = error.failures.filter(f => f.status === 'DELETE_FAILED');
      throw new IrrecoverableStateError(
        stackName,
        `Stack '${stackName}' could not be deleted. ${describeFailures(stuck.length > 0 ? stuck : error.failures)}`,
        'Delete or detach the listed resources manually, then run destroy again.'
      );
    }
    throw error;
  }
  report.stackDeleted = true;

  // Retained buckets outlive the stack as independent objects
  if (destroyBuckets) {
    for (const bucket of buckets) {
      const result = await reclaimAndDelete(bucket);
      if (!result) continue;
      if (result.existed) {
        recordReclaim(result);
      } else {
        report.bucketsDeleted.push(bucket);
      }
    }
  }

  ensureNotCancelled(signal);
  report.parametersRemoved = await unpublishFoundationParameters(gateways.parameters);

  return finish(report, buckets, failures);
}

function finish(report: DestructionReport, buckets: string[], failures: string[]): DestructionReport {
  report.retainedBuckets = buckets.filter(bucket => !report.bucketsDeleted.includes(bucket));
  if (failures.length > 0) {
    throw new PartialFailureError(
      'Some buckets could not be fully removed',
      failures,
      `Buckets kept: ${report.retainedBuckets.join(', ')}. Remove the listed objects or buckets, then run destroy again.`
    );
  }
  return report;
}
