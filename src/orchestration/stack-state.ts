/**
 * Stack state resolution
 *
 * Reads the managed stack and probes for foundation resources living outside
 * any stack, then collapses the raw CloudFormation status into a StackState.
 */

import { foundationResourceNames } from '../naming/index.js';
import { LOGICAL_IDS } from '../types/config.js';
import { StackState, type OrphanCandidate, type StackRecord, type StackResolution } from '../types/stacks.js';
import type { BucketGateway, StackGateway } from '../types/gateways.js';
import { errorMessage } from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import * as logger from '../utils/logger.js';

/**
 * Every CloudFormation stack status the classifier knows by name
 */
export const KNOWN_STACK_STATUSES = [
  'CREATE_IN_PROGRESS',
  'CREATE_FAILED',
  'CREATE_COMPLETE',
  'ROLLBACK_IN_PROGRESS',
  'ROLLBACK_FAILED',
  'ROLLBACK_COMPLETE',
  'DELETE_IN_PROGRESS',
  'DELETE_FAILED',
  'DELETE_COMPLETE',
  'UPDATE_IN_PROGRESS',
  'UPDATE_COMPLETE_CLEANUP_IN_PROGRESS',
  'UPDATE_COMPLETE',
  'UPDATE_FAILED',
  'UPDATE_ROLLBACK_IN_PROGRESS',
  'UPDATE_ROLLBACK_FAILED',
  'UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS',
  'UPDATE_ROLLBACK_COMPLETE',
  'REVIEW_IN_PROGRESS',
  'IMPORT_IN_PROGRESS',
  'IMPORT_COMPLETE',
  'IMPORT_ROLLBACK_IN_PROGRESS',
  'IMPORT_ROLLBACK_FAILED',
  'IMPORT_ROLLBACK_COMPLETE',
] as const;

export type KnownStackStatus = (typeof KNOWN_STACK_STATUSES)[number];

const STATUS_STATES: Record<KnownStackStatus, StackState> = {
  CREATE_IN_PROGRESS: StackState.BUSY,
  CREATE_FAILED: StackState.DEGRADED,
  CREATE_COMPLETE: StackState.HEALTHY,
  ROLLBACK_IN_PROGRESS: StackState.BUSY,
  ROLLBACK_FAILED: StackState.DEGRADED,
  ROLLBACK_COMPLETE: StackState.FAILED_INITIAL,
  DELETE_IN_PROGRESS: StackState.BUSY,
  DELETE_FAILED: StackState.STUCK,
  DELETE_COMPLETE: StackState.ABSENT,
  UPDATE_IN_PROGRESS: StackState.BUSY,
  UPDATE_COMPLETE_CLEANUP_IN_PROGRESS: StackState.BUSY,
  UPDATE_COMPLETE: StackState.HEALTHY,
  UPDATE_FAILED: StackState.DEGRADED,
  UPDATE_ROLLBACK_IN_PROGRESS: StackState.BUSY,
  UPDATE_ROLLBACK_FAILED: StackState.DEGRADED,
  UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS: StackState.BUSY,
  UPDATE_ROLLBACK_COMPLETE: StackState.FAILED_UPDATE,
  REVIEW_IN_PROGRESS: StackState.BUSY,
  IMPORT_IN_PROGRESS: StackState.BUSY,
  IMPORT_COMPLETE: StackState.HEALTHY,
  IMPORT_ROLLBACK_IN_PROGRESS: StackState.BUSY,
  IMPORT_ROLLBACK_FAILED: StackState.DEGRADED,
  IMPORT_ROLLBACK_COMPLETE: StackState.FAILED_UPDATE,
};

export function isKnownStackStatus(status: string): status is KnownStackStatus {
  return Object.prototype.hasOwnProperty.call(STATUS_STATES, status);
}

/**
 * Total over every string: unknown statuses are DEGRADED
 */
export function classifyStackStatus(status: string | undefined): StackState {
  if (status === undefined) {
    return StackState.ABSENT;
  }
  return isKnownStackStatus(status) ? STATUS_STATES[status] : StackState.DEGRADED;
}

/**
 * Tag whose value identifies the owning project on every managed resource
 */
export const PROJECT_TAG = 'Project';

export interface ResolveTarget {
  stackName: string;
  accountId: string;
  region: string;
  project: string;
}

export class StackStateResolver {
  constructor(
    private readonly stacks: StackGateway,
    private readonly buckets: BucketGateway,
    private readonly retry: RetryOptions = {}
  ) {}

  async resolve(target: ResolveTarget): Promise<StackResolution> {
    const { stackName } = target;
    logger.verbose(`Resolving state of stack ${stackName}...`);

    const stack = await withRetry(`Describe stack ${stackName}`, () => this.stacks.describeStack(stackName), this.retry);
    const state = classifyStackStatus(stack?.status);
    const live = state === StackState.ABSENT ? null : stack;

    const owned = live ? await this.ownedPhysicalIds(live) : new Set<string>();
    const orphans = await this.detectOrphans(target, state, owned);

    logger.verbose(`Stack ${stackName}: ${stack?.status ?? 'does not exist'} -> ${state}, ${orphans.length} orphan(s)`);

    return {
      stackName,
      state,
      rawStatus: live?.status,
      stack: live,
      orphans,
    };
  }

  private async ownedPhysicalIds(stack: StackRecord): Promise<Set<string>> {
    const owned = new Set(Object.values(stack.outputs));
    try {
      const resources = await withRetry(
        `List resources of ${stack.stackName}`,
        () => this.stacks.listStackResources(stack.stackName),
        this.retry
      );
      for (const resource of resources) {
        if (resource.physicalId) owned.add(resource.physicalId);
      }
    } catch (error) {
      logger.verbose(`Could not list resources of ${stack.stackName}, using outputs only: ${errorMessage(error)}`);
    }
    return owned;
  }

  private async detectOrphans(target: ResolveTarget, state: StackState, owned: Set<string>): Promise<OrphanCandidate[]> {
    const candidates = new Map<string, OrphanCandidate>();

    if (state === StackState.ABSENT) {
      const names = foundationResourceNames(target.accountId, target.region);
      const expected = [
        { physicalId: names.stateBucket, logicalId: LOGICAL_IDS.stateBucket },
        { physicalId: names.logBucket, logicalId: LOGICAL_IDS.logBucket },
      ];
      for (const { physicalId, logicalId } of expected) {
        if (await this.bucketExists(physicalId)) {
          candidates.set(physicalId, {
            physicalId,
            kind: 'bucket',
            confidence: 'name-match',
            logicalId,
            resourceType: 'AWS::S3::Bucket',
          });
        }
      }
    }

    for (const bucket of await this.projectTaggedBuckets(target, owned)) {
      const existing = candidates.get(bucket);
      if (existing) {
        existing.confidence = 'name-and-tag-match';
      } else {
        candidates.set(bucket, { physicalId: bucket, kind: 'bucket', confidence: 'tag-match' });
      }
    }

    return [...candidates.values()];
  }

  private async bucketExists(bucketName: string): Promise<boolean> {
    try {
      const probe = await withRetry(`Check bucket ${bucketName}`, () => this.buckets.probeBucket(bucketName), this.retry);
      return probe === 'found';
    } catch (error) {
      logger.verbose(`Existence check for ${bucketName} was inconclusive, treating as not found: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Buckets in this account and region whose Project tag names the current
   * project but which no live stack owns, whatever their names
   */
  private async projectTaggedBuckets(target: ResolveTarget, owned: Set<string>): Promise<string[]> {
    let names: string[];
    try {
      names = await withRetry('List buckets', () => this.buckets.listBuckets(), this.retry);
    } catch (error) {
      logger.verbose(`Bucket listing failed, skipping tag-based orphan detection: ${errorMessage(error)}`);
      return [];
    }

    const matches: string[] = [];
    for (const name of names.filter(candidate => !owned.has(candidate))) {
      try {
        const tags = await this.buckets.getBucketTags(name);
        if (tags[PROJECT_TAG] === target.project) {
          matches.push(name);
        }
      } catch (error) {
        logger.verbose(`Could not read tags of ${name}: ${errorMessage(error)}`);
      }
    }
    return matches;
  }
}
