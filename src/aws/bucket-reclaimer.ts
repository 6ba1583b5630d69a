/**
 * Empties versioned S3 buckets and optionally deletes them
 *
 * Shared by the teardown-then-create deploy path and by destroy. Every object
 * version and delete marker is removed through batched DeleteObjects calls
 * spread over a small worker pool; a batch that fails is recorded and the
 * remaining batches carry on.
 */

import { chunk, runWithConcurrency } from '../utils/pool.js';
import { ensureNotCancelled, errorMessage } from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import * as logger from '../utils/logger.js';
import type { BucketGateway, ObjectDeleteFailure, ObjectVersionRef, VersionCursor } from '../types/gateways.js';

export const DEFAULT_RECLAIM_CONCURRENCY = 4;
export const DEFAULT_DELETE_BATCH_SIZE = 250;

export interface ReclaimOptions {
  /** Delete the bucket itself once it is empty */
  deleteBucket: boolean;
  signal?: AbortSignal;
  onProgress?: (bucketName: string, removed: number) => void;
}

export interface ReclaimResult {
  bucket: string;
  existed: boolean;
  versionsDeleted: number;
  markersDeleted: number;
  failures: ObjectDeleteFailure[];
  bucketDeleted: boolean;
}

export interface BucketReclaimerSettings {
  concurrency?: number;
  batchSize?: number;
  retry?: RetryOptions;
}

export class BucketReclaimer {
  private readonly concurrency: number;
  private readonly batchSize: number;
  private readonly retry: RetryOptions;

  constructor(
    private readonly buckets: BucketGateway,
    settings: BucketReclaimerSettings = {}
  ) {
    this.concurrency = settings.concurrency ?? DEFAULT_RECLAIM_CONCURRENCY;
    this.batchSize = settings.batchSize ?? DEFAULT_DELETE_BATCH_SIZE;
    this.retry = settings.retry ?? {};
  }

  /**
   * Remove every version and delete marker from `bucketName`.
   * A bucket that does not exist is a successful reclaim of zero objects.
   */
  async reclaim(bucketName: string, options: ReclaimOptions): Promise<ReclaimResult> {
    const result: ReclaimResult = {
      bucket: bucketName,
      existed: false,
      versionsDeleted: 0,
      markersDeleted: 0,
      failures: [],
      bucketDeleted: false,
    };

    const probe = await withRetry(`Check bucket ${bucketName}`, () => this.buckets.probeBucket(bucketName), this.retry);
    if (probe === 'not-found') {
      logger.verbose(`Bucket ${bucketName} does not exist, nothing to reclaim`);
      return result;
    }
    result.existed = true;

    logger.verbose(`Emptying bucket ${bucketName}...`);
    let cursor: VersionCursor | undefined;
    do {
      ensureNotCancelled(options.signal);
      const page = await withRetry(
        `List object versions in ${bucketName}`,
        () => this.buckets.listObjectVersions(bucketName, cursor),
        this.retry
      );

      await runWithConcurrency(chunk(page.entries, this.batchSize), this.concurrency, async batch => {
        ensureNotCancelled(options.signal);
        await this.deleteBatch(bucketName, batch, result);
        options.onProgress?.(bucketName, result.versionsDeleted + result.markersDeleted);
      });

      cursor = page.next;
    } while (cursor);

    logger.verbose(
      `Bucket ${bucketName}: removed ${result.versionsDeleted} version(s) and ${result.markersDeleted} delete marker(s)`
    );

    if (result.failures.length > 0) {
      logger.warn(`${result.failures.length} object version(s) in ${bucketName} could not be deleted`);
      return result;
    }

    if (options.deleteBucket) {
      ensureNotCancelled(options.signal);
      await this.buckets.deleteBucket(bucketName);
      result.bucketDeleted = true;
      logger.verbose(`Deleted bucket ${bucketName}`);
    }

    return result;
  }

  private async deleteBatch(bucketName: string, batch: ObjectVersionRef[], result: ReclaimResult): Promise<void> {
    let failures: ObjectDeleteFailure[];
    try {
      failures = await this.buckets.deleteObjectVersions(bucketName, batch);
    } catch (error) {
      const message = errorMessage(error);
      logger.verbose(`DeleteObjects batch of ${batch.length} in ${bucketName} failed: ${message}`);
      failures = batch.map(entry => ({ key: entry.key, versionId: entry.versionId, message }));
    }

    const failed = new Set(failures.map(f => versionKey(f.key, f.versionId)));
    for (const entry of batch) {
      if (failed.has(versionKey(entry.key, entry.versionId))) continue;
      if (entry.deleteMarker) {
        result.markersDeleted++;
      } else {
        result.versionsDeleted++;
      }
    }
    result.failures.push(...failures);
  }
}

function versionKey(key: string, versionId: string | undefined): string {
  return `${key}\u0000${versionId ?? 'null'}`;
}
