/**
 * S3 bucket operations used by orphan detection and bucket reclaim
 */

import {
  S3Client,
  HeadBucketCommand,
  ListBucketsCommand,
  GetBucketTaggingCommand,
  ListObjectVersionsCommand,
  DeleteObjectsCommand,
  DeleteBucketCommand,
  NotFound,
  NoSuchBucket,
} from '@aws-sdk/client-s3';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import type {
  BucketGateway,
  BucketProbe,
  ObjectDeleteFailure,
  ObjectVersionRef,
  VersionCursor,
  VersionPage,
} from '../types/gateways.js';

const VERSION_PAGE_SIZE = 1000;

function isNotFoundError(error: unknown): boolean {
  if (error instanceof NotFound || error instanceof NoSuchBucket) {
    return true;
  }
  return error instanceof Error && error.name === 'NotFound';
}

export class AwsBucketGateway implements BucketGateway {
  private readonly client: S3Client;

  constructor(
    private readonly region: string,
    credentials?: AwsCredentialIdentity
  ) {
    this.client = new S3Client({ region, credentials });
  }

  async probeBucket(bucketName: string): Promise<BucketProbe> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucketName }));
      return 'found';
    } catch (error) {
      if (isNotFoundError(error)) {
        return 'not-found';
      }
      throw error;
    }
  }

  async listBuckets(): Promise<string[]> {
    const names: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListBucketsCommand({ BucketRegion: this.region, ContinuationToken: continuationToken })
      );
      for (const bucket of response.Buckets ?? []) {
        if (bucket.Name) names.push(bucket.Name);
      }
      continuationToken = response.ContinuationToken;
    } while (continuationToken);

    return names;
  }

  async getBucketTags(bucketName: string): Promise<Record<string, string>> {
    try {
      const response = await this.client.send(new GetBucketTaggingCommand({ Bucket: bucketName }));
      const tags: Record<string, string> = {};
      for (const tag of response.TagSet ?? []) {
        if (tag.Key !== undefined && tag.Value !== undefined) {
          tags[tag.Key] = tag.Value;
        }
      }
      return tags;
    } catch (error) {
      if (error instanceof Error && error.name === 'NoSuchTagSet') {
        return {};
      }
      throw error;
    }
  }

  async listObjectVersions(bucketName: string, cursor?: VersionCursor): Promise<VersionPage> {
    const response = await this.client.send(
      new ListObjectVersionsCommand({
        Bucket: bucketName,
        KeyMarker: cursor?.keyMarker,
        VersionIdMarker: cursor?.versionIdMarker,
        MaxKeys: VERSION_PAGE_SIZE,
      })
    );

    const entries: ObjectVersionRef[] = [];
    for (const version of response.Versions ?? []) {
      if (version.Key) entries.push({ key: version.Key, versionId: version.VersionId, deleteMarker: false });
    }
    for (const marker of response.DeleteMarkers ?? []) {
      if (marker.Key) entries.push({ key: marker.Key, versionId: marker.VersionId, deleteMarker: true });
    }

    return {
      entries,
      next: response.IsTruncated
        ? { keyMarker: response.NextKeyMarker, versionIdMarker: response.NextVersionIdMarker }
        : undefined,
    };
  }

  async deleteObjectVersions(bucketName: string, entries: ObjectVersionRef[]): Promise<ObjectDeleteFailure[]> {
    if (entries.length === 0) {
      return [];
    }

    const response = await this.client.send(
      new DeleteObjectsCommand({
        Bucket: bucketName,
        Delete: {
          Objects: entries.map(entry => ({ Key: entry.key, VersionId: entry.versionId })),
          Quiet: true,
        },
      })
    );

    return (response.Errors ?? []).map(failure => ({
      key: failure.Key ?? '(unknown key)',
      versionId: failure.VersionId,
      message: `${failure.Code ?? 'Error'}: ${failure.Message ?? 'delete refused'}`,
    }));
  }

  async deleteBucket(bucketName: string): Promise<void> {
    await this.client.send(new DeleteBucketCommand({ Bucket: bucketName }));
  }
}
