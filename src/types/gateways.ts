/**
 * Service boundaries between the lifecycle logic and AWS.
 *
 * The AWS implementations live in src/aws/; tests substitute an in-memory cloud.
 */

import type { ResourceFailure, ResourceRecord, StackRecord } from './stacks.js';

export interface StackParameter {
  key: string;
  value: string;
}

export interface StackRequest {
  stackName: string;
  templateBody: string;
  parameters: StackParameter[];
  tags: Array<{ Key: string; Value: string }>;
}

export interface ImportTarget {
  logicalId: string;
  resourceType: string;
  identifier: Record<string, string>;
}

export type UpdateResult = 'UPDATE_STARTED' | 'NO_CHANGES';

export interface StackGateway {
  describeStack(stackName: string): Promise<StackRecord | null>;
  listStackResources(stackName: string): Promise<ResourceRecord[]>;
  /** Failure events (resource status containing FAILED) newer than `since` */
  listFailureEvents(stackName: string, since?: Date): Promise<ResourceFailure[]>;
  createStack(request: StackRequest, options: { terminationProtection: boolean }): Promise<void>;
  updateStack(request: StackRequest): Promise<UpdateResult>;
  /** Creates an IMPORT change set and waits until it is ready to execute, or until `signal` aborts */
  createImportChangeSet(
    request: StackRequest,
    targets: ImportTarget[],
    changeSetName: string,
    signal?: AbortSignal
  ): Promise<void>;
  executeChangeSet(stackName: string, changeSetName: string): Promise<void>;
  deleteChangeSet(stackName: string, changeSetName: string): Promise<void>;
  setTerminationProtection(stackName: string, enabled: boolean): Promise<void>;
  deleteStack(stackName: string): Promise<void>;
}

export type BucketProbe = 'found' | 'not-found';

export interface ObjectVersionRef {
  key: string;
  versionId?: string;
  deleteMarker: boolean;
}

export interface VersionCursor {
  keyMarker?: string;
  versionIdMarker?: string;
}

export interface VersionPage {
  entries: ObjectVersionRef[];
  next?: VersionCursor;
}

export interface ObjectDeleteFailure {
  key: string;
  versionId?: string;
  message: string;
}

export interface BucketGateway {
  /** Resolves 'not-found' only on a definitive not-found signal; throws when inconclusive */
  probeBucket(bucketName: string): Promise<BucketProbe>;
  /** Names of the buckets located in the gateway's region */
  listBuckets(): Promise<string[]>;
  getBucketTags(bucketName: string): Promise<Record<string, string>>;
  listObjectVersions(bucketName: string, cursor?: VersionCursor): Promise<VersionPage>;
  /** Deletes a batch of versions; returns the entries the service refused */
  deleteObjectVersions(bucketName: string, entries: ObjectVersionRef[]): Promise<ObjectDeleteFailure[]>;
  deleteBucket(bucketName: string): Promise<void>;
}

export interface IdentityProviderGateway {
  listProviderArns(): Promise<string[]>;
  deleteProvider(arn: string): Promise<void>;
}

export interface LockTableGateway {
  /** Returns false when the table does not exist */
  disableDeletionProtection(tableName: string): Promise<boolean>;
}

export interface ParameterGateway {
  putParameter(name: string, value: string, description: string): Promise<void>;
  getParameter(name: string): Promise<string | null>;
  /** Returns false when the parameter did not exist */
  deleteParameter(name: string): Promise<boolean>;
}

export interface CloudGateways {
  stacks: StackGateway;
  buckets: BucketGateway;
  identityProviders: IdentityProviderGateway;
  lockTables: LockTableGateway;
  parameters: ParameterGateway;
}
