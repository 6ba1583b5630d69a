/**
 * Stack, resource and transition types for the foundation stack lifecycle
 */

import type { ErrorCategory } from '../utils/errors.js';

/**
 * Collapsed view of a raw CloudFormation status
 */
export enum StackState {
  ABSENT = 'ABSENT',
  HEALTHY = 'HEALTHY',
  FAILED_INITIAL = 'FAILED_INITIAL',
  FAILED_UPDATE = 'FAILED_UPDATE',
  BUSY = 'BUSY',
  STUCK = 'STUCK',
  DEGRADED = 'DEGRADED',
}

export type ResourceKind = 'bucket' | 'table' | 'identity-provider' | 'role' | 'parameter' | 'other';

export interface StackRecord {
  stackName: string;
  stackId?: string;
  status: string;
  outputs: Record<string, string>;
  terminationProtection: boolean;
  creationTime?: Date;
}

export interface ResourceRecord {
  logicalId: string;
  physicalId?: string;
  resourceType: string;
  kind: ResourceKind;
  status: string;
  statusReason?: string;
  /** True when a retain policy kept the resource after the stack let go of it */
  retained: boolean;
}

export type OrphanConfidence = 'name-match' | 'tag-match' | 'name-and-tag-match';

export interface OrphanCandidate {
  physicalId: string;
  kind: ResourceKind;
  confidence: OrphanConfidence;
  /** Template slot the resource can be imported into, when there is one */
  logicalId?: string;
  resourceType?: string;
}

export interface StackResolution {
  stackName: string;
  state: StackState;
  /** Raw status, undefined when the stack does not exist */
  rawStatus?: string;
  stack: StackRecord | null;
  orphans: OrphanCandidate[];
}

/**
 * A sub-resource that failed during a stack operation
 */
export interface ResourceFailure {
  logicalId: string;
  resourceType?: string;
  status: string;
  reason?: string;
}

export type OrphanDisposition = 'import' | 'discard';

export type TransitionDecision =
  | { type: 'CREATE' }
  | { type: 'UPDATE'; bestEffort: boolean }
  | { type: 'IMPORT'; candidates: OrphanCandidate[] }
  | { type: 'DISCARD_THEN_CREATE'; candidates: OrphanCandidate[] }
  | { type: 'TEARDOWN_THEN_CREATE' }
  | { type: 'CONFIRM_ORPHANS'; candidates: OrphanCandidate[] }
  | { type: 'FAIL'; category: ErrorCategory; reason: string };

export type DeploymentOutcome = 'created' | 'updated' | 'no-changes' | 'imported';

/**
 * What destroy is about to remove, shown before the first confirmation
 */
export interface DestroySummary {
  stackName: string;
  stackExists: boolean;
  buckets: string[];
  lockTable?: string;
  parameters: string[];
}

/**
 * The points where a run waits on the operator
 */
export interface ConfirmationProvider {
  chooseOrphanDisposition(candidates: OrphanCandidate[]): Promise<OrphanDisposition>;
  /** First stage: literal confirmation that destruction should proceed at all */
  confirmDestroy(summary: DestroySummary): Promise<boolean>;
  /** Second stage: authorizes irreversible deletion of versioned buckets */
  confirmBucketDeletion(buckets: string[]): Promise<boolean>;
}
