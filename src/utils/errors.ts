/**
 * Custom error types for better error handling
 */

import type { ResourceFailure } from '../types/stacks.js';

export type ErrorCategory =
  | 'PRECONDITION'
  | 'STATE_CONFLICT'
  | 'UNSUPPORTED_PROVIDER'
  | 'TRANSIENT_API'
  | 'PARTIAL_FAILURE'
  | 'IRRECOVERABLE'
  | 'TIMEOUT'
  | 'CANCELLED';

export class FoundationError extends Error {
  readonly category: ErrorCategory;
  /** Smallest next diagnostic step for the operator */
  readonly hint?: string;

  constructor(category: ErrorCategory, message: string, hint?: string) {
    super(message);
    this.name = 'FoundationError';
    this.category = category;
    this.hint = hint;
  }
}

export class PreconditionError extends FoundationError {
  readonly reasons: string[];

  constructor(reasons: string[]) {
    super(
      'PRECONDITION',
      `Prerequisites not satisfied: ${reasons.join(', ')}`,
      'Run `tf-foundation verify` for details and fix the listed issues before retrying.'
    );
    this.name = 'PreconditionError';
    this.reasons = reasons;
  }
}

export class NoCredentialsError extends FoundationError {
  constructor() {
    super(
      'PRECONDITION',
      'No valid AWS credentials found.',
      'Configure credentials with `aws configure` or set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY.'
    );
    this.name = 'NoCredentialsError';
  }
}

export class InvalidConfigurationError extends FoundationError {
  constructor(message: string) {
    super('PRECONDITION', message);
    this.name = 'InvalidConfigurationError';
  }
}

export class StateConflictError extends FoundationError {
  readonly stackName: string;
  readonly status: string;

  constructor(stackName: string, status: string) {
    super(
      'STATE_CONFLICT',
      `Stack '${stackName}' has an operation in progress (${status}).`,
      'Wait for the current operation to finish, then retry.'
    );
    this.name = 'StateConflictError';
    this.stackName = stackName;
    this.status = status;
  }
}

export class UnsupportedProviderError extends FoundationError {
  readonly repositoryUrl: string;

  constructor(repositoryUrl: string, detail?: string) {
    super(
      'UNSUPPORTED_PROVIDER',
      detail
        ? `Cannot derive OIDC settings from ${repositoryUrl}: ${detail}`
        : `Unsupported git provider for ${repositoryUrl}. Supported hosts: github.com, gitlab.com, bitbucket.org.`,
      'For self-hosted or other providers, configure OIDC federation manually.'
    );
    this.name = 'UnsupportedProviderError';
    this.repositoryUrl = repositoryUrl;
  }
}

export class TransientApiError extends FoundationError {
  readonly operation: string;
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: string) {
    super(
      'TRANSIENT_API',
      `${operation} kept failing after ${attempts} attempt(s): ${cause}`,
      'Check network connectivity and AWS service health, then retry.'
    );
    this.name = 'TransientApiError';
    this.operation = operation;
    this.attempts = attempts;
  }
}

/**
 * A multi-resource operation in which some sub-resources failed.
 * `failures` is empty when the control plane offered no per-resource detail.
 */
export class StackOperationError extends FoundationError {
  readonly stackName: string;
  readonly status: string;
  readonly failures: ResourceFailure[];

  constructor(stackName: string, status: string, failures: ResourceFailure[], category: ErrorCategory = 'PARTIAL_FAILURE') {
    super(
      category,
      `Stack '${stackName}' ended in ${status}. ${describeFailures(failures)}`,
      failures.length > 0
        ? `Inspect the failure reason of ${failures[0].logicalId} in the CloudFormation console.`
        : `Inspect the events of stack '${stackName}' in the CloudFormation console.`
    );
    this.name = 'StackOperationError';
    this.stackName = stackName;
    this.status = status;
    this.failures = failures;
  }
}

export class PartialFailureError extends FoundationError {
  readonly items: string[];

  constructor(message: string, items: string[], hint?: string) {
    super('PARTIAL_FAILURE', `${message}${items.length > 0 ? `: ${items.join('; ')}` : ''}`, hint);
    this.name = 'PartialFailureError';
    this.items = items;
  }
}

export class IrrecoverableStateError extends FoundationError {
  readonly stackName: string;

  constructor(stackName: string, message: string, hint: string) {
    super('IRRECOVERABLE', message, hint);
    this.name = 'IrrecoverableStateError';
    this.stackName = stackName;
  }
}

export class StackTimeoutError extends FoundationError {
  readonly stackName: string;
  readonly lastStatus?: string;

  constructor(stackName: string, timeoutMs: number, lastStatus?: string) {
    super(
      'TIMEOUT',
      `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for stack '${stackName}' (last status: ${lastStatus ?? 'unknown'}).`,
      'The operation may still be running; check the stack status before retrying.'
    );
    this.name = 'StackTimeoutError';
    this.stackName = stackName;
    this.lastStatus = lastStatus;
  }
}

export class OperationCancelledError extends FoundationError {
  readonly lastStatus?: string;

  constructor(lastStatus?: string) {
    super(
      'CANCELLED',
      lastStatus ? `Cancelled by user (last observed status: ${lastStatus}).` : 'Cancelled by user.',
      'Any operation already submitted keeps running; check the stack status before retrying.'
    );
    this.name = 'OperationCancelledError';
    this.lastStatus = lastStatus;
  }
}

export function describeFailures(failures: ResourceFailure[]): string {
  if (failures.length === 0) {
    return 'Per-resource failure detail unavailable.';
  }
  const parts = failures.map(f =>
    `${f.logicalId}${f.resourceType ? ` (${f.resourceType})` : ''} ${f.status}${f.reason ? `: ${f.reason}` : ''}`
  );
  return `Failed resources: ${parts.join('; ')}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Throws OperationCancelledError when the signal has fired
 */
export function ensureNotCancelled(signal: AbortSignal | undefined, lastStatus?: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(lastStatus);
  }
}
