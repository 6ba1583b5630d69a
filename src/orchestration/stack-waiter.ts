/**
 * Polling wait for stack operations
 *
 * Each poll only reads. A terminal status outside the expected set is turned
 * into a StackOperationError carrying the failed sub-resources.
 */

import type { StackGateway } from '../types/gateways.js';
import type { ResourceFailure, StackRecord } from '../types/stacks.js';
import type { WaitSettings } from '../types/config.js';
import { StackOperationError, StackTimeoutError, ensureNotCancelled, errorMessage } from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import * as logger from '../utils/logger.js';

export interface StackWaiterOptions extends WaitSettings {
  signal?: AbortSignal;
  retry?: RetryOptions;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onStatus?: (stackName: string, status: string) => void;
}

export interface WaitTarget {
  stackName: string;
  /** Statuses that end the wait successfully */
  success: readonly string[];
  /** When the operation was submitted; older events are ignored */
  since: Date;
  /** The stack disappearing counts as success (deletions) */
  absentIsSuccess?: boolean;
}

/**
 * Sleep that resolves early when the signal fires
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export function isInProgress(status: string): boolean {
  return status.endsWith('_IN_PROGRESS');
}

export class StackWaiter {
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly stacks: StackGateway,
    private readonly options: StackWaiterOptions
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
  }

  /**
   * Block until the stack reaches a terminal status.
   * Resolves the final record, or null when the stack is gone and that was expected.
   */
  async waitFor(target: WaitTarget): Promise<StackRecord | null> {
    const { stackName } = target;
    const { pollIntervalMs, timeoutMs, signal } = this.options;
    const startedAt = this.now();
    let lastStatus: string | undefined;

    logger.verbose(`[${stackName}] Waiting for ${target.success.join(' or ')}...`);

    while (true) {
      ensureNotCancelled(signal, lastStatus);

      const stack = await withRetry(
        `Describe stack ${stackName}`,
        () => this.stacks.describeStack(stackName),
        this.options.retry
      );

      if (!stack) {
        if (target.absentIsSuccess) {
          logger.verbose(`[${stackName}] Stack no longer exists`);
          return null;
        }
        throw new StackOperationError(stackName, lastStatus ? `${lastStatus} (then disappeared)` : 'DOES_NOT_EXIST', []);
      }

      if (stack.status !== lastStatus) {
        lastStatus = stack.status;
        logger.verbose(`[${stackName}] Current status: ${stack.status}`);
        this.options.onStatus?.(stackName, stack.status);
      }

      if (target.success.includes(stack.status)) {
        return stack;
      }

      if (!isInProgress(stack.status)) {
        const failures = await this.collectFailures(stackName, target.since);
        throw new StackOperationError(stackName, stack.status, failures);
      }

      if (this.now() - startedAt >= timeoutMs) {
        throw new StackTimeoutError(stackName, timeoutMs, lastStatus);
      }

      await this.sleep(pollIntervalMs, signal);
    }
  }

  /**
   * Failed sub-resources with their reasons, from stack events first (they keep
   * the original cause) and then from current resource status.
   */
  async collectFailures(stackName: string, since?: Date): Promise<ResourceFailure[]> {
    const failures = new Map<string, ResourceFailure>();

    try {
      const events = await this.stacks.listFailureEvents(stackName, since);
      for (const event of events) {
        if (event.logicalId === stackName || failures.has(event.logicalId)) continue;
        failures.set(event.logicalId, event);
      }
    } catch (error) {
      logger.verbose(`[${stackName}] Could not read stack events: ${errorMessage(error)}`);
    }

    try {
      const resources = await this.stacks.listStackResources(stackName);
      for (const resource of resources) {
        if (!resource.status.includes('FAILED') || failures.has(resource.logicalId)) continue;
        failures.set(resource.logicalId, {
          logicalId: resource.logicalId,
          resourceType: resource.resourceType,
          status: resource.status,
          reason: resource.statusReason,
        });
      }
    } catch (error) {
      logger.verbose(`[${stackName}] Could not read stack resources: ${errorMessage(error)}`);
    }

    return [...failures.values()];
  }
}
