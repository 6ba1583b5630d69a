/**
 * Bounded retry for read calls that hit throttling or flaky networking
 */

import { TransientApiError, errorMessage } from './errors.js';
import * as logger from './logger.js';

const TRANSIENT_ERROR_NAMES = new Set([
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'SlowDown',
  'RequestTimeout',
  'RequestTimeoutException',
  'TimeoutError',
  'ServiceUnavailable',
  'InternalError',
]);

const TRANSIENT_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED']);

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true;
  }
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }
  return /rate exceeded|throttl/i.test(error.message);
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run a read operation, retrying transient failures with exponential backoff.
 * Non-transient errors propagate untouched on the first occurrence.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 500;
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      lastError = error;
      logger.verbose(`${operation} failed (attempt ${attempt}/${attempts}): ${errorMessage(error)}`);
      if (attempt < attempts) {
        await sleep(baseDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  throw new TransientApiError(operation, attempts, errorMessage(lastError));
}
