import pRetry, { AbortError } from 'p-retry';
import { logger } from './logger';

export interface RetryPolicy {
  retries: number;
  factor: number;
  minTimeout: number;
  maxTimeout: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  factor: 2,
  minTimeout: 1000,
  maxTimeout: 5000
};

/**
 * Run a collaborator call with exponential backoff.
 * Throw `AbortError` (re-exported below) from the operation to stop retrying.
 */
export function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  label: string
): Promise<T> {
  return pRetry(operation, {
    ...policy,
    onFailedAttempt: (error) => {
      if (error.retriesLeft > 0) {
        logger.warn(`${label} failed (attempt ${error.attemptNumber}, ${error.retriesLeft} retries left)`, {
          message: error.message
        });
      }
    }
  });
}

export { AbortError };
