import type pino from 'pino';
import type { RetryConfig } from '../types/index.js';
import { UploadError, toError } from './errors.js';

export type Sleeper = (ms: number) => Promise<void>;

export const defaultSleep: Sleeper = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Backoff before the retry that follows `attempt` (1-based)
 */
export function backoffDelay(policy: RetryConfig, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
}

export function isTransient(error: unknown): boolean {
  return error instanceof UploadError && error.transient;
}

/**
 * Run an operation, retrying transient upload errors with exponential backoff.
 * Anything else is rethrown on the spot.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryConfig,
  logger: pino.Logger,
  sleep: Sleeper = defaultSleep
): Promise<T> {
  let attempt = 1;

  while (true) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isTransient(error) || attempt >= policy.maxAttempts) {
        if (isTransient(error)) {
          logger.error({ error: toError(error), attempt }, 'Giving up after max attempts');
        }
        throw error;
      }

      const delay = backoffDelay(policy, attempt);
      logger.warn({ error: toError(error), attempt, maxAttempts: policy.maxAttempts, delay }, 'Attempt failed, retrying after delay');
      await sleep(delay);
      attempt++;
    }
  }
}
