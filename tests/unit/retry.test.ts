import { describe, it, expect, jest } from '@jest/globals';
import { backoffDelay, withRetry } from '../../src/lib/retry.js';
import { PermanentUploadError, TransientUploadError } from '../../src/lib/errors.js';
import { getLogger } from '../../src/lib/logger.js';
import type { RetryConfig } from '../../src/types/index.js';

const policy: RetryConfig = { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 3000 };

describe('Retry', () => {
  describe('backoffDelay', () => {
    it('should double per attempt up to the cap', () => {
      expect([1, 2, 3, 4].map(attempt => backoffDelay(policy, attempt))).toEqual([1000, 2000, 3000, 3000]);
    });
  });

  describe('withRetry', () => {
    it('should retry transient failures with backoff', async () => {
      const delays: number[] = [];
      const sleep = async (ms: number) => {
        delays.push(ms);
      };
      const operation = jest.fn(async (attempt: number) => {
        if (attempt < 3) {
          throw new TransientUploadError('flaky', 'k');
        }
        return `done on ${attempt}`;
      });

      await expect(withRetry(operation, policy, getLogger(), sleep)).resolves.toBe('done on 3');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(delays).toEqual([1000, 2000]);
    });

    it('should give up after max attempts', async () => {
      const sleep = async () => undefined;
      const operation = jest.fn(async () => {
        throw new TransientUploadError('down', 'k');
      });

      await expect(withRetry(operation, policy, getLogger(), sleep)).rejects.toThrow('down');
      expect(operation).toHaveBeenCalledTimes(4);
    });

    it('should not retry permanent failures', async () => {
      const sleep = jest.fn(async () => undefined);
      const operation = jest.fn(async () => {
        throw new PermanentUploadError('denied', 'k');
      });

      await expect(withRetry(operation, policy, getLogger(), sleep)).rejects.toBeInstanceOf(PermanentUploadError);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should not retry errors outside the upload kinds', async () => {
      const operation = jest.fn(async () => {
        throw new Error('bug');
      });

      await expect(withRetry(operation, policy, getLogger(), async () => undefined)).rejects.toThrow('bug');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });
});
