import { lookup } from 'mime-types';
import type { RetryConfig } from '../types/index.js';
import type { CommitToken } from '../models/CommitToken.js';
import type { ObjectStore } from './ObjectStore.js';
import { calculateBufferChecksum } from '../lib/checksum.js';
import { TransientUploadError, UploadConflictError } from '../lib/errors.js';
import { withRetry, defaultSleep, type Sleeper } from '../lib/retry.js';
import { createChildLogger } from '../lib/logger.js';

export interface UploadOptions {
  /** Expected SHA256 of the blob; computed when omitted */
  checksum?: string;

  /**
   * Replace whatever the key holds. Only the manifest is written this way;
   * archives are write-once.
   */
  overwrite?: boolean;
}

export const CHECKSUM_METADATA_KEY = 'sha256';

export class UploadCoordinator {
  private store: ObjectStore;
  private retry: RetryConfig;
  private sleep: Sleeper;

  constructor(store: ObjectStore, retry: RetryConfig, sleep: Sleeper = defaultSleep) {
    this.store = store;
    this.retry = retry;
    this.sleep = sleep;
  }

  /**
   * Upload a blob and confirm the store holds exactly these bytes.
   * Same key with identical content is a no-op success.
   * @throws UploadConflictError when the key holds different content (archives only)
   * @throws TransientUploadError after the last retry
   * @throws PermanentUploadError without retrying
   */
  async upload(key: string, blob: Buffer, options: UploadOptions = {}): Promise<CommitToken> {
    const checksum = options.checksum ?? calculateBufferChecksum(blob);
    const logger = createChildLogger({ key, checksum });
    const contentType = this.detectContentType(key);

    // Once this call has written the key, later attempts replace what it wrote
    let written = false;

    return withRetry(async (attempt) => {
      if (!options.overwrite && !written && await this.store.exists(key)) {
        const existing = await this.store.get(key);
        if (existing) {
          const existingChecksum = calculateBufferChecksum(existing);
          if (existingChecksum !== checksum) {
            throw new UploadConflictError(key, checksum, existingChecksum);
          }

          logger.info('Object already holds identical content, skipping upload');
          return { key, checksum, size: blob.length, etag: null, skipped: true, attempts: attempt };
        }
      }

      logger.debug({ size: blob.length, attempt }, 'Uploading object');
      const { etag } = await this.store.put(key, blob, {
        contentType,
        metadata: { [CHECKSUM_METADATA_KEY]: checksum },
      });
      written = true;

      await this.verify(key, checksum);

      logger.info({ size: blob.length, etag, attempt }, 'Upload verified');
      return { key, checksum, size: blob.length, etag, skipped: false, attempts: attempt };
    }, this.retry, logger, this.sleep);
  }

  /**
   * Read an object, retrying transient failures with the upload policy
   * @returns null when the key holds nothing
   */
  async fetch(key: string): Promise<Buffer | null> {
    return withRetry(() => this.store.get(key), this.retry, createChildLogger({ key }), this.sleep);
  }

  /**
   * Check for a completed object, retrying transient failures with the upload policy
   */
  async exists(key: string): Promise<boolean> {
    return withRetry(() => this.store.exists(key), this.retry, createChildLogger({ key }), this.sleep);
  }

  /**
   * Read the object back and compare checksums
   * @throws TransientUploadError if the object is missing or differs, so the upload is retried
   */
  async verify(key: string, expectedChecksum: string): Promise<void> {
    const stored = await this.store.get(key);
    if (!stored) {
      throw new TransientUploadError(`Verification failed: ${key} not found after upload`, key);
    }

    const actual = calculateBufferChecksum(stored);
    if (actual !== expectedChecksum) {
      throw new TransientUploadError(
        `Verification failed for ${key}: expected ${expectedChecksum}, got ${actual}`,
        key
      );
    }
  }

  private detectContentType(key: string): string {
    return lookup(key) || 'application/octet-stream';
  }
}
