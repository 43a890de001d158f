import { describe, it, expect, beforeEach } from '@jest/globals';
import { UploadCoordinator, CHECKSUM_METADATA_KEY } from '../../src/services/UploadCoordinator.js';
import { PermanentUploadError, TransientUploadError, UploadConflictError } from '../../src/lib/errors.js';
import { calculateBufferChecksum } from '../../src/lib/checksum.js';
import { MemoryObjectStore } from '../helpers/MemoryObjectStore.js';

const KEY = '20240115/0.zip';
const noSleep = async () => undefined;

describe('UploadCoordinator', () => {
  let store: MemoryObjectStore;
  let coordinator: UploadCoordinator;
  const blob = Buffer.from('archive bytes');

  beforeEach(() => {
    store = new MemoryObjectStore();
    coordinator = new UploadCoordinator(store, { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 }, noSleep);
  });

  it('should upload and verify a new object', async () => {
    const token = await coordinator.upload(KEY, blob);

    expect(token).toMatchObject({
      key: KEY,
      checksum: calculateBufferChecksum(blob),
      size: blob.length,
      skipped: false,
      attempts: 1,
    });
    expect(token.etag).not.toBeNull();
    expect(store.puts).toEqual([KEY]);
    expect(store.objects.get(KEY)?.metadata[CHECKSUM_METADATA_KEY]).toBe(calculateBufferChecksum(blob));
  });

  it('should set the content type from the key', async () => {
    await coordinator.upload(KEY, blob);
    await coordinator.upload('20240115/manifest.json', Buffer.from('{}'), { overwrite: true });

    expect(store.objects.get(KEY)?.contentType).toBe('application/zip');
    expect(store.objects.get('20240115/manifest.json')?.contentType).toBe('application/json');
  });

  it('should treat identical existing content as done', async () => {
    store.seed(KEY, blob);

    const token = await coordinator.upload(KEY, blob);

    expect(token.skipped).toBe(true);
    expect(store.puts).toEqual([]);
  });

  it('should refuse to replace different content', async () => {
    store.seed(KEY, 'other bytes');

    await expect(coordinator.upload(KEY, blob)).rejects.toBeInstanceOf(UploadConflictError);
    expect(store.puts).toEqual([]);
  });

  it('should replace content when overwriting', async () => {
    store.seed(KEY, 'other bytes');

    const token = await coordinator.upload(KEY, blob, { overwrite: true });

    expect(token.skipped).toBe(false);
    expect(store.body(KEY)).toEqual(blob);
  });

  it('should retry transient failures', async () => {
    store.failNextPuts(2, 'transient');

    const token = await coordinator.upload(KEY, blob);

    expect(token.attempts).toBe(3);
    expect(store.puts).toEqual([KEY]);
  });

  it('should give up after the last attempt', async () => {
    store.failNextPuts(3, 'transient');

    await expect(coordinator.upload(KEY, blob)).rejects.toBeInstanceOf(TransientUploadError);
    expect(store.puts).toEqual([]);
  });

  it('should not retry permanent failures', async () => {
    store.failNextPuts(1, 'permanent');

    await expect(coordinator.upload(KEY, blob)).rejects.toBeInstanceOf(PermanentUploadError);
    expect(store.body(KEY)).toBeUndefined();
  });

  it('should retry when the stored bytes do not verify', async () => {
    store.corruptReads(KEY);

    await expect(coordinator.upload(KEY, blob)).rejects.toThrow(`Verification failed for ${KEY}`);
    expect(store.puts).toEqual([KEY, KEY, KEY]);
  });

  describe('reads', () => {
    it('should retry a transient read failure', async () => {
      store.seed(KEY, blob);
      store.failNextReads(KEY, 2);

      await expect(coordinator.fetch(KEY)).resolves.toEqual(blob);
      expect(store.gets).toEqual([KEY]);
    });

    it('should return null for a missing key', async () => {
      await expect(coordinator.fetch(KEY)).resolves.toBeNull();
    });

    it('should give up on reads after the last attempt', async () => {
      store.seed(KEY, blob);
      store.failNextReads(KEY, 3);

      await expect(coordinator.fetch(KEY)).rejects.toBeInstanceOf(TransientUploadError);
      expect(store.gets).toEqual([]);
    });

    it('should retry a transient existence check', async () => {
      store.seed(KEY, blob);
      store.failNextReads(KEY, 1);

      await expect(coordinator.exists(KEY)).resolves.toBe(true);
    });
  });
});
