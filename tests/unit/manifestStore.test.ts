import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ManifestStore } from '../../src/services/ManifestStore.js';
import { ManifestStaging } from '../../src/services/ManifestStaging.js';
import { UploadCoordinator } from '../../src/services/UploadCoordinator.js';
import { createDayManifest, serializeManifest, type ManifestEntry } from '../../src/models/Manifest.js';
import { InvalidManifestError, ManifestConflict } from '../../src/lib/errors.js';
import { MemoryObjectStore } from '../helpers/MemoryObjectStore.js';

const DAY = '20240115';
const MANIFEST_KEY = `${DAY}/manifest.json`;
const noSleep = async () => undefined;

function entry(index: number, checksumChar: string = 'a'): ManifestEntry {
  return {
    index,
    archiveChecksum: checksumChar.repeat(64),
    files: [{ path: `f${index}.txt`, size: index, hash: 'b'.repeat(64), name: `0000-f${index}.txt` }],
  };
}

describe('ManifestStore', () => {
  let store: MemoryObjectStore;
  let staging: ManifestStaging;
  let manifests: ManifestStore;

  function createStore(stagingDb: ManifestStaging, prefix: string = ''): ManifestStore {
    const coordinator = new UploadCoordinator(store, { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 }, noSleep);
    return new ManifestStore(coordinator, stagingDb, { prefix });
  }

  beforeEach(() => {
    store = new MemoryObjectStore();
    staging = new ManifestStaging(':memory:');
    manifests = createStore(staging);
  });

  afterEach(() => {
    staging.close();
  });

  it('should start a day empty', async () => {
    const manifest = await manifests.load(DAY);

    expect(manifest).toEqual(createDayManifest(DAY));
    expect(await manifests.entryExists(DAY, 0)).toBe(false);
  });

  it('should commit each appended entry remotely', async () => {
    await expect(manifests.appendEntry(DAY, entry(0))).resolves.toBe('appended');
    await expect(manifests.appendEntry(DAY, entry(1))).resolves.toBe('appended');

    expect(store.body(MANIFEST_KEY)).toEqual(serializeManifest(createDayManifest(DAY, [entry(0), entry(1)])));
    expect(await manifests.entryExists(DAY, 1)).toBe(true);
    expect(staging.getEntries(DAY)).toEqual([entry(0), entry(1)]);
  });

  it('should treat an identical append as a no-op', async () => {
    await manifests.appendEntry(DAY, entry(0));
    const puts = store.puts.length;

    await expect(manifests.appendEntry(DAY, entry(0))).resolves.toBe('unchanged');
    expect(store.puts).toHaveLength(puts);
  });

  it('should reject a different checksum for a committed index', async () => {
    await manifests.appendEntry(DAY, entry(0));

    await expect(manifests.appendEntry(DAY, entry(0, 'c'))).rejects.toMatchObject({
      kind: 'ManifestConflict',
      reason: 'checksum-mismatch',
    });
  });

  it('should reject an entry that leaves a gap after the last committed index', async () => {
    await manifests.appendEntry(DAY, entry(0));
    const puts = store.puts.length;

    await expect(manifests.appendEntry(DAY, entry(2))).rejects.toMatchObject({
      reason: 'out-of-order',
      message: `Batch 2 of ${DAY} would be appended after batch 0; expected batch 1`,
    });
    expect(store.puts).toHaveLength(puts);
    expect(staging.getEntries(DAY)).toEqual([entry(0)]);
  });

  it('should reject a first entry other than batch 0', async () => {
    await expect(manifests.appendEntry(DAY, entry(1))).rejects.toMatchObject({ reason: 'out-of-order' });
    expect(store.keys()).toEqual([]);
  });

  it('should detect another writer on the same day', async () => {
    await manifests.load(DAY);

    const otherStaging = new ManifestStaging(':memory:');
    try {
      await createStore(otherStaging).appendEntry(DAY, entry(0, 'c'));
    } finally {
      otherStaging.close();
    }

    const error = await manifests.appendEntry(DAY, entry(0)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ManifestConflict);
    expect(error).toMatchObject({ reason: 'concurrent-update', batchIndex: 0 });
    expect(store.body(MANIFEST_KEY)).toEqual(serializeManifest(createDayManifest(DAY, [entry(0, 'c')])));
  });

  it('should prefer the remote manifest over local staging', async () => {
    store.seed(MANIFEST_KEY, serializeManifest(createDayManifest(DAY, [entry(0)])));
    staging.stageEntry(DAY, entry(5));

    const manifest = await manifests.load(DAY);

    expect(manifest.batches).toEqual([entry(0)]);
    expect(staging.getEntries(DAY)).toEqual([entry(0)]);
  });

  it('should fall back to staging when the store is unreachable', async () => {
    staging.stageEntry(DAY, entry(0));
    store.setUnreachable(true);

    const manifest = await manifests.load(DAY);

    expect(manifest.batches).toEqual([entry(0)]);
  });

  it('should retry a transient remote read before falling back to staging', async () => {
    store.seed(MANIFEST_KEY, serializeManifest(createDayManifest(DAY, [entry(0), entry(1)])));
    store.failNextReads(MANIFEST_KEY, 1);

    const manifest = await manifests.load(DAY);

    expect(manifest.batches).toEqual([entry(0), entry(1)]);
    expect(staging.getEntries(DAY)).toEqual([entry(0), entry(1)]);
  });

  it('should retry a transient read during the concurrency check', async () => {
    await manifests.appendEntry(DAY, entry(0));
    store.failNextReads(MANIFEST_KEY, 1);

    await expect(manifests.appendEntry(DAY, entry(1))).resolves.toBe('appended');
    expect(store.body(MANIFEST_KEY)).toEqual(serializeManifest(createDayManifest(DAY, [entry(0), entry(1)])));
  });

  it('should retry a transient existence check when publishing', async () => {
    await manifests.appendEntry(DAY, entry(0));
    const puts = store.puts.length;
    store.failNextReads(MANIFEST_KEY, 1);

    await expect(manifests.publish(DAY)).resolves.toBe(false);
    expect(store.puts).toHaveLength(puts);
  });

  it('should reject a malformed remote manifest', async () => {
    store.seed(MANIFEST_KEY, '{"date": "20240115"}');

    await expect(manifests.load(DAY)).rejects.toBeInstanceOf(InvalidManifestError);
  });

  it('should reject a manifest stored under another day', async () => {
    store.seed(MANIFEST_KEY, serializeManifest(createDayManifest('20240114')));

    await expect(manifests.fetchRemote(DAY)).rejects.toThrow(`Remote manifest at ${MANIFEST_KEY} is dated 20240114`);
  });

  it('should publish an empty day once', async () => {
    await expect(manifests.publish(DAY)).resolves.toBe(true);
    await expect(manifests.publish(DAY)).resolves.toBe(false);

    expect(store.body(MANIFEST_KEY)?.toString('utf8'))
      .toBe('{\n  "date": "20240115",\n  "schemaVersion": 1,\n  "batches": []\n}\n');
    expect(store.puts).toEqual([MANIFEST_KEY]);
  });

  it('should write under the configured prefix', async () => {
    const prefixed = createStore(staging, 'nightly/host-a');

    await prefixed.appendEntry(DAY, entry(0));

    expect(store.keys()).toEqual([`nightly/host-a/${DAY}/manifest.json`]);
  });
});
