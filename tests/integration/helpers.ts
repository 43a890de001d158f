import { FileEnumerator, type FileEnumeratorOptions } from '../../src/services/FileEnumerator.js';
import { BatchArchiver } from '../../src/services/BatchArchiver.js';
import { UploadCoordinator } from '../../src/services/UploadCoordinator.js';
import { ManifestStaging } from '../../src/services/ManifestStaging.js';
import { ManifestStore } from '../../src/services/ManifestStore.js';
import { BackupOrchestrator, type OrchestratorOptions } from '../../src/services/BackupOrchestrator.js';
import { RestoreService } from '../../src/services/RestoreService.js';
import { parseManifest, type DayManifest } from '../../src/models/Manifest.js';
import { manifestKey } from '../../src/types/index.js';
import { MemoryObjectStore } from '../helpers/MemoryObjectStore.js';

export const DAY = '20240115';

export interface Harness {
  store: MemoryObjectStore;
  staging: ManifestStaging;
  manifestStore: ManifestStore;
  archiver: BatchArchiver;
  orchestrator: BackupOrchestrator;
  restoreService: RestoreService;
  close: () => void;
}

export interface HarnessOptions extends Partial<OrchestratorOptions> {
  /** Reuse a remote store, as a later process would */
  store?: MemoryObjectStore;
  enumerator?: Partial<FileEnumeratorOptions>;
}

/**
 * Wire a full engine against an in-memory store and an in-memory staging database.
 * Each harness stands in for one process.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const store = options.store ?? new MemoryObjectStore();
  const prefix = options.prefix ?? '';
  const staging = new ManifestStaging(':memory:');
  const coordinator = new UploadCoordinator(store, { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 }, async () => undefined);
  const manifestStore = new ManifestStore(coordinator, staging, { prefix });
  const archiver = new BatchArchiver({ compressionLevel: 1 });

  const orchestrator = new BackupOrchestrator(new FileEnumerator(options.enumerator), archiver, manifestStore, coordinator, {
    batchSize: options.batchSize ?? 25,
    maxUploadConcurrency: options.maxUploadConcurrency ?? 1,
    archiveRetries: options.archiveRetries ?? 1,
    prefix,
  });

  return {
    store,
    staging,
    manifestStore,
    archiver,
    orchestrator,
    restoreService: new RestoreService(store, manifestStore, archiver, { prefix }),
    close: () => staging.close(),
  };
}

/**
 * Parse the manifest a store holds for a day
 */
export function readManifest(store: MemoryObjectStore, dayKey: string = DAY, prefix: string = ''): DayManifest {
  const body = store.body(manifestKey(prefix, dayKey));
  if (!body) {
    throw new Error(`No manifest stored for ${dayKey}`);
  }

  const parsed = parseManifest(body);
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }
  return parsed.manifest;
}
