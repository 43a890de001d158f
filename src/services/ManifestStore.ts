import type { DayManifest, ManifestEntry } from '../models/Manifest.js';
import {
  createDayManifest,
  findEntry,
  lastCommittedIndex,
  parseManifest,
  serializeManifest,
} from '../models/Manifest.js';
import { manifestKey } from '../types/index.js';
import type { ManifestStaging } from './ManifestStaging.js';
import type { UploadCoordinator } from './UploadCoordinator.js';
import { InvalidManifestError, ManifestConflict, UploadError, toError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

export type AppendOutcome = 'appended' | 'unchanged';

export interface ManifestStoreOptions {
  /** Destination folder inside the bucket */
  prefix: string;
}

/**
 * Day-scoped manifests: local SQLite staging plus the committed remote copy, which is
 * the final authority.
 */
export class ManifestStore {
  private manifests = new Map<string, DayManifest>();

  constructor(
    private readonly coordinator: UploadCoordinator,
    private readonly staging: ManifestStaging,
    private readonly options: ManifestStoreOptions = { prefix: '' }
  ) {}

  /**
   * Reconstruct a day's manifest. The remote copy wins when reachable (and resets local
   * staging); once transient read retries are spent, staged entries are used as a
   * best-effort fallback.
   * @throws InvalidManifestError if the remote document is malformed
   */
  async load(dayKey: string): Promise<DayManifest> {
    const logger = createChildLogger({ dayKey });
    let manifest: DayManifest;

    try {
      const remote = await this.fetchRemote(dayKey);
      manifest = remote ?? createDayManifest(dayKey);
      this.staging.replaceDay(dayKey, manifest.batches);
      logger.info({ batches: manifest.batches.length, remote: remote !== null }, 'Manifest loaded from remote');
    } catch (error) {
      if (!(error instanceof UploadError)) {
        throw error;
      }
      manifest = createDayManifest(dayKey, this.staging.getEntries(dayKey));
      logger.warn(
        { error: toError(error), batches: manifest.batches.length },
        'Remote manifest unreachable, using local staging'
      );
    }

    this.manifests.set(dayKey, manifest);
    return manifest;
  }

  /**
   * Read the committed remote manifest without touching local state.
   * Transient read failures are retried before they surface.
   * @returns null when no manifest exists remotely
   */
  async fetchRemote(dayKey: string): Promise<DayManifest | null> {
    const data = await this.coordinator.fetch(this.keyFor(dayKey));
    if (!data) {
      return null;
    }

    const parsed = parseManifest(data);
    if (!parsed.ok) {
      throw new InvalidManifestError(`Remote manifest for ${dayKey} is invalid: ${parsed.error}`, dayKey);
    }
    if (parsed.manifest.date !== dayKey) {
      throw new InvalidManifestError(`Remote manifest at ${this.keyFor(dayKey)} is dated ${parsed.manifest.date}`, dayKey);
    }
    return parsed.manifest;
  }

  async entryExists(dayKey: string, batchIndex: number): Promise<boolean> {
    return (await this.getEntry(dayKey, batchIndex)) !== undefined;
  }

  async getEntry(dayKey: string, batchIndex: number): Promise<ManifestEntry | undefined> {
    const manifest = await this.current(dayKey);
    return findEntry(manifest, batchIndex);
  }

  /**
   * Append an entry and commit the manifest remotely.
   * An identical entry for an existing index is a no-op.
   * @throws ManifestConflict on a different checksum for an existing index, an index other
   *   than the one after the last committed batch, or a remote manifest another writer moved ahead
   */
  async appendEntry(dayKey: string, entry: ManifestEntry): Promise<AppendOutcome> {
    const logger = createChildLogger({ dayKey, batchIndex: entry.index });
    const manifest = await this.current(dayKey);

    const existing = findEntry(manifest, entry.index);
    if (existing) {
      if (existing.archiveChecksum === entry.archiveChecksum) {
        logger.debug('Manifest entry already committed');
        return 'unchanged';
      }
      throw new ManifestConflict(
        `Batch ${entry.index} of ${dayKey} is committed with checksum ${existing.archiveChecksum}, not ${entry.archiveChecksum}`,
        dayKey,
        entry.index,
        'checksum-mismatch'
      );
    }

    const expectedLast = lastCommittedIndex(manifest);
    if (entry.index !== expectedLast + 1) {
      throw new ManifestConflict(
        `Batch ${entry.index} of ${dayKey} would be appended after batch ${expectedLast}; expected batch ${expectedLast + 1}`,
        dayKey,
        entry.index,
        'out-of-order'
      );
    }

    // Durable locally before anything goes remote
    this.staging.stageEntry(dayKey, entry);

    await this.assertRemoteUnchanged(dayKey, expectedLast, entry.index);

    const next = createDayManifest(dayKey, [...manifest.batches, entry]);
    await this.coordinator.upload(this.keyFor(dayKey), serializeManifest(next), { overwrite: true });

    this.staging.markCommitted(dayKey, entry.index);
    this.manifests.set(dayKey, next);

    logger.info({ archiveChecksum: entry.archiveChecksum, batches: next.batches.length }, 'Manifest entry committed');
    return 'appended';
  }

  /**
   * Make sure a remote manifest exists for the day, writing the current one if not
   * @returns true when a manifest was written
   */
  async publish(dayKey: string): Promise<boolean> {
    const key = this.keyFor(dayKey);
    if (await this.coordinator.exists(key)) {
      return false;
    }

    const manifest = await this.current(dayKey);
    await this.coordinator.upload(key, serializeManifest(manifest), { overwrite: true });
    createChildLogger({ dayKey }).info({ batches: manifest.batches.length }, 'Manifest published');
    return true;
  }

  private async current(dayKey: string): Promise<DayManifest> {
    return this.manifests.get(dayKey) ?? this.load(dayKey);
  }

  /**
   * Optimistic concurrency check: the remote manifest must still end at the index this
   * writer last saw
   */
  private async assertRemoteUnchanged(dayKey: string, expectedLast: number, batchIndex: number): Promise<void> {
    const remote = await this.fetchRemote(dayKey);
    const remoteLast = remote ? lastCommittedIndex(remote) : -1;

    if (remoteLast !== expectedLast) {
      this.manifests.delete(dayKey);
      throw new ManifestConflict(
        `Remote manifest for ${dayKey} ends at batch ${remoteLast}, expected ${expectedLast}; another run is writing this day`,
        dayKey,
        batchIndex,
        'concurrent-update'
      );
    }
  }

  private keyFor(dayKey: string): string {
    return manifestKey(this.options.prefix, dayKey);
  }
}
