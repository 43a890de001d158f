import { BackupState, archiveKey } from '../types/index.js';
import type { FileRecord } from '../models/FileRecord.js';
import { sameContent } from '../models/FileRecord.js';
import type { Batch } from '../models/Batch.js';
import { batchBytes } from '../models/Batch.js';
import type { Archive } from '../models/Archive.js';
import type { ManifestEntry } from '../models/Manifest.js';
import { entryFromArchive } from '../models/Manifest.js';
import type { CommitToken } from '../models/CommitToken.js';
import {
  createBackupRun,
  markRunAborted,
  markRunFinished,
  toRunResult,
  transition,
  type BackupRun,
  type RunResult,
} from '../models/BackupRun.js';
import type { FileEnumerator } from './FileEnumerator.js';
import type { BatchArchiver } from './BatchArchiver.js';
import type { ManifestStore } from './ManifestStore.js';
import type { UploadCoordinator } from './UploadCoordinator.js';
import { countBatches, getBatch } from './Batcher.js';
import { UploadQueue } from './UploadQueue.js';
import {
  ArchiveError,
  ManifestConflict,
  ManifestStorageError,
  RunInProgressError,
  toError,
} from '../lib/errors.js';
import { getLogger, createChildLogger } from '../lib/logger.js';

export interface OrchestratorOptions {
  batchSize: number;
  maxUploadConcurrency: number;
  /** Refresh-and-retry attempts for a batch whose files changed before packing */
  archiveRetries: number;
  /** Destination folder inside the bucket */
  prefix: string;
}

export interface RunDayOptions {
  /** Checked between batches; in-flight uploads always finish */
  signal?: AbortSignal;
  onStateChange?: (state: BackupState, run: Readonly<BackupRun>) => void;
  onBatchCommitted?: (entry: ManifestEntry, token: CommitToken) => void;
}

interface UploadedBatch {
  entry: ManifestEntry;
  token: CommitToken;
}

export class BackupOrchestrator {
  private logger = getLogger();
  private activeDays = new Set<string>();

  constructor(
    private readonly enumerator: FileEnumerator,
    private readonly archiver: BatchArchiver,
    private readonly manifestStore: ManifestStore,
    private readonly coordinator: UploadCoordinator,
    private readonly options: OrchestratorOptions
  ) {}

  /**
   * Back up `rootPath` for one day. Resumes after the last committed batch.
   * Returns a structured result for every failure except unusable local staging.
   * @throws ManifestStorageError
   */
  async runDay(rootPath: string, dayKey: string, runOptions: RunDayOptions = {}): Promise<RunResult> {
    const run = createBackupRun(rootPath, dayKey);

    if (this.activeDays.has(dayKey)) {
      markRunAborted(run, new RunInProgressError(dayKey));
      return toRunResult(run);
    }

    this.activeDays.add(dayKey);
    const logger = createChildLogger({ runId: run.id, dayKey });

    try {
      logger.info({ rootPath }, 'Day run starting');
      await this.execute(run, runOptions);
      markRunFinished(run);
    } catch (error) {
      const err = toError(error);
      markRunAborted(run, err);
      runOptions.onStateChange?.(run.state, run);
      logger.error({ error: err, state: run.history[run.history.length - 2] }, 'Day run aborted');

      if (err instanceof ManifestStorageError) {
        throw err;
      }
    } finally {
      this.activeDays.delete(dayKey);
    }

    const result = toRunResult(run);
    logger.info(
      { status: result.status, ...result.summary, warnings: result.summary.warnings.length },
      'Day run finished'
    );
    return result;
  }

  private async execute(run: BackupRun, runOptions: RunDayOptions): Promise<void> {
    const { dayKey, rootPath } = run;
    const logger = createChildLogger({ runId: run.id, dayKey });
    const enter = (state: BackupState) => {
      transition(run, state);
      runOptions.onStateChange?.(state, run);
    };

    enter(BackupState.ENUMERATING);
    const manifest = await this.manifestStore.load(dayKey);
    const { records, warnings } = await this.enumerator.enumerate(rootPath);

    run.warnings = warnings;
    run.fileCount = records.length;
    run.totalBytes = records.reduce((total, record) => total + record.size, 0);
    run.batchCount = countBatches(records.length, this.options.batchSize);

    logger.info(
      { files: run.fileCount, bytes: run.totalBytes, batches: run.batchCount, committed: manifest.batches.length },
      'Enumeration complete'
    );

    const queue = new UploadQueue<UploadedBatch>(
      this.options.maxUploadConcurrency,
      async (index, uploaded) => {
        const outcome = await this.manifestStore.appendEntry(dayKey, uploaded.entry);
        if (outcome === 'appended') {
          run.uploadedBatches++;
        }
        logger.info({ batchIndex: index, outcome, skipped: uploaded.token.skipped }, 'Batch committed');
        runOptions.onBatchCommitted?.(uploaded.entry, uploaded.token);
      }
    );

    enter(BackupState.BATCHING_NEXT);

    try {
      await this.processBatches(run, records, queue, runOptions, enter);
    } catch (error) {
      // Uploads already started finish and commit before the run is reported
      await queue.settle();
      throw error;
    }

    if (run.state !== BackupState.MANIFEST_COMMITTING) {
      enter(BackupState.MANIFEST_COMMITTING);
    }
    await queue.drain();

    if (run.cancelled) {
      enter(BackupState.IDLE);
      return;
    }

    // Days with no files still get a manifest
    await this.manifestStore.publish(dayKey);

    run.totalBytes = records.reduce((total, record) => total + record.size, 0);
    enter(BackupState.DAY_COMPLETE);
    logger.info(
      { batchCount: run.batchCount, fileCount: run.fileCount, totalBytes: run.totalBytes },
      'Day complete'
    );
    enter(BackupState.IDLE);
  }

  private async processBatches(
    run: BackupRun,
    records: FileRecord[],
    queue: UploadQueue<UploadedBatch>,
    runOptions: RunDayOptions,
    enter: (state: BackupState) => void
  ): Promise<void> {
    const { dayKey, rootPath } = run;
    const logger = createChildLogger({ runId: run.id, dayKey });

    for (let index = 0; index < run.batchCount; index++) {
      if (run.state !== BackupState.BATCHING_NEXT) {
        enter(BackupState.BATCHING_NEXT);
      }

      if (runOptions.signal?.aborted) {
        run.cancelled = true;
        logger.info({ nextBatch: index }, 'Run cancelled at batch boundary');
        break;
      }

      const batch = getBatch(records, this.options.batchSize, index);
      if (!batch) {
        break;
      }

      const committed = await this.manifestStore.getEntry(dayKey, index);
      if (committed) {
        this.assertMatchesCommitted(dayKey, batch, committed);
        run.skippedBatches++;
        logger.debug({ batchIndex: index }, 'Batch already committed, skipping');
        enter(BackupState.BATCHING_NEXT);
        continue;
      }

      enter(BackupState.ARCHIVING);
      const archive = await this.archiveWithRefresh(rootPath, records, batch);

      enter(BackupState.UPLOADING);
      queue.submit(index, () => this.uploadArchive(dayKey, archive));

      enter(BackupState.MANIFEST_COMMITTING);
      await queue.waitForRoom();
    }
  }

  private async uploadArchive(dayKey: string, archive: Archive): Promise<UploadedBatch> {
    const key = archiveKey(this.options.prefix, dayKey, archive.batchIndex);
    const token = await this.coordinator.upload(key, archive.blob, { checksum: archive.checksum });
    return { entry: entryFromArchive(archive), token };
  }

  /**
   * Archive a batch, re-reading its files when they changed since enumeration.
   * Refreshed records replace the originals so totals and later checks see them.
   */
  private async archiveWithRefresh(rootPath: string, records: FileRecord[], batch: Batch): Promise<Archive> {
    let current = batch;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.archiver.archive(current);
      } catch (error) {
        if (!(error instanceof ArchiveError) || error.vanished || attempt >= this.options.archiveRetries) {
          throw error;
        }

        this.logger.warn(
          { batchIndex: batch.index, path: error.path, attempt: attempt + 1 },
          'Batch changed during packing, re-reading its files'
        );
        current = await this.refreshBatch(rootPath, records, current);
      }
    }
  }

  private async refreshBatch(rootPath: string, records: FileRecord[], batch: Batch): Promise<Batch> {
    const start = batch.index * this.options.batchSize;
    const files: FileRecord[] = [];

    for (const [offset, file] of batch.files.entries()) {
      const refreshed = await this.enumerator.describe(rootPath, file.relativePath);
      if (!refreshed) {
        throw new ArchiveError(
          `File vanished during the run: ${file.relativePath}; the batch partition changed`,
          file.relativePath,
          true
        );
      }
      records[start + offset] = refreshed;
      files.push(refreshed);
    }

    return { index: batch.index, files };
  }

  /**
   * A skipped batch must still describe the same files the manifest holds for it
   * @throws ManifestConflict
   */
  private assertMatchesCommitted(dayKey: string, batch: Batch, entry: ManifestEntry): void {
    const mismatch = (): ManifestConflict => new ManifestConflict(
      `Batch ${batch.index} of ${dayKey} no longer matches its committed entry ` +
        `(${batch.files.length} files, ${batchBytes(batch)} bytes); batching is not reproducible`,
      dayKey,
      batch.index,
      'files-changed'
    );

    if (entry.files.length !== batch.files.length) {
      throw mismatch();
    }

    batch.files.forEach((file, position) => {
      const committed = entry.files[position];
      if (!committed || committed.path !== file.relativePath || !sameContent(committed, file)) {
        throw mismatch();
      }
    });
  }
}
