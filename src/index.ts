import { getConfig } from './config/config.js';
import { initLogger, getLogger } from './lib/logger.js';
import { FileEnumerator } from './services/FileEnumerator.js';
import { BatchArchiver } from './services/BatchArchiver.js';
import { S3ObjectStore } from './services/S3ObjectStore.js';
import { UploadCoordinator } from './services/UploadCoordinator.js';
import { ManifestStaging } from './services/ManifestStaging.js';
import { ManifestStore } from './services/ManifestStore.js';
import { BackupOrchestrator } from './services/BackupOrchestrator.js';
import { RestoreService } from './services/RestoreService.js';
import { RunMode, RunStatus, type AppConfig } from './types/index.js';

const abortController = new AbortController();
let staging: ManifestStaging | null = null;
let objectStore: S3ObjectStore | null = null;

async function runBackup(
  config: AppConfig,
  orchestrator: BackupOrchestrator,
  logger: ReturnType<typeof getLogger>
): Promise<number> {
  const result = await orchestrator.runDay(config.backup.rootPath, config.backup.dayKey, {
    signal: abortController.signal,
  });

  if (result.status === RunStatus.FAILED) {
    logger.error({ dayKey: result.dayKey, error: result.error, state: result.state }, 'Backup failed');
    return 1;
  }

  for (const warning of result.summary.warnings) {
    logger.warn({ path: warning.path }, warning.message);
  }

  logger.info(
    {
      dayKey: result.dayKey,
      status: result.status,
      batches: result.summary.batchCount,
      uploaded: result.summary.uploadedBatches,
      skipped: result.summary.skippedBatches,
      files: result.summary.fileCount,
      bytes: result.summary.totalBytes,
      durationMs: result.summary.durationMs,
    },
    'Backup finished'
  );
  return 0;
}

async function runRestore(
  config: AppConfig,
  restoreService: RestoreService,
  logger: ReturnType<typeof getLogger>
): Promise<number> {
  const { targetDir, paths } = config.restore;
  if (targetDir === null) {
    logger.error('RESTORE_TARGET is required for restore');
    return 1;
  }

  const summary = await restoreService.restore({
    dayKey: config.backup.dayKey,
    targetDir,
    ...(paths ? { paths } : {}),
  });

  logger.info(
    { files: summary.restoredFiles.length, archives: summary.archivesFetched, bytes: summary.bytes },
    'Restore finished'
  );

  if (summary.missing.length > 0) {
    logger.warn({ missing: summary.missing }, 'Some requested paths were not found');
    return 1;
  }
  return 0;
}

async function main(): Promise<number> {
  const config = getConfig();

  initLogger(config.logging);
  const logger = getLogger();

  logger.info('Batch backup starting...');
  logger.info({ config: {
    mode: config.mode,
    rootPath: config.backup.rootPath,
    dayKey: config.backup.dayKey,
    s3Bucket: config.s3.bucket,
    s3Endpoint: config.s3.endpoint,
    s3Prefix: config.s3.prefix,
    batchSize: config.backup.batchSize,
    maxUploadConcurrency: config.backup.maxUploadConcurrency,
  }}, 'Configuration loaded');

  const store = new S3ObjectStore(config.s3);
  objectStore = store;
  staging = new ManifestStaging(config.backup.stagingDbPath);
  const coordinator = new UploadCoordinator(store, config.backup.retry);
  const manifestStore = new ManifestStore(coordinator, staging, { prefix: config.s3.prefix });
  const archiver = new BatchArchiver({ compressionLevel: config.backup.compressionLevel });

  if (config.mode === RunMode.RESTORE) {
    return runRestore(config, new RestoreService(store, manifestStore, archiver, { prefix: config.s3.prefix }), logger);
  }

  const enumerator = new FileEnumerator({
    followSymlinks: config.backup.followSymlinks,
    ignoreDotfiles: config.backup.ignoreDotfiles,
  });

  const orchestrator = new BackupOrchestrator(enumerator, archiver, manifestStore, coordinator, {
    batchSize: config.backup.batchSize,
    maxUploadConcurrency: config.backup.maxUploadConcurrency,
    archiveRetries: config.backup.archiveRetries,
    prefix: config.s3.prefix,
  });

  return runBackup(config, orchestrator, logger);
}

// Graceful shutdown: stop at the next batch boundary, in-flight uploads finish
function shutdown(signal: string): void {
  const logger = getLogger();

  if (abortController.signal.aborted) {
    logger.warn({ signal }, 'Second signal received, exiting immediately');
    process.exit(1);
  }

  logger.info({ signal }, 'Shutting down gracefully after the current batch...');
  abortController.abort();
}

function closeResources(): void {
  if (staging) {
    staging.close();
    staging = null;
  }
  if (objectStore) {
    objectStore.destroy();
    objectStore = null;
  }
}

// Handle signals
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

main()
  .then((exitCode) => {
    closeResources();
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    closeResources();
    process.exitCode = 1;
  });
