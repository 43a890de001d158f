// ============================================================================
// Enums
// ============================================================================

export enum BackupState {
  IDLE = 'idle',
  ENUMERATING = 'enumerating',
  BATCHING_NEXT = 'batching_next',
  ARCHIVING = 'archiving',
  UPLOADING = 'uploading',
  MANIFEST_COMMITTING = 'manifest_committing',
  DAY_COMPLETE = 'day_complete',
  ABORTED = 'aborted'
}

export enum RunStatus {
  SUCCESS = 'success',
  PARTIAL = 'partial',
  FAILED = 'failed'
}

export enum RunMode {
  BACKUP = 'backup',
  RESTORE = 'restore'
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface S3Config {
  endpoint: string | null;
  region: string;
  bucket: string;
  accessKeyId: string | null;
  secretAccessKey: string | null;
  forcePathStyle: boolean;
  /** Destination folder inside the bucket ('' for the bucket root) */
  prefix: string;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface BackupConfig {
  rootPath: string;
  batchSize: number;
  maxUploadConcurrency: number;
  retry: RetryConfig;
  archiveRetries: number;
  compressionLevel: number;
  followSymlinks: boolean;
  ignoreDotfiles: boolean;
  stagingDbPath: string;
  dayKey: string;
}

export interface RestoreConfig {
  targetDir: string | null;
  paths: string[] | null;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  pretty: boolean;
}

export interface AppConfig {
  mode: RunMode;
  s3: S3Config;
  backup: BackupConfig;
  restore: RestoreConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_BATCH_SIZE = 25;

export const MANIFEST_SCHEMA_VERSION = 1;

export const MANIFEST_FILE_NAME = 'manifest.json';

export const ARCHIVE_EXTENSION = '.zip';

// ============================================================================
// Remote Keys
// ============================================================================

function joinKey(prefix: string, ...parts: string[]): string {
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  return trimmed ? [trimmed, ...parts].join('/') : parts.join('/');
}

export function archiveKey(prefix: string, dayKey: string, batchIndex: number): string {
  return joinKey(prefix, dayKey, `${batchIndex}${ARCHIVE_EXTENSION}`);
}

export function manifestKey(prefix: string, dayKey: string): string {
  return joinKey(prefix, dayKey, MANIFEST_FILE_NAME);
}

/**
 * Day key for a date in local time, formatted YYYYMMDD
 */
export function formatDayKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}
