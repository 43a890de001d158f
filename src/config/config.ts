import { existsSync } from 'fs';
import { resolve } from 'path';
import type { AppConfig, LoggingConfig } from '../types/index.js';
import { DEFAULT_BATCH_SIZE, RunMode, formatDayKey } from '../types/index.js';

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnv(key: string): string | null {
  const value = process.env[key];
  return value === undefined || value === '' ? null : value;
}

function getEnvNumber(key: string, defaultValue: number, min: number = 0): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const num = Number(value);
  if (!Number.isInteger(num)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  if (num < min) {
    throw new Error(`Environment variable ${key} must be at least ${min}, got: ${value}`);
  }
  return num;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

const LOG_LEVELS: ReadonlyArray<LoggingConfig['level']> = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LoggingConfig['level'] {
  return LOG_LEVELS.some(level => level === value);
}

function parseMode(value: string): RunMode {
  switch (value) {
    case RunMode.BACKUP:
      return RunMode.BACKUP;
    case RunMode.RESTORE:
      return RunMode.RESTORE;
    default:
      throw new Error(`Invalid MODE: ${value}. Must be backup or restore.`);
  }
}

export function loadConfig(): AppConfig {
  const mode = parseMode(getEnv('MODE', RunMode.BACKUP));

  // S3 Configuration
  const s3 = {
    endpoint: getOptionalEnv('S3_ENDPOINT'),
    region: getEnv('S3_REGION', 'us-east-1'),
    bucket: getEnv('S3_BUCKET'),
    accessKeyId: getOptionalEnv('S3_ACCESS_KEY'),
    secretAccessKey: getOptionalEnv('S3_SECRET_KEY'),
    forcePathStyle: getEnvBoolean('S3_FORCE_PATH_STYLE', false),
    prefix: getEnv('S3_PREFIX', ''),
  };

  if ((s3.accessKeyId === null) !== (s3.secretAccessKey === null)) {
    throw new Error('S3_ACCESS_KEY and S3_SECRET_KEY must be set together');
  }

  // Backup Configuration
  const rootPath = resolve(getEnv('BACKUP_ROOT'));

  if (mode === RunMode.BACKUP && !existsSync(rootPath)) {
    throw new Error(`Backup root does not exist: ${rootPath}`);
  }

  const dayKey = getEnv('DAY_KEY', formatDayKey(new Date()));
  if (!/^[A-Za-z0-9_-]+$/.test(dayKey)) {
    throw new Error(`Invalid DAY_KEY: ${dayKey}. Use letters, digits, '-' or '_'.`);
  }

  const backup = {
    rootPath,
    batchSize: getEnvNumber('BATCH_SIZE', DEFAULT_BATCH_SIZE, 1),
    maxUploadConcurrency: getEnvNumber('MAX_UPLOAD_CONCURRENCY', 1, 1),
    retry: {
      maxAttempts: getEnvNumber('MAX_RETRIES', 3) + 1,
      baseDelayMs: getEnvNumber('RETRY_BASE_DELAY', 1000),
      maxDelayMs: getEnvNumber('RETRY_MAX_DELAY', 30000),
    },
    archiveRetries: getEnvNumber('ARCHIVE_RETRIES', 1),
    compressionLevel: getEnvNumber('COMPRESSION_LEVEL', 9),
    followSymlinks: getEnvBoolean('FOLLOW_SYMLINKS', false),
    ignoreDotfiles: getEnvBoolean('IGNORE_DOTFILES', false),
    stagingDbPath: resolve(getEnv('STAGING_DB_PATH', './manifest-staging.db')),
    dayKey,
  };

  if (backup.compressionLevel > 9) {
    throw new Error(`Invalid COMPRESSION_LEVEL: ${backup.compressionLevel}. Must be between 0 and 9.`);
  }

  // Restore Configuration
  const targetDir = getOptionalEnv('RESTORE_TARGET');
  const restorePaths = getOptionalEnv('RESTORE_PATHS');

  const restore = {
    targetDir: targetDir === null ? null : resolve(targetDir),
    paths: restorePaths === null
      ? null
      : restorePaths.split(',').map(p => p.trim()).filter(p => p.length > 0),
  };

  if (mode === RunMode.RESTORE && restore.targetDir === null) {
    throw new Error('Missing required environment variable: RESTORE_TARGET');
  }

  // Logging Configuration
  const level = getEnv('LOG_LEVEL', 'info');
  if (!isLogLevel(level)) {
    throw new Error(`Invalid LOG_LEVEL: ${level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const logging = {
    level,
    pretty: getEnvBoolean('LOG_PRETTY', process.env.NODE_ENV !== 'production'),
  };

  return {
    mode,
    s3,
    backup,
    restore,
    logging,
  };
}

// Export singleton config instance
let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

// For testing: reset config
export function resetConfig(): void {
  config = null;
}
