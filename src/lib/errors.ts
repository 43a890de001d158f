import { S3ServiceException } from '@aws-sdk/client-s3';

export type ErrorKind =
  | 'IOError'
  | 'ArchiveError'
  | 'UploadError.Transient'
  | 'UploadError.Permanent'
  | 'UploadConflict'
  | 'ManifestConflict'
  | 'InvalidManifest'
  | 'ManifestStorage'
  | 'RunInProgress';

export abstract class BackupError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class IOError extends BackupError {
  readonly kind = 'IOError';

  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, cause);
  }
}

export class ArchiveError extends BackupError {
  readonly kind = 'ArchiveError';

  /**
   * @param vanished True when a file is gone, which changes the batch partition itself
   */
  constructor(message: string, public readonly path: string, public readonly vanished: boolean = false, cause?: unknown) {
    super(message, cause);
  }
}

export abstract class UploadError extends BackupError {
  abstract readonly transient: boolean;

  constructor(message: string, public readonly key: string, cause?: unknown) {
    super(message, cause);
  }
}

export class TransientUploadError extends UploadError {
  readonly kind = 'UploadError.Transient';
  readonly transient = true;
}

export class PermanentUploadError extends UploadError {
  readonly kind = 'UploadError.Permanent';
  readonly transient = false;
}

export class UploadConflictError extends BackupError {
  readonly kind = 'UploadConflict';

  constructor(
    public readonly key: string,
    public readonly expectedChecksum: string,
    public readonly actualChecksum: string
  ) {
    super(`Object ${key} already exists with different content (expected ${expectedChecksum}, found ${actualChecksum})`);
  }
}

export type ManifestConflictReason = 'checksum-mismatch' | 'out-of-order' | 'concurrent-update' | 'files-changed';

export class ManifestConflict extends BackupError {
  readonly kind = 'ManifestConflict';

  constructor(
    message: string,
    public readonly dayKey: string,
    public readonly batchIndex: number,
    public readonly reason: ManifestConflictReason
  ) {
    super(message);
  }
}

export class InvalidManifestError extends BackupError {
  readonly kind = 'InvalidManifest';

  constructor(message: string, public readonly dayKey: string, cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Local staging cannot be opened, read or written. Fatal to the process.
 */
export class ManifestStorageError extends BackupError {
  readonly kind = 'ManifestStorage';
}

export class RunInProgressError extends BackupError {
  readonly kind = 'RunInProgress';

  constructor(public readonly dayKey: string) {
    super(`A run for day ${dayKey} is already in progress`);
  }
}

export function isBackupError(error: unknown): error is BackupError {
  return error instanceof BackupError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
]);

const TRANSIENT_ERROR_NAMES = new Set(['TimeoutError', 'RequestTimeout', 'SlowDown', 'ThrottlingException']);

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map an error thrown by the S3 client onto the upload error kinds
 */
export function classifyS3Error(error: unknown, key: string): UploadError {
  if (error instanceof UploadError) {
    return error;
  }

  const err = toError(error);

  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode ?? 0;
    const transient = Boolean(error.$retryable) ||
      error.$fault === 'server' ||
      status === 429 ||
      status >= 500 ||
      TRANSIENT_ERROR_NAMES.has(error.name);

    const message = `S3 request for ${key} failed (${error.name}${status ? `, HTTP ${status}` : ''}): ${error.message}`;
    return transient
      ? new TransientUploadError(message, key, error)
      : new PermanentUploadError(message, key, error);
  }

  const code = errorCode(err);
  if ((code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) || TRANSIENT_ERROR_NAMES.has(err.name)) {
    return new TransientUploadError(`Network error for ${key}: ${err.message}`, key, err);
  }

  return new PermanentUploadError(`Request for ${key} failed: ${err.message}`, key, err);
}
