export interface FileRecord {
  /** Absolute file path */
  readonly path: string;

  /** Path relative to the backup root, always with '/' separators */
  readonly relativePath: string;

  /** File size in bytes */
  readonly size: number;

  /** Last modification timestamp */
  readonly modifiedAt: Date;

  /** SHA256 hash of file contents */
  readonly hash: string;
}

export function createFileRecord(
  path: string,
  relativePath: string,
  size: number,
  modifiedAt: Date,
  hash: string
): FileRecord {
  return Object.freeze({
    path,
    relativePath,
    size,
    modifiedAt,
    hash,
  });
}

/**
 * Code-unit ordering over relative paths; independent of locale and filesystem
 */
export function compareRecordPaths(a: Pick<FileRecord, 'relativePath'>, b: Pick<FileRecord, 'relativePath'>): number {
  if (a.relativePath < b.relativePath) return -1;
  if (a.relativePath > b.relativePath) return 1;
  return 0;
}

export function sameContent(a: Pick<FileRecord, 'size' | 'hash'>, b: Pick<FileRecord, 'size' | 'hash'>): boolean {
  return a.size === b.size && a.hash === b.hash;
}
