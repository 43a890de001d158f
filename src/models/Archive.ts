export interface ArchiveEntry {
  /** Internal name inside the ZIP */
  name: string;

  /** Original path relative to the backup root */
  path: string;

  size: number;

  /** SHA256 of the file contents */
  hash: string;
}

export interface Archive {
  batchIndex: number;

  /** Compressed ZIP bytes */
  blob: Buffer;

  /** SHA256 over the final blob */
  checksum: string;

  size: number;

  entries: ArchiveEntry[];
}

/**
 * Index stored inside every archive so a restore needs nothing else
 */
export interface ArchiveIndex {
  batchIndex: number;
  files: ArchiveEntry[];
}

export interface ExtractedFile {
  name: string;
  path: string;
  data: Buffer;
}
