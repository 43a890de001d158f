import type { FileRecord } from './FileRecord.js';

export interface Batch {
  /** 0-based, contiguous within a day */
  readonly index: number;

  /** Files in enumeration order */
  readonly files: readonly FileRecord[];
}

export function batchBytes(batch: Batch): number {
  return batch.files.reduce((total, file) => total + file.size, 0);
}
