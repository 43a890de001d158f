import type { FileRecord } from '../models/FileRecord.js';
import type { Batch } from '../models/Batch.js';
import { DEFAULT_BATCH_SIZE } from '../types/index.js';

// Batches are derived from (ordering, index) alone. No iterator state is kept, so a
// resumed run reproduces the same partition from any start index.

function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be a positive integer, got: ${batchSize}`);
  }
}

export function countBatches(fileCount: number, batchSize: number = DEFAULT_BATCH_SIZE): number {
  assertBatchSize(batchSize);
  return Math.ceil(fileCount / batchSize);
}

/**
 * Batch at `index`, or null past the end
 */
export function getBatch(
  records: readonly FileRecord[],
  batchSize: number,
  index: number
): Batch | null {
  assertBatchSize(batchSize);
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Batch index must be a non-negative integer, got: ${index}`);
  }

  const start = index * batchSize;
  if (start >= records.length) {
    return null;
  }

  return {
    index,
    files: records.slice(start, start + batchSize),
  };
}

/**
 * Partition records into batches of `batchSize`, the last holding the remainder
 * @param startIndex First batch to emit; earlier batches are not materialised
 */
export function createBatches(
  records: readonly FileRecord[],
  batchSize: number = DEFAULT_BATCH_SIZE,
  startIndex: number = 0
): Batch[] {
  const total = countBatches(records.length, batchSize);
  const batches: Batch[] = [];

  for (let index = startIndex; index < total; index++) {
    const batch = getBatch(records, batchSize, index);
    if (batch) {
      batches.push(batch);
    }
  }

  return batches;
}
