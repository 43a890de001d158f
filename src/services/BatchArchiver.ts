import archiver from 'archiver';
import * as unzipper from 'unzipper';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import type { Batch } from '../models/Batch.js';
import type { Archive, ArchiveEntry, ArchiveIndex, ExtractedFile } from '../models/Archive.js';
import { calculateBufferChecksum } from '../lib/checksum.js';
import { collectStream } from '../lib/streams.js';
import { ArchiveError, toError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

export const ARCHIVE_INDEX_NAME = '_index.json';

// Fixed entry timestamp, written as UTC: identical batch contents produce identical bytes
// on every host whatever its time zone
const ENTRY_DATE = new Date(Date.UTC(2000, 0, 1, 0, 0, 0));

const ArchiveIndexSchema = z.object({
  batchIndex: z.number().int().nonnegative(),
  files: z.array(z.object({
    name: z.string().min(1),
    path: z.string().min(1),
    size: z.number().int().nonnegative(),
    hash: z.string(),
  })),
});

export interface BatchArchiverOptions {
  /** zlib level, 0-9 */
  compressionLevel: number;
}

/**
 * Internal name for the file at `position` in a batch. The position prefix keeps names
 * unique even when two files share a basename.
 */
export function internalName(position: number, relativePath: string): string {
  return `${String(position).padStart(4, '0')}-${basename(relativePath)}`;
}

export class BatchArchiver {
  private options: BatchArchiverOptions;

  constructor(options: Partial<BatchArchiverOptions> = {}) {
    this.options = {
      compressionLevel: options.compressionLevel ?? 9,
    };
  }

  /**
   * Pack a batch into a ZIP blob.
   * @throws ArchiveError if a file vanished or no longer matches its record
   */
  async archive(batch: Batch): Promise<Archive> {
    const logger = createChildLogger({ batchIndex: batch.index, archiveType: 'zip' });
    logger.debug({ files: batch.files.length }, 'Packing batch');

    const entries: ArchiveEntry[] = [];
    const contents: Buffer[] = [];

    for (const [position, file] of batch.files.entries()) {
      let data: Buffer;
      try {
        data = await readFile(file.path);
      } catch (error) {
        const vanished = error instanceof Error && 'code' in error && error.code === 'ENOENT';
        throw new ArchiveError(
          `${vanished ? 'File vanished' : 'Cannot read file'} before packing: ${file.relativePath}`,
          file.relativePath,
          vanished,
          error
        );
      }

      if (data.length !== file.size) {
        throw new ArchiveError(
          `File changed since enumeration: ${file.relativePath} (size ${file.size} -> ${data.length})`,
          file.relativePath
        );
      }

      const hash = calculateBufferChecksum(data);
      if (hash !== file.hash) {
        throw new ArchiveError(`File changed since enumeration: ${file.relativePath} (hash mismatch)`, file.relativePath);
      }

      entries.push({ name: internalName(position, file.relativePath), path: file.relativePath, size: file.size, hash });
      contents.push(data);
    }

    const index: ArchiveIndex = { batchIndex: batch.index, files: entries };
    const blob = await this.pack(index, contents);
    const checksum = calculateBufferChecksum(blob);

    logger.info({ files: entries.length, size: blob.length, checksum }, 'Batch packed');

    return {
      batchIndex: batch.index,
      blob,
      checksum,
      size: blob.length,
      entries,
    };
  }

  /**
   * Unpack an archive produced by `archive` and verify every file against the index
   * @throws ArchiveError on a missing entry, a hash mismatch or a malformed archive
   */
  async extract(blob: Buffer): Promise<ExtractedFile[]> {
    let directory: unzipper.CentralDirectory;
    try {
      directory = await unzipper.Open.buffer(blob);
    } catch (error) {
      throw new ArchiveError(`Cannot open archive: ${toError(error).message}`, '<archive>', false, error);
    }

    const byName = new Map<string, unzipper.File>();
    for (const file of directory.files) {
      if (file.type === 'File') {
        byName.set(file.path, file);
      }
    }

    const indexFile = byName.get(ARCHIVE_INDEX_NAME);
    if (!indexFile) {
      throw new ArchiveError(`Archive has no ${ARCHIVE_INDEX_NAME}`, ARCHIVE_INDEX_NAME);
    }

    let json: unknown;
    try {
      json = JSON.parse((await indexFile.buffer()).toString('utf8'));
    } catch (error) {
      throw new ArchiveError(`Unreadable ${ARCHIVE_INDEX_NAME}: ${toError(error).message}`, ARCHIVE_INDEX_NAME, false, error);
    }

    const parsed = ArchiveIndexSchema.safeParse(json);
    if (!parsed.success) {
      throw new ArchiveError(`Malformed ${ARCHIVE_INDEX_NAME}: ${parsed.error.message}`, ARCHIVE_INDEX_NAME);
    }

    const extracted: ExtractedFile[] = [];
    for (const entry of parsed.data.files) {
      const file = byName.get(entry.name);
      if (!file) {
        throw new ArchiveError(`Missing file in archive: ${entry.path}`, entry.path);
      }

      const data = await file.buffer();
      const hash = calculateBufferChecksum(data);
      if (hash !== entry.hash) {
        throw new ArchiveError(`Integrity check failed for ${entry.path}: expected ${entry.hash}, got ${hash}`, entry.path);
      }

      extracted.push({ name: entry.name, path: entry.path, data });
    }

    return extracted;
  }

  private async pack(index: ArchiveIndex, contents: Buffer[]): Promise<Buffer> {
    const zip = archiver('zip', { zlib: { level: this.options.compressionLevel }, forceLocalTime: false });
    const output = collectStream(zip);

    zip.append(Buffer.from(JSON.stringify(index, null, 2), 'utf8'), { name: ARCHIVE_INDEX_NAME, date: ENTRY_DATE });
    index.files.forEach((entry, position) => {
      const data = contents[position];
      if (data) {
        zip.append(data, { name: entry.name, date: ENTRY_DATE });
      }
    });

    const [, blob] = await Promise.all([zip.finalize(), output]);
    return blob;
  }
}
