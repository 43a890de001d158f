import { mkdir, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { archiveKey } from '../types/index.js';
import type { ManifestEntry } from '../models/Manifest.js';
import type { ObjectStore } from './ObjectStore.js';
import type { ManifestStore } from './ManifestStore.js';
import type { BatchArchiver } from './BatchArchiver.js';
import { calculateBufferChecksum } from '../lib/checksum.js';
import { ArchiveError, IOError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

export interface RestoreRequest {
  dayKey: string;
  targetDir: string;
  /** Relative paths to restore; every file of the day when omitted */
  paths?: string[];
}

export interface RestoreSummary {
  dayKey: string;
  restoredFiles: string[];
  archivesFetched: number;
  bytes: number;
  /** Requested paths the manifest does not know */
  missing: string[];
}

export interface RestoreServiceOptions {
  prefix: string;
}

/**
 * Resolve a relative path under `targetDir`
 * @throws IOError when the path would land outside it
 */
export function resolveInside(targetDir: string, relativePath: string): string {
  const root = resolve(targetDir);
  const destination = resolve(root, relativePath);
  const rel = relative(root, destination);

  if (rel === '' || rel.split(sep)[0] === '..' || isAbsolute(rel)) {
    throw new IOError(`Refusing to restore outside the target directory: ${relativePath}`, relativePath);
  }
  return destination;
}

export class RestoreService {
  constructor(
    private readonly store: ObjectStore,
    private readonly manifestStore: ManifestStore,
    private readonly archiver: BatchArchiver,
    private readonly options: RestoreServiceOptions = { prefix: '' }
  ) {}

  /**
   * Restore files of one day, downloading only the archives that hold them
   * @throws InvalidManifestError when the remote manifest is malformed
   * @throws ArchiveError when an archive is missing or fails verification
   */
  async restore(request: RestoreRequest): Promise<RestoreSummary> {
    const { dayKey, targetDir } = request;
    const logger = createChildLogger({ dayKey, targetDir });

    const manifest = await this.manifestStore.fetchRemote(dayKey);
    const entries = manifest?.batches ?? [];
    const wanted = request.paths ? new Set(request.paths) : null;

    const known = new Set(entries.flatMap(entry => entry.files.map(file => file.path)));
    const missing = request.paths ? request.paths.filter(path => !known.has(path)) : [];
    if (missing.length > 0) {
      logger.warn({ missing }, 'Requested paths are not in the manifest');
    }

    const selected = entries.filter(entry => !wanted || entry.files.some(file => wanted.has(file.path)));
    logger.info({ archives: selected.length, of: entries.length }, 'Restore starting');

    const summary: RestoreSummary = { dayKey, restoredFiles: [], archivesFetched: 0, bytes: 0, missing };

    for (const entry of selected) {
      const blob = await this.fetchArchive(dayKey, entry);
      summary.archivesFetched++;

      for (const file of await this.archiver.extract(blob)) {
        if (wanted && !wanted.has(file.path)) {
          continue;
        }

        const destination = resolveInside(targetDir, file.path);
        try {
          await mkdir(dirname(destination), { recursive: true });
          await writeFile(destination, file.data);
        } catch (error) {
          throw new IOError(`Cannot write restored file ${file.path}`, destination, error);
        }

        summary.restoredFiles.push(file.path);
        summary.bytes += file.data.length;
      }
    }

    logger.info(
      { files: summary.restoredFiles.length, archives: summary.archivesFetched, bytes: summary.bytes },
      'Restore complete'
    );
    return summary;
  }

  private async fetchArchive(dayKey: string, entry: ManifestEntry): Promise<Buffer> {
    const key = archiveKey(this.options.prefix, dayKey, entry.index);
    const blob = await this.store.get(key);
    if (!blob) {
      throw new ArchiveError(`Archive ${key} listed in the manifest is missing`, key);
    }

    const checksum = calculateBufferChecksum(blob);
    if (checksum !== entry.archiveChecksum) {
      throw new ArchiveError(`Archive ${key} does not match its manifest checksum`, key);
    }
    return blob;
  }
}
