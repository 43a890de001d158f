import { readdir, stat, lstat, realpath, access } from 'fs/promises';
import { constants, type Dirent, type Stats } from 'fs';
import { join, relative, sep } from 'path';
import type { FileRecord } from '../models/FileRecord.js';
import { createFileRecord, compareRecordPaths } from '../models/FileRecord.js';
import type { EnumerationWarning } from '../models/BackupRun.js';
import { calculateFileChecksum } from '../lib/checksum.js';
import { IOError, toError } from '../lib/errors.js';
import { getLogger, createChildLogger } from '../lib/logger.js';

export interface FileEnumeratorOptions {
  /**
   * Symlink policy. false: every symlink is skipped.
   * true: links to files are read through, links to directories descended once per real directory.
   */
  followSymlinks: boolean;

  /** Skip dotfiles and dot-directories */
  ignoreDotfiles: boolean;
}

export interface EnumerationResult {
  records: FileRecord[];
  warnings: EnumerationWarning[];
}

interface Candidate {
  path: string;
  relativePath: string;
}

const DOTFILE_PATTERN = /(^|\/)\./;

export function toPosixPath(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

export class FileEnumerator {
  private options: FileEnumeratorOptions;
  private logger = getLogger();

  constructor(options: Partial<FileEnumeratorOptions> = {}) {
    this.options = {
      followSymlinks: options.followSymlinks ?? false,
      ignoreDotfiles: options.ignoreDotfiles ?? false,
    };
  }

  /**
   * Enumerate every regular file under root, sorted by relative path
   * @throws IOError if the root is missing or unreadable
   */
  async enumerate(rootPath: string): Promise<EnumerationResult> {
    const records: FileRecord[] = [];
    const warnings: EnumerationWarning[] = [];

    for await (const record of this.walk(rootPath, warnings)) {
      records.push(record);
    }

    return { records, warnings };
  }

  /**
   * Lazily yield file records in deterministic order. Paths are listed and sorted up
   * front; stat and hashing happen as records are consumed.
   * @param warnings Receives one entry per skipped file or directory
   */
  async *walk(rootPath: string, warnings: EnumerationWarning[] = []): AsyncGenerator<FileRecord> {
    const logger = createChildLogger({ rootPath });
    await this.assertReadableRoot(rootPath);

    const candidates: Candidate[] = [];
    const visited = new Set<string>([await realpath(rootPath)]);
    await this.collect(rootPath, rootPath, candidates, visited, warnings);
    candidates.sort(compareRecordPaths);

    logger.info({ files: candidates.length }, 'Directory listing complete');

    for (const candidate of candidates) {
      const record = await this.describeCandidate(candidate, warnings);
      if (record) {
        yield record;
      }
    }
  }

  /**
   * Re-read a single file under root. Returns null if it is gone or no longer a regular file.
   */
  async describe(rootPath: string, relativePath: string): Promise<FileRecord | null> {
    const path = join(rootPath, ...relativePath.split('/'));
    let stats: Stats;

    try {
      stats = await stat(path);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new IOError(`Cannot stat ${relativePath}: ${toError(error).message}`, path, error);
    }

    if (!stats.isFile()) {
      return null;
    }

    try {
      const hash = await calculateFileChecksum(path);
      return createFileRecord(path, relativePath, stats.size, stats.mtime, hash);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new IOError(`Cannot read ${relativePath}: ${toError(error).message}`, path, error);
    }
  }

  private async assertReadableRoot(rootPath: string): Promise<void> {
    let stats: Stats;
    try {
      stats = await stat(rootPath);
    } catch (error) {
      throw new IOError(`Backup root is not readable: ${rootPath} (${toError(error).message})`, rootPath, error);
    }

    if (!stats.isDirectory()) {
      throw new IOError(`Backup root is not a directory: ${rootPath}`, rootPath);
    }

    try {
      await access(rootPath, constants.R_OK | constants.X_OK);
    } catch (error) {
      throw new IOError(`Backup root is not readable: ${rootPath} (${toError(error).message})`, rootPath, error);
    }
  }

  private async collect(
    rootPath: string,
    dir: string,
    out: Candidate[],
    visited: Set<string>,
    warnings: EnumerationWarning[]
  ): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.warn(warnings, toPosixPath(relative(rootPath, dir)), `Cannot read directory: ${toError(error).message}`);
      return;
    }

    // Traversal order decides which path wins when symlinks alias a directory
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const path = join(dir, entry.name);
      const relativePath = toPosixPath(relative(rootPath, path));

      if (this.options.ignoreDotfiles && DOTFILE_PATTERN.test(relativePath)) {
        continue;
      }

      if (entry.isSymbolicLink()) {
        if (!this.options.followSymlinks) {
          this.logger.debug({ path: relativePath }, 'Skipping symlink');
          continue;
        }
        await this.collectLinkTarget(rootPath, path, relativePath, out, visited, warnings);
        continue;
      }

      if (entry.isDirectory()) {
        try {
          visited.add(await realpath(path));
        } catch (error) {
          this.warn(warnings, relativePath, `Cannot resolve directory: ${toError(error).message}`);
          continue;
        }
        await this.collect(rootPath, path, out, visited, warnings);
      } else if (entry.isFile()) {
        out.push({ path, relativePath });
      }
      // sockets, FIFOs and devices are not backed up
    }
  }

  private async collectLinkTarget(
    rootPath: string,
    path: string,
    relativePath: string,
    out: Candidate[],
    visited: Set<string>,
    warnings: EnumerationWarning[]
  ): Promise<void> {
    let target: string;
    let stats: Stats;
    try {
      target = await realpath(path);
      stats = await stat(target);
    } catch (error) {
      this.warn(warnings, relativePath, `Broken symlink: ${toError(error).message}`);
      return;
    }

    if (stats.isFile()) {
      out.push({ path, relativePath });
    } else if (stats.isDirectory()) {
      if (visited.has(target)) {
        this.logger.debug({ path: relativePath, target }, 'Symlinked directory already visited');
        return;
      }
      visited.add(target);
      await this.collect(rootPath, path, out, visited, warnings);
    }
  }

  private async describeCandidate(candidate: Candidate, warnings: EnumerationWarning[]): Promise<FileRecord | null> {
    try {
      const stats = await lstat(candidate.path).then(s => (s.isSymbolicLink() ? stat(candidate.path) : s));
      if (!stats.isFile()) {
        this.warn(warnings, candidate.relativePath, 'No longer a regular file');
        return null;
      }
      const hash = await calculateFileChecksum(candidate.path);
      return createFileRecord(candidate.path, candidate.relativePath, stats.size, stats.mtime, hash);
    } catch (error) {
      this.warn(warnings, candidate.relativePath, `Cannot read file: ${toError(error).message}`);
      return null;
    }
  }

  private warn(warnings: EnumerationWarning[], path: string, message: string): void {
    this.logger.warn({ path }, message);
    warnings.push({ path, message });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
