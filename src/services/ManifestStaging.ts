import Database from 'better-sqlite3';
import type { ManifestEntry, ManifestEntryRow } from '../models/Manifest.js';
import { rowToManifestEntry } from '../models/Manifest.js';
import { ManifestConflict, ManifestStorageError, toError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

interface EntryParams {
  dayKey: string;
  batchIndex: number;
  archiveChecksum: string;
  filesJson: string;
  stagedAt: number;
  remoteCommitted: number;
}

/**
 * Local, durable copy of every manifest entry. Written before the remote commit so
 * a crash loses at most the batch in flight.
 */
export class ManifestStaging {
  private db: Database.Database;
  private logger = getLogger();

  private insertStmt: Database.Statement<EntryParams>;
  private selectEntryStmt: Database.Statement<[string, number], ManifestEntryRow>;
  private selectDayStmt: Database.Statement<[string], ManifestEntryRow>;
  private markCommittedStmt: Database.Statement<[string, number]>;
  private deleteDayStmt: Database.Statement<[string]>;

  constructor(dbPath: string) {
    this.logger.info({ dbPath }, 'Initializing manifest staging');

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      // fsync on every commit
      this.db.pragma('synchronous = FULL');
      this.createSchema();

      this.insertStmt = this.db.prepare<EntryParams>(`
        INSERT INTO manifest_entries (day_key, batch_index, archive_checksum, files_json, staged_at, remote_committed)
        VALUES (@dayKey, @batchIndex, @archiveChecksum, @filesJson, @stagedAt, @remoteCommitted)
      `);

      this.selectEntryStmt = this.db.prepare<[string, number], ManifestEntryRow>(`
        SELECT * FROM manifest_entries WHERE day_key = ? AND batch_index = ?
      `);

      this.selectDayStmt = this.db.prepare<[string], ManifestEntryRow>(`
        SELECT * FROM manifest_entries WHERE day_key = ? ORDER BY batch_index ASC
      `);

      this.markCommittedStmt = this.db.prepare<[string, number]>(`
        UPDATE manifest_entries SET remote_committed = 1 WHERE day_key = ? AND batch_index = ?
      `);

      this.deleteDayStmt = this.db.prepare<[string]>(`
        DELETE FROM manifest_entries WHERE day_key = ?
      `);
    } catch (error) {
      throw new ManifestStorageError(`Cannot open manifest staging at ${dbPath}: ${toError(error).message}`, error);
    }

    this.logger.info('Manifest staging initialized');
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS manifest_entries (
        day_key TEXT NOT NULL,
        batch_index INTEGER NOT NULL CHECK(batch_index >= 0),
        archive_checksum TEXT NOT NULL,
        files_json TEXT NOT NULL,
        staged_at INTEGER NOT NULL,
        remote_committed INTEGER NOT NULL DEFAULT 0 CHECK(remote_committed IN (0, 1)),
        PRIMARY KEY (day_key, batch_index)
      );
    `);
  }

  /**
   * Durably record an entry. Identical re-staging is a no-op.
   * @throws ManifestConflict if the index is staged with another checksum
   */
  stageEntry(dayKey: string, entry: ManifestEntry): void {
    this.guard(`stage batch ${entry.index} of ${dayKey}`, () => this.db.transaction(() => {
      const existing = this.selectEntryStmt.get(dayKey, entry.index);
      if (existing) {
        if (existing.archive_checksum !== entry.archiveChecksum) {
          throw new ManifestConflict(
            `Batch ${entry.index} of ${dayKey} is staged with checksum ${existing.archive_checksum}, not ${entry.archiveChecksum}`,
            dayKey,
            entry.index,
            'checksum-mismatch'
          );
        }
        return;
      }
      this.insertStmt.run(this.toParams(dayKey, entry, false));
    })());
    this.logger.debug({ dayKey, batchIndex: entry.index }, 'Manifest entry staged');
  }

  markCommitted(dayKey: string, batchIndex: number): void {
    this.guard(`mark batch ${batchIndex} of ${dayKey} committed`, () => {
      this.markCommittedStmt.run(dayKey, batchIndex);
    });
  }

  getEntries(dayKey: string): ManifestEntry[] {
    return this.guard(`read staged entries of ${dayKey}`, () =>
      this.selectDayStmt.all(dayKey).map(rowToManifestEntry)
    );
  }

  /**
   * Replace a day's staged entries with the remote (authoritative) copy
   */
  replaceDay(dayKey: string, entries: ManifestEntry[]): void {
    this.guard(`replace staged entries of ${dayKey}`, () => this.db.transaction(() => {
      this.deleteDayStmt.run(dayKey);
      for (const entry of entries) {
        this.insertStmt.run(this.toParams(dayKey, entry, true));
      }
    })());
    this.logger.debug({ dayKey, entries: entries.length }, 'Staging synced with remote manifest');
  }

  close(): void {
    this.db.close();
    this.logger.info('Manifest staging closed');
  }

  private toParams(dayKey: string, entry: ManifestEntry, remoteCommitted: boolean): EntryParams {
    return {
      dayKey,
      batchIndex: entry.index,
      archiveChecksum: entry.archiveChecksum,
      filesJson: JSON.stringify(entry.files),
      stagedAt: Math.floor(Date.now() / 1000),
      remoteCommitted: remoteCommitted ? 1 : 0,
    };
  }

  /**
   * Run a database operation, surfacing SQLite failures as ManifestStorageError
   */
  private guard<T>(action: string, operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof ManifestConflict) {
        throw error;
      }
      throw new ManifestStorageError(`Cannot ${action}: ${toError(error).message}`, error);
    }
  }
}
