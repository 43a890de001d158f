import { z } from 'zod';
import { MANIFEST_SCHEMA_VERSION } from '../types/index.js';
import { toError } from '../lib/errors.js';
import type { Archive } from './Archive.js';

export const ManifestFileSchema = z.object({
  path: z.string().min(1),
  size: z.number().int().nonnegative(),
  hash: z.string().regex(/^[a-f0-9]{64}$/),
  name: z.string().min(1),
});

export type ManifestFile = z.infer<typeof ManifestFileSchema>;

export const ManifestEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  archiveChecksum: z.string().regex(/^[a-f0-9]{64}$/),
  files: z.array(ManifestFileSchema).min(1),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export const DayManifestSchema = z.object({
  date: z.string().min(1),
  schemaVersion: z.number().int().positive(),
  batches: z.array(ManifestEntrySchema),
});

export type DayManifest = z.infer<typeof DayManifestSchema>;

export function createDayManifest(dayKey: string, batches: ManifestEntry[] = []): DayManifest {
  return {
    date: dayKey,
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    batches,
  };
}

export function entryFromArchive(archive: Archive): ManifestEntry {
  return {
    index: archive.batchIndex,
    archiveChecksum: archive.checksum,
    files: archive.entries.map(entry => ({
      path: entry.path,
      size: entry.size,
      hash: entry.hash,
      name: entry.name,
    })),
  };
}

/**
 * Index of the last committed batch, -1 when the manifest is empty
 */
export function lastCommittedIndex(manifest: DayManifest): number {
  const last = manifest.batches[manifest.batches.length - 1];
  return last ? last.index : -1;
}

export function findEntry(manifest: DayManifest, batchIndex: number): ManifestEntry | undefined {
  return manifest.batches.find(entry => entry.index === batchIndex);
}

/**
 * Serialize with a fixed key order so the remote document is byte-stable
 */
export function serializeManifest(manifest: DayManifest): Buffer {
  const ordered = {
    date: manifest.date,
    schemaVersion: manifest.schemaVersion,
    batches: manifest.batches.map(entry => ({
      index: entry.index,
      archiveChecksum: entry.archiveChecksum,
      files: entry.files.map(file => ({
        path: file.path,
        size: file.size,
        hash: file.hash,
        name: file.name,
      })),
    })),
  };
  return Buffer.from(JSON.stringify(ordered, null, 2) + '\n', 'utf8');
}

export type ManifestParseResult =
  | { ok: true; manifest: DayManifest }
  | { ok: false; error: string };

export function parseManifest(data: Buffer | string): ManifestParseResult {
  let json: unknown;
  try {
    json = JSON.parse(data.toString());
  } catch (error) {
    return { ok: false, error: `Manifest is not valid JSON: ${toError(error).message}` };
  }

  const result = DayManifestSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : result.error.message;
    return { ok: false, error: `Manifest failed validation at ${where}` };
  }

  const manifest = result.data;
  if (manifest.schemaVersion > MANIFEST_SCHEMA_VERSION) {
    return { ok: false, error: `Unsupported manifest schema version ${manifest.schemaVersion}` };
  }

  // Batch indices run 0, 1, 2, ... with no gaps
  const gap = manifest.batches.findIndex((entry, position) => entry.index !== position);
  if (gap !== -1) {
    return { ok: false, error: `Manifest batch at position ${gap} has index ${manifest.batches[gap]?.index}` };
  }

  return { ok: true, manifest };
}

// Database row type (from SQLite)
export interface ManifestEntryRow {
  day_key: string;
  batch_index: number;
  archive_checksum: string;
  files_json: string;
  staged_at: number;
  remote_committed: number;
}

// Convert database row to model
export function rowToManifestEntry(row: ManifestEntryRow): ManifestEntry {
  const files = z.array(ManifestFileSchema).parse(JSON.parse(row.files_json));
  return {
    index: row.batch_index,
    archiveChecksum: row.archive_checksum,
    files,
  };
}
