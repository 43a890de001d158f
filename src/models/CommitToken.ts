export interface CommitToken {
  /** Remote object key */
  key: string;

  /** SHA256 of the bytes the store confirmed holding */
  checksum: string;

  size: number;

  /** ETag reported by the store, when it reports one */
  etag: string | null;

  /** Object already held identical content; nothing was written */
  skipped: boolean;

  /** Attempts used, including the successful one */
  attempts: number;
}
