export interface PutOptions {
  contentType?: string;
  /** Stored alongside the object */
  metadata?: Record<string, string>;
}

export interface PutResult {
  etag: string | null;
}

/**
 * Opaque key -> blob store. Implementations raise UploadError subclasses
 * (TransientUploadError / PermanentUploadError) for failed requests.
 */
export interface ObjectStore {
  put(key: string, body: Buffer, options?: PutOptions): Promise<PutResult>;

  /** Object bytes, or null when the key does not exist */
  get(key: string): Promise<Buffer | null>;

  exists(key: string): Promise<boolean>;
}
