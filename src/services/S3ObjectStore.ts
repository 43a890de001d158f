import {
  S3Client,
  GetObjectCommand,
  HeadObjectCommand,
  NoSuchKey,
  NotFound,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import type { S3Config } from '../types/index.js';
import type { ObjectStore, PutOptions, PutResult } from './ObjectStore.js';
import { classifyS3Error } from '../lib/errors.js';
import { getLogger, createChildLogger } from '../lib/logger.js';

export const COMPLETION_MARKER = 'x-completed';

function isMissingObject(error: unknown): boolean {
  if (error instanceof NoSuchKey || error instanceof NotFound) {
    return true;
  }
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}

export class S3ObjectStore implements ObjectStore {
  private client: S3Client;
  private config: S3Config;
  private logger = getLogger();

  constructor(config: S3Config, client?: S3Client) {
    this.config = config;

    this.client = client ?? new S3Client({
      ...(config.endpoint ? { endpoint: config.endpoint } : {}),
      region: config.region,
      ...(config.accessKeyId && config.secretAccessKey
        ? { credentials: { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey } }
        : {}),
      forcePathStyle: config.forcePathStyle,
    });

    this.logger.info({ endpoint: config.endpoint, region: config.region, bucket: config.bucket }, 'S3ObjectStore initialized');
  }

  /**
   * Upload a blob with multipart support for large archives
   */
  async put(key: string, body: Buffer, options: PutOptions = {}): Promise<PutResult> {
    const logger = createChildLogger({ key, bucket: this.config.bucket });
    logger.debug({ size: body.length, contentType: options.contentType }, 'Starting S3 upload');

    try {
      const upload = new Upload({
        client: this.client,
        params: {
          Bucket: this.config.bucket,
          Key: key,
          Body: body,
          ContentType: options.contentType ?? 'application/octet-stream',
          Metadata: {
            ...options.metadata,
            [COMPLETION_MARKER]: 'true',
          },
        },
      });

      upload.on('httpUploadProgress', (progress) => {
        if (progress.loaded) {
          logger.debug({ uploaded: progress.loaded, total: progress.total }, 'Upload progress');
        }
      });

      const result = await upload.done();
      const etag = 'ETag' in result && typeof result.ETag === 'string' ? result.ETag : null;

      logger.debug({ etag }, 'S3 upload finished');
      return { etag };
    } catch (error) {
      throw classifyS3Error(error, key);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({
        Bucket: this.config.bucket,
        Key: key,
      }));

      if (!response.Body) {
        return null;
      }

      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isMissingObject(error)) {
        return null;
      }
      throw classifyS3Error(error, key);
    }
  }

  /**
   * True only for objects that carry the completion marker
   */
  async exists(key: string): Promise<boolean> {
    try {
      const response = await this.client.send(new HeadObjectCommand({
        Bucket: this.config.bucket,
        Key: key,
      }));

      const isComplete = response.Metadata?.[COMPLETION_MARKER] === 'true';
      if (!isComplete) {
        this.logger.warn({ key }, 'Object missing completion marker');
      }
      return isComplete;
    } catch (error) {
      if (isMissingObject(error)) {
        return false;
      }
      throw classifyS3Error(error, key);
    }
  }

  /**
   * Release the client's sockets
   */
  destroy(): void {
    this.client.destroy();
  }
}
