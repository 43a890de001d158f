import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { getLogger } from './logger.js';

/**
 * Calculate SHA256 checksum of a file by streaming its contents
 * @param filePath Absolute path to file
 * @returns Promise that resolves with hex-encoded checksum
 */
export async function calculateFileChecksum(filePath: string): Promise<string> {
  const logger = getLogger();
  const hash = createHash('sha256');
  const stream = createReadStream(filePath);

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      const checksum = hash.digest('hex');
      logger.debug({ filePath, checksum }, 'File checksum calculated');
      resolve(checksum);
    });

    stream.on('error', (error) => {
      logger.debug({ filePath, error }, 'Error calculating file checksum');
      reject(error);
    });
  });
}

/**
 * Calculate SHA256 checksum from a buffer
 * @returns Hex-encoded checksum
 */
export function calculateBufferChecksum(buffer: Buffer | string): string {
  const hash = createHash('sha256');
  hash.update(buffer);
  return hash.digest('hex');
}
