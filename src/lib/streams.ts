import { Readable } from 'stream';

/**
 * Collect everything a readable emits until it ends.
 * Attach before the producer starts writing.
 * @param stream Readable stream
 * @returns Promise that resolves with complete buffer
 */
export function collectStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => resolve(Buffer.concat(chunks)));
    stream.on('error', reject);
  });
}
