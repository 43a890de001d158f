import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { calculateBufferChecksum, calculateFileChecksum } from '../../src/lib/checksum.js';
import { createTempDir, removeDir, writeTextFile } from '../helpers/fixtures.js';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('Checksum utilities', () => {
  describe('calculateBufferChecksum', () => {
    it('should calculate SHA256 checksum for buffer', () => {
      expect(calculateBufferChecksum(Buffer.from('abc'))).toBe(ABC_SHA256);
    });

    it('should accept strings', () => {
      expect(calculateBufferChecksum('abc')).toBe(ABC_SHA256);
    });

    it('should produce different checksums for different content', () => {
      expect(calculateBufferChecksum('test content 1')).not.toBe(calculateBufferChecksum('test content 2'));
    });

    it('should handle empty buffer', () => {
      expect(calculateBufferChecksum(Buffer.alloc(0))).toBe(EMPTY_SHA256);
    });
  });

  describe('calculateFileChecksum', () => {
    let dir: string;

    beforeAll(() => {
      dir = createTempDir();
    });

    afterAll(() => {
      removeDir(dir);
    });

    it('should match the buffer checksum of the file contents', async () => {
      const path = writeTextFile(dir, 'abc.txt', 'abc');
      await expect(calculateFileChecksum(path)).resolves.toBe(ABC_SHA256);
    });

    it('should hash empty files', async () => {
      const path = writeTextFile(dir, 'empty.txt', '');
      await expect(calculateFileChecksum(path)).resolves.toBe(EMPTY_SHA256);
    });

    it('should reject for missing files', async () => {
      await expect(calculateFileChecksum(`${dir}/missing.txt`)).rejects.toThrow('ENOENT');
    });
  });
});
