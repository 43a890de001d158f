import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

/**
 * Create an empty temporary directory
 */
export function createTempDir(prefix: string = 'batch-backup-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a text file, creating parent directories
 */
export function writeTextFile(root: string, relativePath: string, content: string | Buffer): string {
  const filePath = join(root, relativePath);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

/**
 * Populate a tree with `count` files named file-000.txt, file-001.txt, ... spread over
 * two subdirectories
 * @returns relative paths in code-unit order
 */
export function generateTree(root: string, count: number): string[] {
  const paths: string[] = [];
  for (let i = 0; i < count; i++) {
    const dir = i % 2 === 0 ? 'even' : 'odd';
    const relativePath = `${dir}/file-${String(i).padStart(3, '0')}.txt`;
    writeTextFile(root, relativePath, `content of file ${i}\n`);
    paths.push(relativePath);
  }
  return paths.sort();
}
