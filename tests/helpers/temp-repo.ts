/**
 * Throwaway repositories on disk for walker and CLI tests.
 */
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

/**
 * Create a temporary directory holding `files` (repo-relative path to content).
 */
export function createTempRepo(files: Record<string, string>, prefix = 'playbook-grapher-'): string {
  const root = mkdtempSync(join(tmpdir(), prefix));
  writeRepoFiles(root, files);
  return root;
}

export function writeRepoFiles(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = join(root, relativePath);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content);
  }
}

export function removeTempRepo(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

/**
 * Deterministic id generator: id-1, id-2, ...
 */
export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
