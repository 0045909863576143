/**
 * File system operations - reading, writing, listing and globbing.
 *
 * The walkers are synchronous, so most helpers here are too.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a regular file exists (sync).
 */
export function isFileSync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a path is a directory (sync).
 */
export function isDirectorySync(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

export interface DirectoryEntry {
  /** Base name of the entry */
  name: string;
  /** Absolute path of the entry */
  path: string;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * List the direct children of a directory, sorted by name.
 * Symlinks are followed so a linked playbook folder is scanned like a real one.
 */
export function listDirectorySync(dirPath: string): DirectoryEntry[] {
  return fs
    .readdirSync(dirPath)
    .sort()
    .map((name) => {
      const entryPath = path.join(dirPath, name);
      return {
        name,
        path: entryPath,
        isFile: isFileSync(entryPath),
        isDirectory: isDirectorySync(entryPath),
      };
    });
}

/**
 * Canonical path with every symlink resolved.
 */
export function realPathSync(filePath: string): string {
  return fs.realpathSync(filePath);
}

/**
 * Find files matching glob patterns (sync).
 */
export function globFilesSync(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): string[] {
  return fg.sync(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || [],
    absolute: options.absolute ?? true,
    onlyFiles: true,
  }).sort();
}

/**
 * Repository-relative POSIX path, used as the key for file nodes and subgraphs.
 */
export function toRepoPath(repoRoot: string, filePath: string): string {
  return path.relative(repoRoot, filePath).split(path.sep).join('/');
}
