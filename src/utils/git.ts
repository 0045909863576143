/**
 * Git lookups used to title the diagram and to find the repository root.
 */
import { execFileSync } from 'node:child_process';

/** Default timeout for git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

function runGit(cwd: string, args: string[]): string | null {
  try {
    const result = execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return result.trim() || null;
  } catch { /* not a git repo or git unavailable */
    return null;
  }
}

/**
 * Get the top-level directory of the repository containing `directory`.
 *
 * @returns Absolute path, or null outside a git repository
 */
export function getRepositoryRoot(directory: string): string | null {
  return runGit(directory, ['rev-parse', '--show-toplevel']);
}

/**
 * Build a `<commit date>-<describe>` label for the checked-out revision,
 * e.g. `2024-03-01-v3.11.0-12-gabc1234`.
 *
 * @returns The label, or null when there is no commit to describe
 */
export function getCommitLabel(directory: string): string | null {
  const date = runGit(directory, ['show', '-s', '--format=%ci']);
  const describe = runGit(directory, ['describe', '--always']);
  if (!date || !describe) {
    return null;
  }
  return `${date.slice(0, 10)}-${describe}`;
}
