/**
 * File contents at a commit
 *
 * Reads objects straight from the object database with `git cat-file`, so
 * nothing is checked out and the user's working tree and index stay as they are.
 */

import { executeGitCommandAsync, validateRepoPath } from './git-executor.js';
import type { CommitSha } from './types.js';

/**
 * Check whether `path` exists at `sha`
 *
 * @param repoRoot - Repository root
 * @param path - Repository-relative POSIX path
 */
export async function blobExists(repoRoot: string, sha: CommitSha, path: string): Promise<boolean> {
  validateRepoPath(path);
  const result = await executeGitCommandAsync(
    ['cat-file', '-e', `${sha}:${path}`],
    { cwd: repoRoot, ignoreErrors: true }
  );
  return result.success;
}

/**
 * Read a file's bytes as of `sha`
 *
 * @returns File contents, or null when the path did not exist at that commit
 * @throws GitCommandError if the object exists but cannot be read as a blob
 */
export async function readBlob(repoRoot: string, sha: CommitSha, path: string): Promise<Buffer | null> {
  if (!(await blobExists(repoRoot, sha, path))) {
    return null;
  }

  const result = await executeGitCommandAsync(
    ['cat-file', 'blob', `${sha}:${path}`],
    { cwd: repoRoot }
  );
  return result.stdout;
}
