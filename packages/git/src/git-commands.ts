/**
 * Git Command Utilities
 *
 * Repository discovery helpers. Every function takes the directory to run
 * in, since the project being diffed is rarely the process's cwd.
 */

import { execGitCommand, tryGitCommand } from './git-executor.js';

/**
 * Check if a directory is inside a git work tree
 *
 * Returns false (never throws) when git itself is not installed.
 */
export function isGitRepository(cwd?: string): boolean {
  return tryGitCommand(['rev-parse', '--is-inside-work-tree'], { cwd });
}

/**
 * Get the root directory of the git repository containing `cwd`
 * @throws Error if not in a git repository
 */
export function getRepositoryRoot(cwd?: string): string {
  return execGitCommand(['rev-parse', '--show-toplevel'], { cwd });
}

/**
 * Get the repository root, or null when `cwd` is not in a repository
 */
export function findRepositoryRoot(cwd?: string): string | null {
  if (!isGitRepository(cwd)) {
    return null;
  }
  return getRepositoryRoot(cwd);
}

/**
 * Check whether HEAD points at a commit (false in a freshly initialised repository)
 */
export function hasHeadCommit(cwd?: string): boolean {
  return tryGitCommand(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}'], { cwd });
}
