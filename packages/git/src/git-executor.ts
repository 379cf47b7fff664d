/**
 * Secure Git Command Execution
 *
 * This module provides a centralized, secure way to execute git commands.
 * ALL git command execution in kicad-vdiff MUST go through this module.
 *
 * Security principles:
 * 1. Spawn with array arguments (never string interpolation)
 * 2. Validate all user-controlled inputs (refs, paths)
 * 3. No shell piping or heredocs
 * 4. Read-only commands only: the user's working tree is never touched
 *
 * @packageDocumentation
 */

import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

import { runCommand } from '@kicad-vdiff/utils';

const GIT_TIMEOUT = 30000; // 30 seconds

export interface GitExecutionOptions {
  /**
   * Directory to run git in (default: process.cwd())
   */
  cwd?: string;

  /**
   * Maximum time to wait for git command (ms)
   * @default 30000
   */
  timeout?: number;

  /**
   * Whether to ignore errors (return result instead of throwing)
   * @default false
   */
  ignoreErrors?: boolean;
}

/**
 * Result of a git command execution
 */
export interface GitExecutionResult {
  /** Standard output from the command, trimmed */
  stdout: string;
  /** Standard error from the command, trimmed */
  stderr: string;
  /** Exit code (0 for success) */
  exitCode: number;
  /** Whether the command succeeded */
  success: boolean;
}

/**
 * Result of a git command whose output is binary (file blobs)
 */
export interface GitBinaryResult {
  /** Raw standard output */
  stdout: Buffer;
  /** Standard error, trimmed */
  stderr: string;
  exitCode: number;
  success: boolean;
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends Error {
  /** Exit code from the git command */
  public readonly exitCode: number;
  /** Standard error output */
  public readonly stderr: string;
  /** Standard output */
  public readonly stdout: string;

  constructor(args: string[], exitCode: number, stderr: string, stdout: string) {
    super(`Git command failed: git ${args.join(' ')}\n${stderr || stdout || 'Git command failed'}`);
    this.name = 'GitCommandError';
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.stdout = stdout;
  }
}

function assertArgs(args: string[]): void {
  if (!Array.isArray(args) || args.length === 0) {
    throw new Error('Git command arguments must be a non-empty array');
  }
}

/**
 * Execute a git command synchronously using spawnSync with array arguments
 *
 * Suitable for quick metadata queries (rev-parse). Anything that may be slow
 * or return large output goes through {@link executeGitCommandAsync}.
 *
 * @throws GitCommandError if command fails and ignoreErrors is false
 *
 * @example
 * ```typescript
 * const result = executeGitCommand(['rev-parse', '--show-toplevel'], { cwd: projectDir });
 * console.log(result.stdout); // "/home/me/boards"
 * ```
 */
export function executeGitCommand(
  args: string[],
  options: GitExecutionOptions = {}
): GitExecutionResult {
  const { cwd, timeout = GIT_TIMEOUT, ignoreErrors = false } = options;
  assertArgs(args);

  const spawnOptions: SpawnSyncOptions = {
    cwd,
    encoding: 'utf8',
    timeout,
    maxBuffer: 10 * 1024 * 1024, // 10MB buffer
    stdio: ['ignore', 'pipe', 'pipe'],
  };

  const result = spawnSync('git', args, spawnOptions);

  const stdout = (result.stdout?.toString() || '').trim();
  const stderr = (result.stderr?.toString() || result.error?.message || '').trim();
  const exitCode = result.status ?? 1;
  const success = exitCode === 0;

  if (!success && !ignoreErrors) {
    throw new GitCommandError(args, exitCode, stderr, stdout);
  }

  return { stdout, stderr, exitCode, success };
}

/**
 * Execute a git command asynchronously, returning stdout unmodified
 *
 * Used for commit listing and blob extraction: both can be large and slow,
 * and must not stall other requests while they run.
 *
 * @throws GitCommandError if command fails and ignoreErrors is false
 */
export async function executeGitCommandAsync(
  args: string[],
  options: GitExecutionOptions = {}
): Promise<GitBinaryResult> {
  const { cwd, timeout = GIT_TIMEOUT, ignoreErrors = false } = options;
  assertArgs(args);

  const result = await runCommand('git', args, { cwd, timeout });
  const stderr = result.timedOut
    ? `git timed out after ${timeout}ms`
    : result.stderr.toString('utf8').trim();
  const success = result.status === 0 && !result.timedOut;

  if (!success && !ignoreErrors) {
    throw new GitCommandError(args, result.status, stderr, result.stdout.toString('utf8').trim());
  }

  return { stdout: result.stdout, stderr, exitCode: result.status, success };
}

/**
 * Execute a git command and return stdout, throwing on error
 */
export function execGitCommand(args: string[], options: GitExecutionOptions = {}): string {
  return executeGitCommand(args, options).stdout;
}

/**
 * Execute a git command and return success status (no throw)
 */
export function tryGitCommand(args: string[], options: GitExecutionOptions = {}): boolean {
  return executeGitCommand(args, { ...options, ignoreErrors: true }).success;
}

/**
 * Validate a repository-relative path used in `<commit>:<path>` object names
 *
 * @throws Error if the path is absolute, escapes the repository, or is malformed
 */
export function validateRepoPath(path: string): void {
  if (typeof path !== 'string' || path.length === 0) {
    throw new Error('Repository path must be a non-empty string');
  }

  if (path.startsWith('/') || /^[A-Za-z]:/.test(path)) {
    throw new Error(`Invalid repository path: must be relative: ${path}`);
  }

  if (path.includes('\\')) {
    throw new Error(`Invalid repository path: must use forward slashes: ${path}`);
  }

  if (path.split('/').includes('..')) {
    throw new Error(`Invalid repository path: contains path traversal: ${path}`);
  }

  if (path.includes('\0') || path.includes('\n') || path.includes('\r')) {
    throw new Error(`Invalid repository path: contains control characters: ${path}`);
  }
}
