/**
 * @kicad-vdiff/git
 *
 * Read-only git access for kicad-vdiff: repository discovery, commit
 * history and file contents at a commit.
 *
 * @packageDocumentation
 */

// Branded types for git objects (compile-time safety)
export {
  isCommitSha,
  toCommitSha,
  type CommitSha,
  type CommitInfo,
} from './types.js';

// Repository discovery
export {
  isGitRepository,
  getRepositoryRoot,
  findRepositoryRoot,
  hasHeadCommit,
} from './git-commands.js';

// History and blobs
export {
  listCommits,
  parseCommitLog,
  type ListCommitsOptions,
} from './commit-log.js';
export { blobExists, readBlob } from './blob.js';

// Secure git command execution (low-level - use high-level APIs when possible)
export {
  executeGitCommand,
  executeGitCommandAsync,
  execGitCommand,
  tryGitCommand,
  validateRepoPath,
  GitCommandError,
  type GitExecutionOptions,
  type GitExecutionResult,
  type GitBinaryResult,
} from './git-executor.js';
