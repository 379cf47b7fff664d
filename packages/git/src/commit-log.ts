/**
 * Commit history listing
 *
 * Fields are separated with ASCII unit separators and records with record
 * separators, neither of which appear in author names or subjects.
 */

import { executeGitCommandAsync } from './git-executor.js';
import { hasHeadCommit } from './git-commands.js';
import { toCommitSha, type CommitInfo } from './types.js';

const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';

/** hash, committer unix time, author name, ref decorations, subject */
const LOG_FORMAT = ['%H', '%ct', '%an', '%D', '%s'].join('%x1f') + '%x1e';

export interface ListCommitsOptions {
  /** Only the newest N commits */
  maxCount?: number;
  /** Only commits touching these repository-relative paths */
  paths?: string[];
}

/**
 * Parse `git log` output produced with {@link LOG_FORMAT}
 *
 * @throws Error on a record with missing fields or a malformed hash
 */
export function parseCommitLog(output: string): CommitInfo[] {
  const commits: CommitInfo[] = [];

  for (const rawRecord of output.split(RECORD_SEPARATOR)) {
    const record = rawRecord.replace(/^\r?\n/, '');
    if (record.trim() === '') {
      continue;
    }

    const fields = record.split(FIELD_SEPARATOR);
    if (fields.length !== 5) {
      throw new Error(`Malformed git log record (expected 5 fields, got ${fields.length}): ${record.slice(0, 100)}`);
    }

    const [hash, committedAt, author, refs, subject] = fields;
    const seconds = Number.parseInt(committedAt, 10);
    if (Number.isNaN(seconds)) {
      throw new Error(`Malformed git log record (bad timestamp "${committedAt}"): ${hash}`);
    }

    commits.push({
      sha: toCommitSha(hash),
      committedAt: new Date(seconds * 1000),
      author,
      refs,
      subject,
    });
  }

  return commits;
}

/**
 * List commits reachable from HEAD, newest first
 *
 * Returns an empty list for a repository without commits.
 *
 * @param repoRoot - Any directory inside the repository
 */
export async function listCommits(
  repoRoot: string,
  options: ListCommitsOptions = {}
): Promise<CommitInfo[]> {
  if (!hasHeadCommit(repoRoot)) {
    return [];
  }

  const args = ['log', `--format=${LOG_FORMAT}`];
  if (options.maxCount !== undefined) {
    args.push(`--max-count=${options.maxCount}`);
  }
  args.push('HEAD');
  if (options.paths && options.paths.length > 0) {
    args.push('--', ...options.paths);
  }

  const result = await executeGitCommandAsync(args, { cwd: repoRoot });
  return parseCommitLog(result.stdout.toString('utf8'));
}
