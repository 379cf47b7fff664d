/**
 * Branded types for git objects
 *
 * These types prevent incorrect usage at compile time by ensuring only
 * properly validated values can be used with git operations.
 *
 * @example
 * // ✅ CORRECT - CommitSha from listCommits() or toCommitSha()
 * const [head] = await listCommits(repoRoot);
 * await readBlob(repoRoot, head.sha, 'board.kicad_pcb');
 *
 * // ❌ WRONG - Compilation error
 * await readBlob(repoRoot, 'HEAD', 'board.kicad_pcb');
 */

/**
 * Branded type for git commit SHAs
 *
 * Commit SHAs are full 40-character lowercase hexadecimal identifiers.
 * Symbolic refs like 'HEAD' or 'main' are NOT valid commit SHAs.
 */
export type CommitSha = string & { readonly __brand: 'CommitSha' };

const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/;

/**
 * Type guard for full commit SHAs
 */
export function isCommitSha(value: string): value is CommitSha {
  return COMMIT_SHA_PATTERN.test(value);
}

/**
 * Brand a string as a CommitSha after validating it
 *
 * @throws Error if value is not a 40-character lowercase hex string
 */
export function toCommitSha(value: string): CommitSha {
  if (!isCommitSha(value)) {
    throw new Error(`Invalid commit SHA: expected 40 hex characters: ${value}`);
  }
  return value;
}

/**
 * A commit reachable from HEAD
 */
export interface CommitInfo {
  /** Full commit hash */
  sha: CommitSha;
  /** Committer date */
  committedAt: Date;
  /** Author name */
  author: string;
  /** Decorations as printed by `%D` (e.g. "HEAD -> main, tag: v1.0") */
  refs: string;
  /** First line of the commit message */
  subject: string;
}
