/**
 * Version identifiers
 *
 * A version is a commit, a dated backup, or the live working tree. The
 * union is closed: every consumer switches on `kind` and the compiler
 * checks the switch is exhaustive.
 */

import { isCommitSha, type CommitSha } from '@kicad-vdiff/git';

import { UnknownVersionError } from './errors.js';

/** Calendar date of a backup, `YYYY-MM-DD` */
export type BackupDate = string & { readonly __brand: 'BackupDate' };

export interface GitVersionId {
  readonly kind: 'git';
  readonly sha: CommitSha;
}

export interface BackupVersionId {
  readonly kind: 'backup';
  readonly date: BackupDate;
}

export interface WorkingVersionId {
  readonly kind: 'working';
}

export type VersionId = GitVersionId | BackupVersionId | WorkingVersionId;

/** The live working tree */
export const WORKING: WorkingVersionId = Object.freeze({ kind: 'working' });

/** Name the working tree is listed and resolved under */
export const WORKING_NAME = 'WORK';

const BACKUP_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Type guard for real calendar dates in `YYYY-MM-DD` form
 *
 * @example
 * isBackupDate('2024-02-29'); // true
 * isBackupDate('2023-02-29'); // false
 */
export function isBackupDate(value: string): value is BackupDate {
  const match = BACKUP_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}

/**
 * @throws UnknownVersionError if `sha` is not a full 40-character lowercase hash
 */
export function gitVersion(sha: string): GitVersionId {
  if (!isCommitSha(sha)) {
    throw new UnknownVersionError(sha);
  }
  return { kind: 'git', sha };
}

/**
 * @throws UnknownVersionError if `date` is not a valid `YYYY-MM-DD` date
 */
export function backupVersion(date: string): BackupVersionId {
  if (!isBackupDate(date)) {
    throw new UnknownVersionError(date);
  }
  return { kind: 'backup', date };
}

/**
 * Stable string form, unique per version (used in cache keys)
 */
export function versionIdKey(id: VersionId): string {
  switch (id.kind) {
    case 'git':
      return `git:${id.sha}`;
    case 'backup':
      return `backup:${id.date}`;
    case 'working':
      return 'working';
  }
}

/**
 * Canonical text form, accepted back by the resolver
 *
 * @example
 * formatVersionId(WORKING); // 'WORK'
 * formatVersionId(backupVersion('2024-03-01')); // '2024-03-01'
 */
export function formatVersionId(id: VersionId): string {
  switch (id.kind) {
    case 'git':
      return id.sha;
    case 'backup':
      return id.date;
    case 'working':
      return WORKING_NAME;
  }
}

export function sameVersion(a: VersionId, b: VersionId): boolean {
  return versionIdKey(a) === versionIdKey(b);
}
