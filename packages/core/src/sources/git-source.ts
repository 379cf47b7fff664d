/**
 * Commits reachable from HEAD of the repository containing the project
 */

import { posix } from 'node:path';

import { GitCommandError, findRepositoryRoot, listCommits, readBlob } from '@kicad-vdiff/git';
import { normalizePath, relativeWithin } from '@kicad-vdiff/utils';

import { RepositoryUnavailableError } from '../errors.js';
import { logDebug } from '../logger.js';
import type { VersionId } from '../version-id.js';
import type { CatalogEntry, VersionSource } from '../version-source.js';

interface RepositoryLocation {
  root: string;
  /** Project directory relative to the repository root ('' at the root) */
  prefix: string;
}

export interface GitVersionSourceOptions {
  /** Only list the newest N commits */
  maxCommits?: number;
}

export class GitVersionSource implements VersionSource {
  readonly kind = 'git' as const;
  private location: RepositoryLocation | null | undefined;

  constructor(
    private readonly projectRoot: string,
    private readonly options: GitVersionSourceOptions = {}
  ) {}

  async isAvailable(): Promise<boolean> {
    return this.locate() !== null;
  }

  async *entries(): AsyncGenerator<CatalogEntry> {
    const location = this.locate();
    if (!location) {
      return;
    }

    const commits = await this.wrapGitErrors(
      () => listCommits(location.root, { maxCount: this.options.maxCommits })
    );
    logDebug('git', 'Listed commits', { repository: location.root, count: commits.length });

    for (const commit of commits) {
      yield {
        id: { kind: 'git', sha: commit.sha },
        label: `${commit.sha.slice(0, 7)} ${commit.subject}`,
        source: 'git',
        timestamp: commit.committedAt,
        author: commit.author,
        refs: commit.refs,
        subject: commit.subject,
      };
    }
  }

  async readFile(id: VersionId, relativePath: string): Promise<Buffer | null> {
    if (id.kind !== 'git') {
      throw new Error(`GitVersionSource cannot read ${id.kind} versions`);
    }
    const location = this.locate();
    if (!location) {
      return null;
    }
    return this.wrapGitErrors(
      () => readBlob(location.root, id.sha, posix.join(location.prefix, relativePath))
    );
  }

  /** A failing git command means the repository cannot be read */
  private async wrapGitErrors<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new RepositoryUnavailableError(this.projectRoot, error.message);
      }
      throw error;
    }
  }

  /** Repository discovery runs once per source */
  private locate(): RepositoryLocation | null {
    if (this.location === undefined) {
      const root = findRepositoryRoot(this.projectRoot);
      this.location = root === null
        ? null
        : { root, prefix: relativeWithin(normalizePath(root), normalizePath(this.projectRoot)) ?? '' };
      logDebug('git', 'Repository lookup', { projectRoot: this.projectRoot, location: this.location });
    }
    return this.location;
  }
}
