/**
 * Version Catalog
 *
 * Merges the working tree, git history and dated backups into one list of
 * selectable versions, and turns user-supplied names back into entries.
 * Nothing is cached between scans: every call sees the repository and the
 * backups directory as they are now.
 */

import { logDebug } from './logger.js';
import { BackupVersionSource } from './sources/backup-source.js';
import { GitVersionSource, type GitVersionSourceOptions } from './sources/git-source.js';
import { WorkingVersionSource } from './sources/working-source.js';
import { RepositoryUnavailableError, UnknownVersionError } from './errors.js';
import { isBackupDate, versionIdKey, type VersionId } from './version-id.js';
import { projectNameFor } from './design-target.js';
import type { CatalogEntry, VersionFileReader, VersionSource, VersionSourceKind } from './version-source.js';

const WORKING_NAMES = new Set(['WORK', 'WORKING']);
const HASH_PREFIX_PATTERN = /^[0-9a-f]{4,40}$/;

export interface VersionCatalogOptions extends GitVersionSourceOptions {
  /** Names the `<name>-backups` directory; looked up in the directory when omitted */
  projectName?: string;
}

export class VersionCatalog implements VersionFileReader {
  /**
   * @param sources - Listed in this order; a source kind may appear once
   */
  constructor(
    readonly projectRoot: string,
    private readonly sources: readonly VersionSource[]
  ) {}

  /**
   * Catalog over the working tree, git history and backups of a project directory
   */
  static async forProject(projectRoot: string, options: VersionCatalogOptions = {}): Promise<VersionCatalog> {
    const name = options.projectName ?? (await projectNameFor(projectRoot));
    return new VersionCatalog(projectRoot, [
      new WorkingVersionSource(projectRoot),
      new GitVersionSource(projectRoot, options),
      new BackupVersionSource(projectRoot, name),
    ]);
  }

  /**
   * Enumerate every version: working tree, commits newest first, backups newest first
   *
   * @throws RepositoryUnavailableError when no history source is available
   */
  async *versions(): AsyncGenerator<CatalogEntry> {
    const availability = await Promise.all(
      this.sources.map(async source => ({ source, available: await source.isAvailable() }))
    );
    if (!availability.some(({ source, available }) => available && source.kind !== 'working')) {
      throw new RepositoryUnavailableError(this.projectRoot);
    }

    const seen = new Set<string>();
    for (const { source, available } of availability) {
      if (!available) {
        continue;
      }
      for await (const entry of source.entries()) {
        const key = versionIdKey(entry.id);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        yield entry;
      }
    }
  }

  async listVersions(): Promise<CatalogEntry[]> {
    const entries: CatalogEntry[] = [];
    for await (const entry of this.versions()) {
      entries.push(entry);
    }
    logDebug('catalog', 'Scanned versions', { projectRoot: this.projectRoot, count: entries.length });
    return entries;
  }

  /**
   * @throws UnknownVersionError when the name matches no entry or several
   */
  async resolveVersion(name: string): Promise<CatalogEntry> {
    return resolveVersionName(name, await this.listVersions());
  }

  async readFile(id: VersionId, relativePath: string): Promise<Buffer | null> {
    return this.sourceFor(id.kind).readFile(id, relativePath);
  }

  private sourceFor(kind: VersionSourceKind): VersionSource {
    const source = this.sources.find(candidate => candidate.kind === kind);
    if (!source) {
      throw new Error(`No ${kind} source in this catalog`);
    }
    return source;
  }
}

/**
 * Resolve a user-supplied version name against a scanned list
 *
 * Accepts `WORK`/`WORKING` (any case), `HEAD` (newest commit), a backup
 * date `YYYY-MM-DD`, or a commit hash abbreviated to at least 4 characters.
 *
 * @throws UnknownVersionError when the name matches no entry or several
 */
export function resolveVersionName(name: string, entries: readonly CatalogEntry[]): CatalogEntry {
  const trimmed = name.trim();

  if (WORKING_NAMES.has(trimmed.toUpperCase())) {
    return requireOne(name, entries.filter(entry => entry.id.kind === 'working'));
  }

  if (trimmed === 'HEAD') {
    const head = entries.find(entry => entry.id.kind === 'git');
    if (!head) {
      throw new UnknownVersionError(name);
    }
    return head;
  }

  if (isBackupDate(trimmed)) {
    return requireOne(
      name,
      entries.filter(entry => entry.id.kind === 'backup' && entry.id.date === trimmed)
    );
  }

  const prefix = trimmed.toLowerCase();
  if (HASH_PREFIX_PATTERN.test(prefix)) {
    return requireOne(
      name,
      entries.filter(entry => entry.id.kind === 'git' && entry.id.sha.startsWith(prefix))
    );
  }

  throw new UnknownVersionError(name);
}

function requireOne(name: string, matches: readonly CatalogEntry[]): CatalogEntry {
  if (matches.length === 1) {
    return matches[0];
  }
  throw new UnknownVersionError(name, matches.map(entry => entry.label));
}
