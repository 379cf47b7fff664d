/**
 * KiCad's backups, under `<project>-backups/`:
 *
 * - archives `<project>-YYYY-MM-DD_HHMMSS.zip`, as KiCad writes them
 * - dated directories `YYYY-MM-DD/` holding a copy of the project files
 *
 * One version per day. A day with several archives is the newest of them;
 * an archive wins over a directory of the same date.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { unzipSync } from 'fflate';

import { isMissingFileError } from '@kicad-vdiff/utils';

import { RepositoryUnavailableError } from '../errors.js';
import { logDebug, toError } from '../logger.js';
import { isBackupDate, type BackupDate, type VersionId } from '../version-id.js';
import type { CatalogEntry, VersionSource } from '../version-source.js';

const ARCHIVE_PATTERN = /(\d{4}-\d{2}-\d{2})_(\d{2})(\d{2})(\d{2})\.zip$/;

type BackupLocation =
  | { kind: 'directory'; path: string }
  | { kind: 'archive'; path: string; time: string };

/**
 * Date and `HH:MM:SS` of a backup archive file name, or null for other names
 */
export function parseArchiveName(fileName: string): { date: BackupDate; time: string } | null {
  const match = ARCHIVE_PATTERN.exec(fileName);
  if (!match || !isBackupDate(match[1])) {
    return null;
  }
  return { date: match[1], time: `${match[2]}:${match[3]}:${match[4]}` };
}

function archiveEntryName(name: string): string {
  return name.replace(/\\/g, '/').replace(/^(\.\/|\/)+/, '');
}

export class BackupVersionSource implements VersionSource {
  readonly kind = 'backup' as const;
  readonly backupsDir: string;

  /**
   * @param projectRoot - Directory holding the `.kicad_pro` file
   * @param projectName - Stem of the `.kicad_pro` file
   */
  constructor(
    private readonly projectRoot: string,
    projectName: string
  ) {
    this.backupsDir = join(projectRoot, `${projectName}-backups`);
  }

  async isAvailable(): Promise<boolean> {
    try {
      return (await stat(this.backupsDir)).isDirectory();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async *entries(): AsyncGenerator<CatalogEntry> {
    if (!(await this.isAvailable())) {
      return;
    }

    const locations = await this.scan();
    const dates = [...locations.keys()].sort().reverse();
    logDebug('catalog', 'Listed backups', { backupsDir: this.backupsDir, count: dates.length });

    for (const date of dates) {
      const location = locations.get(date);
      const time = location?.kind === 'archive' ? location.time : null;
      yield {
        id: { kind: 'backup', date },
        label: time ? `Backup ${date} ${time}` : `Backup ${date}`,
        source: 'backup',
        // Archive names carry KiCad's local time; directories only a date
        timestamp: time ? new Date(`${date}T${time}`) : new Date(`${date}T00:00:00Z`),
      };
    }
  }

  async readFile(id: VersionId, relativePath: string): Promise<Buffer | null> {
    if (id.kind !== 'backup') {
      throw new Error(`BackupVersionSource cannot read ${id.kind} versions`);
    }
    if (!(await this.isAvailable())) {
      return null;
    }

    const location = (await this.scan()).get(id.date);
    if (!location) {
      return null;
    }
    if (location.kind === 'archive') {
      return this.readArchiveFile(location.path, relativePath);
    }
    try {
      return await readFile(join(location.path, ...relativePath.split('/')));
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Backup location per date, read fresh on every call
   */
  private async scan(): Promise<Map<BackupDate, BackupLocation>> {
    const dirents = await readdir(this.backupsDir, { withFileTypes: true });
    const locations = new Map<BackupDate, BackupLocation>();

    for (const dirent of dirents) {
      if (dirent.isDirectory() && isBackupDate(dirent.name) && !locations.has(dirent.name)) {
        locations.set(dirent.name, { kind: 'directory', path: join(this.backupsDir, dirent.name) });
      }
    }
    for (const dirent of dirents) {
      const parsed = dirent.isFile() ? parseArchiveName(dirent.name) : null;
      if (!parsed) {
        continue;
      }
      const current = locations.get(parsed.date);
      if (current?.kind === 'archive' && current.time >= parsed.time) {
        continue;
      }
      locations.set(parsed.date, { kind: 'archive', path: join(this.backupsDir, dirent.name), time: parsed.time });
    }
    return locations;
  }

  private async readArchiveFile(archivePath: string, relativePath: string): Promise<Buffer | null> {
    const bytes = await readFile(archivePath);
    let files: Record<string, Uint8Array>;
    try {
      files = unzipSync(new Uint8Array(bytes), {
        filter: file => archiveEntryName(file.name) === relativePath,
      });
    } catch (error) {
      throw new RepositoryUnavailableError(
        this.projectRoot,
        `Cannot read backup archive ${archivePath}: ${toError(error).message}`
      );
    }

    for (const [name, content] of Object.entries(files)) {
      if (archiveEntryName(name) === relativePath) {
        return Buffer.from(content);
      }
    }
    return null;
  }
}
