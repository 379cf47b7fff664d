/**
 * Version sources
 *
 * The catalog merges entries from several independent sources. Each source
 * knows how to enumerate its versions and how to read a project file at
 * one of them; nothing else in the pipeline cares where bytes come from.
 */

import type { VersionId } from './version-id.js';

export type VersionSourceKind = VersionId['kind'];

/**
 * One selectable version, as listed by the catalog
 */
export interface CatalogEntry {
  id: VersionId;
  /** Display label (short hash and subject, backup date, or working tree) */
  label: string;
  source: VersionSourceKind;
  /** Commit time or backup date; null for the working tree */
  timestamp: Date | null;
  author?: string;
  /** Ref decorations of a commit (e.g. "HEAD -> main, tag: v1.0") */
  refs?: string;
  /** First line of the commit message */
  subject?: string;
}

export interface VersionSource {
  readonly kind: VersionSourceKind;

  /** Whether this source has anything to offer for the project */
  isAvailable(): Promise<boolean>;

  /** Entries newest first */
  entries(): AsyncIterable<CatalogEntry>;

  /**
   * Read a project file as of `id`
   *
   * @param relativePath - POSIX path relative to the project directory
   * @returns File bytes, or null when the file does not exist at that version
   */
  readFile(id: VersionId, relativePath: string): Promise<Buffer | null>;
}

/**
 * Anything that can read project files at a version (the catalog, or a fake in tests)
 */
export interface VersionFileReader {
  readFile(id: VersionId, relativePath: string): Promise<Buffer | null>;
}
