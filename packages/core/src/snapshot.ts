/**
 * Snapshot Materializer
 *
 * Produces an on-disk copy of a design as of one version so the renderer
 * can open it. Historical versions are written to a private temp directory
 * (with every sub-sheet a schematic pulls in); the working tree is used in
 * place. Callers should prefer `withSnapshot`, which always releases.
 */

import { createHash } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { createScratchDir } from '@kicad-vdiff/utils';

import type { DesignTarget } from './design-target.js';
import { VersionFileNotFoundError } from './errors.js';
import { logDebug, logWarning, toError } from './logger.js';
import { parseSheetReferences, resolveSheetPath, type SheetReference } from './schematic-sheets.js';
import { formatVersionId, type VersionId } from './version-id.js';
import type { VersionFileReader } from './version-source.js';

/**
 * A sub-sheet reachable from the root schematic
 */
export interface SchematicSheet {
  /** Sheet names from the root down, joined with '/' (e.g. "Power/Regulator") */
  path: string;
  name: string;
  /** Project-relative POSIX path of the sheet file */
  file: string;
}

export interface DesignFiles {
  /** Project-relative path -> bytes, target first */
  files: Map<string, Buffer>;
  sheets: SchematicSheet[];
}

export interface Snapshot {
  readonly target: DesignTarget;
  readonly version: VersionId;
  /** Directory laid out like the project directory */
  readonly dir: string;
  /** Absolute path of the target file inside `dir` */
  readonly entryFile: string;
  /** Project-relative paths of every file in the snapshot */
  readonly files: readonly string[];
  readonly sheets: readonly SchematicSheet[];
  /** True when `dir` is a temp directory this materializer must delete */
  readonly owned: boolean;
  /** sha256 over every file's path and bytes */
  readonly contentDigest: string;
}

interface SheetWalk {
  reader: VersionFileReader;
  version: VersionId;
  files: Map<string, Buffer>;
  sheets: SchematicSheet[];
}

/**
 * Read a design file and, for schematics, every sub-sheet it references
 *
 * @throws VersionFileNotFoundError when the target itself is missing at `version`
 */
export async function collectDesignFiles(
  reader: VersionFileReader,
  version: VersionId,
  target: DesignTarget
): Promise<DesignFiles> {
  const content = await reader.readFile(version, target.relativePath);
  if (!content) {
    throw new VersionFileNotFoundError(target.relativePath, formatVersionId(version));
  }

  const walk: SheetWalk = {
    reader,
    version,
    files: new Map([[target.relativePath, content]]),
    sheets: [],
  };
  if (target.kind === 'sch') {
    await walkSheets(walk, target.relativePath, content, [], [target.relativePath]);
  }
  return { files: walk.files, sheets: walk.sheets };
}

async function walkSheets(
  walk: SheetWalk,
  parentPath: string,
  content: Buffer,
  namePath: readonly string[],
  ancestors: readonly string[]
): Promise<void> {
  let references: SheetReference[];
  try {
    references = parseSheetReferences(content.toString('utf8'));
  } catch (error) {
    logWarning('snapshot', `Cannot read sheet references from ${parentPath}`, toError(error));
    return;
  }

  for (const reference of references) {
    const file = resolveSheetPath(parentPath, reference.file);
    if (file === null) {
      logWarning('snapshot', `Sheet ${reference.file} in ${parentPath} points outside the project - skipping`);
      continue;
    }
    if (ancestors.includes(file)) {
      logWarning('snapshot', `Sheet ${file} includes itself - skipping`);
      continue;
    }

    let bytes = walk.files.get(file) ?? null;
    if (!bytes) {
      bytes = await walk.reader.readFile(walk.version, file);
      if (!bytes) {
        logWarning('snapshot', `Sheet ${file} missing at ${formatVersionId(walk.version)} - skipping`);
        continue;
      }
      walk.files.set(file, bytes);
    }

    const names = [...namePath, reference.name];
    walk.sheets.push({ path: names.join('/'), name: reference.name, file });
    await walkSheets(walk, file, bytes, names, [...ancestors, file]);
  }
}

/**
 * sha256 over sorted paths and their bytes
 */
export function digestFiles(files: ReadonlyMap<string, Buffer>): string {
  const hash = createHash('sha256');
  for (const path of [...files.keys()].sort()) {
    const bytes = files.get(path) ?? Buffer.alloc(0);
    hash.update(path).update('\0').update(String(bytes.length)).update('\0').update(bytes);
  }
  return hash.digest('hex');
}

async function removeDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    logWarning('snapshot', `Failed to remove snapshot directory ${dir}`, toError(error));
  }
}

function nativePath(root: string, relativePath: string): string {
  return join(root, ...relativePath.split('/'));
}

export class SnapshotMaterializer {
  constructor(private readonly reader: VersionFileReader) {}

  /**
   * @throws VersionFileNotFoundError when the target is missing at `version`
   */
  async materialize(target: DesignTarget, version: VersionId): Promise<Snapshot> {
    const { files, sheets } = await collectDesignFiles(this.reader, version, target);
    const contentDigest = digestFiles(files);
    const base = {
      target,
      version,
      files: [...files.keys()],
      sheets,
      contentDigest,
    };

    if (version.kind === 'working') {
      return {
        ...base,
        dir: target.projectRoot,
        entryFile: nativePath(target.projectRoot, target.relativePath),
        owned: false,
      };
    }

    const dir = await createScratchDir('snapshots', `${contentDigest.slice(0, 12)}-`);
    try {
      for (const [relativePath, bytes] of files) {
        const path = nativePath(dir, relativePath);
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, bytes);
      }
    } catch (error) {
      await removeDir(dir);
      throw error;
    }

    logDebug('snapshot', 'Materialized snapshot', {
      target: target.relativePath,
      version: formatVersionId(version),
      dir,
      files: files.size,
    });
    return { ...base, dir, entryFile: nativePath(dir, target.relativePath), owned: true };
  }

  /**
   * Delete an owned snapshot directory; a no-op for working-tree snapshots
   *
   * Failures are logged, never thrown.
   */
  async release(snapshot: Snapshot): Promise<void> {
    if (snapshot.owned) {
      await removeDir(snapshot.dir);
    }
  }

  /**
   * Run `fn` with a materialized snapshot and release it afterwards
   */
  async withSnapshot<T>(
    target: DesignTarget,
    version: VersionId,
    fn: (snapshot: Snapshot) => Promise<T>
  ): Promise<T> {
    const snapshot = await this.materialize(target, version);
    try {
      return await fn(snapshot);
    } finally {
      await this.release(snapshot);
    }
  }
}
