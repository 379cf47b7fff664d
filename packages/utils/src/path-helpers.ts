/**
 * Path Helpers
 *
 * Temp-directory and path-normalization utilities. tmpdir() may return
 * Windows 8.3 short names (RUNNER~1) or macOS /var symlinks; everything
 * here returns the real path so later comparisons hold.
 *
 * @package @kicad-vdiff/utils
 */

import { realpathSync } from 'node:fs';
import { mkdir, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { isAbsolute, join, normalize, posix, relative, sep } from 'node:path';

/**
 * Get normalized temp directory path
 *
 * @returns Real path of the OS temp directory
 */
export function normalizedTmpdir(): string {
  const temp = tmpdir();
  try {
    return realpathSync(temp);
  } catch {
    return temp;
  }
}

/**
 * Normalize any path (resolve symlinks and short names)
 *
 * @returns Real path, or the original if it does not exist
 */
export function normalizePath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

/**
 * Root of all kicad-vdiff scratch space: `<tmp>/kicad-vdiff`
 */
export function getKicadVdiffTempDir(): string {
  return join(normalizedTmpdir(), 'kicad-vdiff');
}

/**
 * Create a fresh, uniquely named scratch directory
 *
 * @param area - Sub-area under the scratch root (e.g., 'snapshots', 'render')
 * @param prefix - Directory name prefix
 * @returns Absolute path of the new directory
 *
 * @example
 * const dir = await createScratchDir('snapshots', 'a1b2c3-');
 * // => /tmp/kicad-vdiff/snapshots/a1b2c3-XyZ12q
 */
export async function createScratchDir(area: string, prefix: string): Promise<string> {
  const areaDir = join(getKicadVdiffTempDir(), area);
  await mkdir(areaDir, { recursive: true });
  return mkdtemp(join(areaDir, prefix));
}

/**
 * Convert a native relative path to POSIX separators (git pathspec form)
 */
export function toPosixPath(path: string): string {
  return path.split(sep).join(posix.sep);
}

/**
 * Resolve `child` against `root` and return it as a POSIX relative path,
 * or null when it would leave `root`.
 *
 * @example
 * relativeWithin('/proj', '/proj/sheets/power.kicad_sch'); // 'sheets/power.kicad_sch'
 * relativeWithin('/proj', '/etc/passwd');                  // null
 */
export function relativeWithin(root: string, child: string): string | null {
  const rel = relative(root, isAbsolute(child) ? child : join(root, child));
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return toPosixPath(normalize(rel));
}

/**
 * True for fs errors meaning "nothing usable at this path"
 * (ENOENT, ENOTDIR, EISDIR)
 */
export function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'EISDIR')
  );
}
