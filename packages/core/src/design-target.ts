/**
 * Design targets and project detection
 *
 * A project is the directory holding a `.kicad_pro` file. The board and
 * root schematic are the sibling files sharing its stem, unless explicit
 * paths (configuration or command line) say otherwise.
 */

import { readdir, stat } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';

import type { ProjectConfig } from '@kicad-vdiff/config';
import { isMissingFileError, relativeWithin } from '@kicad-vdiff/utils';

import { logDebug } from './logger.js';

export type DesignKind = 'pcb' | 'sch';

export const DESIGN_EXTENSIONS: Readonly<Record<DesignKind, string>> = {
  pcb: '.kicad_pcb',
  sch: '.kicad_sch',
};

export const PROJECT_EXTENSION = '.kicad_pro';

/**
 * One design file, tracked by its path relative to the project directory
 */
export interface DesignTarget {
  readonly projectRoot: string;
  /** POSIX path relative to projectRoot */
  readonly relativePath: string;
  readonly kind: DesignKind;
}

export interface KicadProject {
  root: string;
  /** `.kicad_pro` stem; names the backups directory */
  name: string;
  proFile: string | null;
  pcb: DesignTarget | null;
  sch: DesignTarget | null;
}

export function designKindOf(path: string): DesignKind | null {
  switch (extname(path)) {
    case DESIGN_EXTENSIONS.pcb:
      return 'pcb';
    case DESIGN_EXTENSIONS.sch:
      return 'sch';
    default:
      return null;
  }
}

/**
 * @param path - Absolute, or relative to projectRoot
 * @throws Error if the path leaves the project directory or is not a design file
 */
export function createDesignTarget(projectRoot: string, path: string): DesignTarget {
  const root = resolve(projectRoot);
  const relativePath = relativeWithin(root, path);
  if (relativePath === null) {
    throw new Error(`${path} is outside the project directory ${root}`);
  }
  const kind = designKindOf(relativePath);
  if (!kind) {
    throw new Error(`${path} is not a ${DESIGN_EXTENSIONS.pcb} or ${DESIGN_EXTENSIONS.sch} file`);
  }
  return { projectRoot: root, relativePath, kind };
}

async function statKind(path: string): Promise<'file' | 'directory' | null> {
  try {
    const stats = await stat(path);
    if (stats.isDirectory()) {
      return 'directory';
    }
    return stats.isFile() ? 'file' : null;
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * First `.kicad_pro` file in `dir` (alphabetically), or null
 */
export async function findProjectFile(dir: string): Promise<string | null> {
  const names = (await readdir(dir)).filter(name => extname(name) === PROJECT_EXTENSION).sort();
  return names.length > 0 ? join(dir, names[0]) : null;
}

function fallbackProjectName(root: string, designFile: string | null): string {
  return designFile ? basename(designFile, extname(designFile)) : basename(resolve(root));
}

/**
 * Project name for a directory: the `.kicad_pro` stem, else the design
 * file's stem, else the directory name
 */
export async function projectNameFor(projectRoot: string, designFile: string | null = null): Promise<string> {
  const proFile = await findProjectFile(projectRoot);
  return proFile ? basename(proFile, PROJECT_EXTENSION) : fallbackProjectName(projectRoot, designFile);
}

/**
 * Project directory named by user input, and the design files given explicitly
 *
 * @throws Error when the files are not all in one directory
 */
export async function splitProjectInputs(
  inputs: readonly string[],
  cwd: string = process.cwd()
): Promise<{ root: string; files: string[] }> {
  const paths = inputs.map(input => resolve(cwd, input));
  if (paths.length === 0) {
    return { root: resolve(cwd), files: [] };
  }
  if (paths.length === 1 && (await statKind(paths[0])) === 'directory') {
    return { root: paths[0], files: [] };
  }
  const root = dirname(paths[0]);
  if (paths.some(path => dirname(path) !== root)) {
    throw new Error('All design files must be in the same directory');
  }
  return { root, files: paths };
}

/**
 * Work out the project directory and design targets from user input
 *
 * @param inputs - Nothing (current directory), one project directory, or
 *   `.kicad_pro`/`.kicad_pcb`/`.kicad_sch` files in a single directory
 * @param overrides - Explicit design files from configuration
 * @throws Error when the inputs are inconsistent or no design file is found
 *
 * @example
 * const project = await detectProject(['hardware/amp']);
 * project.pcb?.relativePath; // 'amp.kicad_pcb'
 */
export async function detectProject(
  inputs: readonly string[] = [],
  overrides: ProjectConfig = {},
  cwd: string = process.cwd()
): Promise<KicadProject> {
  const { root, files } = await splitProjectInputs(inputs, cwd);

  const explicit: Partial<Record<DesignKind | 'pro', string>> = {};
  for (const file of files) {
    const ext = extname(file);
    const kind = ext === PROJECT_EXTENSION ? 'pro' : designKindOf(file);
    if (!kind) {
      throw new Error(
        `Unsupported file: ${file} (expected ${PROJECT_EXTENSION}, ${DESIGN_EXTENSIONS.pcb} or ${DESIGN_EXTENSIONS.sch})`
      );
    }
    if (explicit[kind]) {
      throw new Error(`More than one ${ext} file given`);
    }
    explicit[kind] = file;
  }

  const proFile = explicit.pro ?? (await findProjectFile(root));
  const stem = proFile ? basename(proFile, PROJECT_EXTENSION) : null;

  const pick = async (kind: DesignKind): Promise<DesignTarget | null> => {
    const given = explicit[kind] ?? overrides[kind];
    if (given) {
      return createDesignTarget(root, given);
    }
    if (stem) {
      const sibling = join(root, `${stem}${DESIGN_EXTENSIONS[kind]}`);
      if ((await statKind(sibling)) === 'file') {
        return createDesignTarget(root, sibling);
      }
    }
    return null;
  };

  const pcb = await pick('pcb');
  const sch = await pick('sch');
  if (!pcb && !sch) {
    throw new Error(
      proFile
        ? `No ${DESIGN_EXTENSIONS.pcb} or ${DESIGN_EXTENSIONS.sch} file next to ${basename(proFile)}`
        : `No ${PROJECT_EXTENSION} file found in ${root}`
    );
  }

  const name = stem ?? fallbackProjectName(root, (pcb ?? sch)?.relativePath ?? null);
  const project: KicadProject = { root, name, proFile, pcb, sch };
  logDebug('config', 'Detected project', {
    root,
    name: project.name,
    pcb: pcb?.relativePath ?? null,
    sch: sch?.relativePath ?? null,
  });
  return project;
}

/**
 * The project's target of the given kind
 *
 * @throws Error when the project has no such design file
 */
export function requireTarget(project: KicadProject, kind: DesignKind): DesignTarget {
  const target = project[kind];
  if (!target) {
    throw new Error(`Project ${project.name} has no ${DESIGN_EXTENSIONS[kind]} file`);
  }
  return target;
}
