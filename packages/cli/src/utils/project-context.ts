/**
 * Project context shared by every command: the detected project, its
 * configuration, and a diff service built from that configuration
 */

import { resolve } from 'node:path';

import {
  findAndLoadConfig,
  loadConfigFromFile,
  type KicadVdiffConfig,
} from '@kicad-vdiff/config';
import {
  DiffService,
  detectProject,
  splitProjectInputs,
  type DesignTarget,
  type KicadProject,
} from '@kicad-vdiff/core';

export interface ProjectContext {
  project: KicadProject;
  config: KicadVdiffConfig;
  service: DiffService;
}

export interface ContextOptions {
  /** Explicit config file; otherwise looked up in the project directory */
  config?: string;
  cwd?: string;
}

/**
 * Load the configuration that applies to a project directory
 */
export async function loadProjectConfig(projectRoot: string, configPath?: string): Promise<KicadVdiffConfig> {
  return configPath ? loadConfigFromFile(configPath) : findAndLoadConfig(projectRoot);
}

/**
 * Detect the project named on the command line and load its configuration
 *
 * @throws Error when the project cannot be detected or its config is invalid
 */
export async function loadProjectContext(
  inputs: readonly string[],
  options: ContextOptions = {}
): Promise<ProjectContext> {
  const cwd = options.cwd ?? process.cwd();
  const { root } = await splitProjectInputs(inputs, cwd);
  const config = await loadProjectConfig(root, options.config ? resolve(cwd, options.config) : undefined);
  const project = await detectProject(inputs, config.project, cwd);
  return { project, config, service: new DiffService({ config }) };
}

/**
 * Any design of the project; versions are per project, not per file
 */
export function primaryTarget(project: KicadProject): DesignTarget {
  const target = project.pcb ?? project.sch;
  if (!target) {
    throw new Error(`Project ${project.name} has no design files`);
  }
  return target;
}
