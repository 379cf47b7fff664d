/**
 * Objects command - list the layers and sheets that can be diffed
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import {
  describeRenderObject,
  type DesignKind,
  type DesignTarget,
  type ErrorInfo,
  type KicadProject,
} from '@kicad-vdiff/core';

import { loadProjectContext } from '../utils/project-context.js';
import { reportError, reportFailure } from '../utils/report.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export interface ObjectSummary {
  design: DesignKind;
  /** Design file, relative to the project directory */
  file: string;
  /** Name accepted by `diff --object` */
  name: string;
}

export type ObjectsOutput =
  | { success: true; project: string; objects: ObjectSummary[] }
  | { success: false; error: ErrorInfo };

export interface ObjectsOptions {
  config?: string;
  cwd?: string;
}

export async function runObjects(inputs: string[], options: ObjectsOptions = {}): Promise<ObjectsOutput> {
  const { project, service } = await loadProjectContext(inputs, options);
  const objects: ObjectSummary[] = [];

  for (const target of designTargets(project)) {
    const result = await service.listObjects(target);
    if (!result.success) {
      return result;
    }
    for (const object of result.objects) {
      const name = describeRenderObject(object);
      objects.push({
        design: target.kind,
        file: target.relativePath,
        // Sheets are addressed with a prefix when the project also has a board
        name: target.kind === 'sch' && project.pcb ? `sch:${name}` : name,
      });
    }
  }
  return { success: true, project: project.name, objects };
}

function designTargets(project: KicadProject): DesignTarget[] {
  return [project.pcb, project.sch].flatMap(target => (target ? [target] : []));
}

function displayObjects(output: Extract<ObjectsOutput, { success: true }>): void {
  let file: string | null = null;
  for (const object of output.objects) {
    if (object.file !== file) {
      file = object.file;
      console.log(chalk.bold(`${file}:`));
    }
    console.log(`  ${object.name}`);
  }
}

export function objectsCommand(program: Command): void {
  program
    .command('objects')
    .description('List the board layers and schematic sheets of a KiCad project')
    .argument('[project...]', 'project directory or design files (default: current directory)')
    .option('-c, --config <file>', 'configuration file')
    .option('--yaml', 'output YAML only')
    .action(async (inputs: string[], options: { config?: string; yaml?: boolean }) => {
      const yaml = options.yaml ?? false;
      try {
        const output = await runObjects(inputs, options);
        if (!output.success) {
          await reportFailure(output.error, yaml);
        } else if (yaml) {
          await outputYamlResult(output);
        } else {
          displayObjects(output);
        }
      } catch (error) {
        await reportError(error, yaml);
      }
    });
}
