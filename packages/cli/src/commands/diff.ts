/**
 * Diff command - compare one layer or sheet between two versions
 *
 * Writes the composite image (red: removed, blue: added) and prints the
 * pixel counts.
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import chalk from 'chalk';
import type { Command } from 'commander';

import {
  describeRenderObject,
  isAbortError,
  parseRenderObject,
  requireTarget,
  type DesignTarget,
  type ErrorInfo,
  type KicadProject,
  type RenderObject,
} from '@kicad-vdiff/core';

import { loadProjectContext } from '../utils/project-context.js';
import { reportError, reportFailure } from '../utils/report.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export const DEFAULT_OUTPUT = 'kicad-vdiff.png';

export interface DiffCommandOptions {
  object: string;
  output?: string;
  dpi?: number;
  fitBoard?: boolean;
  showUnchanged?: boolean;
  config?: string;
  cwd?: string;
  signal?: AbortSignal;
}

export type DiffOutput =
  | {
      success: true;
      base: string;
      target: string;
      file: string;
      object: string;
      output: string;
      identical: boolean;
      removedPixels: number;
      addedPixels: number;
      width: number;
      height: number;
    }
  | { success: false; error: ErrorInfo };

/**
 * Pick the design and render object an `--object` name refers to
 *
 * `pcb:<layer>` and `sch:<sheet path>` are explicit. A bare name is a board
 * layer when the project has a board, else a schematic sheet.
 *
 * @example
 * selectObject(project, 'F.Cu');       // board layer
 * selectObject(project, 'sch:root');   // root schematic sheet
 * selectObject(project, 'sch:IO/ADC'); // nested sheet
 */
export function selectObject(project: KicadProject, name: string): { target: DesignTarget; object: RenderObject } {
  const match = /^(pcb|sch):(.*)$/.exec(name);
  if (match) {
    const kind = match[1] === 'pcb' ? 'pcb' : 'sch';
    return { target: requireTarget(project, kind), object: parseRenderObject(kind, match[2]) };
  }
  const target = project.pcb ?? requireTarget(project, 'sch');
  return { target, object: parseRenderObject(target.kind, name) };
}

export async function runDiff(
  base: string,
  head: string,
  inputs: string[],
  options: DiffCommandOptions
): Promise<DiffOutput> {
  const { project, service } = await loadProjectContext(inputs, options);
  const { target, object } = selectObject(project, options.object);

  const result = await service.getDiff(target, base, head, {
    object,
    dpi: options.dpi,
    fitBoard: options.fitBoard,
    showUnchanged: options.showUnchanged,
    signal: options.signal,
  });
  if (!result.success) {
    return result;
  }

  const output = resolve(options.cwd ?? process.cwd(), options.output ?? DEFAULT_OUTPUT);
  await writeFile(output, result.diff.png);

  return {
    success: true,
    base: result.base.label,
    target: result.target.label,
    file: target.relativePath,
    object: describeRenderObject(object),
    output,
    identical: result.diff.identical,
    removedPixels: result.diff.removedPixels,
    addedPixels: result.diff.addedPixels,
    width: result.diff.width,
    height: result.diff.height,
  };
}

function displayDiff(output: Extract<DiffOutput, { success: true }>): void {
  console.log(chalk.bold(`${output.file} ${output.object}`));
  console.log(chalk.gray(`  base:   ${output.base}`));
  console.log(chalk.gray(`  target: ${output.target}`));
  if (output.identical) {
    console.log(chalk.green('  No visible changes'));
  } else {
    console.log(`  ${chalk.red(`${output.removedPixels} px removed`)}, ${chalk.blue(`${output.addedPixels} px added`)}`);
  }
  console.log(chalk.gray(`  ${output.width}x${output.height} image written to ${output.output}`));
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive number, got "${value}"`);
  }
  return parsed;
}

export function diffCommand(program: Command): void {
  program
    .command('diff')
    .description('Render one layer or sheet at two versions and write a colored diff image')
    .argument('<base>', 'base version: WORK, HEAD, a commit hash prefix or a backup date')
    .argument('<target>', 'target version, same forms as base')
    .argument('[project...]', 'project directory or design files (default: current directory)')
    .requiredOption('-O, --object <name>', 'board layer (F.Cu) or schematic sheet (sch:root, sch:Power)')
    .option('-o, --output <file>', `composite PNG to write (default: ${DEFAULT_OUTPUT})`)
    .option('--dpi <n>', 'raster resolution', parsePositiveNumber)
    .option('--fit-board', 'crop board plots to the board outline')
    .option('--show-unchanged', 'paint unchanged drawing gray')
    .option('-c, --config <file>', 'configuration file')
    .option('--yaml', 'output YAML only')
    .action(async (base: string, head: string, inputs: string[], options: DiffCommandOptions & { yaml?: boolean }) => {
      const yaml = options.yaml ?? false;
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);
      try {
        const output = await runDiff(base, head, inputs, { ...options, signal: controller.signal });
        if (!output.success) {
          await reportFailure(output.error, yaml);
        } else if (yaml) {
          await outputYamlResult(output);
        } else {
          displayDiff(output);
        }
      } catch (error) {
        if (isAbortError(error)) {
          // Renders already started would otherwise keep the process alive
          console.error(chalk.yellow('Cancelled'));
          process.exit(130);
        }
        await reportError(error, yaml);
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}
