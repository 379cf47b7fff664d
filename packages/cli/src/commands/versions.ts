/**
 * Versions command - list the versions a design can be compared at
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { formatVersionId, type CatalogEntry, type ErrorInfo, type VersionSourceKind } from '@kicad-vdiff/core';

import { loadProjectContext, primaryTarget } from '../utils/project-context.js';
import { reportError, reportFailure } from '../utils/report.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export interface VersionSummary {
  /** Name accepted by `diff` */
  name: string;
  label: string;
  source: VersionSourceKind;
  timestamp: string | null;
  author?: string;
  refs?: string;
}

export type VersionsOutput =
  | { success: true; project: string; versions: VersionSummary[] }
  | { success: false; error: ErrorInfo };

export interface VersionsOptions {
  config?: string;
  cwd?: string;
}

export function summarizeEntry(entry: CatalogEntry): VersionSummary {
  const summary: VersionSummary = {
    name: entry.id.kind === 'git' ? entry.id.sha.slice(0, 12) : formatVersionId(entry.id),
    label: entry.label,
    source: entry.source,
    timestamp: entry.timestamp ? entry.timestamp.toISOString() : null,
  };
  if (entry.author) {
    summary.author = entry.author;
  }
  if (entry.refs) {
    summary.refs = entry.refs;
  }
  return summary;
}

/**
 * List every version of the project, working tree first
 */
export async function runVersions(inputs: string[], options: VersionsOptions = {}): Promise<VersionsOutput> {
  const { project, service } = await loadProjectContext(inputs, options);
  const result = await service.resolveVersions(primaryTarget(project));
  if (!result.success) {
    return result;
  }
  return { success: true, project: project.name, versions: result.versions.map(summarizeEntry) };
}

const SOURCE_COLORS: Record<VersionSourceKind, (text: string) => string> = {
  working: chalk.green,
  git: chalk.yellow,
  backup: chalk.cyan,
};

function displayVersions(output: Extract<VersionsOutput, { success: true }>): void {
  console.log(chalk.bold(`Versions of ${output.project}\n`));
  for (const version of output.versions) {
    const date = version.timestamp ? chalk.gray(` ${version.timestamp.slice(0, 10)}`) : '';
    const refs = version.refs ? chalk.magenta(` (${version.refs})`) : '';
    console.log(`  ${SOURCE_COLORS[version.source](version.name.padEnd(12))}${date}  ${version.label}${refs}`);
  }
}

export function versionsCommand(program: Command): void {
  program
    .command('versions')
    .description('List the working tree, commits and backups of a KiCad project')
    .argument('[project...]', 'project directory or design files (default: current directory)')
    .option('-c, --config <file>', 'configuration file')
    .option('--yaml', 'output YAML only')
    .action(async (inputs: string[], options: { config?: string; yaml?: boolean }) => {
      const yaml = options.yaml ?? false;
      try {
        const output = await runVersions(inputs, options);
        if (!output.success) {
          await reportFailure(output.error, yaml);
        } else if (yaml) {
          await outputYamlResult(output);
        } else {
          displayVersions(output);
        }
      } catch (error) {
        await reportError(error, yaml);
      }
    });
}
