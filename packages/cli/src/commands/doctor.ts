/**
 * Doctor Command
 *
 * Diagnoses the environment kicad-vdiff depends on: Node.js, git, the
 * configuration file, project detection and the kicad-cli renderer.
 *
 * @packageDocumentation
 */

import { resolve } from 'node:path';

import chalk from 'chalk';
import type { Command } from 'commander';

import { KicadCliRenderer, detectProject, splitProjectInputs } from '@kicad-vdiff/core';
import { getToolVersion } from '@kicad-vdiff/utils';
import type { KicadVdiffConfig } from '@kicad-vdiff/config';

import { loadProjectConfig } from '../utils/project-context.js';
import { outputYamlResult } from '../utils/yaml-output.js';

/**
 * Result of a single doctor check
 */
export interface DoctorCheckResult {
  name: string;
  passed: boolean;
  message: string;
  /** How to fix a failed check */
  suggestion?: string;
}

export interface DoctorResult {
  allPassed: boolean;
  checks: DoctorCheckResult[];
  suggestions: string[];
  totalChecks: number;
  passedChecks: number;
}

export interface DoctorOptions {
  config?: string;
  cwd?: string;
}

const MIN_NODE_MAJOR = 20;

function checkNodeVersion(version: string = process.versions.node): DoctorCheckResult {
  const major = Number.parseInt(version.split('.')[0], 10);
  return major >= MIN_NODE_MAJOR
    ? { name: 'Node.js version', passed: true, message: `v${version} (meets requirement: >=${MIN_NODE_MAJOR}.0.0)` }
    : {
        name: 'Node.js version',
        passed: false,
        message: `v${version} is too old`,
        suggestion: `Upgrade to Node.js ${MIN_NODE_MAJOR} or newer`,
      };
}

function checkGitInstalled(): DoctorCheckResult {
  const version = getToolVersion('git');
  return version
    ? { name: 'Git installed', passed: true, message: version }
    : {
        name: 'Git installed',
        passed: false,
        message: 'git was not found on PATH',
        suggestion: 'Install git to compare committed versions',
      };
}

async function checkConfig(
  inputs: readonly string[],
  options: DoctorOptions
): Promise<{ check: DoctorCheckResult; config: KicadVdiffConfig | null }> {
  try {
    const cwd = options.cwd ?? process.cwd();
    const { root } = await splitProjectInputs(inputs, cwd);
    const config = await loadProjectConfig(root, options.config ? resolve(cwd, options.config) : undefined);
    return { check: { name: 'Configuration', passed: true, message: 'Valid' }, config };
  } catch (error) {
    return {
      check: {
        name: 'Configuration',
        passed: false,
        message: error instanceof Error ? error.message : String(error),
        suggestion: 'Fix kicad-vdiff.config.yaml or pass --config',
      },
      config: null,
    };
  }
}

async function checkProject(
  inputs: readonly string[],
  config: KicadVdiffConfig | null,
  cwd: string | undefined
): Promise<DoctorCheckResult> {
  try {
    const project = await detectProject(inputs, config?.project, cwd);
    const files = [project.pcb, project.sch].flatMap(target => (target ? [target.relativePath] : []));
    return { name: 'KiCad project', passed: true, message: `${project.name}: ${files.join(', ')}` };
  } catch (error) {
    return {
      name: 'KiCad project',
      passed: false,
      message: error instanceof Error ? error.message : String(error),
      suggestion: 'Run from a directory containing a .kicad_pro file, or name the design files',
    };
  }
}

function checkRenderer(config: KicadVdiffConfig | null): DoctorCheckResult {
  if (!config) {
    return { name: 'Renderer', passed: false, message: 'Skipped (configuration invalid)' };
  }
  const { binary, timeoutMs } = config.renderer;
  try {
    const version = new KicadCliRenderer({ binary, timeoutMs }).checkAvailable();
    return { name: 'Renderer', passed: true, message: `${binary} ${version}` };
  } catch (error) {
    return {
      name: 'Renderer',
      passed: false,
      message: error instanceof Error ? error.message : String(error),
      suggestion: 'Install KiCad 7 or newer, or set renderer.binary to the kicad-cli path',
    };
  }
}

/**
 * Run every check; never throws
 */
export async function runDoctor(inputs: readonly string[] = [], options: DoctorOptions = {}): Promise<DoctorResult> {
  const { check: configCheck, config } = await checkConfig(inputs, options);
  const checks = [
    checkNodeVersion(),
    checkGitInstalled(),
    configCheck,
    await checkProject(inputs, config, options.cwd),
    checkRenderer(config),
  ];

  const suggestions = checks.flatMap(check => (!check.passed && check.suggestion ? [check.suggestion] : []));
  const passedChecks = checks.filter(check => check.passed).length;
  return {
    allPassed: passedChecks === checks.length,
    checks,
    suggestions,
    totalChecks: checks.length,
    passedChecks,
  };
}

function displayDoctorResults(result: DoctorResult): void {
  console.log(chalk.bold('kicad-vdiff doctor\n'));
  for (const check of result.checks) {
    console.log(`${check.passed ? chalk.green('✓') : chalk.red('✗')} ${check.name}`);
    console.log(chalk.gray(`   ${check.message}`));
    if (check.suggestion && !check.passed) {
      console.log(chalk.blue(`   → ${check.suggestion}`));
    }
  }
  console.log(`\nResults: ${result.passedChecks}/${result.totalChecks} checks passed`);
}

export function doctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Check that git, the configuration and kicad-cli are usable')
    .argument('[project...]', 'project directory or design files (default: current directory)')
    .option('-c, --config <file>', 'configuration file')
    .option('--yaml', 'output YAML only')
    .action(async (inputs: string[], options: { config?: string; yaml?: boolean }) => {
      const result = await runDoctor(inputs, options);
      if (options.yaml) {
        await outputYamlResult(result);
      } else {
        displayDoctorResults(result);
      }
      if (!result.allPassed) {
        process.exitCode = 1;
      }
    });
}
