/**
 * Human-readable failure output shared by the commands
 */

import chalk from 'chalk';

import { ConfigError } from '@kicad-vdiff/config';
import type { ErrorInfo } from '@kicad-vdiff/core';

import { outputYamlResult } from './yaml-output.js';

/**
 * Print a pipeline failure and mark the process as failed
 */
export async function reportFailure(error: ErrorInfo, yaml: boolean): Promise<void> {
  process.exitCode = 1;
  if (yaml) {
    await outputYamlResult({ success: false, error });
    return;
  }
  console.error(chalk.red(`✗ ${error.kind}: ${error.message}`));
  if (error.details) {
    for (const line of error.details.split('\n')) {
      console.error(chalk.gray(`  ${line}`));
    }
  }
}

/**
 * Print an unexpected error (bad input, invalid configuration) and mark the process as failed
 */
export async function reportError(error: unknown, yaml: boolean): Promise<void> {
  process.exitCode = 1;
  const message = error instanceof Error ? error.message : String(error);
  if (yaml) {
    await outputYamlResult({ success: false, error: { kind: 'Error', message } });
    return;
  }
  if (error instanceof ConfigError) {
    console.error(chalk.red(`✗ Invalid configuration in ${error.configPath}`));
    for (const issue of error.errors) {
      console.error(chalk.gray(`  • ${issue}`));
    }
    return;
  }
  console.error(chalk.red(`✗ ${message}`));
}
