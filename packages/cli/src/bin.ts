#!/usr/bin/env node
/**
 * kicad-vdiff CLI Entry Point
 */

import { readFileSync } from 'node:fs';

import { Command } from 'commander';

import { diffCommand } from './commands/diff.js';
import { doctorCommand } from './commands/doctor.js';
import { objectsCommand } from './commands/objects.js';
import { versionsCommand } from './commands/versions.js';

/**
 * Version from the package's package.json, one level above src/ or dist/
 */
function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    if (process.env.KVD_DEBUG === '1') {
      console.error(`Could not read package.json version: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('kicad-vdiff')
  .description('Visual diffs of KiCad boards and schematics across commits and backups')
  .version(readVersion())
  .option('--verbose', 'log pipeline details to stderr')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      process.env.KVD_DEBUG = '1';
    }
  });

versionsCommand(program);  // kicad-vdiff versions
objectsCommand(program);   // kicad-vdiff objects
diffCommand(program);      // kicad-vdiff diff
doctorCommand(program);    // kicad-vdiff doctor

await program.parseAsync();
