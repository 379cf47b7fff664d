/**
 * Tests for the workspace build layout the installed CLI runs from
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, it, expect } from 'vitest';

const packagesDir = fileURLToPath(new URL('../../', import.meta.url));

/** Workspace packages each package's sources import */
const WORKSPACE_DEPENDENCIES: Record<string, string[]> = {
  utils: [],
  git: ['utils'],
  config: [],
  core: ['config', 'git', 'utils'],
  cli: ['config', 'core', 'git', 'utils'],
};

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

describe('package layout', () => {
  it.each(Object.keys(WORKSPACE_DEPENDENCIES))('should give Node compiled JavaScript for %s', name => {
    const manifest = readJson(join(packagesDir, name, 'package.json'));
    const build = readJson(join(packagesDir, name, 'tsconfig.build.json'));

    expect(manifest).toMatchObject({
      exports: { '.': { types: './src/index.ts', default: './dist/index.js' } },
    });
    expect(build).toMatchObject({
      compilerOptions: { composite: true, rootDir: 'src', outDir: 'dist' },
      include: ['src/**/*.ts'],
    });
  });

  it.each(Object.entries(WORKSPACE_DEPENDENCIES).filter(([, deps]) => deps.length > 0))(
    'should build the workspace dependencies of %s first',
    (name, deps) => {
      const manifest = readJson(join(packagesDir, name, 'package.json'));
      const build = readJson(join(packagesDir, name, 'tsconfig.build.json'));

      expect(manifest).toMatchObject({
        dependencies: Object.fromEntries(deps.map(dep => [`@kicad-vdiff/${dep}`, '0.1.0'])),
      });
      expect(build).toMatchObject({
        references: deps.map(dep => ({ path: `../${dep}/tsconfig.build.json` })),
      });
    }
  );

  it('should install the CLI from its compiled entry point', () => {
    expect(readJson(join(packagesDir, 'cli', 'package.json'))).toMatchObject({
      bin: { 'kicad-vdiff': './dist/bin.js' },
    });
  });
});
