import { rmSync } from 'node:fs';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@kicad-vdiff/utils', async importOriginal => ({
  ...(await importOriginal<typeof import('@kicad-vdiff/utils')>()),
  getToolVersion: vi.fn(),
  resolveCommand: vi.fn(),
}));

import { getToolVersion, resolveCommand } from '@kicad-vdiff/utils';

import { runDoctor, type DoctorCheckResult, type DoctorResult } from '../../src/commands/doctor.js';
import { createProject } from '../helpers/project.js';

function findCheck(result: DoctorResult, name: string): DoctorCheckResult {
  const check = result.checks.find(candidate => candidate.name === name);
  if (!check) {
    throw new Error(`No check named ${name}`);
  }
  return check;
}

describe('doctor command', () => {
  let dir = '';

  beforeEach(() => {
    vi.mocked(getToolVersion).mockImplementation(tool => (tool === 'git' ? 'git version 2.43.0' : '8.0.4'));
    vi.mocked(resolveCommand).mockImplementation(command => `/usr/bin/${command}`);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.clearAllMocks();
  });

  it('should pass every check in a healthy environment', async () => {
    dir = createProject({ 'amp.kicad_pro': '{}', 'amp.kicad_pcb': '(kicad_pcb)' });

    const result = await runDoctor([dir]);

    expect(result.allPassed).toBe(true);
    expect(result.checks.map(check => check.name)).toEqual([
      'Node.js version',
      'Git installed',
      'Configuration',
      'KiCad project',
      'Renderer',
    ]);
    expect(findCheck(result, 'KiCad project').message).toBe('amp: amp.kicad_pcb');
    expect(findCheck(result, 'Renderer').message).toBe('kicad-cli 8.0.4');
    expect(getToolVersion).toHaveBeenCalledWith('kicad-cli', 'version');
  });

  it('should report a missing renderer with a suggestion', async () => {
    dir = createProject({ 'amp.kicad_pro': '{}', 'amp.kicad_pcb': '(kicad_pcb)' });
    vi.mocked(resolveCommand).mockReturnValue(null);

    const result = await runDoctor([dir]);

    expect(result.allPassed).toBe(false);
    expect(result.passedChecks).toBe(4);
    expect(findCheck(result, 'Renderer').passed).toBe(false);
    expect(result.suggestions).toEqual(['Install KiCad 7 or newer, or set renderer.binary to the kicad-cli path']);
  });

  it('should report invalid configuration and skip the renderer check', async () => {
    dir = createProject({
      'amp.kicad_pro': '{}',
      'amp.kicad_pcb': '(kicad_pcb)',
      'kicad-vdiff.config.yaml': 'renderer:\n  dpi: -1\n',
    });

    const result = await runDoctor([dir]);

    expect(findCheck(result, 'Configuration').passed).toBe(false);
    expect(findCheck(result, 'Configuration').message).toContain('renderer.dpi');
    expect(findCheck(result, 'Renderer')).toEqual({
      name: 'Renderer',
      passed: false,
      message: 'Skipped (configuration invalid)',
    });
  });

  it('should report a directory without a KiCad project', async () => {
    dir = createProject({ 'notes.txt': 'nothing here' });

    const result = await runDoctor([dir]);

    expect(findCheck(result, 'KiCad project')).toMatchObject({
      passed: false,
      message: `No .kicad_pro file found in ${dir}`,
    });
  });

  it('should report git missing from PATH', async () => {
    dir = createProject({ 'amp.kicad_pro': '{}', 'amp.kicad_pcb': '(kicad_pcb)' });
    vi.mocked(getToolVersion).mockImplementation(tool => (tool === 'git' ? null : '8.0.4'));

    const result = await runDoctor([dir]);

    expect(findCheck(result, 'Git installed')).toMatchObject({ passed: false, message: 'git was not found on PATH' });
  });
});
