import { rmSync } from 'node:fs';

import { describe, it, expect, afterEach } from 'vitest';

import { DEFAULT_LAYERS } from '@kicad-vdiff/config';

import { runObjects } from '../../src/commands/objects.js';
import { createProject } from '../helpers/project.js';

const ROOT_SHEET = '(kicad_sch (sheet (property "Sheetname" "Power") (property "Sheetfile" "power.kicad_sch")))';

describe('objects command', () => {
  let dir = '';

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should list board layers, then prefixed schematic sheets', async () => {
    dir = createProject({
      'amp.kicad_pro': '{}',
      'amp.kicad_pcb': '(kicad_pcb)',
      'amp.kicad_sch': ROOT_SHEET,
      'power.kicad_sch': '(kicad_sch)',
    });

    const output = await runObjects([dir]);

    if (!output.success) {
      throw new Error(output.error.message);
    }
    expect(output.project).toBe('amp');
    expect(output.objects).toHaveLength(DEFAULT_LAYERS.length + 2);
    expect(output.objects[0]).toEqual({ design: 'pcb', file: 'amp.kicad_pcb', name: 'F.Cu' });
    expect(output.objects.slice(-2)).toEqual([
      { design: 'sch', file: 'amp.kicad_sch', name: 'sch:root' },
      { design: 'sch', file: 'amp.kicad_sch', name: 'sch:Power' },
    ]);
  });

  it('should name sheets without a prefix when there is no board', async () => {
    dir = createProject({
      'amp.kicad_pro': '{}',
      'amp.kicad_sch': ROOT_SHEET,
      'power.kicad_sch': '(kicad_sch)',
    });

    const output = await runObjects([dir]);

    expect(output).toEqual({
      success: true,
      project: 'amp',
      objects: [
        { design: 'sch', file: 'amp.kicad_sch', name: 'root' },
        { design: 'sch', file: 'amp.kicad_sch', name: 'Power' },
      ],
    });
  });

  it('should use the layers from the project configuration', async () => {
    dir = createProject({
      'amp.kicad_pro': '{}',
      'amp.kicad_pcb': '(kicad_pcb)',
      'kicad-vdiff.config.yaml': 'layers: [B.Cu, Edge.Cuts]\n',
    });

    const output = await runObjects([dir]);

    expect(output).toEqual({
      success: true,
      project: 'amp',
      objects: [
        { design: 'pcb', file: 'amp.kicad_pcb', name: 'B.Cu' },
        { design: 'pcb', file: 'amp.kicad_pcb', name: 'Edge.Cuts' },
      ],
    });
  });
});
