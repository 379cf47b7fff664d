/**
 * What gets drawn from a design target, and at which settings
 */

import { createHash } from 'node:crypto';

import type { DesignKind } from './design-target.js';

export type RenderObject =
  | { kind: 'pcb'; layer: string }
  /** `sheet` is null for the root sheet, else the sheet path ("Power/Regulator") */
  | { kind: 'sch'; sheet: string | null };

export interface RenderOptions {
  object: RenderObject;
  /** Raster resolution */
  dpi: number;
  /** Crop PCB plots to the board outline */
  fitBoard: boolean;
}

/** Name the root schematic sheet is listed and selected under */
export const ROOT_SHEET_NAME = 'root';

/**
 * Stable sha256 of the options, used in render cache keys
 */
export function renderOptionsHash(options: RenderOptions): string {
  const object = options.object.kind === 'pcb'
    ? { kind: 'pcb', layer: options.object.layer }
    : { kind: 'sch', sheet: options.object.sheet };
  const canonical = JSON.stringify({
    object,
    dpi: options.dpi,
    fitBoard: options.object.kind === 'pcb' ? options.fitBoard : false,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

export function describeRenderObject(object: RenderObject): string {
  if (object.kind === 'pcb') {
    return object.layer;
  }
  return object.sheet ?? ROOT_SHEET_NAME;
}

/**
 * Build a render object from a name typed by the user
 *
 * @example
 * parseRenderObject('pcb', 'F.Cu');  // { kind: 'pcb', layer: 'F.Cu' }
 * parseRenderObject('sch', 'root');  // { kind: 'sch', sheet: null }
 */
export function parseRenderObject(kind: DesignKind, name: string): RenderObject {
  const trimmed = name.trim();
  if (kind === 'pcb') {
    if (trimmed === '') {
      throw new Error('Layer name cannot be empty');
    }
    return { kind: 'pcb', layer: trimmed };
  }
  const sheet = trimmed.replace(/^\/+|\/+$/g, '');
  return { kind: 'sch', sheet: sheet === '' || sheet === ROOT_SHEET_NAME ? null : sheet };
}
