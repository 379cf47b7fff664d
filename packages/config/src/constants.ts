/**
 * Configuration Constants
 *
 * Single source of truth for default values. The schema applies these when a
 * field is omitted, and the CLI uses them for help text.
 *
 * @packageDocumentation
 */

/**
 * Default renderer settings
 *
 * @example
 * ```typescript
 * import { RENDERER_DEFAULTS } from '@kicad-vdiff/config';
 *
 * const timeout = options.timeout ?? RENDERER_DEFAULTS.TIMEOUT_MS;
 * ```
 */
export const RENDERER_DEFAULTS = {
  /** Looked up on PATH unless an absolute path is configured */
  BINARY: 'kicad-cli' as const,

  /** Large boards can take a while to plot */
  TIMEOUT_MS: 120_000 as const,

  /** Raster resolution of rendered SVGs */
  DPI: 150 as const,

  /** Crop PCB plots to the board outline instead of the full page */
  FIT_BOARD: false as const,
} as const;

/**
 * Layers offered for PCB diffs, in display order
 */
export const DEFAULT_LAYERS: readonly string[] = [
  'F.Cu',
  'F.Silkscreen',
  'F.Mask',
  'B.Cu',
  'B.Silkscreen',
  'B.Mask',
  'Edge.Cuts',
];

/**
 * Default render/diff cache budget
 */
export const CACHE_DEFAULTS = {
  MAX_ENTRIES: 256 as const,
  MAX_BYTES: 256 * 1024 * 1024,
} as const;

/**
 * Default pixel classification settings
 */
export const DIFF_DEFAULTS = {
  /**
   * A pixel counts as drawn when its darkness (255 - luminance after
   * compositing on white) exceeds this value. 64 drops the faint
   * anti-aliasing fringe while keeping thin traces.
   */
  PRESENCE_THRESHOLD: 64 as const,

  SHOW_UNCHANGED: false as const,
} as const;
