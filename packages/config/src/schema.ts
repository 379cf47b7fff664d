/**
 * Configuration Schema with Zod Validation
 *
 * Provides runtime validation and type safety for all configuration options.
 * Every section is optional in the YAML file; defaults come from constants.ts.
 */

import { z } from 'zod';

import { CACHE_DEFAULTS, DEFAULT_LAYERS, DIFF_DEFAULTS, RENDERER_DEFAULTS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

/**
 * Project Config Schema
 *
 * Explicit design files, overriding detection next to the `.kicad_pro` file.
 * Paths are relative to the project directory.
 */
export const ProjectConfigSchema = z.object({
  /** Board file (e.g., "amp.kicad_pcb") */
  pcb: z.string().min(1, 'pcb path cannot be empty').optional(),

  /** Root schematic file (e.g., "amp.kicad_sch") */
  sch: z.string().min(1, 'sch path cannot be empty').optional(),
}).strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Renderer Config Schema
 */
export const RendererConfigSchema = z.object({
  /** kicad-cli executable name or absolute path (a Windows .exe works from WSL) */
  binary: z.string().min(1, 'Renderer binary cannot be empty').default(RENDERER_DEFAULTS.BINARY),

  /** Per-invocation timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(RENDERER_DEFAULTS.TIMEOUT_MS),

  /** Raster resolution */
  dpi: z.number().positive().max(2400).default(RENDERER_DEFAULTS.DPI),

  /** Crop PCB plots to the board outline */
  fitBoard: z.boolean().default(RENDERER_DEFAULTS.FIT_BOARD),
}).strict();

export type RendererConfig = z.infer<typeof RendererConfigSchema>;

/**
 * Cache Config Schema
 */
export const CacheConfigSchema = z.object({
  /** Maximum number of cached images (renders and diffs together) */
  maxEntries: z.number().int().positive().default(CACHE_DEFAULTS.MAX_ENTRIES),

  /** Maximum total size of cached PNG bytes */
  maxBytes: z.number().int().positive().default(CACHE_DEFAULTS.MAX_BYTES),

  /**
   * Optional: persist images here so they survive restarts. The loader
   * expands `~/` and resolves relative paths against the config file.
   */
  directory: z.string().min(1, 'Cache directory cannot be empty').optional(),
}).strict();

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Diff Config Schema
 */
export const DiffConfigSchema = z.object({
  /** Darkness above which a pixel counts as drawn (0-254) */
  presenceThreshold: z.number().int().min(0).max(254).default(DIFF_DEFAULTS.PRESENCE_THRESHOLD),

  /** Paint pixels drawn in both versions light gray instead of white */
  showUnchanged: z.boolean().default(DIFF_DEFAULTS.SHOW_UNCHANGED),
}).strict();

export type DiffConfig = z.infer<typeof DiffConfigSchema>;

/**
 * Complete configuration schema
 */
export const KicadVdiffConfigSchema = z.object({
  project: ProjectConfigSchema.default({}),
  renderer: RendererConfigSchema.default({}),

  /** PCB layers offered for diffing, in display order */
  layers: z.array(z.string().min(1, 'Layer name cannot be empty'))
    .min(1, 'At least one layer required')
    .default([...DEFAULT_LAYERS]),

  cache: CacheConfigSchema.default({}),
  diff: DiffConfigSchema.default({}),
}).strict();

/** Configuration after defaults are applied */
export type KicadVdiffConfig = z.infer<typeof KicadVdiffConfigSchema>;

/** Configuration as written in YAML (every field optional) */
export type KicadVdiffConfigInput = z.input<typeof KicadVdiffConfigSchema>;

/**
 * Validate configuration, throwing ZodError on failure
 */
export const validateConfig = createStrictValidator(KicadVdiffConfigSchema);

/**
 * Validate configuration, returning formatted errors on failure
 */
export const safeValidateConfig = createSafeValidator(KicadVdiffConfigSchema);

/**
 * Fully defaulted configuration
 *
 * @example
 * const config = defaultConfig();
 * config.renderer.binary; // 'kicad-cli'
 */
export function defaultConfig(): KicadVdiffConfig {
  return validateConfig({});
}
