/**
 * @kicad-vdiff/config
 *
 * Configuration system for kicad-vdiff with YAML files and Zod schema validation.
 *
 * @example Basic YAML configuration
 * ```yaml
 * # kicad-vdiff.config.yaml
 * renderer:
 *   binary: /usr/bin/kicad-cli
 *   dpi: 200
 * layers: [F.Cu, B.Cu, Edge.Cuts]
 * cache:
 *   directory: ~/.cache/kicad-vdiff
 * ```
 */

// Core schema types and validation
export {
  type ProjectConfig,
  type RendererConfig,
  type CacheConfig,
  type DiffConfig,
  type KicadVdiffConfig,
  type KicadVdiffConfigInput,
  ProjectConfigSchema,
  RendererConfigSchema,
  CacheConfigSchema,
  DiffConfigSchema,
  KicadVdiffConfigSchema,
  validateConfig,
  safeValidateConfig,
  defaultConfig,
} from './schema.js';

// Config loading
export {
  CONFIG_FILE_NAME,
  ConfigError,
  loadConfigFromFile,
  findAndLoadConfig,
} from './loader.js';

// Defaults
export {
  RENDERER_DEFAULTS,
  DEFAULT_LAYERS,
  CACHE_DEFAULTS,
  DIFF_DEFAULTS,
} from './constants.js';

export { createSafeValidator, createStrictValidator, formatZodIssues } from './schema-utils.js';
