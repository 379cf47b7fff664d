/**
 * Configuration Loader
 *
 * Loads and validates kicad-vdiff configuration from YAML files.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { defaultConfig, safeValidateConfig, type KicadVdiffConfig } from './schema.js';

/**
 * Configuration file name, looked up in the project directory
 *
 * Only YAML format is supported.
 */
export const CONFIG_FILE_NAME = 'kicad-vdiff.config.yaml';

/**
 * Error thrown when a configuration file exists but is invalid
 */
export class ConfigError extends Error {
  public readonly configPath: string;
  public readonly errors: string[];

  constructor(configPath: string, errors: string[]) {
    super(`Invalid configuration in ${configPath}:\n  ${errors.join('\n  ')}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
    this.errors = errors;
  }
}

/**
 * Load configuration from a file path
 *
 * @param configPath - Path to config file (must be .yaml or .yml)
 * @returns Loaded and validated configuration
 * @throws Error if the file cannot be read or has the wrong extension
 * @throws ConfigError if the content does not validate
 */
export async function loadConfigFromFile(
  configPath: string
): Promise<KicadVdiffConfig> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml') && !absolutePath.endsWith('.yml')) {
    throw new Error(
      `Unsupported config file format: ${absolutePath}\n` +
      `Only .yaml format is supported.\n` +
      `Please use ${CONFIG_FILE_NAME}`
    );
  }

  const content = await readFile(absolutePath, 'utf-8');
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(absolutePath, [error instanceof Error ? error.message : String(error)]);
  }

  // An empty file means "all defaults"
  if (raw === null || raw === undefined) {
    return defaultConfig();
  }

  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(absolutePath, ['Configuration must be an object']);
  }

  // Remove $schema property if present (used for IDE support only)
  const rest = Object.fromEntries(
    Object.entries(raw).filter(([key]) => key !== '$schema')
  );

  const result = safeValidateConfig(rest);
  if (!result.success) {
    throw new ConfigError(absolutePath, result.errors);
  }
  return resolveCacheDirectory(result.data, dirname(absolutePath));
}

/**
 * Make `cache.directory` absolute: `~/` is the home directory, other
 * relative paths start at the config file's directory
 */
function resolveCacheDirectory(config: KicadVdiffConfig, baseDir: string): KicadVdiffConfig {
  const directory = config.cache.directory;
  if (directory === undefined) {
    return config;
  }
  const expanded = directory === '~' || directory.startsWith('~/') ? join(homedir(), directory.slice(1)) : directory;
  return { ...config, cache: { ...config.cache, directory: resolve(baseDir, expanded) } };
}

/**
 * Find and load configuration from a project directory
 *
 * @param dir - Directory to search (default: process.cwd())
 * @returns Loaded configuration, or defaults when no config file exists
 * @throws ConfigError if a config file exists but is invalid
 */
export async function findAndLoadConfig(
  dir: string = process.cwd()
): Promise<KicadVdiffConfig> {
  const configPath = resolve(dir, CONFIG_FILE_NAME);

  try {
    return await loadConfigFromFile(configPath);
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      return defaultConfig();
    }
    throw err;
  }
}
