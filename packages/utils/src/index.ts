/**
 * @kicad-vdiff/utils
 *
 * Common utilities for kicad-vdiff packages.
 * This is the foundational package with NO dependencies on other kicad-vdiff packages.
 *
 * @package @kicad-vdiff/utils
 */

// Safe command execution
export {
  safeExecSync,
  safeExecResult,
  runCommand,
  resolveCommand,
  getToolVersion,
  CommandExecutionError,
  CommandNotFoundError,
  type SafeExecOptions,
  type SafeExecResult,
  type RunCommandOptions,
  type RunCommandResult,
} from './safe-exec.js';

// Temp directories and path normalization
export {
  normalizedTmpdir,
  normalizePath,
  getKicadVdiffTempDir,
  createScratchDir,
  toPosixPath,
  relativeWithin,
  isMissingFileError,
} from './path-helpers.js';
