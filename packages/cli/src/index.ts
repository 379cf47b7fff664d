/**
 * @kicad-vdiff/cli
 *
 * Command implementations behind the `kicad-vdiff` executable, usable
 * without going through argument parsing.
 */

export { runVersions, summarizeEntry, type VersionsOutput, type VersionSummary } from './commands/versions.js';
export { runObjects, type ObjectsOutput, type ObjectSummary } from './commands/objects.js';
export { runDiff, selectObject, DEFAULT_OUTPUT, type DiffOutput, type DiffCommandOptions } from './commands/diff.js';
export { runDoctor, type DoctorResult, type DoctorCheckResult } from './commands/doctor.js';
export { loadProjectContext, loadProjectConfig, primaryTarget, type ProjectContext } from './utils/project-context.js';
