/**
 * @kicad-vdiff/core
 *
 * Visual diff pipeline for KiCad designs: list versions, materialize a
 * design at a version, render it with kicad-cli, and compare two renders
 * pixel by pixel.
 *
 * ## Example Usage
 *
 * ```typescript
 * import { DiffService, detectProject, requireTarget } from '@kicad-vdiff/core';
 *
 * const project = await detectProject(['hardware/amp']);
 * const service = new DiffService();
 * const result = await service.getDiff(requireTarget(project, 'pcb'), 'HEAD', 'WORK', {
 *   object: { kind: 'pcb', layer: 'F.Cu' },
 * });
 * ```
 *
 * @packageDocumentation
 */

// Consumer API
export {
  DiffService,
  type DiffServiceOptions,
  type DiffRequest,
  type DiffResult,
  type VersionsResult,
  type ObjectsResult,
  type ServiceFailure,
} from './diff-service.js';

// Projects and targets
export {
  detectProject,
  splitProjectInputs,
  createDesignTarget,
  requireTarget,
  designKindOf,
  findProjectFile,
  projectNameFor,
  DESIGN_EXTENSIONS,
  PROJECT_EXTENSION,
  type DesignKind,
  type DesignTarget,
  type KicadProject,
} from './design-target.js';

// Versions
export {
  WORKING,
  WORKING_NAME,
  isBackupDate,
  gitVersion,
  backupVersion,
  versionIdKey,
  formatVersionId,
  sameVersion,
  type VersionId,
  type GitVersionId,
  type BackupVersionId,
  type WorkingVersionId,
  type BackupDate,
} from './version-id.js';
export type {
  CatalogEntry,
  VersionSource,
  VersionSourceKind,
  VersionFileReader,
} from './version-source.js';
export { VersionCatalog, resolveVersionName, type VersionCatalogOptions } from './version-catalog.js';
export { GitVersionSource, type GitVersionSourceOptions } from './sources/git-source.js';
export { BackupVersionSource, parseArchiveName } from './sources/backup-source.js';
export { WorkingVersionSource } from './sources/working-source.js';

// Snapshots
export {
  SnapshotMaterializer,
  collectDesignFiles,
  digestFiles,
  type Snapshot,
  type SchematicSheet,
  type DesignFiles,
} from './snapshot.js';
export { parseSheetReferences, resolveSheetPath, type SheetReference } from './schematic-sheets.js';

// Rendering
export {
  ROOT_SHEET_NAME,
  renderOptionsHash,
  describeRenderObject,
  parseRenderObject,
  type RenderObject,
  type RenderOptions,
} from './render-object.js';
export {
  KicadCliRenderer,
  findSchematicSvg,
  type Renderer,
  type RenderContext,
  type CommandRunner,
  type SvgRasterizer,
  type KicadCliRendererOptions,
} from './renderer.js';
export { rasterizeSvg, type RasterImage } from './rasterize.js';

// Diffing
export {
  diffImages,
  diffDecoded,
  decodePng,
  encodePng,
  isPresent,
  DIFF_COLORS,
  type DiffOptions,
  type DiffOutcome,
  type DecodedImage,
  type Rgb,
} from './diff-engine.js';

// Caching
export {
  RenderCache,
  cacheKey,
  type RenderedImage,
  type DiffImage,
  type RenderCacheOptions,
  type WaitOptions,
  type CacheStats,
} from './render-cache.js';
export { PersistentImageStore, type CacheKind, type PersistedImage } from './cache-store.js';

// Errors and logging
export {
  KicadDiffError,
  RepositoryUnavailableError,
  UnknownVersionError,
  VersionFileNotFoundError,
  RendererUnavailableError,
  RenderFailedError,
  RenderTimeoutError,
  CacheCorruptionError,
  isKicadDiffError,
  toErrorInfo,
  type ErrorInfo,
  type ErrorKind,
  type DiffSide,
} from './errors.js';
export { isAbortError, createAbortError, waitWithSignal } from './abort.js';
export { logDebug, logWarning, logError, toError, type LogCategory } from './logger.js';
