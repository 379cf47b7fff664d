/**
 * Diff Service
 *
 * The consumer-facing API. Ties the catalog, materializer, renderer, diff
 * engine and cache together and reports every pipeline failure as a
 * structured `ErrorInfo` instead of throwing.
 *
 * @example
 * ```typescript
 * const service = new DiffService({ config });
 * const result = await service.getDiff(project.pcb, 'HEAD', 'WORK', {
 *   object: { kind: 'pcb', layer: 'F.Cu' },
 * });
 * if (result.success) {
 *   await writeFile('diff.png', result.diff.png);
 * } else {
 *   console.error(`${result.error.kind}: ${result.error.message}`);
 * }
 * ```
 */

import { defaultConfig, type KicadVdiffConfig } from '@kicad-vdiff/config';

import { waitWithSignal } from './abort.js';
import { projectNameFor, type DesignTarget } from './design-target.js';
import { diffImages, type DiffOptions } from './diff-engine.js';
import {
  RenderFailedError,
  RendererUnavailableError,
  VersionFileNotFoundError,
  isKicadDiffError,
  type DiffSide,
  type ErrorInfo,
  type KicadDiffError,
} from './errors.js';
import { logDebug, logWarning, toError } from './logger.js';
import { RenderCache, cacheKey, type DiffImage, type RenderedImage } from './render-cache.js';
import { renderOptionsHash, type RenderObject, type RenderOptions } from './render-object.js';
import { KicadCliRenderer, type Renderer } from './renderer.js';
import { SnapshotMaterializer, collectDesignFiles, type Snapshot } from './snapshot.js';
import { WorkingVersionSource } from './sources/working-source.js';
import { VersionCatalog, resolveVersionName } from './version-catalog.js';
import { WORKING, formatVersionId, versionIdKey, type VersionId } from './version-id.js';
import type { CatalogEntry } from './version-source.js';

export interface DiffServiceOptions {
  config?: KicadVdiffConfig;
  renderer?: Renderer;
  cache?: RenderCache;
  /** Catalog for a target's project (default: working tree, git and backups) */
  catalogFor?: (target: DesignTarget) => Promise<VersionCatalog>;
}

export interface DiffRequest {
  object: RenderObject;
  /** Defaults come from the configuration */
  dpi?: number;
  fitBoard?: boolean;
  presenceThreshold?: number;
  showUnchanged?: boolean;
  /** Stop waiting for the result; shared work continues */
  signal?: AbortSignal;
}

export interface ServiceFailure {
  success: false;
  error: ErrorInfo;
}

export type VersionsResult = { success: true; versions: CatalogEntry[] } | ServiceFailure;

export type ObjectsResult = { success: true; objects: RenderObject[] } | ServiceFailure;

export type DiffResult =
  | { success: true; diff: DiffImage; base: CatalogEntry; target: CatalogEntry }
  | ServiceFailure;

function failure(error: KicadDiffError): ServiceFailure {
  return { success: false, error: error.toErrorInfo() };
}

async function defaultCatalogFor(target: DesignTarget): Promise<VersionCatalog> {
  const projectName = await projectNameFor(target.projectRoot, target.relativePath);
  return VersionCatalog.forProject(target.projectRoot, { projectName });
}

export class DiffService {
  private readonly config: KicadVdiffConfig;
  private readonly renderer: Renderer;
  private readonly cache: RenderCache;
  private readonly catalogFor: (target: DesignTarget) => Promise<VersionCatalog>;

  /** Set once the renderer is known to be missing; cleared by resetRenderer() */
  private rendererFailure: RendererUnavailableError | null = null;

  constructor(options: DiffServiceOptions = {}) {
    this.config = options.config ?? defaultConfig();
    this.renderer = options.renderer ?? new KicadCliRenderer({
      binary: this.config.renderer.binary,
      timeoutMs: this.config.renderer.timeoutMs,
    });
    this.cache = options.cache ?? new RenderCache(this.config.cache);
    this.catalogFor = options.catalogFor ?? defaultCatalogFor;
  }

  /**
   * List every version of the target's project, working tree first
   */
  async resolveVersions(target: DesignTarget): Promise<VersionsResult> {
    try {
      const catalog = await this.catalogFor(target);
      return { success: true, versions: await catalog.listVersions() };
    } catch (error) {
      return this.toFailure(error);
    }
  }

  /**
   * Diffable objects of a target: the configured layers of a board, or
   * the root and every sub-sheet of a schematic in the working tree
   */
  async listObjects(target: DesignTarget): Promise<ObjectsResult> {
    if (target.kind === 'pcb') {
      return {
        success: true,
        objects: this.config.layers.map((layer): RenderObject => ({ kind: 'pcb', layer })),
      };
    }

    try {
      const { sheets } = await collectDesignFiles(new WorkingVersionSource(target.projectRoot), WORKING, target);
      return {
        success: true,
        objects: [
          { kind: 'sch', sheet: null },
          ...sheets.map((sheet): RenderObject => ({ kind: 'sch', sheet: sheet.path })),
        ],
      };
    } catch (error) {
      return this.toFailure(error);
    }
  }

  /**
   * Compare one object of a design between two versions
   *
   * @param baseName - Version name resolved by the catalog (e.g. 'HEAD', '2024-03-01', 'a1b2c3d')
   * @param targetName - Version name; 'WORK' for the working tree
   * @throws only when `request.signal` aborts, or on programmer error
   */
  async getDiff(
    target: DesignTarget,
    baseName: string,
    targetName: string,
    request: DiffRequest
  ): Promise<DiffResult> {
    if (this.rendererFailure) {
      return failure(this.rendererFailure);
    }

    try {
      const catalog = await this.catalogFor(target);
      const entries = await catalog.listVersions();
      const baseEntry = resolveVersionName(baseName, entries);
      const targetEntry = resolveVersionName(targetName, entries);

      const renderOptions: RenderOptions = {
        object: request.object,
        dpi: request.dpi ?? this.config.renderer.dpi,
        fitBoard: request.fitBoard ?? this.config.renderer.fitBoard,
      };
      const diffOptions: DiffOptions = {
        presenceThreshold: request.presenceThreshold ?? this.config.diff.presenceThreshold,
        showUnchanged: request.showUnchanged ?? this.config.diff.showUnchanged,
      };

      logDebug('diff', 'Diff requested', {
        target: target.relativePath,
        base: formatVersionId(baseEntry.id),
        head: formatVersionId(targetEntry.id),
        renderOptions,
        diffOptions,
      });

      const diff = await waitWithSignal(
        this.compose(catalog, target, baseEntry.id, targetEntry.id, renderOptions, diffOptions),
        request.signal
      );
      return { success: true, diff, base: baseEntry, target: targetEntry };
    } catch (error) {
      return this.toFailure(error);
    }
  }

  /**
   * Allow rendering again after the renderer was reported unavailable
   */
  resetRenderer(): void {
    this.rendererFailure = null;
  }

  private async compose(
    catalog: VersionCatalog,
    target: DesignTarget,
    base: VersionId,
    head: VersionId,
    renderOptions: RenderOptions,
    diffOptions: DiffOptions
  ): Promise<DiffImage> {
    // Settle both sides so a failure on both is always reported for the base
    const [baseSide, targetSide] = await Promise.allSettled([
      this.renderSide('base', catalog, target, base, renderOptions),
      this.renderSide('target', catalog, target, head, renderOptions),
    ]);
    if (baseSide.status === 'rejected') {
      throw baseSide.reason;
    }
    if (targetSide.status === 'rejected') {
      throw targetSide.reason;
    }

    const baseImage = baseSide.value;
    const targetImage = targetSide.value;
    const key = cacheKey(
      'diff',
      baseImage.key,
      targetImage.key,
      String(diffOptions.presenceThreshold),
      String(diffOptions.showUnchanged)
    );
    return this.cache.getOrDiff(key, async () => ({
      key,
      ...diffImages(baseImage.png, targetImage.png, diffOptions),
    }));
  }

  private async renderSide(
    side: DiffSide,
    catalog: VersionCatalog,
    target: DesignTarget,
    version: VersionId,
    options: RenderOptions
  ): Promise<RenderedImage> {
    const materializer = new SnapshotMaterializer(catalog);
    try {
      if (version.kind === 'working') {
        // The working tree changes under a fixed id, so its key needs the content
        return await materializer.withSnapshot(target, version, snapshot => {
          const key = cacheKey('render', target.relativePath, `working:${snapshot.contentDigest}`, renderOptionsHash(options));
          return this.cache.getOrRender(key, () => this.renderFresh(key, snapshot, options));
        });
      }

      // Commits and backups never change: a hit needs no snapshot at all
      const key = cacheKey('render', target.projectRoot, target.relativePath, versionIdKey(version), renderOptionsHash(options));
      return await this.cache.getOrRender(key, () =>
        materializer.withSnapshot(target, version, snapshot => this.renderFresh(key, snapshot, options))
      );
    } catch (error) {
      if (error instanceof VersionFileNotFoundError) {
        throw error.withSide(side);
      }
      throw error;
    }
  }

  private async renderFresh(key: string, snapshot: Snapshot, options: RenderOptions): Promise<RenderedImage> {
    if (this.rendererFailure) {
      throw this.rendererFailure;
    }
    try {
      const image = await this.renderer.render(snapshot, options);
      return { key, ...image };
    } catch (error) {
      if (error instanceof RendererUnavailableError) {
        this.rendererFailure = error;
        logWarning('render', 'Renderer unavailable - further renders are skipped until reset', error);
      }
      if (isKicadDiffError(error)) {
        throw error;
      }
      throw new RenderFailedError('Renderer failed unexpectedly', toError(error).message);
    }
  }

  private toFailure(error: unknown): ServiceFailure {
    if (isKicadDiffError(error)) {
      logDebug('diff', 'Request failed', { kind: error.kind, message: error.message });
      return failure(error);
    }
    throw error;
  }
}
