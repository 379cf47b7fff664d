/**
 * Renderer Adapter
 *
 * Turns a materialized snapshot into a raster image by running `kicad-cli`
 * to plot SVG and rasterizing the result. The adapter never retries; a
 * failed invocation surfaces as RenderFailed or RenderTimeout.
 */

import { existsSync } from 'node:fs';
import { readdir, readFile, rm } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import {
  CommandExecutionError,
  CommandNotFoundError,
  createScratchDir,
  getToolVersion,
  resolveCommand,
  runCommand,
  safeExecSync,
  type RunCommandOptions,
  type RunCommandResult,
} from '@kicad-vdiff/utils';

import { createAbortError } from './abort.js';
import { RenderFailedError, RendererUnavailableError, RenderTimeoutError } from './errors.js';
import { logDebug, logWarning, toError } from './logger.js';
import { rasterizeSvg, type RasterImage } from './rasterize.js';
import type { RenderOptions } from './render-object.js';
import type { Snapshot } from './snapshot.js';

export interface RenderContext {
  /** Kill the renderer when this signal aborts */
  signal?: AbortSignal;
}

export interface Renderer {
  render(snapshot: Snapshot, options: RenderOptions, context?: RenderContext): Promise<RasterImage>;
}

/** Same shape as `runCommand`, swappable in tests */
export type CommandRunner = (
  command: string,
  args: string[],
  options: RunCommandOptions
) => Promise<RunCommandResult>;

/** Same shape as `rasterizeSvg`, swappable in tests */
export type SvgRasterizer = (svg: Buffer, dpi: number) => RasterImage;

export interface KicadCliRendererOptions {
  /** Executable name or path */
  binary: string;
  timeoutMs: number;
  runner?: CommandRunner;
  rasterize?: SvgRasterizer;
}

const WSLPATH = '/usr/bin/wslpath';

/**
 * Renderer backed by the KiCad command-line tool
 *
 * @example
 * const renderer = new KicadCliRenderer({ binary: 'kicad-cli', timeoutMs: 120_000 });
 * const image = await renderer.render(snapshot, { object: { kind: 'pcb', layer: 'F.Cu' }, dpi: 150, fitBoard: false });
 */
export class KicadCliRenderer implements Renderer {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly rasterize: SvgRasterizer;

  constructor(options: KicadCliRendererOptions) {
    this.binary = options.binary;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? runCommand;
    this.rasterize = options.rasterize ?? rasterizeSvg;
  }

  /**
   * Check the binary can be found and report its version
   *
   * @throws RendererUnavailableError when it cannot
   */
  checkAvailable(): string {
    if (resolveCommand(this.binary) === null) {
      throw new RendererUnavailableError(this.binary, new CommandNotFoundError(this.binary));
    }
    const version = getToolVersion(this.binary, 'version');
    if (version === null) {
      throw new RendererUnavailableError(this.binary);
    }
    return version;
  }

  async render(snapshot: Snapshot, options: RenderOptions, context: RenderContext = {}): Promise<RasterImage> {
    const outDir = await createScratchDir('render', 'out-');
    try {
      const { args, locate } = this.planInvocation(snapshot, options, outDir);
      logDebug('render', 'Running renderer', { binary: this.binary, args });

      const result = await this.invoke(args, snapshot.dir, context.signal);
      if (result.aborted && context.signal) {
        throw createAbortError(context.signal);
      }
      if (result.timedOut) {
        throw new RenderTimeoutError(this.timeoutMs);
      }
      const diagnostics = result.stderr.toString('utf8') || result.stdout.toString('utf8');
      if (result.status !== 0) {
        throw new RenderFailedError(`${basename(this.binary)} exited with code ${result.status}`, diagnostics);
      }

      const svgPath = await locate();
      if (svgPath === null) {
        throw new RenderFailedError(`${basename(this.binary)} produced no SVG for ${snapshot.target.relativePath}`, diagnostics);
      }

      const svg = await readFile(svgPath);
      try {
        return this.rasterize(svg, options.dpi);
      } catch (error) {
        throw new RenderFailedError('Could not rasterize renderer output', toError(error).message);
      }
    } finally {
      await rm(outDir, { recursive: true, force: true }).catch((error: unknown) => {
        logWarning('render', `Failed to remove ${outDir}`, toError(error));
      });
    }
  }

  private planInvocation(
    snapshot: Snapshot,
    options: RenderOptions,
    outDir: string
  ): { args: string[]; locate: () => Promise<string | null> } {
    const { object } = options;
    const input = this.toRendererPath(snapshot.entryFile);
    const stem = basename(snapshot.entryFile, extname(snapshot.entryFile));

    if (object.kind === 'pcb') {
      const svgPath = join(outDir, `${stem}.svg`);
      const args = ['pcb', 'export', 'svg', '--black-and-white', '--layers', object.layer];
      if (options.fitBoard) {
        args.push('--fit-page-to-board');
      }
      args.push('--exclude-drawing-sheet', '--output', this.toRendererPath(svgPath), input);
      return { args, locate: async () => (existsSync(svgPath) ? svgPath : null) };
    }

    const args = [
      'sch', 'export', 'svg',
      '--black-and-white',
      '--no-background-color',
      '--output', this.toRendererPath(outDir),
      input,
    ];
    return { args, locate: () => findSchematicSvg(outDir, stem, object.sheet) };
  }

  private async invoke(args: string[], cwd: string, signal: AbortSignal | undefined): Promise<RunCommandResult> {
    try {
      return await this.runner(this.binary, args, { cwd, timeout: this.timeoutMs, signal });
    } catch (error) {
      // Spawn failures (not found, not executable) mean no render can succeed
      throw new RendererUnavailableError(this.binary, error);
    }
  }

  /**
   * A Windows kicad-cli.exe run from WSL needs Windows paths
   */
  private toRendererPath(path: string): string {
    if (!this.binary.toLowerCase().endsWith('.exe') || !existsSync(WSLPATH)) {
      return path;
    }
    try {
      return safeExecSync(WSLPATH, ['-w', path], { encoding: 'utf8' }).toString().trim();
    } catch (error) {
      if (error instanceof CommandExecutionError || error instanceof CommandNotFoundError) {
        logWarning('render', `wslpath could not convert ${path}`, error);
        return path;
      }
      throw error;
    }
  }
}

function normalizeSheetFileName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9.]+/g, '_');
}

/**
 * Find the SVG kicad-cli wrote for one schematic sheet
 *
 * The root sheet is `<stem>.svg`; a sub-sheet is `<stem>-<sheet path>.svg`
 * with '/' between nested sheet names turned into '-'. Characters KiCad
 * replaces in file names are matched loosely.
 */
export async function findSchematicSvg(outDir: string, stem: string, sheet: string | null): Promise<string | null> {
  const names = (await readdir(outDir)).filter(name => extname(name).toLowerCase() === '.svg');
  const wanted = sheet === null ? `${stem}.svg` : `${stem}-${sheet.split('/').join('-')}.svg`;

  const exact = names.find(name => name === wanted);
  if (exact) {
    return join(outDir, exact);
  }
  const loose = names.find(name => normalizeSheetFileName(name) === normalizeSheetFileName(wanted));
  if (loose) {
    return join(outDir, loose);
  }
  // A single-sheet design yields exactly one file
  if (sheet === null && names.length === 1) {
    return join(outDir, names[0]);
  }
  return null;
}
