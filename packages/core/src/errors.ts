/**
 * Error taxonomy
 *
 * Every failure the pipeline reports to a caller is one of these classes.
 * DiffService turns them into plain `ErrorInfo` records; nothing here is
 * allowed to terminate the process.
 */

/** Which side of a diff request an error belongs to */
export type DiffSide = 'base' | 'target';

export type ErrorKind =
  | 'RepositoryUnavailable'
  | 'UnknownVersion'
  | 'VersionFileNotFound'
  | 'RendererUnavailable'
  | 'RenderFailed'
  | 'RenderTimeout'
  | 'CacheCorruption';

/**
 * Serializable description of a failure (safe to print as YAML or send over a wire)
 */
export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  side?: DiffSide;
  details?: string;
}

/**
 * Base class for all pipeline errors
 */
export abstract class KicadDiffError extends Error {
  abstract readonly kind: ErrorKind;

  /** Extra diagnostics (renderer stderr, candidate list, ...) */
  readonly details: string | undefined;

  constructor(message: string, details?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.details = details;
  }

  toErrorInfo(): ErrorInfo {
    const info: ErrorInfo = { kind: this.kind, message: this.message };
    if (this.details) {
      info.details = this.details;
    }
    return info;
  }
}

/**
 * Neither a git repository nor a backups directory is reachable for the project
 */
export class RepositoryUnavailableError extends KicadDiffError {
  readonly kind = 'RepositoryUnavailable' as const;
  readonly projectRoot: string;

  constructor(projectRoot: string, details?: string) {
    super(`No git repository or backups directory found for ${projectRoot}`, details);
    this.name = 'RepositoryUnavailableError';
    this.projectRoot = projectRoot;
  }
}

/**
 * A version name did not resolve to exactly one catalog entry
 */
export class UnknownVersionError extends KicadDiffError {
  readonly kind = 'UnknownVersion' as const;
  readonly versionName: string;
  readonly candidates: readonly string[];

  constructor(versionName: string, candidates: readonly string[] = []) {
    super(
      candidates.length > 1
        ? `Ambiguous version "${versionName}" (${candidates.length} matches)`
        : `Unknown version "${versionName}"`,
      candidates.length > 1 ? candidates.join('\n') : undefined
    );
    this.name = 'UnknownVersionError';
    this.versionName = versionName;
    this.candidates = candidates;
  }
}

/**
 * The design file does not exist at the requested version
 */
export class VersionFileNotFoundError extends KicadDiffError {
  readonly kind = 'VersionFileNotFound' as const;
  readonly relativePath: string;
  readonly version: string;
  readonly side: DiffSide | undefined;

  constructor(relativePath: string, version: string, side?: DiffSide) {
    super(
      side
        ? `${relativePath} missing at ${side} (version ${version})`
        : `${relativePath} does not exist at version ${version}`
    );
    this.name = 'VersionFileNotFoundError';
    this.relativePath = relativePath;
    this.version = version;
    this.side = side;
  }

  /** Copy of this error attributed to one side of a diff */
  withSide(side: DiffSide): VersionFileNotFoundError {
    return new VersionFileNotFoundError(this.relativePath, this.version, side);
  }

  override toErrorInfo(): ErrorInfo {
    const info = super.toErrorInfo();
    if (this.side) {
      info.side = this.side;
    }
    return info;
  }
}

/**
 * The external renderer binary is missing or not executable
 */
export class RendererUnavailableError extends KicadDiffError {
  readonly kind = 'RendererUnavailable' as const;
  readonly binary: string;

  constructor(binary: string, cause?: unknown) {
    super(
      `Renderer "${binary}" is not available`,
      cause instanceof Error ? cause.message : undefined,
      { cause }
    );
    this.name = 'RendererUnavailableError';
    this.binary = binary;
  }
}

/**
 * The renderer ran but produced no usable image
 */
export class RenderFailedError extends KicadDiffError {
  readonly kind = 'RenderFailed' as const;

  constructor(message: string, diagnostics?: string) {
    super(message, diagnostics?.trim() || undefined);
    this.name = 'RenderFailedError';
  }
}

/**
 * The renderer exceeded its time limit and was killed
 */
export class RenderTimeoutError extends KicadDiffError {
  readonly kind = 'RenderTimeout' as const;
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Renderer did not finish within ${timeoutMs}ms`);
    this.name = 'RenderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A persisted cache entry failed verification
 *
 * RenderCache logs this and treats the entry as a miss; it only surfaces
 * to callers that read persisted entries directly.
 */
export class CacheCorruptionError extends KicadDiffError {
  readonly kind = 'CacheCorruption' as const;
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Corrupt cache entry ${path}: ${reason}`);
    this.name = 'CacheCorruptionError';
    this.path = path;
  }
}

export function isKicadDiffError(value: unknown): value is KicadDiffError {
  return value instanceof KicadDiffError;
}

/**
 * Structured form of a pipeline error
 */
export function toErrorInfo(error: KicadDiffError): ErrorInfo {
  return error.toErrorInfo();
}
