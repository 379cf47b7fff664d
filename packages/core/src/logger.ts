/**
 * Structured logging for kicad-vdiff
 *
 * Debug and warning output only appears when KVD_DEBUG=1 is set, so
 * degraded-but-recoverable paths (a missing sub-sheet, a corrupt cache file)
 * stay visible without cluttering normal output. All logs go to stderr.
 */

export type LogCategory =
  | 'catalog'
  | 'git'
  | 'snapshot'
  | 'render'
  | 'diff'
  | 'cache'
  | 'config';

function debugEnabled(): boolean {
  return process.env.KVD_DEBUG === '1';
}

/**
 * Log a debug message
 * Only outputs when KVD_DEBUG=1
 *
 * @example
 * ```typescript
 * logDebug('cache', 'Cache lookup', { key, namespace });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (debugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [DEBUG] [${category}] ${message}`);
    if (metadata) {
      console.error(JSON.stringify(metadata, null, 2));
    }
  }
}

/**
 * Log a warning (non-critical error)
 * Only outputs when KVD_DEBUG=1
 *
 * @example
 * ```typescript
 * logWarning('snapshot', 'Sub-sheet missing at this version - skipping', error);
 * ```
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (debugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [WARN] [${category}] ${message}`);
    if (error) {
      console.error(`Error: ${error.message}`);
      if (error.stack) {
        console.error(error.stack);
      }
    }
  }
}

/**
 * Log an error (critical failure)
 * Always outputs, even without KVD_DEBUG
 */
export function logError(category: LogCategory, message: string, error?: Error): void {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [ERROR] [${category}] ${message}`);
  if (error) {
    console.error(`Error: ${error.message}`);
    if (error.stack) {
      console.error(error.stack);
    }
  }
}

/**
 * Coerce an unknown thrown value for logWarning/logError
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
