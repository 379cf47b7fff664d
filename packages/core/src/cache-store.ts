/**
 * On-disk image store backing RenderCache persistence
 *
 * Layout: `<directory>/<kind>/<key[0..2]>/<key>.kvd`. Each file is one line
 * of JSON header followed by the PNG payload:
 *
 *   {"format":1,"kind":"render","key":"…","payloadBytes":1234,"payloadSha256":"…","metadata":{…}}\n<png bytes>
 *
 * Files are written atomically (temp file + rename), so a reader sees either
 * a complete entry or none. Anything that fails verification is reported as
 * CacheCorruptionError.
 */

import { createHash, randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { z } from 'zod';

import { formatZodIssues } from '@kicad-vdiff/config';
import { isMissingFileError } from '@kicad-vdiff/utils';

import { CacheCorruptionError } from './errors.js';
import { logDebug, logWarning, toError } from './logger.js';

export type CacheKind = 'render' | 'diff';

const FORMAT_VERSION = 1;
const HEADER_END = 0x0a;

const PersistedHeaderSchema = z.object({
  format: z.literal(FORMAT_VERSION),
  kind: z.enum(['render', 'diff']),
  key: z.string(),
  payloadBytes: z.number().int().nonnegative(),
  payloadSha256: z.string().regex(/^[0-9a-f]{64}$/),
  metadata: z.record(z.unknown()),
}).strict();

export type PersistedHeader = z.infer<typeof PersistedHeaderSchema>;

export interface PersistedImage {
  png: Buffer;
  metadata: Record<string, unknown>;
}

function sha256(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export class PersistentImageStore {
  constructor(readonly directory: string) {}

  pathFor(kind: CacheKind, key: string): string {
    return join(this.directory, kind, key.slice(0, 2), `${key}.kvd`);
  }

  /**
   * @returns The stored image, or null when there is no entry
   * @throws CacheCorruptionError when an entry exists but does not verify
   */
  async read(kind: CacheKind, key: string): Promise<PersistedImage | null> {
    const path = this.pathFor(kind, key);
    let raw: Buffer;
    try {
      raw = await readFile(path);
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }

    const headerEnd = raw.indexOf(HEADER_END);
    if (headerEnd < 0) {
      throw new CacheCorruptionError(path, 'missing header');
    }

    let json: unknown;
    try {
      json = JSON.parse(raw.subarray(0, headerEnd).toString('utf8'));
    } catch (error) {
      throw new CacheCorruptionError(path, `unreadable header (${toError(error).message})`);
    }

    const parsed = PersistedHeaderSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheCorruptionError(path, formatZodIssues(parsed.error.issues).join('; '));
    }
    const header = parsed.data;
    if (header.kind !== kind || header.key !== key) {
      throw new CacheCorruptionError(path, `entry belongs to ${header.kind}:${header.key}`);
    }

    const payload = raw.subarray(headerEnd + 1);
    if (payload.length !== header.payloadBytes) {
      throw new CacheCorruptionError(
        path,
        `truncated payload (expected ${header.payloadBytes} bytes, found ${payload.length})`
      );
    }
    if (sha256(payload) !== header.payloadSha256) {
      throw new CacheCorruptionError(path, 'payload checksum mismatch');
    }

    return { png: Buffer.from(payload), metadata: header.metadata };
  }

  async write(kind: CacheKind, key: string, png: Buffer, metadata: Record<string, unknown>): Promise<void> {
    const header: PersistedHeader = {
      format: FORMAT_VERSION,
      kind,
      key,
      payloadBytes: png.length,
      payloadSha256: sha256(png),
      metadata,
    };
    const path = this.pathFor(kind, key);
    await atomicWrite(path, Buffer.concat([Buffer.from(`${JSON.stringify(header)}\n`, 'utf8'), png]));
    logDebug('cache', 'Persisted entry', { kind, key, path });
  }

  /**
   * Delete an entry; failures are logged, never thrown
   */
  async remove(kind: CacheKind, key: string): Promise<void> {
    const path = this.pathFor(kind, key);
    try {
      await rm(path, { force: true });
    } catch (error) {
      logWarning('cache', `Failed to remove cache entry ${path}`, toError(error));
    }
  }
}

/**
 * Write a file atomically using temp file + rename
 */
async function atomicWrite(filePath: string, content: Buffer): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.tmp.${Date.now()}.${randomBytes(8).toString('hex')}`;
  try {
    await writeFile(tempPath, content);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
