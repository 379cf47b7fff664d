/**
 * Render Cache
 *
 * Memoizes rendered images and diff composites by content-derived key.
 *
 * - Single flight: concurrent requests for one key share one computation.
 *   Its outcome, success or failure, reaches every waiter; failures are not
 *   stored, so the next request recomputes.
 * - Bounded: least-recently-used entries are evicted once the entry count
 *   or total PNG bytes exceed the budget. In-flight work is not an entry
 *   and is never evicted.
 * - Optionally persistent: entries are also written to a directory and
 *   reloaded from it on a memory miss. Entries failing verification are
 *   deleted and recomputed.
 */

import { createHash } from 'node:crypto';

import { z } from 'zod';

import { CACHE_DEFAULTS } from '@kicad-vdiff/config';

import { PersistentImageStore, type CacheKind } from './cache-store.js';
import { waitWithSignal } from './abort.js';
import { CacheCorruptionError } from './errors.js';
import { logDebug, logWarning, toError } from './logger.js';

export interface RenderedImage {
  key: string;
  png: Buffer;
  width: number;
  height: number;
}

export interface DiffImage extends RenderedImage {
  identical: boolean;
  removedPixels: number;
  addedPixels: number;
}

export interface RenderCacheOptions {
  maxEntries?: number;
  maxBytes?: number;
  /** Persist entries here; memory only when omitted */
  directory?: string;
}

export interface WaitOptions {
  /** Stop waiting when aborted; the shared computation carries on */
  signal?: AbortSignal;
}

export interface CacheStats {
  entries: number;
  bytes: number;
  hits: number;
  misses: number;
  /** Misses served from the persistence directory */
  diskHits: number;
  inFlight: number;
  evictions: number;
}

const KEY_PATTERN = /^[0-9a-f]{64}$/;

const RenderedMetadataSchema = z.object({
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

const DiffMetadataSchema = RenderedMetadataSchema.extend({
  identical: z.boolean(),
  removedPixels: z.number().int().nonnegative(),
  addedPixels: z.number().int().nonnegative(),
});

interface ImageCodec<T extends RenderedImage> {
  toMetadata(value: T): Record<string, unknown>;
  fromPersisted(key: string, png: Buffer, metadata: unknown): T | null;
}

const renderedCodec: ImageCodec<RenderedImage> = {
  toMetadata: ({ width, height }) => ({ width, height }),
  fromPersisted: (key, png, metadata) => {
    const parsed = RenderedMetadataSchema.safeParse(metadata);
    return parsed.success ? { key, png, ...parsed.data } : null;
  },
};

const diffCodec: ImageCodec<DiffImage> = {
  toMetadata: ({ width, height, identical, removedPixels, addedPixels }) =>
    ({ width, height, identical, removedPixels, addedPixels }),
  fromPersisted: (key, png, metadata) => {
    const parsed = DiffMetadataSchema.safeParse(metadata);
    return parsed.success ? { key, png, ...parsed.data } : null;
  },
};

interface Slot<T> {
  value: T;
  bytes: number;
  /** Last use, on the cache-wide clock */
  tick: number;
}

/**
 * Entries of one kind; Map order is least recently used first
 */
class Partition<T extends RenderedImage> {
  readonly entries = new Map<string, Slot<T>>();
  readonly inFlight = new Map<string, Promise<T>>();

  constructor(
    readonly kind: CacheKind,
    readonly codec: ImageCodec<T>
  ) {}

  oldest(): { key: string; slot: Slot<T> } | undefined {
    for (const [key, slot] of this.entries) {
      return { key, slot };
    }
    return undefined;
  }
}

/**
 * sha256 of a list of identifying strings, for use as a cache key
 *
 * @example
 * cacheKey('render', target.projectRoot, target.relativePath, versionIdKey(id), renderOptionsHash(options));
 */
export function cacheKey(...parts: string[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex');
}

export class RenderCache {
  private readonly maxEntries: number;
  private readonly maxBytes: number;
  private readonly store: PersistentImageStore | null;
  private readonly renders = new Partition<RenderedImage>('render', renderedCodec);
  private readonly diffs = new Partition<DiffImage>('diff', diffCodec);

  private clock = 0;
  private bytes = 0;
  private hits = 0;
  private misses = 0;
  private diskHits = 0;
  private evictions = 0;

  constructor(options: RenderCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? CACHE_DEFAULTS.MAX_ENTRIES;
    this.maxBytes = options.maxBytes ?? CACHE_DEFAULTS.MAX_BYTES;
    this.store = options.directory ? new PersistentImageStore(options.directory) : null;
  }

  /**
   * Cached render for `key`, computing it with `render` on a miss
   */
  getOrRender(key: string, render: () => Promise<RenderedImage>, options: WaitOptions = {}): Promise<RenderedImage> {
    return this.getOrCompute(this.renders, key, render, options);
  }

  /**
   * Cached diff composite for `key`, computing it with `diff` on a miss
   */
  getOrDiff(key: string, diff: () => Promise<DiffImage>, options: WaitOptions = {}): Promise<DiffImage> {
    return this.getOrCompute(this.diffs, key, diff, options);
  }

  stats(): CacheStats {
    return {
      entries: this.renders.entries.size + this.diffs.entries.size,
      bytes: this.bytes,
      hits: this.hits,
      misses: this.misses,
      diskHits: this.diskHits,
      inFlight: this.renders.inFlight.size + this.diffs.inFlight.size,
      evictions: this.evictions,
    };
  }

  /**
   * Drop every in-memory entry (in-flight work and persisted files stay)
   */
  clear(): void {
    this.renders.entries.clear();
    this.diffs.entries.clear();
    this.bytes = 0;
  }

  private async getOrCompute<T extends RenderedImage>(
    partition: Partition<T>,
    key: string,
    compute: () => Promise<T>,
    options: WaitOptions
  ): Promise<T> {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Cache keys must be sha256 hex digests: ${key}`);
    }

    const slot = partition.entries.get(key);
    if (slot) {
      this.hits++;
      this.touch(partition, key, slot);
      logDebug('cache', 'Cache hit', { kind: partition.kind, key });
      return slot.value;
    }

    let pending = partition.inFlight.get(key);
    if (pending) {
      logDebug('cache', 'Joining in-flight computation', { kind: partition.kind, key });
    } else {
      this.misses++;
      pending = this.fill(partition, key, compute);
      partition.inFlight.set(key, pending);
      // The slot is released before any waiter resumes, so a retry starts fresh
      void pending.then(
        () => {
          partition.inFlight.delete(key);
        },
        (error: unknown) => {
          partition.inFlight.delete(key);
          logDebug('cache', 'Computation failed', { kind: partition.kind, key, error: toError(error).message });
        }
      );
    }

    return waitWithSignal(pending, options.signal);
  }

  private async fill<T extends RenderedImage>(
    partition: Partition<T>,
    key: string,
    compute: () => Promise<T>
  ): Promise<T> {
    const persisted = await this.readPersisted(partition, key);
    if (persisted) {
      this.diskHits++;
      this.commit(partition, key, persisted);
      return persisted;
    }

    const value = await compute();
    this.commit(partition, key, value);
    // An entry its own commit evicted stays off disk
    if (partition.entries.get(key)?.value === value) {
      await this.writePersisted(partition, key, value);
    }
    return value;
  }

  private async readPersisted<T extends RenderedImage>(partition: Partition<T>, key: string): Promise<T | null> {
    if (!this.store) {
      return null;
    }
    try {
      const entry = await this.store.read(partition.kind, key);
      if (!entry) {
        return null;
      }
      const value = partition.codec.fromPersisted(key, entry.png, entry.metadata);
      if (!value) {
        throw new CacheCorruptionError(this.store.pathFor(partition.kind, key), 'metadata does not match entry kind');
      }
      return value;
    } catch (error) {
      if (error instanceof CacheCorruptionError) {
        logWarning('cache', 'Discarding corrupt cache entry', error);
        await this.store.remove(partition.kind, key);
      } else {
        logWarning('cache', 'Cache read failed - recomputing', toError(error));
      }
      return null;
    }
  }

  private async writePersisted<T extends RenderedImage>(partition: Partition<T>, key: string, value: T): Promise<void> {
    if (!this.store) {
      return;
    }
    try {
      await this.store.write(partition.kind, key, value.png, partition.codec.toMetadata(value));
    } catch (error) {
      logWarning('cache', 'Cache write failed - entry kept in memory only', toError(error));
    }
  }

  private touch<T extends RenderedImage>(partition: Partition<T>, key: string, slot: Slot<T>): void {
    slot.tick = ++this.clock;
    partition.entries.delete(key);
    partition.entries.set(key, slot);
  }

  private commit<T extends RenderedImage>(partition: Partition<T>, key: string, value: T): void {
    const existing = partition.entries.get(key);
    if (existing) {
      this.bytes -= existing.bytes;
      partition.entries.delete(key);
    }
    const slot: Slot<T> = { value, bytes: value.png.length, tick: ++this.clock };
    partition.entries.set(key, slot);
    this.bytes += slot.bytes;
    this.evict();
  }

  private evict(): void {
    while (
      this.renders.entries.size + this.diffs.entries.size > this.maxEntries ||
      this.bytes > this.maxBytes
    ) {
      const render = this.renders.oldest();
      const diff = this.diffs.oldest();
      if (render && (!diff || render.slot.tick <= diff.slot.tick)) {
        this.drop(this.renders, render.key, render.slot);
      } else if (diff) {
        this.drop(this.diffs, diff.key, diff.slot);
      } else {
        return;
      }
    }
  }

  private drop<T extends RenderedImage>(partition: Partition<T>, key: string, slot: Slot<T>): void {
    partition.entries.delete(key);
    this.bytes -= slot.bytes;
    this.evictions++;
    logDebug('cache', 'Evicted entry', { kind: partition.kind, key, bytes: slot.bytes });
    if (this.store) {
      void this.store.remove(partition.kind, key);
    }
  }
}
