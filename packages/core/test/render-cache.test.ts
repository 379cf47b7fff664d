import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { normalizedTmpdir } from '@kicad-vdiff/utils';

import { PersistentImageStore } from '../src/cache-store.js';
import { CacheCorruptionError } from '../src/errors.js';
import { RenderCache, cacheKey, type DiffImage, type RenderedImage } from '../src/render-cache.js';

function image(key: string, bytes = 10, fill = 1): RenderedImage {
  return { key, png: Buffer.alloc(bytes, fill), width: 2, height: 3 };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const K1 = cacheKey('test', 'one');
const K2 = cacheKey('test', 'two');
const K3 = cacheKey('test', 'three');

describe('RenderCache', () => {
  describe('single flight', () => {
    it('should run one computation for concurrent requests of a key', async () => {
      const cache = new RenderCache();
      const gate = deferred<RenderedImage>();
      const compute = vi.fn(() => gate.promise);

      const waiters = Array.from({ length: 5 }, () => cache.getOrRender(K1, compute));
      expect(cache.stats().inFlight).toBe(1);
      gate.resolve(image(K1));
      const results = await Promise.all(waiters);

      expect(compute).toHaveBeenCalledTimes(1);
      expect(new Set(results).size).toBe(1);
      expect(cache.stats()).toMatchObject({ entries: 1, misses: 1, inFlight: 0 });
    });

    it('should serve later requests from memory', async () => {
      const cache = new RenderCache();
      const compute = vi.fn(async () => image(K1));

      await cache.getOrRender(K1, compute);
      await cache.getOrRender(K1, compute);

      expect(compute).toHaveBeenCalledTimes(1);
      expect(cache.stats()).toMatchObject({ hits: 1, misses: 1 });
    });

    it('should broadcast a failure to every waiter and not store it', async () => {
      const cache = new RenderCache();
      const gate = deferred<RenderedImage>();

      const waiters = Promise.allSettled([
        cache.getOrRender(K1, () => gate.promise),
        cache.getOrRender(K1, () => gate.promise),
        cache.getOrRender(K1, () => gate.promise),
      ]);
      const failure = new Error('renderer crashed');
      gate.reject(failure);
      const settled = await waiters;

      expect(settled).toEqual([
        { status: 'rejected', reason: failure },
        { status: 'rejected', reason: failure },
        { status: 'rejected', reason: failure },
      ]);
      expect(cache.stats()).toMatchObject({ entries: 0, inFlight: 0 });

      const retry = vi.fn(async () => image(K1));
      await expect(cache.getOrRender(K1, retry)).resolves.toEqual(image(K1));
      expect(retry).toHaveBeenCalledTimes(1);
    });

    it('should keep renders and diffs with the same key apart', async () => {
      const cache = new RenderCache();
      const diff: DiffImage = { ...image(K1), identical: true, removedPixels: 0, addedPixels: 0 };
      const computeDiff = vi.fn(async () => diff);

      await cache.getOrRender(K1, async () => image(K1));
      const result = await cache.getOrDiff(K1, computeDiff);

      expect(computeDiff).toHaveBeenCalledTimes(1);
      expect(result).toBe(diff);
      expect(cache.stats().entries).toBe(2);
    });

    it('should reject keys that are not sha256 digests', async () => {
      const cache = new RenderCache();

      await expect(cache.getOrRender('board@HEAD', async () => image('x'))).rejects.toThrow(
        'Cache keys must be sha256 hex digests'
      );
    });
  });

  describe('abort', () => {
    it('should stop one waiter without cancelling the shared computation', async () => {
      const cache = new RenderCache();
      const gate = deferred<RenderedImage>();
      const controller = new AbortController();

      const aborted = cache.getOrRender(K1, () => gate.promise, { signal: controller.signal });
      const patient = cache.getOrRender(K1, () => gate.promise);
      controller.abort();

      await expect(aborted).rejects.toMatchObject({ name: 'AbortError' });
      gate.resolve(image(K1));
      await expect(patient).resolves.toEqual(image(K1));
      expect(cache.stats().entries).toBe(1);
    });
  });

  describe('eviction', () => {
    it('should evict the least recently used entry past maxEntries', async () => {
      const cache = new RenderCache({ maxEntries: 2 });
      await cache.getOrRender(K1, async () => image(K1));
      await cache.getOrRender(K2, async () => image(K2));
      await cache.getOrRender(K1, async () => image(K1));

      await cache.getOrRender(K3, async () => image(K3));

      const again1 = vi.fn(async () => image(K1));
      const again2 = vi.fn(async () => image(K2));
      await cache.getOrRender(K1, again1);
      await cache.getOrRender(K2, again2);
      expect(again1).not.toHaveBeenCalled();
      expect(again2).toHaveBeenCalledTimes(1);
      expect(cache.stats().evictions).toBe(2);
    });

    it('should evict past maxBytes', async () => {
      const cache = new RenderCache({ maxBytes: 100 });

      await cache.getOrRender(K1, async () => image(K1, 60));
      await cache.getOrRender(K2, async () => image(K2, 60));

      expect(cache.stats()).toMatchObject({ entries: 1, bytes: 60, evictions: 1 });
    });

    it('should still return an image too large to keep', async () => {
      const cache = new RenderCache({ maxBytes: 100 });

      const result = await cache.getOrRender(K1, async () => image(K1, 200));

      expect(result.png.length).toBe(200);
      expect(cache.stats()).toMatchObject({ entries: 0, bytes: 0 });
    });

    it('should never evict work in flight', async () => {
      const cache = new RenderCache({ maxEntries: 1 });
      const gate = deferred<RenderedImage>();
      const slow = cache.getOrRender(K1, () => gate.promise);

      await cache.getOrRender(K2, async () => image(K2));
      await cache.getOrRender(K3, async () => image(K3));
      const joined = vi.fn(async () => image(K1));
      const late = cache.getOrRender(K1, joined);
      gate.resolve(image(K1));

      expect(await slow).toBe(await late);
      expect(joined).not.toHaveBeenCalled();
    });
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(normalizedTmpdir(), 'kvd-cache-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should reload entries written by an earlier cache', async () => {
      await new RenderCache({ directory: dir }).getOrRender(K1, async () => image(K1, 32, 7));
      const restarted = new RenderCache({ directory: dir });
      const compute = vi.fn(async () => image(K1));

      const result = await restarted.getOrRender(K1, compute);

      expect(compute).not.toHaveBeenCalled();
      expect(result).toEqual(image(K1, 32, 7));
      expect(restarted.stats()).toMatchObject({ diskHits: 1, misses: 1 });
    });

    it('should round-trip diff metadata', async () => {
      const diff: DiffImage = { ...image(K1), identical: false, removedPixels: 4, addedPixels: 9 };
      await new RenderCache({ directory: dir }).getOrDiff(K1, async () => diff);

      const result = await new RenderCache({ directory: dir }).getOrDiff(K1, async () => {
        throw new Error('should have been loaded');
      });

      expect(result).toEqual(diff);
    });

    it('should not write an entry too large to keep', async () => {
      const cache = new RenderCache({ directory: dir, maxBytes: 100 });

      const result = await cache.getOrRender(K1, async () => image(K1, 200));

      expect(result.png.length).toBe(200);
      expect(existsSync(new PersistentImageStore(dir).pathFor('render', K1))).toBe(false);
      expect(cache.stats()).toMatchObject({ entries: 0, evictions: 1 });
    });

    it('should discard a truncated entry and recompute it', async () => {
      await new RenderCache({ directory: dir }).getOrRender(K1, async () => image(K1, 32));
      const path = new PersistentImageStore(dir).pathFor('render', K1);
      const bytes = readFileSync(path);
      writeFileSync(path, bytes.subarray(0, bytes.length - 5));

      const compute = vi.fn(async () => image(K1, 32, 9));
      const healed = await new RenderCache({ directory: dir }).getOrRender(K1, compute);
      const reloaded = await new RenderCache({ directory: dir }).getOrRender(K1, compute);

      expect(compute).toHaveBeenCalledTimes(1);
      expect(healed).toEqual(image(K1, 32, 9));
      expect(reloaded).toEqual(image(K1, 32, 9));
    });
  });
});

describe('PersistentImageStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(normalizedTmpdir(), 'kvd-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return null for a missing entry', async () => {
    expect(await new PersistentImageStore(dir).read('render', K1)).toBeNull();
  });

  it('should round-trip payload and metadata', async () => {
    const store = new PersistentImageStore(dir);

    await store.write('diff', K1, Buffer.from('png-bytes'), { width: 4 });

    expect(await store.read('diff', K1)).toEqual({ png: Buffer.from('png-bytes'), metadata: { width: 4 } });
    expect(store.pathFor('diff', K1)).toBe(join(dir, 'diff', K1.slice(0, 2), `${K1}.kvd`));
  });

  it('should reject a file without a header', async () => {
    const store = new PersistentImageStore(dir);
    await store.write('render', K1, Buffer.from('x'), {});
    writeFileSync(store.pathFor('render', K1), 'garbage');

    await expect(store.read('render', K1)).rejects.toThrow(CacheCorruptionError);
  });

  it('should reject a payload that does not match its checksum', async () => {
    const store = new PersistentImageStore(dir);
    await store.write('render', K1, Buffer.from('abc'), {});
    const path = store.pathFor('render', K1);
    const bytes = readFileSync(path);
    bytes[bytes.length - 1] = 'z'.charCodeAt(0);
    writeFileSync(path, bytes);

    await expect(store.read('render', K1)).rejects.toThrow('payload checksum mismatch');
  });

  it('should reject an entry stored under another key', async () => {
    const store = new PersistentImageStore(dir);
    await store.write('render', K1, Buffer.from('abc'), {});
    const misplaced = store.pathFor('render', K2);
    mkdirSync(dirname(misplaced), { recursive: true });
    writeFileSync(misplaced, readFileSync(store.pathFor('render', K1)));

    await expect(store.read('render', K2)).rejects.toThrow(`entry belongs to render:${K1}`);
  });
});
