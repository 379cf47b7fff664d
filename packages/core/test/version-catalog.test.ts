import { describe, it, expect } from 'vitest';

import { RepositoryUnavailableError, UnknownVersionError } from '../src/errors.js';
import { VersionCatalog, resolveVersionName } from '../src/version-catalog.js';
import { WORKING, backupVersion, gitVersion, versionIdKey } from '../src/version-id.js';

import { MemorySource, SHA_A, SHA_B } from './helpers/fakes.js';

const ABBA_SHA = 'abba000000000000000000000000000000000001';
const ABBC_SHA = 'abbc000000000000000000000000000000000002';

function buildCatalog(): { catalog: VersionCatalog; git: MemorySource; backups: MemorySource } {
  const working = new MemorySource('working').add(WORKING, { 'board.kicad_pcb': 'now' }, 'WORK');
  const git = new MemorySource('git')
    .add(gitVersion(SHA_B), { 'board.kicad_pcb': 'second' }, 'bbbbbbb second')
    .add(gitVersion(SHA_A), { 'board.kicad_pcb': 'first' }, 'aaaaaaa first');
  const backups = new MemorySource('backup')
    .add(backupVersion('2024-03-02'), {}, 'Backup 2024-03-02')
    .add(backupVersion('2024-03-01'), {}, 'Backup 2024-03-01');
  return { catalog: new VersionCatalog('/project', [working, git, backups]), git, backups };
}

describe('VersionCatalog', () => {
  describe('versions', () => {
    it('should list the working tree, then commits, then backups', async () => {
      const { catalog } = buildCatalog();

      const keys = (await catalog.listVersions()).map(entry => versionIdKey(entry.id));

      expect(keys).toEqual([
        'working',
        `git:${SHA_B}`,
        `git:${SHA_A}`,
        'backup:2024-03-02',
        'backup:2024-03-01',
      ]);
    });

    it('should drop duplicate entries', async () => {
      const git = new MemorySource('git')
        .add(gitVersion(SHA_A), {})
        .add(gitVersion(SHA_A), {});
      const catalog = new VersionCatalog('/project', [new MemorySource('working').add(WORKING, {}), git]);

      const entries = await catalog.listVersions();

      expect(entries).toHaveLength(2);
    });

    it('should restart from the beginning on every iteration', async () => {
      const { catalog } = buildCatalog();

      const first = await catalog.listVersions();
      const second = await catalog.listVersions();

      expect(second).toEqual(first);
    });

    it('should skip a source that is not available', async () => {
      const { catalog, backups } = buildCatalog();
      backups.available = false;

      const entries = await catalog.listVersions();

      expect(entries.map(entry => entry.source)).toEqual(['working', 'git', 'git']);
    });

    it('should fail with RepositoryUnavailable when no history source is available', async () => {
      const { catalog, git, backups } = buildCatalog();
      git.available = false;
      backups.available = false;

      await expect(catalog.listVersions()).rejects.toBeInstanceOf(RepositoryUnavailableError);
    });
  });

  describe('readFile', () => {
    it('should read from the source owning the version kind', async () => {
      const { catalog } = buildCatalog();

      const content = await catalog.readFile(gitVersion(SHA_A), 'board.kicad_pcb');

      expect(content?.toString()).toBe('first');
    });
  });

  describe('resolveVersion', () => {
    it('should resolve a version name against a fresh scan', async () => {
      const { catalog } = buildCatalog();

      const entry = await catalog.resolveVersion('2024-03-01');

      expect(entry.id).toEqual({ kind: 'backup', date: '2024-03-01' });
    });
  });
});

describe('resolveVersionName', () => {
  const working = new MemorySource('working').add(WORKING, {});
  const git = new MemorySource('git')
    .add(gitVersion(ABBA_SHA), {}, 'abba000 newest')
    .add(gitVersion(ABBC_SHA), {}, 'abbc000 older');
  const backups = new MemorySource('backup').add(backupVersion('2024-03-01'), {});

  async function entries() {
    return new VersionCatalog('/project', [working, git, backups]).listVersions();
  }

  it('should resolve WORK and WORKING in any case', async () => {
    const list = await entries();

    expect(resolveVersionName('WORK', list).id).toEqual(WORKING);
    expect(resolveVersionName('working', list).id).toEqual(WORKING);
  });

  it('should resolve HEAD to the newest commit', async () => {
    expect(resolveVersionName('HEAD', await entries()).id).toEqual(gitVersion(ABBA_SHA));
  });

  it('should resolve a backup date', async () => {
    expect(resolveVersionName('2024-03-01', await entries()).id).toEqual(backupVersion('2024-03-01'));
  });

  it('should resolve full and abbreviated hashes in any case', async () => {
    const list = await entries();

    expect(resolveVersionName(ABBA_SHA, list).id).toEqual(gitVersion(ABBA_SHA));
    expect(resolveVersionName('ABBC', list).id).toEqual(gitVersion(ABBC_SHA));
  });

  it('should require at least four hex characters', async () => {
    const list = await entries();

    expect(() => resolveVersionName('abb', list)).toThrow(UnknownVersionError);
  });

  it('should reject an ambiguous abbreviation and list the candidates', async () => {
    const list = [
      ...(await entries()),
      { id: gitVersion('0000aaaa00000000000000000000000000000000'), label: 'one', source: 'git' as const, timestamp: null },
      { id: gitVersion('0000bbbb00000000000000000000000000000000'), label: 'two', source: 'git' as const, timestamp: null },
    ];

    let caught: unknown;
    try {
      resolveVersionName('0000', list);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnknownVersionError);
    expect(caught).toMatchObject({
      message: 'Ambiguous version "0000" (2 matches)',
      candidates: ['one', 'two'],
      details: 'one\ntwo',
    });
  });

  it('should reject names matching nothing', async () => {
    const list = await entries();

    expect(() => resolveVersionName('2023-01-01', list)).toThrow('Unknown version "2023-01-01"');
    expect(() => resolveVersionName('deadbeef', list)).toThrow(UnknownVersionError);
    expect(() => resolveVersionName('main', list)).toThrow(UnknownVersionError);
  });

  it('should reject HEAD when there are no commits', () => {
    expect(() =>
      resolveVersionName('HEAD', [{ id: WORKING, label: 'WORK', source: 'working', timestamp: null }])
    ).toThrow(UnknownVersionError);
  });
});
