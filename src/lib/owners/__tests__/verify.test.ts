/**
 * Tests for remote-cache.ts and verify.ts - recording fetched OWNERS files
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { DirectoryFileCache, MemoryFileCache, type Fetcher } from '../remote-cache.js';
import { verifySubprojectOwners } from '../verify.js';
import { MalformedDataError } from '../errors.js';
import type { SigsDataset } from '../types.js';
import { recordingLogger, testConfig } from './fixtures.js';

const RAW = 'https://raw.githubusercontent.com/org/repo/master';

function fakeFetcher(files: Record<string, string | null>): { fetcher: Fetcher; requested: string[] } {
  const requested: string[] = [];
  const fetcher: Fetcher = async (uri) => {
    requested.push(uri);
    return files[uri] ?? null;
  };
  return { fetcher, requested };
}

const REMOTE_FILES: Record<string, string | null> = {
  [`${RAW}/OWNERS`]: 'approvers:\n  - leads\nreviewers:\n  - amy\n  - cid\nlabels:\n  - sig/foo\n',
  [`${RAW}/docs/OWNERS`]: 'approvers:\n  - amy\nlabels:\n  - sig/foo\n',
  [`${RAW}/OWNERS_ALIASES`]: 'aliases:\n  leads:\n    - amy\n    - bob\n',
};

function sampleDataset(): SigsDataset {
  return {
    sigs: [
      {
        dir: 'sig-foo',
        name: 'Foo',
        subprojects: [
          { name: 'core', owners: [`${RAW}/OWNERS`, 'org/repo/docs/OWNERS', `${RAW}/gone/OWNERS`] },
        ],
      },
      { dir: 'sig-none', name: 'None' },
    ],
    committees: [{ dir: 'committee-steering', name: 'Steering', subprojects: null }],
  };
}

describe('remote-cache.ts', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sigs-owners-cache-test-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('MemoryFileCache', () => {
    it('fetches each key once, including missing files', async () => {
      const { fetcher, requested } = fakeFetcher({ 'https://example.test/a': 'content' });
      const cache = new MemoryFileCache(fetcher);

      expect(await cache.getOrFetch('a', 'https://example.test/a')).toBe('content');
      expect(await cache.getOrFetch('a', 'https://example.test/a')).toBe('content');
      expect(await cache.getOrFetch('b', 'https://example.test/b')).toBeNull();
      expect(await cache.getOrFetch('b', 'https://example.test/b')).toBeNull();

      expect(requested).toEqual(['https://example.test/a', 'https://example.test/b']);
      expect(cache.fetches).toBe(2);
    });
  });

  describe('DirectoryFileCache', () => {
    it('stores fetched files below the work directory', async () => {
      const workdir = path.join(tempDir, 'stored');
      const { fetcher, requested } = fakeFetcher({ 'https://example.test/OWNERS': 'approvers: [amy]\n' });

      const first = new DirectoryFileCache(workdir, fetcher);
      expect(await first.getOrFetch('org/repo/OWNERS', 'https://example.test/OWNERS')).toBe('approvers: [amy]\n');

      const second = new DirectoryFileCache(workdir, fetcher);
      expect(await second.getOrFetch('org/repo/OWNERS', 'https://example.test/OWNERS')).toBe('approvers: [amy]\n');

      expect(requested).toEqual(['https://example.test/OWNERS']);
      expect(fs.readFileSync(path.join(workdir, 'org', 'repo', 'OWNERS'), 'utf-8')).toBe('approvers: [amy]\n');
    });

    it('remembers missing files with a marker', async () => {
      const workdir = path.join(tempDir, 'missing');
      const { fetcher, requested } = fakeFetcher({});
      const cache = new DirectoryFileCache(workdir, fetcher);

      expect(await cache.getOrFetch('org/repo/OWNERS', 'https://example.test/OWNERS')).toBeNull();
      expect(await cache.getOrFetch('org/repo/OWNERS', 'https://example.test/OWNERS')).toBeNull();

      expect(requested).toHaveLength(1);
      expect(fs.existsSync(path.join(workdir, 'org', 'repo', 'OWNERS.missing'))).toBe(true);
    });

    it('rejects keys outside the work directory', async () => {
      const cache = new DirectoryFileCache(path.join(tempDir, 'escape'), fakeFetcher({}).fetcher);

      await expect(cache.getOrFetch('../outside/OWNERS', 'https://example.test/OWNERS')).rejects.toThrow(
        MalformedDataError
      );
    });
  });
});

describe('verify.ts', () => {
  it('records expanded and pruned contents of every OWNERS file', async () => {
    const dataset = sampleDataset();
    const cache = new MemoryFileCache(fakeFetcher(REMOTE_FILES).fetcher);

    const result = await verifySubprojectOwners(dataset, { config: testConfig, cache, log: recordingLogger() });

    expect(result.recorded).toBe(3);
    expect(result.subprojects).toBe(1);
    expect(cache.fetches).toBe(4);
    expect(dataset.sigs[0].subprojects?.[0].paths).toEqual({
      'org/repo/OWNERS': {
        approvers: ['amy', 'bob'],
        reviewers: ['cid'],
        labels: ['sig/foo'],
        present: true,
        expanded: true,
      },
      'org/repo/docs/OWNERS': {
        approvers: ['amy'],
        reviewers: [],
        labels: ['sig/foo'],
        present: true,
        expanded: true,
      },
      'org/repo/gone/OWNERS': { approvers: [], reviewers: [], present: false, expanded: true },
    });
  });

  it('sets common and union on each subproject, counting missing files as empty', async () => {
    const dataset = sampleDataset();
    const cache = new MemoryFileCache(fakeFetcher(REMOTE_FILES).fetcher);

    await verifySubprojectOwners(dataset, { config: testConfig, cache, log: recordingLogger() });

    const core = dataset.sigs[0].subprojects?.[0];
    expect(core?.common).toEqual({ approvers: [], reviewers: [], labels: [] });
    expect(core?.union).toEqual({ approvers: ['amy', 'bob'], reviewers: ['cid'], labels: ['sig/foo'] });
  });

  it('warns about groups without subprojects and about gaps', async () => {
    const log = recordingLogger();
    const cache = new MemoryFileCache(fakeFetcher(REMOTE_FILES).fetcher);

    const result = await verifySubprojectOwners(sampleDataset(), { config: testConfig, cache, log });

    expect(result.warnings.map((w) => w.message)).toEqual([
      'sig-none has no subprojects, why are they a sig?',
      'committee-steering has an empty subprojects: field',
      'sig-foo/core is missing org/repo/gone/OWNERS',
      'sig-foo/core has no common approvers',
      'sig-foo/core has no common reviewers',
      'sig-foo/core has no common labels',
    ]);
    expect(log.warnings).toEqual(result.warnings.map((w) => w.message));
  });

  it('logs attributes that all files share', async () => {
    const dataset = sampleDataset();
    dataset.sigs[0].subprojects = [{ name: 'core', owners: [`${RAW}/OWNERS`, 'org/repo/docs/OWNERS'] }];
    const log = recordingLogger();
    const cache = new MemoryFileCache(fakeFetcher(REMOTE_FILES).fetcher);

    await verifySubprojectOwners(dataset, { config: testConfig, cache, log });

    expect(log.infos).toContain('OK: sig-foo/core has 1 common approvers');
    expect(dataset.sigs[0].subprojects?.[0].common).toEqual({ approvers: ['amy'], reviewers: [], labels: ['sig/foo'] });
  });

  it('records an owners entry outside the work directory as missing and carries on', async () => {
    const workdir = fs.mkdtempSync(path.join(os.tmpdir(), 'sigs-owners-verify-test-'));
    try {
      const dataset: SigsDataset = {
        sigs: [{ dir: 'sig-foo', name: 'Foo', subprojects: [{ name: 'core', owners: ['../outside/OWNERS', `${RAW}/OWNERS`] }] }],
      };
      const cache = new DirectoryFileCache(workdir, fakeFetcher(REMOTE_FILES).fetcher);

      const result = await verifySubprojectOwners(dataset, { config: testConfig, cache, log: recordingLogger() });

      const paths = dataset.sigs[0].subprojects?.[0].paths;
      expect(paths?.['../outside/OWNERS']).toEqual({ approvers: [], reviewers: [], present: false, expanded: true });
      expect(paths?.['org/repo/OWNERS']?.approvers).toEqual(['amy', 'bob']);
      expect(result.warnings[0]).toEqual({
        code: 'OWNERS_MALFORMED_DATA',
        file: '../outside/OWNERS',
        message: '../outside/OWNERS is malformed: cache key escapes the work directory',
      });
    } finally {
      fs.rmSync(workdir, { recursive: true, force: true });
    }
  });

  it('does not fetch paths that are already recorded', async () => {
    const dataset = sampleDataset();
    const cache = new MemoryFileCache(fakeFetcher(REMOTE_FILES).fetcher);
    await verifySubprojectOwners(dataset, { config: testConfig, cache, log: recordingLogger() });

    const fresh = new MemoryFileCache(fakeFetcher(REMOTE_FILES).fetcher);
    const again = await verifySubprojectOwners(dataset, { config: testConfig, cache: fresh, log: recordingLogger() });

    expect(again.recorded).toBe(0);
    expect(fresh.fetches).toBe(0);
  });
});
