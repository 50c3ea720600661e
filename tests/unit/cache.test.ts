/**
 * Unit tests for the dependency cache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { createHash } from 'node:crypto';
import { dir as tmpDir, type DirectoryResult } from 'tmp-promise';

vi.mock('@actions/cache', () => ({
  restoreCache: vi.fn(),
  saveCache: vi.fn()
}));

import * as actionsCache from '@actions/cache';
import {
  actionsCacheBackend,
  DependencyCache,
  computeCacheKey,
  restorePrefix,
  cacheOsLabel,
  type CacheBackend
} from '../../src/runner/cache.js';

function backend(matched?: string) {
  return {
    restore: vi.fn<CacheBackend['restore']>(async () => matched),
    save: vi.fn<CacheBackend['save']>(async () => true)
  };
}

describe('DependencyCache', () => {
  let tmp: DirectoryResult;
  let manifest: string;
  let expectedKey: string;

  beforeEach(async () => {
    tmp = await tmpDir({ unsafeCleanup: true });
    manifest = path.join(tmp.path, 'requirements.txt');
    await fs.writeFile(manifest, 'P==1.0\nrequests==2.32.3\n');
    expectedKey = `Linux-pip-${createHash('sha256').update('P==1.0\nrequests==2.32.3\n').digest('hex')}`;
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should key by the manifest hash', async () => {
    expect(await computeCacheKey(manifest, 'Linux')).toBe(expectedKey);
  });

  it('should change the key when the manifest changes', async () => {
    await fs.appendFile(manifest, 'lxml==5.3.0\n');

    expect(await computeCacheKey(manifest, 'Linux')).not.toBe(expectedKey);
  });

  it('should restore with the os prefix as fallback', async () => {
    const store = backend();
    const cache = new DependencyCache(store, 'Linux');

    const result = await cache.restore(manifest, '/pip');

    expect(result).toEqual({ key: expectedKey, hit: 'miss' });
    expect(store.restore).toHaveBeenCalledWith(['/pip'], expectedKey, ['Linux-pip-']);
  });

  it('should distinguish exact and partial hits', async () => {
    expect(await new DependencyCache(backend(expectedKey), 'Linux').restore(manifest, '/pip'))
      .toEqual({ key: expectedKey, hit: 'exact', matchedKey: expectedKey });
    expect(await new DependencyCache(backend('Linux-pip-old'), 'Linux').restore(manifest, '/pip'))
      .toEqual({ key: expectedKey, hit: 'partial', matchedKey: 'Linux-pip-old' });
  });

  it('should fail restore when the manifest is missing', async () => {
    const cache = new DependencyCache(backend(), 'Linux');

    await expect(cache.restore(path.join(tmp.path, 'missing.txt'), '/pip')).rejects.toThrow('ENOENT');
  });

  it('should save only after a non-exact restore of an existing directory', async () => {
    const pipDir = path.join(tmp.path, 'pip');
    const store = backend();
    const cache = new DependencyCache(store, 'Linux');

    expect(await cache.save({ key: expectedKey, hit: 'miss' }, pipDir)).toBe(false);

    await fs.ensureDir(pipDir);
    expect(await cache.save({ key: expectedKey, hit: 'exact', matchedKey: expectedKey }, pipDir)).toBe(false);
    expect(await cache.save({ key: expectedKey, hit: 'partial', matchedKey: 'Linux-pip-old' }, pipDir)).toBe(true);

    expect(store.save).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledWith([pipDir], expectedKey);
  });

  it('should report nothing saved when the backend declines the entry', async () => {
    const pipDir = path.join(tmp.path, 'pip');
    await fs.ensureDir(pipDir);
    const store = backend();
    store.save.mockResolvedValueOnce(false);
    const cache = new DependencyCache(store, 'Linux');

    expect(await cache.save({ key: expectedKey, hit: 'miss' }, pipDir)).toBe(false);
    expect(store.save).toHaveBeenCalledTimes(1);
  });
});

describe('actionsCacheBackend', () => {
  beforeEach(() => {
    vi.mocked(actionsCache.saveCache).mockReset();
  });

  it('should report a saved entry by its cache id', async () => {
    vi.mocked(actionsCache.saveCache).mockResolvedValueOnce(42);

    expect(await actionsCacheBackend.save(['/pip'], 'Linux-pip-abc')).toBe(true);
    expect(actionsCache.saveCache).toHaveBeenCalledWith(['/pip'], 'Linux-pip-abc');
  });

  it('should treat a -1 cache id as not saved', async () => {
    vi.mocked(actionsCache.saveCache).mockResolvedValueOnce(-1);

    expect(await actionsCacheBackend.save(['/pip'], 'Linux-pip-abc')).toBe(false);
  });
});

describe('cache key helpers', () => {
  it('should build the restore prefix', () => {
    expect(restorePrefix('macOS')).toBe('macOS-pip-');
  });

  it('should prefer RUNNER_OS', () => {
    expect(cacheOsLabel({ RUNNER_OS: 'Windows' })).toBe('Windows');
  });
});
