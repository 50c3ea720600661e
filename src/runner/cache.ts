/**
 * Dependency cache keyed by the manifest contents
 */

import * as actionsCache from '@actions/cache';
import fs from 'fs-extra';
import os from 'os';
import { createHash } from 'node:crypto';

/**
 * Storage behind the cache. The default is the Actions cache service.
 */
export interface CacheBackend {
  /** @returns The key that matched, or undefined on a miss */
  restore(paths: string[], primaryKey: string, restoreKeys: string[]): Promise<string | undefined>;
  /** @returns false when the service declined to store the entry */
  save(paths: string[], key: string): Promise<boolean>;
}

export type CacheHit = 'exact' | 'partial' | 'miss';

export interface CacheRestoreResult {
  key: string;
  hit: CacheHit;
  matchedKey?: string;
}

export const actionsCacheBackend: CacheBackend = {
  restore: (paths, primaryKey, restoreKeys) =>
    actionsCache.restoreCache(paths, primaryKey, restoreKeys),
  async save(paths, key) {
    // saveCache warns and returns -1 instead of throwing on reserve/upload failures
    const cacheId = await actionsCache.saveCache(paths, key);
    return cacheId !== -1;
  }
};

/**
 * OS label used as the key prefix; matches the runner's RUNNER_OS when set
 */
export function cacheOsLabel(env: NodeJS.ProcessEnv = process.env): string {
  return env.RUNNER_OS || os.type();
}

/**
 * Build the cache key for a dependency manifest
 * @param manifestPath - Path of the manifest file
 * @param osLabel - Key prefix identifying the platform
 * @returns Key of the form `<os>-pip-<sha256>`
 */
export async function computeCacheKey(manifestPath: string, osLabel: string): Promise<string> {
  const contents = await fs.readFile(manifestPath);
  const digest = createHash('sha256').update(contents).digest('hex');
  return `${restorePrefix(osLabel)}${digest}`;
}

export function restorePrefix(osLabel: string): string {
  return `${osLabel}-pip-`;
}

/**
 * Restores and saves one directory of downloaded packages
 */
export class DependencyCache {
  private backend: CacheBackend;
  private osLabel: string;

  constructor(backend: CacheBackend = actionsCacheBackend, osLabel = cacheOsLabel()) {
    this.backend = backend;
    this.osLabel = osLabel;
  }

  /**
   * Restore the cache directory for a manifest
   * @param manifestPath - Dependency manifest
   * @param cacheDir - Directory to restore into
   * @returns Which key matched, if any
   */
  async restore(manifestPath: string, cacheDir: string): Promise<CacheRestoreResult> {
    const key = await computeCacheKey(manifestPath, this.osLabel);
    const matchedKey = await this.backend.restore(
      [cacheDir],
      key,
      [restorePrefix(this.osLabel)]
    );

    if (!matchedKey) {
      return { key, hit: 'miss' };
    }
    return { key, hit: matchedKey === key ? 'exact' : 'partial', matchedKey };
  }

  /**
   * Save the cache directory under the key of a previous restore
   * @param restored - Result of restore()
   * @param cacheDir - Directory to save
   * @returns true when an entry was written
   */
  async save(restored: CacheRestoreResult, cacheDir: string): Promise<boolean> {
    if (restored.hit === 'exact') {
      return false;
    }
    if (!(await fs.pathExists(cacheDir))) {
      return false;
    }
    return this.backend.save([cacheDir], restored.key);
  }
}
