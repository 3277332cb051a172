import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';

import { logDebug } from '../dx/logger.js';
import { isCompilationMode } from '../scanner/scannerTypes.js';
import type { BuildCacheEntry } from './cacheTypes.js';
import { getCacheFile, getStagingDir } from './cachePaths.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isBuildCacheEntry(value: unknown): value is BuildCacheEntry {
  return (
    isRecord(value) &&
    typeof value.hash === 'string' &&
    typeof value.artifactPath === 'string' &&
    typeof value.target === 'string' &&
    isCompilationMode(value.mode) &&
    typeof value.createdAt === 'number' &&
    (value.lastAccessAt === undefined || typeof value.lastAccessAt === 'number')
  );
}

/** The entry in `outDir`, or null when there is none or it cannot be read. */
export function loadCacheEntry(outDir: string): BuildCacheEntry | null {
  const file = getCacheFile(outDir);
  if (!existsSync(file)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    logDebug('ignoring unreadable cache file', { file, err: String(err) });
    return null;
  }
  if (!isBuildCacheEntry(raw)) {
    logDebug('ignoring malformed cache file', { file });
    return null;
  }
  return raw;
}

/** Hash matches and the artifact is still on disk. */
export function isCacheHit(entry: BuildCacheEntry | null, hash: string): boolean {
  return entry !== null && entry.hash === hash && existsSync(entry.artifactPath);
}

export function saveCacheEntry(outDir: string, entry: BuildCacheEntry): void {
  mkdirSync(outDir, { recursive: true });
  writeFileSync(getCacheFile(outDir), JSON.stringify(entry, null, 2));
}

/**
 * Records a cache hit. Best-effort: a read-only cache file must not fail
 * an otherwise successful build.
 */
export function touchCacheEntry(outDir: string, entry: BuildCacheEntry): BuildCacheEntry {
  const next: BuildCacheEntry = { ...entry, lastAccessAt: Date.now() };
  try {
    writeFileSync(getCacheFile(outDir), JSON.stringify(next, null, 2));
    return next;
  } catch (err) {
    logDebug('could not update cache access time', { outDir, err: String(err) });
    return entry;
  }
}

/** Removes the cache file, the staged units and the cached library. */
export function clearCache(outDir: string): string[] {
  const entry = loadCacheEntry(outDir);
  const removed: string[] = [];
  for (const p of [getCacheFile(outDir), getStagingDir(outDir), entry?.artifactPath]) {
    if (p && existsSync(p)) {
      rmSync(p, { recursive: true, force: true });
      removed.push(p);
    }
  }
  return removed;
}
