import { describe, expect, it } from 'vitest';
import { chmodSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { CompilerInfo } from '../compiler/compilerTypes.js';
import { clearCache, isCacheHit, loadCacheEntry, saveCacheEntry, touchCacheEntry } from './cacheManager.js';
import type { BuildCacheEntry } from './cacheTypes.js';
import { computeBuildHash, type HashInput } from './hash.js';

function withOutDir(fn: (dir: string) => void) {
  const dir = mkdtempSync(join(tmpdir(), 'zigbind-cache-'));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

function entryFor(dir: string): BuildCacheEntry {
  return {
    hash: 'abc',
    artifactPath: join(dir, 'libzigbind.a'),
    target: 'native',
    mode: 'merged',
    createdAt: 1,
  };
}

describe('build cache file', () => {
  it('round-trips an entry through zigbind-cache.json', () => {
    withOutDir((dir) => {
      saveCacheEntry(dir, entryFor(dir));
      expect(existsSync(join(dir, 'zigbind-cache.json'))).toBe(true);
      expect(loadCacheEntry(dir)).toEqual(entryFor(dir));
    });
  });

  it('treats a missing, corrupt or foreign file as no entry', () => {
    withOutDir((dir) => {
      expect(loadCacheEntry(dir)).toBe(null);
      writeFileSync(join(dir, 'zigbind-cache.json'), '{ not json');
      expect(loadCacheEntry(dir)).toBe(null);
      writeFileSync(join(dir, 'zigbind-cache.json'), JSON.stringify({ hash: 'abc', mode: 'split' }));
      expect(loadCacheEntry(dir)).toBe(null);
    });
  });

  it('needs an equal hash and an existing artifact for a hit', () => {
    withOutDir((dir) => {
      const entry = entryFor(dir);
      expect(isCacheHit(entry, 'abc')).toBe(false);
      writeFileSync(entry.artifactPath, '');
      expect(isCacheHit(entry, 'abc')).toBe(true);
      expect(isCacheHit(entry, 'abd')).toBe(false);
      expect(isCacheHit(null, 'abc')).toBe(false);
    });
  });

  it('touches lastAccessAt on disk', () => {
    withOutDir((dir) => {
      saveCacheEntry(dir, entryFor(dir));
      const before: unknown = JSON.parse(readFileSync(join(dir, 'zigbind-cache.json'), 'utf8'));
      expect(before).not.toHaveProperty('lastAccessAt');

      const touched = touchCacheEntry(dir, entryFor(dir));
      expect(typeof touched.lastAccessAt).toBe('number');
      expect(typeof loadCacheEntry(dir)?.lastAccessAt).toBe('number');
    });
  });

  it('does not throw if the cache file is not writable', () => {
    withOutDir((dir) => {
      saveCacheEntry(dir, entryFor(dir));
      try {
        chmodSync(join(dir, 'zigbind-cache.json'), 0o444);
      } catch {
        // platform differences
      }
      expect(() => touchCacheEntry(dir, entryFor(dir))).not.toThrow();
    });
  });

  it('clears the file, the staging directory and the library', () => {
    withOutDir((dir) => {
      const entry = entryFor(dir);
      saveCacheEntry(dir, entry);
      mkdirSync(join(dir, 'zigbind'));
      writeFileSync(entry.artifactPath, '');

      expect(clearCache(dir)).toEqual([join(dir, 'zigbind-cache.json'), join(dir, 'zigbind'), entry.artifactPath]);
      expect(existsSync(entry.artifactPath)).toBe(false);
      expect(clearCache(dir)).toEqual([]);
    });
  });
});

describe('build hash', () => {
  const compiler: CompilerInfo = { kind: 'zig', path: '/usr/bin/zig', version: '0.11.0' };
  const base: HashInput = {
    files: [
      { path: 'b.zig', contents: 'export fn b() void {}' },
      { path: 'a.zig', contents: 'export fn a() void {}' },
    ],
    auxiliarySources: [],
    mode: 'merged',
    target: 'native',
    cpu: 'baseline',
    optimize: 'Debug',
    cFlags: [],
    compiler,
  };

  it('does not depend on file order', () => {
    expect(computeBuildHash({ ...base, files: [...base.files].reverse() })).toBe(computeBuildHash(base));
  });

  it('changes with contents and settings', () => {
    const h = computeBuildHash(base);
    expect(h).toMatch(/^[0-9a-f]{64}$/);
    expect(computeBuildHash({ ...base, files: [{ path: 'a.zig', contents: 'export fn a() void {} ' }] })).not.toBe(h);
    expect(computeBuildHash({ ...base, optimize: 'ReleaseFast' })).not.toBe(h);
    expect(computeBuildHash({ ...base, cpu: 'x86_64_v3' })).not.toBe(h);
    expect(computeBuildHash({ ...base, compiler: { ...compiler, version: '0.12.0' } })).not.toBe(h);
  });
});
