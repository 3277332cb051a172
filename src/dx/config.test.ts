import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { ConfigError } from '../errors.js';
import {
  __resetConfigCacheForTests,
  loadOptionalConfig,
  optimizeForProfile,
  resolveSettings,
  validateConfig,
} from './config.js';

describe('config loader', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
  });

  it('returns null when config file is missing', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'zigbind-cfg-'));
    const cfg = await loadOptionalConfig(dir);
    expect(cfg).toBe(null);
  });

  it('loads zigbind.config.js (default export)', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'zigbind-cfg-'));
    writeFileSync(
      join(dir, 'zigbind.config.js'),
      `export default { debug: true, mode: "modular-import", cFlags: ["-O2"] };\n`,
      'utf8',
    );

    const cfg = await loadOptionalConfig(dir);
    expect(cfg).toEqual({ debug: true, mode: 'modular-import', cFlags: ['-O2'] });
  });

  it('rejects invalid fields', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'zigbind-cfg-'));
    writeFileSync(join(dir, 'zigbind.config.js'), `export default { mode: "split" };\n`, 'utf8');
    await expect(loadOptionalConfig(dir)).rejects.toThrow(ConfigError);
  });
});

describe('config validation', () => {
  it('names the offending field', () => {
    expect(() => validateConfig({ optimize: 'Fast' }, 'zigbind.config.js')).toThrow(
      'zigbind.config.js: `optimize` must be one of Debug, ReleaseSafe, ReleaseFast, ReleaseSmall, got "Fast"',
    );
    expect(() => validateConfig({ cFlags: '-O2' }, 'cfg')).toThrow('cfg: `cFlags` must be an array of strings, got "-O2"');
    expect(() => validateConfig({ colour: true }, 'cfg')).toThrow('cfg: unknown field `colour`');
    expect(() => validateConfig([], 'cfg')).toThrow('cfg: expected an object as the default export');
  });
});

describe('build settings', () => {
  const root = resolve('/work/crate/src');

  it('uses defaults next to the crate', () => {
    expect(resolveSettings(root, {}, null, {})).toEqual({
      mode: 'merged',
      target: undefined,
      optimize: 'Debug',
      zigPath: undefined,
      cFlags: [],
      outDir: resolve('/work/crate/target/zigbind'),
      manifestDir: resolve('/work/crate'),
    });
  });

  it('prefers options over env over config', () => {
    const env = { ZIGBIND_MODE: 'modular-build', TARGET: 'aarch64-apple-darwin', OUT_DIR: '/tmp/out' };
    const cfg = { mode: 'merged' as const, target: 'wasm32-wasi', outDir: 'build' };

    const fromEnv = resolveSettings(root, {}, cfg, env);
    expect(fromEnv.mode).toBe('modular-build');
    expect(fromEnv.target).toBe('aarch64-apple-darwin');
    expect(fromEnv.outDir).toBe(resolve('/tmp/out'));

    const explicit = resolveSettings(root, { mode: 'modular-import', target: 'native' }, cfg, env);
    expect(explicit.mode).toBe('modular-import');
    expect(explicit.target).toBe('native');

    const fromConfig = resolveSettings(root, {}, cfg, {});
    expect(fromConfig.target).toBe('wasm32-wasi');
    expect(fromConfig.outDir).toBe(resolve('/work/crate/build'));
  });

  it('derives the optimize mode from the profile', () => {
    expect(optimizeForProfile('release')).toBe('ReleaseFast');
    expect(optimizeForProfile('debug')).toBe('Debug');
    expect(optimizeForProfile(undefined)).toBeUndefined();
    expect(resolveSettings(root, {}, null, { PROFILE: 'release' }).optimize).toBe('ReleaseFast');
    expect(resolveSettings(root, {}, { optimize: 'ReleaseSmall' }, { PROFILE: 'release' }).optimize).toBe(
      'ReleaseSmall',
    );
    expect(resolveSettings(root, { release: true }, null, {}).optimize).toBe('ReleaseFast');
  });

  it('rejects an unknown ZIGBIND_MODE', () => {
    expect(() => resolveSettings(root, {}, null, { ZIGBIND_MODE: 'split' })).toThrow(
      'ZIGBIND_MODE must be one of merged, modular-import, modular-build, got "split"',
    );
  });
});
