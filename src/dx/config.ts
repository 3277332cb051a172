import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { ConfigError } from '../errors.js';
import { COMPILATION_MODES, isCompilationMode, type CompilationMode } from '../scanner/scannerTypes.js';
import { logDebug } from './logger.js';

export type OptimizeMode = 'Debug' | 'ReleaseSafe' | 'ReleaseFast' | 'ReleaseSmall';

export const OPTIMIZE_MODES: readonly OptimizeMode[] = ['Debug', 'ReleaseSafe', 'ReleaseFast', 'ReleaseSmall'];

export function isOptimizeMode(value: unknown): value is OptimizeMode {
  return typeof value === 'string' && OPTIMIZE_MODES.some((m) => m === value);
}

/** Shape of `zigbind.config.js` (default export). */
export type ZigbindConfig = {
  /** Discovery mode when neither the CLI nor `ZIGBIND_MODE` picks one */
  mode?: CompilationMode;
  /** Rust target triple used when `TARGET` is unset */
  target?: string;
  /** Overrides the optimize mode derived from `PROFILE` */
  optimize?: OptimizeMode;
  /** Zig executable; `ZIG_PATH` wins */
  zigPath?: string;
  /** Extra flags for auxiliary C sources */
  cFlags?: string[];
  /** Output directory, relative to the project root */
  outDir?: string;
  /** Enable debug logs without env var */
  debug?: boolean;
};

export const CONFIG_FILE = 'zigbind.config.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/** Checks every known field of a loaded config; unknown fields are errors too. */
export function validateConfig(raw: unknown, source: string): ZigbindConfig {
  if (!isRecord(raw)) throw new ConfigError(`${source}: expected an object as the default export`);
  const cfg: ZigbindConfig = {};
  const bad = (field: string, expected: string) =>
    new ConfigError(`${source}: \`${field}\` must be ${expected}, got ${JSON.stringify(raw[field])}`);

  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    switch (key) {
      case 'mode':
        if (!isCompilationMode(value)) throw bad(key, `one of ${COMPILATION_MODES.join(', ')}`);
        cfg.mode = value;
        break;
      case 'optimize':
        if (!isOptimizeMode(value)) throw bad(key, `one of ${OPTIMIZE_MODES.join(', ')}`);
        cfg.optimize = value;
        break;
      case 'target':
      case 'zigPath':
      case 'outDir':
        if (typeof value !== 'string' || !value) throw bad(key, 'a non-empty string');
        cfg[key] = value;
        break;
      case 'cFlags':
        if (!isStringArray(value)) throw bad(key, 'an array of strings');
        cfg.cFlags = value;
        break;
      case 'debug':
        if (typeof value !== 'boolean') throw bad(key, 'a boolean');
        cfg.debug = value;
        break;
      default:
        throw new ConfigError(`${source}: unknown field \`${key}\``);
    }
  }
  return cfg;
}

let cached:
  | { loaded: true; path: string; config: ZigbindConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE);
}

/**
 * Loads optional `zigbind.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process and root
 */
export async function loadOptionalConfig(projectRoot: string = process.cwd()): Promise<ZigbindConfig | null> {
  const p = configPath(projectRoot);
  if (cached.loaded && cached.path === p) return cached.config;

  if (!existsSync(p)) {
    cached = { loaded: true, path: p, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const raw = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const config = validateConfig(raw, p);
  cached = { loaded: true, path: p, config };
  logDebug('loaded config', { path: p });
  return config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}

/** Options a caller may set explicitly; each one beats env and config. */
export type BuildOptions = {
  mode?: CompilationMode;
  target?: string;
  optimize?: OptimizeMode;
  /** Shorthand for `optimize: 'ReleaseFast'` */
  release?: boolean;
  zigPath?: string;
  cFlags?: string[];
  outDir?: string;
  manifestDir?: string;
};

export type BuildSettings = {
  mode: CompilationMode;
  /** `undefined`: build for the host */
  target: string | undefined;
  optimize: OptimizeMode;
  zigPath: string | undefined;
  cFlags: string[];
  outDir: string;
  manifestDir: string;
};

type Env = Record<string, string | undefined>;

function envMode(env: Env): CompilationMode | undefined {
  const v = env.ZIGBIND_MODE;
  if (v === undefined || v === '') return undefined;
  if (!isCompilationMode(v)) {
    throw new ConfigError(`ZIGBIND_MODE must be one of ${COMPILATION_MODES.join(', ')}, got "${v}"`);
  }
  return v;
}

/** `PROFILE=release` builds ReleaseFast; any other profile builds Debug. */
export function optimizeForProfile(profile: string | undefined): OptimizeMode | undefined {
  if (profile === undefined || profile === '') return undefined;
  return profile === 'release' ? 'ReleaseFast' : 'Debug';
}

export function manifestDirFor(srcRoot: string, env: Env = process.env): string {
  return env.CARGO_MANIFEST_DIR || dirname(resolve(srcRoot));
}

/**
 * Settles every build setting. Precedence: explicit options, then the
 * environment, then the config file, then the defaults. For the optimize
 * mode a configured value beats the one derived from `PROFILE`.
 */
export function resolveSettings(
  srcRoot: string,
  options: BuildOptions,
  config: ZigbindConfig | null,
  env: Env = process.env,
): BuildSettings {
  const manifestDir = resolve(options.manifestDir ?? manifestDirFor(srcRoot, env));
  const cfg = config ?? {};
  const outDir =
    options.outDir ?? (env.OUT_DIR || (cfg.outDir ? join(manifestDir, cfg.outDir) : join(manifestDir, 'target', 'zigbind')));

  return {
    mode: options.mode ?? envMode(env) ?? cfg.mode ?? 'merged',
    target: options.target ?? (env.TARGET || cfg.target),
    optimize:
      options.optimize ??
      (options.release ? 'ReleaseFast' : undefined) ??
      cfg.optimize ??
      optimizeForProfile(env.PROFILE) ??
      'Debug',
    zigPath: options.zigPath ?? (env.ZIG_PATH || cfg.zigPath),
    cFlags: options.cFlags ?? cfg.cFlags ?? [],
    outDir: resolve(outDir),
    manifestDir,
  };
}
