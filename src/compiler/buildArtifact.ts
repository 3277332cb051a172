import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { CompilerFailedError, ScanError } from '../errors.js';
import type { OptimizeMode } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import { isCacheHit, loadCacheEntry, saveCacheEntry, touchCacheEntry } from '../cache/cacheManager.js';
import { getStagingDir } from '../cache/cachePaths.js';
import { computeBuildHash } from '../cache/hash.js';
import { unitFiles } from '../scanner/collectUnits.js';
import type { CompilationMode, CompilationUnit, UnitFile } from '../scanner/scannerTypes.js';
import type { ForeignCompiler } from './compilerTypes.js';
import { resolveCpuModel } from './cpuModel.js';
import { archOf, detectPlatform, type PlatformInfo } from './detectPlatform.js';
import { linkDirectives } from './linkDirectives.js';
import { isWasmTarget, mapTargetTriple } from './targets.js';

export type ArtifactOptions = {
  outDir: string;
  mode: CompilationMode;
  /** Rust target triple; `undefined` or `native` builds for the host. */
  rustTarget?: string;
  optimize: OptimizeMode;
  cFlags?: string[];
  /** A factory is only called when there is something to build. */
  compiler: ForeignCompiler | (() => ForeignCompiler);
  /** Paths for `rerun-if-changed`. */
  watched?: string[];
  /** Foreign and low-level symbols, exported on `wasm*` targets. */
  exportedSymbols?: string[];
  env?: Record<string, string | undefined>;
  platform?: PlatformInfo;
};

export type ArtifactResult = {
  /** `null` when there was nothing to build. */
  artifactPath: string | null;
  cached: boolean;
  hash: string | null;
  zigTarget: string | undefined;
  cpu: string | null;
  directives: string[];
};

function writeStaged(stagingDir: string, files: readonly UnitFile[]) {
  rmSync(stagingDir, { recursive: true, force: true });
  for (const f of files) {
    const p = join(stagingDir, f.path);
    mkdirSync(dirname(p), { recursive: true });
    writeFileSync(p, f.contents);
  }
}

function rootUnit(units: readonly CompilationUnit[]): CompilationUnit {
  const root = units.find((u) => u.role !== 'module');
  if (!root) throw new ScanError('no merged or entry unit to compile');
  return root;
}

/**
 * Stages the units, then compiles them unless `zigbind-cache.json` in
 * `outDir` already records the same hash and the library still exists.
 */
export function buildArtifact(units: readonly CompilationUnit[], options: ArtifactOptions): ArtifactResult {
  const watched = options.watched ?? [];
  if (units.length === 0) {
    traceInfo('build.empty', { outDir: options.outDir });
    return {
      artifactPath: null,
      cached: false,
      hash: null,
      zigTarget: undefined,
      cpu: null,
      directives: linkDirectives({ artifactPath: null, watched }),
    };
  }

  const env = options.env ?? process.env;
  const platform = options.platform ?? detectPlatform();
  const zigTarget = mapTargetTriple(options.rustTarget);
  const cpu = resolveCpuModel(archOf(options.rustTarget, platform), env);
  if (cpu.nativeSuppressed) {
    warn({
      code: 'NATIVE_CPU_SUPPRESSED',
      message: 'target-cpu=native is ignored for Zig code; building for the baseline CPU',
      hint: 'enable explicit target features (e.g. -C target-feature=+avx2) to get a tuned model',
    });
  }

  const compiler = typeof options.compiler === 'function' ? options.compiler() : options.compiler;
  const stagingDir = getStagingDir(options.outDir);
  const files = unitFiles(units);
  writeStaged(stagingDir, files);

  const auxiliarySources = [...new Set(units.flatMap((u) => u.auxiliarySources))];
  const cFlags = options.cFlags ?? [];
  const target = zigTarget ?? 'native';
  const hash = computeBuildHash({
    files,
    auxiliarySources,
    mode: options.mode,
    target,
    cpu: cpu.cpu,
    optimize: options.optimize,
    cFlags,
    compiler: compiler.info,
  });

  const wasmExports = isWasmTarget(options.rustTarget) ? options.exportedSymbols ?? [] : [];
  const previous = loadCacheEntry(options.outDir);
  if (previous !== null && isCacheHit(previous, hash)) {
    touchCacheEntry(options.outDir, previous);
    logDebug('cache hit', { hash, artifact: previous.artifactPath });
    traceInfo('cache.hit', { hash });
    return {
      artifactPath: previous.artifactPath,
      cached: true,
      hash,
      zigTarget,
      cpu: cpu.cpu,
      directives: linkDirectives({ artifactPath: previous.artifactPath, watched, wasmExports }),
    };
  }

  logDebug('cache miss', { hash, previous: previous?.hash });
  traceInfo('cache.miss', { hash, previous: previous?.hash ?? null });

  const result = compiler.compile({
    stagingDir,
    rootSource: join(stagingDir, rootUnit(units).files[0].path),
    auxiliarySources,
    cFlags,
    outDir: options.outDir,
    zigTarget,
    cpu: cpu.cpu,
    optimize: options.optimize,
    useBuildScript: options.mode === 'modular-build',
  });
  if (!existsSync(result.artifactPath)) {
    throw new CompilerFailedError(`compiler reported success but ${result.artifactPath} does not exist`, [], 0);
  }

  saveCacheEntry(options.outDir, {
    hash,
    artifactPath: result.artifactPath,
    target,
    mode: options.mode,
    createdAt: Date.now(),
  });
  traceInfo('build.done', { artifact: result.artifactPath, cpu: cpu.cpu, target });

  return {
    artifactPath: result.artifactPath,
    cached: false,
    hash,
    zigTarget,
    cpu: cpu.cpu,
    directives: linkDirectives({ artifactPath: result.artifactPath, watched, wasmExports }),
  };
}
