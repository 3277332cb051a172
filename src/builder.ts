import { mkdirSync, writeFileSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';

import { GenerationError } from './errors.js';
import { exportedSymbols, generateBlock, missingExports, renderDts, RustWriter } from './codegen/index.js';
import type { GeneratedSymbol } from './codegen/index.js';
import { buildArtifact, createZigCompiler, detectZigCompiler, formatDirectives } from './compiler/index.js';
import type { ArtifactResult, ForeignCompiler } from './compiler/index.js';
import { isWasm64Target, isWasmTarget } from './compiler/targets.js';
import {
  loadOptionalConfig,
  manifestDirFor,
  resolveSettings,
  type BuildOptions,
  type BuildSettings,
} from './dx/config.js';
import { logInfo, setDebugEnabled } from './dx/logger.js';
import { formatSymbolSignature, traceInfo } from './dx/trace.js';
import { warn } from './dx/warnings.js';
import { parseDeclarations } from './parser/index.js';
import { collectUnits, scanSources, splitEmbedded } from './scanner/index.js';
import type { BindingBlock, CompilationUnit, ScanResult } from './scanner/index.js';

export const BINDINGS_FILE = 'zigbind_bindings.rs';
export const DTS_FILE = 'zigbind.d.ts';

type Env = Record<string, string | undefined>;

export type RunBuildOptions = BuildOptions & {
  /** Replaces the `zig` found on the system. */
  compiler?: ForeignCompiler;
  env?: Env;
  /** Write `cargo:` directives to stdout. Default true. */
  printDirectives?: boolean;
};

export type BlockOutput = {
  block: BindingBlock;
  code: string;
  symbols: GeneratedSymbol[];
};

export type BuildOutput = {
  settings: BuildSettings;
  bindingsPath: string;
  dtsPath: string | null;
  blocks: BlockOutput[];
  units: CompilationUnit[];
  artifact: ArtifactResult;
  directives: string[];
};

const where = (b: BindingBlock) => `${b.file}:${b.line}`;

/** One `pub mod` per block, in scan order. An empty list renders as an empty file. */
export function renderBindings(blocks: readonly BlockOutput[]): string {
  if (!blocks.length) return '';
  const w = new RustWriter();
  w.line('// Generated by zigbind. Do not edit.');
  for (const { block, code } of blocks) {
    w.gap();
    w.line(`// ${where(block)}`);
    if (!code) {
      w.line(`pub mod ${block.moduleName} {}`);
      continue;
    }
    w.open(`pub mod ${block.moduleName}`);
    for (const l of code.replace(/\n$/, '').split('\n')) w.line(l);
    w.close();
  }
  return w.toString();
}

function checkForeignExports(out: BlockOutput) {
  for (const s of missingExports(out.symbols, out.block.source.code)) {
    warn({
      code: 'MISSING_FOREIGN_EXPORT',
      message: `${where(out.block)}: the block's Zig source has no \`export fn ${s.name}\``,
      hint: `expected ${s.zigSignature ?? formatSymbolSignature(s)}`,
    });
  }
}

/**
 * Symbols are linked into one library: a low-level wrapper may exist once,
 * and a foreign function must mean the same thing in every block.
 */
function checkAcrossBlocks(outputs: readonly BlockOutput[]) {
  const low = new Map<string, BindingBlock>();
  const foreign = new Map<string, { block: BindingBlock; signature: string }>();

  for (const { block, symbols } of outputs) {
    for (const s of symbols) {
      if (s.level === 'low') {
        const prev = low.get(s.name);
        if (prev) {
          throw new GenerationError(`\`${s.name}\` is exported by both ${where(prev)} and ${where(block)}`);
        }
        low.set(s.name, block);
      } else if (s.level === 'foreign') {
        const signature = formatSymbolSignature(s);
        const prev = foreign.get(s.name);
        if (prev && prev.signature !== signature) {
          throw new GenerationError(
            `foreign function \`${s.name}\` is declared differently in ${where(prev.block)} and ${where(block)}:\n` +
              `  ${prev.signature}\n  ${signature}`,
          );
        }
        foreign.set(s.name, prev ?? { block, signature });
      }
    }
  }
}

/** Paths cargo should watch: the scan root, and included files outside it. */
function watchedPaths(scan: ScanResult): string[] {
  const outside = scan.blocks.flatMap((b) => {
    if (b.source.kind !== 'external') return [];
    const rel = relative(scan.root, b.source.absolutePath);
    return rel.startsWith('..') ? [b.source.absolutePath] : [];
  });
  return [scan.root, ...new Set(outside)];
}

/**
 * Scans `srcRoot`, writes the Rust bindings, and compiles the Zig side.
 * Prints the linker directives unless `printDirectives` is false.
 */
export async function runBuild(srcRoot: string, options: RunBuildOptions = {}): Promise<BuildOutput> {
  const env = options.env ?? process.env;
  const configRoot = resolve(options.manifestDir ?? manifestDirFor(srcRoot, env));
  const config = await loadOptionalConfig(configRoot);
  if (config?.debug) setDebugEnabled(true);

  const settings = resolveSettings(srcRoot, options, config, env);
  traceInfo('build.start', { srcRoot, mode: settings.mode, target: settings.target ?? 'native' });

  const scan = scanSources(srcRoot, { manifestDir: settings.manifestDir });
  const blocks = scan.blocks.map((block): BlockOutput => ({ block, ...generateBlock(block) }));
  blocks.forEach(checkForeignExports);
  checkAcrossBlocks(blocks);

  mkdirSync(settings.outDir, { recursive: true });
  const bindingsPath = join(settings.outDir, BINDINGS_FILE);
  writeFileSync(bindingsPath, renderBindings(blocks));

  const symbols = blocks.flatMap((b) => b.symbols);
  let dtsPath: string | null = null;
  if (isWasmTarget(settings.target)) {
    dtsPath = join(settings.outDir, DTS_FILE);
    writeFileSync(dtsPath, renderDts(symbols, isWasm64Target(settings.target)));
  }

  const units = collectUnits(scan, settings.mode, { cFlags: settings.cFlags });
  const artifact = buildArtifact(units, {
    outDir: settings.outDir,
    mode: settings.mode,
    rustTarget: settings.target,
    optimize: settings.optimize,
    cFlags: settings.cFlags,
    compiler: options.compiler ?? (() => createZigCompiler(detectZigCompiler(settings.zigPath))),
    watched: watchedPaths(scan),
    exportedSymbols: exportedSymbols(symbols),
    env,
  });

  if (options.printDirectives !== false) process.stdout.write(formatDirectives(artifact.directives));
  logInfo('build finished', { blocks: blocks.length, units: units.length, cached: artifact.cached });
  traceInfo('build.finish', { artifact: artifact.artifactPath, cached: artifact.cached });

  return { settings, bindingsPath, dtsPath, blocks, units, artifact, directives: artifact.directives };
}

export type ExpandOptions = {
  file?: string;
  /** Line of the macro invocation; declarations are located relative to it. */
  line?: number;
};

/**
 * Rust code for the body of one `zigbind!` invocation, for a macro runtime
 * that expands blocks in place.
 */
export function expandInvocation(body: string, options: ExpandOptions = {}): string {
  const file = options.file ?? '<zigbind!>';
  const line = options.line ?? 1;
  const parts = splitEmbedded(body);
  const block: BindingBlock = {
    file,
    line,
    moduleName: 'zigbind',
    rawModule: 'ffi',
    source: { kind: 'embedded', code: parts.zig },
    declarations: parseDeclarations(parts.decls, { file, baseLine: line + parts.declsOffset, baseColumn: 1 }),
  };
  return generateBlock(block).code;
}
