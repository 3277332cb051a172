import { relative, sep } from 'node:path';

import type { SignatureModel } from '../model/signatureTypes.js';
import { traceInfo } from '../dx/trace.js';
import { externStructs, mergeFragments, type ZigPart } from './normalizeZig.js';
import type { CompilationMode, CompilationUnit, ScanResult } from './scannerTypes.js';

export const MERGED_FILE = 'generated_zigbind.zig';
export const ENTRY_FILE = 'zigbind_main.zig';
export const BUILD_FILE = 'build.zig';
export const LIBRARY_NAME = 'zigbind';

/** Flags every auxiliary C source is compiled with, ahead of the configured ones. */
export const BASE_C_FLAGS: readonly string[] = ['-std=c99', '-fPIC'];

const HEADER = '// Generated by zigbind. Do not edit.';

export type CollectOptions = {
  cFlags?: readonly string[];
};

/** Manifest-relative path of an external file inside the staging directory. */
function stagedPath(manifestDir: string, absolutePath: string): string {
  return relative(manifestDir, absolutePath)
    .split(sep)
    .map((s) => (s === '..' ? '__' : s))
    .join('/');
}

type Module = {
  path: string;
  label: string;
  code: string;
  signatures: SignatureModel[];
};

/**
 * One module per embedded fragment and per distinct Zig file, in scan order.
 * A file included by several blocks is one module carrying all their signatures.
 */
function modulesOf(scan: ScanResult): Module[] {
  const modules: Module[] = [];
  const byPath = new Map<string, Module>();
  let fragments = 0;

  const addFile = (path: string, label: string, code: string, signatures: readonly SignatureModel[]) => {
    const prev = byPath.get(path);
    if (prev) {
      prev.signatures.push(...signatures);
      return;
    }
    const m: Module = { path, label, code, signatures: [...signatures] };
    byPath.set(path, m);
    modules.push(m);
  };

  for (const block of scan.blocks) {
    const sigs = block.declarations.signatures;
    if (block.source.kind === 'embedded') {
      modules.push({
        path: `fragment_${fragments++}.zig`,
        label: `${block.file}:${block.line}`,
        code: externStructs(block.source.code),
        signatures: [...sigs],
      });
    } else {
      addFile(stagedPath(scan.manifestDir, block.source.absolutePath), block.source.path, block.source.code, sigs);
    }
  }
  for (const file of scan.standaloneZig) {
    addFile(stagedPath(scan.manifestDir, file.absolutePath), file.path, file.code, []);
  }
  return modules;
}

function entrySource(modules: readonly Module[]): string {
  const imports = modules.map((m) => `    _ = @import(${JSON.stringify(m.path)});`);
  return [HEADER, '', 'comptime {', ...imports, '}', ''].join('\n');
}

function zigStringList(items: readonly string[]): string {
  return `&.{ ${items.map((s) => JSON.stringify(s)).join(', ')} }`;
}

/** `build.zig` for modular-build: a PIC static library on the baseline CPU. */
export function renderBuildDescription(auxiliarySources: readonly string[], cFlags: readonly string[]): string {
  const flags = zigStringList([...BASE_C_FLAGS, ...cFlags]);
  const cSources = auxiliarySources.map(
    (p) => `    lib.addCSourceFile(.{ .file = .{ .path = ${JSON.stringify(p)} }, .flags = ${flags} });`,
  );
  return [
    HEADER,
    'const std = @import("std");',
    '',
    'pub fn build(b: *std.Build) void {',
    '    var default_target: std.zig.CrossTarget = .{};',
    '    default_target.cpu_model = .baseline;',
    '    const target = b.standardTargetOptions(.{ .default_target = default_target });',
    '    const optimize = b.standardOptimizeOption(.{});',
    '',
    '    const lib = b.addStaticLibrary(.{',
    `        .name = "${LIBRARY_NAME}",`,
    `        .root_source_file = .{ .path = "${ENTRY_FILE}" },`,
    '        .target = target,',
    '        .optimize = optimize,',
    '    });',
    '    lib.linkLibC();',
    '    lib.force_pic = true;',
    ...cSources,
    '    b.installArtifact(lib);',
    '}',
    '',
  ].join('\n');
}

function mergedUnit(scan: ScanResult, modules: readonly Module[]): CompilationUnit {
  const parts: ZigPart[] = modules.map((m) => ({ label: m.label, code: m.code }));
  return {
    name: 'generated_zigbind',
    role: 'merged',
    files: [{ path: MERGED_FILE, contents: mergeFragments(parts) }],
    signatures: modules.flatMap((m) => m.signatures),
    auxiliarySources: [...scan.auxiliarySources],
  };
}

function modularUnits(scan: ScanResult, modules: readonly Module[], build: boolean, cFlags: readonly string[]) {
  const units: CompilationUnit[] = modules.map((m) => ({
    name: m.path.replace(/\.zig$/, ''),
    role: 'module',
    files: [{ path: m.path, contents: m.code }],
    signatures: m.signatures,
    auxiliarySources: [],
  }));

  const entry: CompilationUnit = {
    name: 'zigbind_main',
    role: 'entry',
    files: [{ path: ENTRY_FILE, contents: entrySource(modules) }],
    signatures: [],
    auxiliarySources: [...scan.auxiliarySources],
  };
  if (build) {
    const description = renderBuildDescription(scan.auxiliarySources, cFlags);
    entry.files.push({ path: BUILD_FILE, contents: description });
    entry.buildDescription = description;
  }
  units.push(entry);
  return units;
}

/** Groups a scan into compilation units for `mode`. An empty scan gives no units. */
export function collectUnits(scan: ScanResult, mode: CompilationMode, options: CollectOptions = {}): CompilationUnit[] {
  const modules = modulesOf(scan);
  if (modules.length === 0 && scan.auxiliarySources.length === 0) return [];

  const units =
    mode === 'merged'
      ? [mergedUnit(scan, modules)]
      : modularUnits(scan, modules, mode === 'modular-build', options.cFlags ?? []);

  traceInfo('scan.units', { mode, units: units.map((u) => u.name) });
  return units;
}

/** Every staged file across `units`, sorted by path. */
export function unitFiles(units: readonly CompilationUnit[]) {
  return units
    .flatMap((u) => u.files)
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
