import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';

import { ScanError } from '../errors.js';
import { onWarning, type ZigbindWarning } from '../dx/warnings.js';
import {
  collectUnits,
  externStructs,
  extractInvocations,
  mergeFragments,
  moduleStem,
  scanSources,
  splitEmbedded,
} from './index.js';

const LIB_RS = [
  '// zigbind! { not a block }',
  'zigbind! {',
  '    const std = @import("std");',
  '    const Pair = struct { a: i32, b: i32 };',
  '    export fn add(a: i32, b: i32) i32 { return a + b; }',
  '    ---',
  '    fn add(a: i32, b: i32) -> i32;',
  '}',
  '',
  'zigbind_include!("src/kernels/math.zig", {',
  '    fn twice(x: i32) -> i32;',
  '});',
  '',
  'const NOTE: &str = "zigbind! { also not a block }";',
  '',
].join('\n');

function write(path: string, contents: string) {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, contents, 'utf8');
}

function makeCrate() {
  const crate = mkdtempSync(join(tmpdir(), 'zigbind-scan-'));
  const src = join(crate, 'src');
  write(join(src, 'lib.rs'), LIB_RS);
  write(join(src, 'kernels', 'math.zig'), 'const std = @import("std");\nexport fn twice(x: i32) i32 { return x * 2; }\n');
  write(join(src, 'extra.zig'), 'const std = @import("std");\npub const scale: i32 = 3;\n');
  write(join(src, 'helper.c'), 'int helper(void) { return 1; }\n');
  write(join(src, '.hidden', 'skip.rs'), 'zigbind! { export fn hidden() void {} }\n');
  write(join(src, 'target', 'gen.rs'), 'zigbind! { export fn generated() void {} }\n');
  return { crate, src };
}

describe('invocation extraction', () => {
  it('ignores mentions in comments and strings', () => {
    const { invocations } = extractInvocations(LIB_RS, 'lib.rs');
    expect(invocations.map((i) => [i.kind, i.line])).toEqual([
      ['embedded', 2],
      ['include', 10],
    ]);
  });

  it('reads the include path and declaration position', () => {
    const [, inc] = extractInvocations(LIB_RS, 'lib.rs').invocations;
    expect(inc).toEqual({
      kind: 'include',
      line: 10,
      path: 'src/kernels/math.zig',
      decls: '\n    fn twice(x: i32) -> i32;\n',
      declsLine: 10,
      declsColumn: 43,
    });
  });

  it('accepts path-qualified macro names', () => {
    const { invocations } = extractInvocations('zigbind::zigbind! { export fn f() void {} }\n', 'a.rs');
    expect(invocations).toEqual([
      { kind: 'embedded', line: 1, body: ' export fn f() void {} ', bodyLine: 1 },
    ]);
  });

  it('rejects a malformed include', () => {
    expect(() => extractInvocations('zigbind_include!({ fn f(); });\n', 'a.rs')).toThrow(
      'a.rs:1: zigbind_include! expects ("path/to/file.zig", { declarations })',
    );
  });

  it('splits an embedded body at the separator line', () => {
    expect(splitEmbedded('\n  export fn f() void {}\n  ---\n  fn f();\n')).toEqual({
      zig: '\n  export fn f() void {}',
      decls: '  fn f();\n',
      declsOffset: 3,
    });
    expect(splitEmbedded('export fn f() void {}')).toEqual({ zig: 'export fn f() void {}', decls: '', declsOffset: 0 });
  });
});

describe('zig normalisation', () => {
  it('gives plain structs C layout', () => {
    expect(externStructs('const A = struct { x: i32 };\nconst B = extern struct {};\nconst C = packed struct { y: u8 };')).toBe(
      'const A = extern struct { x: i32 };\nconst B = extern struct {};\nconst C = packed struct { y: u8 };',
    );
  });

  it('drops repeated top-level singletons, allocators included', () => {
    const merged = mergeFragments([
      { label: 'a', code: 'const std = @import("std");\nvar gpa = std.heap.GeneralPurposeAllocator(.{}){};\n' },
      {
        label: 'b',
        code: '\nconst std = @import("std");\nvar gpa = std.heap.GeneralPurposeAllocator(.{}){};\nconst Inner = struct {\n    const std = @import("std");\n};\n\n',
      },
    ]);
    expect(merged).toBe(
      [
        '// Generated by zigbind. Do not edit.',
        '',
        '// ---- a ----',
        'const std = @import("std");',
        'var gpa = std.heap.GeneralPurposeAllocator(.{}){};',
        '',
        '// ---- b ----',
        'const Inner = struct {',
        '    const std = @import("std");',
        '};',
        '',
      ].join('\n'),
    );
  });
});

describe('scanner', () => {
  const prevManifest = process.env.CARGO_MANIFEST_DIR;

  afterEach(() => {
    if (prevManifest == null) delete process.env.CARGO_MANIFEST_DIR;
    else process.env.CARGO_MANIFEST_DIR = prevManifest;
  });

  it('names modules after the host file', () => {
    expect(moduleStem('lib.rs')).toBe('lib');
    expect(moduleStem('math/mod.rs')).toBe('math_mod');
    expect(moduleStem('2d/Shapes.rs')).toBe('_2d_shapes');
  });

  it('reads blocks, standalone zig and c sources', () => {
    const { crate, src } = makeCrate();
    const scan = scanSources(src, { manifestDir: crate });

    expect(scan.root).toBe(resolve(src));
    expect(scan.hostFiles).toEqual([join(src, 'lib.rs')]);
    expect(scan.blocks.map((b) => [b.file, b.line, b.moduleName, b.rawModule, b.source.kind])).toEqual([
      ['lib.rs', 2, 'lib_0', 'ffi', 'embedded'],
      ['lib.rs', 10, 'lib_1', 'ffi_src_kernels_math', 'external'],
    ]);
    expect(scan.blocks[0].declarations.signatures[0].location).toEqual({ file: 'lib.rs', line: 7, column: 5 });
    expect(scan.blocks[1].declarations.signatures[0].location).toEqual({ file: 'lib.rs', line: 11, column: 5 });
    expect(scan.standaloneZig.map((f) => f.path)).toEqual(['src/extra.zig']);
    expect(scan.auxiliarySources).toEqual([join(src, 'helper.c')]);
  });

  it('resolves includes against CARGO_MANIFEST_DIR by default', () => {
    const { crate, src } = makeCrate();
    process.env.CARGO_MANIFEST_DIR = crate;
    const scan = scanSources(src);
    expect(scan.manifestDir).toBe(resolve(crate));
    const source = scan.blocks[1].source;
    expect(source.kind === 'external' ? source.absolutePath : null).toBe(join(crate, 'src', 'kernels', 'math.zig'));
  });

  it('fails on a missing include', () => {
    const crate = mkdtempSync(join(tmpdir(), 'zigbind-scan-'));
    write(join(crate, 'src', 'lib.rs'), 'zigbind_include!("zig/none.zig", { fn f(); });\n');
    expect(() => scanSources(join(crate, 'src'), { manifestDir: crate })).toThrow(ScanError);
    expect(() => scanSources(join(crate, 'src'), { manifestDir: crate })).toThrow(
      'lib.rs:1: included file `zig/none.zig` not found',
    );
  });

  it('warns when a host file only parses with recovery', () => {
    const crate = mkdtempSync(join(tmpdir(), 'zigbind-scan-'));
    write(join(crate, 'src', 'lib.rs'), 'fn broken( {\n');
    const seen: ZigbindWarning[] = [];
    const off = onWarning((w) => seen.push(w));
    try {
      scanSources(join(crate, 'src'), { manifestDir: crate });
    } finally {
      off();
    }
    expect(seen.map((w) => w.code)).toEqual(['SOURCE_PARSE_RECOVERED']);
  });

  it('gives no units for an empty tree', () => {
    const crate = mkdtempSync(join(tmpdir(), 'zigbind-scan-'));
    mkdirSync(join(crate, 'src'));
    const scan = scanSources(join(crate, 'src'), { manifestDir: crate });
    expect(scan.blocks).toEqual([]);
    expect(collectUnits(scan, 'merged')).toEqual([]);
    expect(collectUnits(scan, 'modular-build')).toEqual([]);
  });
});

describe('compilation units', () => {
  it('merges every fragment into one file', () => {
    const { crate, src } = makeCrate();
    const units = collectUnits(scanSources(src, { manifestDir: crate }), 'merged');

    expect(units).toHaveLength(1);
    const [unit] = units;
    expect(unit.role).toBe('merged');
    expect(unit.signatures.map((s) => s.name)).toEqual(['add', 'twice']);
    expect(unit.auxiliarySources).toEqual([join(src, 'helper.c')]);
    expect(unit.files).toEqual([
      {
        path: 'generated_zigbind.zig',
        contents: [
          '// Generated by zigbind. Do not edit.',
          '',
          '// ---- lib.rs:2 ----',
          '    const std = @import("std");',
          '    const Pair = extern struct { a: i32, b: i32 };',
          '    export fn add(a: i32, b: i32) i32 { return a + b; }',
          '',
          '// ---- src/kernels/math.zig ----',
          'export fn twice(x: i32) i32 { return x * 2; }',
          '',
          '// ---- src/extra.zig ----',
          'pub const scale: i32 = 3;',
          '',
        ].join('\n'),
      },
    ]);
  });

  it('keeps one module per file with an importing entry', () => {
    const { crate, src } = makeCrate();
    const units = collectUnits(scanSources(src, { manifestDir: crate }), 'modular-import');

    expect(units.map((u) => [u.name, u.role, u.files.map((f) => f.path)])).toEqual([
      ['fragment_0', 'module', ['fragment_0.zig']],
      ['src/kernels/math', 'module', ['src/kernels/math.zig']],
      ['src/extra', 'module', ['src/extra.zig']],
      ['zigbind_main', 'entry', ['zigbind_main.zig']],
    ]);
    expect(units[0].files[0].contents).toContain('const Pair = extern struct { a: i32, b: i32 };');
    expect(units[1].signatures.map((s) => s.name)).toEqual(['twice']);
    expect(units[3].files[0].contents).toBe(
      [
        '// Generated by zigbind. Do not edit.',
        '',
        'comptime {',
        '    _ = @import("fragment_0.zig");',
        '    _ = @import("src/kernels/math.zig");',
        '    _ = @import("src/extra.zig");',
        '}',
        '',
      ].join('\n'),
    );
    expect(units[3].buildDescription).toBeUndefined();
  });

  it('describes a baseline build for modular-build', () => {
    const { crate, src } = makeCrate();
    const units = collectUnits(scanSources(src, { manifestDir: crate }), 'modular-build', { cFlags: ['-O2'] });
    const entry = units[units.length - 1];

    expect(entry.files.map((f) => f.path)).toEqual(['zigbind_main.zig', 'build.zig']);
    const build = entry.buildDescription ?? '';
    expect(build).toContain('    default_target.cpu_model = .baseline;\n');
    expect(build).toContain('        .name = "zigbind",\n');
    expect(build).toContain(
      `    lib.addCSourceFile(.{ .file = .{ .path = ${JSON.stringify(join(src, 'helper.c'))} }, .flags = &.{ "-std=c99", "-fPIC", "-O2" } });\n`,
    );
  });
});
