import { describe, it, expect } from 'vitest';
import { chmodSync, existsSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runCli, type CliIo } from './runCli.js';

const TWICE_RS = 'zigbind! {\n    export fn twice(x: i32) i32 { return x * 2; }\n    ---\n    fn twice(x: i32) -> i32;\n}\n';

function makeCrate(libRs?: string) {
  const crate = mkdtempSync(join(tmpdir(), 'zigbind-cli-'));
  mkdirSync(join(crate, 'src'));
  if (libRs !== undefined) writeFileSync(join(crate, 'src', 'lib.rs'), libRs);
  return crate;
}

/** A stand-in `zig` that reports a version and creates whatever it is asked to emit. */
function fakeZig(dir: string) {
  const p = join(dir, 'fake-zig');
  writeFileSync(
    p,
    [
      '#!/bin/sh',
      'if [ "$1" = version ]; then echo 0.11.0; exit 0; fi',
      'for a in "$@"; do',
      '  case "$a" in',
      '    -femit-bin=*) : > "${a#-femit-bin=}" ;;',
      '  esac',
      'done',
      '',
    ].join('\n'),
  );
  chmodSync(p, 0o755);
  return p;
}

function capture(cwd: string, env: Record<string, string | undefined> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = { out: (l) => out.push(l), err: (l) => err.push(l), env, cwd };
  return { io, out, err };
}

describe('zigbind cli', () => {
  it('prints usage without a command and rejects unknown ones', async () => {
    const help = capture(tmpdir());
    expect(await runCli([], help.io)).toBe(0);
    expect(help.out[0]).toContain('zigbind expand <file.rs>');

    const bad = capture(tmpdir());
    expect(await runCli(['nope'], bad.io)).toBe(1);
    expect(bad.err).toEqual(['Unknown command: nope']);
  });

  it('lists the target table', async () => {
    const { io, out } = capture(tmpdir());
    expect(await runCli(['targets'], io)).toBe(0);
    expect(out).toHaveLength(17);
    expect(out[0]).toMatch(/^x86_64-unknown-linux-gnu +x86_64-linux-gnu$/);
    expect(out).toContainEqual(expect.stringMatching(/^wasm32-unknown-unknown +wasm32-freestanding$/));
  });

  it('builds an empty tree without a compiler', async () => {
    const crate = makeCrate();
    const { io, out, err } = capture(crate);

    expect(await runCli(['build', 'src'], io)).toBe(0);
    expect(out).toEqual([`cargo:rerun-if-changed=${join(crate, 'src')}`]);
    expect(err).toEqual(['✓ 0 binding block(s) -> target/zigbind/zigbind_bindings.rs (nothing to compile)']);
  });

  it('compiles once and reuses the cached library', async () => {
    const crate = makeCrate(TWICE_RS);
    const zig = fakeZig(crate);
    const outDir = join(crate, 'target', 'zigbind');

    const first = capture(crate);
    expect(await runCli(['build', 'src', '--zig', zig], first.io)).toBe(0);
    expect(first.out).toEqual([
      `cargo:rustc-link-search=native=${outDir}`,
      'cargo:rustc-link-lib=static=zigbind',
      `cargo:rerun-if-changed=${join(crate, 'src')}`,
    ]);
    expect(first.err).toEqual(['✓ 1 binding block(s) -> target/zigbind/zigbind_bindings.rs (compiled)']);
    expect(existsSync(join(outDir, 'libzigbind.a'))).toBe(true);

    const second = capture(crate);
    expect(await runCli(['build', 'src', '--zig', zig], second.io)).toBe(0);
    expect(second.err).toEqual(['✓ 1 binding block(s) -> target/zigbind/zigbind_bindings.rs (cached)']);

    const status = capture(crate);
    expect(await runCli(['cache', 'status'], status.io)).toBe(0);
    expect(status.out[0]).toMatch(/^✓ Build [0-9a-f]{12} \(merged, native\)$/);
    expect(status.out[1]).toBe(`✓ Library: ${join(outDir, 'libzigbind.a')}`);
    expect(status.out).toHaveLength(5);

    const clean = capture(crate);
    expect(await runCli(['cache', 'clean', 'target/zigbind'], clean.io)).toBe(0);
    expect(clean.out).toEqual(['✓ Cache cleaned (3 path(s) removed)']);
    expect(existsSync(join(outDir, 'libzigbind.a'))).toBe(false);

    const again = capture(crate);
    await runCli(['cache', 'clean'], again.io);
    expect(again.out).toEqual(['✓ Cache already empty']);
  });

  it('lists compiler diagnostics when the build fails', async () => {
    const crate = makeCrate(TWICE_RS);
    const zig = join(crate, 'broken-zig');
    writeFileSync(
      zig,
      [
        '#!/bin/sh',
        'if [ "$1" = version ]; then echo 0.11.0; exit 0; fi',
        `echo "fragment_0.zig:2:1: error: use of undeclared identifier 'x'" >&2`,
        'exit 1',
        '',
      ].join('\n'),
    );
    chmodSync(zig, 0o755);
    const { io, out, err } = capture(crate);

    expect(await runCli(['build', 'src', '--zig', zig], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      '✗ CompilerFailedError: zig exited with 1',
      "fragment_0.zig:2:1 - error: use of undeclared identifier 'x'",
    ]);
  });

  it('reports an empty cache', async () => {
    const crate = makeCrate();
    const { io, out } = capture(crate);
    expect(await runCli(['cache', 'status', 'out'], io)).toBe(0);
    expect(out).toEqual([`✓ Cache empty (no ${join(crate, 'out', 'zigbind-cache.json')})`]);
  });

  it('validates flags and subcommands', async () => {
    const crate = makeCrate();
    const mode = capture(crate);
    expect(await runCli(['build', '--mode', 'split'], mode.io)).toBe(1);
    expect(mode.err).toEqual(['Invalid --mode (expected: merged|modular-import|modular-build)']);

    const cache = capture(crate);
    expect(await runCli(['cache', 'purge'], cache.io)).toBe(1);
    expect(cache.err).toEqual(['Usage: zigbind cache <status|clean> [outDir]']);
  });

  it('expands the blocks of one host file', async () => {
    const crate = makeCrate(TWICE_RS);
    const { io, out } = capture(crate);

    expect(await runCli(['expand', 'src/lib.rs'], io)).toBe(0);
    expect(out).toEqual([
      [
        '// Generated by zigbind. Do not edit.',
        '',
        '// src/lib.rs:1',
        'pub mod src_lib_0 {',
        '    mod ffi {',
        '        #[allow(unused_imports)]',
        '        use super::*;',
        '',
        '        extern "C" {',
        '            pub fn twice(x: i32) -> i32;',
        '        }',
        '    }',
        '',
        '    pub fn twice(x: i32) -> i32 {',
        '        unsafe { ffi::twice(x) }',
        '    }',
        '}',
      ].join('\n'),
    ]);
  });

  it('turns binding errors into a failure line', async () => {
    const crate = makeCrate('zigbind! {\n    ---\n    fn bad(c: char);\n}\n');
    const { io, err } = capture(crate);

    expect(await runCli(['expand', 'src/lib.rs'], io)).toBe(1);
    expect(err).toEqual([
      '✗ LoweringError: src/lib.rs:3:5: cannot lower `c: char`: `char` has no C equivalent; pass it as u32',
    ]);
  });

  it('diagnoses a working toolchain', async () => {
    const crate = makeCrate();
    const zig = fakeZig(crate);
    const { io, out } = capture(crate, { ZIG_PATH: zig });

    expect(await runCli(['doctor'], io)).toBe(0);
    expect(out).toEqual([
      [
        `✓ Host platform ${process.platform}/${process.arch}`,
        `✓ Zig compiler detected (0.11.0 at ${zig})`,
        '✓ Zig builds a sample object',
        '✓ Rust grammar loaded (tree-sitter-rust)',
        `✓ Output directory will be created at ${join(crate, 'target', 'zigbind')}`,
      ].join('\n'),
    ]);
  });

  it('fails the diagnosis without zig or with an unknown target', async () => {
    const crate = makeCrate();
    const { io, out } = capture(crate, { ZIG_PATH: '/nonexistent/zig', TARGET: 'sparc-unknown-none' });

    expect(await runCli(['doctor'], io)).toBe(1);
    const lines = out[0].split('\n');
    expect(lines[0]).toBe("✗ Zig compiler not found at '/nonexistent/zig'");
    expect(lines[2]).toBe("✗ No Zig target known for Rust target triple 'sparc-unknown-none'.");
  });
});
