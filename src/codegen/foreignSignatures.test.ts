import { describe, it, expect } from 'vitest';

import type { GeneratedSymbol } from './codegenTypes.js';
import { renderDts, tsType } from './emitDts.js';
import { ForeignTable, missingExports, readZigExports, zigToRust } from './foreignSignatures.js';

const ZIG = [
  'const std = @import("std");',
  '// export fn commented(a: i32) void {}',
  'export fn add(a: i32, b: i32) i32 { return a + b; }',
  'pub export fn scale(noalias data: [*]f32, n: usize) callconv(.C) void {',
  '    _ = data; _ = n;',
  '}',
].join('\n');

const sumSymbols: GeneratedSymbol[] = [
  { name: 'sum_u64', level: 'high', params: [{ name: 'data', type: '&[u64]' }], returnType: 'u64' },
  {
    name: 'sum_u64',
    level: 'foreign',
    params: [
      { name: 'data_ptr', type: '*const u64' },
      { name: 'data_len', type: 'usize' },
    ],
    returnType: 'u64',
    zigSignature: 'export fn sum_u64(data_ptr: [*]const u64, data_len: usize) u64',
  },
  { name: 'c_ready', level: 'low', params: [], returnType: 'bool' },
];

describe('Zig exports', () => {
  it('reads export fn declarations outside comments', () => {
    const exports = readZigExports(ZIG);
    expect([...exports.keys()]).toEqual(['add', 'scale']);
    expect(exports.get('scale')).toEqual({
      name: 'scale',
      params: [
        { name: 'data', type: '[*]f32' },
        { name: 'n', type: 'usize' },
      ],
      returnType: 'void',
    });
  });

  it('maps Zig types back to Rust', () => {
    expect(zigToRust('[*]const u8')).toBe('*const u8');
    expect(zigToRust('[*c]f32')).toBe('*mut f32');
    expect(zigToRust('?*anyopaque')).toBe('*mut std::ffi::c_void');
    expect(zigToRust('c_int')).toBe('std::ffi::c_int');
    expect(zigToRust('void')).toBe('()');
    expect(zigToRust('Point')).toBe('Point');
    expect(zigToRust('[]u8')).toBeNull();
    expect(zigToRust('!void')).toBeNull();
  });

  it('lists foreign symbols with no export', () => {
    expect(missingExports(sumSymbols, ZIG).map((s) => s.name)).toEqual(['sum_u64']);
    expect(missingExports(sumSymbols, 'export fn sum_u64(p: [*]const u64, n: usize) u64 { return 0; }')).toEqual([]);
  });

  it('rejects one foreign name with two signatures', () => {
    const table = new ForeignTable();
    table.add({ name: 'f', slots: [], rust: 'i32', zig: 'i32' });
    table.add({ name: 'f', slots: [], rust: 'i32', zig: 'i32' });
    expect(table.size).toBe(1);
    expect(() => table.add({ name: 'f', slots: [], rust: null, zig: 'void' })).toThrow(
      'foreign function `f` is used with two different signatures:\n  pub fn f() -> i32;\n  pub fn f();',
    );
  });
});

describe('TypeScript declarations', () => {
  it('maps 64-bit integers to bigint and pointers by address width', () => {
    expect(tsType('u64', false)).toBe('bigint');
    expect(tsType('usize', false)).toBe('number');
    expect(tsType('usize', true)).toBe('bigint');
    expect(tsType('*const u8', true)).toBe('bigint');
    expect(tsType('std::ffi::c_int', true)).toBe('number');
    expect(tsType('()', false)).toBe('void');
  });

  it('declares foreign and low-level exports once each', () => {
    expect(renderDts(sumSymbols, false)).toBe(
      [
        '// Generated by zigbind. Do not edit.',
        '',
        'export interface ZigbindExports {',
        '  readonly memory: WebAssembly.Memory;',
        '  sum_u64(data_ptr: number, data_len: number): bigint;',
        '  c_ready(): number;',
        '}',
        '',
      ].join('\n'),
    );
  });
});
