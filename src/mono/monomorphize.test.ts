import { describe, it, expect } from 'vitest';

import { MonomorphizationError } from '../errors.js';
import type { SignatureModel } from '../model/signatureTypes.js';
import { generic, scalar, slice, wrapped } from '../model/typeDescriptor.js';
import { parseSignatures } from '../parser/index.js';
import { expandSignature, mangledName, monomorphize, substitute } from './monomorphize.js';

const sum: SignatureModel = {
  name: 'sum',
  params: [{ name: 'data', type: slice(generic('T')) }],
  returnType: generic('T'),
  generics: [{ name: 'T', bounds: [] }],
  isAsync: false,
  monomorphizeTypes: [
    { text: 'i32', type: scalar('i32') },
    { text: 'f64', type: scalar('f64') },
    { text: 'std::ffi::c_int', type: scalar('std::ffi::c_int') },
    { text: '*constu8', type: scalar('*const u8') },
  ],
};

describe('monomorphization', () => {
  it('binds the type parameter everywhere and mangles the name', () => {
    const i32 = monomorphize(sum, 'i32');
    expect(i32.name).toBe('sum_i32');
    expect(i32.params).toEqual([{ name: 'data', type: { kind: 'slice', elem: scalar('i32'), mutable: false } }]);
    expect(i32.returnType).toEqual(scalar('i32'));
    expect(i32.generics).toEqual([]);
    expect(i32.instantiatedFrom).toEqual({ name: 'sum', concreteType: 'i32' });

    expect(monomorphize(sum, 'f64').name).toBe('sum_f64');
  });

  it('is deterministic', () => {
    expect(monomorphize(sum, 'f64')).toEqual(monomorphize(sum, 'f64'));
    expect(monomorphize(sum, ' f64 ')).toEqual(monomorphize(sum, 'f64'));
  });

  it('returns untouched subtrees unchanged', () => {
    const bytes = slice(scalar('u8'));
    expect(substitute(bytes, 'T', scalar('i32'))).toBe(bytes);
    expect(substitute(wrapped('optional', generic('T')), 'T', scalar('u16'))).toEqual(
      wrapped('optional', scalar('u16')),
    );
  });

  it('sanitizes path separators', () => {
    expect(monomorphize(sum, 'std::ffi::c_int').name).toBe('sum_std_ffi_c_int');
    expect(mangledName('sum', 'std :: ffi :: c_int')).toBe('sum_std_ffi_c_int');
  });

  it('rejects types that do not produce an identifier', () => {
    expect(() => monomorphize(sum, '*const u8')).toThrow(
      'cannot derive a symbol name for `sum` over `*constu8`: `sum_*constu8` is not an identifier',
    );
  });

  it('rejects types outside the list and non-generic signatures', () => {
    expect(() => monomorphize(sum, 'u64')).toThrow(
      '`u64` is not in the #[monomorphize] list of `sum` (i32, f64, std::ffi::c_int, *constu8)',
    );
    const plain: SignatureModel = { ...sum, name: 'plain', generics: [], monomorphizeTypes: [] };
    expect(() => monomorphize(plain, 'i32')).toThrow(MonomorphizationError);
  });

  it('substitutes inside the low-level return type', () => {
    const [parsed] = parseSignatures('#[zigbind(strategy = "dual", c_ret = "T")]\n#[monomorphize(u16)]\nfn id<T>(v: T) -> T;');
    const [id] = expandSignature(parsed);
    expect(id.name).toBe('id_u16');
    expect(id.bindingConfig?.lowLevelReturnType).toEqual(scalar('u16'));
  });

  it('expands declarations into concrete signatures', () => {
    const [parsed] = parseSignatures('#[monomorphize(i32, u64)]\nfn sum<T>(data: &[T]) -> T;');
    expect(expandSignature(parsed).map((s) => s.name)).toEqual(['sum_i32', 'sum_u64']);

    const [plain] = parseSignatures('fn add(a: i32, b: i32) -> i32;');
    expect(expandSignature(plain)).toEqual([plain]);

    const [unbound] = parseSignatures('fn first<T>(v: &[T]) -> T;');
    expect(() => expandSignature(unbound)).toThrow('generic `first` needs a #[monomorphize(...)] list to be bound');
  });
});
