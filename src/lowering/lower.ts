import { LoweringError } from '../errors.js';
import type { SignatureModel } from '../model/signatureTypes.js';
import { containsGeneric, isUnit, renderType, type TypeDescriptor } from '../model/typeDescriptor.js';
import { hasFixedLayout, type LayoutRegistry } from './layouts.js';
import { isPointerScalar, zigType } from './zigTypes.js';

/** One parameter of the raw foreign import. */
export type LoweredSlot = {
  name: string;
  /** Rust type in the `extern "C"` block. */
  rust: string;
  /** Zig type the export is expected to take. */
  zig: string;
};

export type ParamShape =
  | 'direct'
  | 'ptr-len'
  | 'array-ptr'
  | 'ref-ptr'
  | 'nullable-ptr'
  | 'nullable-ptr-len'
  | 'present-value';

/** How one high-level parameter crosses the boundary. */
export type ParamRecipe = {
  shape: ParamShape;
  name: string;
  type: TypeDescriptor;
  /** Statements emitted before the foreign call. */
  prelude: string[];
  /** Argument expressions, one per lowered slot. */
  encode: string[];
  /** Zig expression that rebuilds the value on the callee side. */
  calleeView: string;
};

export type ReturnRecipe =
  | { kind: 'void' }
  | { kind: 'direct'; rust: string; zig: string }
  | { kind: 'out-param'; valueRust: string; slot: LoweredSlot };

export type LowerContext = {
  /** Parameter name the slots are derived from. */
  name: string;
  layouts: LayoutRegistry;
};

export type LoweredSignature = {
  name: string;
  params: ParamRecipe[];
  ret: ReturnRecipe;
  /** Every slot of the raw import in call order, `ret_out` last. */
  slots: LoweredSlot[];
  /** Rust return type of the raw import; `null` for unit. */
  foreignReturn: string | null;
  zigReturn: string;
};

export const RET_OUT = 'ret_out';

const REJECTED_SCALARS: Record<string, string> = {
  char: '`char` has no C equivalent; pass it as u32',
  str: 'bare `str` is unsized; borrow it as `&str`',
  '()': 'unit is not a value',
};

function fail(ctx: LowerContext, type: TypeDescriptor, why: string): never {
  throw new LoweringError(`cannot lower \`${ctx.name}: ${renderType(type)}\`: ${why}`);
}

function scalarName(type: TypeDescriptor, ctx: LowerContext): string {
  if (type.kind !== 'scalar') return fail(ctx, type, 'expected a scalar');
  const rejected = REJECTED_SCALARS[type.name];
  if (rejected) fail(ctx, type, rejected);
  return type.name;
}

function recordName(type: TypeDescriptor, ctx: LowerContext): string {
  if (type.kind !== 'record') return fail(ctx, type, 'expected a record');
  if (!hasFixedLayout(ctx.layouts, type.name)) {
    fail(ctx, type, `type \`${type.name}\` has no declared C layout (add #[repr(C)] to its declaration in this block)`);
  }
  return type.name;
}

/** Element or pointee that can sit behind a raw pointer: scalar, C-layout record, or fixed array of those. */
function pointee(type: TypeDescriptor, ctx: LowerContext, allowArray: boolean): { rust: string; zig: string } {
  switch (type.kind) {
    case 'scalar': {
      const name = scalarName(type, ctx);
      return { rust: name, zig: zigType(name) };
    }
    case 'record': {
      const name = recordName(type, ctx);
      return { rust: name, zig: name };
    }
    case 'fixed-array': {
      if (!allowArray) return fail(ctx, type, 'nested arrays cannot cross the boundary');
      const elem = pointee(type.elem, ctx, false);
      return { rust: `[${elem.rust}; ${type.length}]`, zig: `[${type.length}]${elem.zig}` };
    }
    default:
      return fail(ctx, type, `\`${renderType(type)}\` cannot sit behind a pointer`);
  }
}

function lowerOptional(inner: TypeDescriptor, whole: TypeDescriptor, ctx: LowerContext): { lowered: LoweredSlot[]; recipe: ParamRecipe } {
  const x = ctx.name;
  const base = { name: x, type: whole };

  switch (inner.kind) {
    case 'wrapped': {
      if (inner.wrapper === 'optional') return fail(ctx, whole, 'nested optionals are not supported');
      const mutable = inner.wrapper === 'mutable-reference';
      const target = pointee(inner.inner, ctx, true);
      const rust = `*${mutable ? 'mut' : 'const'} ${target.rust}`;
      const nul = mutable ? 'std::ptr::null_mut()' : 'std::ptr::null()';
      return {
        lowered: [{ name: x, rust, zig: `?*${mutable ? '' : 'const '}${target.zig}` }],
        recipe: {
          ...base,
          shape: 'nullable-ptr',
          prelude: [],
          encode: [`${x}.map_or(${nul}, |v| v as ${rust})`],
          calleeView: x,
        },
      };
    }
    case 'record':
    case 'fixed-array': {
      const target = pointee(inner, ctx, true);
      const rust = `*const ${target.rust}`;
      return {
        lowered: [{ name: x, rust, zig: `?*const ${target.zig}` }],
        recipe: {
          ...base,
          shape: 'nullable-ptr',
          prelude: [],
          encode: [`${x}.as_ref().map_or(std::ptr::null(), |v| v as ${rust})`],
          calleeView: `if (${x}) |p| p.* else null`,
        },
      };
    }
    case 'slice':
    case 'text': {
      const elem = inner.kind === 'text' ? { rust: 'u8', zig: 'u8' } : pointee(inner.elem, ctx, false);
      const mutable = inner.mutable;
      const ptr = `${x}_ptr`;
      const len = `${x}_len`;
      const prelude = mutable
        ? `let (${ptr}, ${len}) = match ${x} { Some(v) => (v.as_mut_ptr(), v.len()), None => (std::ptr::null_mut(), 0) };`
        : `let (${ptr}, ${len}) = match ${x}.as_deref() { Some(v) => (v.as_ptr(), v.len()), None => (std::ptr::null(), 0) };`;
      return {
        lowered: [
          { name: ptr, rust: `*${mutable ? 'mut' : 'const'} ${elem.rust}`, zig: `?[*]${mutable ? '' : 'const '}${elem.zig}` },
          { name: len, rust: 'usize', zig: 'usize' },
        ],
        recipe: {
          ...base,
          shape: 'nullable-ptr-len',
          prelude: [prelude],
          encode: [ptr, len],
          calleeView: `if (${ptr}) |p| p[0..${len}] else null`,
        },
      };
    }
    case 'scalar': {
      const name = scalarName(inner, ctx);
      const fallback = isPointerScalar(name)
        ? `${x}.unwrap_or(std::ptr::${name.startsWith('*mut') ? 'null_mut' : 'null'}())`
        : `${x}.unwrap_or_default()`;
      return {
        lowered: [
          { name: `${x}_present`, rust: 'bool', zig: 'bool' },
          { name: `${x}_value`, rust: name, zig: zigType(name) },
        ],
        recipe: {
          ...base,
          shape: 'present-value',
          prelude: [],
          encode: [`${x}.is_some()`, fallback],
          calleeView: `if (${x}_present) ${x}_value else null`,
        },
      };
    }
    default:
      return fail(ctx, whole, `\`${renderType(inner)}\` cannot be optional`);
  }
}

/**
 * Lowers one high-level parameter type to C-compatible slots plus the
 * recipe that encodes it on the host side.
 */
export function lower(type: TypeDescriptor, ctx: LowerContext): { lowered: LoweredSlot[]; recipe: ParamRecipe } {
  if (containsGeneric(type)) {
    fail(ctx, type, 'generic parameters must be monomorphized before lowering');
  }
  const x = ctx.name;
  const base = { name: x, type };

  switch (type.kind) {
    case 'scalar': {
      const name = scalarName(type, ctx);
      return {
        lowered: [{ name: x, rust: name, zig: zigType(name) }],
        recipe: { ...base, shape: 'direct', prelude: [], encode: [x], calleeView: x },
      };
    }
    case 'record': {
      const name = recordName(type, ctx);
      return {
        lowered: [{ name: x, rust: name, zig: name }],
        recipe: { ...base, shape: 'direct', prelude: [], encode: [x], calleeView: x },
      };
    }
    case 'slice':
    case 'text': {
      const elem = type.kind === 'text' ? { rust: 'u8', zig: 'u8' } : pointee(type.elem, ctx, false);
      const mutable = type.mutable;
      return {
        lowered: [
          { name: `${x}_ptr`, rust: `*${mutable ? 'mut' : 'const'} ${elem.rust}`, zig: `[*]${mutable ? '' : 'const '}${elem.zig}` },
          { name: `${x}_len`, rust: 'usize', zig: 'usize' },
        ],
        recipe: {
          ...base,
          shape: 'ptr-len',
          prelude: [],
          encode: [mutable ? `${x}.as_mut_ptr()` : `${x}.as_ptr()`, `${x}.len()`],
          calleeView: `${x}_ptr[0..${x}_len]`,
        },
      };
    }
    case 'fixed-array': {
      const target = pointee(type, ctx, true);
      const rust = `*const ${target.rust}`;
      return {
        lowered: [{ name: x, rust, zig: `*const ${target.zig}` }],
        recipe: { ...base, shape: 'array-ptr', prelude: [], encode: [`&${x} as ${rust}`], calleeView: `${x}.*` },
      };
    }
    case 'wrapped': {
      if (type.wrapper === 'optional') return lowerOptional(type.inner, type, ctx);
      const mutable = type.wrapper === 'mutable-reference';
      const target = pointee(type.inner, ctx, true);
      const rust = `*${mutable ? 'mut' : 'const'} ${target.rust}`;
      return {
        lowered: [{ name: x, rust, zig: `*${mutable ? '' : 'const '}${target.zig}` }],
        recipe: { ...base, shape: 'ref-ptr', prelude: [], encode: [`${x} as ${rust}`], calleeView: `${x}.*` },
      };
    }
    case 'generic':
      return fail(ctx, type, 'generic parameters must be monomorphized before lowering');
  }
}

/** Return-position lowering: values pass through, `Option<T>` goes through an out-parameter. */
export function lowerReturn(type: TypeDescriptor, layouts: LayoutRegistry): ReturnRecipe {
  const ctx: LowerContext = { name: 'return', layouts };
  if (containsGeneric(type)) {
    fail(ctx, type, 'generic parameters must be monomorphized before lowering');
  }
  if (isUnit(type)) return { kind: 'void' };

  if (type.kind === 'scalar') {
    const name = scalarName(type, ctx);
    return { kind: 'direct', rust: name, zig: zigType(name) };
  }
  if (type.kind === 'record') {
    const name = recordName(type, ctx);
    return { kind: 'direct', rust: name, zig: name };
  }
  if (type.kind === 'wrapped' && type.wrapper === 'optional') {
    const inner = type.inner;
    if (inner.kind === 'scalar' || inner.kind === 'record') {
      const value = pointee(inner, ctx, false);
      return {
        kind: 'out-param',
        valueRust: value.rust,
        slot: { name: RET_OUT, rust: `*mut ${value.rust}`, zig: `*${value.zig}` },
      };
    }
  }
  return fail(
    ctx,
    type,
    'only scalars, C-layout records and Option of either can be returned across the boundary',
  );
}

/** Lowers a concrete signature; slot names are checked for collisions. */
export function lowerSignature(sig: SignatureModel, layouts: LayoutRegistry): LoweredSignature {
  const params: ParamRecipe[] = [];
  const slots: LoweredSlot[] = [];
  for (const p of sig.params) {
    const { lowered, recipe } = lower(p.type, { name: p.name, layouts });
    params.push(recipe);
    slots.push(...lowered);
  }

  const ret = lowerReturn(sig.returnType, layouts);
  if (ret.kind === 'out-param') slots.push(ret.slot);

  const seen = new Set<string>();
  for (const s of slots) {
    if (seen.has(s.name)) {
      throw new LoweringError(`\`${sig.name}\`: lowered parameter \`${s.name}\` collides with another parameter`);
    }
    seen.add(s.name);
  }

  return {
    name: sig.name,
    params,
    ret,
    slots,
    foreignReturn: ret.kind === 'void' ? null : ret.kind === 'direct' ? ret.rust : 'bool',
    zigReturn: ret.kind === 'void' ? 'void' : ret.kind === 'direct' ? ret.zig : 'bool',
  };
}

/** `export fn name(a: T, ...) R` as the Zig side is expected to declare it. */
export function expectedZigSignature(lowered: Pick<LoweredSignature, 'name' | 'slots' | 'zigReturn'>): string {
  const params = lowered.slots.map((s) => `${s.name}: ${s.zig}`).join(', ');
  return `export fn ${lowered.name}(${params}) ${lowered.zigReturn}`;
}
