import { GenerationError } from '../errors.js';
import type { LoweredSlot } from '../lowering/lower.js';
import { isIdentifier } from '../utils/identifiers.js';
import type { GeneratedSymbol } from './codegenTypes.js';

export type ZigExport = {
  name: string;
  params: { name: string; type: string }[];
  returnType: string;
};

/** One entry of the raw `extern "C"` block. */
export type ForeignDecl = {
  name: string;
  slots: LoweredSlot[];
  /** `null` for unit. */
  rust: string | null;
  zig: string;
};

const EXPORT_RE = /\bexport\s+fn\s+([A-Za-z_][A-Za-z0-9_]*)\s*\(([^)]*)\)\s*([^{;]*?)\s*\{/g;

const ZIG_SCALARS = new Set([
  'i8', 'u8', 'i16', 'u16', 'i32', 'u32', 'i64', 'u64', 'i128', 'u128',
  'f32', 'f64', 'bool', 'usize', 'isize',
]);

const ZIG_C_TYPES = new Set([
  'c_char', 'c_short', 'c_ushort', 'c_int', 'c_uint', 'c_long', 'c_ulong', 'c_longlong', 'c_ulonglong',
]);

function stripComments(code: string): string {
  return code.replace(/\/\/[^\n]*/g, '');
}

/** `export fn` declarations of a Zig source, keyed by name. */
export function readZigExports(code: string): Map<string, ZigExport> {
  const out = new Map<string, ZigExport>();
  for (const m of stripComments(code).matchAll(EXPORT_RE)) {
    const [, name, rawParams, rawRet] = m;
    const params = rawParams
      .split(',')
      .map((p) => p.trim())
      .filter(Boolean)
      .map((p) => {
        const colon = p.indexOf(':');
        return colon === -1
          ? { name: '', type: p }
          : { name: p.slice(0, colon).replace(/^(noalias|comptime)\s+/, '').trim(), type: p.slice(colon + 1).trim() };
      });
    const returnType = rawRet.replace(/callconv\s*\([^)]*\)/, '').trim() || 'void';
    out.set(name, { name, params, returnType });
  }
  return out;
}

/** Rust spelling of a Zig parameter or return type; `null` when there is none. */
export function zigToRust(zig: string): string | null {
  const t = zig.replace(/\s+/g, ' ').trim();
  if (t === 'void') return '()';
  if (ZIG_SCALARS.has(t)) return t;
  if (ZIG_C_TYPES.has(t)) return `std::ffi::${t}`;

  const ptr = t.match(/^\??(?:\[\*c?\]|\*)(const )?(.+)$/);
  if (ptr) {
    const [, isConst, pointee] = ptr;
    const kind = isConst ? 'const' : 'mut';
    if (pointee === 'anyopaque') return `*${kind} std::ffi::c_void`;
    const inner = zigToRust(pointee);
    return inner && inner !== '()' ? `*${kind} ${inner}` : null;
  }
  return isIdentifier(t) ? t : null;
}

/** Raw import for a foreign function only known from its Zig `export fn`. */
export function declFromZigExport(exp: ZigExport): ForeignDecl {
  const slots = exp.params.map((p, i) => {
    const rust = zigToRust(p.type);
    if (rust === null || rust === '()') {
      throw new GenerationError(`\`export fn ${exp.name}\`: parameter type \`${p.type}\` has no Rust equivalent`);
    }
    return { name: p.name && isIdentifier(p.name) ? p.name : `arg${i}`, rust, zig: p.type };
  });
  const ret = zigToRust(exp.returnType);
  if (ret === null) {
    throw new GenerationError(`\`export fn ${exp.name}\`: return type \`${exp.returnType}\` has no Rust equivalent`);
  }
  return { name: exp.name, slots, rust: ret === '()' ? null : ret, zig: exp.returnType };
}

export function renderZigSignature(decl: ForeignDecl): string {
  const params = decl.slots.map((s) => `${s.name}: ${s.zig}`).join(', ');
  return `export fn ${decl.name}(${params}) ${decl.zig}`;
}

export function renderForeignDecl(decl: ForeignDecl): string {
  const params = decl.slots.map((s) => `${s.name}: ${s.rust}`).join(', ');
  return `pub fn ${decl.name}(${params})${decl.rust === null ? '' : ` -> ${decl.rust}`};`;
}

function sameDecl(a: ForeignDecl, b: ForeignDecl): boolean {
  return renderForeignDecl(a) === renderForeignDecl(b);
}

/** Raw imports of one block, in first-use order. */
export class ForeignTable {
  private readonly decls = new Map<string, ForeignDecl>();

  add(decl: ForeignDecl): void {
    const prev = this.decls.get(decl.name);
    if (prev && !sameDecl(prev, decl)) {
      throw new GenerationError(
        `foreign function \`${decl.name}\` is used with two different signatures:\n` +
          `  ${renderForeignDecl(prev)}\n  ${renderForeignDecl(decl)}`,
      );
    }
    if (!prev) this.decls.set(decl.name, decl);
  }

  get size(): number {
    return this.decls.size;
  }

  entries(): ForeignDecl[] {
    return [...this.decls.values()];
  }

  symbols(): GeneratedSymbol[] {
    return this.entries().map((d) => ({
      name: d.name,
      level: 'foreign',
      params: d.slots.map((s) => ({ name: s.name, type: s.rust })),
      returnType: d.rust ?? '()',
      zigSignature: renderZigSignature(d),
    }));
  }
}

/** Foreign symbols whose `export fn` is absent from `zigSource`. */
export function missingExports(symbols: readonly GeneratedSymbol[], zigSource: string): GeneratedSymbol[] {
  const exported = readZigExports(zigSource);
  return symbols.filter((s) => s.level === 'foreign' && !exported.has(s.name));
}
