const C_ALIASES: Record<string, string> = {
  c_void: 'anyopaque',
  c_float: 'f32',
  c_double: 'f64',
  c_schar: 'i8',
  c_uchar: 'u8',
};

function lastSegment(path: string): string {
  const i = path.lastIndexOf('::');
  return i === -1 ? path : path.slice(i + 2);
}

/** Zig spelling of a Rust scalar or record type. */
export function zigType(rust: string): string {
  if (rust === '()') return 'void';

  const ptr = rust.match(/^\*(const|mut)\s+(.+)$/);
  if (ptr) {
    const [, kind, inner] = ptr;
    const pointee = zigType(inner.trim());
    if (pointee === 'anyopaque') return kind === 'const' ? '?*const anyopaque' : '?*anyopaque';
    return kind === 'const' ? `[*c]const ${pointee}` : `[*c]${pointee}`;
  }

  const name = lastSegment(rust);
  if (name.startsWith('c_')) return C_ALIASES[name] ?? name;
  return name;
}

export const RUST_INT_BITS: Record<string, number> = {
  i8: 8, u8: 8, i16: 16, u16: 16, i32: 32, u32: 32, i64: 64, u64: 64,
  i128: 128, u128: 128,
};

export function isPointerScalar(rust: string): boolean {
  return rust.startsWith('*');
}

export function isNumericScalar(rust: string): boolean {
  return (
    rust in RUST_INT_BITS ||
    rust === 'isize' ||
    rust === 'usize' ||
    rust === 'f32' ||
    rust === 'f64' ||
    (lastSegment(rust).startsWith('c_') && lastSegment(rust) !== 'c_void')
  );
}
