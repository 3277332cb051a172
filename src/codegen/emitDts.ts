import type { GeneratedSymbol } from './codegenTypes.js';

const NUMBER_TYPES = new Set(['i8', 'u8', 'i16', 'u16', 'i32', 'u32', 'f32', 'f64', 'bool']);
const BIGINT_TYPES = new Set(['i64', 'u64']);

/** TypeScript spelling of a lowered Rust type as seen through a wasm export. */
export function tsType(rust: string, wasm64: boolean): string {
  if (rust === '()') return 'void';
  const pointer = wasm64 ? 'bigint' : 'number';
  if (rust.startsWith('*')) return pointer;
  const sep = rust.lastIndexOf('::');
  const name = sep === -1 ? rust : rust.slice(sep + 2);
  if (NUMBER_TYPES.has(name)) return 'number';
  if (BIGINT_TYPES.has(name)) return 'bigint';
  if (name === 'c_longlong' || name === 'c_ulonglong') return 'bigint';
  if (name === 'usize' || name === 'isize' || name === 'c_long' || name === 'c_ulong') return pointer;
  if (name.startsWith('c_')) return 'number';
  // records travel by address
  return pointer;
}

/** `zigbind.d.ts` for the exports of a browser-class build. */
export function renderDts(symbols: readonly GeneratedSymbol[], wasm64: boolean): string {
  const seen = new Set<string>();
  const lines = [
    '// Generated by zigbind. Do not edit.',
    '',
    'export interface ZigbindExports {',
    '  readonly memory: WebAssembly.Memory;',
  ];
  for (const s of symbols) {
    if ((s.level !== 'foreign' && s.level !== 'low') || seen.has(s.name)) continue;
    seen.add(s.name);
    const params = s.params.map((p) => `${p.name}: ${tsType(p.type, wasm64)}`).join(', ');
    lines.push(`  ${s.name}(${params}): ${tsType(s.returnType, wasm64)};`);
  }
  lines.push('}', '');
  return lines.join('\n');
}
