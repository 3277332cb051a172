import { TargetUnmappedError } from '../errors.js';

/** Rust target triple -> Zig `-target` value. */
const TARGETS: ReadonlyMap<string, string> = new Map([
  ['x86_64-unknown-linux-gnu', 'x86_64-linux-gnu'],
  ['x86_64-unknown-linux-musl', 'x86_64-linux-musl'],
  ['i686-unknown-linux-gnu', 'x86-linux-gnu'],
  ['aarch64-unknown-linux-gnu', 'aarch64-linux-gnu'],
  ['aarch64-unknown-linux-musl', 'aarch64-linux-musl'],
  ['armv7-unknown-linux-gnueabihf', 'arm-linux-gnueabihf'],
  ['riscv64gc-unknown-linux-gnu', 'riscv64-linux-gnu'],
  ['x86_64-apple-darwin', 'x86_64-macos'],
  ['aarch64-apple-darwin', 'aarch64-macos'],
  ['x86_64-pc-windows-msvc', 'x86_64-windows-msvc'],
  ['x86_64-pc-windows-gnu', 'x86_64-windows-gnu'],
  ['i686-pc-windows-msvc', 'x86-windows-msvc'],
  ['aarch64-pc-windows-msvc', 'aarch64-windows-msvc'],
  ['wasm32-unknown-unknown', 'wasm32-freestanding'],
  ['wasm64-unknown-unknown', 'wasm64-freestanding'],
  ['wasm32-wasi', 'wasm32-wasi'],
  ['wasm32-wasip1', 'wasm32-wasi'],
]);

export const KNOWN_TRIPLES: readonly string[] = [...TARGETS.keys()];

export function isNativeTarget(triple: string | undefined): boolean {
  return triple === undefined || triple === '' || triple === 'native';
}

/**
 * Zig target for a Rust triple. `undefined` means "build for the host"
 * (no `-target` flag).
 */
export function mapTargetTriple(triple: string | undefined): string | undefined {
  if (triple === undefined || isNativeTarget(triple)) return undefined;
  const zig = TARGETS.get(triple);
  if (zig === undefined) throw new TargetUnmappedError(triple, KNOWN_TRIPLES);
  return zig;
}

export function isWasmTarget(triple: string | undefined): boolean {
  return triple !== undefined && triple.startsWith('wasm');
}

export function isWasm64Target(triple: string | undefined): boolean {
  return triple !== undefined && triple.startsWith('wasm64');
}

export function listTargets(): Array<{ rust: string; zig: string }> {
  return [...TARGETS].map(([rust, zig]) => ({ rust, zig }));
}
