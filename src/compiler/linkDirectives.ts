import { dirname } from 'node:path';

import { LIBRARY_NAME } from '../scanner/collectUnits.js';

export type DirectiveInput = {
  /** `null` when nothing was built. */
  artifactPath: string | null;
  /** Paths cargo should watch. */
  watched: readonly string[];
  /** Symbols to keep exported on `wasm*` targets. */
  wasmExports?: readonly string[];
};

/** Linker directives without the `cargo:` prefix. */
export function linkDirectives(input: DirectiveInput): string[] {
  const out: string[] = [];
  if (input.artifactPath) {
    out.push(`rustc-link-search=native=${dirname(input.artifactPath)}`);
    out.push(`rustc-link-lib=static=${LIBRARY_NAME}`);
  }
  for (const p of input.watched) out.push(`rerun-if-changed=${p}`);
  if (input.artifactPath) {
    for (const symbol of input.wasmExports ?? []) out.push(`rustc-link-arg=--export=${symbol}`);
  }
  return out;
}

export function formatDirectives(directives: readonly string[]): string {
  return directives.map((d) => `cargo:${d}\n`).join('');
}
