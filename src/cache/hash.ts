import crypto from 'node:crypto';
import { readFileSync } from 'node:fs';

import type { CompilerInfo } from '../compiler/compilerTypes.js';
import type { UnitFile } from '../scanner/scannerTypes.js';

export type HashInput = {
  files: readonly UnitFile[];
  /** Absolute paths; their contents are hashed. */
  auxiliarySources: readonly string[];
  mode: string;
  target: string;
  cpu: string;
  optimize: string;
  cFlags: readonly string[];
  compiler: CompilerInfo;
};

/** SHA-256 over everything that can change the compiled library. */
export function computeBuildHash(input: HashInput): string {
  const hash = crypto.createHash('sha256');
  const files = [...input.files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  for (const f of files) {
    hash.update(`file:${f.path}\0`);
    hash.update(f.contents);
    hash.update('\0');
  }
  for (const p of [...input.auxiliarySources].sort()) {
    hash.update(`c:${p}\0`);
    hash.update(readFileSync(p));
    hash.update('\0');
  }
  hash.update(
    JSON.stringify({
      mode: input.mode,
      target: input.target,
      cpu: input.cpu,
      optimize: input.optimize,
      cFlags: input.cFlags,
      compiler: input.compiler.path,
      version: input.compiler.version,
    }),
  );

  return hash.digest('hex');
}
