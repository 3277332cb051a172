import { execFileSync } from 'node:child_process';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { CompilerFailedError } from '../errors.js';
import type { CompilerInfo } from './compilerTypes.js';

/** Builds a one-function object file to prove the compiler works. */
export function sanityCheckZig(compiler: CompilerInfo): void {
  const dir = mkdtempSync(join(tmpdir(), 'zigbind-'));
  const source = join(dir, 'sanity.zig');
  writeFileSync(source, 'export fn zigbind_sanity() i32 {\n    return 0;\n}\n');

  try {
    execFileSync(compiler.path, ['build-obj', source, `-femit-bin=${join(dir, 'sanity.o')}`], {
      stdio: 'ignore',
    });
  } catch {
    throw new CompilerFailedError(`Zig compiler failed sanity check: ${compiler.path}`, [], null);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
