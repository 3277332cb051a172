import { join } from 'node:path';

import { BASE_C_FLAGS, LIBRARY_NAME } from '../scanner/collectUnits.js';
import type { CompileRequest } from './compilerTypes.js';
import type { PlatformInfo } from './detectPlatform.js';
import { getStaticLibName } from './outputNaming.js';

export type CompileCommand = {
  args: string[];
  cwd: string;
  artifactPath: string;
};

function cSourceArgs(request: CompileRequest): string[] {
  if (!request.auxiliarySources.length) return [];
  return ['-cflags', ...BASE_C_FLAGS, ...request.cFlags, '--', ...request.auxiliarySources, '-lc'];
}

/**
 * `zig build-lib` for merged and modular-import units, `zig build` for
 * modular-build. Both write the library straight into `outDir`.
 */
export function buildCompileCommand(platform: PlatformInfo, request: CompileRequest): CompileCommand {
  const artifactPath = join(request.outDir, getStaticLibName(LIBRARY_NAME, request.zigTarget, platform));
  const target = request.zigTarget;
  const wasm = target?.startsWith('wasm') ?? false;

  if (request.useBuildScript) {
    return {
      cwd: request.stagingDir,
      artifactPath,
      args: [
        'build',
        `-Doptimize=${request.optimize}`,
        ...(target ? [`-Dtarget=${target}`] : []),
        `-Dcpu=${request.cpu}`,
        '--prefix',
        request.outDir,
        '--prefix-lib-dir',
        request.outDir,
      ],
    };
  }

  return {
    cwd: request.stagingDir,
    artifactPath,
    args: [
      'build-lib',
      request.rootSource,
      ...cSourceArgs(request),
      '-O',
      request.optimize,
      ...(target ? ['-target', target] : []),
      `-mcpu=${request.cpu}`,
      ...(wasm ? [] : ['-fPIC']),
      '--name',
      LIBRARY_NAME,
      `-femit-bin=${artifactPath}`,
    ],
  };
}
