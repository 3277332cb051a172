import type { OptimizeMode } from '../dx/config.js';

export type CompilerInfo = {
  kind: 'zig';
  path: string;
  /** `zig version` output, or `unknown` */
  version: string;
};

export type CompileRequest = {
  /** Directory the unit files were written to; `zig build` runs here. */
  stagingDir: string;
  /** Root Zig source (merged file or modular entry), inside `stagingDir`. */
  rootSource: string;
  auxiliarySources: string[];
  /** Extra flags for auxiliary C sources, after the base flags. */
  cFlags: string[];
  outDir: string;
  /** Zig target; `undefined` builds for the host. */
  zigTarget: string | undefined;
  /** Explicit `-mcpu` model; never `native`. */
  cpu: string;
  optimize: OptimizeMode;
  /** Run `zig build` against the staged `build.zig` instead of `zig build-lib`. */
  useBuildScript: boolean;
};

export type CompileResult = {
  artifactPath: string;
  command: string[];
};

/** Anything that turns staged units into a static library. */
export interface ForeignCompiler {
  readonly info: CompilerInfo;
  compile(request: CompileRequest): CompileResult;
}
