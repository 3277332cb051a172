import type { DeclarationSet, SignatureModel } from '../model/signatureTypes.js';

export type CompilationMode = 'merged' | 'modular-import' | 'modular-build';

export const COMPILATION_MODES: readonly CompilationMode[] = ['merged', 'modular-import', 'modular-build'];

export function isCompilationMode(value: unknown): value is CompilationMode {
  return value === 'merged' || value === 'modular-import' || value === 'modular-build';
}

export type ForeignSource =
  | { kind: 'embedded'; code: string }
  | {
      kind: 'external';
      /** As written in `zigbind_include!`, relative to the manifest directory. */
      path: string;
      absolutePath: string;
      code: string;
    };

/** One `zigbind!` or `zigbind_include!` occurrence. */
export type BindingBlock = {
  /** Host file, relative to the scan root. */
  file: string;
  /** 1-based line of the macro invocation. */
  line: number;
  /** Name of the `pub mod` the block's wrappers are written into. */
  moduleName: string;
  /** Name of the private module holding the raw `extern "C"` imports. */
  rawModule: string;
  source: ForeignSource;
  declarations: DeclarationSet;
};

export type StandaloneZigFile = {
  /** Relative to the manifest directory. */
  path: string;
  absolutePath: string;
  code: string;
};

export type ScanResult = {
  root: string;
  manifestDir: string;
  /** Every `.rs` file visited, sorted. */
  hostFiles: string[];
  blocks: BindingBlock[];
  standaloneZig: StandaloneZigFile[];
  /** Absolute paths of auxiliary C sources. */
  auxiliarySources: string[];
};

export type UnitFile = {
  /** Relative to the staging directory. */
  path: string;
  contents: string;
};

export type UnitRole = 'merged' | 'module' | 'entry';

export type CompilationUnit = {
  name: string;
  role: UnitRole;
  files: UnitFile[];
  signatures: SignatureModel[];
  auxiliarySources: string[];
  /** `build.zig` contents, modular-build only. */
  buildDescription?: string;
};
