import { detectPlatform } from './detectPlatform.js';
import { detectZigCompiler } from './detectZigCompiler.js';

export function detectCompilers(zigPath?: string) {
  const platform = detectPlatform();
  const zig = detectZigCompiler(zigPath);

  return {
    platform,
    zig,
  };
}

export { buildArtifact } from './buildArtifact.js';
export type { ArtifactOptions, ArtifactResult } from './buildArtifact.js';
export { buildCompileCommand } from './buildCommand.js';
export type { CompileCommand } from './buildCommand.js';
export { compileForeign, createZigCompiler, formatDiagnostics, parseDiagnostics } from './compileForeign.js';
export type { CompileRequest, CompileResult, CompilerInfo, ForeignCompiler } from './compilerTypes.js';
export { resolveCpuModel } from './cpuModel.js';
export type { CpuModel } from './cpuModel.js';
export { detectPlatform, archOf } from './detectPlatform.js';
export type { PlatformInfo } from './detectPlatform.js';
export { detectZigCompiler } from './detectZigCompiler.js';
export { formatDirectives, linkDirectives } from './linkDirectives.js';
export { sanityCheckZig } from './sanityCheck.js';
export { KNOWN_TRIPLES, isWasmTarget, isWasm64Target, listTargets, mapTargetTriple } from './targets.js';
