export { runBuild, expandInvocation, renderBindings, BINDINGS_FILE, DTS_FILE } from './builder.js';
export type { BlockOutput, BuildOutput, ExpandOptions, RunBuildOptions } from './builder.js';
export { runCli } from './runCli.js';
export type { CliIo } from './runCli.js';

export { parseDeclarations, parseSignatures, parseTypeText } from './parser/index.js';
export type { ParseOptions } from './parser/index.js';
export { scanSources, collectUnits, readHostFile } from './scanner/index.js';
export type {
  BindingBlock,
  CompilationMode,
  CompilationUnit,
  ForeignSource,
  ScanOptions,
  ScanResult,
} from './scanner/index.js';
export { lower, lowerReturn, lowerSignature, simulateRoundTrip } from './lowering/index.js';
export { monomorphize, expandSignature, mangledName } from './mono/monomorphize.js';
export { generateBlock, renderDts } from './codegen/index.js';
export type { GeneratedBlock, GeneratedSymbol } from './codegen/index.js';
export {
  buildArtifact,
  createZigCompiler,
  detectZigCompiler,
  listTargets,
  mapTargetTriple,
  KNOWN_TRIPLES,
} from './compiler/index.js';
export type { ArtifactOptions, ArtifactResult, CompileRequest, CompileResult, ForeignCompiler } from './compiler/index.js';
export { loadOptionalConfig, resolveSettings } from './dx/config.js';
export type { BuildOptions, BuildSettings, OptimizeMode, ZigbindConfig } from './dx/config.js';
export { onWarning } from './dx/warnings.js';
export type { ZigbindWarning, ZigbindWarningCode } from './dx/warnings.js';

export * from './errors.js';
export type * from './model/signatureTypes.js';
export type * from './model/typeDescriptor.js';
