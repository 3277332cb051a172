export { generateBlock } from './generateBlock.js';
export { exportedSymbols } from './codegenTypes.js';
export type { GeneratedBlock, GeneratedSymbol, SymbolLevel, SymbolParam } from './codegenTypes.js';
export { missingExports, readZigExports, zigToRust } from './foreignSignatures.js';
export type { ZigExport } from './foreignSignatures.js';
export { renderDts, tsType } from './emitDts.js';
export { RustWriter } from './rustWriter.js';
