export { parseDeclarations, parseSignatures } from './parseDeclarations.js';
export type { ParseOptions } from './parseDeclarations.js';
export { parseTypeText } from './parseTypes.js';
export { parseRust, createParser } from './loadParser.js';
export type { SyntaxNode, SyntaxTree } from './loadParser.js';
