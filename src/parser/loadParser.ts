import Parser from 'tree-sitter';

import Rust from 'tree-sitter-rust';

export type SyntaxNode = Parser.SyntaxNode;
export type SyntaxTree = Parser.Tree;

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Rust);
  return parser;
}

let shared: Parser | null = null;

/**
 * Parses Rust source with a process-wide parser instance.
 *
 * The buffer is sized to the input; the binding's default chunk size rejects
 * long strings.
 */
export function parseRust(source: string): SyntaxTree {
  shared ??= createParser();
  return shared.parse(source, undefined, { bufferSize: source.length * 2 + 1024 });
}
