import { ScanError } from '../errors.js';
import { parseRust, type SyntaxNode } from '../parser/loadParser.js';
import { findSyntaxProblem } from '../parser/syntaxErrors.js';

export const EMBED_MACRO = 'zigbind';
export const INCLUDE_MACRO = 'zigbind_include';

export type Invocation =
  | {
      kind: 'embedded';
      /** 1-based line of the macro name. */
      line: number;
      /** Text between the delimiters. */
      body: string;
      /** 1-based line the body starts on. */
      bodyLine: number;
    }
  | {
      kind: 'include';
      line: number;
      path: string;
      decls: string;
      declsLine: number;
      declsColumn: number;
    };

export type Extraction = {
  invocations: Invocation[];
  /** The host file had syntax errors; invocations were read from the recovered tree. */
  recovered: boolean;
};

function macroName(node: SyntaxNode): string {
  const text = node.childForFieldName('macro')?.text ?? '';
  const i = text.lastIndexOf('::');
  return i === -1 ? text : text.slice(i + 2);
}

function unquote(literal: SyntaxNode): string {
  if (literal.type === 'raw_string_literal') {
    return literal.text.replace(/^r#*"/, '').replace(/"#*$/, '');
  }
  return literal.text.slice(1, -1).replace(/\\(.)/g, '$1');
}

function inner(tree: SyntaxNode): string {
  return tree.text.slice(1, -1);
}

function readInclude(node: SyntaxNode, tree: SyntaxNode, file: string): Invocation {
  const line = node.startPosition.row + 1;
  const literal = tree.namedChildren.find((c) => c.type === 'string_literal' || c.type === 'raw_string_literal');
  const decls = tree.namedChildren.find((c) => c.type === 'token_tree' && c.text.startsWith('{'));
  if (!literal || !decls) {
    throw new ScanError(`${file}:${line}: ${INCLUDE_MACRO}! expects ("path/to/file.zig", { declarations })`);
  }
  return {
    kind: 'include',
    line,
    path: unquote(literal),
    decls: inner(decls),
    declsLine: decls.startPosition.row + 1,
    declsColumn: decls.startPosition.column + 2,
  };
}

/**
 * Finds `zigbind!` and `zigbind_include!` invocations in a Rust source.
 * Only real macro calls count; mentions in comments or strings do not.
 */
export function extractInvocations(source: string, file: string): Extraction {
  const root = parseRust(source).rootNode;
  const invocations: Invocation[] = [];

  for (const node of root.descendantsOfType('macro_invocation')) {
    const name = macroName(node);
    if (name !== EMBED_MACRO && name !== INCLUDE_MACRO) continue;
    const tree = node.namedChildren.find((c) => c.type === 'token_tree');
    if (!tree) continue;

    if (name === INCLUDE_MACRO) {
      invocations.push(readInclude(node, tree, file));
    } else {
      invocations.push({
        kind: 'embedded',
        line: node.startPosition.row + 1,
        body: inner(tree),
        bodyLine: tree.startPosition.row + 1,
      });
    }
  }

  return { invocations, recovered: findSyntaxProblem(root) !== null };
}

export type EmbeddedParts = {
  zig: string;
  decls: string;
  /** Line offset of `decls` within the body. */
  declsOffset: number;
};

/** Splits a `zigbind!` body at the first line that is exactly `---`. */
export function splitEmbedded(body: string): EmbeddedParts {
  const lines = body.split('\n');
  const sep = lines.findIndex((l) => l.trim() === '---');
  if (sep === -1) return { zig: body, decls: '', declsOffset: 0 };
  return {
    zig: lines.slice(0, sep).join('\n'),
    decls: lines.slice(sep + 1).join('\n'),
    declsOffset: sep + 1,
  };
}
