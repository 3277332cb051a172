import type { SourceLocation } from '../errors.js';
import type { SyntaxNode } from './loadParser.js';

export type SyntaxProblem = {
  node: SyntaxNode;
  /** `true` for a token the grammar inserted to recover (zero width). */
  missing: boolean;
};

/** First error or missing node in document order, or `null` for a clean tree. */
export function findSyntaxProblem(root: SyntaxNode): SyntaxProblem | null {
  const stack: SyntaxNode[] = [root];
  while (stack.length) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === 'ERROR') return { node, missing: false };
    if (node !== root && node.children.length === 0 && node.startIndex === node.endIndex) {
      return { node, missing: true };
    }
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }
  return null;
}

export function describeSyntaxProblem(problem: SyntaxProblem): string {
  if (problem.missing) return `syntax error: missing \`${problem.node.type}\``;
  const snippet = problem.node.text.split(/\r?\n/)[0].trim();
  return snippet ? `syntax error near \`${snippet}\`` : 'syntax error';
}

export type LocationMapper = (node: SyntaxNode) => SourceLocation;

/**
 * Maps node positions in a declaration snippet back to the host file.
 *
 * `baseLine`/`baseColumn` are the 1-based position of the snippet's first
 * character; only the first row is shifted by `baseColumn`.
 */
export function locationMapper(file: string | undefined, baseLine = 1, baseColumn = 1): LocationMapper {
  return (node) => {
    const { row, column } = node.startPosition;
    return {
      file,
      line: baseLine + row,
      column: row === 0 ? baseColumn + column : column + 1,
    };
  };
}
