const PLAIN_STRUCT_RE = /=(\s*)struct\b/g;
const SINGLE_LINE_DECL_RE = /^(?:pub\s+)?(?:const|var)\s+[A-Za-z_][A-Za-z0-9_]*\b.*;\s*(?:\/\/.*)?$/;

/** `= struct` becomes `= extern struct`; `extern` and `packed` structs are left alone. */
export function externStructs(code: string): string {
  return code.replace(PLAIN_STRUCT_RE, '=$1extern struct');
}

/** Brace depth change of one line, ignoring strings, char literals and `//` comments. */
function depthDelta(line: string): number {
  let delta = 0;
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '/' && line[i + 1] === '/') break;
    else if (ch === '{') delta++;
    else if (ch === '}') delta--;
  }
  return delta;
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start].trim()) start++;
  while (end > start && !lines[end - 1].trim()) end--;
  return lines.slice(start, end);
}

export type ZigPart = {
  /** Shown in the separator comment. */
  label: string;
  code: string;
};

/**
 * Concatenates fragments into one Zig file. A top-level single-line
 * `const`/`var` with balanced braces (such as `const std = @import("std");`
 * or a shared allocator) is kept only the first time its exact text appears.
 */
export function mergeFragments(parts: readonly ZigPart[]): string {
  const seen = new Set<string>();
  const out: string[] = ['// Generated by zigbind. Do not edit.'];

  for (const part of parts) {
    out.push('', `// ---- ${part.label} ----`);
    let depth = 0;
    for (const line of trimBlankEdges(part.code.split(/\r?\n/))) {
      const text = line.trim();
      if (depth === 0 && SINGLE_LINE_DECL_RE.test(text) && depthDelta(line) === 0) {
        if (seen.has(text)) continue;
        seen.add(text);
      }
      out.push(line.trimEnd());
      depth += depthDelta(line);
    }
  }
  return `${out.join('\n')}\n`;
}
