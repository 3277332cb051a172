const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RUST_KEYWORDS = new Set([
  'as', 'async', 'await', 'break', 'const', 'continue', 'crate', 'dyn', 'else', 'enum',
  'extern', 'false', 'fn', 'for', 'if', 'impl', 'in', 'let', 'loop', 'match', 'mod',
  'move', 'mut', 'pub', 'ref', 'return', 'self', 'Self', 'static', 'struct', 'super',
  'trait', 'true', 'type', 'unsafe', 'use', 'where', 'while',
]);

/** Plain (non-raw) Rust identifier that is not a reserved word. */
export function isIdentifier(s: string): boolean {
  return IDENT_RE.test(s) && s !== '_' && !RUST_KEYWORDS.has(s);
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function stripWhitespace(s: string): string {
  return s.replace(/\s+/g, '');
}
