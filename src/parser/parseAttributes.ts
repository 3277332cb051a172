import { ParseError, type SourceLocation } from '../errors.js';
import type { BindingStrategy } from '../model/signatureTypes.js';
import type { SyntaxNode } from './loadParser.js';
import type { LocationMapper } from './syntaxErrors.js';

export type RawAttribute = {
  name: string;
  /** Text between the parentheses of `#[name(...)]`. */
  args: string | null;
  /** Text after `=` in `#[name = ...]`. */
  value: string | null;
  location: SourceLocation;
};

const ATTR_RE = /^([A-Za-z_][A-Za-z0-9_]*(?:::[A-Za-z_][A-Za-z0-9_]*)*)\s*([\s\S]*)$/;

/** Reads the text of an outer attribute item (`#[...]`). */
export function readAttribute(text: string, location: SourceLocation): RawAttribute {
  const trimmed = text.trim();
  if (!trimmed.startsWith('#[') || !trimmed.endsWith(']')) {
    throw new ParseError(`malformed attribute \`${trimmed}\``, location);
  }
  const inner = trimmed.slice(2, -1).trim();
  const m = inner.match(ATTR_RE);
  if (!m) throw new ParseError(`malformed attribute \`${trimmed}\``, location);

  const [, name, rest] = m;
  if (!rest) return { name, args: null, value: null, location };
  if (rest.startsWith('(') && rest.endsWith(')')) {
    return { name, args: rest.slice(1, -1), value: null, location };
  }
  if (rest.startsWith('=')) {
    return { name, args: null, value: rest.slice(1).trim(), location };
  }
  throw new ParseError(`malformed attribute \`${trimmed}\``, location);
}

type Token =
  | { kind: 'ident'; text: string }
  | { kind: 'string'; text: string; value: string }
  | { kind: 'punct'; text: string };

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '0': '\0', '\\': '\\', '"': '"', "'": "'" };

function tokenize(src: string, location: SourceLocation): Token[] {
  const out: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (/[A-Za-z_]/.test(ch)) {
      let j = i + 1;
      while (j < src.length && /[A-Za-z0-9_]/.test(src[j])) j++;
      const word = src.slice(i, j);
      // raw string: r"..." / r#"..."#
      if (word === 'r' && (src[j] === '"' || src[j] === '#')) {
        let hashes = 0;
        while (src[j + hashes] === '#') hashes++;
        if (src[j + hashes] !== '"') throw new ParseError('malformed raw string literal', location);
        const close = '"' + '#'.repeat(hashes);
        const start = j + hashes + 1;
        const end = src.indexOf(close, start);
        if (end === -1) throw new ParseError('unterminated string literal', location);
        out.push({ kind: 'string', text: src.slice(i, end + close.length), value: src.slice(start, end) });
        i = end + close.length;
        continue;
      }
      out.push({ kind: 'ident', text: word });
      i = j;
      continue;
    }
    if (ch === '"') {
      let j = i + 1;
      let value = '';
      while (j < src.length && src[j] !== '"') {
        if (src[j] === '\\') {
          const esc = ESCAPES[src[j + 1] ?? ''];
          if (esc === undefined) throw new ParseError(`unsupported escape \`\\${src[j + 1] ?? ''}\``, location);
          value += esc;
          j += 2;
          continue;
        }
        value += src[j];
        j++;
      }
      if (j >= src.length) throw new ParseError('unterminated string literal', location);
      out.push({ kind: 'string', text: src.slice(i, j + 1), value });
      i = j + 1;
      continue;
    }
    out.push({ kind: 'punct', text: ch });
    i++;
  }
  return out;
}

export const BINDING_KEYS = ['strategy', 'prefix_high', 'prefix_low', 'c_ret', 'map_fn'] as const;
export type BindingKey = (typeof BINDING_KEYS)[number];

const BINDING_KEY_SET: ReadonlySet<string> = new Set(BINDING_KEYS);

function isBindingKey(s: string): s is BindingKey {
  return BINDING_KEY_SET.has(s);
}

/** `key = "value"` pairs of `#[zigbind(...)]`. */
export function parseBindingArgs(args: string, location: SourceLocation): Map<BindingKey, string> {
  const tokens = tokenize(args, location);
  const out = new Map<BindingKey, string>();
  let i = 0;
  while (i < tokens.length) {
    const key = tokens[i];
    if (key.kind !== 'ident') {
      throw new ParseError(`expected a key in #[zigbind(...)], found \`${key.text}\``, location);
    }
    if (!isBindingKey(key.text)) {
      throw new ParseError(
        `unknown #[zigbind] key \`${key.text}\` (expected one of: ${BINDING_KEYS.join(', ')})`,
        location,
      );
    }
    if (out.has(key.text)) {
      throw new ParseError(`#[zigbind] key \`${key.text}\` given more than once`, location);
    }
    const eq = tokens[i + 1];
    const value = tokens[i + 2];
    if (!eq || eq.text !== '=') {
      throw new ParseError(`expected \`=\` after #[zigbind] key \`${key.text}\``, location);
    }
    if (!value || value.kind !== 'string') {
      throw new ParseError(`#[zigbind] key \`${key.text}\` takes a string literal`, location);
    }
    out.set(key.text, value.value);
    i += 3;

    const sep = tokens[i];
    if (!sep) break;
    if (sep.text !== ',') {
      throw new ParseError(`expected \`,\` in #[zigbind(...)], found \`${sep.text}\``, location);
    }
    i++;
  }
  return out;
}

const STRATEGIES: Record<string, BindingStrategy> = {
  dual: 'both',
  high_only: 'high-only',
  low_only: 'low-only',
};

export function parseStrategy(value: string, location: SourceLocation): BindingStrategy {
  const s = STRATEGIES[value];
  if (!s) {
    throw new ParseError(
      `invalid strategy "${value}" (expected "dual", "high_only" or "low_only")`,
      location,
    );
  }
  return s;
}

/** Splits on `sep` outside brackets, angle brackets and string literals. */
export function splitTopLevel(text: string, sep = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let inString = false;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '(' || ch === '[' || ch === '<' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '>' || ch === '}') depth--;
    else if (ch === sep && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim());
}

export type AttributedNode = {
  node: SyntaxNode;
  attributes: RawAttribute[];
  /** Start of the first attribute, or of the node itself. */
  startIndex: number;
};

function isComment(node: SyntaxNode): boolean {
  return node.type === 'line_comment' || node.type === 'block_comment';
}

/**
 * Pairs each item in `children` with the outer attributes written above it.
 * Punctuation (braces of a declaration list) and comments are skipped.
 */
export function attachAttributes(children: readonly SyntaxNode[], at: LocationMapper): AttributedNode[] {
  const out: AttributedNode[] = [];
  let pending: RawAttribute[] = [];
  let pendingStart: number | null = null;

  for (const child of children) {
    if (isComment(child) || child.type === '{' || child.type === '}') continue;
    if (child.type === 'attribute_item') {
      pending.push(readAttribute(child.text, at(child)));
      pendingStart ??= child.startIndex;
      continue;
    }
    if (child.type === 'inner_attribute_item') {
      throw new ParseError(`inner attributes are not supported: \`${child.text}\``, at(child));
    }
    out.push({ node: child, attributes: pending, startIndex: pendingStart ?? child.startIndex });
    pending = [];
    pendingStart = null;
  }

  if (pending.length) {
    const last = pending[pending.length - 1];
    throw new ParseError(`attribute #[${last.name}] is not followed by a declaration`, last.location);
  }
  return out;
}
