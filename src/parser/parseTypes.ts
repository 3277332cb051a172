import { ParseError, type SourceLocation } from '../errors.js';
import {
  UNIT,
  fixedArray,
  freezeType,
  generic,
  record,
  scalar,
  slice,
  text,
  wrapped,
  type TypeDescriptor,
} from '../model/typeDescriptor.js';
import { collapseWhitespace } from '../utils/identifiers.js';
import { parseRust, type SyntaxNode } from './loadParser.js';
import { findSyntaxProblem, describeSyntaxProblem, type LocationMapper } from './syntaxErrors.js';

export type TypeScope = {
  generics: ReadonlySet<string>;
  at: LocationMapper;
};

const C_ALIAS_PATHS = ['std::ffi::', 'core::ffi::', 'std::os::raw::', 'libc::'];
const OPTION_PATHS = new Set(['Option', 'std::option::Option', 'core::option::Option']);

function isCAlias(name: string): boolean {
  if (/^c_[a-z]+$/.test(name)) return true;
  return C_ALIAS_PATHS.some((p) => name.startsWith(p) && /^c_[a-z]+$/.test(name.slice(p.length)));
}

function hasChild(node: SyntaxNode, type: string): boolean {
  return node.children.some((c) => c.type === type);
}

function fieldOrFail(node: SyntaxNode, field: string, scope: TypeScope): SyntaxNode {
  const child = node.childForFieldName(field);
  if (!child) throw new ParseError(`malformed type \`${collapseWhitespace(node.text)}\``, scope.at(node));
  return child;
}

function parseArrayLength(node: SyntaxNode, scope: TypeScope): number {
  const raw = node.text.replace(/_/g, '').replace(/(usize|u\d+|i\d+)$/, '');
  if (node.type !== 'integer_literal' || !/^\d+$/.test(raw)) {
    throw new ParseError(`array length must be an integer literal, found \`${node.text}\``, scope.at(node));
  }
  return Number(raw);
}

/** Builds a descriptor from a tree-sitter-rust type node. */
export function typeFromNode(node: SyntaxNode, scope: TypeScope): TypeDescriptor {
  return freezeType(convert(node, scope));
}

function convert(node: SyntaxNode, scope: TypeScope): TypeDescriptor {
  switch (node.type) {
    case 'primitive_type':
      return scalar(node.text);
    case 'unit_type':
      return UNIT;
    case 'pointer_type':
      return scalar(collapseWhitespace(node.text));
    case 'type_identifier': {
      const name = node.text;
      if (scope.generics.has(name)) return generic(name);
      if (isCAlias(name)) return scalar(name);
      return record(name);
    }
    case 'scoped_type_identifier': {
      const name = collapseWhitespace(node.text).replace(/\s*::\s*/g, '::');
      if (isCAlias(name)) return scalar(name);
      return record(name);
    }
    case 'reference_type': {
      const inner = fieldOrFail(node, 'type', scope);
      const mutable = hasChild(node, 'mutable_specifier');
      if (inner.type === 'primitive_type' && inner.text === 'str') return text(mutable);
      if (inner.type === 'array_type' && !inner.childForFieldName('length')) {
        return slice(convert(fieldOrFail(inner, 'element', scope), scope), mutable);
      }
      return wrapped(mutable ? 'mutable-reference' : 'reference', convert(inner, scope));
    }
    case 'array_type': {
      const length = node.childForFieldName('length');
      if (!length) {
        throw new ParseError(
          `unsized slice \`${collapseWhitespace(node.text)}\` must be borrowed (\`&[T]\`)`,
          scope.at(node),
        );
      }
      return fixedArray(convert(fieldOrFail(node, 'element', scope), scope), parseArrayLength(length, scope));
    }
    case 'generic_type': {
      const base = collapseWhitespace(fieldOrFail(node, 'type', scope).text).replace(/\s*::\s*/g, '::');
      const args = fieldOrFail(node, 'type_arguments', scope).namedChildren.filter(
        (c) => c.type !== 'lifetime' && !c.type.endsWith('comment'),
      );
      if (OPTION_PATHS.has(base) && args.length === 1) {
        return wrapped('optional', convert(args[0], scope));
      }
      throw new ParseError(
        `unsupported generic type \`${collapseWhitespace(node.text)}\` (only Option<T> may carry type arguments)`,
        scope.at(node),
      );
    }
    default:
      throw new ParseError(`unsupported type \`${collapseWhitespace(node.text)}\``, scope.at(node));
  }
}

/**
 * Parses a standalone type written inside an attribute (`c_ret`,
 * `#[monomorphize(...)]`). Errors point at the attribute.
 */
export function parseTypeText(
  source: string,
  generics: ReadonlySet<string>,
  location: SourceLocation,
): TypeDescriptor {
  const trimmed = source.trim();
  if (!trimmed) throw new ParseError('expected a type, found nothing', location);

  const tree = parseRust(`type __Probe = ${trimmed};`);
  const problem = findSyntaxProblem(tree.rootNode);
  const items = tree.rootNode.namedChildren;
  if (problem || items.length !== 1 || items[0].type !== 'type_item') {
    const detail = problem ? `: ${describeSyntaxProblem(problem)}` : '';
    throw new ParseError(`\`${trimmed}\` is not a type${detail}`, location);
  }
  const typeNode = items[0].childForFieldName('type');
  if (!typeNode) throw new ParseError(`\`${trimmed}\` is not a type`, location);
  return typeFromNode(typeNode, { generics, at: () => location });
}
