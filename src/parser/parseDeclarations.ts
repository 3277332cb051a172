import { ParseError } from '../errors.js';
import type {
  DeclarationSet,
  HandleDecl,
  RecordDecl,
  RecordLayout,
  SignatureModel,
} from '../model/signatureTypes.js';
import { deepFreeze } from '../utils/freeze.js';
import { collapseWhitespace } from '../utils/identifiers.js';
import { parseRust } from './loadParser.js';
import { attachAttributes, splitTopLevel, type AttributedNode } from './parseAttributes.js';
import { parseImplBlock, type HandleBuilder } from './parseImpls.js';
import { parseSignatureItem, rejectAttributes } from './parseSignature.js';
import { describeSyntaxProblem, findSyntaxProblem, locationMapper, type LocationMapper } from './syntaxErrors.js';

export type ParseOptions = {
  /** Host file the declarations were taken from. */
  file?: string;
  /** 1-based line of the first character of `text` in `file`. */
  baseLine?: number;
  /** 1-based column of the first character of `text` in `file`. */
  baseColumn?: number;
};

const INT_REPRS = new Set(['u8', 'u16', 'u32', 'u64', 'i8', 'i16', 'i32', 'i64', 'usize', 'isize']);

function recordLayout(item: AttributedNode, kind: RecordDecl['kind']): RecordLayout | null {
  let layout: RecordLayout | null = null;
  for (const attr of item.attributes) {
    if (attr.name !== 'repr' || attr.args === null) continue;
    for (const hint of splitTopLevel(attr.args)) {
      if (hint === 'C') layout ??= 'c';
      else if (hint === 'transparent') layout = 'transparent';
      else if (kind === 'enum' && INT_REPRS.has(hint)) layout = 'int';
    }
  }
  return layout;
}

function describeItem(node: AttributedNode['node']): string {
  const first = collapseWhitespace(node.text.split(/\r?\n/)[0]);
  return first.length > 60 ? `${first.slice(0, 57)}...` : first;
}

function isOpaqueBody(body: AttributedNode['node']): boolean {
  if (body.type !== 'ordered_field_declaration_list') return false;
  const fields = body.namedChildren.filter((c) => !c.type.endsWith('comment'));
  return fields.length === 1 && fields[0].text === 'opaque';
}

type Collected = {
  signatures: SignatureModel[];
  records: RecordDecl[];
  handles: Map<string, HandleBuilder>;
  impls: AttributedNode[];
  names: Set<string>;
};

function claimName(c: Collected, name: string, item: AttributedNode, at: LocationMapper): void {
  if (c.names.has(name)) throw new ParseError(`duplicate declaration \`${name}\``, at(item.node));
  c.names.add(name);
}

function collectStructOrEnum(source: string, item: AttributedNode, c: Collected, at: LocationMapper): void {
  const { node } = item;
  const kind = node.type === 'enum_item' ? 'enum' : 'struct';
  const name = node.childForFieldName('name')?.text ?? '';
  claimName(c, name, item, at);
  if (node.childForFieldName('type_parameters')) {
    throw new ParseError(`generic ${kind} \`${name}\` cannot cross the boundary`, at(node));
  }

  const body = node.childForFieldName('body');
  if (kind === 'struct' && (!body || isOpaqueBody(body))) {
    rejectAttributes(item.attributes, ['doc'], 'handle declarations');
    c.handles.set(name, {
      name,
      kind: body ? 'opaque' : 'stateless',
      methods: [],
      traitImpls: [],
    });
    return;
  }

  rejectAttributes(item.attributes, ['repr', 'derive', 'doc'], `${kind} declarations`);
  c.records.push({
    name,
    kind,
    layout: recordLayout(item, kind),
    source: source.slice(item.startIndex, node.endIndex),
  });
}

/**
 * Parses a declaration block: function signatures, layout-carrying
 * struct/enum declarations, and handle declarations with their impls.
 */
export function parseDeclarations(text: string, options: ParseOptions = {}): DeclarationSet {
  const at = locationMapper(options.file, options.baseLine, options.baseColumn);
  const root = parseRust(text).rootNode;

  const problem = findSyntaxProblem(root);
  if (problem) throw new ParseError(describeSyntaxProblem(problem), at(problem.node));

  const c: Collected = { signatures: [], records: [], handles: new Map(), impls: [], names: new Set() };

  for (const item of attachAttributes(root.children, at)) {
    const { node } = item;
    switch (node.type) {
      case 'function_signature_item': {
        const sig = parseSignatureItem(item, at);
        claimName(c, sig.name, item, at);
        c.signatures.push(sig);
        break;
      }
      case 'function_item':
        throw new ParseError(
          `\`${node.childForFieldName('name')?.text ?? 'fn'}\` has a body; declarations end with \`;\``,
          at(node),
        );
      case 'struct_item':
      case 'enum_item':
        collectStructOrEnum(text, item, c, at);
        break;
      case 'impl_item':
        c.impls.push(item);
        break;
      case 'empty_statement':
        break;
      default:
        throw new ParseError(`unsupported declaration \`${describeItem(node)}\``, at(node));
    }
  }

  for (const impl of c.impls) parseImplBlock(impl, c.handles, at);

  const handles: HandleDecl[] = [...c.handles.values()].map((h) => ({
    name: h.name,
    kind: h.kind,
    ...(h.ctor ? { ctor: h.ctor } : {}),
    ...(h.dtor ? { dtor: h.dtor } : {}),
    methods: h.methods,
    traitImpls: h.traitImpls,
  }));

  return deepFreeze({ signatures: c.signatures, records: c.records, handles });
}

/** Signatures only; records and handles are dropped. */
export function parseSignatures(text: string, options: ParseOptions = {}): readonly SignatureModel[] {
  return parseDeclarations(text, options).signatures;
}
