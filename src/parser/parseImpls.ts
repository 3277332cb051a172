import { ParseError } from '../errors.js';
import type { HandleDecl, HandleMethod, Param, Receiver, TraitImpl } from '../model/signatureTypes.js';
import { collapseWhitespace } from '../utils/identifiers.js';
import type { SyntaxNode } from './loadParser.js';
import { attachAttributes, type AttributedNode } from './parseAttributes.js';
import { parseParams, rejectAttributes } from './parseSignature.js';
import { typeFromNode } from './parseTypes.js';
import type { LocationMapper } from './syntaxErrors.js';

const NO_GENERICS: ReadonlySet<string> = new Set();
const NOT_FOREIGN = new Set(['Some', 'Ok', 'Err', 'Box', 'Vec', 'String']);

export type HandleBuilder = {
  name: string;
  kind: HandleDecl['kind'];
  ctor?: HandleMethod;
  dtor?: HandleMethod;
  methods: HandleMethod[];
  traitImpls: TraitImpl[];
};

function readReceiver(node: SyntaxNode, at: LocationMapper): Receiver {
  const text = collapseWhitespace(node.text).replace(/'\w+\s*/, '');
  if (text === '&self') return 'ref';
  if (text === '&mut self') return 'mut';
  throw new ParseError(`unsupported receiver \`${node.text}\` (use \`&self\` or \`&mut self\`)`, at(node));
}

function callName(node: SyntaxNode | null | undefined): string | null {
  if (node?.type !== 'call_expression') return null;
  const fn = node.childForFieldName('function');
  return fn?.type === 'identifier' ? fn.text : null;
}

/** `{ foreign_fn(..) }` or `{ foreign_fn(..); }` */
function singleForeignCall(block: SyntaxNode): string | null {
  const stmts = block.namedChildren.filter((c) => !c.type.endsWith('comment'));
  if (stmts.length !== 1) return null;
  const stmt = stmts[0];
  if (stmt.type === 'expression_statement') return callName(stmt.namedChildren[0]);
  return callName(stmt);
}

function firstForeignCall(block: SyntaxNode): string | null {
  for (const call of block.descendantsOfType('call_expression')) {
    const name = callName(call);
    if (name && !NOT_FOREIGN.has(name)) return name;
  }
  return null;
}

function parseMethod(
  item: AttributedNode,
  handle: HandleBuilder,
  inTrait: boolean,
  at: LocationMapper,
): { method: HandleMethod; role: 'constructor' | 'destructor' | 'method' } {
  const { node } = item;
  if (node.type !== 'function_item') {
    throw new ParseError(`unsupported item in impl block: \`${collapseWhitespace(node.text).slice(0, 40)}\``, at(node));
  }
  const name = node.childForFieldName('name')?.text ?? '';
  if (node.childForFieldName('type_parameters')) {
    throw new ParseError(`method \`${name}\` cannot be generic`, at(node));
  }

  const allowed = inTrait ? ['doc'] : ['doc', 'constructor', 'destructor'];
  rejectAttributes(item.attributes, allowed, inTrait ? 'trait impl methods' : 'impl methods');
  const isCtor = item.attributes.some((a) => a.name === 'constructor');
  const isDtor = item.attributes.some((a) => a.name === 'destructor');
  if (isCtor && isDtor) {
    throw new ParseError(`method \`${name}\` cannot be both #[constructor] and #[destructor]`, at(node));
  }

  const paramsNode = node.childForFieldName('parameters');
  let receiver: Receiver = 'none';
  const selfNode = paramsNode?.namedChildren.find((c) => c.type === 'self_parameter');
  if (selfNode) receiver = readReceiver(selfNode, at);
  const params: Param[] = paramsNode ? parseParams(paramsNode, NO_GENERICS, at, false) : [];

  const retNode = node.childForFieldName('return_type');
  const returnsSelf = retNode?.text === 'Self';
  const returnType = retNode && !returnsSelf ? typeFromNode(retNode, { generics: NO_GENERICS, at }) : null;

  const body = node.childForFieldName('body');
  if (!body) throw new ParseError(`method \`${name}\` needs a body naming its foreign function`, at(node));

  let foreignName = singleForeignCall(body);
  let verbatim: string | undefined;
  if (!foreignName) {
    foreignName = firstForeignCall(body);
    if (handle.kind === 'stateless') verbatim = body.text;
  }
  if (!foreignName) {
    throw new ParseError(`method \`${name}\` does not call a foreign function`, at(body));
  }

  if (isCtor) {
    if (handle.kind !== 'opaque') {
      throw new ParseError(`#[constructor] requires an opaque handle (\`struct ${handle.name}(opaque);\`)`, at(node));
    }
    if (receiver !== 'none' || !returnsSelf) {
      throw new ParseError(`constructor \`${name}\` must be \`fn ${name}(..) -> Self\``, at(node));
    }
    return { method: { name, foreignName, receiver, params, returnType: null }, role: 'constructor' };
  }
  if (isDtor) {
    if (handle.kind !== 'opaque') {
      throw new ParseError(`#[destructor] requires an opaque handle (\`struct ${handle.name}(opaque);\`)`, at(node));
    }
    if (receiver === 'none' || params.length || returnType) {
      throw new ParseError(`destructor \`${name}\` must be \`fn ${name}(&mut self)\``, at(node));
    }
    return { method: { name, foreignName, receiver, params, returnType: null }, role: 'destructor' };
  }
  if (returnsSelf) {
    throw new ParseError(`method \`${name}\` returns Self; mark it #[constructor]`, at(node));
  }
  if (handle.kind === 'opaque' && receiver === 'none') {
    throw new ParseError(`method \`${name}\` of opaque handle \`${handle.name}\` must take \`&self\` or \`&mut self\``, at(node));
  }
  return {
    method: { name, foreignName, receiver, params, returnType, ...(verbatim ? { body: verbatim } : {}) },
    role: 'method',
  };
}

/** Adds the methods of one `impl Name { .. }` or `impl Trait for Name { .. }` to its handle. */
export function parseImplBlock(
  item: AttributedNode,
  handles: ReadonlyMap<string, HandleBuilder>,
  at: LocationMapper,
): void {
  const { node } = item;
  rejectAttributes(item.attributes, ['doc'], 'impl blocks');

  const typeNode = node.childForFieldName('type');
  const target = typeNode?.text ?? '';
  if (node.childForFieldName('type_parameters')) {
    throw new ParseError(`generic impl blocks are not supported`, at(node));
  }
  const handle = handles.get(target);
  if (!handle) {
    throw new ParseError(
      `impl for undeclared handle \`${target}\` (declare \`struct ${target}(opaque);\` or \`struct ${target};\`)`,
      at(typeNode ?? node),
    );
  }

  const traitNode = node.childForFieldName('trait');
  const bodyNode = node.childForFieldName('body');
  const members = bodyNode ? attachAttributes(bodyNode.children, at) : [];
  const methods: HandleMethod[] = [];

  for (const member of members) {
    const { method, role } = parseMethod(member, handle, traitNode !== null, at);
    if (role === 'constructor') {
      if (handle.ctor) throw new ParseError(`handle \`${target}\` has more than one #[constructor]`, at(member.node));
      handle.ctor = method;
    } else if (role === 'destructor') {
      if (handle.dtor) throw new ParseError(`handle \`${target}\` has more than one #[destructor]`, at(member.node));
      handle.dtor = method;
    } else {
      methods.push(method);
    }
  }

  if (traitNode) {
    handle.traitImpls.push({ traitPath: collapseWhitespace(traitNode.text), methods });
  } else {
    handle.methods.push(...methods);
  }
}
