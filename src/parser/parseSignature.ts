import { ParseError, type SourceLocation } from '../errors.js';
import {
  DEFAULT_PREFIX_HIGH,
  DEFAULT_PREFIX_LOW,
  type BindingConfig,
  type ConcreteType,
  type GenericParam,
  type Param,
  type SignatureModel,
} from '../model/signatureTypes.js';
import { UNIT } from '../model/typeDescriptor.js';
import { deepFreeze } from '../utils/freeze.js';
import { collapseWhitespace, isIdentifier, stripWhitespace } from '../utils/identifiers.js';
import type { SyntaxNode } from './loadParser.js';
import {
  parseBindingArgs,
  parseStrategy,
  splitTopLevel,
  type AttributedNode,
  type RawAttribute,
} from './parseAttributes.js';
import { parseTypeText, typeFromNode } from './parseTypes.js';
import type { LocationMapper } from './syntaxErrors.js';

const NO_GENERICS: ReadonlySet<string> = new Set();
const PREFIX_RE = /^[A-Za-z0-9_]*$/;

/** Throws for any attribute outside `allowed`, naming where it was found. */
export function rejectAttributes(attrs: readonly RawAttribute[], allowed: readonly string[], where: string): void {
  for (const a of attrs) {
    if (allowed.includes(a.name)) continue;
    if (a.name === 'repr') {
      throw new ParseError('#[repr] applies to struct and enum declarations only', a.location);
    }
    if (a.name === 'constructor' || a.name === 'destructor') {
      throw new ParseError(`#[${a.name}] is only valid on methods inside an impl block`, a.location);
    }
    throw new ParseError(`unknown attribute #[${a.name}] on ${where}`, a.location);
  }
}

export function parseParams(
  paramsNode: SyntaxNode,
  generics: ReadonlySet<string>,
  at: LocationMapper,
  topLevel: boolean,
): Param[] {
  const params: Param[] = [];
  const seen = new Set<string>();
  for (const child of paramsNode.namedChildren) {
    if (child.type.endsWith('comment')) continue;
    if (child.type === 'self_parameter') {
      if (topLevel) throw new ParseError('`self` is only valid on methods inside an impl block', at(child));
      continue;
    }
    if (child.type !== 'parameter') {
      throw new ParseError(`unsupported parameter \`${collapseWhitespace(child.text)}\``, at(child));
    }
    const pattern = child.childForFieldName('pattern');
    const typeNode = child.childForFieldName('type');
    if (!pattern || pattern.type !== 'identifier' || !typeNode) {
      throw new ParseError(
        `parameter \`${collapseWhitespace(child.text)}\` must be \`name: Type\``,
        at(child),
      );
    }
    const name = pattern.text;
    if (seen.has(name)) throw new ParseError(`duplicate parameter \`${name}\``, at(pattern));
    seen.add(name);
    params.push({ name, type: typeFromNode(typeNode, { generics, at }) });
  }
  return params;
}

function parseGenerics(node: SyntaxNode | null, at: LocationMapper): GenericParam[] {
  if (!node) return [];
  const out: GenericParam[] = [];
  for (const child of node.namedChildren) {
    if (child.type.endsWith('comment')) continue;
    const text = collapseWhitespace(child.text);
    const colon = text.indexOf(':');
    const name = (colon === -1 ? text : text.slice(0, colon)).trim();
    if (!isIdentifier(name)) {
      throw new ParseError(
        `unsupported generic parameter \`${text}\` (only type parameters are allowed)`,
        at(child),
      );
    }
    const bounds =
      colon === -1
        ? []
        : text
            .slice(colon + 1)
            .split('+')
            .map((b) => b.trim())
            .filter(Boolean);
    if (out.some((g) => g.name === name)) {
      throw new ParseError(`duplicate generic parameter \`${name}\``, at(child));
    }
    out.push({ name, bounds });
  }
  return out;
}

function parseQualifiers(node: SyntaxNode, at: LocationMapper): { isAsync: boolean } {
  let isAsync = false;
  for (const child of node.children) {
    if (child.type !== 'function_modifiers') continue;
    for (const word of collapseWhitespace(child.text).split(' ')) {
      if (word === 'async') isAsync = true;
      else throw new ParseError(`unsupported qualifier \`${word}\``, at(child));
    }
  }
  return { isAsync };
}

function checkPrefix(value: string, key: string, location: SourceLocation): string {
  if (!PREFIX_RE.test(value)) {
    throw new ParseError(`${key} "${value}" may only contain letters, digits and \`_\``, location);
  }
  return value;
}

function parseBindingConfig(attr: RawAttribute, generics: ReadonlySet<string>): BindingConfig {
  if (attr.value !== null) {
    throw new ParseError('#[zigbind] takes a list: #[zigbind(key = "value", ...)]', attr.location);
  }
  const args = parseBindingArgs(attr.args ?? '', attr.location);
  const strategy = args.get('strategy');
  const cRet = args.get('c_ret');
  const mapFn = args.get('map_fn');
  if (mapFn !== undefined && !mapFn.trim()) {
    throw new ParseError('#[zigbind] map_fn is empty', attr.location);
  }
  return {
    strategy: strategy === undefined ? 'high-only' : parseStrategy(strategy, attr.location),
    prefixHigh: checkPrefix(args.get('prefix_high') ?? DEFAULT_PREFIX_HIGH, 'prefix_high', attr.location),
    prefixLow: checkPrefix(args.get('prefix_low') ?? DEFAULT_PREFIX_LOW, 'prefix_low', attr.location),
    ...(cRet !== undefined ? { lowLevelReturnType: parseTypeText(cRet, generics, attr.location) } : {}),
    ...(mapFn !== undefined ? { returnTransform: mapFn.trim() } : {}),
  };
}

function parseMonomorphize(attr: RawAttribute, generics: readonly GenericParam[]): ConcreteType[] {
  if (generics.length === 0) {
    throw new ParseError('#[monomorphize] requires a generic signature', attr.location);
  }
  if (generics.length !== 1) {
    throw new ParseError(
      `#[monomorphize] requires exactly one generic type parameter, found ${generics.length}`,
      attr.location,
    );
  }
  const entries = attr.args === null ? [] : splitTopLevel(attr.args);
  if (entries.length && entries[entries.length - 1] === '') entries.pop();
  if (!entries.length) throw new ParseError('#[monomorphize] needs at least one type', attr.location);

  const out: ConcreteType[] = [];
  for (const entry of entries) {
    if (!entry) throw new ParseError('empty entry in #[monomorphize(...)]', attr.location);
    const text = stripWhitespace(entry);
    if (out.some((c) => c.text === text)) {
      throw new ParseError(`type \`${entry}\` listed twice in #[monomorphize]`, attr.location);
    }
    out.push({ text, type: parseTypeText(entry, NO_GENERICS, attr.location) });
  }
  return out;
}

function single(attrs: readonly RawAttribute[], name: string): RawAttribute | undefined {
  const found = attrs.filter((a) => a.name === name);
  if (found.length > 1) throw new ParseError(`#[${name}] given more than once`, found[1].location);
  return found[0];
}

/** Builds the model of one `fn name<..>(..) -> R;` item. */
export function parseSignatureItem(item: AttributedNode, at: LocationMapper): SignatureModel {
  const { node } = item;
  rejectAttributes(item.attributes, ['zigbind', 'monomorphize', 'doc'], 'function declarations');

  const name = node.childForFieldName('name')?.text ?? '';
  const location = at(node);
  if (node.children.some((c) => c.type === 'where_clause')) {
    throw new ParseError(`\`${name}\`: where clauses are not supported; put bounds in the generic list`, location);
  }

  const { isAsync } = parseQualifiers(node, at);
  const generics = parseGenerics(node.childForFieldName('type_parameters'), at);
  const genericNames: ReadonlySet<string> = new Set(generics.map((g) => g.name));

  const paramsNode = node.childForFieldName('parameters');
  const params = paramsNode ? parseParams(paramsNode, genericNames, at, true) : [];
  const retNode = node.childForFieldName('return_type');
  const returnType = retNode ? typeFromNode(retNode, { generics: genericNames, at }) : UNIT;

  const bindingAttr = single(item.attributes, 'zigbind');
  const monoAttr = single(item.attributes, 'monomorphize');

  return deepFreeze({
    name,
    params,
    returnType,
    generics,
    isAsync,
    monomorphizeTypes: monoAttr ? parseMonomorphize(monoAttr, generics) : [],
    ...(bindingAttr ? { bindingConfig: parseBindingConfig(bindingAttr, genericNames) } : {}),
    location,
  });
}
