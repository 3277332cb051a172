import type { SourceLocation } from '../errors.js';
import type { TypeDescriptor } from './typeDescriptor.js';

export type GenericParam = {
  readonly name: string;
  readonly bounds: readonly string[];
};

export type Param = {
  readonly name: string;
  readonly type: TypeDescriptor;
};

export type BindingStrategy = 'high-only' | 'low-only' | 'both';

export type BindingConfig = {
  readonly strategy: BindingStrategy;
  readonly prefixHigh: string;
  readonly prefixLow: string;
  /** `c_ret`: return type of the low-level export. */
  readonly lowLevelReturnType?: TypeDescriptor;
  /** `map_fn`: applied to the raw foreign result inside the low-level export. */
  readonly returnTransform?: string;
};

export const DEFAULT_PREFIX_HIGH = '';
export const DEFAULT_PREFIX_LOW = 'c_';

export type ConcreteType = {
  /** As written in `#[monomorphize(...)]`, whitespace removed. */
  readonly text: string;
  readonly type: TypeDescriptor;
};

export type SignatureModel = {
  readonly name: string;
  readonly params: readonly Param[];
  readonly returnType: TypeDescriptor;
  readonly generics: readonly GenericParam[];
  readonly isAsync: boolean;
  /** Empty when the signature is not generic-instantiated. */
  readonly monomorphizeTypes: readonly ConcreteType[];
  readonly bindingConfig?: BindingConfig;
  readonly location?: SourceLocation;
  /** Set on concrete signatures produced by monomorphization. */
  readonly instantiatedFrom?: { readonly name: string; readonly concreteType: string };
};

export type RecordLayout = 'c' | 'transparent' | 'int';

/** A struct/enum declared next to the signatures, re-emitted verbatim. */
export type RecordDecl = {
  readonly name: string;
  readonly kind: 'struct' | 'enum';
  /** `null` when no `#[repr(...)]` fixes the layout. */
  readonly layout: RecordLayout | null;
  readonly source: string;
};

export type Receiver = 'none' | 'ref' | 'mut';

export type HandleMethod = {
  readonly name: string;
  /** Foreign function the method forwards to. */
  readonly foreignName: string;
  readonly receiver: Receiver;
  readonly params: readonly Param[];
  /** `null` for constructors (`-> Self`). */
  readonly returnType: TypeDescriptor | null;
  /** Verbatim block for stateless handles whose body is more than one foreign call. */
  readonly body?: string;
};

export type TraitImpl = {
  readonly traitPath: string;
  readonly methods: readonly HandleMethod[];
};

/**
 * Capability set of a host type backed by foreign code: an opaque handle
 * owns a foreign pointer, a stateless handle is a zero-sized type.
 */
export type HandleDecl = {
  readonly name: string;
  readonly kind: 'opaque' | 'stateless';
  /** `#[constructor]` */
  readonly ctor?: HandleMethod;
  /** `#[destructor]`, called from `Drop`. */
  readonly dtor?: HandleMethod;
  readonly methods: readonly HandleMethod[];
  readonly traitImpls: readonly TraitImpl[];
};

export type DeclarationSet = {
  readonly signatures: readonly SignatureModel[];
  readonly records: readonly RecordDecl[];
  readonly handles: readonly HandleDecl[];
};
