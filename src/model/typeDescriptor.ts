export type WrapperKind = 'reference' | 'mutable-reference' | 'optional';

/**
 * Declared high-level type of a parameter or return value.
 *
 * `slice` and `text` already include the borrow (`&[T]`, `&str`); a bare
 * `[T]` never reaches the model.
 */
export type TypeDescriptor =
  | { readonly kind: 'scalar'; readonly name: string }
  | { readonly kind: 'fixed-array'; readonly elem: TypeDescriptor; readonly length: number }
  | { readonly kind: 'slice'; readonly elem: TypeDescriptor; readonly mutable: boolean }
  | { readonly kind: 'text'; readonly mutable: boolean }
  | { readonly kind: 'record'; readonly name: string }
  | { readonly kind: 'generic'; readonly name: string }
  | { readonly kind: 'wrapped'; readonly wrapper: WrapperKind; readonly inner: TypeDescriptor };

export const UNIT: TypeDescriptor = Object.freeze({ kind: 'scalar', name: '()' });

export const scalar = (name: string): TypeDescriptor => ({ kind: 'scalar', name });
export const record = (name: string): TypeDescriptor => ({ kind: 'record', name });
export const generic = (name: string): TypeDescriptor => ({ kind: 'generic', name });
export const text = (mutable = false): TypeDescriptor => ({ kind: 'text', mutable });
export const slice = (elem: TypeDescriptor, mutable = false): TypeDescriptor => ({
  kind: 'slice',
  elem,
  mutable,
});
export const fixedArray = (elem: TypeDescriptor, length: number): TypeDescriptor => ({
  kind: 'fixed-array',
  elem,
  length,
});
export const wrapped = (wrapper: WrapperKind, inner: TypeDescriptor): TypeDescriptor => ({
  kind: 'wrapped',
  wrapper,
  inner,
});

export function isUnit(t: TypeDescriptor): boolean {
  return t.kind === 'scalar' && t.name === '()';
}

/** Renders a descriptor back to Rust type syntax. */
export function renderType(t: TypeDescriptor): string {
  switch (t.kind) {
    case 'scalar':
    case 'record':
    case 'generic':
      return t.name;
    case 'fixed-array':
      return `[${renderType(t.elem)}; ${t.length}]`;
    case 'slice':
      return `&${t.mutable ? 'mut ' : ''}[${renderType(t.elem)}]`;
    case 'text':
      return t.mutable ? '&mut str' : '&str';
    case 'wrapped':
      if (t.wrapper === 'optional') return `Option<${renderType(t.inner)}>`;
      return `&${t.wrapper === 'mutable-reference' ? 'mut ' : ''}${renderType(t.inner)}`;
  }
}

export function typesEqual(a: TypeDescriptor, b: TypeDescriptor): boolean {
  return renderType(a) === renderType(b);
}

export function containsGeneric(t: TypeDescriptor): boolean {
  switch (t.kind) {
    case 'generic':
      return true;
    case 'fixed-array':
    case 'slice':
      return containsGeneric(t.elem);
    case 'wrapped':
      return containsGeneric(t.inner);
    default:
      return false;
  }
}

/** Deep-freezes a descriptor tree so downstream stages cannot mutate it. */
export function freezeType(t: TypeDescriptor): TypeDescriptor {
  if (t.kind === 'fixed-array' || t.kind === 'slice') freezeType(t.elem);
  if (t.kind === 'wrapped') freezeType(t.inner);
  return Object.freeze(t);
}
