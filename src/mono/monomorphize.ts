import { MonomorphizationError } from '../errors.js';
import type { BindingConfig, SignatureModel } from '../model/signatureTypes.js';
import type { TypeDescriptor } from '../model/typeDescriptor.js';
import { deepFreeze } from '../utils/freeze.js';
import { isIdentifier, stripWhitespace } from '../utils/identifiers.js';

/** Replaces `generic(name)` everywhere in `type`; untouched subtrees are returned as-is. */
export function substitute(type: TypeDescriptor, name: string, concrete: TypeDescriptor): TypeDescriptor {
  switch (type.kind) {
    case 'generic':
      return type.name === name ? concrete : type;
    case 'fixed-array': {
      const elem = substitute(type.elem, name, concrete);
      return elem === type.elem ? type : { ...type, elem };
    }
    case 'slice': {
      const elem = substitute(type.elem, name, concrete);
      return elem === type.elem ? type : { ...type, elem };
    }
    case 'wrapped': {
      const inner = substitute(type.inner, name, concrete);
      return inner === type.inner ? type : { ...type, inner };
    }
    default:
      return type;
  }
}

/** `sum` + `i32` → `sum_i32`; `std::ffi::c_int` becomes `std_ffi_c_int`. */
export function mangledName(name: string, concreteText: string): string {
  const sanitized = stripWhitespace(concreteText).replace(/::/g, '_');
  const mangled = `${name}_${sanitized}`;
  if (!isIdentifier(mangled)) {
    throw new MonomorphizationError(
      `cannot derive a symbol name for \`${name}\` over \`${concreteText}\`: \`${mangled}\` is not an identifier`,
    );
  }
  return mangled;
}

/** Concrete copy of `sig` with its type parameter bound to `concreteType`. */
export function monomorphize(sig: SignatureModel, concreteType: string): SignatureModel {
  const [param] = sig.generics;
  if (!param) {
    throw new MonomorphizationError(`\`${sig.name}\` has no type parameter to instantiate`);
  }
  const wanted = stripWhitespace(concreteType);
  const entry = sig.monomorphizeTypes.find((c) => c.text === wanted);
  if (!entry) {
    const listed = sig.monomorphizeTypes.map((c) => c.text).join(', ');
    throw new MonomorphizationError(
      `\`${concreteType}\` is not in the #[monomorphize] list of \`${sig.name}\` (${listed || 'empty'})`,
    );
  }

  const bind = (t: TypeDescriptor) => substitute(t, param.name, entry.type);
  let bindingConfig: BindingConfig | undefined = sig.bindingConfig;
  if (bindingConfig?.lowLevelReturnType) {
    bindingConfig = { ...bindingConfig, lowLevelReturnType: bind(bindingConfig.lowLevelReturnType) };
  }

  return deepFreeze({
    name: mangledName(sig.name, entry.text),
    params: sig.params.map((p) => ({ name: p.name, type: bind(p.type) })),
    returnType: bind(sig.returnType),
    generics: [],
    isAsync: sig.isAsync,
    monomorphizeTypes: [],
    ...(bindingConfig ? { bindingConfig } : {}),
    ...(sig.location ? { location: sig.location } : {}),
    instantiatedFrom: { name: sig.name, concreteType: entry.text },
  });
}

/** Every concrete signature a declaration stands for, in list order. */
export function expandSignature(sig: SignatureModel): readonly SignatureModel[] {
  if (sig.generics.length === 0) return [sig];
  if (sig.monomorphizeTypes.length === 0) {
    throw new MonomorphizationError(
      `generic \`${sig.name}\` needs a #[monomorphize(...)] list to be bound`,
    );
  }
  return sig.monomorphizeTypes.map((c) => monomorphize(sig, c.text));
}
