import { GenerationError } from '../errors.js';
import type { Param } from '../model/signatureTypes.js';
import { renderType, type TypeDescriptor } from '../model/typeDescriptor.js';
import { isPointerScalar } from '../lowering/zigTypes.js';

/** Statements that move one parameter into a `spawn_blocking` closure and borrow it back inside. */
export type Offload = {
  /** Before the closure: turn the borrow into an owned value. */
  own?: string;
  /** First thing inside the closure: restore the declared type. */
  borrow?: string;
};

function isMutableBorrow(t: TypeDescriptor): boolean {
  switch (t.kind) {
    case 'slice':
    case 'text':
      return t.mutable;
    case 'wrapped':
      return t.wrapper === 'mutable-reference' || isMutableBorrow(t.inner);
    default:
      return false;
  }
}

function hasRawPointer(t: TypeDescriptor): boolean {
  switch (t.kind) {
    case 'scalar':
      return isPointerScalar(t.name);
    case 'fixed-array':
    case 'slice':
      return hasRawPointer(t.elem);
    case 'wrapped':
      return hasRawPointer(t.inner);
    default:
      return false;
  }
}

export function offloadParam(fnName: string, p: Param): Offload {
  const x = p.name;
  const t = p.type;
  const shown = `${x}: ${renderType(t)}`;
  if (isMutableBorrow(t)) {
    throw new GenerationError(
      `async \`${fnName}\`: \`${shown}\` is a mutable borrow and cannot be moved to the blocking pool`,
    );
  }
  if (hasRawPointer(t)) {
    throw new GenerationError(`async \`${fnName}\`: \`${shown}\` holds a raw pointer, which is not Send`);
  }

  switch (t.kind) {
    case 'slice':
      return { own: `let ${x} = ${x}.to_vec();`, borrow: `let ${x} = &${x}[..];` };
    case 'text':
      return { own: `let ${x} = ${x}.to_owned();`, borrow: `let ${x} = ${x}.as_str();` };
    case 'wrapped': {
      if (t.wrapper === 'reference') {
        return { own: `let ${x} = *${x};`, borrow: `let ${x} = &${x};` };
      }
      const inner = t.wrapper === 'optional' ? t.inner : null;
      if (inner?.kind === 'slice') {
        return { own: `let ${x} = ${x}.map(|v| v.to_vec());`, borrow: `let ${x} = ${x}.as_deref();` };
      }
      if (inner?.kind === 'text') {
        return { own: `let ${x} = ${x}.map(|v| v.to_owned());`, borrow: `let ${x} = ${x}.as_deref();` };
      }
      if (inner?.kind === 'wrapped') {
        return { own: `let ${x} = ${x}.copied();`, borrow: `let ${x} = ${x}.as_ref();` };
      }
      return {};
    }
    default:
      return {};
  }
}
