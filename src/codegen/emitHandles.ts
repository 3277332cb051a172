import { GenerationError } from '../errors.js';
import type { LayoutRegistry } from '../lowering/layouts.js';
import { lowerSignature, type LoweredSignature, type LoweredSlot } from '../lowering/lower.js';
import type { HandleDecl, HandleMethod } from '../model/signatureTypes.js';
import { renderType, UNIT } from '../model/typeDescriptor.js';
import { emitCall, renderParams } from './emitFunctions.js';
import { declFromZigExport, type ForeignTable, type ZigExport } from './foreignSignatures.js';
import type { RustWriter } from './rustWriter.js';

const VOID_PTR = '*mut std::ffi::c_void';
const CONST_VOID_PTR = '*const std::ffi::c_void';
const SELF_PTR = 'self_ptr';

export type HandleContext = {
  rawModule: string;
  layouts: LayoutRegistry;
  foreign: ForeignTable;
  /** `export fn` declarations of the block's Zig source. */
  zigExports: ReadonlyMap<string, ZigExport>;
};

function lowerMethod(m: HandleMethod, layouts: LayoutRegistry): LoweredSignature {
  return lowerSignature(
    {
      name: m.foreignName,
      params: m.params,
      returnType: m.returnType ?? UNIT,
      generics: [],
      isAsync: false,
      monomorphizeTypes: [],
    },
    layouts,
  );
}

function selfSlot(m: HandleMethod): LoweredSlot {
  return m.receiver === 'mut'
    ? { name: SELF_PTR, rust: VOID_PTR, zig: '?*anyopaque' }
    : { name: SELF_PTR, rust: CONST_VOID_PTR, zig: '?*const anyopaque' };
}

function selfArg(m: HandleMethod): string {
  return m.receiver === 'mut' ? 'self.inner.as_ptr()' : `self.inner.as_ptr() as ${CONST_VOID_PTR}`;
}

function receiverText(m: HandleMethod): string {
  if (m.receiver === 'ref') return '&self';
  if (m.receiver === 'mut') return '&mut self';
  return '';
}

function methodHead(m: HandleMethod, visibility: string): string {
  const params = [receiverText(m), renderParams(m.params)].filter(Boolean).join(', ');
  const ret = m.returnType && renderType(m.returnType) !== '()' ? ` -> ${renderType(m.returnType)}` : '';
  return `${visibility}fn ${m.name}(${params})${ret}`;
}

function emitMethod(w: RustWriter, handle: HandleDecl, m: HandleMethod, ctx: HandleContext, visibility: string): void {
  if (m.body !== undefined) {
    const exp = ctx.zigExports.get(m.foreignName);
    if (!exp) {
      throw new GenerationError(
        `\`${handle.name}::${m.name}\` calls \`${m.foreignName}\`, but the block's Zig source has no \`export fn ${m.foreignName}\``,
      );
    }
    ctx.foreign.add(declFromZigExport(exp));
    w.open(methodHead(m, visibility));
    w.line(`use ${ctx.rawModule}::*;`);
    w.snippet(`unsafe ${m.body}`);
    w.close();
    return;
  }

  const lowered = lowerMethod(m, ctx.layouts);
  const withSelf = handle.kind === 'opaque';
  const slots = withSelf ? [selfSlot(m), ...lowered.slots] : lowered.slots;
  if (withSelf && lowered.slots.some((s) => s.name === SELF_PTR)) {
    throw new GenerationError(`\`${handle.name}::${m.name}\`: parameter name \`${SELF_PTR}\` is reserved`);
  }
  ctx.foreign.add({ name: m.foreignName, slots, rust: lowered.foreignReturn, zig: lowered.zigReturn });

  const encoded = lowered.params.flatMap((p) => p.encode);
  w.open(methodHead(m, visibility));
  emitCall(w, {
    callee: `${ctx.rawModule}::${m.foreignName}`,
    prelude: lowered.params.flatMap((p) => p.prelude),
    args: withSelf ? [selfArg(m), ...encoded] : encoded,
    ret: lowered.ret,
  });
  w.close();
}

function emitOpaque(w: RustWriter, handle: HandleDecl, ctx: HandleContext): void {
  const { name, ctor, dtor } = handle;
  w.open(`pub struct ${name}`);
  w.line('inner: std::ptr::NonNull<std::ffi::c_void>,');
  w.line('_marker: std::marker::PhantomData<*mut ()>,');
  w.close();

  if (ctor || handle.methods.length) {
    w.gap();
    w.open(`impl ${name}`);
    if (ctor) {
      const lowered = lowerMethod(ctor, ctx.layouts);
      ctx.foreign.add({ name: ctor.foreignName, slots: lowered.slots, rust: VOID_PTR, zig: '?*anyopaque' });
      w.open(`pub fn ${ctor.name}(${renderParams(ctor.params)}) -> Self`);
      const args = lowered.params.flatMap((p) => p.encode).join(', ');
      w.lines(lowered.params.flatMap((p) => p.prelude));
      w.line(`let ptr = unsafe { ${ctx.rawModule}::${ctor.foreignName}(${args}) };`);
      w.open('Self');
      w.line('inner: std::ptr::NonNull::new(ptr).expect("foreign constructor returned null"),');
      w.line('_marker: std::marker::PhantomData,');
      w.close();
      w.close();
    }
    handle.methods.forEach((m, i) => {
      if (ctor || i > 0) w.gap();
      emitMethod(w, handle, m, ctx, 'pub ');
    });
    w.close();
  }

  if (dtor) {
    ctx.foreign.add({
      name: dtor.foreignName,
      slots: [{ name: SELF_PTR, rust: VOID_PTR, zig: '?*anyopaque' }],
      rust: null,
      zig: 'void',
    });
    w.gap();
    w.open(`impl Drop for ${name}`);
    w.open('fn drop(&mut self)');
    w.line(`unsafe { ${ctx.rawModule}::${dtor.foreignName}(self.inner.as_ptr()) }`);
    w.close();
    w.close();
  }

  if (ctor && ctor.params.length === 0) {
    w.gap();
    w.open(`impl Default for ${name}`);
    w.open('fn default() -> Self');
    w.line(`Self::${ctor.name}()`);
    w.close();
    w.close();
  }
}

function emitStateless(w: RustWriter, handle: HandleDecl, ctx: HandleContext): void {
  w.line('#[derive(Default, Debug, Clone, Copy)]');
  w.line(`pub struct ${handle.name};`);
  if (handle.methods.length) {
    w.gap();
    w.open(`impl ${handle.name}`);
    handle.methods.forEach((m, i) => {
      if (i > 0) w.gap();
      emitMethod(w, handle, m, ctx, 'pub ');
    });
    w.close();
  }
}

/** Owning or zero-sized host type with its inherent and trait impls. */
export function emitHandle(w: RustWriter, handle: HandleDecl, ctx: HandleContext): void {
  if (handle.kind === 'opaque') emitOpaque(w, handle, ctx);
  else emitStateless(w, handle, ctx);

  for (const impl of handle.traitImpls) {
    w.gap();
    w.open(`impl ${impl.traitPath} for ${handle.name}`);
    impl.methods.forEach((m, i) => {
      if (i > 0) w.gap();
      emitMethod(w, handle, m, ctx, '');
    });
    w.close();
  }
}
