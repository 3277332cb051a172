import { GenerationError } from '../errors.js';
import { lowerReturn, RET_OUT, type LoweredSignature, type ReturnRecipe } from '../lowering/lower.js';
import type { LayoutRegistry } from '../lowering/layouts.js';
import { isNumericScalar } from '../lowering/zigTypes.js';
import {
  DEFAULT_PREFIX_HIGH,
  DEFAULT_PREFIX_LOW,
  type BindingConfig,
  type Param,
  type SignatureModel,
} from '../model/signatureTypes.js';
import { isUnit, renderType, type TypeDescriptor } from '../model/typeDescriptor.js';
import { offloadParam } from './asyncOffload.js';
import type { GeneratedSymbol } from './codegenTypes.js';
import type { RustWriter } from './rustWriter.js';

export const RET_PRESENT = 'ret_present';
export const RET_RAW = 'ret_raw';

export const DEFAULT_BINDING: BindingConfig = Object.freeze({
  strategy: 'high-only',
  prefixHigh: DEFAULT_PREFIX_HIGH,
  prefixLow: DEFAULT_PREFIX_LOW,
});

/** Everything a foreign call site needs. */
export type CallPlan = {
  /** `ffi::name` */
  callee: string;
  prelude: readonly string[];
  args: readonly string[];
  ret: ReturnRecipe;
};

/** Encodes, calls and decodes; the last line is the value of the enclosing block. */
export function emitCall(w: RustWriter, plan: CallPlan): void {
  w.lines(plan.prelude);
  if (plan.ret.kind === 'out-param') {
    const args = [...plan.args, `${RET_OUT}.as_mut_ptr()`].join(', ');
    w.line(`let mut ${RET_OUT} = std::mem::MaybeUninit::<${plan.ret.valueRust}>::uninit();`);
    w.line(`let ${RET_PRESENT} = unsafe { ${plan.callee}(${args}) };`);
    w.line(`if ${RET_PRESENT} { Some(unsafe { ${RET_OUT}.assume_init() }) } else { None }`);
    return;
  }
  w.line(`unsafe { ${plan.callee}(${plan.args.join(', ')}) }`);
}

export function renderParams(params: readonly Param[]): string {
  return params.map((p) => `${p.name}: ${renderType(p.type)}`).join(', ');
}

export function returnSuffix(t: TypeDescriptor): string {
  return isUnit(t) ? '' : ` -> ${renderType(t)}`;
}

export type ConcreteBinding = {
  sig: SignatureModel;
  lowered: LoweredSignature;
  config: BindingConfig;
};

export function wantsHigh(config: BindingConfig): boolean {
  return config.strategy !== 'low-only';
}

export function wantsLow(config: BindingConfig): boolean {
  return config.strategy !== 'high-only';
}

function callPlan(b: ConcreteBinding, rawModule: string): CallPlan {
  return {
    callee: `${rawModule}::${b.lowered.name}`,
    prelude: b.lowered.params.flatMap((p) => p.prelude),
    args: b.lowered.params.flatMap((p) => p.encode),
    ret: b.lowered.ret,
  };
}

/** `pub fn` (or `pub async fn`) taking the declared types. */
export function emitHighWrapper(w: RustWriter, b: ConcreteBinding, rawModule: string): GeneratedSymbol {
  const { sig, config } = b;
  const name = `${config.prefixHigh}${sig.name}`;
  const head = `pub ${sig.isAsync ? 'async ' : ''}fn ${name}(${renderParams(sig.params)})${returnSuffix(sig.returnType)}`;
  const plan = callPlan(b, rawModule);

  w.open(head);
  if (sig.isAsync) {
    const offloads = sig.params.map((p) => offloadParam(sig.name, p));
    for (const o of offloads) if (o.own) w.line(o.own);
    w.open('tokio::task::spawn_blocking(move ||');
    for (const o of offloads) if (o.borrow) w.line(o.borrow);
    emitCall(w, plan);
    w.close(')');
    w.line('.await');
    w.line('.expect("blocking task panicked")');
  } else {
    emitCall(w, plan);
  }
  w.close();

  return {
    name,
    level: sig.isAsync ? 'async' : 'high',
    params: sig.params.map((p) => ({ name: p.name, type: renderType(p.type) })),
    returnType: renderType(sig.returnType),
  };
}

const PATH_RE = /^(?:::)?[A-Za-z_][A-Za-z0-9_]*(?:::[A-Za-z_][A-Za-z0-9_]*)*$/;
const CLOSURE_RE = /^(?:move\s+)?\|([^|]*)\|/;

/** A `map_fn` must take exactly one value: a one-parameter closure or a function path. */
function checkTransform(fnName: string, transform: string): string {
  if (PATH_RE.test(transform)) return transform;
  const closure = transform.match(CLOSURE_RE);
  if (closure) {
    const params = closure[1].trim();
    if (params && !/[,(]/.test(params)) return transform;
  }
  throw new GenerationError(
    `\`${fnName}\`: map_fn \`${transform}\` must be a one-parameter closure or a function path`,
  );
}

function lowReturn(b: ConcreteBinding, layouts: LayoutRegistry): string | null {
  const { sig, config, lowered } = b;
  const cRet = config.lowLevelReturnType;
  if (!cRet) return lowered.foreignReturn;
  const recipe = lowerReturn(cRet, layouts);
  if (recipe.kind === 'out-param') {
    throw new GenerationError(`\`${sig.name}\`: c_ret \`${renderType(cRet)}\` must be a scalar or a C-layout record`);
  }
  return recipe.kind === 'void' ? null : recipe.rust;
}

type LowReturnPlan = {
  /** `null` for `()` */
  ret: string | null;
  body: string[];
};

/**
 * Return type and body of the low-level wrapper. Checks `c_ret` and
 * `map_fn` whether or not the strategy emits that wrapper.
 */
export function planLowReturn(b: ConcreteBinding, rawModule: string, layouts: LayoutRegistry): LowReturnPlan {
  const { sig, config, lowered } = b;
  const ret = lowReturn(b, layouts);
  const foreign = lowered.foreignReturn;
  const call = `unsafe { ${rawModule}::${lowered.name}(${lowered.slots.map((s) => s.name).join(', ')}) }`;

  const transform = config.returnTransform;
  if (transform !== undefined) {
    return { ret, body: [`let ${RET_RAW} = ${call};`, `(${checkTransform(sig.name, transform)})(${RET_RAW})`] };
  }
  if (ret === foreign) return { ret, body: [call] };
  if (ret !== null && foreign !== null && isNumericScalar(ret) && (isNumericScalar(foreign) || foreign === 'bool')) {
    return { ret, body: [`let ${RET_RAW} = ${call};`, `${RET_RAW} as ${ret}`] };
  }
  throw new GenerationError(
    `\`${sig.name}\`: c_ret \`${ret ?? '()'}\` differs from the foreign return \`${foreign ?? '()'}\` ` +
      'and no map_fn converts it',
  );
}

/** `#[no_mangle] pub extern "C" fn` over the lowered slots. */
export function emitLowWrapper(
  w: RustWriter,
  b: ConcreteBinding,
  rawModule: string,
  layouts: LayoutRegistry,
): GeneratedSymbol {
  const { sig, config, lowered } = b;
  const name = `${config.prefixLow}${sig.name}`;
  const { ret, body } = planLowReturn(b, rawModule, layouts);
  const params = lowered.slots.map((s) => `${s.name}: ${s.rust}`).join(', ');

  w.line('#[no_mangle]');
  w.open(`pub extern "C" fn ${name}(${params})${ret === null ? '' : ` -> ${ret}`}`);
  w.lines(body);
  w.close();

  return {
    name,
    level: 'low',
    params: lowered.slots.map((s) => ({ name: s.name, type: s.rust })),
    returnType: ret ?? '()',
  };
}
