import { formatLocation, GenerationError, LoweringError, MonomorphizationError } from '../errors.js';
import { layoutsOf, type LayoutRegistry } from '../lowering/layouts.js';
import { lowerSignature } from '../lowering/lower.js';
import type { SignatureModel } from '../model/signatureTypes.js';
import { expandSignature } from '../mono/monomorphize.js';
import type { BindingBlock } from '../scanner/scannerTypes.js';
import type { GeneratedBlock, GeneratedSymbol } from './codegenTypes.js';
import {
  DEFAULT_BINDING,
  emitHighWrapper,
  emitLowWrapper,
  planLowReturn,
  RET_PRESENT,
  RET_RAW,
  wantsHigh,
  wantsLow,
  type ConcreteBinding,
} from './emitFunctions.js';
import { emitHandle } from './emitHandles.js';
import { emitRecord } from './emitRecords.js';
import { ForeignTable, readZigExports, renderForeignDecl } from './foreignSignatures.js';
import { RustWriter } from './rustWriter.js';

function located(sig: SignatureModel, err: unknown): unknown {
  if (!sig.location) return err;
  const where = formatLocation(sig.location);
  if (err instanceof LoweringError) return new LoweringError(`${where}: ${err.message}`);
  if (err instanceof MonomorphizationError) return new MonomorphizationError(`${where}: ${err.message}`);
  if (err instanceof GenerationError) return new GenerationError(`${where}: ${err.message}`);
  return err;
}

function bindConcrete(sig: SignatureModel, layouts: LayoutRegistry, rawModule: string): ConcreteBinding {
  const lowered = lowerSignature(sig, layouts);
  const reserved = lowered.slots.find((s) => s.name === RET_PRESENT || s.name === RET_RAW);
  if (reserved) {
    throw new GenerationError(`\`${sig.name}\`: parameter name \`${reserved.name}\` is reserved in generated wrappers`);
  }
  const b = { sig, lowered, config: sig.bindingConfig ?? DEFAULT_BINDING };
  planLowReturn(b, rawModule, layouts);
  return b;
}

function emitRawModule(w: RustWriter, rawModule: string, foreign: ForeignTable): void {
  w.open(`mod ${rawModule}`);
  w.line('#[allow(unused_imports)]');
  w.line('use super::*;');
  w.gap();
  w.open('extern "C"');
  for (const decl of foreign.entries()) w.line(renderForeignDecl(decl));
  w.close();
  w.close();
}

function checkNames(symbols: readonly GeneratedSymbol[], foreign: ForeignTable): void {
  const seen = new Set<string>();
  const foreignNames = new Set(foreign.entries().map((d) => d.name));
  for (const s of symbols) {
    if (s.level === 'low' && foreignNames.has(s.name)) {
      throw new GenerationError(
        `low-level wrapper \`${s.name}\` has the same symbol name as a foreign function; set a non-empty prefix_low`,
      );
    }
    if (seen.has(s.name)) {
      throw new GenerationError(
        `\`${s.name}\` is generated twice (check prefix_high, prefix_low and #[monomorphize] names)`,
      );
    }
    seen.add(s.name);
  }
}

/**
 * Rust code for one binding block: records and handles, the raw import
 * module, then the high- and low-level wrappers of every concrete signature.
 */
export function generateBlock(block: BindingBlock): GeneratedBlock {
  const { declarations, rawModule } = block;
  const layouts = layoutsOf(declarations.records);
  const foreign = new ForeignTable();

  const types = new RustWriter();
  for (const record of declarations.records) {
    types.gap();
    emitRecord(types, record);
  }
  const handleCtx = { rawModule, layouts, foreign, zigExports: readZigExports(block.source.code) };
  for (const handle of declarations.handles) {
    types.gap();
    emitHandle(types, handle, handleCtx);
  }

  const wrappers = new RustWriter();
  const symbols: GeneratedSymbol[] = [];
  for (const declared of declarations.signatures) {
    try {
      for (const sig of expandSignature(declared)) {
        const b = bindConcrete(sig, layouts, rawModule);
        foreign.add({
          name: b.lowered.name,
          slots: b.lowered.slots,
          rust: b.lowered.foreignReturn,
          zig: b.lowered.zigReturn,
        });
        if (wantsHigh(b.config)) {
          wrappers.gap();
          symbols.push(emitHighWrapper(wrappers, b, rawModule));
        }
        if (wantsLow(b.config)) {
          wrappers.gap();
          symbols.push(emitLowWrapper(wrappers, b, rawModule, layouts));
        }
      }
    } catch (err) {
      throw located(declared, err);
    }
  }
  checkNames(symbols, foreign);

  const raw = new RustWriter();
  if (foreign.size) emitRawModule(raw, rawModule, foreign);

  const code = [types, raw, wrappers]
    .map((w) => w.toString())
    .filter(Boolean)
    .join('\n');
  return { code, symbols: [...symbols, ...foreign.symbols()] };
}
