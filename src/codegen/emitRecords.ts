import type { RecordDecl } from '../model/signatureTypes.js';
import type { RustWriter } from './rustWriter.js';

const DERIVE_RE = /#\[\s*derive\s*\(/;

/** Re-emits a declared struct/enum, adding `Debug, Clone, Copy` when it derives nothing. */
export function emitRecord(w: RustWriter, record: RecordDecl): void {
  if (!DERIVE_RE.test(record.source)) w.line('#[derive(Debug, Clone, Copy)]');
  w.snippet(record.source);
}
