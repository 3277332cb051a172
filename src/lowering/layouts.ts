import type { RecordDecl, RecordLayout } from '../model/signatureTypes.js';

/** Record name → declared layout (`null`: declared without `#[repr]`). */
export type LayoutRegistry = ReadonlyMap<string, RecordLayout | null>;

export const EMPTY_LAYOUTS: LayoutRegistry = new Map();

export function layoutsOf(records: readonly RecordDecl[]): LayoutRegistry {
  return new Map(records.map((r) => [r.name, r.layout]));
}

export function hasFixedLayout(layouts: LayoutRegistry, name: string): boolean {
  const layout = layouts.get(name);
  return layout !== undefined && layout !== null;
}
