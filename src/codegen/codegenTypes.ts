export type SymbolLevel = 'high' | 'async' | 'low' | 'foreign';

export type SymbolParam = {
  name: string;
  /** Rust type as written in the generated code. */
  type: string;
};

export type GeneratedSymbol = {
  name: string;
  level: SymbolLevel;
  params: SymbolParam[];
  /** `()` for unit. */
  returnType: string;
  /** Foreign symbols only: the `export fn` the Zig side is expected to declare. */
  zigSignature?: string;
};

export type GeneratedBlock = {
  code: string;
  symbols: GeneratedSymbol[];
};

/** Symbols the linked artifact must export: foreign imports and low-level wrappers. */
export function exportedSymbols(symbols: readonly GeneratedSymbol[]): string[] {
  const names = symbols.filter((s) => s.level === 'foreign' || s.level === 'low').map((s) => s.name);
  return [...new Set(names)];
}
