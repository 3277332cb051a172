export type ZigbindErrorCode =
  | 'PARSE_ERROR'
  | 'SCAN_ERROR'
  | 'LOWERING_ERROR'
  | 'MONOMORPHIZATION_ERROR'
  | 'GENERATION_ERROR'
  | 'COMPILER_FAILED'
  | 'COMPILER_MISSING'
  | 'TARGET_UNMAPPED'
  | 'CONFIG_ERROR';

export type SourceLocation = {
  file?: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
};

export function formatLocation(loc: SourceLocation): string {
  return `${loc.file ?? '<declarations>'}:${loc.line}:${loc.column}`;
}

export class ZigbindError extends Error {
  readonly code: ZigbindErrorCode;

  constructor(code: ZigbindErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ParseError extends ZigbindError {
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation) {
    super('PARSE_ERROR', `${formatLocation(location)}: ${message}`);
    this.location = location;
  }
}

export class ScanError extends ZigbindError {
  constructor(message: string) {
    super('SCAN_ERROR', message);
  }
}

export class LoweringError extends ZigbindError {
  constructor(message: string) {
    super('LOWERING_ERROR', message);
  }
}

export class MonomorphizationError extends ZigbindError {
  constructor(message: string) {
    super('MONOMORPHIZATION_ERROR', message);
  }
}

export class ConfigError extends ZigbindError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class GenerationError extends ZigbindError {
  constructor(message: string) {
    super('GENERATION_ERROR', message);
  }
}

export type CompilerDiagnostic = {
  file?: string;
  line?: number;
  col?: number;
  severity: 'error' | 'warning' | 'note';
  message: string;
  raw: string;
};

export class BuildError extends ZigbindError {}

/** Non-zero compiler exit. `message` carries the compiler output unmodified. */
export class CompilerFailedError extends BuildError {
  readonly diagnostics: CompilerDiagnostic[];
  readonly exitCode: number | null;

  constructor(output: string, diagnostics: CompilerDiagnostic[], exitCode: number | null) {
    super('COMPILER_FAILED', output);
    this.diagnostics = diagnostics;
    this.exitCode = exitCode;
  }
}

export class CompilerMissingError extends BuildError {
  constructor(message: string) {
    super('COMPILER_MISSING', message);
  }
}

export class TargetUnmappedError extends BuildError {
  readonly triple: string;
  readonly knownTriples: readonly string[];

  constructor(triple: string, knownTriples: readonly string[]) {
    super(
      'TARGET_UNMAPPED',
      `No Zig target known for Rust target triple '${triple}'.\n` +
        `Known triples:\n${knownTriples.map((t) => `  - ${t}`).join('\n')}`,
    );
    this.triple = triple;
    this.knownTriples = knownTriples;
  }
}
