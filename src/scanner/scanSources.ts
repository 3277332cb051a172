import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { dirname, extname, join, relative, resolve, sep } from 'node:path';

import { ScanError } from '../errors.js';
import { traceDebug, traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import { logDebug } from '../dx/logger.js';
import { parseDeclarations } from '../parser/index.js';
import { extractInvocations, splitEmbedded, type Invocation } from './extractInvocations.js';
import type { BindingBlock, ScanResult, StandaloneZigFile } from './scannerTypes.js';

export type ScanOptions = {
  /** Directory `zigbind_include!` paths are resolved against. */
  manifestDir?: string;
};

const SKIPPED_DIRS = new Set(['target']);

function toPosix(p: string): string {
  return p.split(sep).join('/');
}

/** `math/mod.rs` -> `math_mod`; usable as a Rust module name. */
export function moduleStem(path: string): string {
  const noExt = path.replace(/\.[A-Za-z0-9]+$/, '');
  const s = noExt.replace(/[^A-Za-z0-9_]+/g, '_').replace(/^_+|_+$/g, '').toLowerCase();
  if (!s) return 'zig';
  return /^[0-9]/.test(s) ? `_${s}` : s;
}

type Found = { rs: string[]; zig: string[]; c: string[] };

function walk(root: string): Found {
  const found: Found = { rs: [], zig: [], c: [] };

  function visit(dir: string) {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
    for (const ent of entries) {
      const p = join(dir, ent.name);
      if (ent.isDirectory()) {
        if (ent.name.startsWith('.') || SKIPPED_DIRS.has(ent.name)) continue;
        visit(p);
      } else if (ent.isFile()) {
        const ext = extname(ent.name);
        if (ext === '.rs') found.rs.push(p);
        else if (ext === '.zig') found.zig.push(p);
        else if (ext === '.c') found.c.push(p);
      }
    }
  }

  visit(root);
  return found;
}

function readBlock(
  inv: Invocation,
  file: string,
  index: number,
  manifestDir: string,
): BindingBlock {
  const moduleName = `${moduleStem(file)}_${index}`;

  if (inv.kind === 'embedded') {
    const parts = splitEmbedded(inv.body);
    return {
      file,
      line: inv.line,
      moduleName,
      rawModule: 'ffi',
      source: { kind: 'embedded', code: parts.zig },
      declarations: parseDeclarations(parts.decls, {
        file,
        baseLine: inv.bodyLine + parts.declsOffset,
        baseColumn: 1,
      }),
    };
  }

  const absolutePath = resolve(manifestDir, inv.path);
  if (!existsSync(absolutePath)) {
    throw new ScanError(`${file}:${inv.line}: included file \`${inv.path}\` not found (looked in ${absolutePath})`);
  }
  return {
    file,
    line: inv.line,
    moduleName,
    rawModule: `ffi_${moduleStem(inv.path)}`,
    source: { kind: 'external', path: inv.path, absolutePath, code: readFileSync(absolutePath, 'utf8') },
    declarations: parseDeclarations(inv.decls, {
      file,
      baseLine: inv.declsLine,
      baseColumn: inv.declsColumn,
    }),
  };
}

/**
 * Binding blocks of one host file. `file` is the name used in locations;
 * module names are numbered from `firstIndex`.
 */
export function readHostFile(path: string, file: string, manifestDir: string, firstIndex = 0): BindingBlock[] {
  const { invocations, recovered } = extractInvocations(readFileSync(path, 'utf8'), file);
  if (recovered) {
    warn({
      code: 'SOURCE_PARSE_RECOVERED',
      message: `${file} has syntax errors; binding blocks were read from the recovered tree`,
      hint: 'fix the host file if a block is missing from the generated bindings',
    });
  }
  if (invocations.length) traceDebug('scan.file', { file, blocks: invocations.length });
  return invocations.map((inv, i) => readBlock(inv, file, firstIndex + i, manifestDir));
}

/**
 * Walks `root` for host sources, Zig files and auxiliary C sources, and
 * reads every binding block. An empty or missing root yields an empty scan.
 */
export function scanSources(root: string, options: ScanOptions = {}): ScanResult {
  const absRoot = resolve(root);
  const manifestDir = resolve(options.manifestDir ?? (process.env.CARGO_MANIFEST_DIR || dirname(absRoot)));
  traceInfo('scan.start', { root: absRoot, manifestDir });

  const found: Found = existsSync(absRoot) ? walk(absRoot) : { rs: [], zig: [], c: [] };
  const blocks: BindingBlock[] = [];

  for (const path of found.rs) {
    const file = toPosix(relative(absRoot, path));
    blocks.push(...readHostFile(path, file, manifestDir, blocks.length));
  }

  const included = new Set(
    blocks.flatMap((b) => (b.source.kind === 'external' ? [b.source.absolutePath] : [])),
  );
  const standaloneZig: StandaloneZigFile[] = found.zig
    .filter((p) => !included.has(p))
    .map((p) => ({ path: toPosix(relative(manifestDir, p)), absolutePath: p, code: readFileSync(p, 'utf8') }));

  logDebug('scan', { root: absRoot, hostFiles: found.rs.length, blocks: blocks.length });
  traceInfo('scan.done', {
    hostFiles: found.rs.length,
    blocks: blocks.length,
    standaloneZig: standaloneZig.length,
    auxiliarySources: found.c.length,
  });

  return {
    root: absRoot,
    manifestDir,
    hostFiles: found.rs,
    blocks,
    standaloneZig,
    auxiliarySources: found.c,
  };
}
