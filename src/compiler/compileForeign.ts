import { spawnSync } from 'node:child_process';
import { mkdirSync } from 'node:fs';

import { CompilerFailedError, CompilerMissingError, type CompilerDiagnostic } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { traceError, traceInfo } from '../dx/trace.js';
import type { CompileRequest, CompileResult, CompilerInfo, ForeignCompiler } from './compilerTypes.js';
import { detectPlatform, type PlatformInfo } from './detectPlatform.js';
import { buildCompileCommand } from './buildCommand.js';

const SEVERITIES = new Set(['error', 'warning', 'note']);

function isSeverity(s: string): s is CompilerDiagnostic['severity'] {
  return SEVERITIES.has(s);
}

export function parseDiagnostics(text: string): CompilerDiagnostic[] {
  // zig and clang: path:line:col: error: message
  // zig build summary: error: message
  const out: CompilerDiagnostic[] = [];
  const located = /^(.*?):(\d+):(\d+):\s*(warning|error|note):\s*(.*)$/;
  const bare = /^(error|warning|note)(?:\[[^\]]+\])?:\s*(.*)$/;

  for (const l of text.split(/\r?\n/)) {
    const m = l.match(located);
    if (m && isSeverity(m[4])) {
      out.push({ file: m[1], line: Number(m[2]), col: Number(m[3]), severity: m[4], message: m[5], raw: l });
      continue;
    }

    const m2 = l.match(bare);
    if (m2 && isSeverity(m2[1])) {
      out.push({ severity: m2[1], message: m2[2], raw: l });
    }
  }

  return out;
}

export function formatDiagnostics(diags: readonly CompilerDiagnostic[]): string {
  const lines: string[] = [];
  for (const d of diags) {
    const loc = d.file && d.line != null ? `${d.file}:${d.line}:${d.col ?? 0}` : d.file ?? '';
    const head = loc ? `${loc} - ${d.severity}` : d.severity;
    const msg = d.message ? `: ${d.message}` : '';
    lines.push(`${head}${msg}`);
  }
  return lines.join('\n');
}

/** Runs the compiler once; a non-zero exit throws with the output unmodified. */
export function compileForeign(
  compiler: CompilerInfo,
  platform: PlatformInfo,
  request: CompileRequest,
): CompileResult {
  mkdirSync(request.outDir, { recursive: true });
  const cmd = buildCompileCommand(platform, request);
  const command = [compiler.path, ...cmd.args];

  logDebug('compile', { cmd: command, cwd: cmd.cwd });
  traceInfo('build.compile', { compiler: compiler.path, args: cmd.args });

  const run = spawnSync(compiler.path, cmd.args, {
    cwd: cmd.cwd,
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  if (run.error) {
    if ('code' in run.error && run.error.code === 'ENOENT') {
      throw new CompilerMissingError(`Zig compiler not found: ${compiler.path}`);
    }
    throw run.error;
  }

  const output = [run.stderr, run.stdout].filter(Boolean).join('\n').trim();
  if (run.status !== 0) {
    const diagnostics = parseDiagnostics(output);
    traceError('build.compile.failed', { status: run.status, diagnostics: diagnostics.length });
    throw new CompilerFailedError(output || `zig exited with ${run.status ?? run.signal}`, diagnostics, run.status);
  }
  if (output) logDebug('compiler output', output);

  return { artifactPath: cmd.artifactPath, command };
}

/** The real `zig` behind the `ForeignCompiler` seam. */
export function createZigCompiler(info: CompilerInfo, platform: PlatformInfo = detectPlatform()): ForeignCompiler {
  return {
    info,
    compile: (request) => compileForeign(info, platform, request),
  };
}
