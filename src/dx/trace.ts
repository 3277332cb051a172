import { performance } from 'node:perf_hooks';

import type { GeneratedSymbol } from '../codegen/codegenTypes.js';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

export type TraceData = Record<string, unknown>;

function envTraceEnabled(): boolean {
  const v = process.env.ZIGBIND_TRACE;
  return v === '1' || v === 'true' || v === 'yes';
}

function envTraceLevel(): TraceLevel {
  const v = (process.env.ZIGBIND_TRACE_LEVEL ?? '').toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  // Default to info so tracing is helpful without being too noisy.
  return 'info';
}

const order: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isTraceEnabled(): boolean {
  return envTraceEnabled();
}

export function shouldTrace(level: TraceLevel): boolean {
  if (!envTraceEnabled()) return false;
  return order[level] <= order[envTraceLevel()];
}

export function trace(level: TraceLevel, event: string, data?: TraceData) {
  if (!shouldTrace(level)) return;

  const payload: TraceData = {
    t: Number(performance.now().toFixed(3)),
    pid: process.pid,
    level,
    event,
  };
  if (data !== undefined) payload.data = data;

  // stdout carries cargo directives
  // eslint-disable-next-line no-console
  console.error('[zigbind:trace]', JSON.stringify(payload));
}

export function traceError(event: string, data?: TraceData) {
  trace('error', event, data);
}

export function traceWarn(event: string, data?: TraceData) {
  trace('warn', event, data);
}

export function traceInfo(event: string, data?: TraceData) {
  trace('info', event, data);
}

export function traceDebug(event: string, data?: TraceData) {
  trace('debug', event, data);
}

/** `name(a: T, b: U) -> R`, the way the generated Rust spells it. */
export function formatSymbolSignature(symbol: GeneratedSymbol): string {
  const args = symbol.params.map((p) => `${p.name}: ${p.type}`).join(', ');
  const ret = symbol.returnType === '()' ? '' : ` -> ${symbol.returnType}`;
  return `${symbol.name}(${args})${ret}`;
}
