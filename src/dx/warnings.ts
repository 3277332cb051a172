import { logWarn } from './logger.js';
import { traceWarn } from './trace.js';

export type ZigbindWarningCode =
  | 'MISSING_FOREIGN_EXPORT'
  | 'NATIVE_CPU_SUPPRESSED'
  | 'SOURCE_PARSE_RECOVERED';

export type ZigbindWarning = {
  code: ZigbindWarningCode;
  message: string;
  hint?: string;
};

export type WarningListener = (w: ZigbindWarning) => void;

const listeners = new Set<WarningListener>();

/** Registers a listener for every emitted warning; returns the unsubscribe function. */
export function onWarning(listener: WarningListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function formatWarning(w: ZigbindWarning): string {
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  return `warning(${w.code}): ${w.message}${hint}`;
}

/**
 * Emit a non-fatal warning.
 *
 * Logged when debug logging is enabled. Under Cargo (`CARGO` set) it is
 * also printed as a `cargo:warning=` line, which cargo shows to the user.
 */
export function warn(w: ZigbindWarning) {
  const text = formatWarning(w);
  logWarn(text);
  traceWarn('warning', { code: w.code, message: w.message });
  if (process.env.CARGO) {
    // eslint-disable-next-line no-console
    console.log(`cargo:warning=${text.replace(/\r?\n/g, ' ')}`);
  }
  for (const listener of listeners) listener(w);
}
