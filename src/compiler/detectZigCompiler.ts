import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';

import { CompilerMissingError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { which } from '../utils/which.js';
import type { CompilerInfo } from './compilerTypes.js';

function getVersion(path: string): string {
  try {
    return execFileSync(path, ['version'], { encoding: 'utf8' }).split('\n')[0].trim() || 'unknown';
  } catch (err) {
    logDebug('zig version failed', { path, err: String(err) });
    return 'unknown';
  }
}

/**
 * Locates the Zig executable: an explicit path (from options, `ZIG_PATH`
 * or the config file) wins over `PATH`.
 */
export function detectZigCompiler(zigPath?: string): CompilerInfo {
  let resolved: string | null;
  if (zigPath) {
    const isPath = zigPath.includes('/') || zigPath.includes('\\');
    resolved = isPath ? (existsSync(zigPath) ? zigPath : null) : which(zigPath);
    if (!resolved) throw new CompilerMissingError(`Zig compiler not found at '${zigPath}'`);
  } else {
    resolved = which('zig');
    if (!resolved) {
      throw new CompilerMissingError('Zig compiler not found on PATH; install Zig or set ZIG_PATH');
    }
  }

  return { kind: 'zig', path: resolved, version: getVersion(resolved) };
}
