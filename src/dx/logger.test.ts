import { describe, it, expect, afterEach, vi } from 'vitest';

import { isDebugEnabled, logDebug, logInfo, setDebugEnabled } from './logger.js';
import { formatWarning, onWarning, warn, type ZigbindWarning } from './warnings.js';

describe('dx logger', () => {
  const prev = process.env.ZIGBIND_DEBUG;

  afterEach(() => {
    setDebugEnabled(false);
    if (prev == null) delete process.env.ZIGBIND_DEBUG;
    else process.env.ZIGBIND_DEBUG = prev;
    vi.restoreAllMocks();
  });

  it('is disabled by default', () => {
    delete process.env.ZIGBIND_DEBUG;
    expect(isDebugEnabled()).toBe(false);
  });

  it('enables via env var', () => {
    process.env.ZIGBIND_DEBUG = '1';
    expect(isDebugEnabled()).toBe(true);
  });

  it('enables via setter (tests)', () => {
    delete process.env.ZIGBIND_DEBUG;
    setDebugEnabled(true);
    expect(isDebugEnabled()).toBe(true);
  });

  it('prefixes output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setDebugEnabled(true);
    logDebug('scan', 3);
    expect(log).toHaveBeenCalledWith('[zigbind]', 'scan', 3);
  });

  it('keeps info quiet unless debug is on', () => {
    delete process.env.ZIGBIND_DEBUG;
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logInfo('build finished', { blocks: 1 });
    expect(log).not.toHaveBeenCalled();
    setDebugEnabled(true);
    logInfo('build finished', { blocks: 1 });
    expect(log).toHaveBeenCalledWith('[zigbind]', 'build finished', { blocks: 1 });
  });
});

describe('dx warnings', () => {
  const prevCargo = process.env.CARGO;

  afterEach(() => {
    if (prevCargo == null) delete process.env.CARGO;
    else process.env.CARGO = prevCargo;
    vi.restoreAllMocks();
  });

  const w: ZigbindWarning = {
    code: 'MISSING_FOREIGN_EXPORT',
    message: 'no `export fn add` in src/lib.rs:3',
    hint: 'declare it in the fragment',
  };

  it('formats code, message and hint', () => {
    expect(formatWarning(w)).toBe(
      'warning(MISSING_FOREIGN_EXPORT): no `export fn add` in src/lib.rs:3 Hint: declare it in the fragment',
    );
  });

  it('is silent outside cargo and notifies listeners', () => {
    delete process.env.CARGO;
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const seen: ZigbindWarning[] = [];
    const off = onWarning((x) => seen.push(x));
    warn(w);
    off();
    warn(w);
    expect(seen).toEqual([w]);
    expect(log).not.toHaveBeenCalled();
  });

  it('prints a cargo:warning line under cargo', () => {
    process.env.CARGO = '/usr/bin/cargo';
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    warn({ code: 'NATIVE_CPU_SUPPRESSED', message: 'target-cpu=native\nignored' });
    expect(log).toHaveBeenCalledWith('cargo:warning=warning(NATIVE_CPU_SUPPRESSED): target-cpu=native ignored');
  });
});
