import { accessSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** First executable named `cmd` on `PATH` (with `PATHEXT` suffixes on Windows). */
export function which(cmd: string, env: Record<string, string | undefined> = process.env): string | null {
  const paths = env.PATH?.split(delimiter).filter(Boolean) ?? [];
  const exts = process.platform === 'win32' ? ['', ...(env.PATHEXT ?? '.EXE').split(';')] : [''];
  for (const p of paths) {
    for (const ext of exts) {
      const full = join(p, cmd + ext);
      if (isExecutable(full)) return full;
    }
  }
  return null;
}
