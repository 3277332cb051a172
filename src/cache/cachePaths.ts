import { join } from 'node:path';

export const CACHE_FILE = 'zigbind-cache.json';
export const STAGING_DIR = 'zigbind';

export function getCacheFile(outDir: string): string {
  return join(outDir, CACHE_FILE);
}

/** Where unit files are written before compiling. */
export function getStagingDir(outDir: string): string {
  return join(outDir, STAGING_DIR);
}
