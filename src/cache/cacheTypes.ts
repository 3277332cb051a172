import type { CompilationMode } from '../scanner/scannerTypes.js';

export type BuildCacheEntry = {
  hash: string;
  artifactPath: string;
  /** Zig target, or `native` */
  target: string;
  mode: CompilationMode;
  createdAt: number;
  /**
   * Updated whenever a build is satisfied from this entry. Tracked in the
   * entry itself so it doesn't depend on filesystem atime.
   */
  lastAccessAt?: number;
};
