export { scanSources, moduleStem, readHostFile } from './scanSources.js';
export type { ScanOptions } from './scanSources.js';
export {
  collectUnits,
  renderBuildDescription,
  unitFiles,
  BASE_C_FLAGS,
  BUILD_FILE,
  ENTRY_FILE,
  LIBRARY_NAME,
  MERGED_FILE,
} from './collectUnits.js';
export type { CollectOptions } from './collectUnits.js';
export { externStructs, mergeFragments } from './normalizeZig.js';
export { extractInvocations, splitEmbedded, EMBED_MACRO, INCLUDE_MACRO } from './extractInvocations.js';
export * from './scannerTypes.js';
