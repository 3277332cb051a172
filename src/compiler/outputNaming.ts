import type { PlatformInfo } from './detectPlatform.js';

/** Static library file name for `zigTarget` (`undefined`: host). */
export function getStaticLibName(baseName: string, zigTarget: string | undefined, platform: PlatformInfo): string {
  const msvc = zigTarget ? zigTarget.endsWith('-msvc') : platform.isWindows;
  if (msvc) return `${baseName}.lib`;
  return `lib${baseName}.a`;
}
