export type PlatformInfo = {
  platform: NodeJS.Platform;
  arch: string;
  isWindows: boolean;
  isMac: boolean;
  isLinux: boolean;
};

export function detectPlatform(): PlatformInfo {
  const platform = process.platform;
  const arch = process.arch;

  return {
    platform,
    arch,
    isWindows: platform === 'win32',
    isMac: platform === 'darwin',
    isLinux: platform === 'linux',
  };
}

/** CPU architecture family of a Rust triple, or of the host when there is none. */
export function archOf(rustTriple: string | undefined, platform: PlatformInfo): string {
  if (rustTriple && rustTriple !== 'native') return rustTriple.split('-')[0];
  if (platform.arch === 'x64') return 'x86_64';
  if (platform.arch === 'arm64') return 'aarch64';
  return platform.arch;
}
