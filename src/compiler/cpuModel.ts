type Env = Record<string, string | undefined>;

export type CpuModel = {
  /** Value for `-mcpu` / `-Dcpu`. */
  cpu: string;
  description: string;
  /** `target-cpu=native` was requested and replaced by an explicit model. */
  nativeSuppressed: boolean;
};

function rustFlags(env: Env): string {
  const encoded = env.CARGO_ENCODED_RUSTFLAGS;
  if (encoded) return encoded.split('\x1f').join(' ');
  return env.RUSTFLAGS ?? '';
}

export function requestsNativeCpu(flags: string): boolean {
  return /(?:^|\s|=)target-cpu=native\b/.test(flags) || flags.includes('-Ctarget-cpu=native');
}

function targetFeatures(env: Env): Set<string> {
  return new Set(
    (env.CARGO_CFG_TARGET_FEATURE ?? '')
      .split(',')
      .map((f) => f.trim())
      .filter(Boolean),
  );
}

function x86Model(features: Set<string>): Omit<CpuModel, 'nativeSuppressed'> {
  if ([...features].some((f) => f.startsWith('avx512'))) return { cpu: 'x86_64_v4', description: 'x86_64 v4 (AVX-512)' };
  if (features.has('avx2')) return { cpu: 'x86_64_v3', description: 'x86_64 v3 (AVX2, FMA)' };
  if (features.has('avx')) return { cpu: 'x86_64+avx', description: 'x86_64 with AVX' };
  if (features.has('sse4.2')) return { cpu: 'x86_64+sse4.2', description: 'x86_64 with SSE4.2' };
  return { cpu: 'x86_64', description: 'x86_64 baseline (SSE2)' };
}

function armModel(features: Set<string>): Omit<CpuModel, 'nativeSuppressed'> {
  if (features.has('sve')) return { cpu: 'generic+sve', description: 'ARM with SVE' };
  if (features.has('neon')) return { cpu: 'generic+neon', description: 'ARM with NEON' };
  return { cpu: 'generic', description: 'ARM generic' };
}

/**
 * Explicit CPU model from the features cargo enabled for the target.
 * Native auto-detection is never used; a `target-cpu=native` request
 * falls back to `baseline`. Object code from every discovery mode has to
 * agree on one ABI.
 */
export function resolveCpuModel(arch: string, env: Env = process.env): CpuModel {
  if (requestsNativeCpu(rustFlags(env))) {
    return { cpu: 'baseline', description: 'baseline (target-cpu=native ignored)', nativeSuppressed: true };
  }
  const features = targetFeatures(env);

  let model: Omit<CpuModel, 'nativeSuppressed'>;
  if (arch === 'x86_64') model = x86Model(features);
  else if (arch === 'aarch64' || arch.startsWith('arm')) model = armModel(features);
  else model = { cpu: 'baseline', description: 'baseline' };

  return { ...model, nativeSuppressed: false };
}
