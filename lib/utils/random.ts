/**
 * Seedable random source: 32-bit mixing generator plus Box–Muller normals.
 * The same seed always yields the same sequence.
 */

export interface RandomSource {
  /** Uniform in [0, 1). */
  random: () => number;
  /** Standard normal. */
  randn: () => number;
  /** Fill `out` with standard normals. */
  fillNormal: (out: Float64Array) => void;
}

/** Largest accepted seed; seeds are used as 32-bit generator state. */
export const MAX_SEED = 0xffffffff;

function createScalarRng(seed: number): () => number {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Seed must be an integer in [0, ${MAX_SEED}] (got ${seed})`);
  }
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded source; without a seed falls back to Math.random (not reproducible). */
export function createRandomSource(seed?: number | null): RandomSource {
  const rand = seed == null ? Math.random : createScalarRng(seed);
  let spare: number | null = null;

  const randn = (): number => {
    if (spare != null) {
      const v = spare;
      spare = null;
      return v;
    }
    let u = 0;
    let v = 0;
    while (u === 0) u = rand();
    while (v === 0) v = rand();
    const mag = Math.sqrt(-2.0 * Math.log(u));
    spare = mag * Math.sin(2.0 * Math.PI * v);
    return mag * Math.cos(2.0 * Math.PI * v);
  };

  const fillNormal = (out: Float64Array): void => {
    for (let i = 0; i < out.length; i++) out[i] = randn();
  };

  return { random: rand, randn, fillNormal };
}
