/**
 * Seeded Random Number Generation
 *
 * Every replication owns one Rng built from a caller-supplied integer seed.
 * The algorithm is pinned (Mulberry32) so replays are bit-identical across
 * runs and machines. Its state is 32 bits wide, so any safe-integer seed is
 * folded into 2^32 streams: uniforms come from 32-bit integer arithmetic and
 * normals from Box-Muller over two fresh uniforms.
 *
 * Nothing in the engine touches Math.random.
 */

export interface Rng {
  /** Uniform draw in [0, 1). */
  next(): number;
  /** Gaussian draw with the given mean and standard deviation. */
  normal(mean: number, std: number): number;
}

/** Mulberry32 step constant. */
const GOLDEN_GAMMA = 0x6d2b79f5;

/** 2^32, maps an unsigned 32-bit integer into [0, 1). */
const UINT32_RANGE = 4294967296;

/** Odd multiplier spreading the seed's high bits over the 32-bit state. */
const HIGH_BITS_MIX = 0x9e3779b9;

export function createRng(seed: number): Rng {
  if (!Number.isSafeInteger(seed)) {
    throw new Error(`seed must be a safe integer, got ${seed}`);
  }
  // Low 32 bits (two's complement, so negative seeds work) mixed with the
  // high bits; seeds that differ only above bit 32 get different streams.
  const high = Math.floor(seed / UINT32_RANGE);
  let state = ((seed >>> 0) ^ Math.imul(high, HIGH_BITS_MIX)) >>> 0;

  const next = (): number => {
    state = (state + GOLDEN_GAMMA) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  };

  const normal = (mean: number, std: number): number => {
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - next();
    const u2 = next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + std * z;
  };

  return { next, normal };
}
