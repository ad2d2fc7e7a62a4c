/**
 * Caller-owned random source.
 *
 * The simulation step never draws random numbers; only diagnostic impulses and
 * scenario jitter do, through a handle the caller creates and keeps.
 */
export type RngState = {
  seed: number;
};

// Simple LCG for deterministic randomness.
export function createRng(seed: number): RngState {
  return { seed: seed >>> 0 };
}

/** Uniform in [0, 1] */
export function nextFloat(rng: RngState): number {
  // LCG parameters (Numerical Recipes)
  rng.seed = (Math.imul(rng.seed, 1664525) + 1013904223) >>> 0;
  return rng.seed / 0xffffffff;
}

export function nextRange(rng: RngState, min: number, max: number): number {
  return min + nextFloat(rng) * (max - min);
}

export function nextInt(rng: RngState, min: number, max: number): number {
  return Math.min(max, Math.floor(nextRange(rng, min, max + 1)));
}
