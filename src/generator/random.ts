/**
 * Random sources.
 */

/** A function returning numbers uniformly distributed in [0, 1). */
export type RandomSource = () => number;

/**
 * Seeded generator (Mulberry32). Equal seeds give equal sequences.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t = (t + Math.imul(t ^ (t >>> 7), t | 61)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in [min, max]. Draws nothing when the range has a single
 * value.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Index drawn with probability proportional to its weight, or -1 when all
 * weights are zero.
 */
export function weightedIndex(random: RandomSource, weights: readonly number[]): number {
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (total <= 0) return -1;

  let remaining = random() * total;
  for (let i = 0; i < weights.length; i++) {
    remaining -= weights[i];
    if (remaining < 0) return i;
  }
  // Rounding can leave a sliver; fall back to the last weighted index.
  for (let i = weights.length - 1; i >= 0; i--) {
    if (weights[i] > 0) return i;
  }
  return -1;
}
