import seedrandom from 'seedrandom';
import type { Range } from './types.js';

/** Uniform source in [0, 1). Everything random in the engine draws from one of these. */
export type RandomSource = () => number;

/**
 * Seeded source. Same seed → same sequence, so a generated listing can be
 * reproduced from the seed alone.
 */
export function createRandom(seed?: string): RandomSource {
  const rng: seedrandom.PRNG = seedrandom(seed ?? `market-${Date.now()}`);
  return () => rng();
}

export function uniform(random: RandomSource, range: Range): number {
  const [min, max] = range;
  return min + random() * (max - min);
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/** Index picked by cumulative weights. Falls through to the last index on rounding slack. */
export function weightedIndex(random: RandomSource, weights: readonly number[]): number {
  const roll = random();
  let cumulative = 0;
  for (let i = 0; i < weights.length; i++) {
    cumulative += weights[i];
    if (roll < cumulative) {
      return i;
    }
  }
  return weights.length - 1;
}

/** Symmetric variance in [-max, +max). */
export function variance(random: RandomSource, max: number): number {
  return (random() * 2 - 1) * max;
}
