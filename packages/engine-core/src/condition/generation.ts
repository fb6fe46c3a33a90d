import type { RandomSource } from '../random.js';
import { weightedIndex } from '../random.js';
import { SEARCH_TIERS } from '../tiers/agent.js';
import type { AgentTier, GenerationClass } from '../types.js';
import type { GenerationSpec } from './types.js';

export const GENERATION_ORDER: readonly GenerationClass[] = ['RECENT', 'MID_AGE', 'OLD'];

export const GENERATIONS: Readonly<Record<GenerationClass, GenerationSpec>> = {
  RECENT: { name: 'Recent', age_range: [1, 3], hours_per_year: [100, 800] },
  MID_AGE: { name: 'Mid-age', age_range: [4, 7], hours_per_year: [200, 1200] },
  OLD: { name: 'Old', age_range: [8, 15], hours_per_year: [500, 2500] },
};

/** Wider-reaching agents turn up newer machines more often. */
export function selectGeneration(random: RandomSource, agentTier: AgentTier): GenerationClass {
  const index = weightedIndex(random, SEARCH_TIERS[agentTier].generation_weights);
  return GENERATION_ORDER[index];
}
