import type { SellerPersonality } from '../types.js';
import type { PersonalityProfile } from './types.js';

export const PERSONALITIES: Readonly<Record<SellerPersonality, PersonalityProfile>> = {
  desperate: { acceptance_threshold: 0.88, tolerance: 0.15, walk_away_chance: 0.05, concession_beta: 3.0 },
  motivated: { acceptance_threshold: 0.9, tolerance: 0.08, walk_away_chance: 0.15, concession_beta: 2.0 },
  reasonable: { acceptance_threshold: 0.9, tolerance: 0, walk_away_chance: 0.35, concession_beta: 1.0 },
  firm: { acceptance_threshold: 0.92, tolerance: -0.05, walk_away_chance: 0.6, concession_beta: 0.6 },
  immovable: { acceptance_threshold: 0.83, tolerance: -0.15, walk_away_chance: 0.9, concession_beta: 0.4 },
};

/** Below this fraction of asking an immovable seller counters instead of accepting. */
export const IMMOVABLE_FLOOR = 0.98;

/** Pure function of hidden quality; never re-rolled for a listing. */
export function classifyPersonality(hiddenQuality: number): SellerPersonality {
  if (hiddenQuality < 0.2) return 'desperate';
  if (hiddenQuality < 0.4) return 'motivated';
  if (hiddenQuality < 0.6) return 'reasonable';
  if (hiddenQuality < 0.8) return 'firm';
  return 'immovable';
}
