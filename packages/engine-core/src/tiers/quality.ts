import type { QualityTier, Range } from '../types.js';

export interface QualityTierSpec {
  name: string;
  damage_range: Range;
  wear_range: Range;
  /** Fraction of base price, drawn per listing. */
  price_range: Range;
  /** Centre of the hidden quality draw for this tier. */
  dna_average: number;
  /** Added to the agent tier's success chance. Rough equipment is easier to find. */
  success_modifier: number;
}

export const QUALITY_TIERS: Readonly<Record<QualityTier, QualityTierSpec>> = {
  1: {
    name: 'Poor',
    damage_range: [0.55, 0.8],
    wear_range: [0.6, 0.85],
    price_range: [0.22, 0.38],
    dna_average: 0.3,
    success_modifier: 0.15,
  },
  2: {
    name: 'Any',
    damage_range: [0.35, 0.6],
    wear_range: [0.4, 0.65],
    price_range: [0.3, 0.5],
    dna_average: 0.4,
    success_modifier: 0.08,
  },
  3: {
    name: 'Fair',
    damage_range: [0.18, 0.35],
    wear_range: [0.22, 0.4],
    price_range: [0.5, 0.68],
    dna_average: 0.5,
    success_modifier: 0,
  },
  4: {
    name: 'Good',
    damage_range: [0.06, 0.18],
    wear_range: [0.08, 0.22],
    price_range: [0.68, 0.8],
    dna_average: 0.6,
    success_modifier: -0.08,
  },
  5: {
    name: 'Excellent',
    damage_range: [0, 0.06],
    wear_range: [0, 0.08],
    price_range: [0.8, 0.94],
    dna_average: 0.75,
    success_modifier: -0.15,
  },
};

export const DEFAULT_QUALITY_TIER: QualityTier = 2;

export function isQualityTier(value: number): value is QualityTier {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}

/** Malformed quality tiers fall back to "Any" so a search never hard-fails on it. */
export function normalizeQualityTier(value: number): QualityTier {
  return isQualityTier(value) ? value : DEFAULT_QUALITY_TIER;
}
