import type { InspectionTier } from '../types.js';

/**
 * How much of the hidden record an inspection reveals.
 * 1: overall rating. 2: + component reliability. 3: + quality hint and repair estimate.
 */
export type RevealDepth = 1 | 2 | 3;

export interface InspectionTierSpec {
  name: string;
  base_fee: number;
  percent_fee: number;
  max_fee: number;
  duration_hours: number;
  reveal_depth: RevealDepth;
}

export const INSPECTION_TIERS: Readonly<Record<InspectionTier, InspectionTierSpec>> = {
  1: {
    name: 'Quick',
    base_fee: 1000,
    percent_fee: 0.02,
    max_fee: 2500,
    duration_hours: 2,
    reveal_depth: 1,
  },
  2: {
    name: 'Standard',
    base_fee: 2000,
    percent_fee: 0.03,
    max_fee: 5000,
    duration_hours: 6,
    reveal_depth: 2,
  },
  3: {
    name: 'Comprehensive',
    base_fee: 4000,
    percent_fee: 0.05,
    max_fee: 10000,
    duration_hours: 12,
    reveal_depth: 3,
  },
};

export function isInspectionTier(value: number): value is InspectionTier {
  return Number.isInteger(value) && value >= 1 && value <= 3;
}

/** Flat fee plus a share of the listing price, capped per tier. */
export function computeInspectionFee(tier: InspectionTier, price: number): number {
  const spec = INSPECTION_TIERS[tier];
  return Math.round(Math.min(spec.base_fee + price * spec.percent_fee, spec.max_fee));
}
