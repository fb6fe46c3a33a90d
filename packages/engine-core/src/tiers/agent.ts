import type { AgentTier, Range } from '../types.js';

/** Search agent: retainer fee, duration and odds of turning something up. */
export interface SearchTierSpec {
  name: string;
  retainer_flat: number;
  retainer_percent: number;
  duration_months: Range;
  success_chance: number;
  /** Listings produced by one successful search. */
  find_count: number;
  /** Recent / Mid-age / Old draw weights. */
  generation_weights: readonly [number, number, number];
  /** Scales generated damage and wear. */
  condition_multiplier: number;
}

/** Sale agent: upfront fee, listing lifetime and the buyer offers it brings in. */
export interface SaleTierSpec {
  name: string;
  fee_flat: number;
  fee_percent: number;
  duration_months: Range;
  /** Hours between buyer-search rolls. */
  offer_interval_hours: Range;
  offer_chance: number;
  /** Offer as a fraction of the item's vanilla value. */
  return_range: Range;
}

export const SEARCH_TIERS: Readonly<Record<AgentTier, SearchTierSpec>> = {
  1: {
    name: 'Local',
    retainer_flat: 500,
    retainer_percent: 0,
    duration_months: [1, 1],
    success_chance: 0.25,
    find_count: 1,
    generation_weights: [0.2, 0.5, 0.3],
    condition_multiplier: 1.3,
  },
  2: {
    name: 'Regional',
    retainer_flat: 1000,
    retainer_percent: 0.005,
    duration_months: [1, 2],
    success_chance: 0.55,
    find_count: 2,
    generation_weights: [0.4, 0.4, 0.2],
    condition_multiplier: 1.0,
  },
  3: {
    name: 'National',
    retainer_flat: 2000,
    retainer_percent: 0.008,
    duration_months: [2, 4],
    success_chance: 0.8,
    find_count: 3,
    generation_weights: [0.55, 0.35, 0.1],
    condition_multiplier: 0.7,
  },
};

export const SALE_TIERS: Readonly<Record<AgentTier, SaleTierSpec>> = {
  1: {
    name: 'Local',
    fee_flat: 50,
    fee_percent: 0,
    duration_months: [1, 2],
    offer_interval_hours: [18, 30],
    offer_chance: 0.5,
    return_range: [0.6, 0.75],
  },
  2: {
    name: 'Regional',
    fee_flat: 250,
    fee_percent: 0.01,
    duration_months: [2, 3],
    offer_interval_hours: [12, 24],
    offer_chance: 0.65,
    return_range: [0.75, 0.9],
  },
  3: {
    name: 'National',
    fee_flat: 500,
    fee_percent: 0.02,
    duration_months: [3, 4],
    offer_interval_hours: [8, 16],
    offer_chance: 0.8,
    return_range: [0.9, 1.0],
  },
};

export const DEFAULT_AGENT_TIER: AgentTier = 2;

export function isAgentTier(value: number): value is AgentTier {
  return Number.isInteger(value) && value >= 1 && value <= 3;
}

/** Malformed agent tiers fall back to Regional. */
export function normalizeAgentTier(value: number): AgentTier {
  return isAgentTier(value) ? value : DEFAULT_AGENT_TIER;
}

export function computeRetainerFee(tier: AgentTier, basePrice: number): number {
  const spec = SEARCH_TIERS[tier];
  return spec.retainer_flat + Math.round(basePrice * spec.retainer_percent);
}

export function computeSaleFee(tier: AgentTier, vanillaValue: number): number {
  const spec = SALE_TIERS[tier];
  return spec.fee_flat + Math.round(vanillaValue * spec.fee_percent);
}
