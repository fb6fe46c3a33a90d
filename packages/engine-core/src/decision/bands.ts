import type { RandomSource } from '../random.js';
import { IMMOVABLE_FLOOR } from './personality.js';
import type { RiskBand, SellerAction, SellerDecision, SellerDecisionInput } from './types.js';

export const BAND_EPSILON = 1e-9;

/** Slope of the reject/counter probability ramps: 0→30% across a 5-point band. */
const RAMP_SLOPE = 6;

/**
 * Map the shortfall below the seller's threshold to a band.
 * Upper bounds are inclusive except the last: a 20% gap is INSULTING.
 */
export function classifyGap(gap: number): RiskBand {
  if (gap <= BAND_EPSILON) return 'MEETS_THRESHOLD';
  if (gap <= 0.05 + BAND_EPSILON) return 'CLOSE';
  if (gap <= 0.1 + BAND_EPSILON) return 'MODERATE';
  if (gap <= 0.15 + BAND_EPSILON) return 'SIGNIFICANT';
  if (gap < 0.2 - BAND_EPSILON) return 'AGGRESSIVE';
  return 'INSULTING';
}

/** Probability that an offer in this band is rejected outright, before walk-away. */
export function rejectProbability(band: RiskBand, gap: number): number {
  switch (band) {
    case 'MEETS_THRESHOLD':
    case 'CLOSE':
      return 0;
    case 'MODERATE':
      return Math.max(0, (gap - 0.05) * RAMP_SLOPE);
    case 'SIGNIFICANT':
      return 0.5;
    case 'AGGRESSIVE':
      return 1 - Math.max(0, (0.2 - gap) * RAMP_SLOPE);
    case 'INSULTING':
      return 1;
  }
}

/**
 * Seller response to one offer.
 *
 * Draws at most one value from `random`: the reject roll in the
 * probabilistic bands, or the walk-away roll in the insulting band.
 */
export function decideSellerResponse(input: SellerDecisionInput, random: RandomSource): SellerDecision {
  const offerFraction = input.offer / input.asking;
  const threshold = input.acceptance_threshold - input.tolerance - input.weather_modifier;
  const gap = threshold - offerFraction;
  const band = classifyGap(gap);

  let action: SellerAction;
  switch (band) {
    case 'MEETS_THRESHOLD':
      action =
        input.personality === 'immovable' && offerFraction < IMMOVABLE_FLOOR - BAND_EPSILON ? 'COUNTER' : 'ACCEPT';
      break;
    case 'CLOSE':
      action = 'COUNTER';
      break;
    case 'MODERATE':
    case 'SIGNIFICANT':
    case 'AGGRESSIVE':
      action = random() < rejectProbability(band, gap) ? 'REJECT' : 'COUNTER';
      break;
    case 'INSULTING':
      action = random() < input.walk_away_chance ? 'WALK_AWAY' : 'REJECT';
      break;
  }

  if (input.personality === 'immovable' && band !== 'MEETS_THRESHOLD' && action === 'COUNTER') {
    action = 'REJECT';
  }

  return { action, band, offer_fraction: offerFraction, threshold, gap };
}
