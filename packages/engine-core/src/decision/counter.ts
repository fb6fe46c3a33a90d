import { roundUpTo } from '../utils.js';
import type { CounterOfferParams } from './types.js';

export const COUNTER_PRICE_STEP = 100;
/** Rounds over which the concession curve reaches the buyer's offer. */
export const MAX_COUNTER_ROUNDS = 5;

/**
 * Concession curve, seller side.
 * P(t) = P_asking + (P_offer - P_asking) * (t/T)^(1/beta)
 * held above the personality floor and never above current asking.
 */
export function computeCounterOffer(params: CounterOfferParams): number {
  const { current_asking, offer, list_price, floor_fraction, round, max_rounds, beta } = params;
  const ratio = Math.min(Math.max(round, 0) / max_rounds, 1);
  const curve = current_asking + (offer - current_asking) * ratio ** (1 / beta);
  const floor = floor_fraction * list_price;
  const stepped = roundUpTo(Math.max(curve, floor), COUNTER_PRICE_STEP);
  return Math.min(stepped, current_asking);
}
