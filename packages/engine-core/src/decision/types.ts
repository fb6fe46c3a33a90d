import type { SellerPersonality } from '../types.js';

export interface PersonalityProfile {
  /** Fraction of asking the seller wants before tolerance and weather. */
  acceptance_threshold: number;
  /** Positive values make the seller easier to please. */
  tolerance: number;
  /** Chance of abandoning the sale after an insulting offer. */
  walk_away_chance: number;
  /** Concession exponent. Above 1 gives ground early, below 1 holds out. */
  concession_beta: number;
}

export type RiskBand = 'MEETS_THRESHOLD' | 'CLOSE' | 'MODERATE' | 'SIGNIFICANT' | 'AGGRESSIVE' | 'INSULTING';

export type SellerAction = 'ACCEPT' | 'COUNTER' | 'REJECT' | 'WALK_AWAY';

export interface SellerDecisionInput {
  personality: SellerPersonality;
  acceptance_threshold: number;
  tolerance: number;
  walk_away_chance: number;
  weather_modifier: number;
  offer: number;
  asking: number;
}

export interface SellerDecision {
  action: SellerAction;
  band: RiskBand;
  offer_fraction: number;
  threshold: number;
  gap: number;
}

export interface CounterOfferParams {
  current_asking: number;
  offer: number;
  list_price: number;
  /** acceptance threshold minus tolerance, as a fraction of list price. */
  floor_fraction: number;
  round: number;
  max_rounds: number;
  beta: number;
}
