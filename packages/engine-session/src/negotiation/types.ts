import type { RiskBand, SellerAction, SellerPersonality } from '@usedmarket/engine-core';

export type NegotiationState = 'AWAITING_OFFER' | 'COUNTERED' | 'ACCEPTED' | 'REJECTED' | 'WALKED_AWAY';

/** Transient offer-exchange state embedded in a listing. */
export interface NegotiationRecord {
  personality: SellerPersonality;
  acceptance_threshold: number;
  tolerance: number;
  state: NegotiationState;
  /** Asking price when the exchange opened. */
  list_price: number;
  current_asking: number;
  last_offer: number | null;
  round: number;
  /** Weather modifier looked up for the last offer. */
  weather_modifier: number;
}

/** Result of applying one buyer offer. */
export interface OfferRound {
  negotiation: NegotiationRecord;
  action: SellerAction;
  band: RiskBand;
  /** Set when the seller countered with a new price. */
  counter_price?: number;
}
