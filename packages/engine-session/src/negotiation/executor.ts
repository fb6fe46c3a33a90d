import {
  MAX_COUNTER_ROUNDS,
  PERSONALITIES,
  classifyPersonality,
  computeCounterOffer,
  decideSellerResponse,
  type RandomSource,
  type SellerAction,
} from '@usedmarket/engine-core';
import { isTerminal, transition, type NegotiationEvent } from './state-machine.js';
import type { NegotiationRecord, OfferRound } from './types.js';

/** Map seller action to negotiation event. */
function actionToEvent(action: SellerAction): NegotiationEvent {
  switch (action) {
    case 'ACCEPT': return 'accept';
    case 'COUNTER': return 'counter';
    case 'REJECT': return 'reject';
    case 'WALK_AWAY': return 'walk_away';
  }
}

/** Fresh exchange for a listing. Personality comes from hidden quality alone. */
export function openNegotiation(hiddenQuality: number, askingPrice: number): NegotiationRecord {
  const personality = classifyPersonality(hiddenQuality);
  const profile = PERSONALITIES[personality];
  return {
    personality,
    acceptance_threshold: profile.acceptance_threshold,
    tolerance: profile.tolerance,
    state: 'AWAITING_OFFER',
    list_price: askingPrice,
    current_asking: askingPrice,
    last_offer: null,
    round: 0,
    weather_modifier: 0,
  };
}

/**
 * Apply one buyer offer.
 *
 * Pipeline:
 * 1. Return a countered or rejected exchange to AWAITING_OFFER
 * 2. Decide the seller response via engine-core bands
 * 3. If COUNTER → compute the new asking price on the concession curve
 * 4. Advance the state machine
 *
 * Returns a new record; the input is not mutated. Null when the exchange
 * is already over.
 */
export function executeOffer(
  record: NegotiationRecord,
  offer: number,
  weatherModifier: number,
  random: RandomSource,
): OfferRound | null {
  if (isTerminal(record.state)) {
    return null;
  }
  const awaiting = record.state === 'AWAITING_OFFER' ? record.state : transition(record.state, 'resume');
  if (awaiting === null) {
    return null;
  }

  const profile = PERSONALITIES[record.personality];
  const decision = decideSellerResponse(
    {
      personality: record.personality,
      acceptance_threshold: record.acceptance_threshold,
      tolerance: record.tolerance,
      walk_away_chance: profile.walk_away_chance,
      weather_modifier: weatherModifier,
      offer,
      asking: record.current_asking,
    },
    random,
  );

  const nextState = transition(awaiting, actionToEvent(decision.action));
  if (nextState === null) {
    return null;
  }

  const round = record.round + 1;
  let counterPrice: number | undefined;
  if (decision.action === 'COUNTER') {
    counterPrice = computeCounterOffer({
      current_asking: record.current_asking,
      offer,
      list_price: record.list_price,
      floor_fraction: record.acceptance_threshold - record.tolerance,
      round,
      max_rounds: MAX_COUNTER_ROUNDS,
      beta: profile.concession_beta,
    });
  }

  const negotiation: NegotiationRecord = {
    ...record,
    state: nextState,
    round,
    last_offer: offer,
    weather_modifier: weatherModifier,
    current_asking: counterPrice ?? record.current_asking,
  };

  const result: OfferRound = { negotiation, action: decision.action, band: decision.band };
  if (counterPrice !== undefined) {
    result.counter_price = counterPrice;
  }
  return result;
}
