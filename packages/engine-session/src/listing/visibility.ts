import { overallRating, qualityHint, repairEstimate } from '@usedmarket/engine-core';
import type { HiddenDetails, HiddenField, ListingRecord, ListingView } from './types.js';

/**
 * Privileged read of a hidden field, ignoring what the player has revealed.
 * Engine code only.
 */
export function readHiddenField<F extends HiddenField>(record: ListingRecord, field: F): Required<HiddenDetails>[F];
export function readHiddenField(record: ListingRecord, field: HiddenField): Required<HiddenDetails>[HiddenField] {
  switch (field) {
    case 'overall_rating':
      return overallRating(record.damage, record.wear);
    case 'engine_reliability':
      return record.engine_reliability;
    case 'hydraulic_reliability':
      return record.hydraulic_reliability;
    case 'electrical_reliability':
      return record.electrical_reliability;
    case 'quality_hint':
      return qualityHint(record.hidden_quality);
    case 'repair_estimate':
      return repairEstimate(record.base_price, record.damage, record.wear);
  }
}

function revealedDetails(record: ListingRecord): HiddenDetails {
  const details: HiddenDetails = {};
  const { revealed } = record;
  if (revealed.has('overall_rating')) details.overall_rating = readHiddenField(record, 'overall_rating');
  if (revealed.has('engine_reliability')) details.engine_reliability = record.engine_reliability;
  if (revealed.has('hydraulic_reliability')) details.hydraulic_reliability = record.hydraulic_reliability;
  if (revealed.has('electrical_reliability')) details.electrical_reliability = record.electrical_reliability;
  if (revealed.has('quality_hint')) details.quality_hint = readHiddenField(record, 'quality_hint');
  if (revealed.has('repair_estimate')) details.repair_estimate = readHiddenField(record, 'repair_estimate');
  return details;
}

/** Player-facing copy. Hidden fields appear only once revealed. */
export function toListingView(record: ListingRecord): ListingView {
  const { negotiation } = record;
  return {
    listing_id: record.listing_id,
    category_id: record.category_id,
    item_name: record.item_name,
    owner_id: record.owner_id,
    source: record.source,
    search_id: record.search_id,
    sale_id: record.sale_id,
    status: record.status,
    ttl_hours: record.ttl_hours,
    ttl_started: record.ttl_started,
    age_years: record.age_years,
    damage: record.damage,
    wear: record.wear,
    operating_hours: record.operating_hours,
    generation: record.generation,
    asking_price: negotiation?.current_asking ?? record.asking_price,
    on_hold: record.on_hold,
    inspection_state: record.inspection_state,
    inspection_completes_at_hour: record.inspection_completes_at_hour,
    periods_listed: record.periods_listed,
    negotiation: negotiation
      ? {
          state: negotiation.state,
          current_asking: negotiation.current_asking,
          last_offer: negotiation.last_offer,
          round: negotiation.round,
        }
      : null,
    hidden: revealedDetails(record),
  };
}
