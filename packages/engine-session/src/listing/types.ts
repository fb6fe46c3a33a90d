import type {
  GenerationClass,
  InspectionTier,
  OverallRating,
  QualityHint,
} from '@usedmarket/engine-core';
import type { NegotiationRecord, NegotiationState } from '../negotiation/types.js';

export type ListingStatus = 'searching' | 'found' | 'negotiating' | 'sold' | 'expired' | 'withdrawn';

export type ListingSource = 'acquisition' | 'disposition';

export type InspectionState = 'none' | 'pending' | 'complete';

export const HIDDEN_FIELDS = [
  'overall_rating',
  'engine_reliability',
  'hydraulic_reliability',
  'electrical_reliability',
  'quality_hint',
  'repair_estimate',
] as const;

export type HiddenField = (typeof HIDDEN_FIELDS)[number];

/** One unit of used goods. Owned by exactly one player at a time. */
export interface ListingRecord {
  listing_id: string;
  category_id: string;
  item_name: string;
  owner_id: string;
  source: ListingSource;
  search_id: string | null;
  sale_id: string | null;
  status: ListingStatus;
  created_at_hour: number;
  ttl_hours: number;
  /** Offer window clock is running. */
  ttl_started: boolean;
  /** Seller DNA. Never leaves the engine. */
  hidden_quality: number;
  age_years: number;
  damage: number;
  wear: number;
  operating_hours: number;
  generation: GenerationClass;
  engine_reliability: number;
  hydraulic_reliability: number;
  electrical_reliability: number;
  base_price: number;
  asking_price: number;
  commission: number;
  on_hold: boolean;
  inspection_state: InspectionState;
  inspection_tier: InspectionTier | null;
  inspection_requested_at_hour: number | null;
  inspection_completes_at_hour: number | null;
  inspection_fee_paid: number;
  revealed: Set<HiddenField>;
  periods_listed: number;
  negotiation: NegotiationRecord | null;
}

export interface HiddenDetails {
  overall_rating?: OverallRating;
  engine_reliability?: number;
  hydraulic_reliability?: number;
  electrical_reliability?: number;
  quality_hint?: QualityHint;
  repair_estimate?: number;
}

/** What a player may see of a listing. */
export interface ListingView {
  listing_id: string;
  category_id: string;
  item_name: string;
  owner_id: string;
  source: ListingSource;
  search_id: string | null;
  sale_id: string | null;
  status: ListingStatus;
  ttl_hours: number;
  ttl_started: boolean;
  age_years: number;
  damage: number;
  wear: number;
  operating_hours: number;
  generation: GenerationClass;
  asking_price: number;
  on_hold: boolean;
  inspection_state: InspectionState;
  inspection_completes_at_hour: number | null;
  periods_listed: number;
  negotiation: {
    state: NegotiationState;
    current_asking: number;
    last_offer: number | null;
    round: number;
  } | null;
  hidden: HiddenDetails;
}

export const TERMINAL_LISTING_STATUSES: ReadonlySet<ListingStatus> = new Set(['sold', 'expired', 'withdrawn']);
