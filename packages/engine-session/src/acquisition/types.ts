import type { AgentTier, QualityTier, RiskBand, SellerAction } from '@usedmarket/engine-core';
import type { ListingView } from '../listing/types.js';

export interface SearchCategory {
  category_id: string;
  item_name: string;
  /** New-item price the generated listing is priced against. */
  base_price: number;
}

export type SearchStatus = 'active' | 'resolved';

/** One in-flight acquisition job. */
export interface SearchRequest {
  search_id: string;
  requester_id: string;
  category_id: string;
  item_name: string;
  base_price: number;
  quality_tier: QualityTier;
  agent_tier: AgentTier;
  fee_paid: number;
  created_at_hour: number;
  ttl_hours: number;
  status: SearchStatus;
  /** Null until resolved. */
  success: boolean | null;
  result_ids: string[];
}

export interface OfferOutcome {
  listing_id: string;
  action: SellerAction;
  band: RiskBand;
  /** Seller's asking price after this offer. */
  asking_price: number;
  counter_price: number | null;
  price_paid: number | null;
  /** Null once the listing has left the market. */
  listing: ListingView | null;
}

export interface PurchaseReceipt {
  listing_id: string;
  buyer_id: string;
  price_paid: number;
  listing: ListingView;
}
