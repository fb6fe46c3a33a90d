import type { AgentTier } from '@usedmarket/engine-core';

/** The owner's item being sold. Condition fields are optional; a missing one reads as new. */
export interface SaleItem {
  item_id: string;
  item_name: string;
  category_id: string;
  vanilla_value: number;
  age_years?: number;
  damage?: number;
  wear?: number;
  operating_hours?: number;
}

export type SaleStatus = 'active' | 'sold' | 'cancelled' | 'expired';

export interface OfferHistoryEntry {
  amount: number;
  hour: number;
  /** Null while the offer is still open. */
  accepted: boolean | null;
}

export interface PendingOffer {
  amount: number;
  made_at_hour: number;
  expires_in_hours: number;
}

/** One in-flight disposition job. */
export interface SaleRequest {
  sale_id: string;
  owner_id: string;
  item: SaleItem;
  listing_id: string;
  agent_tier: AgentTier;
  fee_paid: number;
  created_at_hour: number;
  /** Buyer-search timer. */
  next_offer_in_hours: number;
  offer_history: OfferHistoryEntry[];
  pending_offer: PendingOffer | null;
  status: SaleStatus;
}
