import type { OfferOutcome, PurchaseReceipt, SearchCategory, SearchRequest } from '../acquisition/types.js';
import type { SaleItem, SaleRequest } from '../disposition/types.js';
import type { ListingView } from '../listing/types.js';

/** Player requests routed through the authority. Every request names its actor. */
export type MarketRequest =
  | { type: 'REQUEST_SEARCH'; actor_id: string; category: SearchCategory; quality_tier: number; agent_tier: number }
  | { type: 'CANCEL_SEARCH'; actor_id: string; search_id: string }
  | { type: 'RENEW_SEARCH'; actor_id: string; search_id: string }
  | { type: 'LIST_FOR_SALE'; actor_id: string; item: SaleItem; agent_tier: number }
  | { type: 'CANCEL_SALE'; actor_id: string; sale_id: string }
  | { type: 'MODIFY_SALE_PRICE'; actor_id: string; listing_id: string; price: number }
  | { type: 'VIEW_LISTING'; actor_id: string; listing_id: string }
  | { type: 'SUBMIT_OFFER'; actor_id: string; listing_id: string; amount: number }
  | { type: 'PURCHASE_LISTING'; actor_id: string; listing_id: string }
  | { type: 'REQUEST_INSPECTION'; actor_id: string; listing_id: string; tier: number }
  | { type: 'CANCEL_INSPECTION'; actor_id: string; listing_id: string }
  | { type: 'ACCEPT_OFFER'; actor_id: string; listing_id: string }
  | { type: 'DECLINE_OFFER'; actor_id: string; listing_id: string };

export type MarketRequestType = MarketRequest['type'];

export type MarketResponseData = SearchRequest | SaleRequest | ListingView | OfferOutcome | PurchaseReceipt;
