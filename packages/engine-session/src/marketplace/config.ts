export interface MarketplaceConfig {
  max_active_searches: number;
  /** Hours a found listing stays open once its clock starts. */
  offer_window_hours: number;
  /** Agent commission added to a found listing's price. */
  commission_rate: number;
  /** Hours a buyer's offer on a sale stays open. */
  pending_offer_hours: number;
  min_search_success: number;
  max_search_success: number;
}

export const DEFAULT_MARKETPLACE_CONFIG: Readonly<MarketplaceConfig> = {
  max_active_searches: 5,
  offer_window_hours: 72,
  commission_rate: 0.08,
  pending_offer_hours: 24,
  min_search_success: 0.05,
  max_search_success: 0.95,
};
