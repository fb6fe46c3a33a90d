// Host interfaces
export type { Ledger, WeatherProvider, NotificationSink } from './host/types.js';

// Listing types + visibility
export type {
  ListingRecord,
  ListingView,
  ListingStatus,
  ListingSource,
  InspectionState,
  HiddenField,
  HiddenDetails,
} from './listing/types.js';
export { HIDDEN_FIELDS, TERMINAL_LISTING_STATUSES } from './listing/types.js';
export { ListingStore } from './listing/store.js';
export { toListingView, readHiddenField } from './listing/visibility.js';
export { tickListingTtl } from './listing/ttl.js';

// Negotiation types + state machine + executor
export type { NegotiationRecord, NegotiationState, OfferRound } from './negotiation/types.js';
export { transition, isTerminal } from './negotiation/state-machine.js';
export type { NegotiationEvent } from './negotiation/state-machine.js';
export { openNegotiation, executeOffer } from './negotiation/executor.js';

// Acquisition
export type { SearchCategory, SearchRequest, SearchStatus, OfferOutcome, PurchaseReceipt } from './acquisition/types.js';
export { AcquisitionQueue } from './acquisition/queue.js';

// Disposition
export type { SaleItem, SaleRequest, SaleStatus, OfferHistoryEntry, PendingOffer } from './disposition/types.js';
export { DispositionQueue } from './disposition/queue.js';

// Inspection
export { InspectionService, REVEALED_AT_DEPTH } from './inspection/service.js';

// Marketplace
export type { MarketplaceConfig } from './marketplace/config.js';
export { DEFAULT_MARKETPLACE_CONFIG } from './marketplace/config.js';
export type { MarketServices } from './marketplace/services.js';
export type { MarketCounters, MarketCounter, OwnerStatistics } from './marketplace/statistics.js';
export { MarketStatistics, MARKET_COUNTERS, emptyCounters } from './marketplace/statistics.js';
export type { MarketplaceOptions, RestoreReport } from './marketplace/marketplace.js';
export { Marketplace } from './marketplace/marketplace.js';

// Persistence
export {
  serializeListing,
  deserializeListing,
  serializeSearch,
  deserializeSearch,
  serializeSale,
  deserializeSale,
} from './persistence/codec.js';

// Protocol
export type { MarketRequest, MarketRequestType, MarketResponseData } from './protocol/types.js';
export { MarketAuthority } from './protocol/authority.js';
