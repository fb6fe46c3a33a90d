import { randomUUID } from 'node:crypto';
import { createRandom, type RandomSource } from '@usedmarket/engine-core';
import {
  createApiResponse,
  createLogger,
  type ApiResponse,
  type FlatRecord,
  type Logger,
  type MarketplaceSnapshot,
} from '@usedmarket/shared';
import { AcquisitionQueue } from '../acquisition/queue.js';
import type { OfferOutcome, PurchaseReceipt, SearchCategory, SearchRequest } from '../acquisition/types.js';
import { DispositionQueue } from '../disposition/queue.js';
import type { SaleItem, SaleRequest } from '../disposition/types.js';
import type { Ledger, NotificationSink, WeatherProvider } from '../host/types.js';
import { InspectionService } from '../inspection/service.js';
import { findOwnedListing } from '../listing/access.js';
import { ListingStore } from '../listing/store.js';
import type { ListingView } from '../listing/types.js';
import { toListingView } from '../listing/visibility.js';
import {
  deserializeListing,
  deserializeSale,
  deserializeSearch,
  serializeListing,
  serializeSale,
  serializeSearch,
} from '../persistence/codec.js';
import { DEFAULT_MARKETPLACE_CONFIG, type MarketplaceConfig } from './config.js';
import type { MarketServices } from './services.js';
import { MarketStatistics, type OwnerStatistics } from './statistics.js';

export interface MarketplaceOptions {
  ledger: Ledger;
  weather: WeatherProvider;
  notifier: NotificationSink;
  /** Takes precedence over `seed`. */
  random?: RandomSource;
  seed?: string;
  logger?: Logger;
  config?: Partial<MarketplaceConfig>;
  generateId?: () => string;
  /** Hour the clock starts at. Ticks must move past it. */
  startHour?: number;
}

export interface RestoreReport {
  listings: number;
  searches: number;
  sales: number;
  skipped: number;
}

/**
 * The host session's market. Owns every queue and the clock; the host drives it
 * with hour and period ticks and calls the player operations in between.
 */
export class Marketplace {
  private readonly services: MarketServices;
  private readonly acquisition: AcquisitionQueue;
  private readonly disposition: DispositionQueue;
  private readonly inspection: InspectionService;
  private currentHour: number;
  private currentPeriod = 0;

  constructor(options: MarketplaceOptions) {
    this.currentHour = options.startHour ?? 0;
    this.services = {
      listings: new ListingStore(),
      ledger: options.ledger,
      weather: options.weather,
      notifier: options.notifier,
      random: options.random ?? createRandom(options.seed),
      logger: options.logger ?? createLogger({ name: 'marketplace' }),
      stats: new MarketStatistics(),
      config: { ...DEFAULT_MARKETPLACE_CONFIG, ...options.config },
      clock: () => this.currentHour,
      generateId: options.generateId ?? randomUUID,
    };
    this.acquisition = new AcquisitionQueue(this.services);
    this.disposition = new DispositionQueue(this.services);
    this.inspection = new InspectionService(this.services);
  }

  get hour(): number {
    return this.currentHour;
  }

  get period(): number {
    return this.currentPeriod;
  }

  // ─── Acquisition ───────────────────────────────────────────

  requestSearch(
    requesterId: string,
    category: SearchCategory,
    qualityTier: number,
    agentTier: number,
  ): ApiResponse<SearchRequest> {
    return this.acquisition.requestSearch(requesterId, category, qualityTier, agentTier);
  }

  cancelSearch(searchId: string, actorId: string): ApiResponse<SearchRequest> {
    return this.acquisition.cancelSearch(searchId, actorId);
  }

  renewSearch(searchId: string, actorId: string): ApiResponse<SearchRequest> {
    return this.acquisition.renewSearch(searchId, actorId);
  }

  getActiveSearches(requesterId?: string): SearchRequest[] {
    return this.acquisition.getActiveSearches(requesterId);
  }

  getSearch(searchId: string): SearchRequest | undefined {
    return this.acquisition.getSearch(searchId);
  }

  viewListing(listingId: string, actorId: string): ApiResponse<ListingView> {
    return this.acquisition.viewListing(listingId, actorId);
  }

  submitOffer(listingId: string, actorId: string, amount: number): ApiResponse<OfferOutcome> {
    return this.acquisition.submitOffer(listingId, actorId, amount);
  }

  purchaseListing(listingId: string, actorId: string): ApiResponse<PurchaseReceipt> {
    return this.acquisition.purchaseListing(listingId, actorId);
  }

  // ─── Disposition ───────────────────────────────────────────

  listForSale(ownerId: string, item: SaleItem, agentTier: number): ApiResponse<SaleRequest> {
    return this.disposition.listForSale(ownerId, item, agentTier);
  }

  acceptOffer(listingId: string, actorId: string): ApiResponse<SaleRequest> {
    return this.disposition.acceptOffer(listingId, actorId);
  }

  declineOffer(listingId: string, actorId: string): ApiResponse<SaleRequest> {
    return this.disposition.declineOffer(listingId, actorId);
  }

  cancelSale(saleId: string, actorId: string): ApiResponse<SaleRequest> {
    return this.disposition.cancelSale(saleId, actorId);
  }

  modifySalePrice(listingId: string, actorId: string, price: number): ApiResponse<ListingView> {
    return this.disposition.modifySalePrice(listingId, actorId, price);
  }

  getActiveSales(ownerId?: string): SaleRequest[] {
    return this.disposition.getActiveSales(ownerId);
  }

  getSale(saleId: string): SaleRequest | undefined {
    return this.disposition.getSale(saleId);
  }

  // ─── Inspection ────────────────────────────────────────────

  requestInspection(listingId: string, actorId: string, tier: number): ApiResponse<ListingView> {
    return this.inspection.requestInspection(listingId, actorId, tier);
  }

  cancelInspection(listingId: string, actorId: string): ApiResponse<ListingView> {
    return this.inspection.cancelInspection(listingId, actorId);
  }

  getInspectionHoursRemaining(listingId: string, actorId: string): ApiResponse<number> {
    return this.inspection.getInspectionHoursRemaining(listingId, actorId);
  }

  // ─── Queries ───────────────────────────────────────────────

  getActiveListings(ownerId?: string): ListingView[] {
    const { listings } = this.services;
    const records = ownerId === undefined ? listings.all() : listings.byOwner(ownerId);
    return records.map(toListingView);
  }

  getListing(listingId: string): ListingView | undefined {
    const record = this.services.listings.get(listingId);
    return record ? toListingView(record) : undefined;
  }

  /** Owner of a live listing, for request routing. */
  listingOwner(listingId: string): string | undefined {
    return this.services.listings.get(listingId)?.owner_id;
  }

  getHoursRemaining(listingId: string, actorId: string): ApiResponse<number> {
    const found = findOwnedListing(this.services, listingId, actorId);
    if (!found.success) return found;
    return createApiResponse(found.data.ttl_hours);
  }

  getStatistics(ownerId: string): OwnerStatistics {
    return this.services.stats.get(ownerId);
  }

  // ─── Clock ─────────────────────────────────────────────────

  /**
   * Advances the clock to `hour`. Skipped hours are replayed one at a time so
   * every countdown sees each hour exactly once. Returns false when the hour
   * did not move forward and the tick was ignored.
   */
  onHourTick(hour: number): boolean {
    const { logger } = this.services;
    if (!Number.isInteger(hour) || hour <= this.currentHour) {
      logger.warn({ hour, currentHour: this.currentHour }, 'ignoring non-increasing hour tick');
      return false;
    }
    if (hour - this.currentHour > 1) {
      logger.debug({ from: this.currentHour, to: hour }, 'replaying skipped hours');
    }
    while (this.currentHour < hour) {
      const next = this.currentHour + 1;
      this.currentHour = next;
      this.acquisition.onHourTick(next);
      this.disposition.onHourTick(next);
      this.inspection.onHourTick(next);
    }
    return true;
  }

  onPeriodTick(period: number): boolean {
    const { logger, listings, stats } = this.services;
    if (!Number.isInteger(period) || period <= this.currentPeriod) {
      logger.warn({ period, currentPeriod: this.currentPeriod }, 'ignoring non-increasing period tick');
      return false;
    }
    this.currentPeriod = period;
    for (const listing of listings.all()) {
      listing.periods_listed += 1;
    }
    const totals = stats.rollPeriod();
    logger.info(
      {
        period,
        listings: listings.size,
        searches: this.acquisition.getActiveSearches().length,
        sales: this.disposition.getActiveSales().length,
        ...totals,
      },
      'market period closed',
    );
    return true;
  }

  // ─── Persistence ───────────────────────────────────────────

  snapshot(): MarketplaceSnapshot {
    return {
      current_hour: this.currentHour,
      current_period: this.currentPeriod,
      listings: this.services.listings.all().map(serializeListing),
      searches: this.acquisition.getActiveSearches().map(serializeSearch),
      sales: this.disposition.getActiveSales().map(serializeSale),
    };
  }

  /** Replace all state. Corrupt records are logged and skipped. */
  restore(snapshot: MarketplaceSnapshot): RestoreReport {
    const { listings, logger } = this.services;
    listings.clear();
    this.acquisition.clear();
    this.disposition.clear();
    this.currentHour = snapshot.current_hour;
    this.currentPeriod = snapshot.current_period;

    const report: RestoreReport = { listings: 0, searches: 0, sales: 0, skipped: 0 };
    const load = <T>(records: FlatRecord[], decode: (flat: FlatRecord) => ApiResponse<T>, apply: (value: T) => void) => {
      let loaded = 0;
      for (const flat of records) {
        const decoded = decode(flat);
        if (!decoded.success) {
          logger.warn({ error: decoded.error }, 'skipping corrupt record');
          report.skipped += 1;
          continue;
        }
        apply(decoded.data);
        loaded += 1;
      }
      return loaded;
    };

    report.listings = load(snapshot.listings, deserializeListing, (record) => listings.add(record));
    report.searches = load(snapshot.searches, deserializeSearch, (search) => this.acquisition.load(search));
    report.sales = load(snapshot.sales, deserializeSale, (sale) => this.disposition.load(sale));
    logger.info({ ...report, hour: this.currentHour }, 'marketplace restored');
    return report;
  }
}
