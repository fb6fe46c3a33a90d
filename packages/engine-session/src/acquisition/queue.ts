import {
  QUALITY_TIERS,
  SEARCH_TIERS,
  clamp,
  computeRetainerFee,
  generateCondition,
  normalizeAgentTier,
  normalizeQualityTier,
  randomInt,
  validateBasePrice,
  validateOffer,
  weatherModifier,
  type GeneratedCondition,
} from '@usedmarket/engine-core';
import { HOURS_PER_MONTH, createApiResponse, type ApiResponse } from '@usedmarket/shared';
import { fail } from '../errors.js';
import { findOwnedListing } from '../listing/access.js';
import { tickListingTtl } from '../listing/ttl.js';
import type { ListingRecord, ListingView } from '../listing/types.js';
import { toListingView } from '../listing/visibility.js';
import type { MarketServices } from '../marketplace/services.js';
import { executeOffer, openNegotiation } from '../negotiation/executor.js';
import type { OfferOutcome, PurchaseReceipt, SearchCategory, SearchRequest } from './types.js';

function copySearch(search: SearchRequest): SearchRequest {
  return { ...search, result_ids: [...search.result_ids] };
}

/**
 * Searches commissioned by players and the listings they turn up.
 * The only writer of SearchRequests and of acquisition listings' clocks.
 */
export class AcquisitionQueue {
  private readonly searches = new Map<string, SearchRequest>();

  constructor(private readonly services: MarketServices) {}

  requestSearch(
    requesterId: string,
    category: SearchCategory,
    qualityTier: number,
    agentTier: number,
  ): ApiResponse<SearchRequest> {
    const { services } = this;
    if (!requesterId || !category.category_id || !category.item_name) {
      return fail(services, requesterId, 'VALIDATION_ERROR', 'Search needs a requester and a category');
    }
    const priceErr = validateBasePrice(category.base_price);
    if (priceErr) {
      return fail(services, requesterId, 'VALIDATION_ERROR', `Invalid base price for ${category.item_name}`, {
        reason: priceErr,
      });
    }

    const active = this.getActiveSearches(requesterId).filter((s) => s.status === 'active').length;
    if (active >= services.config.max_active_searches) {
      return fail(
        services,
        requesterId,
        'VALIDATION_ERROR',
        `Search limit reached (${services.config.max_active_searches} active)`,
      );
    }

    const quality = normalizeQualityTier(qualityTier);
    const agent = normalizeAgentTier(agentTier);
    const fee = computeRetainerFee(agent, category.base_price);
    if (!services.ledger.debit(requesterId, fee)) {
      return fail(services, requesterId, 'FUNDS_ERROR', `Cannot pay the $${fee} search retainer`, { fee });
    }

    const [minMonths, maxMonths] = SEARCH_TIERS[agent].duration_months;
    const search: SearchRequest = {
      search_id: services.generateId(),
      requester_id: requesterId,
      category_id: category.category_id,
      item_name: category.item_name,
      base_price: category.base_price,
      quality_tier: quality,
      agent_tier: agent,
      fee_paid: fee,
      created_at_hour: services.clock(),
      ttl_hours: randomInt(services.random, minMonths, maxMonths) * HOURS_PER_MONTH,
      status: 'active',
      success: null,
      result_ids: [],
    };
    this.searches.set(search.search_id, search);
    services.stats.record(requesterId, 'searches_started');
    services.logger.info(
      { searchId: search.search_id, requesterId, agentTier: agent, qualityTier: quality, fee },
      'search started',
    );
    services.notifier.notify(
      requesterId,
      `${SEARCH_TIERS[agent].name} agent is searching for ${category.item_name}`,
      'info',
    );
    return createApiResponse(copySearch(search));
  }

  /** Retainer is not refunded. */
  cancelSearch(searchId: string, actorId: string): ApiResponse<SearchRequest> {
    const { services } = this;
    const search = this.searches.get(searchId);
    if (!search || search.requester_id !== actorId) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Search ${searchId} not found`);
    }
    if (search.status !== 'active') {
      return fail(services, actorId, 'VALIDATION_ERROR', `Search ${searchId} has already finished`);
    }
    this.searches.delete(searchId);
    services.logger.info({ searchId, requesterId: actorId }, 'search cancelled');
    services.notifier.notify(actorId, `Search for ${search.item_name} cancelled, retainer kept by agent`, 'info');
    return createApiResponse(copySearch(search));
  }

  /** Starts a fresh search on the same terms as an earlier one, for a new retainer. */
  renewSearch(searchId: string, actorId: string): ApiResponse<SearchRequest> {
    const { services } = this;
    const previous = this.searches.get(searchId);
    if (!previous || previous.requester_id !== actorId) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Search ${searchId} not found`);
    }
    const renewed = this.requestSearch(
      actorId,
      { category_id: previous.category_id, item_name: previous.item_name, base_price: previous.base_price },
      previous.quality_tier,
      previous.agent_tier,
    );
    if (renewed.success) {
      services.logger.info({ searchId, renewedAs: renewed.data.search_id }, 'search renewed');
    }
    return renewed;
  }

  getSearch(searchId: string): SearchRequest | undefined {
    const search = this.searches.get(searchId);
    return search ? copySearch(search) : undefined;
  }

  /** Live searches, including resolved ones whose listings are still on the market. */
  getActiveSearches(requesterId?: string): SearchRequest[] {
    const all = [...this.searches.values()];
    const matching = requesterId === undefined ? all : all.filter((s) => s.requester_id === requesterId);
    return matching.map(copySearch);
  }

  /** Opening a found listing starts its offer window. */
  viewListing(listingId: string, actorId: string): ApiResponse<ListingView> {
    const found = this.findOpenListing(listingId, actorId);
    if (!found.success) return found;
    found.data.ttl_started = true;
    return createApiResponse(toListingView(found.data));
  }

  submitOffer(listingId: string, actorId: string, amount: number): ApiResponse<OfferOutcome> {
    const { services } = this;
    const found = this.findOpenListing(listingId, actorId);
    if (!found.success) return found;
    const listing = found.data;

    const negotiation = listing.negotiation ?? openNegotiation(listing.hidden_quality, listing.asking_price);
    const offerErr = validateOffer(amount, negotiation.current_asking);
    if (offerErr) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Offer of $${amount} is not valid`, { reason: offerErr });
    }

    const weather = services.weather.current();
    const round = executeOffer(negotiation, amount, weatherModifier(weather), services.random);
    if (!round) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Negotiation on ${listing.item_name} is closed`);
    }
    services.logger.debug(
      { listingId, amount, weather, action: round.action, band: round.band, round: round.negotiation.round },
      'offer evaluated',
    );

    if (round.action === 'ACCEPT' && !services.ledger.debit(actorId, amount)) {
      return fail(services, actorId, 'FUNDS_ERROR', `Cannot pay $${amount} for ${listing.item_name}`, { amount });
    }
    services.stats.record(actorId, 'offers_made');

    listing.negotiation = round.negotiation;
    listing.ttl_started = true;
    const outcome: OfferOutcome = {
      listing_id: listingId,
      action: round.action,
      band: round.band,
      asking_price: round.negotiation.current_asking,
      counter_price: round.counter_price ?? null,
      price_paid: null,
      listing: null,
    };

    switch (round.action) {
      case 'ACCEPT':
        this.retireListing(listing, 'sold');
        services.stats.record(actorId, 'sales_completed');
        services.notifier.notify(actorId, `Seller accepted $${amount} for ${listing.item_name}`, 'ok');
        return createApiResponse({ ...outcome, price_paid: amount });
      case 'WALK_AWAY':
        this.retireListing(listing, 'withdrawn');
        services.stats.record(actorId, 'walk_aways');
        services.notifier.notify(actorId, `Seller of ${listing.item_name} walked away`, 'critical');
        return createApiResponse(outcome);
      case 'COUNTER':
        listing.status = 'negotiating';
        services.notifier.notify(
          actorId,
          `Seller countered at $${round.negotiation.current_asking} for ${listing.item_name}`,
          'info',
        );
        return createApiResponse({ ...outcome, listing: toListingView(listing) });
      case 'REJECT':
        listing.status = 'negotiating';
        services.notifier.notify(actorId, `Seller rejected $${amount} for ${listing.item_name}`, 'info');
        return createApiResponse({ ...outcome, listing: toListingView(listing) });
    }
  }

  /** Buy at the seller's current asking price. */
  purchaseListing(listingId: string, actorId: string): ApiResponse<PurchaseReceipt> {
    const { services } = this;
    const found = this.findOpenListing(listingId, actorId);
    if (!found.success) return found;
    const listing = found.data;

    const price = listing.negotiation?.current_asking ?? listing.asking_price;
    if (!services.ledger.debit(actorId, price)) {
      return fail(services, actorId, 'FUNDS_ERROR', `Cannot pay $${price} for ${listing.item_name}`, { price });
    }
    this.retireListing(listing, 'sold');
    services.stats.record(actorId, 'sales_completed');
    services.logger.info({ listingId, buyerId: actorId, price }, 'listing purchased');
    services.notifier.notify(actorId, `Bought ${listing.item_name} for $${price}`, 'ok');
    return createApiResponse({
      listing_id: listingId,
      buyer_id: actorId,
      price_paid: price,
      listing: toListingView(listing),
    });
  }

  onHourTick(hour: number): void {
    const { services } = this;
    for (const listing of services.listings.all()) {
      if (listing.source !== 'acquisition') continue;
      if (tickListingTtl(listing)) {
        this.retireListing(listing, 'expired');
        services.notifier.notify(listing.owner_id, `Offer window on ${listing.item_name} closed`, 'info');
      }
    }

    for (const search of [...this.searches.values()]) {
      if (search.status !== 'active') continue;
      search.ttl_hours = Math.max(0, search.ttl_hours - 1);
      if (search.ttl_hours === 0) {
        this.resolveSearch(search, hour);
      }
    }
    this.pruneResolved();
  }

  /** Persistence hooks. */
  load(search: SearchRequest): void {
    this.searches.set(search.search_id, copySearch(search));
  }

  clear(): void {
    this.searches.clear();
  }

  private findOpenListing(listingId: string, actorId: string): ApiResponse<ListingRecord> {
    const found = findOwnedListing(this.services, listingId, actorId);
    if (!found.success) return found;
    if (found.data.source !== 'acquisition') {
      return fail(this.services, actorId, 'VALIDATION_ERROR', `Listing ${listingId} is not open to offers`);
    }
    return found;
  }

  private resolveSearch(search: SearchRequest, hour: number): void {
    const { services } = this;
    const tier = SEARCH_TIERS[search.agent_tier];
    const chance = clamp(
      tier.success_chance + QUALITY_TIERS[search.quality_tier].success_modifier,
      services.config.min_search_success,
      services.config.max_search_success,
    );
    search.status = 'resolved';

    if (services.random() >= chance) {
      search.success = false;
      this.searches.delete(search.search_id);
      services.stats.record(search.requester_id, 'searches_failed');
      services.logger.info({ searchId: search.search_id, chance }, 'search came up empty');
      services.notifier.notify(search.requester_id, `Agent found no ${search.item_name} for sale`, 'info');
      return;
    }

    search.success = true;
    for (let i = 0; i < tier.find_count; i++) {
      const condition = generateCondition(
        { base_price: search.base_price, quality_tier: search.quality_tier, agent_tier: search.agent_tier },
        services.random,
      );
      const listing = this.createFoundListing(search, condition, hour);
      services.listings.add(listing);
      search.result_ids.push(listing.listing_id);
    }
    services.stats.record(search.requester_id, 'searches_succeeded');
    services.stats.record(search.requester_id, 'listings_found', tier.find_count);
    services.logger.info({ searchId: search.search_id, found: tier.find_count, chance }, 'search succeeded');
    services.notifier.notify(
      search.requester_id,
      `Agent found ${tier.find_count} ${search.item_name} listing${tier.find_count === 1 ? '' : 's'}`,
      'ok',
    );
  }

  private createFoundListing(search: SearchRequest, condition: GeneratedCondition, hour: number): ListingRecord {
    const { services } = this;
    const commission = Math.round(condition.price * services.config.commission_rate);
    return {
      listing_id: services.generateId(),
      category_id: search.category_id,
      item_name: search.item_name,
      owner_id: search.requester_id,
      source: 'acquisition',
      search_id: search.search_id,
      sale_id: null,
      status: 'found',
      created_at_hour: hour,
      ttl_hours: services.config.offer_window_hours,
      ttl_started: false,
      hidden_quality: condition.hidden_quality,
      age_years: condition.age_years,
      damage: condition.damage,
      wear: condition.wear,
      operating_hours: condition.operating_hours,
      generation: condition.generation,
      engine_reliability: condition.engine_reliability,
      hydraulic_reliability: condition.hydraulic_reliability,
      electrical_reliability: condition.electrical_reliability,
      base_price: search.base_price,
      asking_price: condition.price + commission,
      commission,
      on_hold: false,
      inspection_state: 'none',
      inspection_tier: null,
      inspection_requested_at_hour: null,
      inspection_completes_at_hour: null,
      inspection_fee_paid: 0,
      revealed: new Set(),
      periods_listed: 0,
      negotiation: null,
    };
  }

  private retireListing(listing: ListingRecord, status: 'sold' | 'expired' | 'withdrawn'): void {
    this.services.listings.retire(listing, status);
    this.services.logger.info({ listingId: listing.listing_id, status }, 'listing left the market');
    this.pruneResolved();
  }

  /** A resolved search leaves once every listing it produced is gone. */
  private pruneResolved(): void {
    for (const search of [...this.searches.values()]) {
      if (search.status !== 'resolved') continue;
      if (search.result_ids.every((id) => !this.services.listings.has(id))) {
        this.searches.delete(search.search_id);
      }
    }
  }
}
