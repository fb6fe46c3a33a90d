import type { ApiResponse, Logger, MarketplaceSnapshot } from '@usedmarket/shared';
import { fail } from '../errors.js';
import type { NotificationSink } from '../host/types.js';
import type { Marketplace, RestoreReport } from '../marketplace/marketplace.js';
import type { MarketRequest, MarketResponseData } from './types.js';

/** Requests that change a listing and so count against its one mutation per hour. */
function listingTarget(market: Marketplace, request: MarketRequest): string | null {
  switch (request.type) {
    case 'SUBMIT_OFFER':
    case 'PURCHASE_LISTING':
    case 'REQUEST_INSPECTION':
    case 'CANCEL_INSPECTION':
    case 'ACCEPT_OFFER':
    case 'DECLINE_OFFER':
    case 'MODIFY_SALE_PRICE':
      return request.listing_id;
    case 'CANCEL_SALE':
      return market.getSale(request.sale_id)?.listing_id ?? null;
    case 'REQUEST_SEARCH':
    case 'CANCEL_SEARCH':
    case 'RENEW_SEARCH':
    case 'LIST_FOR_SALE':
    case 'VIEW_LISTING':
      return null;
  }
}

/**
 * Single entry point for remote players. Requests run in arrival order and
 * every marketplace operation checks the actor against the record owner.
 * The first successful mutation of a listing in an hour wins; any later one
 * for the same listing is rejected until the next tick.
 */
export class MarketAuthority {
  private readonly claimed = new Set<string>();

  constructor(
    private readonly market: Marketplace,
    private readonly notifier: NotificationSink,
    private readonly logger: Logger,
  ) {}

  dispatch(request: MarketRequest): ApiResponse<MarketResponseData> {
    const target = listingTarget(this.market, request);
    if (target !== null && this.claimed.has(target)) {
      this.logger.info({ type: request.type, actor: request.actor_id, listingId: target }, 'race rejected');
      return fail(
        { notifier: this.notifier, logger: this.logger },
        request.actor_id,
        'RACE_REJECTED',
        'Already handled',
        { listing_id: target },
      );
    }

    const result = this.apply(request);
    if (result.success && target !== null) {
      this.claimed.add(target);
    }
    return result;
  }

  /** Process a batch strictly in the order given. */
  dispatchAll(requests: readonly MarketRequest[]): ApiResponse<MarketResponseData>[] {
    return requests.map((request) => this.dispatch(request));
  }

  /** Advance the market and open every listing to mutation again. */
  onHourTick(hour: number): boolean {
    const applied = this.market.onHourTick(hour);
    if (applied) {
      this.claimed.clear();
    }
    return applied;
  }

  onPeriodTick(period: number): boolean {
    return this.market.onPeriodTick(period);
  }

  /** Replace the market state. Claims from before the load do not carry over. */
  restore(snapshot: MarketplaceSnapshot): RestoreReport {
    this.claimed.clear();
    return this.market.restore(snapshot);
  }

  private apply(request: MarketRequest): ApiResponse<MarketResponseData> {
    const { market } = this;
    switch (request.type) {
      case 'REQUEST_SEARCH':
        return market.requestSearch(request.actor_id, request.category, request.quality_tier, request.agent_tier);
      case 'CANCEL_SEARCH':
        return market.cancelSearch(request.search_id, request.actor_id);
      case 'RENEW_SEARCH':
        return market.renewSearch(request.search_id, request.actor_id);
      case 'LIST_FOR_SALE':
        return market.listForSale(request.actor_id, request.item, request.agent_tier);
      case 'CANCEL_SALE':
        return market.cancelSale(request.sale_id, request.actor_id);
      case 'MODIFY_SALE_PRICE':
        return market.modifySalePrice(request.listing_id, request.actor_id, request.price);
      case 'VIEW_LISTING':
        return market.viewListing(request.listing_id, request.actor_id);
      case 'SUBMIT_OFFER':
        return market.submitOffer(request.listing_id, request.actor_id, request.amount);
      case 'PURCHASE_LISTING':
        return market.purchaseListing(request.listing_id, request.actor_id);
      case 'REQUEST_INSPECTION':
        return market.requestInspection(request.listing_id, request.actor_id, request.tier);
      case 'CANCEL_INSPECTION':
        return market.cancelInspection(request.listing_id, request.actor_id);
      case 'ACCEPT_OFFER':
        return market.acceptOffer(request.listing_id, request.actor_id);
      case 'DECLINE_OFFER':
        return market.declineOffer(request.listing_id, request.actor_id);
    }
  }
}
