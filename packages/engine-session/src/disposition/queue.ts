import {
  EngineError,
  SALE_TIERS,
  clamp,
  computeSaleFee,
  isAgentTier,
  randomInt,
  uniform,
  validateBasePrice,
  type AgentTier,
  type GenerationClass,
} from '@usedmarket/engine-core';
import { HOURS_PER_MONTH, createApiResponse, type ApiResponse } from '@usedmarket/shared';
import { fail } from '../errors.js';
import { tickListingTtl } from '../listing/ttl.js';
import type { ListingRecord, ListingView } from '../listing/types.js';
import { toListingView } from '../listing/visibility.js';
import type { MarketServices } from '../marketplace/services.js';
import type { SaleItem, SaleRequest } from './types.js';

/** Hidden quality of an owner's own item. It never negotiates, so only the field's presence matters. */
const OWNED_ITEM_QUALITY = 0.5;

function copySale(sale: SaleRequest): SaleRequest {
  return {
    ...sale,
    item: { ...sale.item },
    offer_history: sale.offer_history.map((entry) => ({ ...entry })),
    pending_offer: sale.pending_offer ? { ...sale.pending_offer } : null,
  };
}

function generationForAge(ageYears: number): GenerationClass {
  if (ageYears <= 3) return 'RECENT';
  if (ageYears <= 7) return 'MID_AGE';
  return 'OLD';
}

/**
 * Items players have put up for sale through an agent.
 * Simulated buyers make offers on a timer; the owner accepts or declines.
 */
export class DispositionQueue {
  private readonly sales = new Map<string, SaleRequest>();

  constructor(private readonly services: MarketServices) {}

  listForSale(ownerId: string, item: SaleItem, agentTier: number): ApiResponse<SaleRequest> {
    const { services } = this;
    if (!isAgentTier(agentTier)) {
      return fail(services, ownerId, 'VALIDATION_ERROR', `Unknown sale agent tier ${agentTier}`, {
        reason: EngineError.INVALID_TIER,
      });
    }
    if (!ownerId || !item.item_id || !item.item_name) {
      return fail(services, ownerId, 'VALIDATION_ERROR', 'Sale needs an owner and an item');
    }
    const valueErr = validateBasePrice(item.vanilla_value);
    if (valueErr) {
      return fail(services, ownerId, 'VALIDATION_ERROR', `Invalid value for ${item.item_name}`, { reason: valueErr });
    }
    if (this.findActiveByItem(item.item_id)) {
      return fail(services, ownerId, 'VALIDATION_ERROR', `${item.item_name} is already listed for sale`);
    }

    const fee = computeSaleFee(agentTier, item.vanilla_value);
    if (!services.ledger.debit(ownerId, fee)) {
      return fail(services, ownerId, 'FUNDS_ERROR', `Cannot pay the $${fee} sale agent fee`, { fee });
    }

    const spec = SALE_TIERS[agentTier];
    const hour = services.clock();
    const lifetime = randomInt(services.random, spec.duration_months[0], spec.duration_months[1]) * HOURS_PER_MONTH;
    const saleId = services.generateId();
    const listing = this.createSaleListing(ownerId, item, saleId, lifetime, hour);

    const sale: SaleRequest = {
      sale_id: saleId,
      owner_id: ownerId,
      item: { ...item },
      listing_id: listing.listing_id,
      agent_tier: agentTier,
      fee_paid: fee,
      created_at_hour: hour,
      next_offer_in_hours: this.drawOfferInterval(agentTier),
      offer_history: [],
      pending_offer: null,
      status: 'active',
    };
    services.listings.add(listing);
    this.sales.set(saleId, sale);
    services.logger.info({ saleId, ownerId, agentTier, fee, lifetime }, 'item listed for sale');
    services.notifier.notify(ownerId, `${spec.name} agent is selling ${item.item_name}`, 'info');
    return createApiResponse(copySale(sale));
  }

  acceptOffer(listingId: string, actorId: string): ApiResponse<SaleRequest> {
    const { services } = this;
    const found = this.findPendingSale(listingId, actorId);
    if (!found.success) return found;
    const { sale, offer } = found.data;

    if (!services.ledger.credit(sale.owner_id, offer.amount)) {
      return fail(services, actorId, 'FUNDS_ERROR', `Could not collect $${offer.amount} for ${sale.item.item_name}`, {
        amount: offer.amount,
      });
    }
    this.settleLatestOffer(sale, true);
    sale.pending_offer = null;
    sale.status = 'sold';
    this.closeSale(sale, 'sold');
    services.stats.record(sale.owner_id, 'sales_completed');
    services.notifier.notify(sale.owner_id, `Sold ${sale.item.item_name} for $${offer.amount}`, 'ok');
    return createApiResponse(copySale(sale));
  }

  declineOffer(listingId: string, actorId: string): ApiResponse<SaleRequest> {
    const { services } = this;
    const found = this.findPendingSale(listingId, actorId);
    if (!found.success) return found;
    const { sale, offer } = found.data;

    this.resumeSearch(sale);
    services.logger.info({ saleId: sale.sale_id, amount: offer.amount }, 'buyer offer declined');
    services.notifier.notify(sale.owner_id, `Declined $${offer.amount} for ${sale.item.item_name}`, 'info');
    return createApiResponse(copySale(sale));
  }

  /** Fee is forfeited. Not allowed while a buyer's offer is waiting. */
  cancelSale(saleId: string, actorId: string): ApiResponse<SaleRequest> {
    const { services } = this;
    const sale = this.sales.get(saleId);
    if (!sale || sale.owner_id !== actorId) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Sale ${saleId} not found`);
    }
    if (sale.pending_offer) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Answer the pending offer on ${sale.item.item_name} first`);
    }
    sale.status = 'cancelled';
    this.closeSale(sale, 'withdrawn');
    services.notifier.notify(actorId, `Sale of ${sale.item.item_name} cancelled, agent fee forfeited`, 'info');
    return createApiResponse(copySale(sale));
  }

  /** Buyers never offer more than the asking price. */
  modifySalePrice(listingId: string, actorId: string, price: number): ApiResponse<ListingView> {
    const { services } = this;
    const found = this.findOwnedSale(listingId, actorId);
    if (!found.success) return found;
    const { sale, listing } = found.data;

    const priceErr = validateBasePrice(price);
    if (priceErr) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Asking price of $${price} is not valid`, { reason: priceErr });
    }
    if (sale.pending_offer) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Answer the pending offer on ${sale.item.item_name} first`);
    }
    const previous = listing.asking_price;
    listing.asking_price = Math.round(price);
    services.logger.info({ saleId: sale.sale_id, previous, asking: listing.asking_price }, 'sale price changed');
    services.notifier.notify(actorId, `${sale.item.item_name} now listed at $${listing.asking_price}`, 'info');
    return createApiResponse(toListingView(listing));
  }

  getSale(saleId: string): SaleRequest | undefined {
    const sale = this.sales.get(saleId);
    return sale ? copySale(sale) : undefined;
  }

  getActiveSales(ownerId?: string): SaleRequest[] {
    const all = [...this.sales.values()];
    const matching = ownerId === undefined ? all : all.filter((s) => s.owner_id === ownerId);
    return matching.map(copySale);
  }

  onHourTick(hour: number): void {
    const { services } = this;
    for (const sale of [...this.sales.values()]) {
      const listing = services.listings.get(sale.listing_id);
      if (!listing) {
        services.logger.warn({ saleId: sale.sale_id }, 'sale lost its listing');
        sale.status = 'expired';
        this.sales.delete(sale.sale_id);
        continue;
      }
      if (tickListingTtl(listing)) {
        this.expireSale(sale);
        continue;
      }

      if (sale.pending_offer) {
        sale.pending_offer.expires_in_hours -= 1;
        if (sale.pending_offer.expires_in_hours <= 0) {
          const amount = sale.pending_offer.amount;
          this.resumeSearch(sale);
          services.notifier.notify(sale.owner_id, `Buyer's $${amount} offer on ${sale.item.item_name} lapsed`, 'info');
        }
        continue;
      }

      sale.next_offer_in_hours -= 1;
      if (sale.next_offer_in_hours <= 0) {
        this.rollForBuyer(sale, listing, hour);
      }
    }
  }

  /** Persistence hooks. */
  load(sale: SaleRequest): void {
    this.sales.set(sale.sale_id, copySale(sale));
  }

  clear(): void {
    this.sales.clear();
  }

  private rollForBuyer(sale: SaleRequest, listing: ListingRecord, hour: number): void {
    const { services } = this;
    const spec = SALE_TIERS[sale.agent_tier];
    if (services.random() >= spec.offer_chance) {
      sale.next_offer_in_hours = this.drawOfferInterval(sale.agent_tier);
      services.logger.debug({ saleId: sale.sale_id }, 'no buyer this round');
      return;
    }

    const amount = Math.min(
      listing.asking_price,
      Math.round(sale.item.vanilla_value * uniform(services.random, spec.return_range)),
    );
    sale.pending_offer = { amount, made_at_hour: hour, expires_in_hours: services.config.pending_offer_hours };
    sale.offer_history.push({ amount, hour, accepted: null });
    listing.status = 'negotiating';
    services.logger.info({ saleId: sale.sale_id, amount }, 'buyer offer received');
    services.notifier.notify(sale.owner_id, `A buyer offers $${amount} for ${sale.item.item_name}`, 'ok');
  }

  private resumeSearch(sale: SaleRequest): void {
    this.settleLatestOffer(sale, false);
    sale.pending_offer = null;
    sale.next_offer_in_hours = this.drawOfferInterval(sale.agent_tier);
    const listing = this.services.listings.get(sale.listing_id);
    if (listing) {
      listing.status = 'searching';
    }
  }

  private expireSale(sale: SaleRequest): void {
    this.settleLatestOffer(sale, false);
    sale.pending_offer = null;
    sale.status = 'expired';
    this.closeSale(sale, 'expired');
    this.services.notifier.notify(
      sale.owner_id,
      `Nobody bought ${sale.item.item_name}; it is back in your hands`,
      'info',
    );
  }

  private closeSale(sale: SaleRequest, listingStatus: 'sold' | 'expired' | 'withdrawn'): void {
    const listing = this.services.listings.get(sale.listing_id);
    if (listing) {
      this.services.listings.retire(listing, listingStatus);
    }
    this.sales.delete(sale.sale_id);
    this.services.logger.info({ saleId: sale.sale_id, status: sale.status }, 'sale closed');
  }

  private settleLatestOffer(sale: SaleRequest, accepted: boolean): void {
    const latest = sale.offer_history[sale.offer_history.length - 1];
    if (latest && latest.accepted === null) {
      latest.accepted = accepted;
    }
  }

  private findActiveByItem(itemId: string): SaleRequest | undefined {
    for (const sale of this.sales.values()) {
      if (sale.item.item_id === itemId && sale.status === 'active') return sale;
    }
    return undefined;
  }

  private findOwnedSale(
    listingId: string,
    actorId: string,
  ): ApiResponse<{ sale: SaleRequest; listing: ListingRecord }> {
    const { services } = this;
    let sale: SaleRequest | undefined;
    for (const candidate of this.sales.values()) {
      if (candidate.listing_id === listingId) sale = candidate;
    }
    const listing = services.listings.get(listingId);
    if (!sale || !listing || sale.owner_id !== actorId) {
      return fail(services, actorId, 'VALIDATION_ERROR', `No sale for listing ${listingId}`);
    }
    return createApiResponse({ sale, listing });
  }

  private findPendingSale(
    listingId: string,
    actorId: string,
  ): ApiResponse<{ sale: SaleRequest; offer: NonNullable<SaleRequest['pending_offer']> }> {
    const found = this.findOwnedSale(listingId, actorId);
    if (!found.success) return found;
    const { sale } = found.data;
    if (!sale.pending_offer) {
      return fail(this.services, actorId, 'VALIDATION_ERROR', `No buyer offer waiting on ${sale.item.item_name}`);
    }
    return createApiResponse({ sale, offer: sale.pending_offer });
  }

  private drawOfferInterval(tier: AgentTier): number {
    const [min, max] = SALE_TIERS[tier].offer_interval_hours;
    return randomInt(this.services.random, min, max);
  }

  private createSaleListing(
    ownerId: string,
    item: SaleItem,
    saleId: string,
    lifetime: number,
    hour: number,
  ): ListingRecord {
    const ageYears = item.age_years ?? 0;
    const damage = clamp(item.damage ?? 0, 0, 1);
    return {
      listing_id: this.services.generateId(),
      category_id: item.category_id,
      item_name: item.item_name,
      owner_id: ownerId,
      source: 'disposition',
      search_id: null,
      sale_id: saleId,
      status: 'searching',
      created_at_hour: hour,
      ttl_hours: lifetime,
      ttl_started: true,
      hidden_quality: OWNED_ITEM_QUALITY,
      age_years: ageYears,
      damage,
      wear: clamp(item.wear ?? 0, 0, 1),
      operating_hours: item.operating_hours ?? 0,
      generation: generationForAge(ageYears),
      engine_reliability: 1 - damage,
      hydraulic_reliability: 1 - damage,
      electrical_reliability: 1 - damage,
      base_price: item.vanilla_value,
      asking_price: item.vanilla_value,
      commission: 0,
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
}
