import {
  EngineError,
  INSPECTION_TIERS,
  computeInspectionFee,
  isInspectionTier,
  type RevealDepth,
} from '@usedmarket/engine-core';
import { createApiResponse, type ApiResponse } from '@usedmarket/shared';
import { fail } from '../errors.js';
import { findOwnedListing } from '../listing/access.js';
import type { HiddenField, ListingRecord, ListingView } from '../listing/types.js';
import { toListingView } from '../listing/visibility.js';
import type { MarketServices } from '../marketplace/services.js';

/** Hidden fields each inspection depth uncovers. Deeper tiers include the shallower ones. */
export const REVEALED_AT_DEPTH: Readonly<Record<RevealDepth, readonly HiddenField[]>> = {
  1: ['overall_rating'],
  2: ['overall_rating', 'engine_reliability', 'hydraulic_reliability', 'electrical_reliability'],
  3: [
    'overall_rating',
    'engine_reliability',
    'hydraulic_reliability',
    'electrical_reliability',
    'quality_hint',
    'repair_estimate',
  ],
};

export class InspectionService {
  constructor(private readonly services: MarketServices) {}

  /** Charges the listing owner and puts the listing on hold until the inspection completes. */
  requestInspection(listingId: string, actorId: string, tier: number): ApiResponse<ListingView> {
    const { services } = this;
    if (!isInspectionTier(tier)) {
      return fail(services, actorId, 'VALIDATION_ERROR', `Unknown inspection tier ${tier}`, {
        reason: EngineError.INVALID_TIER,
      });
    }
    const found = findOwnedListing(services, listingId, actorId);
    if (!found.success) return found;
    const listing = found.data;
    if (listing.source !== 'acquisition') {
      return fail(services, actorId, 'VALIDATION_ERROR', `Listing ${listingId} is not open to inspection`);
    }

    if (listing.inspection_state === 'pending') {
      return fail(services, actorId, 'VALIDATION_ERROR', `${listing.item_name} is already being inspected`);
    }
    if (listing.inspection_state === 'complete') {
      return fail(services, actorId, 'VALIDATION_ERROR', `${listing.item_name} has already been inspected`);
    }

    const spec = INSPECTION_TIERS[tier];
    const fee = computeInspectionFee(tier, listing.negotiation?.current_asking ?? listing.asking_price);
    if (!services.ledger.debit(listing.owner_id, fee)) {
      return fail(services, actorId, 'FUNDS_ERROR', `Cannot pay the $${fee} inspection fee`, { fee });
    }

    const hour = services.clock();
    listing.inspection_state = 'pending';
    listing.inspection_tier = tier;
    listing.inspection_requested_at_hour = hour;
    listing.inspection_completes_at_hour = hour + spec.duration_hours;
    listing.inspection_fee_paid = fee;
    listing.on_hold = true;
    listing.ttl_started = true;
    services.stats.record(listing.owner_id, 'inspections');
    services.logger.info(
      { listingId, tier, fee, completesAt: listing.inspection_completes_at_hour },
      'inspection requested',
    );
    services.notifier.notify(
      listing.owner_id,
      `${spec.name} inspection of ${listing.item_name} booked for ${spec.duration_hours}h`,
      'info',
    );
    return createApiResponse(toListingView(listing));
  }

  /** Releases the hold. The fee is not refunded. */
  cancelInspection(listingId: string, actorId: string): ApiResponse<ListingView> {
    const { services } = this;
    const found = findOwnedListing(services, listingId, actorId);
    if (!found.success) return found;
    const listing = found.data;
    if (listing.inspection_state !== 'pending') {
      return fail(services, actorId, 'VALIDATION_ERROR', `No inspection running on ${listing.item_name}`);
    }
    listing.inspection_state = 'none';
    listing.inspection_tier = null;
    listing.inspection_requested_at_hour = null;
    listing.inspection_completes_at_hour = null;
    listing.on_hold = false;
    services.notifier.notify(actorId, `Inspection of ${listing.item_name} cancelled, fee kept`, 'info');
    return createApiResponse(toListingView(listing));
  }

  getInspectionHoursRemaining(listingId: string, actorId: string): ApiResponse<number> {
    const found = findOwnedListing(this.services, listingId, actorId);
    if (!found.success) return found;
    const completesAt = found.data.inspection_completes_at_hour;
    if (found.data.inspection_state !== 'pending' || completesAt === null) {
      return fail(this.services, actorId, 'VALIDATION_ERROR', `No inspection running on ${found.data.item_name}`);
    }
    return createApiResponse(Math.max(0, completesAt - this.services.clock()));
  }

  onHourTick(hour: number): void {
    for (const listing of this.services.listings.all()) {
      const completesAt = listing.inspection_completes_at_hour;
      if (listing.inspection_state === 'pending' && completesAt !== null && hour >= completesAt) {
        this.complete(listing);
      }
    }
  }

  private complete(listing: ListingRecord): void {
    const { services } = this;
    const tier = listing.inspection_tier ?? 1;
    const spec = INSPECTION_TIERS[tier];
    for (const field of REVEALED_AT_DEPTH[spec.reveal_depth]) {
      listing.revealed.add(field);
    }
    listing.inspection_state = 'complete';
    listing.on_hold = false;
    services.logger.info({ listingId: listing.listing_id, tier }, 'inspection complete');
    services.notifier.notify(listing.owner_id, `${spec.name} inspection of ${listing.item_name} is ready`, 'ok');
  }
}
