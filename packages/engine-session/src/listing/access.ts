import { createApiResponse, type ApiResponse } from '@usedmarket/shared';
import { fail } from '../errors.js';
import type { MarketServices } from '../marketplace/services.js';
import type { ListingRecord } from './types.js';

/** Live listing owned by the actor, or a VALIDATION_ERROR naming what was wrong. */
export function findOwnedListing(
  services: MarketServices,
  listingId: string,
  actorId: string,
): ApiResponse<ListingRecord> {
  const listing = services.listings.get(listingId);
  if (!listing) {
    return fail(services, actorId, 'VALIDATION_ERROR', `Listing ${listingId} not found`);
  }
  if (listing.owner_id !== actorId) {
    return fail(services, actorId, 'VALIDATION_ERROR', `Listing ${listingId} belongs to another owner`);
  }
  return createApiResponse(listing);
}
