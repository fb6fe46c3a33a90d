import type { ListingRecord } from './types.js';

/**
 * Advance a listing's clock by one hour. Held or unstarted clocks stay put.
 * Returns true once a running clock is at zero, including one restored at zero.
 */
export function tickListingTtl(record: ListingRecord): boolean {
  if (!record.ttl_started || record.on_hold) {
    return false;
  }
  if (record.ttl_hours > 0) {
    record.ttl_hours -= 1;
  }
  return record.ttl_hours === 0;
}
