import type { ListingRecord } from './types.js';
import { TERMINAL_LISTING_STATUSES } from './types.js';

/**
 * Live listings. Terminal records are deleted, not filtered, so a sold,
 * expired or withdrawn id never resolves again.
 */
export class ListingStore {
  private readonly records = new Map<string, ListingRecord>();

  add(record: ListingRecord): void {
    if (TERMINAL_LISTING_STATUSES.has(record.status)) {
      throw new Error(`Refusing to store terminal listing ${record.listing_id}`);
    }
    this.records.set(record.listing_id, record);
  }

  get(listingId: string): ListingRecord | undefined {
    return this.records.get(listingId);
  }

  has(listingId: string): boolean {
    return this.records.has(listingId);
  }

  /** Mark terminal and drop from the live set. */
  retire(record: ListingRecord, status: 'sold' | 'expired' | 'withdrawn'): void {
    record.status = status;
    record.on_hold = false;
    this.records.delete(record.listing_id);
  }

  all(): ListingRecord[] {
    return [...this.records.values()];
  }

  byOwner(ownerId: string): ListingRecord[] {
    return this.all().filter((r) => r.owner_id === ownerId);
  }

  clear(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }
}
