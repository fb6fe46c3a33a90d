export interface MarketCounters {
  searches_started: number;
  searches_succeeded: number;
  searches_failed: number;
  listings_found: number;
  offers_made: number;
  walk_aways: number;
  inspections: number;
  sales_completed: number;
}

export type MarketCounter = keyof MarketCounters;

export interface OwnerStatistics {
  current: MarketCounters;
  previous: MarketCounters | null;
}

export const MARKET_COUNTERS: readonly MarketCounter[] = [
  'searches_started',
  'searches_succeeded',
  'searches_failed',
  'listings_found',
  'offers_made',
  'walk_aways',
  'inspections',
  'sales_completed',
];

export function emptyCounters(): MarketCounters {
  return {
    searches_started: 0,
    searches_succeeded: 0,
    searches_failed: 0,
    listings_found: 0,
    offers_made: 0,
    walk_aways: 0,
    inspections: 0,
    sales_completed: 0,
  };
}

/** Per-owner activity for the running market period and the one before it. */
export class MarketStatistics {
  private readonly owners = new Map<string, OwnerStatistics>();

  record(ownerId: string, counter: MarketCounter, amount = 1): void {
    let stats = this.owners.get(ownerId);
    if (!stats) {
      stats = { current: emptyCounters(), previous: null };
      this.owners.set(ownerId, stats);
    }
    stats.current[counter] += amount;
  }

  get(ownerId: string): OwnerStatistics {
    const stats = this.owners.get(ownerId);
    if (!stats) {
      return { current: emptyCounters(), previous: null };
    }
    return { current: { ...stats.current }, previous: stats.previous ? { ...stats.previous } : null };
  }

  /** Close the period. Returns totals across owners for the period just closed. */
  rollPeriod(): MarketCounters {
    const totals = emptyCounters();
    for (const stats of this.owners.values()) {
      for (const key of MARKET_COUNTERS) {
        totals[key] += stats.current[key];
      }
      stats.previous = stats.current;
      stats.current = emptyCounters();
    }
    return totals;
  }
}
