import type { RandomSource, WeatherCondition } from '@usedmarket/engine-core';
import { createLogger, type Notification, type NotificationSeverity } from '@usedmarket/shared';
import type { Ledger, NotificationSink, WeatherProvider } from '../src/host/types.js';
import type { HiddenField, ListingRecord } from '../src/listing/types.js';
import { Marketplace, type MarketplaceOptions } from '../src/marketplace/marketplace.js';

export class FakeLedger implements Ledger {
  private readonly balances = new Map<string, number>();
  creditsFail = false;

  constructor(initial: Record<string, number> = {}) {
    for (const [owner, balance] of Object.entries(initial)) {
      this.balances.set(owner, balance);
    }
  }

  balance(ownerId: string): number {
    return this.balances.get(ownerId) ?? 0;
  }

  debit(ownerId: string, amount: number): boolean {
    const balance = this.balance(ownerId);
    if (balance < amount) return false;
    this.balances.set(ownerId, balance - amount);
    return true;
  }

  credit(ownerId: string, amount: number): boolean {
    if (this.creditsFail) return false;
    this.balances.set(ownerId, this.balance(ownerId) + amount);
    return true;
  }
}

export class FakeWeather implements WeatherProvider {
  condition: WeatherCondition = 'sun';

  current(): WeatherCondition {
    return this.condition;
  }
}

export class RecordingNotifier implements NotificationSink {
  readonly notifications: Notification[] = [];

  notify(ownerId: string, message: string, severity: NotificationSeverity): void {
    this.notifications.push({ owner_id: ownerId, message, severity });
  }

  last(): Notification | undefined {
    return this.notifications[this.notifications.length - 1];
  }
}

/** Returns queued values first, then the fallback forever. */
export class QueuedRandom {
  private readonly queue: number[] = [];

  constructor(private readonly fallback = 0.5) {}

  push(...values: number[]): void {
    this.queue.push(...values);
  }

  readonly source: RandomSource = () => this.queue.shift() ?? this.fallback;
}

export function sequentialIds(prefix = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export const silentLogger = createLogger({ level: 'silent' });

export interface MarketFixture {
  market: Marketplace;
  ledger: FakeLedger;
  weather: FakeWeather;
  notifier: RecordingNotifier;
  random: QueuedRandom;
}

export function makeMarket(
  balances: Record<string, number> = { 'player-1': 500000 },
  overrides?: Partial<MarketplaceOptions>,
): MarketFixture {
  const ledger = new FakeLedger(balances);
  const weather = new FakeWeather();
  const notifier = new RecordingNotifier();
  const random = new QueuedRandom();
  const market = new Marketplace({
    ledger,
    weather,
    notifier,
    random: random.source,
    logger: silentLogger,
    generateId: sequentialIds(),
    ...overrides,
  });
  return { market, ledger, weather, notifier, random };
}

export function tickThrough(market: Marketplace, from: number, to: number): void {
  for (let hour = from; hour <= to; hour++) {
    market.onHourTick(hour);
  }
}

export const EXCAVATOR = { category_id: 'excavators', item_name: 'Excavator', base_price: 200000 };

/**
 * Local search for a Poor excavator that succeeds at hour 24.
 * With every other draw at 0.5 the single listing is Mid-age, 6 years,
 * priced 49200 + 3936 commission, hidden quality 0.21125 (motivated).
 */
export function findPoorExcavator(fixture: MarketFixture, requesterId = 'player-1'): string {
  const { market, random } = fixture;
  const search = market.requestSearch(requesterId, EXCAVATOR, 1, 1);
  if (!search.success) throw new Error(search.error.message);
  tickThrough(market, 1, 23);
  random.push(0.1);
  market.onHourTick(24);
  const resolved = market.getSearch(search.data.search_id);
  const listingId = resolved?.result_ids[0];
  if (listingId === undefined) throw new Error('search did not produce a listing');
  return listingId;
}

/** The countered Poor excavator as a raw record, for codec and store tests. */
export function makeListing(overrides?: Partial<ListingRecord>): ListingRecord {
  return {
    listing_id: 'listing-1',
    category_id: 'excavators',
    item_name: 'Excavator',
    owner_id: 'player-1',
    source: 'acquisition',
    search_id: 'search-1',
    sale_id: null,
    status: 'negotiating',
    created_at_hour: 24,
    ttl_hours: 60,
    ttl_started: true,
    hidden_quality: 0.21125,
    age_years: 6,
    damage: 0.8775,
    wear: 0.9425,
    operating_hours: 4200,
    generation: 'MID_AGE',
    engine_reliability: 0.1225,
    hydraulic_reliability: 0.1225,
    electrical_reliability: 0.1225,
    base_price: 200000,
    asking_price: 53136,
    commission: 3936,
    on_hold: false,
    inspection_state: 'complete',
    inspection_tier: 1,
    inspection_requested_at_hour: 30,
    inspection_completes_at_hour: 32,
    inspection_fee_paid: 2063,
    revealed: new Set<HiddenField>(['overall_rating']),
    periods_listed: 2,
    negotiation: {
      personality: 'motivated',
      acceptance_threshold: 0.82,
      tolerance: 0.1,
      state: 'COUNTERED',
      list_price: 53136,
      current_asking: 48500,
      last_offer: 42600,
      round: 1,
      weather_modifier: 0,
    },
    ...overrides,
  };
}
