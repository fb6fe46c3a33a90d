import type { RandomSource } from '@usedmarket/engine-core';
import type { Logger } from '@usedmarket/shared';
import type { Ledger, NotificationSink, WeatherProvider } from '../host/types.js';
import type { ListingStore } from '../listing/store.js';
import type { MarketplaceConfig } from './config.js';
import type { MarketStatistics } from './statistics.js';

/** What every queue shares: host adapters, the live listing store and the clock. */
export interface MarketServices {
  listings: ListingStore;
  ledger: Ledger;
  weather: WeatherProvider;
  notifier: NotificationSink;
  random: RandomSource;
  logger: Logger;
  stats: MarketStatistics;
  config: MarketplaceConfig;
  /** Current simulated hour. */
  clock: () => number;
  generateId: () => string;
}
