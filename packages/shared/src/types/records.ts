import type { RECORD_KINDS } from '../constants.js';

export type RecordKind = (typeof RECORD_KINDS)[number];

export type FlatValue = string | number | boolean;

/** Flat key-value form every persisted record serializes to. */
export type FlatRecord = Record<string, FlatValue>;

/**
 * Everything the marketplace needs to resume a session.
 * Timestamps are simulated-hour integers, never wall-clock time.
 */
export interface MarketplaceSnapshot {
  current_hour: number;
  current_period: number;
  listings: FlatRecord[];
  searches: FlatRecord[];
  sales: FlatRecord[];
}
