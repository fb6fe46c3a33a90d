import type { MARKET_ERROR_CODES } from '../constants.js';

export type MarketErrorCode = (typeof MARKET_ERROR_CODES)[number];

export interface ApiError {
  code: MarketErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Result of every operation exposed to the host.
 * Operations never mutate a record the caller already holds; they hand back a fresh view.
 */
export type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: ApiError };
