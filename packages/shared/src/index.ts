// ─── Shared Types ────────────────────────────────────────────
export type { ApiResponse, ApiError, MarketErrorCode } from './types/api.js';
export type { FlatValue, FlatRecord, MarketplaceSnapshot, RecordKind } from './types/records.js';
export type { NotificationSeverity, Notification } from './types/notification.js';

// ─── Constants ───────────────────────────────────────────────
export {
  MARKET_ERROR_CODES,
  RECORD_KINDS,
  NOTIFICATION_SEVERITIES,
  HOURS_PER_MONTH,
} from './constants.js';

// ─── Utilities ───────────────────────────────────────────────
export { createApiResponse, createApiError, isApiError } from './utils/api.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LoggerOptions } from './utils/logger.js';
