export const MARKET_ERROR_CODES = [
  'VALIDATION_ERROR',
  'FUNDS_ERROR',
  'RACE_REJECTED',
  'CORRUPT_RECORD',
] as const;

export const RECORD_KINDS = ['listing', 'search', 'sale'] as const;

export const NOTIFICATION_SEVERITIES = ['ok', 'info', 'critical'] as const;

/** One in-game month is one simulated day of 24 hours. */
export const HOURS_PER_MONTH = 24;
