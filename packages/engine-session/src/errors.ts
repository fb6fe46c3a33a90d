import { createApiError, type ApiResponse, type MarketErrorCode } from '@usedmarket/shared';
import type { MarketServices } from './marketplace/services.js';

/**
 * Build a failed result and tell the owner about it.
 * Nothing here is fatal; the caller returns the result and carries on.
 */
export function fail(
  services: Pick<MarketServices, 'notifier' | 'logger'>,
  ownerId: string,
  code: MarketErrorCode,
  message: string,
  details?: unknown,
): ApiResponse<never> {
  services.logger.debug({ ownerId, code, details }, message);
  services.notifier.notify(ownerId, message, code === 'RACE_REJECTED' ? 'info' : 'critical');
  return createApiError(code, message, details);
}
