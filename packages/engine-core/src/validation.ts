import { EngineError } from './types.js';

/** Offers above asking are allowed, up to this multiple. */
export const MAX_OFFER_RATIO = 1.5;

export function validateBasePrice(price: number): EngineError | null {
  if (!Number.isFinite(price) || price <= 0) {
    return EngineError.INVALID_PRICE;
  }
  return null;
}

export function validateHiddenQuality(quality: number): EngineError | null {
  if (!Number.isFinite(quality) || quality < 0 || quality > 1) {
    return EngineError.INVALID_QUALITY;
  }
  return null;
}

/** Returns the first problem with an offer against the current asking price, or null. */
export function validateOffer(offer: number, asking: number): EngineError | null {
  const priceErr = validateBasePrice(asking);
  if (priceErr) return priceErr;

  if (!Number.isFinite(offer) || offer <= 0) {
    return EngineError.INVALID_OFFER;
  }
  if (offer > asking * MAX_OFFER_RATIO) {
    return EngineError.OFFER_TOO_HIGH;
  }
  return null;
}
