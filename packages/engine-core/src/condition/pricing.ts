/** Age knocks 3% per year off the price, up to 25%. */
export const AGE_DEPRECIATION_PER_YEAR = 0.03;
export const MAX_AGE_DEPRECIATION = 0.25;
export const MIN_PRICE_FRACTION = 0.05;

export function computeUsedPrice(basePrice: number, priceMultiplier: number, ageYears: number): number {
  const depreciation = Math.min(MAX_AGE_DEPRECIATION, ageYears * AGE_DEPRECIATION_PER_YEAR);
  const raw = Math.floor(basePrice * priceMultiplier * (1 - depreciation));
  return Math.max(raw, Math.ceil(basePrice * MIN_PRICE_FRACTION));
}
