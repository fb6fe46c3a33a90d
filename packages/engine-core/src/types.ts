/** 1 Poor, 2 Any, 3 Fair, 4 Good, 5 Excellent. */
export type QualityTier = 1 | 2 | 3 | 4 | 5;

/** 1 Local, 2 Regional, 3 National. */
export type AgentTier = 1 | 2 | 3;

/** 1 Quick, 2 Standard, 3 Comprehensive. */
export type InspectionTier = 1 | 2 | 3;

export type GenerationClass = 'RECENT' | 'MID_AGE' | 'OLD';

export type SellerPersonality = 'desperate' | 'motivated' | 'reasonable' | 'firm' | 'immovable';

export type WeatherCondition = 'sun' | 'cloudy' | 'rain' | 'storm' | 'hail' | 'snow' | 'fog';

/** Closed range [min, max]. */
export type Range = readonly [number, number];

/** Engine validation errors. */
export enum EngineError {
  INVALID_TIER = 'INVALID_TIER',
  INVALID_PRICE = 'INVALID_PRICE',
  INVALID_OFFER = 'INVALID_OFFER',
  OFFER_TOO_HIGH = 'OFFER_TOO_HIGH',
  INVALID_QUALITY = 'INVALID_QUALITY',
}
