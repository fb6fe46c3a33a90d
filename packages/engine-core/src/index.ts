// Types
export type {
  QualityTier,
  AgentTier,
  InspectionTier,
  GenerationClass,
  SellerPersonality,
  WeatherCondition,
  Range,
} from './types.js';
export { EngineError } from './types.js';

// Random
export type { RandomSource } from './random.js';
export { createRandom, uniform, randomInt, weightedIndex, variance } from './random.js';

// Tiers
export type { QualityTierSpec } from './tiers/quality.js';
export { QUALITY_TIERS, DEFAULT_QUALITY_TIER, isQualityTier, normalizeQualityTier } from './tiers/quality.js';
export type { SearchTierSpec, SaleTierSpec } from './tiers/agent.js';
export {
  SEARCH_TIERS,
  SALE_TIERS,
  DEFAULT_AGENT_TIER,
  isAgentTier,
  normalizeAgentTier,
  computeRetainerFee,
  computeSaleFee,
} from './tiers/agent.js';
export type { InspectionTierSpec, RevealDepth } from './tiers/inspection.js';
export { INSPECTION_TIERS, isInspectionTier, computeInspectionFee } from './tiers/inspection.js';

// Condition
export type {
  GenerationSpec,
  ConditionRequest,
  GeneratedCondition,
  OverallRating,
  QualityHint,
} from './condition/types.js';
export { GENERATIONS, GENERATION_ORDER, selectGeneration } from './condition/generation.js';
export { computeUsedPrice, MIN_PRICE_FRACTION } from './condition/pricing.js';
export { generateCondition } from './condition/generator.js';
export { overallRating, repairEstimate, qualityHint } from './condition/assessment.js';

// Decision
export type {
  PersonalityProfile,
  RiskBand,
  SellerAction,
  SellerDecisionInput,
  SellerDecision,
  CounterOfferParams,
} from './decision/types.js';
export { PERSONALITIES, IMMOVABLE_FLOOR, classifyPersonality } from './decision/personality.js';
export { WEATHER_MODIFIERS, WEATHER_CONDITIONS, weatherModifier } from './decision/weather.js';
export { BAND_EPSILON, classifyGap, rejectProbability, decideSellerResponse } from './decision/bands.js';
export { computeCounterOffer, COUNTER_PRICE_STEP, MAX_COUNTER_ROUNDS } from './decision/counter.js';

// Validation
export { validateBasePrice, validateHiddenQuality, validateOffer, MAX_OFFER_RATIO } from './validation.js';

// Utils
export { clamp, roundUpTo } from './utils.js';
