import type { AgentTier, GenerationClass, QualityTier, Range } from '../types.js';

export interface GenerationSpec {
  name: string;
  /** Whole years. */
  age_range: Range;
  hours_per_year: Range;
}

export interface ConditionRequest {
  base_price: number;
  /** Tier index as received. Out-of-range values fall back to "Any". */
  quality_tier: number;
  /** Tier index as received. Out-of-range values fall back to Regional. */
  agent_tier: number;
  generation?: GenerationClass;
}

export interface GeneratedCondition {
  quality_tier: QualityTier;
  agent_tier: AgentTier;
  generation: GenerationClass;
  age_years: number;
  operating_hours: number;
  damage: number;
  wear: number;
  price_multiplier: number;
  price: number;
  hidden_quality: number;
  engine_reliability: number;
  hydraulic_reliability: number;
  electrical_reliability: number;
}

export type OverallRating = 'excellent' | 'good' | 'fair' | 'poor';

export type QualityHint = 'lemon' | 'average' | 'workhorse';
