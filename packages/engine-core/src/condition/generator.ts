import type { RandomSource } from '../random.js';
import { randomInt, uniform, variance } from '../random.js';
import { SEARCH_TIERS, normalizeAgentTier } from '../tiers/agent.js';
import { QUALITY_TIERS, normalizeQualityTier } from '../tiers/quality.js';
import { clamp } from '../utils.js';
import { GENERATIONS, selectGeneration } from './generation.js';
import { computeUsedPrice } from './pricing.js';
import type { ConditionRequest, GeneratedCondition } from './types.js';

const CONDITION_BOUNDS = [0.01, 0.95] as const;
const DNA_VARIANCE = 0.2;
const RELIABILITY_FLOOR = 0.1;
const ENGINE_VARIANCE = 0.2;
const HYDRAULIC_VARIANCE = 0.25;
const ELECTRICAL_VARIANCE = 0.15;

/**
 * Produce one used-item record.
 *
 * Draw order is fixed (generation, age, hours/year, damage, wear, price
 * multiplier, hidden quality, engine, hydraulic, electrical) so a seed
 * always reproduces the same item.
 */
export function generateCondition(request: ConditionRequest, random: RandomSource): GeneratedCondition {
  const qualityTier = normalizeQualityTier(request.quality_tier);
  const agentTier = normalizeAgentTier(request.agent_tier);
  const quality = QUALITY_TIERS[qualityTier];
  const conditionMultiplier = SEARCH_TIERS[agentTier].condition_multiplier;

  const generation = request.generation ?? selectGeneration(random, agentTier);
  const spec = GENERATIONS[generation];
  const ageYears = randomInt(random, spec.age_range[0], spec.age_range[1]);
  const operatingHours = Math.round(ageYears * uniform(random, spec.hours_per_year));

  const [minCondition, maxCondition] = CONDITION_BOUNDS;
  const damage = clamp(uniform(random, quality.damage_range) * conditionMultiplier, minCondition, maxCondition);
  const wear = clamp(uniform(random, quality.wear_range) * conditionMultiplier, minCondition, maxCondition);

  const priceMultiplier = uniform(random, quality.price_range);
  const price = computeUsedPrice(request.base_price, priceMultiplier, ageYears);

  const dnaCentre = (1 - damage + quality.dna_average) / 2;
  const hiddenQuality = clamp(dnaCentre + variance(random, DNA_VARIANCE), 0, 1);

  const soundness = 1 - damage;
  const reliability = (spread: number) => clamp(soundness + variance(random, spread), RELIABILITY_FLOOR, 1);

  return {
    quality_tier: qualityTier,
    agent_tier: agentTier,
    generation,
    age_years: ageYears,
    operating_hours: operatingHours,
    damage,
    wear,
    price_multiplier: priceMultiplier,
    price,
    hidden_quality: hiddenQuality,
    engine_reliability: reliability(ENGINE_VARIANCE),
    hydraulic_reliability: reliability(HYDRAULIC_VARIANCE),
    electrical_reliability: reliability(ELECTRICAL_VARIANCE),
  };
}
