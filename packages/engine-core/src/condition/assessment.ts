import type { OverallRating, QualityHint } from './types.js';

export function overallRating(damage: number, wear: number): OverallRating {
  const average = (damage + wear) / 2;
  if (average <= 0.1) return 'excellent';
  if (average <= 0.25) return 'good';
  if (average <= 0.45) return 'fair';
  return 'poor';
}

export function repairEstimate(basePrice: number, damage: number, wear: number): number {
  return Math.round(basePrice * damage * 0.25 + basePrice * wear * 0.1);
}

export function qualityHint(hiddenQuality: number): QualityHint {
  if (hiddenQuality < 0.3) return 'lemon';
  if (hiddenQuality > 0.7) return 'workhorse';
  return 'average';
}
