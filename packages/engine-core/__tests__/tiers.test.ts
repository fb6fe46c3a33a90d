import { describe, expect, it } from 'vitest';
import { computeRetainerFee, computeSaleFee, isAgentTier, normalizeAgentTier } from '../src/tiers/agent.js';
import { computeInspectionFee, INSPECTION_TIERS, isInspectionTier } from '../src/tiers/inspection.js';
import { QUALITY_TIERS, normalizeQualityTier } from '../src/tiers/quality.js';

describe('quality tiers', () => {
  it('orders tiers from Poor to Excellent', () => {
    expect([1, 2, 3, 4, 5].map((t) => QUALITY_TIERS[normalizeQualityTier(t)].name)).toEqual([
      'Poor',
      'Any',
      'Fair',
      'Good',
      'Excellent',
    ]);
  });

  it('falls back to Any', () => {
    expect(normalizeQualityTier(0)).toBe(2);
    expect(normalizeQualityTier(6)).toBe(2);
    expect(normalizeQualityTier(2.5)).toBe(2);
    expect(normalizeQualityTier(Number.NaN)).toBe(2);
  });
});

describe('agent tiers', () => {
  it('falls back to Regional', () => {
    expect(normalizeAgentTier(4)).toBe(2);
    expect(normalizeAgentTier(3)).toBe(3);
    expect(isAgentTier(0)).toBe(false);
  });

  it('computes search retainers', () => {
    expect(computeRetainerFee(1, 50000)).toBe(500);
    expect(computeRetainerFee(2, 50000)).toBe(1250);
    expect(computeRetainerFee(3, 50000)).toBe(2400);
  });

  it('computes sale fees on vanilla value', () => {
    expect(computeSaleFee(1, 80000)).toBe(50);
    expect(computeSaleFee(2, 80000)).toBe(1050);
    expect(computeSaleFee(3, 80000)).toBe(2100);
  });
});

describe('inspection tiers', () => {
  it('charges flat plus percent of asking', () => {
    expect(computeInspectionFee(1, 50000)).toBe(2000);
    expect(computeInspectionFee(3, 100000)).toBe(9000);
  });

  it('caps the fee per tier', () => {
    expect(computeInspectionFee(1, 100000)).toBe(2500);
    expect(computeInspectionFee(2, 200000)).toBe(5000);
  });

  it('deepens with the tier', () => {
    expect(INSPECTION_TIERS[1].duration_hours).toBe(2);
    expect(INSPECTION_TIERS[2].duration_hours).toBe(6);
    expect(INSPECTION_TIERS[3].reveal_depth).toBe(3);
    expect(isInspectionTier(4)).toBe(false);
  });
});
