import { describe, expect, it } from 'vitest';
import { classifyGap, decideSellerResponse, rejectProbability } from '../src/decision/bands.js';
import { PERSONALITIES, classifyPersonality } from '../src/decision/personality.js';
import type { SellerDecisionInput } from '../src/decision/types.js';
import { weatherModifier } from '../src/decision/weather.js';
import type { RandomSource } from '../src/random.js';
import { createRandom } from '../src/random.js';
import type { SellerPersonality } from '../src/types.js';

const noRoll: RandomSource = () => {
  throw new Error('unexpected roll');
};

function makeInput(personality: SellerPersonality, offer: number, overrides?: Partial<SellerDecisionInput>): SellerDecisionInput {
  const profile = PERSONALITIES[personality];
  return {
    personality,
    acceptance_threshold: profile.acceptance_threshold,
    tolerance: profile.tolerance,
    walk_away_chance: profile.walk_away_chance,
    weather_modifier: 0,
    offer,
    asking: 100000,
    ...overrides,
  };
}

describe('classifyPersonality', () => {
  it('maps 0.85 to immovable every time', () => {
    for (let i = 0; i < 10; i++) {
      expect(classifyPersonality(0.85)).toBe('immovable');
    }
  });

  it('uses lower-inclusive band edges', () => {
    expect(classifyPersonality(0.19)).toBe('desperate');
    expect(classifyPersonality(0.2)).toBe('motivated');
    expect(classifyPersonality(0.4)).toBe('reasonable');
    expect(classifyPersonality(0.6)).toBe('firm');
    expect(classifyPersonality(0.8)).toBe('immovable');
  });
});

describe('weatherModifier', () => {
  it('looks up each condition', () => {
    expect(weatherModifier('sun')).toBe(0);
    expect(weatherModifier('cloudy')).toBe(0);
    expect(weatherModifier('fog')).toBe(0);
    expect(weatherModifier('rain')).toBe(0.05);
    expect(weatherModifier('snow')).toBe(0.05);
    expect(weatherModifier('storm')).toBe(0.08);
    expect(weatherModifier('hail')).toBe(0.12);
  });
});

describe('classifyGap', () => {
  it('treats an exact 20% gap as insulting', () => {
    expect(classifyGap(0.2)).toBe('INSULTING');
  });

  it('keeps 19.999% in the aggressive band', () => {
    expect(classifyGap(0.19999)).toBe('AGGRESSIVE');
  });

  it('includes the upper edge of the inner bands', () => {
    expect(classifyGap(0)).toBe('MEETS_THRESHOLD');
    expect(classifyGap(0.05)).toBe('CLOSE');
    expect(classifyGap(0.1)).toBe('MODERATE');
    expect(classifyGap(0.15)).toBe('SIGNIFICANT');
  });

  it('absorbs float noise at the edges', () => {
    expect(classifyGap(0.05 + 1e-12)).toBe('CLOSE');
    expect(classifyGap(0.2 - 1e-12)).toBe('INSULTING');
  });
});

describe('rejectProbability', () => {
  it('ramps from 0 to 30% across the moderate band', () => {
    expect(rejectProbability('MODERATE', 0.05)).toBeCloseTo(0, 10);
    expect(rejectProbability('MODERATE', 0.1)).toBeCloseTo(0.3, 10);
  });

  it('is a coin flip in the significant band', () => {
    expect(rejectProbability('SIGNIFICANT', 0.12)).toBe(0.5);
  });

  it('leaves a 30%→0 counter chance in the aggressive band', () => {
    expect(rejectProbability('AGGRESSIVE', 0.15)).toBeCloseTo(0.7, 10);
    expect(rejectProbability('AGGRESSIVE', 0.17)).toBeCloseTo(0.82, 10);
  });
});

describe('decideSellerResponse', () => {
  it('accepts at the threshold without rolling', () => {
    const d = decideSellerResponse(makeInput('reasonable', 90000), noRoll);
    expect(d.action).toBe('ACCEPT');
    expect(d.band).toBe('MEETS_THRESHOLD');
  });

  it('counters a close offer without rolling', () => {
    const d = decideSellerResponse(makeInput('reasonable', 87000), noRoll);
    expect(d.action).toBe('COUNTER');
    expect(d.band).toBe('CLOSE');
  });

  it('always rejects a 20% gap and rolls only for walk-away', () => {
    expect(decideSellerResponse(makeInput('reasonable', 70000), () => 0.99).action).toBe('REJECT');
    expect(decideSellerResponse(makeInput('reasonable', 70000), () => 0).action).toBe('WALK_AWAY');
  });

  it('does not always reject a 19.999% gap', () => {
    const d = decideSellerResponse(makeInput('reasonable', 70001), () => 0.99999);
    expect(d.band).toBe('AGGRESSIVE');
    expect(d.action).toBe('COUNTER');
  });

  it('walks away at the personality rate', () => {
    expect(decideSellerResponse(makeInput('desperate', 10000), () => 0.04).action).toBe('WALK_AWAY');
    expect(decideSellerResponse(makeInput('desperate', 10000), () => 0.06).action).toBe('REJECT');
  });

  it('firm seller rejects $80,000 against $100,000 at least 70% of the time', () => {
    const random = createRandom('firm-seller');
    const trials = 2000;
    let rejects = 0;
    for (let i = 0; i < trials; i++) {
      const d = decideSellerResponse(makeInput('firm', 80000), random);
      expect(d.band).toBe('AGGRESSIVE');
      if (d.action === 'REJECT') rejects++;
    }
    expect(rejects / trials).toBeGreaterThanOrEqual(0.7);
  });

  it('immovable seller never counters below its floor', () => {
    const d = decideSellerResponse(makeInput('immovable', 97500), noRoll);
    expect(d.band).toBe('CLOSE');
    expect(d.action).toBe('REJECT');
  });

  it('immovable seller accepts at 98% of asking', () => {
    expect(decideSellerResponse(makeInput('immovable', 98000), noRoll).action).toBe('ACCEPT');
  });

  it('immovable seller counters a threshold-meeting offer below 98%', () => {
    // rain pulls the threshold to 0.93, under the 0.98 floor
    const d = decideSellerResponse(makeInput('immovable', 97000, { weather_modifier: weatherModifier('rain') }), noRoll);
    expect(d.band).toBe('MEETS_THRESHOLD');
    expect(d.action).toBe('COUNTER');
  });

  it('bad weather lowers the bar', () => {
    const sunny = decideSellerResponse(makeInput('reasonable', 85000), noRoll);
    const rainy = decideSellerResponse(makeInput('reasonable', 85000, { weather_modifier: weatherModifier('rain') }), noRoll);
    expect(sunny.action).toBe('COUNTER');
    expect(rainy.action).toBe('ACCEPT');
  });

  it('ignores cloud and fog', () => {
    const d = decideSellerResponse(makeInput('reasonable', 88000, { weather_modifier: weatherModifier('cloudy') }), noRoll);
    expect(d.action).toBe('COUNTER');
    expect(d.gap).toBeCloseTo(0.02, 10);
    expect(decideSellerResponse(makeInput('reasonable', 88000, { weather_modifier: weatherModifier('fog') }), noRoll).action).toBe('COUNTER');
  });

  it('reports the threshold and gap it used', () => {
    const d = decideSellerResponse(makeInput('firm', 80000), () => 0);
    expect(d.offer_fraction).toBe(0.8);
    expect(d.threshold).toBeCloseTo(0.97, 10);
    expect(d.gap).toBeCloseTo(0.17, 10);
  });
});
