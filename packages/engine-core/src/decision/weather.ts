import type { WeatherCondition } from '../types.js';

/** Bad weather thins out buyers, so sellers settle for less. */
export const WEATHER_MODIFIERS: Readonly<Record<WeatherCondition, number>> = {
  sun: 0,
  cloudy: 0,
  fog: 0,
  rain: 0.05,
  snow: 0.05,
  storm: 0.08,
  hail: 0.12,
};

export const WEATHER_CONDITIONS = ['sun', 'cloudy', 'fog', 'rain', 'snow', 'storm', 'hail'] as const satisfies readonly WeatherCondition[];

export function weatherModifier(condition: WeatherCondition): number {
  return WEATHER_MODIFIERS[condition];
}
